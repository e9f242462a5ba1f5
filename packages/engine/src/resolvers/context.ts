import type { SegmentAnnotations, TagRecord, WayType } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";

/** Everything an attribute resolver may look at */
export interface ResolverContext {
  readonly tags: TagRecord;
  readonly annotations: SegmentAnnotations;
  readonly wayType: WayType;
  readonly config: QualityConfig;
}

/** Cycleway-like way types that carry their own sidepath tags */
export const SIDEPATH_WAY_TYPES: readonly WayType[] = [
  "cycle track",
  "shared path",
  "segregated path",
  "shared footway",
];
