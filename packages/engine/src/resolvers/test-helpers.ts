import type { ProcessedAttributes, SegmentAnnotations, TagRecord, WayType } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";
import { loadBaseConfig } from "../config/index.js";
import type { ResolverContext } from "./context.js";

export const defaultConfig = loadBaseConfig();

export function makeContext(
  tags: TagRecord,
  wayType: WayType,
  annotations: Partial<SegmentAnnotations> = {},
  config: QualityConfig = defaultConfig,
): ResolverContext {
  return {
    tags,
    wayType,
    annotations: { sidepath: null, highway: null, maxspeed: null, side: null, type: null, ...annotations },
    config,
  };
}

export function makeAttributes(overrides: Partial<ProcessedAttributes> = {}): ProcessedAttributes {
  return {
    proc_oneway: "no",
    proc_width: null,
    proc_surface: null,
    proc_smoothness: null,
    proc_sidepath: null,
    proc_highway: null,
    proc_maxspeed: null,
    proc_traffic_mode_left: null,
    proc_traffic_mode_right: null,
    proc_separation_left: "no",
    proc_separation_right: "no",
    proc_buffer_left: null,
    proc_buffer_right: null,
    proc_mandatory: null,
    proc_traffic_sign: null,
    filter_usable: 1,
    filter_way_type: "separated",
    ...overrides,
  };
}
