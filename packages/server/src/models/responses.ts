import type { FeatureProperties } from "@cqi/engine";
import type { DroppedSegment, SegmentFeature } from "@cqi/types";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  /** Profiles with a loaded engine ("default" for the base config) */
  engines: string[];
}

export interface ProfileListItem {
  name: string;
  description: string;
  extends: string;
}

export interface AssessGeojsonResponse {
  type: "FeatureCollection";
  features: SegmentFeature<FeatureProperties>[];
  _meta: {
    config: string;
    assessed: number;
    dropped: DroppedSegment[];
  };
}

export interface ErrorResponse {
  message: string;
  details?: string[];
}
