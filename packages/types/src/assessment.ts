/**
 * Engine output: processed attributes, factors, index and data quality.
 */

import type { SegmentAnnotations } from "./tags.js";
import type { WayType, WayTypeFilter } from "./way-type.js";

export const ONEWAY_VALUES = ["yes", "no", "-1", "alternating", "reversible"] as const;
export type OnewayValue = (typeof ONEWAY_VALUES)[number];

/** Resolved direction; shared roads may carry a `_motor_vehicles` suffix */
export type ProcessedOneway = OnewayValue | `${OnewayValue}_motor_vehicles`;

export const TRAFFIC_MODES = ["motor_vehicle", "psv", "parking", "foot", "bicycle", "no"] as const;
export type TrafficMode = (typeof TRAFFIC_MODES)[number];

export type MandatoryUse = "yes" | "no" | "prohibited" | "use_sidepath" | "optional_sidepath";

/** Marker raised whenever an input was absent, unparsable or defaulted */
export type MissingMarker =
  | "width"
  | "width:lanes"
  | "surface"
  | "smoothness"
  | "maxspeed"
  | "parking"
  | "lit"
  | "crossing"
  | "crossing_markings";

/** Result of one resolver: a value plus the markers it raised */
export interface Resolved<T> {
  value: T;
  missing: MissingMarker[];
}

export interface ProcessedAttributes {
  proc_oneway: ProcessedOneway;
  /** Effective width in meters */
  proc_width: number | null;
  proc_surface: string | null;
  proc_smoothness: string | null;
  proc_sidepath: SegmentAnnotations["sidepath"];
  proc_highway: string | null;
  proc_maxspeed: number | null;
  proc_traffic_mode_left: TrafficMode | null;
  proc_traffic_mode_right: TrafficMode | null;
  proc_separation_left: string;
  proc_separation_right: string;
  proc_buffer_left: number | null;
  proc_buffer_right: number | null;
  proc_mandatory: MandatoryUse | null;
  proc_traffic_sign: string | null;
  filter_usable: 0 | 1;
  filter_way_type: WayTypeFilter;
}

/** Sub-scores of the disabled protection-level factor */
export interface ProtectionLevel {
  prot_level_separation_left: number;
  prot_level_separation_right: number;
  prot_level_buffer_left: number;
  prot_level_buffer_right: number;
  prot_level_left: number;
  prot_level_right: number;
  fac_protection_level: number;
}

export interface Factors {
  base_index: number | null;
  fac_width: number | null;
  fac_surface: number | null;
  fac_highway: number;
  fac_maxspeed: number;
  fac_protection_level: number | null;
  fac_1: number | null;
  fac_2: number | null;
  fac_3: number | null;
  fac_4: number | null;
  /** 0..100 */
  index: number | null;
  /** `index // 10` */
  index_10: number | null;
  /** Level of traffic stress, 1 (lowest) to 4 */
  stress_level: 1 | 2 | 3 | 4 | null;
}

export interface DataQuality {
  data_missing: MissingMarker[];
  data_bonus: string[];
  data_malus: string[];
  data_incompleteness: number;
}

/** Full assessment for one surviving segment */
export interface SegmentAssessment {
  id: string;
  way_type: WayType;
  annotations: SegmentAnnotations;
  attributes: ProcessedAttributes;
  factors: Factors;
  protection: ProtectionLevel | null;
  quality: DataQuality;
}

export type DropReason = "no bicycle access" | "informal path" | "footway without bicycle access";

/** The classifier vetoed the segment */
export interface DroppedSegment {
  id: string;
  dropped: true;
  reason: DropReason;
}

export type AssessmentResult = SegmentAssessment | DroppedSegment;

export function isDropped(result: AssessmentResult): result is DroppedSegment {
  return "dropped" in result;
}
