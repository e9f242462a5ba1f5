import type { DataQuality, MissingMarker } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";
import type { Notes } from "./notes.js";
import { appendUnique } from "./notes.js";

/** Markers that also get a 0/1 flag column in the output */
export const FLAGGED_MARKERS = ["width", "surface", "smoothness", "maxspeed", "parking", "lit"] as const;

export type MissingFlags = Record<`data_missing_${(typeof FLAGGED_MARKERS)[number]}`, 0 | 1>;

/** Sum of the configured weights of each distinct marker; unknown markers weigh 0 */
export function incompleteness(missing: readonly MissingMarker[], config: QualityConfig): number {
  return appendUnique([], ...missing).reduce((sum, marker) => sum + (config.incompletenessWeights[marker] ?? 0), 0);
}

export function summarizeQuality(notes: Notes, config: QualityConfig): DataQuality {
  return {
    data_missing: [...notes.missing],
    data_bonus: [...notes.bonus],
    data_malus: [...notes.malus],
    data_incompleteness: incompleteness(notes.missing, config),
  };
}

export function missingFlags(missing: readonly MissingMarker[]): MissingFlags {
  const has = (marker: MissingMarker): 0 | 1 => (missing.includes(marker) ? 1 : 0);
  return {
    data_missing_width: has("width"),
    data_missing_surface: has("surface"),
    data_missing_smoothness: has("smoothness"),
    data_missing_maxspeed: has("maxspeed"),
    data_missing_parking: has("parking"),
    data_missing_lit: has("lit"),
  };
}
