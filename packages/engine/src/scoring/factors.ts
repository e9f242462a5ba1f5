/**
 * Individual factors of the quality index.
 *
 * Each rule returns its value together with the notes it raised; the
 * composer merges them in a fixed order.
 */

import type { ProcessedOneway, TagRecord, WayType, YesNo } from "@cqi/types";
import { ACCESS_RESTRICTABLE_WAY_TYPES, SHARED_WAY_TYPES } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";
import { roundTo } from "../math.js";
import type { Notes } from "../quality/index.js";
import { isOnewayYes } from "../resolvers/index.js";
import { getAccess } from "../tags/index.js";

export interface Scored<T> {
  value: T;
  notes: Partial<Notes>;
}

/** Motor vehicle access, when it is one of the restricted values with its own base index */
export function restrictedMotorAccess(tags: TagRecord, wayType: WayType, config: QualityConfig): string | null {
  if (!ACCESS_RESTRICTABLE_WAY_TYPES.includes(wayType)) return null;
  const access = getAccess(tags, "motor_vehicle", config);
  return access !== undefined && config.motorVehicleAccessIndex[access] !== undefined ? access : null;
}

export function baseIndex(wayType: WayType, restrictedAccess: string | null, config: QualityConfig): Scored<number | null> {
  if (restrictedAccess !== null) {
    return {
      value: config.motorVehicleAccessIndex[restrictedAccess] ?? null,
      notes: { bonus: ["motor vehicle restricted"] },
    };
  }
  return { value: config.baseIndex[wayType] ?? null, notes: {} };
}

/** Width at which dedicated and shared ways are compared: shared roads need 2 m more for the same comfort */
function comparableWidth(
  wayType: WayType,
  width: number | null,
  oneway: ProcessedOneway,
  dedicated: boolean,
): number | null {
  if (!width) return null;
  if (dedicated) return isOnewayYes(oneway) ? width : width / 1.6;
  if (wayType === "shared traffic lane") return Math.max(width - 2 + (4.5 - width) / 3, 0);
  if (wayType === "shared bus lane") return Math.max(width - 3 + (5.5 - width) / 3, 0);
  return (isOnewayYes(oneway) ? width : width / 1.6) - 2;
}

/**
 * Width factor: a logistic curve over the width per direction.
 * Shared roads and lanes never drop below 0.25.
 */
export function widthFactor(
  wayType: WayType,
  width: number | null,
  oneway: ProcessedOneway,
  tags: TagRecord,
  restrictedAccess: string | null,
  config: QualityConfig,
): Scored<number | null> {
  const shared = SHARED_WAY_TYPES.includes(wayType);
  const dedicated = !shared || getAccess(tags, "motor_vehicle", config) === "no";
  const minimum = dedicated ? 0 : 0.25;

  const calc = comparableWidth(wayType, width, oneway, dedicated);
  if (!calc) return { value: null, notes: {} };

  const w = Math.max(0.001, calc);
  let factor = w <= 3 || shared ? 1.1 / (1 + 20 * Math.exp(-2.1 * w)) : 2 / (1 + 1.8 * Math.exp(-0.24 * w));
  if (restrictedAccess !== null) factor += (1 - factor) / 2;
  factor = roundTo(Math.max(minimum, factor), 3);

  return {
    value: factor,
    notes: {
      ...(factor > 1 ? { bonus: ["wide width"] } : {}),
      ...(factor <= 0.5 ? { malus: ["narrow width"] } : {}),
    },
  };
}

/** Smoothness takes precedence over surface */
export function surfaceFactor(
  surface: string | null,
  smoothness: string | null,
  config: QualityConfig,
): Scored<number | null> {
  const factor =
    (smoothness !== null ? config.smoothnessFactors[smoothness] : undefined) ??
    (surface !== null ? config.surfaceFactors[surface] : undefined) ??
    null;
  if (factor === null) return { value: null, notes: {} };

  return {
    value: factor,
    notes: {
      ...(factor > 1 ? { bonus: ["excellent surface"] } : {}),
      ...(factor <= 0.5 ? { malus: ["bad surface"] } : {}),
    },
  };
}

export function highwayFactor(highway: string | null, config: QualityConfig): number {
  return (highway !== null ? config.highwayFactors[highway] : undefined) ?? 1;
}

/** Highways where a speed limit is not expected to be tagged */
const MAXSPEED_OPTIONAL_HIGHWAYS = ["pedestrian", "service", "track"];

/** Factor of the highest threshold not above the speed limit */
export function maxspeedFactor(
  maxspeed: number | null,
  wayType: WayType,
  sidepath: YesNo | null,
  highway: string | null,
  config: QualityConfig,
): Scored<number> {
  if (maxspeed) {
    let factor = 1;
    for (const step of config.maxspeedFactors) {
      if (maxspeed >= step.minSpeed) factor = step.factor;
    }
    return { value: factor, notes: {} };
  }

  const expectsMaxspeed =
    wayType !== "track or service" &&
    sidepath !== "no" &&
    (highway === null || !MAXSPEED_OPTIONAL_HIGHWAYS.includes(highway));
  return { value: 1, notes: expectsMaxspeed ? { missing: ["maxspeed"] } : {} };
}
