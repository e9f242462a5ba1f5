/**
 * Protection level from physical separation and buffer distance.
 *
 * Only applies to sidepaths with known traffic modes. Separation counts
 * twice as much as the buffer, and the side facing vehicle traffic
 * dominates. The result ranges from 0.9 (unprotected) to 1.4.
 */

import type { ProtectionLevel, Side, TrafficMode, YesNo } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";
import { roundTo } from "../math.js";
import type { TrafficContext } from "../resolvers/index.js";
import { splitDelimited } from "../tags/index.js";

const VEHICLE_MODES: readonly (TrafficMode | null)[] = ["motor_vehicle", "psv", "parking"];
const ACTIVE_MODES: readonly (TrafficMode | null)[] = ["foot", "bicycle"];

/** Strongest separation listed for a side */
export function separationLevel(separation: string, config: QualityConfig): number {
  return splitDelimited(separation).reduce(
    (level, value) => Math.max(level, config.separationLevels[value] ?? config.separationLevelFallback),
    0,
  );
}

/** Half the buffer width in meters, capped at 1 */
export function bufferLevel(buffer: number | null): number {
  return buffer ? Math.min(buffer / 2, 1) : 0;
}

function combineSides(mode: Record<Side, TrafficMode | null>, left: number, right: number): number {
  let level = (left + right) / 2;
  if (VEHICLE_MODES.includes(mode.left) && ACTIVE_MODES.includes(mode.right)) level = left * 0.75 + right * 0.25;
  if (ACTIVE_MODES.includes(mode.left) && VEHICLE_MODES.includes(mode.right)) level = left * 0.25 + right * 0.75;
  if (mode.right === "no" && mode.left !== "no") level = left;
  if (mode.left === "no" && mode.right !== "no") level = right;
  return level;
}

export function computeProtectionFactor(
  sidepath: YesNo | null,
  traffic: TrafficContext,
  config: QualityConfig,
): ProtectionLevel | null {
  const { mode } = traffic;
  if (sidepath !== "yes" || (mode.left === null && mode.right === null)) return null;

  const separationLeft = separationLevel(traffic.separation.left, config);
  const separationRight = separationLevel(traffic.separation.right, config);
  const bufferLeft = bufferLevel(traffic.buffer.left);
  const bufferRight = bufferLevel(traffic.buffer.right);
  const left = separationLeft * 0.67 + bufferLeft * 0.33;
  const right = separationRight * 0.67 + bufferRight * 0.33;

  let factor = 0.9 + combineSides(mode, left, right) / 2;
  if (!VEHICLE_MODES.includes(mode.left) && !VEHICLE_MODES.includes(mode.right)) {
    factor -= (factor - 1) / 2;
  }

  return {
    prot_level_separation_left: roundTo(separationLeft, 3),
    prot_level_separation_right: roundTo(separationRight, 3),
    prot_level_buffer_left: roundTo(bufferLeft, 3),
    prot_level_buffer_right: roundTo(bufferRight, 3),
    prot_level_left: roundTo(left, 3),
    prot_level_right: roundTo(right, 3),
    fac_protection_level: roundTo(factor, 3),
  };
}
