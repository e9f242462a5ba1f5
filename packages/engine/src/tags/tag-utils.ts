/**
 * Read values out of OSM-style tag records.
 *
 * These helpers turn free-form tag values into numbers, lists and
 * validated enum members. None of them throw: anything unparsable
 * comes back as undefined.
 */

import type { Side, TagRecord, TagValue } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";

/**
 * Read a tag as a non-empty string.
 * Numeric values (typed by the source format) are stringified.
 */
export function tag(tags: TagRecord, key: string): string | undefined {
  const value = tags[key];
  if (value === null || value === undefined) return undefined;
  const str = typeof value === "number" ? String(value) : value.trim();
  return str === "" ? undefined : str;
}

/** Split a delimited tag value, trimming and dropping empty entries. */
export function splitDelimited(value: string | undefined, delimiter = ";"): string[] {
  if (!value) return [];
  return value
    .split(delimiter)
    .map((v) => v.trim())
    .filter((v) => v !== "");
}

/**
 * Parse a numeric tag value.
 *
 * Handles:
 * - numbers typed by the source format
 * - "2.5", "2,5", "2.5 m" (leading number, comma decimals)
 * - "2;3" (first entry of a list)
 *
 * @returns The number, or undefined if not parseable
 */
export function parseNumber(value: TagValue): number | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;

  const first = splitDelimited(value)[0];
  if (!first) return undefined;

  const match = first.replace(",", ".").match(/^-?\d+(\.\d+)?/);
  if (!match) return undefined;

  const parsed = parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Speed used for `maxspeed=walk` and living streets without a limit */
export const WALKING_SPEED = 10;

/** Speed used for `maxspeed=none` */
export const UNLIMITED_SPEED = 299;

/**
 * Parse a speed limit from the `maxspeed` tag.
 *
 * Parses various formats:
 * - "50" (assumed km/h)
 * - "30 mph" (converted to km/h)
 * - "walk" and living streets without a limit (10 km/h)
 * - "none" (299 km/h)
 *
 * @returns Speed limit in km/h, or undefined if not specified
 */
export function parseMaxspeed(tags: TagRecord): number | undefined {
  const maxspeed = tag(tags, "maxspeed");
  if (maxspeed === "walk" || (!maxspeed && tag(tags, "highway") === "living_street")) {
    return WALKING_SPEED;
  }
  if (!maxspeed) return undefined;
  if (maxspeed === "none") return UNLIMITED_SPEED;

  const value = parseNumber(maxspeed);
  if (value === undefined) return undefined;

  if (/mph/i.test(maxspeed)) {
    return Math.round(value * 1.60934);
  }
  return value;
}

/**
 * Access value for a transport mode, following the configured
 * hierarchy (e.g. bicycle → vehicle → access).
 */
export function getAccess(tags: TagRecord, mode: string, config: QualityConfig): string | undefined {
  const direct = tag(tags, mode);
  if (direct) return direct;
  for (const parent of config.accessHierarchy[mode] ?? []) {
    const value = tag(tags, parent);
    if (value) return value;
  }
  return undefined;
}

/** Fill missing left/right values from a "both" value. */
export function splitBoth<T>(
  both: T | undefined,
  left: T | undefined,
  right: T | undefined,
): [T | undefined, T | undefined] {
  if (both === undefined) return [left, right];
  return [left ?? both, right ?? both];
}

/** Side of a sidepath facing the road, given the traffic handedness */
export function roadSide(config: QualityConfig): Side {
  return config.rightHandTraffic ? "left" : "right";
}

export function oppositeSide(side: Side): Side {
  return side === "left" ? "right" : "left";
}

/**
 * Physical separation on the side where a traffic mode travels.
 *
 * Without `traffic_mode:*` tags, motor vehicles are assumed on the road
 * side and pedestrians on the other.
 */
export function deriveSeparation(tags: TagRecord, mode: string, config: QualityConfig): string | undefined {
  const road = roadSide(config);

  const [modeLeft, modeRight] = splitBoth(
    tag(tags, "traffic_mode:both"),
    tag(tags, "traffic_mode:left"),
    tag(tags, "traffic_mode:right"),
  );
  const [sepLeft, sepRight] = splitBoth(
    tag(tags, "separation:both"),
    tag(tags, "separation:left"),
    tag(tags, "separation:right"),
  );

  const trafficLeft = modeLeft ?? (road === "left" ? "motor_vehicle" : "foot");
  const trafficRight = modeRight ?? (road === "right" ? "motor_vehicle" : "foot");

  let separation: string | undefined;
  if (trafficLeft === mode) separation = sepLeft;
  if (trafficRight === mode) separation = sepRight;
  return separation;
}

/** Whether a separation value marks actual physical separation */
export function isSeparated(separation: string | undefined): separation is string {
  return separation !== undefined && separation !== "no" && separation !== "none";
}

/**
 * Weakest of several enum values: the one with the lowest factor.
 * Unknown values are ignored; ties keep the first listed.
 */
export function weakestValue(values: string[], factors: Readonly<Record<string, number>>): string | undefined {
  let weakest: string | undefined;
  let weakestFactor = Infinity;
  for (const value of values) {
    const factor = factors[value];
    if (factor !== undefined && factor < weakestFactor) {
      weakest = value;
      weakestFactor = factor;
    }
  }
  return weakest;
}

/** Whether any of `keys` carries one of the `accepted` values */
export function anyTagIn(tags: TagRecord, keys: readonly string[], accepted: readonly string[]): boolean {
  return keys.some((key) => {
    const value = tag(tags, key);
    return value !== undefined && accepted.includes(value);
  });
}

/** Tag keys of a family for a side, most specific first: `cycleway:right:x`, `cycleway:both:x`, `cycleway:x` */
export function sideKeys(prefix: string, side: Side | null, suffix = ""): string[] {
  const tail = suffix ? `:${suffix}` : "";
  const keys = [`${prefix}:both${tail}`, `${prefix}${tail}`];
  return side ? [`${prefix}:${side}${tail}`, ...keys] : keys;
}

/** First non-empty tag among `keys` */
export function firstTag(tags: TagRecord, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = tag(tags, key);
    if (value !== undefined) return value;
  }
  return undefined;
}
