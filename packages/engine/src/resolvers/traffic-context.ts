/**
 * Traffic modes, physical separation and buffer distance on both sides
 * of a segment.
 *
 * Sides are relative to the drawing direction of the way. Without tags,
 * a sidepath has motor traffic (or parking) on its left and pedestrians
 * on its right. Traffic handedness only decides which side an un-suffixed
 * `separation` or `buffer` tag belongs to.
 */

import type { Side, TagRecord, TrafficMode } from "@cqi/types";
import { TRAFFIC_MODES, isCycleLane } from "@cqi/types";
import { oppositeSide, parseNumber, roadSide, splitBoth, tag } from "../tags/index.js";
import type { ResolverContext } from "./context.js";
import { SIDEPATH_WAY_TYPES } from "./context.js";

export interface TrafficContext {
  mode: Record<Side, TrafficMode | null>;
  separation: Record<Side, string>;
  buffer: Record<Side, number | null>;
}

/** Modes an un-suffixed `separation` / `buffer` tag is assumed to refer to */
const VEHICLE_MODES: readonly TrafficMode[] = ["motor_vehicle", "psv", "parking"];

function trafficMode(value: string | undefined): TrafficMode | undefined {
  return TRAFFIC_MODES.find((mode) => mode === value);
}

function bySide<T>(left: T, right: T): Record<Side, T> {
  return { left, right };
}

/** Parking tagged on the parent road, on the side this sub-segment runs along */
function parkingAlongside(tags: TagRecord, side: Side | null): boolean {
  if (!side) return false;
  const [left, right] = splitBoth(tag(tags, "parking:both"), tag(tags, "parking:left"), tag(tags, "parking:right"));
  const parking = side === "left" ? left : right;
  return parking !== undefined && parking !== "no";
}

function inferLeft(ctx: ResolverContext, right: TrafficMode | undefined): TrafficMode | undefined {
  const { tags, wayType, annotations } = ctx;
  if (wayType === "cycle path") return "no";
  if (SIDEPATH_WAY_TYPES.includes(wayType) && annotations.sidepath === "yes") {
    return parkingAlongside(tags, annotations.side) && right !== "parking" ? "parking" : "motor_vehicle";
  }
  if (
    isCycleLane(wayType) ||
    wayType === "shared road" ||
    wayType === "shared traffic lane" ||
    wayType === "shared bus lane" ||
    wayType === "crossing"
  ) {
    return "motor_vehicle";
  }
  return undefined;
}

function inferRight(ctx: ResolverContext, left: TrafficMode | undefined): TrafficMode | undefined {
  const { tags, wayType, annotations } = ctx;
  if (wayType === "cycle path") return "no";
  if (wayType === "crossing") return "motor_vehicle";
  if (isCycleLane(wayType)) {
    return parkingAlongside(tags, annotations.side) && left !== "parking" ? "parking" : "foot";
  }
  if (SIDEPATH_WAY_TYPES.includes(wayType) && annotations.sidepath === "yes") return "foot";
  return undefined;
}

/**
 * Spread a side-suffixed tag family over both sides.
 * The un-suffixed key only refers to the side with vehicle traffic.
 */
function sidedValues<T>(
  read: (key: string) => T | undefined,
  prefix: string,
  mode: Record<Side, TrafficMode | null>,
  road: Side,
): Record<Side, T | undefined> {
  const [left, right] = splitBoth(read(`${prefix}:both`), read(`${prefix}:left`), read(`${prefix}:right`));
  const values = bySide(left, right);
  const plain = read(prefix);
  if (plain === undefined) return values;

  const away = oppositeSide(road);
  const roadMode = mode[road];
  if (roadMode !== null && VEHICLE_MODES.includes(roadMode)) {
    values[road] ??= plain;
  } else if (mode[away] === "motor_vehicle") {
    values[away] ??= plain;
  }
  return values;
}

export function resolveTrafficContext(ctx: ResolverContext): TrafficContext {
  const { tags, wayType, config } = ctx;
  const road = roadSide(config);

  let mode: Record<Side, TrafficMode | null>;
  if (wayType === "cycle lane (central)") {
    mode = bySide<TrafficMode | null>("motor_vehicle", "motor_vehicle");
  } else {
    const [left, right] = splitBoth(
      trafficMode(tag(tags, "traffic_mode:both")),
      trafficMode(tag(tags, "traffic_mode:left")),
      trafficMode(tag(tags, "traffic_mode:right")),
    );
    const leftMode = left ?? inferLeft(ctx, right);
    const rightMode = right ?? inferRight(ctx, leftMode);
    mode = bySide(leftMode ?? null, rightMode ?? null);
  }

  const separation = sidedValues((key) => tag(tags, key), "separation", mode, road);
  const buffer = sidedValues((key) => parseNumber(tag(tags, key)) || undefined, "buffer", mode, road);

  return {
    mode,
    separation: bySide(separation.left ?? "no", separation.right ?? "no"),
    buffer: bySide(buffer.left ?? null, buffer.right ?? null),
  };
}
