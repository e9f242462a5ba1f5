/**
 * Effective width available to cyclists.
 *
 * Dedicated ways use their own width tags. Roads shared with motor
 * traffic start from the carriageway width and subtract whatever is not
 * available to cyclists in mixed traffic: cycle lanes, their buffers and
 * parking lanes.
 */

import type { MissingMarker, ProcessedOneway, Resolved, Side, TagRecord, WayType } from "@cqi/types";
import { CYCLEWAY_WAY_TYPES } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";
import { roundTo } from "../math.js";
import { firstTag, parseNumber, splitBoth, tag } from "../tags/index.js";
import type { ResolverContext } from "./context.js";
import { isOnewayYes } from "./oneway.js";

/** Two-way dedicated ways are assumed 1.6 times as wide as one-way ones */
const TWO_WAY_WIDTH_RATIO = 1.6;

/** Upper bound for a shared road's effective width without parking information */
const SHARED_ROAD_MAX_WIDTH = { twoWay: 5.5, oneway: 4 } as const;

const PARKING_LANE_VALUES = ["lane", "half_on_kerb"] as const;

function highwayWidth(config: QualityConfig, highway: string | undefined): number {
  return (highway !== undefined ? config.widths.highway[highway] : undefined) ?? config.widths.highwayFallback;
}

function dedicatedDefault(wayType: WayType, config: QualityConfig): number {
  if (wayType === "cycle path" || wayType === "shared path" || wayType === "cycle lane (protected)") {
    return highwayWidth(config, "path");
  }
  if (wayType === "shared footway") return highwayWidth(config, "footway");
  return highwayWidth(config, "cycleway");
}

function widthFootway(tags: TagRecord): number | undefined {
  const width = parseNumber(tag(tags, "width"));
  if (!width) return undefined;
  const footway = parseNumber(tag(tags, "footway:width"));
  return footway ? width - footway : width / 2;
}

function resolveSegregatedWidth(
  tags: TagRecord,
  oneway: ProcessedOneway,
  config: QualityConfig,
): Resolved<number | null> {
  const missing: MissingMarker[] = [];
  let width: number | undefined;

  if (tag(tags, "highway") === "path") {
    const cycleway = parseNumber(tag(tags, "cycleway:width"));
    if (cycleway) return { value: cycleway, missing };
    width = widthFootway(tags);
    missing.push("width");
  } else {
    width = parseNumber(tag(tags, "width"));
  }

  if (!width) {
    width = highwayWidth(config, "path") * (oneway === "no" ? TWO_WAY_WIDTH_RATIO : 1);
    if (!missing.includes("width")) missing.push("width");
  }
  return { value: width, missing };
}

function resolveDedicatedWidth(
  tags: TagRecord,
  wayType: WayType,
  oneway: ProcessedOneway,
  config: QualityConfig,
): Resolved<number | null> {
  const width = parseNumber(tag(tags, "cycleway:width")) || parseNumber(tag(tags, "width"));
  if (width) return { value: width, missing: [] };
  const fallback = dedicatedDefault(wayType, config) * (oneway === "no" ? TWO_WAY_WIDTH_RATIO : 1);
  return { value: fallback, missing: ["width"] };
}

function lastLane(widthLanes: string | undefined): string | undefined {
  if (!widthLanes?.includes("|")) return undefined;
  return widthLanes.split("|").at(-1);
}

/** Width of the outermost lane of a traffic or bus lane, from `width:lanes` */
function laneWidth(ctx: ResolverContext, oneway: ProcessedOneway): Resolved<number | undefined> {
  const { tags, wayType, annotations, config } = ctx;
  const isBusLane = wayType === "shared bus lane";
  const onewayYes = isOnewayYes(oneway);

  let lane: string | undefined;
  if (onewayYes || !isBusLane) lane = lastLane(tag(tags, "width:lanes"));
  else if (annotations.side === "right") lane = lastLane(tag(tags, "width:lanes:forward"));
  else if (annotations.side === "left") lane = lastLane(tag(tags, "width:lanes:backward"));

  if (lane !== undefined) return { value: parseNumber(lane), missing: [] };
  if (isBusLane) return { value: config.widths.busLane, missing: [] };
  return { value: config.widths.trafficLane, missing: ["width:lanes"] };
}

/** Carriageway width from the road class when nothing is tagged */
function defaultCarriageway(tags: TagRecord, oneway: ProcessedOneway, config: QualityConfig): number {
  const width = highwayWidth(config, tag(tags, "highway"));
  return isOnewayYes(oneway) ? roundTo(width / TWO_WAY_WIDTH_RATIO, 1) : width;
}

function parkingWidth(
  position: string | undefined,
  width: number | undefined,
  orientation: string | undefined,
  config: QualityConfig,
): number {
  let result = width;
  const onLane = PARKING_LANE_VALUES.some((v) => v === position);
  if (onLane && !result) {
    const widths = config.widths.parking;
    if (orientation === "diagonal") result = widths.diagonal;
    else if (orientation === "perpendicular") result = widths.perpendicular;
    else result = widths.parallel;
  }
  if (result && position === "half_on_kerb") result /= 2;
  return result || 0;
}

/** Buffer between a cycle lane and the traffic on either of its sides */
function cycleLaneBuffer(tags: TagRecord, side: Side): number {
  let total = 0;
  for (const bufferSide of ["left", "right"] as const) {
    const keys: string[] = [];
    for (const scope of [side, "both", ""]) {
      const prefix = scope ? `cycleway:${scope}:buffer` : "cycleway:buffer";
      keys.push(`${prefix}:${bufferSide}`, `${prefix}:both`, prefix);
    }
    total += parseNumber(firstTag(tags, keys)) ?? 0;
  }
  return total;
}

/** Cycle lane position and tagged widths per side; on oneway roads a plain `cycleway` is the right side only */
function cycleLaneWidths(tags: TagRecord, oneway: ProcessedOneway, config: QualityConfig): Record<Side, number> {
  const twoWay = !isOnewayYes(oneway);
  const both = tag(tags, "cycleway:both");
  const plain = tag(tags, "cycleway");
  const position: Record<Side, string | undefined> = {
    left: tag(tags, "cycleway:left") ?? (twoWay ? plain : undefined) ?? both,
    right: tag(tags, "cycleway:right") ?? plain ?? both,
  };

  const sideWidth = (side: Side): number | undefined => parseNumber(tag(tags, `cycleway:${side}:width`)) || undefined;
  const width: Record<Side, number | undefined> = { left: sideWidth("left"), right: sideWidth("right") };
  if (position.left === "lane" || position.right === "lane") {
    const plainWidth = parseNumber(tag(tags, "cycleway:width")) || undefined;
    const bothWidth = parseNumber(tag(tags, "cycleway:both:width")) || undefined;
    width.left = width.left ?? (twoWay ? plainWidth : undefined) ?? bothWidth;
    width.right = width.right ?? plainWidth ?? bothWidth;
  }

  const total = (side: Side): number => {
    if (position[side] !== "lane") return width[side] ?? 0;
    return (width[side] ?? config.widths.cycleLane) + cycleLaneBuffer(tags, side);
  };
  return { left: total("left"), right: total("right") };
}

/** Carriageway width minus cycle lanes, their buffers and parking */
function resolveSharedWidth(ctx: ResolverContext, oneway: ProcessedOneway): Resolved<number | null> {
  const { tags, wayType, config } = ctx;
  const missing: MissingMarker[] = [];

  if (wayType === "shared traffic lane" || wayType === "shared bus lane") {
    const lane = laneWidth(ctx, oneway);
    missing.push(...lane.missing);
    if (lane.value) return { value: lane.value, missing };
  }

  const effective = parseNumber(tag(tags, "width:effective"));
  if (effective) return { value: effective, missing };

  let width = parseNumber(tag(tags, "width"));
  if (!width) {
    const lanes = parseNumber(tag(tags, "lanes"));
    if (lanes) return { value: lanes * config.widths.trafficLane, missing };
  }
  if (!width) {
    width = defaultCarriageway(tags, oneway, config);
    missing.push("width");
  }

  const cycleLanes = cycleLaneWidths(tags, oneway, config);
  width -= cycleLanes.left + cycleLanes.right;

  const [parkingLeft, parkingRight] = splitBoth(
    tag(tags, "parking:both"),
    tag(tags, "parking:left"),
    tag(tags, "parking:right"),
  );
  if (parkingLeft !== undefined || parkingRight !== undefined) {
    for (const [side, position] of [
      ["left", parkingLeft],
      ["right", parkingRight],
    ] as const) {
      width -= parkingWidth(
        position,
        parseNumber(tag(tags, `parking:${side}:width`) ?? tag(tags, "parking:both:width")),
        tag(tags, `parking:${side}:orientation`) ?? tag(tags, "parking:both:orientation"),
        config,
      );
    }
  } else {
    missing.push("parking");
    if (wayType === "shared road") {
      width = Math.min(width, isOnewayYes(oneway) ? SHARED_ROAD_MAX_WIDTH.oneway : SHARED_ROAD_MAX_WIDTH.twoWay);
    }
  }

  if (width < config.widths.trafficLane && missing.includes("width")) {
    width = config.widths.trafficLane;
  }
  return { value: width || null, missing };
}

/**
 * Effective width in meters.
 *
 * @param oneway - Resolved direction; two-way defaults are widened
 */
export function resolveWidth(ctx: ResolverContext, oneway: ProcessedOneway): Resolved<number | null> {
  const { tags, wayType, config } = ctx;
  if (wayType === "segregated path") return resolveSegregatedWidth(tags, oneway, config);
  if (CYCLEWAY_WAY_TYPES.includes(wayType)) return resolveDedicatedWidth(tags, wayType, oneway, config);
  return resolveSharedWidth(ctx, oneway);
}
