/**
 * Way type classification.
 *
 * An ordered cascade: the first matching rule wins, so the order of the
 * checks below is part of the contract. Two deletion rules run before
 * the cascade and can veto a segment outright.
 */

import type { DropReason, SegmentAnnotations, TagRecord, WayType, WayTypeFilter } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";
import { anyTagIn, deriveSeparation, getAccess, isSeparated, sideKeys, tag } from "../tags/index.js";

export type Classification =
  | { dropped: false; wayType: WayType }
  | { dropped: true; reason: DropReason };

/** Attributes whose value `link` / `crossing` marks a connector segment */
const CONNECTOR_ATTRIBUTES = ["footway", "cycleway", "path", "bridleway"] as const;

const SHARED_FOOTWAY_HIGHWAYS = new Set(["footway", "pedestrian", "bridleway", "steps"]);

/** Highways that imply marked traffic lanes even without `lane_markings` */
const MAJOR_HIGHWAYS = new Set(["motorway", "trunk", "primary", "secondary"]);

const ACCESS_GRANTED = ["yes", "designated", "permissive"] as const;

/**
 * Deletion rules that run before classification.
 *
 * @returns The reason to drop the segment, or null to keep it
 */
export function checkDeletion(tags: TagRecord, config: QualityConfig): DropReason | null {
  const bicycleAccess = getAccess(tags, "bicycle", config);
  if (bicycleAccess && !config.allowedBicycleAccess.includes(bicycleAccess)) {
    return "no bicycle access";
  }
  if (tag(tags, "highway") === "path" && tag(tags, "informal") === "yes" && tag(tags, "bicycle") === undefined) {
    return "informal path";
  }
  return null;
}

/** Physical separation from motor traffic routes to a track (kerb, tree row) or a protected lane */
function trackOrProtectedLane(tags: TagRecord, config: QualityConfig): WayType | null {
  const separation = deriveSeparation(tags, "motor_vehicle", config);
  if (!isSeparated(separation)) return null;
  return separation.includes("kerb") || separation.includes("tree_row") ? "cycle track" : "cycle lane (protected)";
}

function sharedTrafficType(tags: TagRecord): WayType {
  const highway = tag(tags, "highway");
  if (tag(tags, "lane_markings") === "yes" || (highway !== undefined && MAJOR_HIGHWAYS.has(highway))) {
    return "shared traffic lane";
  }
  return "shared road";
}

function classifyCycleway(tags: TagRecord, annotations: SegmentAnnotations, config: QualityConfig): WayType {
  if (anyTagIn(tags, ["foot"], ACCESS_GRANTED)) return "shared path";
  if (deriveSeparation(tags, "foot", config) === "no") return "segregated path";

  const isSidepath = tag(tags, "is_sidepath");
  if (isSidepath !== "yes" && isSidepath !== "no") {
    return annotations.sidepath === "yes" ? "cycle track" : "cycle path";
  }
  if (isSidepath === "yes") {
    return trackOrProtectedLane(tags, config) ?? "cycle track";
  }
  return "cycle path";
}

/** Offset sub-geometry of a road: inspect the side's cycleway / sidewalk tags */
function classifySubSegment(tags: TagRecord, annotations: SegmentAnnotations, config: QualityConfig): WayType {
  const side = annotations.side;
  if (annotations.type === "sidewalk") return "shared footway";

  const cyclewayKeys = sideKeys("cycleway", side);

  if (anyTagIn(tags, cyclewayKeys, ["lane"])) {
    if (tag(tags, "cycleway:lanes")?.includes("no|lane|no")) return "cycle lane (central)";
    if (isSeparated(deriveSeparation(tags, "motor_vehicle", config))) return "cycle lane (protected)";
    if (anyTagIn(tags, sideKeys("cycleway", side, "lane"), ["exclusive"])) return "cycle lane (exclusive)";
    return "cycle lane (advisory)";
  }

  if (anyTagIn(tags, cyclewayKeys, ["track"])) {
    if (anyTagIn(tags, sideKeys("cycleway", side, "foot"), ACCESS_GRANTED)) return "shared path";
    const segregatedKeys = sideKeys("cycleway", side, "segregated");
    if (anyTagIn(tags, segregatedKeys, ["yes"])) return "segregated path";
    if (anyTagIn(tags, segregatedKeys, ["no"])) return "shared path";
    if (deriveSeparation(tags, "foot", config) === "no") return "segregated path";
    return trackOrProtectedLane(tags, config) ?? "cycle track";
  }

  if (anyTagIn(tags, cyclewayKeys, ["share_busway"])) return "shared bus lane";
  if (anyTagIn(tags, sideKeys("sidewalk", side, "bicycle"), ["yes"])) return "shared footway";

  return sharedTrafficType(tags);
}

/**
 * Classify a segment into a way type, or drop it.
 *
 * @param tags - Raw tags of the segment
 * @param annotations - Sidepath and sub-geometry annotations
 * @param config - ConfigTables
 */
export function classifyWayType(
  tags: TagRecord,
  annotations: SegmentAnnotations,
  config: QualityConfig,
): Classification {
  const deletion = checkDeletion(tags, config);
  if (deletion) return { dropped: true, reason: deletion };

  const wayType = (type: WayType): Classification => ({ dropped: false, wayType: type });
  const highway = tag(tags, "highway");

  if (tag(tags, "bicycle_road") === "yes" && !annotations.side) return wayType("bicycle road");
  if (anyTagIn(tags, CONNECTOR_ATTRIBUTES, ["link"])) return wayType("link");
  if (anyTagIn(tags, CONNECTOR_ATTRIBUTES, ["crossing"])) return wayType("crossing");

  if (highway !== undefined && SHARED_FOOTWAY_HIGHWAYS.has(highway)) {
    if (anyTagIn(tags, ["bicycle"], ACCESS_GRANTED)) return wayType("shared footway");
    return { dropped: true, reason: "footway without bicycle access" };
  }

  if (highway === "path") {
    if (tag(tags, "foot") === "designated" && tag(tags, "bicycle") !== "designated") {
      return wayType("shared footway");
    }
    return wayType(tag(tags, "segregated") === "yes" ? "segregated path" : "shared path");
  }

  if (highway === "cycleway") return wayType(classifyCycleway(tags, annotations, config));
  if (highway === "service" || highway === "track") return wayType("track or service");

  if (!annotations.side) return wayType(sharedTrafficType(tags));
  return wayType(classifySubSegment(tags, annotations, config));
}

/** Coarse way type category for filtering */
export function filterCategory(wayType: WayType): WayTypeFilter {
  switch (wayType) {
    case "cycle path":
    case "cycle track":
    case "shared path":
    case "segregated path":
    case "shared footway":
    case "cycle lane (protected)":
      return "separated";
    case "cycle lane (advisory)":
    case "cycle lane (exclusive)":
    case "cycle lane (central)":
    case "link":
    case "crossing":
      return "cycle lanes";
    case "bicycle road":
      return "bicycle road";
    case "shared road":
    case "shared traffic lane":
    case "shared bus lane":
    case "track or service":
      return "shared traffic";
  }
}
