/**
 * Compose the quality index from its factors.
 *
 *   index = base_index × fac_1 × fac_2 × fac_3 × fac_4
 *
 * - fac_1: width and surface, weighted so that poor values dominate
 * - fac_2: highway class and speed limit of the adjacent road
 * - fac_3: protection level (1 unless enabled)
 * - fac_4: miscellaneous bonus and malus attributes
 */

import type { Factors, MissingMarker, ProcessedAttributes, ProtectionLevel } from "@cqi/types";
import { isCycleLane } from "@cqi/types";
import { clamp, roundHalfEven, roundTo } from "../math.js";
import type { Notes } from "../quality/index.js";
import { mergeNotes } from "../quality/index.js";
import type { ResolverContext, TrafficContext } from "../resolvers/index.js";
import { anyTagIn, tag } from "../tags/index.js";
import type { Scored } from "./factors.js";
import {
  baseIndex,
  highwayFactor,
  maxspeedFactor,
  restrictedMotorAccess,
  surfaceFactor,
  widthFactor,
} from "./factors.js";
import { computeProtectionFactor } from "./protection-level.js";

export type IndexFactors = Omit<Factors, "stress_level">;

export interface Score {
  factors: IndexFactors;
  protection: ProtectionLevel | null;
  /** Motor vehicle access value that overrode the base index */
  restrictedAccess: string | null;
  notes: Notes;
}

const UNCOLOURED = ["no", "none", "grey", "gray", "black"];

/** Weighted mean of width and surface; values below 1 pull harder */
export function widthSurfaceFactor(width: number | null, surface: number | null): number {
  if (width !== null && surface !== null) {
    const weightWidth = Math.max(1 - width, 0) + 0.5;
    const weightSurface = Math.max(1 - surface, 0) + 0.5;
    return (weightWidth * width + weightSurface * surface) / (weightWidth + weightSurface);
  }
  return width ?? surface ?? 1;
}

/** Adjacent road factor, weighted by how close cyclists ride to motor traffic */
export function trafficFactor(
  ctx: ResolverContext,
  highway: number,
  maxspeed: number,
): Scored<number> {
  const { wayType, annotations, config } = ctx;
  let weight = config.highwayFactorWeights[wayType] ?? 1;
  if (
    (wayType === "shared path" || wayType === "segregated path" || wayType === "shared footway") &&
    annotations.sidepath !== "yes"
  ) {
    weight = 0;
  }

  const combined = highway * maxspeed;
  // a zero road factor counts as neutral
  const value = combined + (1 - combined) * (1 - weight) || 1;

  const bonus: string[] = [];
  const malus: string[] = [];
  if (weight >= 0.5) {
    if (value > 1) bonus.push("slow traffic");
    if (highway <= 0.7) malus.push("along a major road");
    if (maxspeed <= 0.7) malus.push("along a road with high speed limits");
  }
  return { value, notes: { bonus, malus } };
}

function dooringMalus(attributes: ProcessedAttributes): number | null {
  const left = attributes.proc_traffic_mode_left === "parking" ? attributes.proc_buffer_left : null;
  const right = attributes.proc_traffic_mode_right === "parking" ? attributes.proc_buffer_right : null;
  const tooClose = (buffer: number | null): boolean => buffer !== null && buffer > 0 && buffer < 1;
  if (!tooClose(left) && !tooClose(right)) return null;

  const bufferLeft = attributes.proc_buffer_left ?? 0;
  const bufferRight = attributes.proc_buffer_right ?? 0;
  if (attributes.proc_traffic_mode_left === "parking" && attributes.proc_traffic_mode_right === "parking") {
    return Math.abs((bufferLeft + bufferRight) / 2 - 1) / 5;
  }
  if (attributes.proc_traffic_mode_right === "parking") return Math.abs(bufferRight - 1) / 5;
  return Math.abs(bufferLeft - 1) / 5;
}

/** Miscellaneous attributes, starting from 1 */
export function miscFactor(ctx: ResolverContext, attributes: ProcessedAttributes): Scored<number> {
  const { tags, wayType, annotations } = ctx;
  const sidepath = annotations.sidepath === "yes";
  let factor = 1;
  const missing: MissingMarker[] = [];
  const bonus: string[] = [];
  const malus: string[] = [];

  if (
    (wayType === "shared road" || wayType === "shared traffic lane") &&
    anyTagIn(tags, ["cycleway", "cycleway:both", "cycleway:left", "cycleway:right"], ["shared_lane"])
  ) {
    factor += 0.1;
    bonus.push("shared lane markings");
  }

  if (
    isCycleLane(wayType) ||
    wayType === "crossing" ||
    wayType === "shared bus lane" ||
    wayType === "link" ||
    wayType === "bicycle road" ||
    ((wayType === "shared path" || wayType === "segregated path") && sidepath)
  ) {
    const colour = tag(tags, "surface:colour");
    if (colour !== undefined && !UNCOLOURED.includes(colour)) {
      factor += wayType === "crossing" ? 0.15 : 0.05;
      bonus.push("surface colour");
    }
  }

  if (wayType === "crossing") {
    const crossing = tag(tags, "crossing");
    const markings = tag(tags, "crossing:markings");
    if (!crossing) missing.push("crossing");
    if (!markings) missing.push("crossing_markings");
    if (crossing === "traffic_signals") {
      factor += 0.2;
      bonus.push("signalled crossing");
    } else if (crossing === "marked" || crossing === "zebra" || (markings !== undefined && markings !== "no")) {
      factor += 0.1;
      bonus.push("marked crossing");
    }
  }

  const lit = tag(tags, "lit");
  if (!lit) missing.push("lit");
  if (lit === "no") {
    factor -= 0.1;
    malus.push("no street lighting");
  }

  if (
    isCycleLane(wayType) ||
    ((wayType === "cycle track" || wayType === "shared path" || wayType === "segregated path") && sidepath)
  ) {
    const dooring = dooringMalus(attributes);
    if (dooring !== null) {
      factor -= dooring;
      malus.push("insufficient dooring buffer");
    }
  }

  if (tag(tags, "bicycle") === "permissive") {
    factor -= 0.2;
    malus.push("cycling not intended");
  }

  return { value: factor, notes: { missing, bonus, malus } };
}

/**
 * Compute every factor and the final index.
 * Without a base index for the way type, no index is produced.
 */
export function scoreSegment(
  ctx: ResolverContext,
  attributes: ProcessedAttributes,
  traffic: TrafficContext,
): Score {
  const { tags, wayType, config } = ctx;
  const restrictedAccess = restrictedMotorAccess(tags, wayType, config);

  const base = baseIndex(wayType, restrictedAccess, config);
  const width = widthFactor(wayType, attributes.proc_width, attributes.proc_oneway, tags, restrictedAccess, config);
  const surface = surfaceFactor(attributes.proc_surface, attributes.proc_smoothness, config);
  const facHighway = highwayFactor(attributes.proc_highway, config);
  const maxspeed = maxspeedFactor(
    attributes.proc_maxspeed,
    wayType,
    attributes.proc_sidepath,
    attributes.proc_highway,
    config,
  );
  const protection = computeProtectionFactor(attributes.proc_sidepath, traffic, config);

  const factors: IndexFactors = {
    base_index: base.value,
    fac_width: width.value,
    fac_surface: surface.value,
    fac_highway: facHighway,
    fac_maxspeed: maxspeed.value,
    fac_protection_level: config.enableProtectionFactor ? (protection?.fac_protection_level ?? null) : null,
    fac_1: null,
    fac_2: null,
    fac_3: null,
    fac_4: null,
    index: null,
    index_10: null,
  };
  const partial = [base.notes, width.notes, surface.notes, maxspeed.notes];

  if (base.value === null) {
    return { factors, protection, restrictedAccess, notes: mergeNotes(...partial) };
  }

  const fac1 = widthSurfaceFactor(width.value, surface.value);
  const fac2 = trafficFactor(ctx, facHighway, maxspeed.value);
  const fac3 = factors.fac_protection_level ?? 1;
  const fac4 = miscFactor(ctx, attributes);

  const index = roundHalfEven(clamp(base.value * fac1 * fac2.value * fac3 * fac4.value, 0, 100));

  return {
    factors: {
      ...factors,
      fac_1: roundTo(fac1, 2),
      fac_2: roundTo(fac2.value, 2),
      fac_3: roundTo(fac3, 2),
      fac_4: roundTo(fac4.value, 2),
      index,
      index_10: Math.floor(index / 10),
    },
    protection,
    restrictedAccess,
    notes: mergeNotes(...partial, fac2.notes, fac4.notes),
  };
}
