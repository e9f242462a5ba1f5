/**
 * Sidepath resolution.
 *
 * Decides whether a path runs alongside a road and, if so, which road
 * class and speed limit it inherits. The adjacency tallies come from
 * spatial sampling done outside the engine.
 */

import type { SegmentAnnotations, SidepathEvidence, TagRecord, YesNo } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";
import { parseMaxspeed, tag } from "../tags/index.js";

/** Highway classes that are paths in their own right */
export const PATH_HIGHWAYS: readonly string[] = ["cycleway", "footway", "path", "bridleway", "steps"];

/** Share of sample points that must agree on one neighbour */
const SIDEPATH_THRESHOLD = 2 / 3;

const EVIDENCE_KEYS = ["id", "highway", "name"] as const;

function total(counts: Record<string, number>): number {
  return Object.values(counts).reduce((sum, n) => sum + n, 0);
}

/** Keys with the highest count, in insertion order */
function mostFrequent(counts: Record<string, number>): string[] {
  const entries = Object.entries(counts);
  if (entries.length === 0) return [];
  const max = Math.max(...entries.map(([, n]) => n));
  return entries.filter(([, n]) => n === max).map(([key]) => key);
}

/**
 * Vote over the adjacency tallies: a path is a sidepath if at least two
 * thirds of its sample points hit the same road id, class or name.
 */
export function isSidepathByEvidence(evidence: SidepathEvidence): YesNo {
  if (evidence.checks <= 0) return "no";
  const agrees = EVIDENCE_KEYS.some((key) => total(evidence[key]) >= SIDEPATH_THRESHOLD * evidence.checks);
  return agrees ? "yes" : "no";
}

/** Sidepath status from explicit tags, falling back to the evidence vote */
export function sidepathStatus(tags: TagRecord, evidence: SidepathEvidence | undefined): YesNo | null {
  if (tag(tags, "footway") === "sidewalk") return "yes";
  const explicit = tag(tags, "is_sidepath");
  if (explicit === "yes" || explicit === "no") return explicit;
  return evidence ? isSidepathByEvidence(evidence) : null;
}

/**
 * Most frequently adjacent highway class; ties go to the higher-ranked class.
 * Unranked classes fall back to the lowest-ranked one.
 */
export function parentHighway(evidence: SidepathEvidence, config: QualityConfig): string | null {
  const ranking = config.highwayClassRanking;
  const candidates = mostFrequent(evidence.highway);
  if (candidates.length === 0) return null;

  let bestRank = ranking.length - 1;
  for (const highway of candidates) {
    const rank = ranking.indexOf(highway);
    if (rank !== -1 && rank < bestRank) bestRank = rank;
  }
  return ranking[bestRank] ?? null;
}

/**
 * Annotations for a standalone segment.
 *
 * Roads carry their own class and speed limit. Paths get both from the
 * road they accompany, when they are sidepaths.
 */
export function resolveAnnotations(
  tags: TagRecord,
  evidence: SidepathEvidence | undefined,
  config: QualityConfig,
): SegmentAnnotations {
  const highway = tag(tags, "highway");
  const annotations: SegmentAnnotations = {
    sidepath: null,
    highway: null,
    maxspeed: null,
    name: tag(tags, "name") ?? null,
    side: null,
    type: null,
  };

  if (highway === undefined || !PATH_HIGHWAYS.includes(highway)) {
    return { ...annotations, highway: highway ?? null, maxspeed: parseMaxspeed(tags) ?? null };
  }

  const sidepath = sidepathStatus(tags, evidence);
  if (sidepath !== "yes") return { ...annotations, sidepath };

  const parent = tag(tags, "is_sidepath:of") ?? (evidence ? parentHighway(evidence, config) : null);
  const maxspeed = parent !== null && evidence ? evidence.maxspeed[parent] : undefined;
  const name = evidence ? mostFrequent(evidence.name)[0] : undefined;

  return {
    ...annotations,
    sidepath,
    highway: parent,
    maxspeed: maxspeed || null,
    name: name ?? annotations.name ?? null,
  };
}
