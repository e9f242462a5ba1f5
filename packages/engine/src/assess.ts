/**
 * Per-segment assessment pipeline.
 *
 * classify → resolve attributes → score → stress → data quality
 *
 * Every step is a pure function of one segment and the configuration,
 * so segments can be assessed in any order or in parallel.
 */

import type {
  AssessmentResult,
  DroppedSegment,
  ProcessedAttributes,
  SegmentAssessment,
  SegmentInput,
} from "@cqi/types";
import { isDropped } from "@cqi/types";
import { classifyWayType, filterCategory } from "./classification/index.js";
import type { QualityConfig } from "./config/index.js";
import { mergeNotes, summarizeQuality } from "./quality/index.js";
import type { ResolverContext } from "./resolvers/index.js";
import {
  isUsable,
  resolveMandatoryUse,
  resolveOneway,
  resolveSmoothness,
  resolveSurface,
  resolveTrafficContext,
  resolveWidth,
} from "./resolvers/index.js";
import { scoreSegment } from "./scoring/index.js";
import { expandSegment } from "./split/index.js";
import { stressLevel } from "./stress/index.js";

export function assessSegment(segment: SegmentInput, config: QualityConfig): AssessmentResult {
  const { id, tags, annotations } = segment;

  const classification = classifyWayType(tags, annotations, config);
  if (classification.dropped) return { id, dropped: true, reason: classification.reason };

  const { wayType } = classification;
  const ctx: ResolverContext = { tags, annotations, wayType, config };

  const oneway = resolveOneway(ctx);
  const width = resolveWidth(ctx, oneway.value);
  const surface = resolveSurface(ctx);
  const smoothness = resolveSmoothness(ctx);
  const traffic = resolveTrafficContext(ctx);
  const mandatory = resolveMandatoryUse(ctx, oneway.value);

  const attributes: ProcessedAttributes = {
    proc_oneway: oneway.value,
    proc_width: width.value,
    proc_surface: surface.value,
    proc_smoothness: smoothness.value,
    proc_sidepath: annotations.sidepath,
    proc_highway: annotations.highway,
    proc_maxspeed: annotations.maxspeed,
    proc_traffic_mode_left: traffic.mode.left,
    proc_traffic_mode_right: traffic.mode.right,
    proc_separation_left: traffic.separation.left,
    proc_separation_right: traffic.separation.right,
    proc_buffer_left: traffic.buffer.left,
    proc_buffer_right: traffic.buffer.right,
    proc_mandatory: mandatory.mandatory,
    proc_traffic_sign: mandatory.trafficSign,
    filter_usable: isUsable(mandatory.mandatory),
    filter_way_type: filterCategory(wayType),
  };

  const score = scoreSegment(ctx, attributes, traffic);
  const notes = mergeNotes(
    { missing: [...oneway.missing, ...width.missing, ...surface.missing, ...smoothness.missing] },
    score.notes,
  );

  const assessment: SegmentAssessment = {
    id,
    way_type: wayType,
    annotations,
    attributes,
    factors: {
      ...score.factors,
      stress_level: stressLevel(wayType, attributes, tags, score.restrictedAccess),
    },
    protection: score.protection,
    quality: summarizeQuality(notes, config),
  };
  return assessment;
}

export interface BatchResult {
  assessments: SegmentAssessment[];
  dropped: DroppedSegment[];
}

export interface AssessOptions {
  /** Derive cycleway and sidewalk sub-segments from road centerlines */
  split?: boolean;
}

/** Assess a batch, separating surviving segments from dropped ones */
export function assessSegments(
  segments: readonly SegmentInput[],
  config: QualityConfig,
  options: AssessOptions = {},
): BatchResult {
  const inputs = options.split ? segments.flatMap((s) => expandSegment(s, config)) : segments;
  const result: BatchResult = { assessments: [], dropped: [] };
  for (const segment of inputs) {
    const assessed = assessSegment(segment, config);
    if (isDropped(assessed)) result.dropped.push(assessed);
    else result.assessments.push(assessed);
  }
  return result;
}

/**
 * Assess segments under one configuration.
 *
 * Holds no state besides the frozen configuration, so a single instance
 * can serve concurrent callers.
 */
export class QualityEngine {
  constructor(readonly config: QualityConfig) {}

  assess(segment: SegmentInput): AssessmentResult {
    return assessSegment(segment, this.config);
  }

  assessAll(segments: readonly SegmentInput[], options: AssessOptions = {}): BatchResult {
    return assessSegments(segments, this.config, options);
  }
}
