/**
 * GeoJSON boundary: LineString features in, assessed features out.
 *
 * Input features carry raw tags as properties. Annotations may be given
 * as `proc_*` / `side` / `type` / `offset` properties, or derived from a
 * `sidepath_evidence` tally; whatever is missing is resolved from the
 * tags. Features without an id or a LineString geometry are rejected.
 */

import { z } from "zod";
import type {
  DroppedSegment,
  LineStringGeometry,
  Position,
  SegmentAnnotations,
  SegmentAssessment,
  SegmentFeature,
  SegmentFeatureCollection,
  SegmentInput,
  TagRecord,
  TagValue,
} from "@cqi/types";
import { isDropped } from "@cqi/types";
import { assessSegment } from "../assess.js";
import type { AssessOptions } from "../assess.js";
import type { QualityConfig } from "../config/index.js";
import { InputValidationError } from "../errors.js";
import { joinTagList, missingFlags } from "../quality/index.js";
import { resolveAnnotations } from "../sidepath/index.js";
import { expandSegment } from "../split/index.js";
import { parseNumber } from "../tags/index.js";

export type FeatureProperties = Record<string, string | number | null>;

/** A validated input feature */
export interface ParsedFeature {
  segment: SegmentInput;
  geometry: LineStringGeometry;
}

export interface AssessedCollection {
  collection: SegmentFeatureCollection<FeatureProperties>;
  dropped: DroppedSegment[];
}

// ---------------------------------------------------------------------------
// Input schemas
// ---------------------------------------------------------------------------

const positionSchema = z
  .array(z.number())
  .min(2)
  .transform((coords): Position => [coords[0] ?? 0, coords[1] ?? 0]);

const lineStringSchema = z.object({
  type: z.literal("LineString"),
  coordinates: z.array(positionSchema).min(2, "a LineString needs at least two positions"),
});

const countsSchema = z.record(z.string(), z.number());

export const sidepathEvidenceSchema = z.object({
  checks: z.number().nonnegative(),
  id: countsSchema.default({}),
  highway: countsSchema.default({}),
  name: countsSchema.default({}),
  maxspeed: countsSchema.default({}),
});

const featureSchema = z.object({
  type: z.literal("Feature"),
  id: z.union([z.string(), z.number()]).optional(),
  geometry: lineStringSchema,
  properties: z.record(z.string(), z.unknown()).nullable(),
});

const collectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(z.unknown()),
});

/** Properties read as annotations rather than tags */
const ANNOTATION_PROPERTIES = new Set([
  "proc_sidepath",
  "proc_highway",
  "proc_maxspeed",
  "side",
  "type",
  "offset",
  "sidepath_evidence",
]);

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function toTagValue(value: unknown): TagValue {
  if (typeof value === "string" || typeof value === "number") return value;
  if (typeof value === "boolean") return value ? "yes" : "no";
  return null;
}

function tagsFromProperties(properties: Record<string, unknown>): TagRecord {
  const tags: Record<string, TagValue> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (ANNOTATION_PROPERTIES.has(key)) continue;
    tags[key] = toTagValue(value);
  }
  return tags;
}

function stringProperty(properties: Record<string, unknown>, key: string): string | undefined {
  const value = properties[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function annotationsFromProperties(
  properties: Record<string, unknown>,
  tags: TagRecord,
  evidence: z.output<typeof sidepathEvidenceSchema> | undefined,
  config: QualityConfig,
): SegmentAnnotations {
  const annotations = resolveAnnotations(tags, evidence, config);

  const sidepath = stringProperty(properties, "proc_sidepath");
  if (sidepath === "yes" || sidepath === "no") annotations.sidepath = sidepath;
  const highway = stringProperty(properties, "proc_highway");
  if (highway) annotations.highway = highway;
  const maxspeed = parseNumber(toTagValue(properties["proc_maxspeed"]));
  if (maxspeed) annotations.maxspeed = maxspeed;

  const side = stringProperty(properties, "side");
  if (side === "left" || side === "right") annotations.side = side;
  const type = stringProperty(properties, "type");
  if (type === "cycleway" || type === "sidewalk") annotations.type = type;
  const offset = parseNumber(toTagValue(properties["offset"]));
  if (offset !== undefined) annotations.offset = offset;

  return annotations;
}

function formatIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `.${issue.path.join(".")}` : "";
    return `${prefix}${path}: ${issue.message}`;
  });
}

/**
 * Validate a FeatureCollection and turn its features into segments.
 *
 * @throws InputValidationError listing every offending feature
 */
export function parseFeatureCollection(input: unknown, config: QualityConfig): ParsedFeature[] {
  const collection = collectionSchema.safeParse(input);
  if (!collection.success) {
    throw new InputValidationError("Expected a GeoJSON FeatureCollection", formatIssues("collection", collection.error));
  }

  const issues: string[] = [];
  const parsed: ParsedFeature[] = [];
  let invalid = 0;

  collection.data.features.forEach((raw, index) => {
    const prefix = `features[${index}]`;
    const feature = featureSchema.safeParse(raw);
    if (!feature.success) {
      invalid++;
      issues.push(...formatIssues(prefix, feature.error));
      return;
    }

    const properties = feature.data.properties ?? {};
    const id = toTagValue(properties["id"]) ?? feature.data.id;
    if (id === undefined || id === null || id === "") {
      invalid++;
      issues.push(`${prefix}: missing id (properties.id or feature id)`);
      return;
    }

    let evidence: z.output<typeof sidepathEvidenceSchema> | undefined;
    if (properties["sidepath_evidence"] !== undefined) {
      const result = sidepathEvidenceSchema.safeParse(properties["sidepath_evidence"]);
      if (!result.success) {
        invalid++;
        issues.push(...formatIssues(`${prefix}.properties.sidepath_evidence`, result.error));
        return;
      }
      evidence = result.data;
    }

    const tags = tagsFromProperties(properties);
    parsed.push({
      segment: { id: String(id), tags, annotations: annotationsFromProperties(properties, tags, evidence, config) },
      geometry: feature.data.geometry,
    });
  });

  if (invalid > 0) {
    throw new InputValidationError(`${invalid} invalid feature(s)`, issues);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

/** Flat output properties of one assessment, tag lists joined with `;` */
export function toFeatureProperties(assessment: SegmentAssessment): FeatureProperties {
  const { annotations, attributes, factors, protection, quality } = assessment;
  return {
    id: assessment.id,
    name: annotations.name ?? null,
    way_type: assessment.way_type,
    side: annotations.side,
    type: annotations.type,
    offset: annotations.offset ?? null,
    ...attributes,
    ...factors,
    ...(protection ?? {}),
    data_missing: joinTagList(quality.data_missing),
    data_bonus: joinTagList(quality.data_bonus),
    data_malus: joinTagList(quality.data_malus),
    data_incompleteness: quality.data_incompleteness,
    ...missingFlags(quality.data_missing),
  };
}

/**
 * Assess every feature of a collection.
 * Derived sub-segments reuse the centerline geometry and carry their offset.
 */
export function assessFeatureCollection(
  input: unknown,
  config: QualityConfig,
  options: AssessOptions = {},
): AssessedCollection {
  const features: SegmentFeature<FeatureProperties>[] = [];
  const dropped: DroppedSegment[] = [];

  for (const { segment, geometry } of parseFeatureCollection(input, config)) {
    const segments = options.split ? expandSegment(segment, config) : [segment];
    for (const part of segments) {
      const result = assessSegment(part, config);
      if (isDropped(result)) {
        dropped.push(result);
        continue;
      }
      features.push({ type: "Feature", id: result.id, geometry, properties: toFeatureProperties(result) });
    }
  }

  return { collection: { type: "FeatureCollection", features }, dropped };
}
