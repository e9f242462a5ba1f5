/**
 * Raw segment attributes.
 *
 * A segment arrives as a flat map of OSM-style tags plus annotations
 * produced by the geometry stage (sidepath detection, line splitting).
 */

/** Raw tag value: strings mostly, numbers when the source format typed them */
export type TagValue = string | number | null | undefined;

/** Immutable key/value tag map for one segment */
export type TagRecord = Readonly<Record<string, TagValue>>;

export type Side = "left" | "right";

/** Kind of offset sub-geometry split from a road centerline */
export type SubSegmentType = "cycleway" | "sidewalk";

export type YesNo = "yes" | "no";

/**
 * Annotations supplied by the excluded geometry stage.
 *
 * A centerline or standalone path has `side` and `type` null; an offset
 * sub-segment carries both.
 */
export interface SegmentAnnotations {
  /** Derived sidepath status (null when it could not be determined) */
  sidepath: YesNo | null;
  /** Highway class the segment belongs to or runs alongside */
  highway: string | null;
  /** Speed limit of that highway in km/h */
  maxspeed: number | null;
  /** Name inherited from the adjacent road */
  name?: string | null;
  side: Side | null;
  type: SubSegmentType | null;
  /** Offset distance of a sub-segment from its centerline (meters) */
  offset?: number | null;
}

/** One unit of work for the engine */
export interface SegmentInput {
  id: string;
  tags: TagRecord;
  annotations: SegmentAnnotations;
}

/**
 * Adjacency tallies gathered by spatial sampling along a path.
 *
 * `checks` is the number of sample points; each map counts how often a
 * neighbouring road id / highway class / name was hit.
 */
export interface SidepathEvidence {
  checks: number;
  id: Record<string, number>;
  highway: Record<string, number>;
  name: Record<string, number>;
  /** Highest maxspeed seen per adjacent highway class */
  maxspeed: Record<string, number>;
}
