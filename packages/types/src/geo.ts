/**
 * Geographic types for the GeoJSON boundary.
 */

/** [lng, lat] position as GeoJSON orders it */
export type Position = [number, number];

export interface LineStringGeometry {
  type: "LineString";
  coordinates: Position[];
}

/** A segment feature as read from or written to GeoJSON */
export interface SegmentFeature<P = Record<string, unknown>> {
  type: "Feature";
  id?: string | number;
  geometry: LineStringGeometry;
  properties: P;
}

export interface SegmentFeatureCollection<P = Record<string, unknown>> {
  type: "FeatureCollection";
  features: SegmentFeature<P>[];
}
