/**
 * @cqi/types
 *
 * Shared domain types for the cycling quality engine.
 *
 * - Tags: raw segment attributes and geometry-stage annotations
 * - WayType: classification of how cycling relates to a segment
 * - Assessment: processed attributes, factors, index and data quality
 * - Geo: GeoJSON line features at the I/O boundary
 */

export * from "./tags.js";
export * from "./way-type.js";
export * from "./assessment.js";
export * from "./geo.js";
