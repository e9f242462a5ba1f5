/**
 * Way types: how cycling traffic relates to a segment.
 */

export const WAY_TYPES = [
  "bicycle road",
  "link",
  "crossing",
  "shared footway",
  "segregated path",
  "shared path",
  "cycle path",
  "cycle track",
  "cycle lane (advisory)",
  "cycle lane (exclusive)",
  "cycle lane (protected)",
  "cycle lane (central)",
  "track or service",
  "shared traffic lane",
  "shared road",
  "shared bus lane",
] as const;

export type WayType = (typeof WAY_TYPES)[number];

export type CycleLaneWayType = Extract<WayType, `cycle lane (${string})`>;

/** Coarse category used for filtering output */
export type WayTypeFilter = "separated" | "cycle lanes" | "bicycle road" | "shared traffic";

/** Infrastructure dedicated to (or shared with pedestrians by) cyclists */
export const CYCLEWAY_WAY_TYPES: readonly WayType[] = [
  "cycle path",
  "cycle track",
  "shared path",
  "segregated path",
  "shared footway",
  "crossing",
  "link",
  "cycle lane (advisory)",
  "cycle lane (exclusive)",
  "cycle lane (protected)",
  "cycle lane (central)",
];

/** Mixed traffic with motor vehicles */
export const SHARED_WAY_TYPES: readonly WayType[] = [
  "bicycle road",
  "shared road",
  "shared traffic lane",
  "shared bus lane",
  "track or service",
];

/** Shared types where restricted motor vehicle access changes the base index */
export const ACCESS_RESTRICTABLE_WAY_TYPES: readonly WayType[] = [
  "bicycle road",
  "shared road",
  "shared traffic lane",
  "track or service",
];

export function isWayType(value: unknown): value is WayType {
  return WAY_TYPES.some((wayType) => wayType === value);
}

export function isCycleLane(wayType: WayType): wayType is CycleLaneWayType {
  return wayType.startsWith("cycle lane");
}
