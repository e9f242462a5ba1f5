import type { MissingMarker, Resolved } from "@cqi/types";
import { isCycleLane } from "@cqi/types";
import { splitDelimited, tag, weakestValue } from "../tags/index.js";
import type { ResolverContext } from "./context.js";

/** Resolve a tagged value against a factor table; lists resolve to their weakest entry */
function known(value: string | undefined, factors: Readonly<Record<string, number>>): string | undefined {
  if (!value) return undefined;
  if (factors[value] !== undefined) return value;
  if (value.includes(";")) return weakestValue(splitDelimited(value), factors);
  return undefined;
}

function defaultSurface({ tags, wayType, config }: ResolverContext): string | undefined {
  const { surfaces } = config;
  if (isCycleLane(wayType)) return surfaces.cycleLane;
  if (wayType === "cycle track") return surfaces.cycleTrack;
  if (wayType === "track or service") {
    const tracktype = tag(tags, "tracktype");
    return (tracktype !== undefined ? surfaces.trackType[tracktype] : undefined) ?? surfaces.trackType["grade3"];
  }
  return highwaySurface(tag(tags, "highway"), surfaces.highway);
}

function highwaySurface(highway: string | undefined, table: Readonly<Record<string, string>>): string | undefined {
  return (highway !== undefined ? table[highway] : undefined) ?? table["path"];
}

/**
 * Surface material of the riding area.
 *
 * `surface:bicycle` wins when recognised. Otherwise the way's own surface
 * is used, falling back to a default for the way type (raising a
 * `surface` marker). Values not in the factor table resolve to null.
 */
export function resolveSurface(ctx: ResolverContext): Resolved<string | null> {
  const { tags, wayType, config } = ctx;
  const factors = config.surfaceFactors;

  const bicycle = known(tag(tags, "surface:bicycle"), factors);
  if (bicycle) return { value: bicycle, missing: [] };

  const missing: MissingMarker[] = [];
  let surface: string | undefined;
  if (wayType === "segregated path") {
    surface =
      tag(tags, "cycleway:surface") ?? tag(tags, "surface") ?? highwaySurface(tag(tags, "highway"), config.surfaces.highway);
    if (!tag(tags, "cycleway:surface")) missing.push("surface");
  } else {
    surface = tag(tags, "surface");
    if (!surface) {
      surface = defaultSurface(ctx);
      missing.push("surface");
    }
  }

  const value = known(surface, factors);
  if (!value && !missing.includes("surface")) missing.push("surface");
  return { value: value ?? null, missing };
}

/** Smoothness of the riding area; there is no default, only a marker */
export function resolveSmoothness(ctx: ResolverContext): Resolved<string | null> {
  const { tags, wayType, config } = ctx;
  const factors = config.smoothnessFactors;

  const bicycle = known(tag(tags, "smoothness:bicycle"), factors);
  if (bicycle) return { value: bicycle, missing: [] };

  const smoothness =
    wayType === "segregated path"
      ? (tag(tags, "cycleway:smoothness") ?? tag(tags, "smoothness"))
      : tag(tags, "smoothness");

  const value = known(smoothness, factors);
  return { value: value ?? null, missing: value ? [] : ["smoothness"] };
}
