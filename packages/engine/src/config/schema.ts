/**
 * ConfigTables: lookup tables and thresholds for the quality engine.
 *
 * Documents live under `configs/quality/` and are validated on load;
 * nothing downstream ever sees an unvalidated table.
 */

import { z } from "zod";
import { ONEWAY_VALUES } from "@cqi/types";

const numberTable = z.record(z.string(), z.number());
const stringTable = z.record(z.string(), z.string());

export const qualityConfigSchema = z.object({
  name: z.string(),
  version: z.string(),
  /** Right-hand traffic: motor traffic runs to the left of a sidepath */
  rightHandTraffic: z.boolean(),
  /** Switches the separation/buffer protection factor (fac_3) on */
  enableProtectionFactor: z.boolean(),
  /** "realistic" derives offsets from road width; a number is a fixed distance */
  offsetDistance: z.union([z.literal("realistic"), z.number().nonnegative()]),
  widths: z.object({
    highway: numberTable,
    highwayFallback: z.number().positive(),
    trafficLane: z.number().positive(),
    busLane: z.number().positive(),
    cycleLane: z.number().positive(),
    parking: z.object({
      parallel: z.number().nonnegative(),
      diagonal: z.number().nonnegative(),
      perpendicular: z.number().nonnegative(),
    }),
  }),
  oneway: z.object({
    cycleTrack: z.enum(ONEWAY_VALUES),
    cycleLane: z.enum(ONEWAY_VALUES),
  }),
  surfaces: z.object({
    cycleLane: z.string(),
    cycleTrack: z.string(),
    highway: stringTable.refine((t) => t["path"] !== undefined, "highway surfaces need a 'path' entry"),
    trackType: stringTable.refine((t) => t["grade3"] !== undefined, "track surfaces need a 'grade3' entry"),
  }),
  surfaceFactors: numberTable,
  smoothnessFactors: numberTable,
  highwayFactors: numberTable,
  highwayFactorWeights: numberTable,
  maxspeedFactors: z
    .array(z.object({ minSpeed: z.number().nonnegative(), factor: z.number() }))
    .transform((steps) => [...steps].sort((a, b) => a.minSpeed - b.minSpeed)),
  baseIndex: numberTable,
  motorVehicleAccessIndex: numberTable,
  incompletenessWeights: numberTable,
  trafficSigns: z.object({
    mandatory: z.array(z.string().min(1)),
    notMandatory: z.array(z.string().min(1)),
  }),
  cyclingProhibitedHighways: z.array(z.string()),
  allowedBicycleAccess: z.array(z.string()),
  accessHierarchy: z.record(z.string(), z.array(z.string())),
  highwayClassRanking: z.array(z.string()),
  separationLevels: numberTable,
  separationLevelFallback: z.number(),
});

export type QualityConfig = z.output<typeof qualityConfigSchema>;

export const profileConfigSchema = z.object({
  name: z.string(),
  description: z.string(),
  extends: z.string(),
  overrides: z.record(z.string(), z.unknown()),
});

export type ProfileConfig = z.output<typeof profileConfigSchema>;
