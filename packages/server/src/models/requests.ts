import { z } from "zod";
import { sidepathEvidenceSchema } from "@cqi/engine";

/** Profile names map to files under configs/quality/profiles */
const profileSchema = z
  .string()
  .regex(/^[a-z0-9][a-z0-9-]*$/, "profile names are lowercase letters, digits and dashes");

const tagValueSchema = z.union([z.string(), z.number(), z.null()]);

const annotationsSchema = z
  .object({
    sidepath: z.enum(["yes", "no"]).nullable(),
    highway: z.string().nullable(),
    maxspeed: z.number().positive().nullable(),
    name: z.string().nullable(),
    side: z.enum(["left", "right"]).nullable(),
    type: z.enum(["cycleway", "sidewalk"]).nullable(),
    offset: z.number().nonnegative().nullable(),
  })
  .partial();

export const assessSegmentRequestSchema = z.object({
  id: z
    .union([z.string().min(1), z.number()], {
      errorMap: (_issue, ctx) => ({ message: ctx.data === undefined ? "Required" : ctx.defaultError }),
    })
    .transform(String),
  tags: z.record(z.string(), tagValueSchema),
  /** Overrides for the annotations otherwise derived from the tags */
  annotations: annotationsSchema.optional(),
  /** Adjacency tallies used to decide whether a path is a sidepath */
  sidepathEvidence: sidepathEvidenceSchema.optional(),
  profile: profileSchema.optional(),
});

export type AssessSegmentRequest = z.output<typeof assessSegmentRequestSchema>;

export const assessGeojsonQuerySchema = z.object({
  profile: profileSchema.optional(),
  /** Derive cycleway/sidewalk sub-segments from road centerlines */
  split: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});

export type AssessGeojsonQuery = z.output<typeof assessGeojsonQuerySchema>;

export const configDefaultsQuerySchema = z.object({
  profile: profileSchema.optional(),
});
