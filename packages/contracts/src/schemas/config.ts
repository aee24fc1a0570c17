import { z } from "zod";

const UINT32_MAX = 0xffffffff;

/** Percent chance rolled against `range(0, 100)` */
const ChanceSchema = z
  .number()
  .int("Chance must be an integer percentage")
  .min(0)
  .max(100);

const islandsShape = {
  min: z.number().int().min(0).max(4),
  max: z.number().int().min(0).max(4),
};

const hazardShape = {
  floorChance: ChanceSchema,
  firstLevelFloorChance: ChanceSchema,
  platformChance: ChanceSchema,
  maxRun: z.number().int().min(1, "Hazard runs must allow at least 1 tile").max(10),
  minGap: z.number().int().min(0).max(20),
  densityWindow: z.number().int().min(1).max(60),
  maxPerWindow: z.number().int().min(1).max(60),
};

const JumpEnvelopeSchema = z
  .array(z.number().int().min(0).max(59))
  .min(1, "Jump envelope needs at least one height")
  .max(19);

export const IslandsPerTierSchema = z.object(islandsShape);
export const HazardRulesSchema = z.object(hazardShape);

export const LevelGenConfigSchema = z
  .object({
    maxLevel: z.number().int().min(1).max(UINT32_MAX),
    islandsPerTier: IslandsPerTierSchema,
    hazards: HazardRulesSchema,
    jumpEnvelope: JumpEnvelopeSchema,
    trace: z.boolean(),
  })
  .superRefine((data, ctx) => {
    if (data.islandsPerTier.min > data.islandsPerTier.max) {
      ctx.addIssue({
        code: "custom",
        message: "Minimum islands per tier must be ≤ maximum islands per tier",
        path: ["islandsPerTier"],
      });
    }
    if (data.hazards.maxPerWindow > data.hazards.densityWindow) {
      ctx.addIssue({
        code: "custom",
        message: "maxPerWindow cannot exceed densityWindow",
        path: ["hazards", "maxPerWindow"],
      });
    }
  });

/**
 * Shape accepted from callers and config files: every field optional,
 * nested objects partially specified. Unknown keys are rejected.
 */
export const LevelGenConfigInputSchema = z
  .object({
    maxLevel: z.number().int().min(1).max(UINT32_MAX).optional(),
    islandsPerTier: z.object(islandsShape).partial().strict().optional(),
    hazards: z.object(hazardShape).partial().strict().optional(),
    jumpEnvelope: JumpEnvelopeSchema.optional(),
    trace: z.boolean().optional(),
  })
  .strict();

export type IslandsPerTier = z.infer<typeof IslandsPerTierSchema>;
export type HazardRules = z.infer<typeof HazardRulesSchema>;
export type LevelGenConfig = z.infer<typeof LevelGenConfigSchema>;
export type LevelGenConfigInput = z.input<typeof LevelGenConfigInputSchema>;
