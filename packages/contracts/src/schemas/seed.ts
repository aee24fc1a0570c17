import { z } from "zod";

const UINT32_MAX = 0xffffffff;

/**
 * A level number. Any uint32 is a valid seed; seed 0 and 0xffffffff are
 * not special-cased.
 */
export const LevelSeedSchema = z
  .number()
  .int({ message: "Seed must be an integer" })
  .min(0, { message: "Seed must be non-negative" })
  .max(UINT32_MAX, { message: "Seed must fit in uint32" });

export const SeedRangeSchema = z
  .object({
    from: LevelSeedSchema,
    to: LevelSeedSchema,
  })
  .refine(({ from, to }) => from <= to, {
    message: "Range start must be ≤ range end",
    path: ["from"],
  });

export type SeedRange = z.infer<typeof SeedRangeSchema>;
