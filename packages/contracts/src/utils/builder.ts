import type { z } from "zod";
import {
  type LevelGenConfig,
  LevelGenConfigInputSchema,
  LevelGenConfigSchema,
} from "../schemas/config";
import { LevelSeedSchema, type SeedRange, SeedRangeSchema } from "../schemas/seed";
import { LevelGenError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

/**
 * Defaults tuned for the 60x20 layout: level 1 gets a gentler floor, and the
 * jump envelope approximates the arc of the game's default physics.
 */
export const DEFAULT_LEVEL_GEN_CONFIG: LevelGenConfig = {
  maxLevel: 10,
  islandsPerTier: { min: 2, max: 3 },
  hazards: {
    floorChance: 30,
    firstLevelFloorChance: 10,
    platformChance: 15,
    maxRun: 2,
    minGap: 3,
    densityWindow: 15,
    maxPerWindow: 4,
  },
  jumpEnvelope: [5, 8, 10, 12],
  trace: false,
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/**
 * Merge a partial configuration with the defaults and validate the result.
 *
 * Accepts `unknown` so parsed config files can be passed straight in.
 */
export function buildLevelGenConfig(
  input: unknown = {},
): Result<LevelGenConfig, LevelGenError> {
  const partial = LevelGenConfigInputSchema.safeParse(input);
  if (!partial.success) {
    return Err(
      LevelGenError.configInvalid(
        `Invalid configuration: ${formatIssues(partial.error)}`,
        { issues: partial.error.issues },
      ),
    );
  }

  const defaults = DEFAULT_LEVEL_GEN_CONFIG;
  const candidate = {
    maxLevel: partial.data.maxLevel ?? defaults.maxLevel,
    islandsPerTier: { ...defaults.islandsPerTier, ...partial.data.islandsPerTier },
    hazards: { ...defaults.hazards, ...partial.data.hazards },
    jumpEnvelope: partial.data.jumpEnvelope ?? defaults.jumpEnvelope,
    trace: partial.data.trace ?? defaults.trace,
  };

  const parsed = LevelGenConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    return Err(
      LevelGenError.configInvalid(
        `Invalid configuration: ${formatIssues(parsed.error)}`,
        { issues: parsed.error.issues },
      ),
    );
  }
  return Ok(parsed.data);
}

/**
 * Validate a level number.
 */
export function parseLevelSeed(value: unknown): Result<number, LevelGenError> {
  const parsed = LevelSeedSchema.safeParse(value);
  if (!parsed.success) {
    return Err(
      LevelGenError.seedInvalid(formatIssues(parsed.error), { seed: value }),
    );
  }
  return Ok(parsed.data);
}

/**
 * Validate an inclusive seed range.
 */
export function parseSeedRange(
  value: unknown,
): Result<SeedRange, LevelGenError> {
  const parsed = SeedRangeSchema.safeParse(value);
  if (!parsed.success) {
    return Err(
      LevelGenError.seedInvalid(formatIssues(parsed.error), { range: value }),
    );
  }
  return Ok(parsed.data);
}
