/**
 * Batch Validation
 *
 * Generates and validates every seed in a range. Seeds are independent;
 * a failing seed never stops the run.
 */

import {
  type LevelGenConfigInput,
  parseSeedRange,
  type SeedRange,
} from "@levelforge/contracts";
import { LevelGenerator } from "../generators/level-generator";
import type { Violation } from "../pipeline/types";
import { validateLevel } from "./validate-level";

export interface SeedReport {
  readonly seed: number;
  readonly passed: boolean;
  readonly violations: readonly Violation[];
}

export interface BatchValidationReport {
  readonly from: number;
  readonly to: number;
  readonly seeds: readonly SeedReport[];
  readonly failedSeeds: readonly number[];
  readonly durationMs: number;
}

/**
 * Validate seeds `from..=to`.
 *
 * @throws {LevelGenError} SEED_INVALID for a malformed range, or
 * CONFIG_INVALID for a bad configuration
 */
export function validateSeedRange(
  range: SeedRange,
  config: LevelGenConfigInput = {},
): BatchValidationReport {
  const { from, to } = parseSeedRange(range).getOrThrow();
  const generator = LevelGenerator.create(config);
  const startTime = performance.now();

  const seeds: SeedReport[] = [];
  for (let seed = from; seed <= to; seed++) {
    const level = generator.generate(seed);
    const result = validateLevel(level, generator.config);
    seeds.push({
      seed,
      passed: result.success,
      violations: result.violations,
    });
  }

  return {
    from,
    to,
    seeds,
    failedSeeds: seeds.filter((s) => !s.passed).map((s) => s.seed),
    durationMs: performance.now() - startTime,
  };
}

export interface FormatBatchOptions {
  /** Only print the summary line */
  readonly quiet?: boolean;
}

/**
 * Render a report as `Seed N: <message>` lines followed by a summary.
 */
export function formatBatchReport(
  report: BatchValidationReport,
  options: FormatBatchOptions = {},
): string {
  const lines: string[] = [];

  if (!options.quiet) {
    for (const { seed, violations } of report.seeds) {
      for (const violation of violations) {
        const prefix = violation.severity === "warning" ? "warning: " : "";
        lines.push(`Seed ${seed}: ${prefix}${violation.message}`);
      }
    }
  }

  lines.push(
    report.failedSeeds.length === 0
      ? `All ${report.seeds.length} levels validated successfully!`
      : `Found ${report.failedSeeds.length} seeds with validation failures.`,
  );

  return lines.join("\n");
}
