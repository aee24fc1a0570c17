import {
  DEFAULT_LEVEL_GEN_CONFIG,
  type LevelGenConfig,
} from "@levelforge/contracts";
import type { ReadonlyTileGrid, StartPosition } from "../core/grid";
import type { Violation } from "../pipeline/types";
import {
  type LevelValidationResult,
  hasErrorViolations,
} from "./result-types";
import {
  checkBoundaries,
  checkDiamondSupport,
  checkHazardRuns,
  checkLandmarkSupport,
  checkReachability,
  checkStartSafety,
} from "./rule-checks";

/**
 * What validation needs from a level. Generated levels satisfy this, and
 * so does any hand-built grid paired with a start position.
 */
export interface ValidatableLevel {
  readonly grid: ReadonlyTileGrid;
  readonly start: StartPosition;
}

export type ValidationRules = Pick<LevelGenConfig, "hazards" | "jumpEnvelope">;

/**
 * Validate a level against every fairness rule.
 *
 * Checks:
 * - Trophy and exit exist and rest on walls
 * - Player start is not inside a wall or hazard
 * - Hazard run length, spacing and density
 * - Solid boundaries
 * - Trophy reachable from the start, exit reachable from the trophy
 * - Diamonds rest on walls (warning only)
 */
export function validateLevel(
  level: ValidatableLevel,
  rules: ValidationRules = DEFAULT_LEVEL_GEN_CONFIG,
): LevelValidationResult {
  const { grid, start } = level;
  const violations: Violation[] = [
    ...checkLandmarkSupport(grid).violations,
    ...checkStartSafety(grid, start).violations,
    ...checkHazardRuns(grid, rules.hazards).violations,
    ...checkBoundaries(grid).violations,
    ...checkReachability(grid, start, rules.jumpEnvelope).violations,
    ...checkDiamondSupport(grid).violations,
  ];

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
