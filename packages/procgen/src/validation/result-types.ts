import type { Violation } from "../pipeline/types";

/**
 * Outcome of a single rule check.
 */
export interface CheckResult {
  readonly success: boolean;
  readonly violations: readonly Violation[];
}

/**
 * Successful validation result.
 * May still contain warnings, but no errors.
 */
export interface ValidationSuccess {
  readonly success: true;
  readonly violations: readonly Violation[];
}

/**
 * Failed validation result.
 * Contains at least one error-level violation.
 */
export interface ValidationFailure {
  readonly success: false;
  readonly violations: readonly Violation[];
}

/**
 * Level validation result - discriminated union.
 * Use `if (result.success)` to narrow to success/failure types.
 */
export type LevelValidationResult = ValidationSuccess | ValidationFailure;

export function hasErrorViolations(violations: readonly Violation[]): boolean {
  return violations.some((violation) => violation.severity === "error");
}

export function toCheckResult(violations: readonly Violation[]): CheckResult {
  return { success: !hasErrorViolations(violations), violations };
}
