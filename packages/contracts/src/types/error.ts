/**
 * Error codes for level generation plumbing.
 * Validation findings are reported as violations, never as errors.
 */
export type LevelGenErrorCode =
  | "CONFIG_INVALID"
  | "CONFIG_READ_FAILED"
  | "SEED_INVALID"
  | "ARGUMENT_INVALID";

/**
 * Unified error type for configuration, seed and CLI failures.
 *
 * @example
 * ```typescript
 * const error = new LevelGenError(
 *   "SEED_INVALID",
 *   "Seed must fit in uint32",
 *   { seed: -1 }
 * );
 * ```
 */
export class LevelGenError extends Error {
  readonly name = "LevelGenError";

  constructor(
    public readonly code: LevelGenErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LevelGenError);
    }
  }

  /**
   * Create a config validation error.
   */
  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): LevelGenError {
    return new LevelGenError("CONFIG_INVALID", message, details);
  }

  /**
   * Create a config file read error.
   */
  static configReadFailed(
    message: string,
    details?: Record<string, unknown>,
  ): LevelGenError {
    return new LevelGenError("CONFIG_READ_FAILED", message, details);
  }

  /**
   * Create a seed validation error.
   */
  static seedInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): LevelGenError {
    return new LevelGenError("SEED_INVALID", message, details);
  }

  /**
   * Create a command-line argument error.
   */
  static argumentInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): LevelGenError {
    return new LevelGenError("ARGUMENT_INVALID", message, details);
  }

  /**
   * Check if an unknown error is a LevelGenError.
   */
  static isLevelGenError(error: unknown): error is LevelGenError {
    return error instanceof LevelGenError;
  }
}
