/**
 * Procedural platformer level generation and fairness validation.
 *
 * @example
 * ```typescript
 * import { generateLevel, validateLevel } from "@levelforge/procgen";
 *
 * const level = generateLevel(42);
 * const result = validateLevel(level);
 *
 * if (!result.success) {
 *   for (const v of result.violations) console.log(v.message);
 * }
 * ```
 */

// Configuration
export * from "./config";
// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Pass Library
export * as passes from "./passes";
// Pipeline
export * from "./pipeline";
// Utilities
export * from "./utils";
// Validation
export * from "./validation";
