/**
 * Core Constants
 *
 * Fixed layout dimensions and anchor positions for generated levels.
 */

// =============================================================================
// GRID DIMENSIONS
// =============================================================================

/** Width of a generated level in tiles */
export const LEVEL_WIDTH = 60;

/** Height of a generated level in tiles */
export const LEVEL_HEIGHT = 20;

// =============================================================================
// PLATFORM LAYOUT
// =============================================================================

/** Wall rows carrying platforms, bottom tier first */
export const TIER_ROWS = [16, 12, 8, 4] as const;

export type TierRow = (typeof TIER_ROWS)[number];

/** Row the trophy platform tier sits on */
export const TOP_TIER_ROW = 4;

/** Row of the guaranteed platform under the player start */
export const BASE_PLATFORM_ROW = 18;

/** Base platform spans [start, end) */
export const BASE_PLATFORM_START = 1;
export const BASE_PLATFORM_END = 10;

/** Player start, in tile units; floors to (2, 17) */
export const START_X = 2.0;
export const START_Y = 17.99;

// =============================================================================
// LANDMARKS
// =============================================================================

/** Ground-floor exit position */
export const GROUND_EXIT_X = 55;
export const GROUND_EXIT_Y = 18;

/** Row of the platform exit (one above tier 16) */
export const PLATFORM_EXIT_Y = 15;

/** Landmark fallbacks when a floating-islands tier drew no island */
export const FALLBACK_FIRST_TIER_END = 40;
export const FALLBACK_SECOND_TIER_START = 20;
export const FALLBACK_THIRD_TIER_END = 40;
export const FALLBACK_TOP_TIER_START = 20;

/** Diamond placement attempts per level */
export const DIAMOND_ATTEMPTS = 8;

// =============================================================================
// HAZARD LANES
// =============================================================================

/** Floor hazard candidates span [start, end) */
export const FLOOR_HAZARD_START = 15;
export const FLOOR_HAZARD_END = 50;

/** Every column divisible by this stays hazard-free on the floor */
export const FLOOR_SAFE_LANE_INTERVAL = 10;

/** Platform hazard candidates span [start, end) */
export const PLATFORM_HAZARD_START = 5;
export const PLATFORM_HAZARD_END = 55;

/** Cursor value before any hazard block has been placed */
export const NO_HAZARD_YET = -10;
