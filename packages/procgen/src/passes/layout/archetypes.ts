/**
 * Platform Archetypes
 *
 * Both layouts stamp wall runs on the four tier rows and report the
 * landmark columns later passes anchor to. Random draws happen in a fixed
 * order, so the same stream always yields the same layout.
 */

import type { IslandsPerTier, LcgRandom } from "@levelforge/contracts";
import {
  FALLBACK_FIRST_TIER_END,
  FALLBACK_SECOND_TIER_START,
  FALLBACK_THIRD_TIER_END,
  FALLBACK_TOP_TIER_START,
  TIER_ROWS,
  type TierRow,
} from "../../core/constants";
import { Tile, type MutableTileGrid } from "../../core/grid";
import type { Archetype, Landmarks } from "../../pipeline/types";

/** Tier 16 run of the zig-zag layout always starts here */
const ZIG_ZAG_FIRST_TIER_START = 15;

/** Draw ranges for the zig-zag run boundaries, [min, max) */
const ZIG_ZAG_LONG_END = { min: 35, max: 55 } as const;
const ZIG_ZAG_SHORT_START = { min: 25, max: 45 } as const;

/** Islands are dealt into consecutive column bands of this width */
const ISLAND_BAND_WIDTH = 15;
const ISLAND_BAND_OFFSET = 5;
const ISLAND_START_SPREAD = 10;
const ISLAND_LENGTH = { min: 5, max: 12 } as const;

/**
 * Odd levels zig-zag, even levels float.
 */
export function archetypeForLevel(levelNum: number): Archetype {
  return levelNum % 2 !== 0 ? "zig-zag" : "floating-islands";
}

/**
 * Stamp the zig-zag layout: long runs alternating between the left and
 * right halves, each anchored against a side wall except tier 16.
 */
export function layoutZigZag(grid: MutableTileGrid, rng: LcgRandom): Landmarks {
  const lastInner = grid.width - 1;

  const firstTierEnd = rng.range(ZIG_ZAG_LONG_END.min, ZIG_ZAG_LONG_END.max);
  grid.fillRow(16, ZIG_ZAG_FIRST_TIER_START, firstTierEnd, Tile.WALL);

  const secondTierStart = rng.range(
    ZIG_ZAG_SHORT_START.min,
    ZIG_ZAG_SHORT_START.max,
  );
  grid.fillRow(12, secondTierStart, lastInner, Tile.WALL);

  const thirdTierEnd = rng.range(ZIG_ZAG_LONG_END.min, ZIG_ZAG_LONG_END.max);
  grid.fillRow(8, 1, thirdTierEnd, Tile.WALL);

  const topTierStart = rng.range(
    ZIG_ZAG_SHORT_START.min,
    ZIG_ZAG_SHORT_START.max,
  );
  grid.fillRow(4, topTierStart, lastInner, Tile.WALL);

  return {
    firstTierStart: ZIG_ZAG_FIRST_TIER_START,
    firstTierEnd,
    secondTierStart,
    thirdTierEnd,
    topTierStart,
  };
}

/**
 * Span of an island as drawn. `end` is `start + length` and may run past
 * the right wall; only the stamped tiles are clipped.
 */
export interface IslandSpan {
  readonly start: number;
  readonly end: number;
}

/**
 * Stamp floating islands on every tier and return the first island drawn
 * on each tier.
 */
export function layoutIslands(
  grid: MutableTileGrid,
  rng: LcgRandom,
  islands: IslandsPerTier,
): Map<TierRow, IslandSpan> {
  const lastInner = grid.width - 1;
  const firstIslands = new Map<TierRow, IslandSpan>();

  for (const tier of TIER_ROWS) {
    const count = rng.range(islands.min, islands.max + 1);
    for (let i = 0; i < count; i++) {
      const bandStart = ISLAND_BAND_OFFSET + i * ISLAND_BAND_WIDTH;
      const start = rng.range(bandStart, bandStart + ISLAND_START_SPREAD);
      const length = rng.range(ISLAND_LENGTH.min, ISLAND_LENGTH.max);
      const end = start + length;
      grid.fillRow(tier, start, Math.min(end, lastInner), Tile.WALL);

      if (i === 0) {
        firstIslands.set(tier, { start, end });
      }
    }
  }

  return firstIslands;
}

/**
 * Derive landmarks from the first island of each tier, falling back to
 * fixed columns for tiers that drew no island.
 */
export function resolveIslandLandmarks(
  firstIslands: ReadonlyMap<TierRow, IslandSpan>,
): Landmarks {
  const first = firstIslands.get(16);
  return {
    firstTierStart: first?.start ?? ZIG_ZAG_FIRST_TIER_START,
    firstTierEnd: first?.end ?? FALLBACK_FIRST_TIER_END,
    secondTierStart: firstIslands.get(12)?.start ?? FALLBACK_SECOND_TIER_START,
    thirdTierEnd: firstIslands.get(8)?.end ?? FALLBACK_THIRD_TIER_END,
    topTierStart: firstIslands.get(4)?.start ?? FALLBACK_TOP_TIER_START,
  };
}
