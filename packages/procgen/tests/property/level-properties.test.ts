/**
 * Property tests for level generation
 *
 * Verifies that the fairness rules hold across a range of seeds.
 */

import { DEFAULT_LEVEL_GEN_CONFIG, LcgRandom } from "@levelforge/contracts";
import { describe, expect, it } from "vitest";
import { LEVEL_HEIGHT, LEVEL_WIDTH } from "../../src/core/constants";
import { Tile } from "../../src/core/grid";
import { type GeneratedLevel, LevelGenerator } from "../../src/generators";
import {
  checkBoundaries,
  checkHazardRuns,
  checkLandmarkSupport,
  checkReachability,
  checkStartSafety,
  validateLevel,
} from "../../src/validation";

// =============================================================================
// TEST CONFIGURATION
// =============================================================================

const SEED_COUNT = 150;

const generator = LevelGenerator.create();

/**
 * Consecutive small seeds plus a spread of large ones
 */
function testSeeds(): number[] {
  const seeds = Array.from({ length: SEED_COUNT }, (_, i) => i);
  const rng = new LcgRandom(0x5eed);
  for (let i = 0; i < 50; i++) {
    seeds.push(rng.next());
  }
  return seeds;
}

const SEEDS = testSeeds();

function forEachLevel(check: (level: GeneratedLevel, seed: number) => void): void {
  for (const seed of SEEDS) {
    check(generator.generate(seed), seed);
  }
}

// =============================================================================
// PROPERTIES
// =============================================================================

describe("level properties", () => {
  it("is deterministic for every seed", () => {
    for (const seed of SEEDS.slice(0, 40)) {
      const a = generator.generate(seed);
      const b = generator.generate(seed);
      expect(a.grid.equals(b.grid)).toBe(true);
      expect(a.trophy).toEqual(b.trophy);
      expect(a.exit).toEqual(b.exit);
    }
  });

  it("always produces a 60x20 grid with solid boundaries", () => {
    forEachLevel((level) => {
      expect(level.grid.width).toBe(LEVEL_WIDTH);
      expect(level.grid.height).toBe(LEVEL_HEIGHT);
      expect(checkBoundaries(level.grid).violations).toEqual([]);
    });
  });

  it("places exactly one supported trophy and exit", () => {
    forEachLevel((level) => {
      expect(level.grid.countTiles(Tile.TROPHY)).toBe(1);
      expect(level.grid.countTiles(Tile.EXIT)).toBe(1);
      expect(checkLandmarkSupport(level.grid).violations).toEqual([]);
    });
  });

  it("keeps hazards short, spaced and sparse", () => {
    forEachLevel((level) => {
      expect(
        checkHazardRuns(level.grid, DEFAULT_LEVEL_GEN_CONFIG.hazards).violations,
      ).toEqual([]);
    });
  });

  it("never spawns the player inside a wall or hazard", () => {
    forEachLevel((level) => {
      expect(checkStartSafety(level.grid, level.start).success).toBe(true);
    });
  });

  it("keeps trophy and exit reachable", () => {
    forEachLevel((level, seed) => {
      const result = checkReachability(level.grid, level.start);
      expect(result.violations, `seed ${seed}`).toEqual([]);
    });
  });

  it("passes full validation with no warnings", () => {
    forEachLevel((level) => {
      const result = validateLevel(level);
      expect(result.success).toBe(true);
      expect(result.violations).toEqual([]);
    });
  });

  it("places the trophy on the top tier and the exit on the floor or tier 16", () => {
    forEachLevel((level) => {
      expect(level.trophy.y).toBe(3);
      expect([15, 18]).toContain(level.exit.y);
      expect(level.archetype).toBe(
        level.levelNum % 2 !== 0 ? "zig-zag" : "floating-islands",
      );
    });
  });
});
