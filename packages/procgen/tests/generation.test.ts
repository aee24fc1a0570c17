/**
 * Level generation tests
 */

import { DEFAULT_LEVEL_GEN_CONFIG, LevelGenError } from "@levelforge/contracts";
import { describe, expect, it } from "vitest";
import type { TierRow } from "../src/core/constants";
import { Tile } from "../src/core/grid";
import { generateLevel, LevelGenerator } from "../src/generators";
import { isDecisionEvent } from "../src/pipeline/trace";
import { floorHazardChance } from "../src/passes/hazards";
import {
  archetypeForLevel,
  type IslandSpan,
  resolveIslandLandmarks,
} from "../src/passes/layout";
import { validateLevel } from "../src/validation";

describe("generateLevel", () => {
  describe("zig-zag layout (seed 1)", () => {
    const level = generateLevel(1);

    it("records the zig-zag landmarks", () => {
      expect(level.archetype).toBe("zig-zag");
      expect(level.landmarks).toEqual({
        firstTierStart: 15,
        firstTierEnd: 37,
        secondTierStart: 34,
        thirdTierEnd: 37,
        topTierStart: 26,
      });
    });

    it("places trophy on the top tier and exit above tier 16", () => {
      expect(level.trophy).toEqual({ x: 43, y: 3 });
      expect(level.exit).toEqual({ x: 35, y: 15 });
      expect(level.grid.get(43, 3)).toBe(Tile.TROPHY);
      expect(level.grid.get(35, 15)).toBe(Tile.EXIT);
    });

    it("produces the expected rows", () => {
      const rows = level.grid.toRows();
      expect(rows[3]).toBe(
        "#................................^.........*.^^......^^....#",
      );
      expect(rows[4]).toBe(
        "#.........................##################################",
      );
      expect(rows[8]).toBe(
        "#####################################......................#",
      );
      expect(rows[16]).toBe(
        "#..............######################......................#",
      );
      expect(rows[19]).toBe(
        "##########################################^###^^############",
      );
    });

    it("uses the reduced first-level floor hazard chance", () => {
      expect(floorHazardChance(1, DEFAULT_LEVEL_GEN_CONFIG.hazards)).toBe(10);
      expect(floorHazardChance(2, DEFAULT_LEVEL_GEN_CONFIG.hazards)).toBe(30);

      const { trace } = LevelGenerator.create({ trace: true }).run(1);
      const floor = trace
        .filter(isDecisionEvent)
        .find((event) => event.passId === "hazards.floor");
      expect(floor?.reason).toMatch(/^10% per column/);
    });

    it("starts the player on the base platform", () => {
      expect(level.start).toEqual({ x: 2.0, y: 17.99 });
      expect(level.grid.get(2, 18)).toBe(Tile.WALL);
      expect(level.grid.get(2, 17)).toBe(Tile.EMPTY);
    });
  });

  describe("floating islands layout (seed 2)", () => {
    const level = generateLevel(2);

    it("records the first island of each tier", () => {
      expect(level.archetype).toBe("floating-islands");
      expect(level.landmarks).toEqual({
        firstTierStart: 14,
        firstTierEnd: 20,
        secondTierStart: 9,
        thirdTierEnd: 13,
        topTierStart: 13,
      });
      expect(level.trophy).toEqual({ x: 13, y: 3 });
      expect(level.exit).toEqual({ x: 18, y: 15 });
    });

    it("produces the expected grid", () => {
      expect(level.grid.toRows()).toEqual([
        "############################################################",
        "#..........................................................#",
        "#..........................................................#",
        "#............*...^.............^^..........................#",
        "#............########.......########.......................#",
        "#..........................................................#",
        "#..........................................................#",
        "#.........+......................+....^^...................#",
        "#.....#######.............########..#######................#",
        "#..........................................................#",
        "#..........................................................#",
        "#..............................^^..........................#",
        "#........#####.............#########.......................#",
        "#..........................................................#",
        "#..........................................................#",
        "#.................E...............^........................#",
        "#.............######........##########.....................#",
        "#..........................................................#",
        "##########.................................................#",
        "######################^^#####^###^###^^########^############",
      ]);
    });
  });

  describe("island fallbacks", () => {
    const level = generateLevel(2, { islandsPerTier: { min: 0, max: 0 } });

    it("falls back to fixed landmarks when no island is drawn", () => {
      expect(level.landmarks).toEqual({
        firstTierStart: 15,
        firstTierEnd: 40,
        secondTierStart: 20,
        thirdTierEnd: 40,
        topTierStart: 20,
      });
    });

    it("draws the trophy column right of the fallback top tier start", () => {
      expect(level.trophy).toEqual({ x: 22, y: 3 });
      expect(level.grid.countInRow(4, 1, 59, Tile.WALL)).toBe(0);
      expect(level.exit).toEqual({ x: 55, y: 18 });
    });

    it("leaves a level the checker rejects", () => {
      const result = validateLevel(level);
      expect(result.success).toBe(false);
      expect(result.violations.map((v) => v.message)).toEqual([
        "Trophy at (22, 3) has no solid ground beneath it",
        "Trophy at (22, 3) is not reachable from the start",
      ]);
    });

    it("only falls back for tiers without an island", () => {
      expect(
        resolveIslandLandmarks(
          new Map<TierRow, IslandSpan>([[12, { start: 7, end: 15 }]]),
        ),
      ).toEqual({
        firstTierStart: 15,
        firstTierEnd: 40,
        secondTierStart: 7,
        thirdTierEnd: 40,
        topTierStart: 20,
      });
    });
  });

  it("alternates archetypes by parity", () => {
    expect(archetypeForLevel(0)).toBe("floating-islands");
    expect(archetypeForLevel(7)).toBe("zig-zag");
    expect(archetypeForLevel(0xffffffff)).toBe("zig-zag");
  });

  it("is deterministic", () => {
    const a = generateLevel(12345);
    const b = generateLevel(12345);
    expect(a.grid.equals(b.grid)).toBe(true);
    expect(a.landmarks).toEqual(b.landmarks);
  });

  it("handles the extreme seeds", () => {
    expect(generateLevel(0).archetype).toBe("floating-islands");
    expect(validateLevel(generateLevel(0xffffffff)).success).toBe(true);
  });

  it("rejects seeds outside uint32", () => {
    for (const seed of [-1, 1.5, 0x100000000]) {
      try {
        generateLevel(seed);
        expect.unreachable();
      } catch (error) {
        expect(LevelGenError.isLevelGenError(error)).toBe(true);
        if (LevelGenError.isLevelGenError(error)) {
          expect(error.code).toBe("SEED_INVALID");
        }
      }
    }
  });

  it("rejects invalid configuration up front", () => {
    expect(() =>
      LevelGenerator.create({ hazards: { maxPerWindow: 30, densityWindow: 10 } }),
    ).toThrow(LevelGenError);
  });

  it("places no hazards when every chance is zero", () => {
    const level = generateLevel(3, {
      hazards: { floorChance: 0, firstLevelFloorChance: 0, platformChance: 0 },
    });
    expect(level.grid.countTiles(Tile.HAZARD)).toBe(0);
  });
});
