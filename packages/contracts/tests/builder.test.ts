import { describe, expect, it } from "vitest";
import {
  buildLevelGenConfig,
  DEFAULT_LEVEL_GEN_CONFIG,
  LevelGenError,
  parseLevelSeed,
  parseSeedRange,
} from "../src";

describe("buildLevelGenConfig", () => {
  it("returns the defaults for empty input", () => {
    const res = buildLevelGenConfig();
    if (!res.success) throw new Error("unexpected error");
    expect(res.value).toEqual(DEFAULT_LEVEL_GEN_CONFIG);
  });

  it("merges partial nested settings over the defaults", () => {
    const res = buildLevelGenConfig({
      maxLevel: 50,
      hazards: { platformChance: 0 },
    });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.maxLevel).toBe(50);
    expect(res.value.hazards.platformChance).toBe(0);
    expect(res.value.hazards.floorChance).toBe(30);
    expect(res.value.islandsPerTier).toEqual({ min: 2, max: 3 });
  });

  it("reports invalid values as a CONFIG_INVALID error", () => {
    const res = buildLevelGenConfig({ islandsPerTier: { min: 4, max: 1 } });
    expect(res.success).toBe(false);
    if (res.success) return;
    expect(LevelGenError.isLevelGenError(res.error)).toBe(true);
    expect(res.error.code).toBe("CONFIG_INVALID");
    expect(res.error.message).toBe(
      "Invalid configuration: islandsPerTier: Minimum islands per tier must be ≤ maximum islands per tier",
    );
  });

  it("rejects non-object input", () => {
    const res = buildLevelGenConfig("max_level = 10");
    expect(res.success).toBe(false);
  });
});

describe("parseLevelSeed", () => {
  it("passes valid seeds through", () => {
    expect(parseLevelSeed(7).getOrThrow()).toBe(7);
  });

  it("returns SEED_INVALID for bad input", () => {
    const res = parseLevelSeed(-3);
    expect(res.isErr()).toBe(true);
    expect(res.error.code).toBe("SEED_INVALID");
    expect(res.error.details).toEqual({ seed: -3 });
  });
});

describe("parseSeedRange", () => {
  it("validates ordering", () => {
    expect(parseSeedRange({ from: 1, to: 3 }).getOrThrow()).toEqual({
      from: 1,
      to: 3,
    });
    expect(parseSeedRange({ from: 3, to: 1 }).isErr()).toBe(true);
  });
});
