/**
 * Platform Hazards Pass
 *
 * Spikes sitting on top of tier platforms. A column qualifies when it and
 * both neighbours are wall on the tier row and it lies outside every
 * critical zone.
 */

import {
  PLATFORM_HAZARD_END,
  PLATFORM_HAZARD_START,
  TIER_ROWS,
} from "../../core/constants";
import { Tile, type ReadonlyTileGrid } from "../../core/grid";
import type { Pass, PopulatedArtifact } from "../../pipeline/types";
import { buildCriticalZones, isInCriticalZone, type CriticalZone } from "./critical-zones";
import { scanHazards } from "./density";

export function isPlatformHazardColumn(
  grid: ReadonlyTileGrid,
  zones: readonly CriticalZone[],
  tier: number,
  x: number,
): boolean {
  return (
    x >= PLATFORM_HAZARD_START &&
    x < PLATFORM_HAZARD_END &&
    !isInCriticalZone(zones, tier, x) &&
    grid.get(x, tier) === Tile.WALL &&
    grid.get(x - 1, tier) === Tile.WALL &&
    grid.get(x + 1, tier) === Tile.WALL
  );
}

export function placePlatformHazards(): Pass<PopulatedArtifact, PopulatedArtifact> {
  return {
    id: "hazards.platform",
    inputType: "populated",
    outputType: "populated",
    run(input, ctx) {
      const { grid } = input;
      const { hazards } = ctx.config;
      const zones = buildCriticalZones(input);

      for (const tier of TIER_ROWS) {
        const { placed, vetoed } = scanHazards(
          grid,
          ctx.rng,
          {
            row: tier - 1,
            from: PLATFORM_HAZARD_START,
            to: PLATFORM_HAZARD_END,
            chance: hazards.platformChance,
            isEligible: (x) => isPlatformHazardColumn(grid, zones, tier, x),
          },
          hazards,
        );

        ctx.trace.decision(
          `Tier ${tier} hazard blocks`,
          [],
          placed,
          `${hazards.platformChance}% per column, ${vetoed.length} block(s) vetoed by density`,
        );
      }

      return input;
    },
  };
}
