/**
 * Floor Hazards Pass
 *
 * Spike blocks on the bottom wall row. Every tenth column is left as a
 * safe lane.
 */

import type { HazardRules } from "@levelforge/contracts";
import {
  FLOOR_HAZARD_END,
  FLOOR_HAZARD_START,
  FLOOR_SAFE_LANE_INTERVAL,
} from "../../core/constants";
import type { Pass, PopulatedArtifact } from "../../pipeline/types";
import { scanHazards } from "./density";

/**
 * Level 1 uses the gentler first-level chance.
 */
export function floorHazardChance(levelNum: number, hazards: HazardRules): number {
  return levelNum === 1 ? hazards.firstLevelFloorChance : hazards.floorChance;
}

export function isFloorHazardColumn(x: number): boolean {
  return x < FLOOR_HAZARD_END && x % FLOOR_SAFE_LANE_INTERVAL !== 0;
}

export function placeFloorHazards(): Pass<PopulatedArtifact, PopulatedArtifact> {
  return {
    id: "hazards.floor",
    inputType: "populated",
    outputType: "populated",
    run(input, ctx) {
      const { hazards } = ctx.config;
      const chance = floorHazardChance(ctx.levelNum, hazards);

      const { placed, vetoed } = scanHazards(
        input.grid,
        ctx.rng,
        {
          row: input.grid.height - 1,
          from: FLOOR_HAZARD_START,
          to: FLOOR_HAZARD_END,
          chance,
          isEligible: isFloorHazardColumn,
        },
        hazards,
      );

      ctx.trace.decision(
        "Floor hazard blocks",
        [],
        placed,
        `${chance}% per column, ${vetoed.length} block(s) vetoed by density`,
      );

      return input;
    },
  };
}
