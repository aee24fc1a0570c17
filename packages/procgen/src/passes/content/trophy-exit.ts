/**
 * Trophy and Exit Pass
 *
 * The trophy sits on the top tier; the exit either on the ground floor
 * or on the tier 16 run, chosen by a coin flip.
 */

import type { LcgRandom } from "@levelforge/contracts";
import {
  GROUND_EXIT_X,
  GROUND_EXIT_Y,
  PLATFORM_EXIT_Y,
  TOP_TIER_ROW,
} from "../../core/constants";
import {
  Tile,
  type ReadonlyTileGrid,
  type TilePoint,
} from "../../core/grid";
import type {
  Landmarks,
  LayoutArtifact,
  Pass,
  PopulatedArtifact,
} from "../../pipeline/types";

/**
 * Pick the trophy column from the wall tiles of the top tier. With no
 * top tier walls, draw a column right of the top tier start instead.
 */
export function chooseTrophyColumn(
  grid: ReadonlyTileGrid,
  rng: LcgRandom,
  landmarks: Landmarks,
): number {
  const candidates: number[] = [];
  for (let x = 1; x < grid.width - 1; x++) {
    if (grid.getUnsafe(x, TOP_TIER_ROW) === Tile.WALL) {
      candidates.push(x);
    }
  }

  const picked = rng.choice(candidates);
  return picked ?? rng.range(landmarks.topTierStart + 2, grid.width - 2);
}

/**
 * Place the exit on the ground floor or one row above tier 16, kept
 * inside the first tier run and clear of the right wall.
 */
export function chooseExit(
  rng: LcgRandom,
  landmarks: Landmarks,
  width: number,
): TilePoint {
  if (rng.range(0, 2) === 0) {
    return { x: GROUND_EXIT_X, y: GROUND_EXIT_Y };
  }
  const x = Math.min(
    Math.max(landmarks.firstTierEnd - 2, landmarks.firstTierStart),
    width - 2,
  );
  return { x, y: PLATFORM_EXIT_Y };
}

export function placeTrophyAndExit(): Pass<LayoutArtifact, PopulatedArtifact> {
  return {
    id: "content.trophy-exit",
    inputType: "layout",
    outputType: "populated",
    run(input, ctx) {
      const { grid, landmarks } = input;

      const trophyX = chooseTrophyColumn(grid, ctx.rng, landmarks);
      const trophy = { x: trophyX, y: TOP_TIER_ROW - 1 };
      grid.set(trophy.x, trophy.y, Tile.TROPHY);

      const exit = chooseExit(ctx.rng, landmarks, grid.width);
      grid.set(exit.x, exit.y, Tile.EXIT);

      ctx.trace.decision(
        "Exit placement",
        ["ground", "platform"],
        exit.y === GROUND_EXIT_Y ? "ground" : "platform",
        `Exit at (${exit.x}, ${exit.y}), trophy at (${trophy.x}, ${trophy.y})`,
      );

      return {
        ...input,
        type: "populated",
        id: "populated",
        trophy,
        exit,
      };
    },
  };
}
