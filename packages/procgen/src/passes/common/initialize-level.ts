/**
 * Initialize Level Pass
 *
 * Creates the empty grid, stamps the boundary walls and carves the
 * guaranteed platform under the player start.
 */

import {
  BASE_PLATFORM_END,
  BASE_PLATFORM_ROW,
  BASE_PLATFORM_START,
  LEVEL_HEIGHT,
  LEVEL_WIDTH,
  START_X,
  START_Y,
} from "../../core/constants";
import { Tile, TileGrid } from "../../core/grid";
import type {
  EmptyArtifact,
  LevelStateArtifact,
  Pass,
} from "../../pipeline/types";

/**
 * Stamp wall boundaries on every edge of the grid.
 */
export function stampBoundaries(grid: TileGrid): void {
  grid.fillRow(0, 0, grid.width, Tile.WALL);
  grid.fillRow(grid.height - 1, 0, grid.width, Tile.WALL);
  for (let y = 0; y < grid.height; y++) {
    grid.setUnsafe(0, y, Tile.WALL);
    grid.setUnsafe(grid.width - 1, y, Tile.WALL);
  }
}

export function initializeLevel(): Pass<EmptyArtifact, LevelStateArtifact> {
  return {
    id: "common.initialize-level",
    inputType: "empty",
    outputType: "level-state",
    run(_input, ctx) {
      const grid = new TileGrid(LEVEL_WIDTH, LEVEL_HEIGHT);
      stampBoundaries(grid);
      grid.fillRow(
        BASE_PLATFORM_ROW,
        BASE_PLATFORM_START,
        BASE_PLATFORM_END,
        Tile.WALL,
      );

      ctx.trace.decision(
        "Player start",
        [],
        { x: START_X, y: START_Y },
        `Base platform on row ${BASE_PLATFORM_ROW}, columns ${BASE_PLATFORM_START}..${BASE_PLATFORM_END - 1}`,
      );

      return {
        type: "level-state",
        id: "level-state",
        levelNum: ctx.levelNum,
        grid,
        start: { x: START_X, y: START_Y },
      };
    },
  };
}
