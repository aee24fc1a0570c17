import { Tile } from "../core/grid";
import type { GeneratedLevel } from "../generators/level-generator";
import {
  DEFAULT_JUMP_ENVELOPE,
  findReachable,
  type JumpEnvelope,
} from "./reachability";
import { startTile } from "./rule-checks";

/**
 * Summary numbers for a generated level
 */
export interface LevelStats {
  readonly archetype: GeneratedLevel["archetype"];
  readonly wallTiles: number;
  readonly emptyTiles: number;
  readonly floorHazards: number;
  readonly platformHazards: number;
  readonly diamonds: number;
  /** Non-solid tiles the player can reach from the start */
  readonly reachableTiles: number;
  /** reachableTiles over all non-solid tiles */
  readonly reachableRatio: number;
}

/**
 * Compute statistics for a generated level
 */
export function computeLevelStats(
  level: GeneratedLevel,
  envelope: JumpEnvelope = DEFAULT_JUMP_ENVELOPE,
): LevelStats {
  const { grid } = level;
  const bottom = grid.height - 1;

  const wallTiles = grid.countTiles(Tile.WALL);
  const hazardTiles = grid.countTiles(Tile.HAZARD);
  const floorHazards = grid.countInRow(bottom, 0, grid.width, Tile.HAZARD);
  const openTiles = grid.width * grid.height - wallTiles - hazardTiles;
  const reachableTiles = findReachable(
    grid,
    startTile(level.start),
    envelope,
  ).length;

  return {
    archetype: level.archetype,
    wallTiles,
    emptyTiles: grid.countTiles(Tile.EMPTY),
    floorHazards,
    platformHazards: hazardTiles - floorHazards,
    diamonds: grid.countTiles(Tile.DIAMOND),
    reachableTiles,
    reachableRatio: openTiles > 0 ? reachableTiles / openTiles : 0,
  };
}
