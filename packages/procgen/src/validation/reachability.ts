/**
 * Reachability
 *
 * Breadth-first search over the tile moves a player can make: walking,
 * falling, and jumping within a per-height horizontal envelope.
 */

import { DEFAULT_LEVEL_GEN_CONFIG } from "@levelforge/contracts";
import { Tile, type ReadonlyTileGrid, type TilePoint } from "../core/grid";

/**
 * Horizontal reach per jump height: `envelope[dy - 1]` is the farthest
 * column offset reachable when jumping `dy` rows up.
 */
export type JumpEnvelope = readonly number[];

export const DEFAULT_JUMP_ENVELOPE: JumpEnvelope =
  DEFAULT_LEVEL_GEN_CONFIG.jumpEnvelope;

/**
 * In bounds and neither wall nor hazard.
 */
export function isSafeTile(grid: ReadonlyTileGrid, x: number, y: number): boolean {
  if (!grid.isInBounds(x, y)) return false;
  const tile = grid.getUnsafe(x, y);
  return tile !== Tile.WALL && tile !== Tile.HAZARD;
}

/**
 * Standing on a wall tile. The bottom row has nothing below it.
 */
export function isOnGround(grid: ReadonlyTileGrid, { x, y }: TilePoint): boolean {
  return y + 1 < grid.height && grid.get(x, y + 1) === Tile.WALL;
}

/**
 * Tiles reachable in one move from `point`.
 *
 * Walking left and right is always considered. Airborne, the player falls
 * straight down or diagonally. Grounded, the player may jump to any safe
 * tile up to `envelope.length` rows higher within that row's reach.
 */
export function neighbors(
  grid: ReadonlyTileGrid,
  point: TilePoint,
  envelope: JumpEnvelope = DEFAULT_JUMP_ENVELOPE,
): TilePoint[] {
  const { x, y } = point;
  const out: TilePoint[] = [];

  for (const nx of [x - 1, x + 1]) {
    if (isSafeTile(grid, nx, y)) out.push({ x: nx, y });
  }

  if (!isOnGround(grid, point)) {
    for (const nx of [x, x - 1, x + 1]) {
      if (isSafeTile(grid, nx, y + 1)) out.push({ x: nx, y: y + 1 });
    }
    return out;
  }

  envelope.forEach((reach, i) => {
    const ny = y - (i + 1);
    if (ny < 0) return;
    for (let nx = x - reach; nx <= x + reach; nx++) {
      if (isSafeTile(grid, nx, ny)) out.push({ x: nx, y: ny });
    }
  });

  return out;
}

/**
 * Visit every tile reachable from `start`, in BFS order, stopping early
 * once `stopAt` returns true for a dequeued tile.
 */
function search(
  grid: ReadonlyTileGrid,
  start: TilePoint,
  envelope: JumpEnvelope,
  stopAt?: (point: TilePoint) => boolean,
): { visited: TilePoint[]; stopped: boolean } {
  const seen = new Uint8Array(grid.width * grid.height);
  const queue: TilePoint[] = [start];
  let head = 0;

  if (grid.isInBounds(start.x, start.y)) {
    seen[start.y * grid.width + start.x] = 1;
  }

  while (head < queue.length) {
    const current = queue[head++];
    if (!current) break;
    if (stopAt?.(current)) {
      return { visited: queue.slice(0, head), stopped: true };
    }

    for (const next of neighbors(grid, current, envelope)) {
      const key = next.y * grid.width + next.x;
      if (seen[key] === 0) {
        seen[key] = 1;
        queue.push(next);
      }
    }
  }

  return { visited: queue, stopped: false };
}

/**
 * Whether `target` can be reached from `start`.
 */
export function isReachable(
  grid: ReadonlyTileGrid,
  start: TilePoint,
  target: TilePoint,
  envelope: JumpEnvelope = DEFAULT_JUMP_ENVELOPE,
): boolean {
  return search(
    grid,
    start,
    envelope,
    (p) => p.x === target.x && p.y === target.y,
  ).stopped;
}

/**
 * Every tile reachable from `start`, the start included, in BFS order.
 */
export function findReachable(
  grid: ReadonlyTileGrid,
  start: TilePoint,
  envelope: JumpEnvelope = DEFAULT_JUMP_ENVELOPE,
): TilePoint[] {
  return search(grid, start, envelope).visited;
}
