/**
 * Level Rule Checks
 *
 * Each check inspects one fairness rule and reports every breach it finds;
 * none of them stops at the first violation.
 */

import type { HazardRules } from "@levelforge/contracts";
import {
  Tile,
  type ReadonlyTileGrid,
  type StartPosition,
  type TilePoint,
} from "../core/grid";
import type { Violation } from "../pipeline/types";
import {
  DEFAULT_JUMP_ENVELOPE,
  isReachable,
  type JumpEnvelope,
} from "./reachability";
import { type CheckResult, toCheckResult } from "./result-types";

function hasWallBelow(grid: ReadonlyTileGrid, { x, y }: TilePoint): boolean {
  return y + 1 < grid.height && grid.getUnsafe(x, y + 1) === Tile.WALL;
}

/**
 * The tile the player stands in at the start.
 */
export function startTile(start: StartPosition): TilePoint {
  return { x: Math.floor(start.x), y: Math.floor(start.y) };
}

/**
 * Every trophy and exit must exist and rest on a wall tile.
 */
export function checkLandmarkSupport(grid: ReadonlyTileGrid): CheckResult {
  const violations: Violation[] = [];

  const landmarks = [
    { tile: Tile.TROPHY, kind: "trophy", label: "Trophy" },
    { tile: Tile.EXIT, kind: "exit", label: "Exit" },
  ] as const;

  for (const { tile, kind, label } of landmarks) {
    const positions = grid.findAll(tile);
    if (positions.length === 0) {
      violations.push({
        type: `landmark.${kind}.missing`,
        message: `${label} is missing`,
        severity: "error",
      });
    }
    for (const position of positions) {
      if (!hasWallBelow(grid, position)) {
        violations.push({
          type: `landmark.${kind}.support`,
          message: `${label} at (${position.x}, ${position.y}) has no solid ground beneath it`,
          severity: "error",
          position,
        });
      }
    }
  }

  return toCheckResult(violations);
}

/**
 * The player must not spawn inside a wall or on a hazard.
 */
export function checkStartSafety(
  grid: ReadonlyTileGrid,
  start: StartPosition,
): CheckResult {
  const position = startTile(start);
  const violations: Violation[] = [];

  if (!grid.isInBounds(position.x, position.y)) {
    violations.push({
      type: "start.bounds",
      message: `Player start (${position.x}, ${position.y}) is out of bounds`,
      severity: "error",
      position,
    });
  } else {
    const tile = grid.getUnsafe(position.x, position.y);
    if (tile === Tile.WALL || tile === Tile.HAZARD) {
      violations.push({
        type: "start.blocked",
        message: `Player start (${position.x}, ${position.y}) is inside ${tile === Tile.WALL ? "a wall" : "a hazard"}`,
        severity: "error",
        position,
      });
    }
  }

  return toCheckResult(violations);
}

interface HazardRun {
  readonly start: number;
  /** Exclusive */
  readonly end: number;
}

function hazardRuns(grid: ReadonlyTileGrid, y: number): HazardRun[] {
  const runs: HazardRun[] = [];
  let x = 0;
  while (x < grid.width) {
    if (grid.getUnsafe(x, y) !== Tile.HAZARD) {
      x++;
      continue;
    }
    const start = x;
    while (x < grid.width && grid.getUnsafe(x, y) === Tile.HAZARD) x++;
    runs.push({ start, end: x });
  }
  return runs;
}

/**
 * Hazard spacing on every row: run length, gap to the next run, and the
 * first over-dense window.
 */
export function checkHazardRuns(
  grid: ReadonlyTileGrid,
  rules: HazardRules,
): CheckResult {
  const violations: Violation[] = [];

  for (let y = 0; y < grid.height; y++) {
    const runs = hazardRuns(grid, y);

    runs.forEach((run, i) => {
      const length = run.end - run.start;
      if (length > rules.maxRun) {
        violations.push({
          type: "hazard.run",
          message: `Too many consecutive hazards at y=${y}: found ${length}`,
          severity: "error",
          position: { x: run.start, y },
        });
      }

      const next = runs[i + 1];
      if (next && next.start - run.end < rules.minGap) {
        violations.push({
          type: "hazard.gap",
          message: `Hazards too close at y=${y}: gap of ${next.start - run.end} before x=${next.start}`,
          severity: "error",
          position: { x: next.start, y },
        });
      }
    });

    if (runs.length === 0) continue;

    // A row narrower than the window is still checked as one clipped window.
    const lastStart = Math.max(grid.width - rules.densityWindow, 0);
    for (let ws = 0; ws <= lastStart; ws++) {
      const count = grid.countInRow(y, ws, ws + rules.densityWindow, Tile.HAZARD);
      if (count > rules.maxPerWindow) {
        violations.push({
          type: "hazard.density",
          message: `Too many hazards at y=${y}: ${count} within ${rules.densityWindow} tiles from x=${ws}`,
          severity: "error",
          position: { x: ws, y },
        });
        break;
      }
    }
  }

  return toCheckResult(violations);
}

/**
 * Top row and side columns are solid; the bottom row is wall or hazard.
 */
export function checkBoundaries(grid: ReadonlyTileGrid): CheckResult {
  const violations: Violation[] = [];
  const bottom = grid.height - 1;

  const breach = (x: number, y: number, edge: string) => {
    violations.push({
      type: `boundary.${edge}`,
      message: `Boundary tile (${x}, ${y}) on the ${edge} edge is open`,
      severity: "error",
      position: { x, y },
    });
  };

  for (let x = 0; x < grid.width; x++) {
    if (grid.getUnsafe(x, 0) !== Tile.WALL) breach(x, 0, "top");
    const floor = grid.getUnsafe(x, bottom);
    if (floor !== Tile.WALL && floor !== Tile.HAZARD) breach(x, bottom, "bottom");
  }
  for (let y = 0; y < grid.height; y++) {
    if (grid.getUnsafe(0, y) !== Tile.WALL) breach(0, y, "left");
    if (grid.getUnsafe(grid.width - 1, y) !== Tile.WALL) {
      breach(grid.width - 1, y, "right");
    }
  }

  return toCheckResult(violations);
}

/**
 * Start to trophy, then trophy to exit. The second leg is only searched
 * once the trophy is known to be reachable. Levels missing either
 * landmark pass here; `checkLandmarkSupport` reports them. On a grid
 * holding several of either, the last one in row-major order is used.
 */
export function checkReachability(
  grid: ReadonlyTileGrid,
  start: StartPosition,
  envelope: JumpEnvelope = DEFAULT_JUMP_ENVELOPE,
): CheckResult {
  const trophy = grid.findAll(Tile.TROPHY).at(-1);
  const exit = grid.findAll(Tile.EXIT).at(-1);
  if (!trophy || !exit) return toCheckResult([]);

  const violations: Violation[] = [];
  if (!isReachable(grid, startTile(start), trophy, envelope)) {
    violations.push({
      type: "reachability.trophy",
      message: `Trophy at (${trophy.x}, ${trophy.y}) is not reachable from the start`,
      severity: "error",
      position: trophy,
    });
  } else if (!isReachable(grid, trophy, exit, envelope)) {
    violations.push({
      type: "reachability.exit",
      message: `Exit at (${exit.x}, ${exit.y}) is not reachable from the trophy`,
      severity: "error",
      position: exit,
    });
  }

  return toCheckResult(violations);
}

/**
 * Floating diamonds are reported as warnings.
 */
export function checkDiamondSupport(grid: ReadonlyTileGrid): CheckResult {
  const violations = grid
    .findAll(Tile.DIAMOND)
    .filter((position) => !hasWallBelow(grid, position))
    .map((position): Violation => ({
      type: "diamond.support",
      message: `Diamond at (${position.x}, ${position.y}) is floating`,
      severity: "warning",
      position,
    }));

  return toCheckResult(violations);
}
