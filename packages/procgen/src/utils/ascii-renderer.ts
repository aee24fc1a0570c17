/**
 * ASCII Level Renderer
 *
 * Renders levels as text for terminals and debugging.
 *
 * @example
 * ```typescript
 * import { generateLevel, renderLevel } from "@levelforge/procgen";
 *
 * console.log(renderLevel(generateLevel(3), { useColors: true }));
 * ```
 */

import { Tile, type ReadonlyTileGrid, type StartPosition } from "../core/grid";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Character mapping for tiles and the player marker
 */
export interface LevelCharset {
  readonly empty: string;
  readonly wall: string;
  readonly trophy: string;
  readonly exit: string;
  readonly hazard: string;
  readonly diamond: string;
  readonly player: string;
}

export const DEFAULT_CHARSET: LevelCharset = {
  empty: " ",
  wall: "#",
  trophy: "*",
  exit: "E",
  hazard: "^",
  diamond: "+",
  player: "D",
};

/**
 * Matches `TileGrid.toRows()`, so output can be pasted into
 * `TileGrid.fromRows()` fixtures once the player marker is removed.
 */
export const DOTTED_CHARSET: LevelCharset = {
  ...DEFAULT_CHARSET,
  empty: ".",
};

export interface RenderOptions {
  readonly charset?: LevelCharset;
  /** Color output (ANSI escape codes) */
  readonly useColors?: boolean;
  /** Draw the player marker at the start tile */
  readonly showPlayer?: boolean;
  /** Prefix a `--- Level N ---` header line */
  readonly header?: boolean;
}

export interface RenderableLevel {
  readonly levelNum?: number;
  readonly grid: ReadonlyTileGrid;
  readonly start?: StartPosition;
}

// =============================================================================
// ANSI COLOR CODES
// =============================================================================

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
} as const;

function colorize(text: string, ...codes: string[]): string {
  return codes.join("") + text + ANSI.reset;
}

const TILE_STYLES: Record<
  Tile,
  { readonly key: keyof LevelCharset; readonly codes: readonly string[] }
> = {
  [Tile.EMPTY]: { key: "empty", codes: [] },
  [Tile.WALL]: { key: "wall", codes: [ANSI.blue] },
  [Tile.TROPHY]: { key: "trophy", codes: [ANSI.bold, ANSI.yellow] },
  [Tile.EXIT]: { key: "exit", codes: [ANSI.bold, ANSI.green] },
  [Tile.HAZARD]: { key: "hazard", codes: [ANSI.red] },
  [Tile.DIAMOND]: { key: "diamond", codes: [ANSI.magenta] },
};

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Render a level, one text line per grid row.
 */
export function renderLevel(
  level: RenderableLevel,
  options: RenderOptions = {},
): string {
  const {
    charset = DEFAULT_CHARSET,
    useColors = false,
    showPlayer = true,
    header = true,
  } = options;
  const { grid, start } = level;

  const playerX = start ? Math.floor(start.x) : -1;
  const playerY = start ? Math.floor(start.y) : -1;

  const lines: string[] = [];
  if (header && level.levelNum !== undefined) {
    lines.push(`--- Level ${level.levelNum} ---`);
  }

  for (let y = 0; y < grid.height; y++) {
    let line = "";
    for (let x = 0; x < grid.width; x++) {
      if (showPlayer && x === playerX && y === playerY) {
        line += useColors
          ? colorize(charset.player, ANSI.bold, ANSI.cyan)
          : charset.player;
        continue;
      }

      const style = TILE_STYLES[grid.getUnsafe(x, y)];
      const char = charset[style.key];
      line += useColors && style.codes.length > 0
        ? colorize(char, ...style.codes)
        : char;
    }
    lines.push(line);
  }

  return lines.join("\n");
}

/**
 * Print a level to the console
 */
export function printLevel(
  level: RenderableLevel,
  options: RenderOptions = {},
): void {
  console.log(renderLevel(level, options));
}
