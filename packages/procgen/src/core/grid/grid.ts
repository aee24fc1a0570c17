/**
 * Tile grid backed by flat Uint8Array storage.
 */

import {
  type MutableTileGrid,
  type ReadonlyTileGrid,
  Tile,
  type TilePoint,
} from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * One-character symbols used by `toRows()` and `TileGrid.fromRows()`.
 */
export const TILE_SYMBOLS: Readonly<Record<Tile, string>> = {
  [Tile.EMPTY]: ".",
  [Tile.WALL]: "#",
  [Tile.TROPHY]: "*",
  [Tile.EXIT]: "E",
  [Tile.HAZARD]: "^",
  [Tile.DIAMOND]: "+",
};

const SYMBOL_TILES: ReadonlyMap<string, Tile> = new Map<string, Tile>([
  [".", Tile.EMPTY],
  [" ", Tile.EMPTY],
  ["#", Tile.WALL],
  ["*", Tile.TROPHY],
  ["E", Tile.EXIT],
  ["^", Tile.HAZARD],
  ["+", Tile.DIAMOND],
]);

/**
 * 2D tile grid indexed by (x, y) = (column, row).
 *
 * @remarks
 * The grid is internally mutable so passes can stamp tiles in place. Hand
 * a `ReadonlyTileGrid` to code that should only inspect it.
 */
export class TileGrid implements MutableTileGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  constructor(width: number, height: number, initialValue: Tile = Tile.EMPTY) {
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);

    if (initialValue !== Tile.EMPTY) {
      this.data.fill(initialValue);
    }
  }

  /**
   * Build a grid from one string per row using `TILE_SYMBOLS`
   * (space is also read as empty). Every row must have the same length.
   *
   * @example
   * ```typescript
   * const grid = TileGrid.fromRows([
   *   "#####",
   *   "#.*.#",
   *   "#####",
   * ]);
   * ```
   */
  static fromRows(rows: readonly string[]): TileGrid {
    const width = rows[0]?.length ?? 0;
    const grid = new TileGrid(width, rows.length);

    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new Error(
          `Row ${y} has length ${row.length}, expected ${width}`,
        );
      }
      for (let x = 0; x < width; x++) {
        const symbol = row.charAt(x);
        const tile = SYMBOL_TILES.get(symbol);
        if (tile === undefined) {
          throw new Error(`Unknown tile symbol '${symbol}' at (${x}, ${y})`);
        }
        grid.setUnsafe(x, y, tile);
      }
    });

    return grid;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Get tile with bounds checking (returns WALL for out of bounds)
   */
  get(x: number, y: number): Tile {
    if (!this.isInBounds(x, y)) return Tile.WALL;
    return this.getUnsafe(x, y);
  }

  /**
   * Set tile with bounds checking; out-of-bounds writes are dropped
   */
  set(x: number, y: number, tile: Tile): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `TileGrid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = tile;
  }

  /**
   * Unsafe get (no bounds check) - use only when bounds are guaranteed
   */
  getUnsafe(x: number, y: number): Tile {
    return (this.data[y * this.width + x] ?? Tile.WALL) as Tile;
  }

  /**
   * Unsafe set (no bounds check) - use only when bounds are guaranteed
   */
  setUnsafe(x: number, y: number, tile: Tile): void {
    this.data[y * this.width + x] = tile;
  }

  // ===========================================================================
  // ROW OPERATIONS
  // ===========================================================================

  /**
   * Fill columns [from, to) of row y, clipped to the grid
   */
  fillRow(y: number, from: number, to: number, tile: Tile): void {
    if (y < 0 || y >= this.height) return;
    const start = Math.max(0, from);
    const end = Math.min(to, this.width);
    if (start >= end) return;
    const offset = y * this.width;
    this.data.fill(tile, offset + start, offset + end);
  }

  /**
   * Count tiles of a type in columns [from, to) of row y
   */
  countInRow(y: number, from: number, to: number, tile: Tile): number {
    if (y < 0 || y >= this.height) return 0;
    let count = 0;
    const end = Math.min(to, this.width);
    for (let x = Math.max(0, from); x < end; x++) {
      if (this.getUnsafe(x, y) === tile) count++;
    }
    return count;
  }

  getRow(y: number): Tile[] {
    const row: Tile[] = [];
    if (y < 0 || y >= this.height) return row;
    for (let x = 0; x < this.width; x++) {
      row.push(this.getUnsafe(x, y));
    }
    return row;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * All positions holding a tile, in row-major order
   */
  findAll(tile: Tile): TilePoint[] {
    const points: TilePoint[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.getUnsafe(x, y) === tile) points.push({ x, y });
      }
    }
    return points;
  }

  countTiles(tile: Tile): number {
    let count = 0;
    for (const value of this.data) {
      if (value === tile) count++;
    }
    return count;
  }

  equals(other: ReadonlyTileGrid): boolean {
    if (other.width !== this.width || other.height !== this.height) {
      return false;
    }
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (other.getUnsafe(x, y) !== this.getUnsafe(x, y)) return false;
      }
    }
    return true;
  }

  clone(): TileGrid {
    const copy = new TileGrid(this.width, this.height);
    copy.data.set(this.data);
    return copy;
  }

  /**
   * One string per row using `TILE_SYMBOLS`
   */
  toRows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let row = "";
      for (let x = 0; x < this.width; x++) {
        row += TILE_SYMBOLS[this.getUnsafe(x, y)];
      }
      rows.push(row);
    }
    return rows;
  }
}
