/**
 * Grid types for level generation.
 */

/**
 * Tile types for level grids
 */
export const Tile = {
  EMPTY: 0,
  WALL: 1,
  TROPHY: 2,
  EXIT: 3,
  HAZARD: 4,
  DIAMOND: 5,
} as const;

export type Tile = (typeof Tile)[keyof typeof Tile];

/**
 * Integer tile coordinate: `x` is the column, `y` the row (0 at the top).
 */
export interface TilePoint {
  readonly x: number;
  readonly y: number;
}

/**
 * Player start in tile units. The start tile is `(floor(x), floor(y))`.
 */
export interface StartPosition {
  readonly x: number;
  readonly y: number;
}

// =============================================================================
// GRID INTERFACES
// =============================================================================

/**
 * Read-only grid interface.
 *
 * Checks and the reachability search accept this type so they cannot
 * mutate the level they inspect.
 */
export interface ReadonlyTileGrid {
  readonly width: number;
  readonly height: number;

  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): Tile;
  getUnsafe(x: number, y: number): Tile;
  getRow(y: number): Tile[];
  findAll(tile: Tile): TilePoint[];
  countTiles(tile: Tile): number;
  countInRow(y: number, from: number, to: number, tile: Tile): number;
  equals(other: ReadonlyTileGrid): boolean;
  clone(): MutableTileGrid;
  toRows(): string[];
}

/**
 * Mutable grid interface. Generation passes mutate the grid in place.
 */
export interface MutableTileGrid extends ReadonlyTileGrid {
  set(x: number, y: number, tile: Tile): void;
  setUnsafe(x: number, y: number, tile: Tile): void;
  fillRow(y: number, from: number, to: number, tile: Tile): void;
}
