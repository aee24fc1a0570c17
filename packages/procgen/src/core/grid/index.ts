/**
 * Grid module - tile grid storage and queries.
 */

export { TILE_SYMBOLS, TileGrid } from "./grid";
export * from "./types";
