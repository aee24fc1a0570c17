/**
 * TileGrid unit tests
 */

import { describe, expect, it } from "vitest";
import { Tile, TileGrid } from "../src/core/grid";

describe("TileGrid", () => {
  it("starts empty", () => {
    const grid = new TileGrid(4, 3);
    expect(grid.countTiles(Tile.EMPTY)).toBe(12);
    expect(grid.toRows()).toEqual(["....", "....", "...."]);
  });

  it("rejects non-positive dimensions", () => {
    expect(() => new TileGrid(0, 3)).toThrow("Invalid grid dimensions: 0x3");
  });

  it("treats out-of-bounds reads as walls", () => {
    const grid = new TileGrid(3, 3);
    expect(grid.get(-1, 0)).toBe(Tile.WALL);
    expect(grid.get(0, 3)).toBe(Tile.WALL);
    expect(grid.get(1, 1)).toBe(Tile.EMPTY);
  });

  it("ignores out-of-bounds writes", () => {
    const grid = new TileGrid(3, 3);
    grid.set(5, 5, Tile.HAZARD);
    expect(grid.countTiles(Tile.HAZARD)).toBe(0);
  });

  it("clips fillRow to the grid", () => {
    const grid = new TileGrid(6, 2);
    grid.fillRow(1, -2, 3, Tile.WALL);
    grid.fillRow(0, 4, 99, Tile.HAZARD);
    expect(grid.toRows()).toEqual(["....^^", "###..."]);
  });

  it("counts tiles within a row span", () => {
    const grid = TileGrid.fromRows(["#^^.^#"]);
    expect(grid.countInRow(0, 0, 6, Tile.HAZARD)).toBe(3);
    expect(grid.countInRow(0, 2, 4, Tile.HAZARD)).toBe(1);
  });

  it("finds tiles in row-major order", () => {
    const grid = TileGrid.fromRows(["..+", "+..", ".+."]);
    expect(grid.findAll(Tile.DIAMOND)).toEqual([
      { x: 2, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 2 },
    ]);
    expect(grid.findAll(Tile.EXIT)).toEqual([]);
  });

  it("parses every tile symbol and treats spaces as empty", () => {
    const grid = TileGrid.fromRows(["#*E^+ ."]);
    expect(grid.getRow(0)).toEqual([
      Tile.WALL,
      Tile.TROPHY,
      Tile.EXIT,
      Tile.HAZARD,
      Tile.DIAMOND,
      Tile.EMPTY,
      Tile.EMPTY,
    ]);
  });

  it("rejects ragged rows and unknown symbols", () => {
    expect(() => TileGrid.fromRows(["###", "##"])).toThrow();
    expect(() => TileGrid.fromRows(["#?#"])).toThrow();
  });

  it("clones independently", () => {
    const grid = TileGrid.fromRows(["#.#"]);
    const copy = grid.clone();
    copy.set(1, 0, Tile.EXIT);
    expect(grid.get(1, 0)).toBe(Tile.EMPTY);
    expect(copy.get(1, 0)).toBe(Tile.EXIT);
    expect(grid.equals(copy)).toBe(false);
    expect(grid.equals(grid.clone())).toBe(true);
  });
});
