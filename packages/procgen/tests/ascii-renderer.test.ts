/**
 * ASCII renderer tests
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { TileGrid } from "../src/core/grid";
import {
  DOTTED_CHARSET,
  printLevel,
  renderLevel,
} from "../src/utils/ascii-renderer";

const level = {
  levelNum: 3,
  grid: TileGrid.fromRows([
    "#####",
    "#*.E#",
    "#^+.#",
    "#####",
  ]),
  start: { x: 1.2, y: 2.9 },
};

describe("renderLevel", () => {
  it("renders a header, tiles and the player marker", () => {
    expect(renderLevel(level)).toBe(
      ["--- Level 3 ---", "#####", "#* E#", "#D+ #", "#####"].join("\n"),
    );
  });

  it("renders the plain dotted form", () => {
    expect(
      renderLevel(level, {
        charset: DOTTED_CHARSET,
        header: false,
        showPlayer: false,
      }),
    ).toBe(["#####", "#*.E#", "#^+.#", "#####"].join("\n"));
  });

  it("colors tiles with ANSI codes", () => {
    const lines = renderLevel(level, { useColors: true }).split("\n");
    expect(lines[1]).toBe("\x1b[34m#\x1b[0m".repeat(5));
    expect(lines[3]).toBe(
      "\x1b[34m#\x1b[0m" +
        "\x1b[1m\x1b[36mD\x1b[0m" +
        "\x1b[35m+\x1b[0m" +
        " " +
        "\x1b[34m#\x1b[0m",
    );
  });

  it("omits the header for levels without a number", () => {
    const { grid } = level;
    expect(renderLevel({ grid }).split("\n")[0]).toBe("#####");
  });
});

describe("printLevel", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes the rendered level to the console in one call", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    printLevel(level, { charset: DOTTED_CHARSET, showPlayer: false });
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      ["--- Level 3 ---", "#####", "#*.E#", "#^+.#", "#####"].join("\n"),
    );
  });
});
