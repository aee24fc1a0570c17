/**
 * Hazard Density
 *
 * Sliding-window veto shared by floor and platform hazard placement, and
 * the greedy left-to-right scanner both passes use.
 */

import type { HazardRules, LcgRandom } from "@levelforge/contracts";
import { NO_HAZARD_YET } from "../../core/constants";
import {
  Tile,
  type MutableTileGrid,
  type ReadonlyTileGrid,
} from "../../core/grid";

/**
 * Contiguous run of hazard columns on one row.
 */
export interface HazardBlock {
  readonly start: number;
  readonly size: number;
}

export type DensityRules = Pick<HazardRules, "densityWindow" | "maxPerWindow">;

/**
 * Whether placing `block` on `row` would push any window of
 * `densityWindow` columns overlapping the block past `maxPerWindow`
 * hazards. Columns inside the block count as hazards.
 */
export function wouldExceedDensity(
  grid: ReadonlyTileGrid,
  row: number,
  block: HazardBlock,
  rules: DensityRules,
): boolean {
  const blockEnd = block.start + block.size;
  const firstWindow = Math.max(blockEnd - rules.densityWindow, 0);

  for (let ws = firstWindow; ws <= block.start; ws++) {
    const windowEnd = Math.min(ws + rules.densityWindow, grid.width);
    let count = 0;
    for (let c = ws; c < windowEnd; c++) {
      if (
        (c >= block.start && c < blockEnd) ||
        grid.getUnsafe(c, row) === Tile.HAZARD
      ) {
        count++;
      }
    }
    if (count > rules.maxPerWindow) {
      return true;
    }
  }
  return false;
}

/**
 * One greedy hazard scan over a row.
 *
 * `row` receives the hazard tiles; `isEligible` decides, per column,
 * whether a block may start or extend there.
 */
export interface HazardScan {
  readonly row: number;
  readonly from: number;
  readonly to: number;
  readonly chance: number;
  readonly isEligible: (x: number) => boolean;
}

export interface HazardScanResult {
  readonly placed: HazardBlock[];
  readonly vetoed: HazardBlock[];
}

/**
 * Walk columns left to right, rolling `chance` percent at each eligible
 * column that keeps `minGap` free tiles after the previous block. A
 * successful roll draws a block of 1 to `maxRun` tiles, truncated at the
 * first ineligible column, then subjected to the density veto.
 */
export function scanHazards(
  grid: MutableTileGrid,
  rng: LcgRandom,
  scan: HazardScan,
  rules: HazardRules,
): HazardScanResult {
  const placed: HazardBlock[] = [];
  const vetoed: HazardBlock[] = [];
  let lastEnd = NO_HAZARD_YET;

  for (let x = scan.from; x < scan.to; x++) {
    if (!scan.isEligible(x) || x - lastEnd < rules.minGap + 1) continue;
    if (rng.range(0, 100) >= scan.chance) continue;

    const wanted = 1 + rng.range(0, rules.maxRun);
    let size = 0;
    while (size < wanted && scan.isEligible(x + size)) {
      size++;
    }

    const block = { start: x, size };
    if (wouldExceedDensity(grid, scan.row, block, rules)) {
      vetoed.push(block);
      continue;
    }

    grid.fillRow(scan.row, x, x + size, Tile.HAZARD);
    lastEnd = x + size - 1;
    placed.push(block);
  }

  return { placed, vetoed };
}
