/**
 * Diamonds Pass
 *
 * Scatters collectibles on tier platforms. Attempts landing on a gap or
 * an occupied tile are dropped, so a level holds at most
 * `DIAMOND_ATTEMPTS` diamonds.
 */

import { DIAMOND_ATTEMPTS, TIER_ROWS } from "../../core/constants";
import { Tile } from "../../core/grid";
import type { Pass, PopulatedArtifact } from "../../pipeline/types";

const DIAMOND_MIN_X = 2;

export function placeDiamonds(): Pass<PopulatedArtifact, PopulatedArtifact> {
  return {
    id: "content.diamonds",
    inputType: "populated",
    outputType: "populated",
    run(input, ctx) {
      const { grid } = input;
      let placed = 0;

      for (let attempt = 0; attempt < DIAMOND_ATTEMPTS; attempt++) {
        const tier = ctx.rng.choice(TIER_ROWS);
        const x = ctx.rng.range(DIAMOND_MIN_X, grid.width - 2);

        if (
          grid.get(x, tier) === Tile.WALL &&
          grid.get(x, tier - 1) === Tile.EMPTY
        ) {
          grid.set(x, tier - 1, Tile.DIAMOND);
          placed++;
        }
      }

      ctx.trace.decision(
        "Diamonds placed",
        [],
        placed,
        `${DIAMOND_ATTEMPTS - placed} attempt(s) hit a gap or occupied tile`,
      );

      return input;
    },
  };
}
