/**
 * Layout Platforms Pass
 *
 * Picks the archetype from the level number and stamps the four
 * platform tiers.
 */

import { TIER_ROWS } from "../../core/constants";
import type {
  LayoutArtifact,
  Landmarks,
  LevelStateArtifact,
  Pass,
} from "../../pipeline/types";
import {
  archetypeForLevel,
  layoutIslands,
  layoutZigZag,
  resolveIslandLandmarks,
} from "./archetypes";

export function layoutPlatforms(): Pass<LevelStateArtifact, LayoutArtifact> {
  return {
    id: "layout.platforms",
    inputType: "level-state",
    outputType: "layout",
    run(input, ctx) {
      const archetype = archetypeForLevel(ctx.levelNum);

      ctx.trace.decision(
        "Platform archetype",
        ["zig-zag", "floating-islands"],
        archetype,
        `Level ${ctx.levelNum} is ${ctx.levelNum % 2 !== 0 ? "odd" : "even"}`,
      );

      let landmarks: Landmarks;
      if (archetype === "zig-zag") {
        landmarks = layoutZigZag(input.grid, ctx.rng);
      } else {
        const firstIslands = layoutIslands(
          input.grid,
          ctx.rng,
          ctx.config.islandsPerTier,
        );
        landmarks = resolveIslandLandmarks(firstIslands);

        if (firstIslands.size < TIER_ROWS.length) {
          ctx.trace.warning(
            `${TIER_ROWS.length - firstIslands.size} tier(s) drew no island; using fallback landmarks`,
          );
        }
      }

      ctx.trace.decision(
        "Landmark columns",
        [],
        landmarks,
        `${archetype} layout`,
      );

      return {
        ...input,
        type: "layout",
        id: "layout",
        archetype,
        landmarks,
      };
    },
  };
}
