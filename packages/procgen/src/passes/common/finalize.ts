/**
 * Finalize Level Pass
 *
 * Freezes the populated state into the public level artifact.
 */

import type {
  LevelArtifact,
  Pass,
  PopulatedArtifact,
} from "../../pipeline/types";

export function finalizeLevel(): Pass<PopulatedArtifact, LevelArtifact> {
  return {
    id: "common.finalize",
    inputType: "populated",
    outputType: "level",
    run(input) {
      return {
        type: "level",
        id: `level-${input.levelNum}`,
        levelNum: input.levelNum,
        grid: input.grid,
        start: input.start,
        archetype: input.archetype,
        landmarks: input.landmarks,
        trophy: input.trophy,
        exit: input.exit,
      };
    },
  };
}
