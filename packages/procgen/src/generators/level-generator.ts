/**
 * Platformer Level Generator
 *
 * Assembles the generation passes into a pipeline. All passes share one
 * PRNG stream seeded from the level number, so a level is a pure function
 * of its number and the configuration.
 */

import {
  buildLevelGenConfig,
  type LevelGenConfig,
  type LevelGenConfigInput,
  parseLevelSeed,
} from "@levelforge/contracts";
import {
  finalizeLevel,
  initializeLevel,
  layoutPlatforms,
  placeDiamonds,
  placeFloorHazards,
  placePlatformHazards,
  placeTrophyAndExit,
} from "../passes";
import { PipelineBuilder } from "../pipeline/builder";
import {
  createEmptyArtifact,
  type EmptyArtifact,
  type LevelArtifact,
  type Pipeline,
  type PipelineResult,
} from "../pipeline/types";

/**
 * A generated level: grid, player start, and the landmarks it was built
 * around.
 */
export type GeneratedLevel = LevelArtifact;

export function createLevelPipeline(
  config: LevelGenConfig,
): Pipeline<EmptyArtifact, LevelArtifact> {
  return PipelineBuilder.create<EmptyArtifact>("platformer-level", config)
    .pipe(initializeLevel())
    .pipe(layoutPlatforms())
    .pipe(placeTrophyAndExit())
    .pipe(placeDiamonds())
    .pipe(placeFloorHazards())
    .pipe(placePlatformHazards())
    .pipe(finalizeLevel())
    .build();
}

/**
 * Generator bound to one validated configuration. Build it once and call
 * `generate` per seed when producing many levels.
 */
export class LevelGenerator {
  private readonly pipeline: Pipeline<EmptyArtifact, LevelArtifact>;

  private constructor(readonly config: LevelGenConfig) {
    this.pipeline = createLevelPipeline(config);
  }

  /**
   * @throws {LevelGenError} CONFIG_INVALID when the configuration does not
   * pass schema validation
   */
  static create(config: LevelGenConfigInput = {}): LevelGenerator {
    return new LevelGenerator(buildLevelGenConfig(config).getOrThrow());
  }

  /**
   * Run the pipeline and keep the trace and timing alongside the level.
   *
   * @throws {LevelGenError} SEED_INVALID when `levelNum` is not a uint32
   */
  run(levelNum: number): PipelineResult<LevelArtifact> {
    const seed = parseLevelSeed(levelNum).getOrThrow();
    return this.pipeline.run(createEmptyArtifact(), seed);
  }

  generate(levelNum: number): GeneratedLevel {
    return this.run(levelNum).artifact;
  }
}

/**
 * Generate a single level.
 *
 * @example
 * ```typescript
 * const level = generateLevel(7);
 * level.archetype; // "zig-zag"
 * level.grid.toRows()[4];
 * ```
 */
export function generateLevel(
  levelNum: number,
  config?: LevelGenConfigInput,
): GeneratedLevel {
  return LevelGenerator.create(config).generate(levelNum);
}
