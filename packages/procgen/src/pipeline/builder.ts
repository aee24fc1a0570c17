/**
 * Type-safe pipeline builder DSL.
 *
 * Allows composing passes into pipelines with compile-time type checking
 * of artifact flow.
 */

import { LcgRandom, type LevelGenConfig } from "@levelforge/contracts";
import { TraceRecorder } from "./trace";
import type {
  Artifact,
  Pass,
  PassContext,
  Pipeline,
  PipelineResult,
} from "./types";

/**
 * Passes are stored type-erased; `pipe()` has already checked that each
 * pass accepts the previous pass's output.
 */
type AnyPass = Pass<Artifact, Artifact>;

class LevelPipeline<TStart extends Artifact, TEnd extends Artifact>
  implements Pipeline<TStart, TEnd>
{
  readonly passIds: readonly string[];

  constructor(
    readonly id: string,
    private readonly config: LevelGenConfig,
    private readonly passes: readonly AnyPass[],
  ) {
    this.passIds = passes.map((pass) => pass.id);
  }

  run(input: TStart, levelNum: number): PipelineResult<TEnd> {
    const startTime = performance.now();
    const trace = new TraceRecorder(this.config.trace);
    const rng = new LcgRandom(levelNum);

    let current: Artifact = input;
    for (const pass of this.passes) {
      if (current.type !== pass.inputType) {
        throw new Error(
          `Pipeline ${this.id}: pass ${pass.id} expects '${pass.inputType}' but received '${current.type}'`,
        );
      }

      const ctx: PassContext = {
        levelNum,
        rng,
        config: this.config,
        trace: trace.forPass(pass.id),
      };

      trace.passStarted(pass.id);
      const passStart = performance.now();
      current = pass.run(current, ctx);
      trace.passEnded(pass.id, performance.now() - passStart);
    }

    return {
      artifact: current as TEnd,
      trace: trace.getEvents(),
      durationMs: performance.now() - startTime,
    };
  }
}

/**
 * Fluent builder; each `pipe()` narrows the artifact type flowing out of
 * the pipeline.
 *
 * @example
 * ```typescript
 * const pipeline = PipelineBuilder.create<EmptyArtifact>("level", config)
 *   .pipe(initializeLevel())
 *   .pipe(layoutPlatforms())
 *   .build();
 * const { artifact } = pipeline.run(createEmptyArtifact(), 7);
 * ```
 */
export class PipelineBuilder<TStart extends Artifact, TCurrent extends Artifact> {
  private constructor(
    private readonly id: string,
    private readonly config: LevelGenConfig,
    private readonly passes: readonly AnyPass[],
  ) {}

  static create<TStart extends Artifact>(
    id: string,
    config: LevelGenConfig,
  ): PipelineBuilder<TStart, TStart> {
    return new PipelineBuilder<TStart, TStart>(id, config, []);
  }

  pipe<TNext extends Artifact>(
    pass: Pass<TCurrent, TNext>,
  ): PipelineBuilder<TStart, TNext> {
    return new PipelineBuilder<TStart, TNext>(this.id, this.config, [
      ...this.passes,
      pass,
    ]);
  }

  build(): Pipeline<TStart, TCurrent> {
    return new LevelPipeline<TStart, TCurrent>(
      this.id,
      this.config,
      this.passes,
    );
  }
}
