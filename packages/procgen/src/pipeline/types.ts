/**
 * Pipeline Types
 *
 * Typed artifacts and passes for the level generation pipeline.
 */

import type { LcgRandom, LevelGenConfig } from "@levelforge/contracts";
import type {
  MutableTileGrid,
  ReadonlyTileGrid,
  StartPosition,
  TilePoint,
} from "../core/grid/types";

// =============================================================================
// ARTIFACTS - Typed intermediate and final data products
// =============================================================================

/**
 * Base artifact interface. All artifacts have a type discriminant and unique ID.
 */
export interface Artifact<T extends string = string> {
  readonly type: T;
  readonly id: string;
}

/**
 * Empty artifact - starting point for pipelines
 */
export interface EmptyArtifact extends Artifact<"empty"> {
  readonly type: "empty";
}

/**
 * Platform layout strategy, chosen by seed parity
 */
export type Archetype = "zig-zag" | "floating-islands";

/**
 * Column boundaries recorded while laying out platform tiers.
 * Trophy, exit and hazard placement key off these.
 */
export interface Landmarks {
  /** Start of the representative run on tier 16 */
  readonly firstTierStart: number;
  /** End (exclusive) of the representative run on tier 16 */
  readonly firstTierEnd: number;
  /** Start of the representative run on tier 12 */
  readonly secondTierStart: number;
  /** End (exclusive) of the representative run on tier 8 */
  readonly thirdTierEnd: number;
  /** Start of the representative run on tier 4 */
  readonly topTierStart: number;
}

/**
 * Grid with boundaries and the base platform stamped
 */
export interface LevelStateArtifact extends Artifact<"level-state"> {
  readonly type: "level-state";
  readonly levelNum: number;
  readonly grid: MutableTileGrid;
  readonly start: StartPosition;
}

/**
 * Level state after the platform tiers are laid out
 */
export interface LayoutArtifact extends Omit<LevelStateArtifact, "type"> {
  readonly type: "layout";
  readonly archetype: Archetype;
  readonly landmarks: Landmarks;
}

/**
 * Layout with trophy and exit placed. Content and hazard passes
 * decorate this artifact in place.
 */
export interface PopulatedArtifact extends Omit<LayoutArtifact, "type"> {
  readonly type: "populated";
  readonly trophy: TilePoint;
  readonly exit: TilePoint;
}

/**
 * Final generation result
 */
export interface LevelArtifact extends Artifact<"level"> {
  readonly type: "level";
  readonly levelNum: number;
  readonly grid: ReadonlyTileGrid;
  readonly start: StartPosition;
  readonly archetype: Archetype;
  readonly landmarks: Landmarks;
  readonly trophy: TilePoint;
  readonly exit: TilePoint;
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validation violation
 */
export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: "error" | "warning";
  /** Offending tile, when the rule points at one */
  readonly position?: TilePoint;
}

// =============================================================================
// TRACING
// =============================================================================

interface TraceEventBase {
  /** Milliseconds since the run started */
  readonly timestamp: number;
  readonly passId: string;
}

export interface PassStartEvent extends TraceEventBase {
  readonly eventType: "start";
}

export interface PassEndEvent extends TraceEventBase {
  readonly eventType: "end";
  readonly durationMs: number;
}

/**
 * A random choice a pass made, with the options it chose from
 */
export interface DecisionEvent extends TraceEventBase {
  readonly eventType: "decision";
  readonly question: string;
  readonly options: readonly unknown[];
  readonly chosen: unknown;
  readonly reason: string;
}

export interface WarningEvent extends TraceEventBase {
  readonly eventType: "warning";
  readonly message: string;
}

export type TraceEvent =
  | PassStartEvent
  | PassEndEvent
  | DecisionEvent
  | WarningEvent;

/**
 * Trace handle bound to the running pass. Calls are dropped when tracing
 * is off.
 */
export interface PassTrace {
  decision(
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(message: string): void;
}

// =============================================================================
// PASSES
// =============================================================================

/**
 * Context handed to every pass. All passes draw from the same stream, so
 * pass order fixes the sequence of random values each one sees.
 */
export interface PassContext {
  readonly levelNum: number;
  readonly rng: LcgRandom;
  readonly config: LevelGenConfig;
  readonly trace: PassTrace;
}

/**
 * A single generation step transforming one artifact into the next
 */
export interface Pass<TIn extends Artifact, TOut extends Artifact> {
  readonly id: string;
  readonly inputType: TIn["type"];
  readonly outputType: TOut["type"];
  run(input: TIn, ctx: PassContext): TOut;
}

// =============================================================================
// PIPELINE
// =============================================================================

export interface PipelineResult<T extends Artifact> {
  readonly artifact: T;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

export interface Pipeline<TStart extends Artifact, TEnd extends Artifact> {
  readonly id: string;
  readonly passIds: readonly string[];
  run(input: TStart, levelNum: number): PipelineResult<TEnd>;
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

/**
 * Create an empty artifact
 */
export function createEmptyArtifact(): EmptyArtifact {
  return { type: "empty", id: "empty" };
}
