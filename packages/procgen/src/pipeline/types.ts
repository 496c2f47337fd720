/**
 * Pipeline Types
 *
 * Passes, artifacts and tracing for layout generation.
 */

import type {
  AreaTemplate,
  GenerationWarning,
  SeededRandom,
} from "@wyrmhold/contracts";
import type { Point, Rect } from "../core/geometry/types";
import type { Grid } from "../core/grid/grid";
import type { Corridor } from "../model/corridor";
import type { RoomShape } from "../model/room";

// =============================================================================
// TRACE TYPES
// =============================================================================

/**
 * What a pass chose, keyed by `kind`. Recorded only when tracing is on.
 */
export type GenerationDecision =
  | {
      readonly kind: "split";
      readonly node: Rect;
      /** "x" cuts the width, "y" the height */
      readonly axis: "x" | "y";
      readonly at: number;
      /** Square nodes draw their axis; others cut the longer side */
      readonly drawn: boolean;
    }
  | {
      readonly kind: "rooms-placed";
      readonly leaves: number;
      readonly rooms: number;
    }
  | {
      readonly kind: "cave-kept";
      /** Zero-based; attempt k > 0 ran on `rng.derive(k)` */
      readonly attempt: number;
      readonly caveSize: number;
      readonly minPlayableArea: number;
      readonly origin: Point;
    }
  | {
      readonly kind: "logical-rooms";
      readonly target: number;
      readonly rooms: number;
      readonly fallback: boolean;
    }
  | {
      readonly kind: "content-roles";
      readonly spawnRoomId: number;
      readonly bossRoomId: number;
      readonly roomCount: number;
    };

export type GenerationDecisionKind = GenerationDecision["kind"];

interface TraceEventBase {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  readonly passId: string;
}

export type TraceEvent =
  | (TraceEventBase & { readonly eventType: "start" })
  | (TraceEventBase & { readonly eventType: "end"; readonly durationMs: number })
  | (TraceEventBase & {
      readonly eventType: "decision";
      readonly decision: GenerationDecision;
    })
  | (TraceEventBase & { readonly eventType: "warning"; readonly message: string });

export type TraceEventType = TraceEvent["eventType"];

/**
 * Trace collector interface
 */
export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  decision(passId: string, decision: GenerationDecision): void;
  warning(passId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}

// =============================================================================
// VIOLATIONS
// =============================================================================

export type ViolationSeverity = "error" | "warning";

/**
 * A broken rule found while validating parameters or a generated map
 */
export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: ViolationSeverity;
}

// =============================================================================
// ARTIFACTS
// =============================================================================

/**
 * Pipeline input: the map size to generate
 */
export interface EmptyArtifact {
  readonly type: "empty";
  readonly width: number;
  readonly height: number;
}

/**
 * Finished layout handed to map assembly
 */
export interface LayoutArtifact {
  readonly type: "layout";
  readonly grid: Grid;
  readonly rooms: readonly RoomShape[];
  readonly corridors: readonly Corridor[];
  readonly warnings: readonly GenerationWarning[];
}

export function createEmptyArtifact(
  width: number,
  height: number,
): EmptyArtifact {
  return { type: "empty", width, height };
}

// =============================================================================
// PASSES
// =============================================================================

/**
 * Context shared by every pass of one generation call
 */
export interface PassContext {
  /** The single random source of this generation call */
  readonly rng: SeededRandom;
  readonly trace: TraceCollector;
  readonly template: AreaTemplate;
}

/**
 * A pass transforms one artifact into the next.
 */
export interface Pass<TIn, TOut> {
  readonly id: string;
  run(input: TIn, ctx: PassContext): TOut;
}

/**
 * Outcome of a pipeline run
 */
export interface PipelineResult<T> {
  readonly artifact: T;
  readonly durationMs: number;
}

/**
 * An ordered, built chain of passes.
 * Errors thrown by a pass propagate to the caller unchanged.
 */
export interface Pipeline<TStart, TEnd> {
  readonly id: string;
  readonly passIds: readonly string[];
  run(input: TStart, ctx: PassContext): PipelineResult<TEnd>;
}
