/**
 * Graph Execution Engine Types
 *
 * Core types for the stage graph:
 * - Stages: named units of work that read the full state and emit a partial update
 * - Edges: one outgoing definition per stage, either static or router-driven
 * - Routes: labelled targets, optionally carrying a transition effect
 * - Graph configuration, progress events and execution results
 *
 * START and TERMINAL are pseudo-states; neither can be registered as a stage.
 */

import type { AnnotationRoot, StateFromAnnotation, StateUpdate } from "./annotation.ts";
import type { CheckpointStore } from "./checkpointer.ts";

// ============================================================================
// IDENTIFIERS
// ============================================================================

export type StageId = string;

/** Pseudo-state preceding the entry stage */
export const START = "__start__";

/** Pseudo-state ending a traversal */
export const TERMINAL = "__end__";

export type Terminal = typeof TERMINAL;

export function isPseudoState(id: string): boolean {
  return id === START || id === TERMINAL;
}

// ============================================================================
// STAGES
// ============================================================================

/**
 * Retry configuration for a stage whose `execute` throws.
 * A stage that throws on its last attempt ends the traversal as "failed".
 */
export interface RetryConfig {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay before the second attempt */
  backoffMs: number;
  backoffMultiplier: number;
  /** Return false to fail immediately for a given error */
  retryOn?: (error: Error) => boolean;
}

/**
 * Context passed to a stage.
 *
 * @template A - The state schema
 */
export interface StageContext<A extends AnnotationRoot> {
  /** Full, read-only state record */
  state: Readonly<StateFromAnnotation<A>>;
  sessionId: string;
  /** 1-based count of stage executions in this session */
  step: number;
  /** Attempt number of the current execution (1-based) */
  attempt: number;
}

/**
 * A named unit of work.
 *
 * @template A - The state schema
 */
export interface StageDefinition<A extends AnnotationRoot> {
  id: StageId;
  execute: (context: StageContext<A>) => Promise<StateUpdate<A>>;
  /** Fields this stage may write; checked at compile time and on every update */
  writes?: ReadonlyArray<keyof A & string>;
  retry?: Partial<RetryConfig>;
  description?: string;
}

// ============================================================================
// EDGES AND ROUTES
// ============================================================================

/**
 * Update merged into state when a route is taken, before the checkpoint is
 * written. The Retry Governor uses this to advance loop counters.
 */
export type TransitionEffect<A extends AnnotationRoot> = (
  state: Readonly<StateFromAnnotation<A>>,
) => StateUpdate<A>;

export type RouteTarget<A extends AnnotationRoot> =
  | StageId
  | { to: StageId; effect?: TransitionEffect<A> };

export type Router<A extends AnnotationRoot, L extends string = string> = (
  state: Readonly<StateFromAnnotation<A>>,
) => L;

export interface StaticEdge {
  kind: "static";
  from: StageId;
  to: StageId;
}

export interface ConditionalEdge<A extends AnnotationRoot> {
  kind: "conditional";
  from: StageId;
  router: Router<A>;
  /** Declared label set, in declaration order */
  routes: ReadonlyMap<string, RouteTarget<A>>;
}

export type Edge<A extends AnnotationRoot> = StaticEdge | ConditionalEdge<A>;

/**
 * Normalize a route target to its object form.
 */
export function resolveRouteTarget<A extends AnnotationRoot>(
  target: RouteTarget<A>,
): { to: StageId; effect?: TransitionEffect<A> } {
  return typeof target === "string" ? { to: target } : target;
}

// ============================================================================
// PROGRESS EVENTS
// ============================================================================

export type ProgressEvent =
  | { type: "session_started"; sessionId: string; stage: StageId; timestamp: string }
  | { type: "session_resumed"; sessionId: string; stage: StageId; seq: number; timestamp: string }
  | { type: "stage_started"; sessionId: string; stage: StageId; step: number; timestamp: string }
  | { type: "stage_completed"; sessionId: string; stage: StageId; step: number; timestamp: string }
  | {
      type: "stage_failed";
      sessionId: string;
      stage: StageId;
      step: number;
      error: string;
      timestamp: string;
    }
  | {
      type: "route_taken";
      sessionId: string;
      from: StageId;
      to: StageId;
      label?: string;
      timestamp: string;
    }
  | { type: "checkpoint_saved"; sessionId: string; seq: number; stage: StageId; timestamp: string };

// ============================================================================
// GRAPH
// ============================================================================

/**
 * What to do when resuming a session whose pointer is TERMINAL.
 * - "no-op": return the stored state without running any stage
 * - "reenter": run the last completed stage again, then route normally
 */
export type TerminalResumePolicy = "no-op" | "reenter";

export interface GraphConfig {
  /** Workflow name used in logs */
  name?: string;
  /** Checkpoint store; an in-memory store is used when omitted */
  checkpoints?: CheckpointStore;
  /** Maximum stage executions per `execute()` call */
  maxSteps?: number;
  terminalResumePolicy?: TerminalResumePolicy;
  onProgress?: (event: ProgressEvent) => void;
}

/**
 * A validated graph, ready for execution.
 *
 * @template A - The state schema
 */
export interface CompiledGraph<A extends AnnotationRoot> {
  schema: A;
  stages: ReadonlyMap<StageId, StageDefinition<A>>;
  /** Exactly one outgoing edge per stage */
  edges: ReadonlyMap<StageId, Edge<A>>;
  entry: StageId;
  config: GraphConfig;
}

// ============================================================================
// EXECUTION
// ============================================================================

export type ExecutionStatus = "running" | "completed" | "failed";

export type ExecutionRequest<A extends AnnotationRoot> =
  | { kind: "start"; sessionId?: string; input?: StateUpdate<A> }
  | { kind: "resume"; sessionId: string };

/**
 * Emitted after each stage execution.
 */
export interface StepResult<A extends AnnotationRoot> {
  sessionId: string;
  stage: StageId;
  /** Stage that runs next, or TERMINAL */
  next: StageId;
  /** Route label chosen by a conditional edge */
  label?: string;
  state: StateFromAnnotation<A>;
  seq: number;
  status: ExecutionStatus;
  error?: Error;
}

export interface ExecutionResult<A extends AnnotationRoot> {
  sessionId: string;
  state: StateFromAnnotation<A>;
  status: Exclude<ExecutionStatus, "running">;
  /** Stages executed by this call */
  steps: number;
  /** Sequence number of the last checkpoint */
  seq: number;
  /** Pointer stored in the last checkpoint */
  next: StageId;
  lastLabel?: string;
  error?: Error;
}

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 1,
  backoffMs: 1000,
  backoffMultiplier: 2,
};

export const DEFAULT_MAX_STEPS = 1000;
