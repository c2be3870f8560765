/**
 * CompiledGraph Execution Engine
 *
 * Drives a session through a compiled stage graph:
 * 1. run the current stage (with its retry policy) on a read-only copy of state
 * 2. merge the stage's partial update through the schema's merge policies
 * 3. resolve the outgoing edge, applying the chosen route's transition effect
 * 4. persist a checkpoint (state, next stage pointer, seq)
 * 5. repeat until TERMINAL
 *
 * Steps are exposed as an AsyncGenerator (`stream`) and consumed by
 * `execute`. Sessions are held exclusively for the whole traversal.
 */

import { randomUUID } from "node:crypto";

import type { AnnotationRoot, StateFromAnnotation, StateUpdate } from "./annotation.ts";
import { applyStateUpdate, initializeState } from "./annotation.ts";
import { createCheckpointStore, type CheckpointStore } from "./checkpointer.ts";
import {
  CheckpointCorruptError,
  GraphDefinitionError,
  GraphError,
  SchemaViolationError,
  SessionExistsError,
  SessionNotFoundError,
  StageExecutionError,
  UnknownRouteError,
  isFatalGraphError,
} from "./errors.ts";
import type {
  CompiledGraph,
  ExecutionRequest,
  ExecutionResult,
  ExecutionStatus,
  ProgressEvent,
  StageDefinition,
  StageId,
  StepResult,
  TransitionEffect,
} from "./types.ts";
import { DEFAULT_MAX_STEPS, DEFAULT_RETRY_CONFIG, TERMINAL, resolveRouteTarget } from "./types.ts";
import { errorMessage, log, logError } from "../utils/logger.ts";

// ============================================================================
// INTERNAL TYPES
// ============================================================================

/**
 * Position of a session between two stages.
 */
interface Cursor<A extends AnnotationRoot> {
  state: StateFromAnnotation<A>;
  /** Stage to run next, or TERMINAL */
  stage: StageId;
  lastStage: StageId | null;
  lastLabel?: string;
  seq: number;
}

interface ResolvedRoute<A extends AnnotationRoot> {
  to: StageId;
  label?: string;
  effect?: TransitionEffect<A>;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function generateSessionId(): string {
  return `session-${randomUUID()}`;
}

function now(): string {
  return new Date().toISOString();
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Copy handed to stages and routers so they cannot mutate stored state.
 */
function readOnlyView<S extends object>(state: S): Readonly<S> {
  return Object.freeze(structuredClone(state));
}

// ============================================================================
// GRAPH EXECUTOR
// ============================================================================

/**
 * Executes a compiled graph, one stage at a time.
 *
 * @template A - The state schema
 *
 * @example
 * ```typescript
 * const executor = createExecutor(workflow);
 * const result = await executor.execute({ kind: "start", input: { objective: "..." } });
 *
 * // later, possibly in another process
 * const resumed = await executor.execute({ kind: "resume", sessionId: result.sessionId });
 * ```
 */
export class GraphExecutor<A extends AnnotationRoot> {
  readonly checkpoints: CheckpointStore;

  constructor(private readonly graph: CompiledGraph<A>) {
    this.checkpoints = graph.config.checkpoints ?? createCheckpointStore("memory");
  }

  /**
   * Run a session to completion and return its final result.
   *
   * @throws SchemaViolationError, UnknownRouteError and the other fatal graph
   *   errors; a stage failure is reported as status "failed" instead
   */
  async execute(request: ExecutionRequest<A>): Promise<ExecutionResult<A>> {
    const steps = this.stream(request);
    let next = await steps.next();
    while (!next.done) {
      next = await steps.next();
    }
    return next.value;
  }

  /**
   * Resume a session, starting it with `input` when it has no checkpoint.
   */
  async resumeOrStart(sessionId: string, input?: StateUpdate<A>): Promise<ExecutionResult<A>> {
    try {
      return await this.execute({ kind: "resume", sessionId });
    } catch (error) {
      if (!(error instanceof SessionNotFoundError)) {
        throw error;
      }
      log("Executor", "resume_fallback_to_start", { sessionId });
      return this.execute({ kind: "start", sessionId, input });
    }
  }

  /**
   * Restore a session's stored state without running anything.
   */
  async inspect(
    sessionId: string,
  ): Promise<{ state: StateFromAnnotation<A>; next: StageId; seq: number } | null> {
    const checkpoint = await this.checkpoints.load(sessionId);
    if (!checkpoint) return null;
    const cursor = this.toCursor(sessionId, checkpoint);
    return { state: cursor.state, next: cursor.stage, seq: cursor.seq };
  }

  /**
   * Stream the traversal, yielding after every stage execution.
   * The generator's return value is the final ExecutionResult.
   */
  async *stream(
    request: ExecutionRequest<A>,
  ): AsyncGenerator<StepResult<A>, ExecutionResult<A>, undefined> {
    const sessionId =
      request.kind === "start" ? (request.sessionId ?? generateSessionId()) : request.sessionId;
    const release = await this.checkpoints.acquire(sessionId);

    try {
      let cursor =
        request.kind === "start"
          ? await this.begin(sessionId, request.input)
          : await this.restore(sessionId);

      if (cursor.stage === TERMINAL) {
        const policy = this.graph.config.terminalResumePolicy ?? "no-op";
        if (policy === "no-op" || cursor.lastStage === null) {
          log("Executor", "terminal_resume_noop", { sessionId, seq: cursor.seq });
          return this.result(sessionId, cursor, "completed", 0);
        }
        log("Executor", "terminal_resume_reenter", { sessionId, stage: cursor.lastStage });
        cursor = { ...cursor, stage: cursor.lastStage };
      }

      const maxSteps = this.graph.config.maxSteps ?? DEFAULT_MAX_STEPS;
      let steps = 0;

      while (cursor.stage !== TERMINAL) {
        if (steps >= maxSteps) {
          const error = new GraphError(`Exceeded maximum steps (${maxSteps}) in session "${sessionId}"`);
          logError("Executor", "max_steps_exceeded", { sessionId, maxSteps });
          return this.result(sessionId, cursor, "failed", steps, error);
        }

        const stage = this.graph.stages.get(cursor.stage);
        if (!stage) {
          throw new GraphDefinitionError(`Stage "${cursor.stage}" is not defined`);
        }

        const step = cursor.seq + 1;
        steps++;
        this.emit({ type: "stage_started", sessionId, stage: stage.id, step, timestamp: now() });
        log("Executor", "stage_started", { sessionId, stage: stage.id, step });

        let update: StateUpdate<A>;
        try {
          update = await this.executeWithRetry(stage, cursor.state, sessionId, step);
        } catch (error) {
          if (isFatalGraphError(error) || !(error instanceof StageExecutionError)) {
            throw error;
          }
          this.emit({
            type: "stage_failed",
            sessionId,
            stage: stage.id,
            step,
            error: error.message,
            timestamp: now(),
          });
          logError("Executor", "stage_failed", { sessionId, stage: stage.id, error: error.message });
          yield {
            sessionId,
            stage: stage.id,
            next: stage.id,
            state: cursor.state,
            seq: cursor.seq,
            status: "failed",
            error,
          };
          return this.result(sessionId, cursor, "failed", steps, error);
        }

        this.checkWrites(stage, update);
        let state = applyStateUpdate(this.graph.schema, cursor.state, update, stage.id);
        this.emit({ type: "stage_completed", sessionId, stage: stage.id, step, timestamp: now() });

        const route = this.resolveRoute(stage.id, state);
        if (route.effect) {
          state = applyStateUpdate(this.graph.schema, state, route.effect(readOnlyView(state)), stage.id);
        }
        this.emit({
          type: "route_taken",
          sessionId,
          from: stage.id,
          to: route.to,
          label: route.label,
          timestamp: now(),
        });
        log("Executor", "route_taken", { sessionId, from: stage.id, to: route.to, label: route.label });

        const seq = cursor.seq + 1;
        await this.checkpoints.save(sessionId, {
          state,
          stage: route.to,
          lastStage: stage.id,
          lastLabel: route.label,
          seq,
        });
        this.emit({ type: "checkpoint_saved", sessionId, seq, stage: route.to, timestamp: now() });

        cursor = { state, stage: route.to, lastStage: stage.id, lastLabel: route.label, seq };

        yield {
          sessionId,
          stage: stage.id,
          next: route.to,
          label: route.label,
          state,
          seq,
          status: route.to === TERMINAL ? "completed" : "running",
        };
      }

      return this.result(sessionId, cursor, "completed", steps);
    } finally {
      await release();
    }
  }

  // --------------------------------------------------------------------------
  // Session setup
  // --------------------------------------------------------------------------

  private async begin(sessionId: string, input?: StateUpdate<A>): Promise<Cursor<A>> {
    if (await this.checkpoints.exists(sessionId)) {
      throw new SessionExistsError(sessionId);
    }
    const state = initializeState(this.graph.schema, input ?? {});
    const cursor: Cursor<A> = { state, stage: this.graph.entry, lastStage: null, seq: 0 };
    await this.checkpoints.save(sessionId, { state, stage: cursor.stage, lastStage: null, seq: 0 });

    this.emit({ type: "session_started", sessionId, stage: cursor.stage, timestamp: now() });
    log("Executor", "session_started", { sessionId, graph: this.graph.config.name, entry: cursor.stage });
    return cursor;
  }

  private async restore(sessionId: string): Promise<Cursor<A>> {
    const checkpoint = await this.checkpoints.load(sessionId);
    if (!checkpoint) {
      throw new SessionNotFoundError(sessionId);
    }
    const cursor = this.toCursor(sessionId, checkpoint);

    this.emit({
      type: "session_resumed",
      sessionId,
      stage: cursor.stage,
      seq: cursor.seq,
      timestamp: now(),
    });
    log("Executor", "session_resumed", { sessionId, stage: cursor.stage, seq: cursor.seq });
    return cursor;
  }

  private toCursor(
    sessionId: string,
    checkpoint: {
      state: Record<string, unknown>;
      stage: StageId;
      lastStage: StageId | null;
      lastLabel?: string;
      seq: number;
    },
  ): Cursor<A> {
    let state: StateFromAnnotation<A>;
    try {
      state = initializeState(this.graph.schema, checkpoint.state);
    } catch (error) {
      if (error instanceof SchemaViolationError) {
        throw new CheckpointCorruptError(sessionId, error.message);
      }
      throw error;
    }
    if (checkpoint.stage !== TERMINAL && !this.graph.stages.has(checkpoint.stage)) {
      throw new CheckpointCorruptError(sessionId, `unknown stage pointer "${checkpoint.stage}"`);
    }
    return {
      state,
      stage: checkpoint.stage,
      lastStage: checkpoint.lastStage,
      lastLabel: checkpoint.lastLabel,
      seq: checkpoint.seq,
    };
  }

  // --------------------------------------------------------------------------
  // Stage execution and routing
  // --------------------------------------------------------------------------

  /**
   * Run a stage, re-attempting with exponential backoff per its retry config.
   *
   * @throws StageExecutionError once attempts are used up
   */
  private async executeWithRetry(
    stage: StageDefinition<A>,
    state: StateFromAnnotation<A>,
    sessionId: string,
    step: number,
  ): Promise<StateUpdate<A>> {
    const retry = { ...DEFAULT_RETRY_CONFIG, ...stage.retry };
    let attempt = 0;

    while (true) {
      attempt++;
      try {
        return await stage.execute({ state: readOnlyView(state), sessionId, step, attempt });
      } catch (caught) {
        if (isFatalGraphError(caught)) {
          throw caught;
        }
        const error = toError(caught);

        if (attempt >= retry.maxAttempts || (retry.retryOn && !retry.retryOn(error))) {
          throw new StageExecutionError(stage.id, attempt, error);
        }

        const delay = retry.backoffMs * Math.pow(retry.backoffMultiplier, attempt - 1);
        log("Executor", "stage_retry", { stage: stage.id, attempt, delay, error: errorMessage(error) });
        await sleep(delay);
      }
    }
  }

  private checkWrites(stage: StageDefinition<A>, update: StateUpdate<A>): void {
    const writes = stage.writes;
    if (!writes) return;
    for (const key of Object.keys(update)) {
      if (!writes.some((field) => field === key)) {
        throw new SchemaViolationError(
          key,
          stage.id,
          `Stage "${stage.id}" wrote "${key}" outside its declared writes`,
        );
      }
    }
  }

  private resolveRoute(stageId: StageId, state: StateFromAnnotation<A>): ResolvedRoute<A> {
    const edge = this.graph.edges.get(stageId);
    if (!edge) {
      throw new GraphDefinitionError(`Stage "${stageId}" has no outgoing edge`);
    }
    if (edge.kind === "static") {
      return { to: edge.to };
    }

    const label: unknown = edge.router(readOnlyView(state));
    const target = typeof label === "string" ? edge.routes.get(label) : undefined;
    if (typeof label !== "string" || target === undefined) {
      throw new UnknownRouteError(stageId, String(label), [...edge.routes.keys()]);
    }
    return { ...resolveRouteTarget(target), label };
  }

  private emit(event: ProgressEvent): void {
    this.graph.config.onProgress?.(event);
  }

  private result(
    sessionId: string,
    cursor: Cursor<A>,
    status: Exclude<ExecutionStatus, "running">,
    steps: number,
    error?: Error,
  ): ExecutionResult<A> {
    return {
      sessionId,
      state: cursor.state,
      status,
      steps,
      seq: cursor.seq,
      next: cursor.stage,
      lastLabel: cursor.lastLabel,
      error,
    };
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createExecutor<A extends AnnotationRoot>(graph: CompiledGraph<A>): GraphExecutor<A> {
  return new GraphExecutor(graph);
}
