/**
 * Retry Governor
 *
 * Bounded loop control expressed through ordinary state fields and routes:
 *
 * - Flat bounded retry: a counter field counts repair passes. The router
 *   checks the bound before looking at success, so a loop with bound `n`
 *   that never succeeds runs its body `n + 1` times with `n` repairs.
 * - Nested two-level loop: a cursor over an ordered subtask list (outer) and
 *   an inner counter reset whenever a subtask is entered.
 *
 * Counters advance through route transition effects, so the increment is
 * part of the same checkpoint as the decision that caused it.
 */

import type { AnnotationRoot, StateFromAnnotation, StateUpdate } from "./annotation.ts";
import { GraphDefinitionError } from "./errors.ts";
import type { RouteTarget, StageId } from "./types.ts";
import { log } from "../utils/logger.ts";

type ReadState<A extends AnnotationRoot> = Readonly<StateFromAnnotation<A>>;

/**
 * Keys of A whose values are numbers.
 */
export type NumericField<A extends AnnotationRoot> = {
  [K in keyof A & string]: StateFromAnnotation<A>[K] extends number ? K : never;
}[keyof A & string] &
  string;

/**
 * Keys of A whose values are arrays.
 */
export type ListField<A extends AnnotationRoot> = {
  [K in keyof A & string]: StateFromAnnotation<A>[K] extends readonly unknown[] ? K : never;
}[keyof A & string] &
  string;

function readNumber(state: object, field: string): number {
  const value: unknown = Reflect.get(state, field);
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function counterUpdate<A extends AnnotationRoot>(field: string, value: number): StateUpdate<A> {
  const update: Record<string, unknown> = { [field]: value };
  return update as StateUpdate<A>;
}

function readList(state: object, field: string): readonly unknown[] {
  const value: unknown = Reflect.get(state, field);
  return Array.isArray(value) ? value : [];
}

// ============================================================================
// LOOP SCOPE
// ============================================================================

/**
 * A named counter with a maximum bound.
 */
export interface LoopScope<A extends AnnotationRoot> {
  readonly name: string;
  readonly field: NumericField<A>;
  readonly max: number;
  count(state: ReadState<A>): number;
  /** True once the counter has reached its bound */
  exhausted(state: ReadState<A>): boolean;
  /** Update incrementing the counter by one */
  tick(state: ReadState<A>): StateUpdate<A>;
  /** Update resetting the counter to zero */
  reset(): StateUpdate<A>;
}

export function defineLoopScope<A extends AnnotationRoot>(options: {
  name: string;
  field: NumericField<A>;
  max: number;
}): LoopScope<A> {
  const { name, field, max } = options;
  if (!Number.isInteger(max) || max < 0) {
    throw new GraphDefinitionError(`Loop scope "${name}" needs a non-negative integer bound, got ${max}`);
  }

  const count = (state: ReadState<A>): number => readNumber(state, field);
  const update = (value: number): StateUpdate<A> => counterUpdate<A>(field, value);

  return {
    name,
    field,
    max,
    count,
    exhausted: (state) => count(state) >= max,
    tick: (state) => {
      const next = count(state) + 1;
      log("Governor", "tick", { scope: name, count: next, max });
      return update(next);
    },
    reset: () => update(0),
  };
}

// ============================================================================
// FLAT BOUNDED RETRY
// ============================================================================

export type RetryOutcome = "done" | "terminal";

/**
 * True when the loop must stop because its bound is reached without success.
 */
export function isRetryExhausted<A extends AnnotationRoot>(
  scope: LoopScope<A>,
  state: ReadState<A>,
  succeeded: boolean,
): boolean {
  return !succeeded && scope.exhausted(state);
}

/**
 * Router for a flat bounded retry loop.
 *
 * Returns "terminal" once the scope is exhausted (regardless of success),
 * "done" on success, and otherwise the repair label chosen by `repair`.
 *
 * @example
 * ```typescript
 * const router = boundedRetryRouter(attempts, {
 *   succeeded: (state) => state.verdict === "PASSED",
 *   repair: () => "repair",
 * });
 * ```
 */
export function boundedRetryRouter<A extends AnnotationRoot, R extends string>(
  scope: LoopScope<A>,
  options: {
    succeeded: (state: ReadState<A>) => boolean;
    repair: (state: ReadState<A>) => R;
  },
): (state: ReadState<A>) => RetryOutcome | R {
  return (state) => {
    if (scope.exhausted(state)) {
      log("Governor", "bound_reached", { scope: scope.name, count: scope.count(state) });
      return "terminal";
    }
    if (options.succeeded(state)) {
      return "done";
    }
    return options.repair(state);
  };
}

/**
 * Route target that re-enters `to` and advances the scope's counter.
 */
export function retryRoute<A extends AnnotationRoot>(
  scope: LoopScope<A>,
  to: StageId,
): RouteTarget<A> {
  return { to, effect: (state) => scope.tick(state) };
}

// ============================================================================
// NESTED TWO-LEVEL LOOP
// ============================================================================

/**
 * Cursor over an ordered subtask list.
 */
export interface SubtaskCursor<A extends AnnotationRoot, T> {
  current(state: ReadState<A>): T | undefined;
  hasNext(state: ReadState<A>): boolean;
  /** Update moving to the next subtask */
  advance(state: ReadState<A>): StateUpdate<A>;
}

export function subtaskCursor<A extends AnnotationRoot, T>(options: {
  listField: ListField<A>;
  indexField: NumericField<A>;
  /** Validates elements of the subtask list */
  guard: (value: unknown) => value is T;
}): SubtaskCursor<A, T> {
  const { listField, indexField, guard } = options;
  const index = (state: ReadState<A>): number => readNumber(state, indexField);
  const list = (state: ReadState<A>): readonly unknown[] => readList(state, listField);

  return {
    current: (state) => {
      const value = list(state)[index(state)];
      return guard(value) ? value : undefined;
    },
    hasNext: (state) => index(state) + 1 < list(state).length,
    advance: (state) => counterUpdate<A>(indexField, index(state) + 1),
  };
}

/**
 * Inner loop router: keep refining until the inner scope is exhausted.
 */
export function innerLoopRouter<A extends AnnotationRoot>(
  scope: LoopScope<A>,
): (state: ReadState<A>) => "loop" | "done" {
  return (state) => (scope.exhausted(state) ? "done" : "loop");
}

/**
 * Outer loop router: move to the next subtask, or finalize after the last one.
 * Expects the subtask index to have been advanced already.
 */
export function outerLoopRouter<A extends AnnotationRoot>(options: {
  listField: ListField<A>;
  indexField: NumericField<A>;
}): (state: ReadState<A>) => "next" | "finalize" {
  return (state) =>
    readNumber(state, options.indexField) < readList(state, options.listField).length
      ? "next"
      : "finalize";
}
