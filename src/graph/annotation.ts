/**
 * State Annotation System for the Graph Execution Engine
 *
 * A state schema is a record of annotations. Each annotation declares a
 * field's default and its merge policy:
 * - "overwrite": a stage's update replaces the previous value
 * - "append": the update's elements are added after the existing ones,
 *   preserving emission order across stages and resumes
 *
 * Updates may only name declared fields; anything else raises
 * SchemaViolationError.
 */

import { SchemaViolationError } from "./errors.ts";

// ============================================================================
// ANNOTATION TYPES
// ============================================================================

export type MergePolicy = "overwrite" | "append";

/**
 * Definition of a single state field.
 *
 * @template T - The type of the annotated value
 */
export interface Annotation<T> {
  /** Produces a fresh copy of the default value */
  readonly initial: () => T;
  readonly policy: MergePolicy;
}

/**
 * Root type for combining multiple annotations into a state schema.
 */
export type AnnotationRoot = Readonly<Record<string, Annotation<unknown>>>;

/**
 * Extract the value type from an Annotation.
 */
export type ValueOf<A> = A extends Annotation<infer T> ? T : never;

/**
 * Infer the state record type from an AnnotationRoot schema.
 */
export type StateFromAnnotation<A extends AnnotationRoot> = {
  [K in keyof A]: ValueOf<A[K]>;
};

/**
 * Partial update emitted by a stage. Append fields take the elements to add.
 */
export type StateUpdate<A extends AnnotationRoot> = Partial<StateFromAnnotation<A>>;

// ============================================================================
// ANNOTATION FACTORIES
// ============================================================================

/**
 * Create an annotation with a default value and merge policy.
 *
 * @example
 * ```typescript
 * const attempts = annotation(0, "overwrite");
 * const sections = annotation<string[]>([], "append");
 * ```
 */
export function annotation<T>(defaultValue: T, policy: MergePolicy): Annotation<T> {
  return { initial: () => structuredClone(defaultValue), policy };
}

/**
 * Field whose updates replace the previous value.
 */
export function overwrite<T>(defaultValue: T): Annotation<T> {
  return annotation(defaultValue, "overwrite");
}

/**
 * Ordered sequence field. Updates are appended; the field never shrinks.
 */
export function appendOrdered<E>(defaultValue: E[] = []): Annotation<E[]> {
  return annotation(defaultValue, "append");
}

/**
 * Freeze a schema so that no field can change its policy after declaration.
 */
export function defineState<A extends AnnotationRoot>(schema: A): A {
  for (const ann of Object.values(schema)) {
    Object.freeze(ann);
  }
  return Object.freeze(schema);
}

export function getDefaultValue<T>(ann: Annotation<T>): T {
  return ann.initial();
}

export function isAppendField(schema: AnnotationRoot, field: string): boolean {
  return Object.hasOwn(schema, field) && schema[field]?.policy === "append";
}

export function isDeclaredField(schema: AnnotationRoot, field: string): boolean {
  return Object.hasOwn(schema, field);
}

/**
 * Merge one field value according to its policy.
 */
export function mergeValue(ann: Annotation<unknown>, current: unknown, update: unknown): unknown {
  if (ann.policy === "overwrite") {
    return update;
  }
  const existing = Array.isArray(current) ? current : [];
  const added = Array.isArray(update) ? update : [update];
  return [...existing, ...added];
}

// ============================================================================
// STATE INITIALIZATION
// ============================================================================

/**
 * Initialize state from an annotation schema.
 *
 * Every field starts at its default; `input` then overwrites the fields it
 * provides (an append field takes the provided sequence as its starting
 * content).
 *
 * @example
 * ```typescript
 * const Schema = defineState({
 *   objective: overwrite(""),
 *   notes: appendOrdered<string>(),
 * });
 *
 * const state = initializeState(Schema, { objective: "survey" });
 * // { objective: "survey", notes: [] }
 * ```
 */
export function initializeState<A extends AnnotationRoot>(
  schema: A,
  input: object = {},
): StateFromAnnotation<A> {
  const state: Record<string, unknown> = {};

  for (const [key, ann] of Object.entries(schema)) {
    state[key] = getDefaultValue(ann);
  }

  for (const [key, value] of Object.entries(input)) {
    if (!isDeclaredField(schema, key)) {
      throw new SchemaViolationError(key);
    }
    if (value !== undefined) {
      state[key] = value;
    }
  }

  return state as StateFromAnnotation<A>;
}

/**
 * Apply a partial state update using each field's merge policy.
 *
 * Fields absent from the update are untouched; `current` is never mutated.
 *
 * @param stageId - Stage that emitted the update, reported on violations
 * @throws SchemaViolationError when the update names an undeclared field
 */
export function applyStateUpdate<A extends AnnotationRoot>(
  schema: A,
  current: StateFromAnnotation<A>,
  update: object,
  stageId?: string,
): StateFromAnnotation<A> {
  const next: Record<string, unknown> = { ...current };

  for (const [key, value] of Object.entries(update)) {
    const ann = Object.hasOwn(schema, key) ? schema[key] : undefined;
    if (!ann) {
      throw new SchemaViolationError(key, stageId);
    }
    if (value === undefined) continue;
    next[key] = mergeValue(ann, next[key], value);
  }

  return next as StateFromAnnotation<A>;
}
