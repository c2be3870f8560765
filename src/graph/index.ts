/**
 * Graph Execution Engine
 *
 * Stage graphs over a declared state schema, with:
 * - Per-field merge policies (overwrite, append-ordered)
 * - Static and router-driven edges with closed label sets
 * - Bounded flat and nested loops
 * - Classifier-driven repair routing
 * - Session checkpointing and resume
 */

export type {
  Annotation,
  AnnotationRoot,
  MergePolicy,
  StateFromAnnotation,
  StateUpdate,
  ValueOf,
} from "./annotation.ts";
export {
  annotation,
  appendOrdered,
  applyStateUpdate,
  defineState,
  getDefaultValue,
  initializeState,
  isAppendField,
  isDeclaredField,
  overwrite,
} from "./annotation.ts";

export type {
  CompiledGraph,
  ConditionalEdge,
  Edge,
  ExecutionRequest,
  ExecutionResult,
  ExecutionStatus,
  GraphConfig,
  ProgressEvent,
  RetryConfig,
  RouteTarget,
  Router,
  StageContext,
  StageDefinition,
  StageId,
  StaticEdge,
  StepResult,
  TerminalResumePolicy,
  TransitionEffect,
} from "./types.ts";
export { DEFAULT_MAX_STEPS, DEFAULT_RETRY_CONFIG, START, TERMINAL } from "./types.ts";

export { GraphBuilder, createStage, graph } from "./builder.ts";
export { GraphExecutor, createExecutor } from "./compiled.ts";

export type {
  BlobStore,
  Checkpoint,
  CheckpointInput,
  CheckpointStoreType,
  CheckpointSummary,
  LockAttempt,
} from "./checkpointer.ts";
export {
  CheckpointStore,
  FileBlobStore,
  MemoryBlobStore,
  createCheckpointStore,
} from "./checkpointer.ts";

export type { LoopScope, RetryOutcome, SubtaskCursor } from "./governor.ts";
export {
  boundedRetryRouter,
  defineLoopScope,
  innerLoopRouter,
  isRetryExhausted,
  outerLoopRouter,
  retryRoute,
  subtaskCursor,
} from "./governor.ts";

export type { Classification, Classifier, ClassifierDefinition } from "./classifier.ts";
export { classifierStage, defineClassifier } from "./classifier.ts";

export {
  CheckpointCorruptError,
  GraphDefinitionError,
  GraphError,
  SchemaViolationError,
  SessionExistsError,
  SessionLockedError,
  SessionNotFoundError,
  StageExecutionError,
  UnknownRouteError,
  isFatalGraphError,
} from "./errors.ts";
