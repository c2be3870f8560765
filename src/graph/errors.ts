/**
 * Graph Execution Error Types
 *
 * Every error raised by the engine derives from GraphError. Fatal errors
 * abort the session and propagate out of `execute()`:
 * - SchemaViolationError: an update names a field the schema does not declare
 * - UnknownRouteError: a router returned a label outside its declared set
 * - GraphDefinitionError: the graph is malformed at compile time
 * - SessionLockedError / SessionExistsError: exclusive session access violated
 * - CheckpointCorruptError: a stored checkpoint failed validation
 *
 * StageExecutionError ends the traversal with status "failed" and leaves the
 * last checkpoint intact. SessionNotFoundError is recoverable by starting a
 * fresh session.
 */

import type { ZodError } from "zod";

export class GraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphError";
  }
}

/**
 * Thrown when a state update or input names an undeclared field, or when a
 * stage writes a field outside its declared `writes` list.
 */
export class SchemaViolationError extends GraphError {
  constructor(
    public readonly field: string,
    public readonly stageId?: string,
    detail?: string,
  ) {
    super(
      detail ??
        (stageId
          ? `Stage "${stageId}" wrote undeclared field "${field}"`
          : `Undeclared state field "${field}"`),
    );
    this.name = "SchemaViolationError";
  }
}

export class UnknownRouteError extends GraphError {
  constructor(
    public readonly stageId: string,
    public readonly label: string,
    public readonly allowed: readonly string[],
  ) {
    super(
      `Router for stage "${stageId}" returned "${label}"; expected one of: ${allowed.join(", ")}`,
    );
    this.name = "UnknownRouteError";
  }
}

export class GraphDefinitionError extends GraphError {
  constructor(message: string) {
    super(message);
    this.name = "GraphDefinitionError";
  }
}

export class SessionNotFoundError extends GraphError {
  constructor(public readonly sessionId: string) {
    super(`No checkpoint found for session "${sessionId}"`);
    this.name = "SessionNotFoundError";
  }
}

export class SessionExistsError extends GraphError {
  constructor(public readonly sessionId: string) {
    super(`Session "${sessionId}" already has checkpoints; resume it or prune it first`);
    this.name = "SessionExistsError";
  }
}

export class SessionLockedError extends GraphError {
  constructor(
    public readonly sessionId: string,
    public readonly holderPid?: number,
  ) {
    super(
      holderPid === undefined
        ? `Session "${sessionId}" is already being executed`
        : `Session "${sessionId}" is locked by process ${holderPid}`,
    );
    this.name = "SessionLockedError";
  }
}

/**
 * Thrown when a stored checkpoint cannot be parsed or fails the envelope
 * schema.
 */
export class CheckpointCorruptError extends GraphError {
  constructor(
    public readonly sessionId: string,
    message: string,
    public readonly zodError?: ZodError,
  ) {
    super(`Checkpoint for session "${sessionId}" is corrupt: ${message}`);
    this.name = "CheckpointCorruptError";
  }
}

/**
 * Wraps a stage failure once its retry attempts are used up.
 */
export class StageExecutionError extends GraphError {
  constructor(
    public readonly stageId: string,
    public readonly attempts: number,
    public override readonly cause: unknown,
  ) {
    super(
      `Stage "${stageId}" failed after ${attempts} attempt(s): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = "StageExecutionError";
  }
}

/**
 * Errors that abort the session instead of ending it as "failed".
 */
export function isFatalGraphError(error: unknown): boolean {
  return (
    error instanceof SchemaViolationError ||
    error instanceof UnknownRouteError ||
    error instanceof GraphDefinitionError ||
    error instanceof SessionLockedError ||
    error instanceof SessionExistsError ||
    error instanceof CheckpointCorruptError
  );
}
