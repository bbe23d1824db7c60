/**
 * Error taxonomy for the engine.
 *
 * Every error raised by validation, node handlers, collaborators or a
 * strategy is an EngineError; anything else is wrapped before it is
 * recorded on an execution.
 */

import type { Diagnostic, ErrorKind, ExecutionError } from "./types.js";

export class EngineError extends Error {
  readonly kind: ErrorKind;
  override cause?: Error;

  constructor(kind: ErrorKind, message: string, cause?: Error) {
    super(message);
    this.name = "EngineError";
    this.kind = kind;
    this.cause = cause;
  }
}

/** A workflow or node reference is missing or malformed. */
export class ValidationError extends EngineError {
  readonly diagnostics: Diagnostic[];

  constructor(message: string, diagnostics: Diagnostic[] = []) {
    super("validation", message);
    this.name = "ValidationError";
    this.diagnostics = diagnostics;
  }
}

/** A node handler itself failed. */
export class NodeExecutionError extends EngineError {
  readonly nodeId?: string;

  constructor(message: string, opts: { nodeId?: string; cause?: Error } = {}) {
    super("node_execution", message, opts.cause);
    this.name = "NodeExecutionError";
    this.nodeId = opts.nodeId;
  }
}

/** An LLM, tool or protocol call failed. */
export class CollaboratorError extends EngineError {
  readonly collaborator: string;
  readonly retryable: boolean;

  constructor(
    message: string,
    opts: { collaborator: string; retryable?: boolean; cause?: Error },
  ) {
    super("collaborator", message, opts.cause);
    this.name = "CollaboratorError";
    this.collaborator = opts.collaborator;
    this.retryable = opts.retryable ?? false;
  }
}

/** The graph cannot be walked: no start node, a cycle, an exhausted bound. */
export class OrchestrationError extends EngineError {
  constructor(message: string) {
    super("orchestration", message);
    this.name = "OrchestrationError";
  }
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

export function toEngineError(err: unknown, nodeId?: string): EngineError {
  if (err instanceof EngineError) return err;
  if (err instanceof Error) {
    return new NodeExecutionError(err.message, { nodeId, cause: err });
  }
  return new NodeExecutionError(String(err), { nodeId });
}

export function toExecutionError(
  err: unknown,
  occurredAt: string,
  refs: { nodeId?: string; stepId?: string } = {},
): ExecutionError {
  const engineErr = toEngineError(err, refs.nodeId);
  const record: ExecutionError = {
    message: engineErr.message,
    kind: engineErr.kind,
    occurredAt,
  };
  if (refs.nodeId) record.nodeId = refs.nodeId;
  if (refs.stepId) record.stepId = refs.stepId;
  return record;
}
