/**
 * Execution State Tracker: the single writer of one Execution aggregate.
 *
 * Every mutation of an execution's status, steps and errors goes through
 * here, so the aggregate's rules are enforced in one place and every
 * change is announced on the event channel.
 */

import { randomUUID } from "node:crypto";
import { OrchestrationError, toExecutionError } from "./errors.js";
import type {
  DataMap,
  EngineEvent,
  Execution,
  ExecutionError,
  ExecutionStatus,
  Step,
  WorkflowNode,
} from "./types.js";
import { isTerminal } from "./types.js";

const ALLOWED_TRANSITIONS: Record<ExecutionStatus, readonly ExecutionStatus[]> = {
  running: ["paused", "completed", "failed", "cancelled"],
  paused: ["running", "completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export type Emit = (event: EngineEvent) => void;

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

function copyStep(step: Step): Step {
  return {
    ...step,
    inputData: { ...step.inputData },
    outputData: { ...step.outputData },
    errors: step.errors.map((e) => ({ ...e })),
  };
}

/** Detached copy of an execution, safe to hand to callers. */
export function snapshotExecution(execution: Execution): Execution {
  return {
    ...execution,
    inputData: { ...execution.inputData },
    outputData: { ...execution.outputData },
    steps: execution.steps.map(copyStep),
    errors: execution.errors.map((e) => ({ ...e })),
  };
}

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

export class ExecutionTracker {
  private _execution: Execution;
  private _emit: Emit;
  private _clock: () => Date;
  private _lastStamp = 0;

  private constructor(execution: Execution, emit: Emit, clock: () => Date) {
    this._execution = execution;
    this._emit = emit;
    this._clock = clock;
  }

  /** Create a running execution and announce it. */
  static create(opts: {
    workflowId: string;
    orchestration: Execution["orchestration"];
    input: DataMap;
    emit: Emit;
    clock?: () => Date;
    id?: string;
  }): ExecutionTracker {
    const execution: Execution = {
      id: opts.id ?? randomUUID(),
      workflowId: opts.workflowId,
      orchestration: opts.orchestration,
      status: "running",
      startedAt: "",
      inputData: { ...opts.input },
      outputData: {},
      steps: [],
      errors: [],
    };
    const tracker = new ExecutionTracker(execution, opts.emit, opts.clock ?? (() => new Date()));
    execution.startedAt = tracker.stamp();
    tracker.emit({ kind: "status_changed", data: { from: null, to: "running" } });
    return tracker;
  }

  get id(): string {
    return this._execution.id;
  }

  get status(): ExecutionStatus {
    return this._execution.status;
  }

  snapshot(): Execution {
    return snapshotExecution(this._execution);
  }

  /**
   * ISO timestamp that is strictly later than every timestamp this
   * tracker handed out before.
   */
  stamp(): string {
    let ms = this._clock().getTime();
    if (ms <= this._lastStamp) ms = this._lastStamp + 1;
    this._lastStamp = ms;
    return new Date(ms).toISOString();
  }

  // -------------------------------------------------------------------------
  // Status
  // -------------------------------------------------------------------------

  /** Returns false if the transition is not allowed from the current status. */
  transition(to: ExecutionStatus): boolean {
    const from = this._execution.status;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) return false;
    this._execution.status = to;
    if (isTerminal(to)) this._execution.completedAt = this.stamp();
    this.emit({ kind: "status_changed", data: { from, to } });
    return true;
  }

  /** Set the final output and move to a terminal status. */
  finish(status: "completed" | "failed" | "cancelled", output: DataMap): void {
    this.assertOpen();
    this._execution.outputData = { ...output };
    this.transition(status);
  }

  // -------------------------------------------------------------------------
  // Steps
  // -------------------------------------------------------------------------

  beginStep(node: Pick<WorkflowNode, "id" | "name">, input: DataMap): Step {
    this.assertOpen();
    const step: Step = {
      id: randomUUID(),
      nodeId: node.id,
      nodeName: node.name,
      status: "running",
      startedAt: this.stamp(),
      inputData: { ...input },
      outputData: {},
      errors: [],
    };
    this._execution.steps.push(step);
    this.emit({ kind: "step_started", data: { step: copyStep(step) } });
    return step;
  }

  completeStep(step: Step, output: DataMap): void {
    this.assertOpen();
    step.status = "completed";
    step.outputData = { ...output };
    step.completedAt = this.stamp();
    this.emit({ kind: "step_completed", data: { step: copyStep(step) } });
  }

  /** Mark the step failed and record the error on both the step and the execution. */
  failStep(step: Step, err: unknown): ExecutionError {
    this.assertOpen();
    const record = toExecutionError(err, this.stamp(), { nodeId: step.nodeId, stepId: step.id });
    step.status = "failed";
    step.completedAt = record.occurredAt;
    step.errors.push(record);
    this._execution.errors.push(record);
    this.emit({ kind: "execution_error", data: { error: { ...record } } });
    return record;
  }

  // -------------------------------------------------------------------------
  // Errors
  // -------------------------------------------------------------------------

  recordError(err: unknown, refs: { nodeId?: string; stepId?: string } = {}): ExecutionError {
    this.assertOpen();
    const record = toExecutionError(err, this.stamp(), refs);
    this._execution.errors.push(record);
    this.emit({ kind: "execution_error", data: { error: { ...record } } });
    return record;
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private assertOpen(): void {
    if (isTerminal(this._execution.status)) {
      throw new OrchestrationError(
        `Execution ${this._execution.id} is ${this._execution.status}; it can no longer change`,
      );
    }
  }

  private emit(event: DistributiveOmit<EngineEvent, "timestamp" | "executionId">): void {
    this._emit({ ...event, timestamp: this.stamp(), executionId: this._execution.id });
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
