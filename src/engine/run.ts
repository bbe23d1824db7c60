/**
 * Per-execution run state handed to a strategy: the graph snapshot, the
 * tracker, the dispatcher and the cooperative pause/cancel control.
 */

import type {
  GroupChatSession,
  HandoffRouter,
  NodeSelector,
  WaitPredicate,
} from "./collaborators.js";
import type { ExecutionScope, NodeDispatcher } from "./handlers.js";
import type { Logger } from "./logger.js";
import type { ExecutionTracker } from "./tracker.js";
import type {
  DataMap,
  ExecutionError,
  OrchestrationType,
  Step,
  WorkflowGraph,
  WorkflowNode,
} from "./types.js";

// ---------------------------------------------------------------------------
// Run control
// ---------------------------------------------------------------------------

/**
 * Pause and cancel flags for one execution. Strategies observe them only
 * at node boundaries; an in-flight node call is never interrupted by the
 * engine, though adapters may honour the abort signal.
 */
export class RunControl {
  private _abort = new AbortController();
  private _paused = false;
  private _waiters: Array<() => void> = [];

  get signal(): AbortSignal {
    return this._abort.signal;
  }

  get cancelRequested(): boolean {
    return this._abort.signal.aborted;
  }

  get paused(): boolean {
    return this._paused;
  }

  pause(): boolean {
    if (this._paused || this.cancelRequested) return false;
    this._paused = true;
    return true;
  }

  resume(): boolean {
    if (!this._paused) return false;
    this._paused = false;
    this.wake();
    return true;
  }

  cancel(): boolean {
    if (this.cancelRequested) return false;
    this._abort.abort();
    this.wake();
    return true;
  }

  /** Resolves once the run is neither paused nor waiting on anything. */
  async waitWhilePaused(): Promise<void> {
    while (this._paused && !this.cancelRequested) {
      await new Promise<void>((resolve) => this._waiters.push(resolve));
    }
  }

  private wake(): void {
    const waiters = this._waiters;
    this._waiters = [];
    for (const resolve of waiters) resolve();
  }
}

// ---------------------------------------------------------------------------
// Strategy contract
// ---------------------------------------------------------------------------

export type StrategyHooks = {
  handoff: HandoffRouter;
  selector: NodeSelector;
  groupChat?: GroupChatSession;
  waitPredicate: WaitPredicate;
};

export type RunLimits = {
  magenticMaxIterations: number;
  loopMaxIterations: number;
  waitPollIntervalMs: number;
  waitTimeoutMs: number;
};

export type StrategyOutcome = {
  status: "completed" | "failed" | "cancelled";
  output: DataMap;
};

export interface OrchestrationStrategy {
  readonly type: OrchestrationType;
  run(run: ExecutionRun, input: DataMap): Promise<StrategyOutcome>;
}

export type NodeOutcome =
  | { ok: true; output: DataMap; step: Step }
  | { ok: false; error: ExecutionError; step: Step };

// ---------------------------------------------------------------------------
// Execution run
// ---------------------------------------------------------------------------

export class ExecutionRun {
  readonly graph: WorkflowGraph;
  readonly hooks: StrategyHooks;
  readonly limits: RunLimits;
  readonly logger: Logger;
  readonly scope: ExecutionScope;
  private _tracker: ExecutionTracker;
  private _dispatcher: NodeDispatcher;
  private _control: RunControl;

  constructor(opts: {
    graph: WorkflowGraph;
    tracker: ExecutionTracker;
    dispatcher: NodeDispatcher;
    control: RunControl;
    hooks: StrategyHooks;
    limits: RunLimits;
    logger: Logger;
    scope: ExecutionScope;
  }) {
    this.graph = opts.graph;
    this._tracker = opts.tracker;
    this._dispatcher = opts.dispatcher;
    this._control = opts.control;
    this.hooks = opts.hooks;
    this.limits = opts.limits;
    this.logger = opts.logger;
    this.scope = opts.scope;
  }

  get executionId(): string {
    return this._tracker.id;
  }

  get workflowId(): string {
    return this.graph.id;
  }

  get signal(): AbortSignal {
    return this._control.signal;
  }

  get cancelRequested(): boolean {
    return this._control.cancelRequested;
  }

  /** Copies of the steps recorded so far. */
  steps(): Step[] {
    return this._tracker.snapshot().steps;
  }

  /**
   * Node boundary: waits while the execution is paused, then reports
   * whether the strategy may go on. False means cancellation was requested.
   */
  async boundary(): Promise<boolean> {
    await this._control.waitWhilePaused();
    return !this._control.cancelRequested;
  }

  /** Run one node as a recorded step. Never throws for a node failure. */
  async runNode(node: WorkflowNode, input: DataMap): Promise<NodeOutcome> {
    const step = this._tracker.beginStep(node, input);
    try {
      const output = await this._dispatcher.execute(node, input, {
        executionId: this.executionId,
        workflowId: this.workflowId,
        graph: this.graph,
        signal: this.signal,
        scope: this.scope,
        logger: this.logger,
        now: () => this._tracker.stamp(),
      });
      this._tracker.completeStep(step, output);
      return { ok: true, output, step };
    } catch (err) {
      const error = this._tracker.failStep(step, err);
      this.logger.warn(`node "${node.id}" failed: ${error.message}`);
      return { ok: false, error, step };
    }
  }

  /**
   * Record a step that stands for work done outside any single node
   * handler, attributed to `node`.
   */
  async runSynthetic(
    node: Pick<WorkflowNode, "id" | "name">,
    input: DataMap,
    work: () => Promise<DataMap>,
  ): Promise<NodeOutcome> {
    const step = this._tracker.beginStep(node, input);
    try {
      const output = await work();
      this._tracker.completeStep(step, output);
      return { ok: true, output, step };
    } catch (err) {
      const error = this._tracker.failStep(step, err);
      this.logger.warn(`step for "${node.id}" failed: ${error.message}`);
      return { ok: false, error, step };
    }
  }

  recordError(err: unknown, refs: { nodeId?: string; stepId?: string } = {}): ExecutionError {
    return this._tracker.recordError(err, refs);
  }
}
