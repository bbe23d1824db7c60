/**
 * Workflow engine facade: starts executions, owns the active-execution
 * registry and answers status queries.
 *
 * Each execution runs as its own async task. The registry is the only
 * state shared between executions; everything else (graph snapshot,
 * tracker, agent handles, checkpoints) belongs to one execution.
 */

import type {
  CompletionProvider,
  ProtocolClient,
  ToolProvider,
} from "./collaborators.js";
import { ValidationError } from "./errors.js";
import { snapshotGraph } from "./graph.js";
import {
  createDefaultDispatcher,
  ExecutionScope,
  type FunctionRegistry,
  type NodeDispatcher,
} from "./handlers.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import {
  ExecutionRun,
  RunControl,
  type OrchestrationStrategy,
  type StrategyHooks,
  type StrategyOutcome,
} from "./run.js";
import { DEFAULT_SETTINGS, type Settings } from "./settings.js";
import { InMemoryExecutionHistory, type ExecutionHistory, type WorkflowStore } from "./store.js";
import {
  ConditionHandoffRouter,
  defaultWaitPredicate,
  LlmNodeSelector,
  PriorityNodeSelector,
  StrategyRegistry,
  TurnTakingGroupChat,
} from "./strategies/index.js";
import { ExecutionTracker } from "./tracker.js";
import type {
  Checkpoint,
  DataMap,
  EngineEvent,
  EventListener,
  Execution,
  ExecutionError,
  Step,
  WorkflowGraph,
} from "./types.js";
import { isTerminal } from "./types.js";
import { validateOrRaise } from "./validator.js";

export type EngineOptions = {
  workflows: WorkflowStore;
  /** Defaults to an in-memory history. */
  history?: ExecutionHistory;
  /** Replaces the built-in dispatcher, and with it the collaborators below. */
  dispatcher?: NodeDispatcher;
  completion?: CompletionProvider;
  tools?: ToolProvider;
  protocol?: ProtocolClient;
  functions?: FunctionRegistry;
  strategies?: StrategyRegistry;
  hooks?: Partial<StrategyHooks>;
  settings?: Partial<Settings>;
  logger?: Logger;
  onEvent?: EventListener;
  clock?: () => Date;
};

type ActiveExecution = {
  tracker: ExecutionTracker;
  control: RunControl;
  scope: ExecutionScope;
  graph: WorkflowGraph;
  strategy: OrchestrationStrategy;
  input: DataMap;
  done: Promise<Execution>;
};

export class WorkflowEngine {
  private _workflows: WorkflowStore;
  private _history: ExecutionHistory;
  private _dispatcher: NodeDispatcher;
  private _strategies: StrategyRegistry;
  private _hooks: StrategyHooks;
  private _settings: Settings;
  private _logger: Logger;
  private _clock: () => Date;
  private _active = new Map<string, ActiveExecution>();
  private _listeners = new Set<EventListener>();

  constructor(opts: EngineOptions) {
    this._settings = { ...DEFAULT_SETTINGS, ...opts.settings };
    this._workflows = opts.workflows;
    this._history = opts.history ?? new InMemoryExecutionHistory();
    this._dispatcher =
      opts.dispatcher ??
      createDefaultDispatcher({
        completion: opts.completion,
        tools: opts.tools,
        protocol: opts.protocol,
        functions: opts.functions,
        defaultModel: this._settings.model,
      });
    this._strategies = opts.strategies ?? new StrategyRegistry();
    this._logger = opts.logger ?? createConsoleLogger("Engine", this._settings.logLevel);
    this._clock = opts.clock ?? (() => new Date());
    if (opts.onEvent) this._listeners.add(opts.onEvent);

    const completion = opts.completion;
    this._hooks = {
      handoff: opts.hooks?.handoff ?? new ConditionHandoffRouter(),
      selector:
        opts.hooks?.selector ??
        (completion ? new LlmNodeSelector(completion, this._settings.model) : new PriorityNodeSelector()),
      groupChat:
        opts.hooks?.groupChat ??
        (completion
          ? new TurnTakingGroupChat(completion, {
              rounds: this._settings.groupChatRounds,
              model: this._settings.model,
            })
          : undefined),
      waitPredicate: opts.hooks?.waitPredicate ?? defaultWaitPredicate,
    };
  }

  get dispatcher(): NodeDispatcher {
    return this._dispatcher;
  }

  // -------------------------------------------------------------------------
  // Events
  // -------------------------------------------------------------------------

  /** Listen to every execution's events. Returns an unsubscribe function. */
  subscribe(listener: EventListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  private emit(event: EngineEvent): void {
    for (const listener of [...this._listeners]) {
      try {
        listener(event);
      } catch (err) {
        this._logger.warn(`event listener threw on ${event.kind}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Validate the workflow, create a running execution and start its
   * strategy in the background. Rejects with ValidationError, creating
   * no record, when the workflow is missing or invalid.
   */
  async startExecution(workflowId: string, input: DataMap = {}): Promise<string> {
    const stored = await this._workflows.getWorkflow(workflowId);
    if (!stored) {
      throw new ValidationError(`Workflow "${workflowId}" not found`);
    }
    const graph = snapshotGraph(validateOrRaise(stored, this._dispatcher));
    const strategy = this._strategies.select(graph.orchestration);

    const tracker = ExecutionTracker.create({
      workflowId,
      orchestration: strategy.type,
      input,
      emit: (event) => this.emit(event),
      clock: this._clock,
    });
    await this._history.save(tracker.snapshot());

    const entry: ActiveExecution = {
      tracker,
      control: new RunControl(),
      scope: new ExecutionScope(),
      graph,
      strategy,
      input: { ...input },
      done: Promise.resolve(tracker.snapshot()),
    };
    this._active.set(tracker.id, entry);
    this._logger.info(`execution ${tracker.id} started (${workflowId}, ${strategy.type})`);
    entry.done = this.drive(entry);
    return tracker.id;
  }

  /** Start an execution and wait for its terminal snapshot. */
  async runExecution(workflowId: string, input: DataMap = {}): Promise<Execution> {
    const id = await this.startExecution(workflowId, input);
    const entry = this._active.get(id);
    if (entry) return entry.done;
    const stored = await this._history.get(id);
    if (!stored) throw new ValidationError(`Execution "${id}" not found`);
    return stored;
  }

  /** Terminal snapshot of an execution, waiting for it if it is still active. */
  async waitForExecution(executionId: string): Promise<Execution | undefined> {
    const entry = this._active.get(executionId);
    if (entry) return entry.done;
    return this._history.get(executionId);
  }

  pauseExecution(executionId: string): boolean {
    const entry = this._active.get(executionId);
    if (!entry || entry.tracker.status !== "running" || entry.control.cancelRequested) return false;
    entry.control.pause();
    return entry.tracker.transition("paused");
  }

  resumeExecution(executionId: string): boolean {
    const entry = this._active.get(executionId);
    if (!entry || entry.tracker.status !== "paused") return false;
    const resumed = entry.tracker.transition("running");
    entry.control.resume();
    return resumed;
  }

  /**
   * Request cancellation. The run stops at its next node boundary; a node
   * call already in flight finishes first. False if the execution is not
   * active or already cancelling.
   */
  stopExecution(executionId: string): boolean {
    const entry = this._active.get(executionId);
    if (!entry || isTerminal(entry.tracker.status)) return false;
    return entry.control.cancel();
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  async getExecutionStatus(executionId: string): Promise<Execution | undefined> {
    const entry = this._active.get(executionId);
    if (entry) return entry.tracker.snapshot();
    return this._history.get(executionId);
  }

  /** Active and recorded executions of a workflow, newest first. */
  async listWorkflowExecutions(workflowId: string): Promise<Execution[]> {
    const byId = new Map<string, Execution>();
    for (const execution of await this._history.listByWorkflow(workflowId)) {
      byId.set(execution.id, execution);
    }
    for (const entry of this._active.values()) {
      const snapshot = entry.tracker.snapshot();
      if (snapshot.workflowId === workflowId) byId.set(snapshot.id, snapshot);
    }
    return [...byId.values()].sort((a, b) => b.startedAt.localeCompare(a.startedAt));
  }

  async listExecutionSteps(executionId: string): Promise<Step[]> {
    return (await this.getExecutionStatus(executionId))?.steps ?? [];
  }

  async listExecutionErrors(executionId: string): Promise<ExecutionError[]> {
    return (await this.getExecutionStatus(executionId))?.errors ?? [];
  }

  /** Checkpoints saved by checkpoint nodes of an execution that is still active. */
  listExecutionCheckpoints(executionId: string): Checkpoint[] {
    return this._active.get(executionId)?.scope.checkpoints() ?? [];
  }

  activeExecutionIds(): string[] {
    return [...this._active.keys()];
  }

  // -------------------------------------------------------------------------
  // Driver
  // -------------------------------------------------------------------------

  /** Runs the strategy to a terminal status. Never rejects. */
  private async drive(entry: ActiveExecution): Promise<Execution> {
    const { tracker, control } = entry;
    const run = new ExecutionRun({
      graph: entry.graph,
      tracker,
      dispatcher: this._dispatcher,
      control,
      hooks: this._hooks,
      limits: {
        magenticMaxIterations: this._settings.magenticMaxIterations,
        loopMaxIterations: this._settings.loopMaxIterations,
        waitPollIntervalMs: this._settings.waitPollIntervalMs,
        waitTimeoutMs: this._settings.waitTimeoutMs,
      },
      logger: this._logger,
      scope: entry.scope,
    });

    let outcome: StrategyOutcome;
    try {
      outcome = await entry.strategy.run(run, entry.input);
    } catch (err) {
      const recorded = tracker.recordError(err);
      this._logger.error(`execution ${tracker.id} failed: ${recorded.message}`);
      outcome = { status: "failed", output: {} };
    }

    // Finishing is a boundary too: a paused run completes only once resumed.
    if (outcome.status === "completed") await control.waitWhilePaused();
    const status = control.cancelRequested ? "cancelled" : outcome.status;
    tracker.finish(status, outcome.output);
    this._logger.info(`execution ${tracker.id} ${status}`);

    const final = tracker.snapshot();
    try {
      await this._history.save(final);
    } catch (err) {
      this._logger.error(
        `could not save execution ${tracker.id}: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      this._active.delete(tracker.id);
    }
    return final;
  }
}
