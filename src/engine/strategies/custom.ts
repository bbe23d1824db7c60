import type { WaitPredicate } from "../collaborators.js";
import { evaluateCondition } from "../conditions.js";
import { OrchestrationError, ValidationError } from "../errors.js";
import { findNode } from "../graph.js";
import type { ExecutionRun, OrchestrationStrategy, StrategyOutcome } from "../run.js";
import type {
  AgentExecutionStep,
  BranchStep,
  DataMap,
  LoopStep,
  MergeResultsStep,
  ScriptStep,
  WaitConditionStep,
  WorkflowGraph,
} from "../types.js";
import { sequentialPlan } from "./sequential.js";

// ---------------------------------------------------------------------------
// Script state
// ---------------------------------------------------------------------------

export type ScriptState = {
  data: DataMap;
  outputs: Record<string, DataMap>;
};

export type StepResult = "ok" | "failed" | "cancelled";

type HookFor<S extends ScriptStep> = (
  run: ExecutionRun,
  step: S,
  state: ScriptState,
  interpreter: CustomStrategy,
) => Promise<StepResult>;

/** One execution hook per script step type. */
export type ScriptStepHooks = {
  agent_execution: HookFor<AgentExecutionStep>;
  wait_condition: HookFor<WaitConditionStep>;
  merge_results: HookFor<MergeResultsStep>;
  branch: HookFor<BranchStep>;
  loop: HookFor<LoopStep>;
};

/** Enabled steps sorted by `order`, declaration order breaking ties. */
export function orderSteps(steps: readonly ScriptStep[]): ScriptStep[] {
  return steps
    .map((step, index) => ({ step, index }))
    .filter((e) => e.step.enabled !== false)
    .sort((a, b) => (a.step.order ?? 0) - (b.step.order ?? 0) || a.index - b.index)
    .map((e) => e.step);
}

/** The script a workflow without one runs: every pipeline node in order. */
export function defaultScript(graph: WorkflowGraph): ScriptStep[] {
  return [
    {
      id: "pipeline",
      type: "agent_execution",
      nodeIds: sequentialPlan(graph).map((n) => n.id),
    },
  ];
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    function onAbort() {
      clearTimeout(timer);
      resolve();
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

// ---------------------------------------------------------------------------
// Default hooks
// ---------------------------------------------------------------------------

export const defaultWaitPredicate: WaitPredicate = ({ step, data }) =>
  evaluateCondition(step.condition, data);

const runAgents: HookFor<AgentExecutionStep> = async (run, step, state) => {
  for (const nodeId of step.nodeIds) {
    const node = findNode(run.graph, nodeId);
    if (!node) {
      throw new ValidationError(`Step "${step.id}" references unknown node "${nodeId}"`);
    }
    if (!(await run.boundary())) return "cancelled";
    const outcome = await run.runNode(node, state.data);
    if (!outcome.ok) return "failed";
    state.data = outcome.output;
  }
  state.outputs[step.id] = state.data;
  return "ok";
};

const waitFor: HookFor<WaitConditionStep> = async (run, step, state) => {
  const timeoutMs = step.timeoutMs ?? run.limits.waitTimeoutMs;
  const pollMs = step.pollIntervalMs ?? run.limits.waitPollIntervalMs;
  const deadline = Date.now() + timeoutMs;

  while (true) {
    if (!(await run.boundary())) return "cancelled";
    const satisfied = await run.hooks.waitPredicate({ step, data: state.data, outputs: state.outputs });
    if (satisfied) {
      state.outputs[step.id] = state.data;
      return "ok";
    }
    if (Date.now() >= deadline) {
      throw new OrchestrationError(`Wait step "${step.id}" timed out after ${timeoutMs}ms`);
    }
    await sleep(Math.min(pollMs, Math.max(0, deadline - Date.now())), run.signal);
  }
};

const mergeResults: HookFor<MergeResultsStep> = async (_run, step, state) => {
  const merged: DataMap = {};
  for (const source of step.sources) {
    const output = state.outputs[source];
    if (output === undefined) {
      throw new OrchestrationError(`Merge step "${step.id}" has no output from step "${source}"`);
    }
    merged[source] = output;
  }
  state.data = { ...state.data, ...merged };
  state.outputs[step.id] = merged;
  return "ok";
};

const branch: HookFor<BranchStep> = async (run, step, state, interpreter) => {
  const path = evaluateCondition(step.condition, state.data) ? step.then : (step.else ?? []);
  const result = await interpreter.runSequence(run, path, state);
  if (result === "ok") state.outputs[step.id] = state.data;
  return result;
};

const loop: HookFor<LoopStep> = async (run, step, state, interpreter) => {
  const maxIterations = step.maxIterations ?? run.limits.loopMaxIterations;
  for (let i = 0; i < maxIterations; i++) {
    if (step.while !== undefined && !evaluateCondition(step.while, state.data)) break;
    const result = await interpreter.runSequence(run, step.body, state);
    if (result !== "ok") return result;
  }
  state.outputs[step.id] = state.data;
  return "ok";
};

export const DEFAULT_SCRIPT_HOOKS: ScriptStepHooks = {
  agent_execution: runAgents,
  wait_condition: waitFor,
  merge_results: mergeResults,
  branch,
  loop,
};

// ---------------------------------------------------------------------------
// Strategy
// ---------------------------------------------------------------------------

/**
 * Step-script interpreter. Runs the workflow's enabled script steps in
 * order; a workflow without a script runs its pipeline as one
 * agent_execution step. Failures are not retried: a step whose onError is
 * "continue" leaves its error on the record and the script moves on.
 */
export class CustomStrategy implements OrchestrationStrategy {
  readonly type = "custom";
  private _hooks: ScriptStepHooks;

  constructor(hooks: Partial<ScriptStepHooks> = {}) {
    this._hooks = { ...DEFAULT_SCRIPT_HOOKS, ...hooks };
  }

  async run(run: ExecutionRun, input: DataMap): Promise<StrategyOutcome> {
    const script = run.graph.steps && run.graph.steps.length > 0 ? run.graph.steps : defaultScript(run.graph);
    const state: ScriptState = { data: input, outputs: {} };
    const result = await this.runSequence(run, script, state);
    return { status: result === "ok" ? "completed" : result, output: state.data };
  }

  async runSequence(run: ExecutionRun, steps: readonly ScriptStep[], state: ScriptState): Promise<StepResult> {
    for (const step of orderSteps(steps)) {
      if (!(await run.boundary())) return "cancelled";

      let result: StepResult;
      try {
        result = await this.runStep(run, step, state);
      } catch (err) {
        const recorded = run.recordError(err);
        run.logger.warn(`script step "${step.id}" failed: ${recorded.message}`);
        result = "failed";
      }

      if (result === "cancelled") return result;
      if (result === "failed" && (step.onError ?? "abort") === "abort") return "failed";
    }
    return "ok";
  }

  private runStep(run: ExecutionRun, step: ScriptStep, state: ScriptState): Promise<StepResult> {
    switch (step.type) {
      case "agent_execution":
        return this._hooks.agent_execution(run, step, state, this);
      case "wait_condition":
        return this._hooks.wait_condition(run, step, state, this);
      case "merge_results":
        return this._hooks.merge_results(run, step, state, this);
      case "branch":
        return this._hooks.branch(run, step, state, this);
      case "loop":
        return this._hooks.loop(run, step, state, this);
    }
  }
}
