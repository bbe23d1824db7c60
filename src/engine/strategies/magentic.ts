import type { CompletionProvider, NodeSelector, SelectionRequest } from "../collaborators.js";
import { OrchestrationError } from "../errors.js";
import { byPriority, isStructural, participates } from "../graph.js";
import type { ExecutionRun, OrchestrationStrategy, StrategyOutcome } from "../run.js";
import type { DataMap, WorkflowGraph, WorkflowNode } from "../types.js";

export const DEFAULT_MAX_ITERATIONS = 10;

export function magenticCandidates(graph: WorkflowGraph): WorkflowNode[] {
  return byPriority(graph.nodes.filter((n) => participates(n) && !isStructural(n)));
}

// ---------------------------------------------------------------------------
// Selectors
// ---------------------------------------------------------------------------

/** Selects each candidate once, highest priority first, then stops. */
export class PriorityNodeSelector implements NodeSelector {
  async select(request: SelectionRequest): Promise<WorkflowNode | undefined> {
    const ran = new Set(request.steps.map((s) => s.nodeId));
    return request.candidates.find((n) => !ran.has(n.id));
  }
}

const NEXT_MARKER = /\[NEXT:\s*([^\]\s]+)\s*\]/i;
const DONE_MARKER = /\[DONE\]/i;

/**
 * Asks a completion provider which node should act next. The model
 * answers with `[NEXT: <node id>]` or `[DONE]`.
 */
export class LlmNodeSelector implements NodeSelector {
  private _provider: CompletionProvider;
  private _model: string | undefined;

  constructor(provider: CompletionProvider, model?: string) {
    this._provider = provider;
    this._model = model;
  }

  async select(request: SelectionRequest): Promise<WorkflowNode | undefined> {
    const result = await this._provider.complete({
      model: this._model,
      system:
        "You coordinate a team of agents. Pick the agent that should act next, " +
        "answering with [NEXT: <agent id>], or [DONE] when the task is finished.",
      prompt: selectionPrompt(request),
      signal: request.signal,
    });
    return parseSelection(result.text, request.candidates);
  }
}

export function selectionPrompt(request: SelectionRequest): string {
  const agents = request.candidates.map((n) => {
    const description = n.properties.description;
    return typeof description === "string" ? `- ${n.id}: ${n.name} (${description})` : `- ${n.id}: ${n.name}`;
  });
  const history = request.steps.map((s) => `- ${s.nodeId}: ${s.status}`);
  return [
    "Agents:",
    ...agents,
    "",
    "Completed steps:",
    ...(history.length > 0 ? history : ["- none"]),
    "",
    `Current data: ${JSON.stringify(request.data)}`,
  ].join("\n");
}

/** Unknown ids and missing markers end the selection. */
export function parseSelection(text: string, candidates: readonly WorkflowNode[]): WorkflowNode | undefined {
  if (DONE_MARKER.test(text)) return undefined;
  const match = NEXT_MARKER.exec(text);
  if (!match) return undefined;
  return candidates.find((n) => n.id === match[1]);
}

// ---------------------------------------------------------------------------
// Strategy
// ---------------------------------------------------------------------------

/**
 * Lets the selector pick the next node from the candidates, over and over,
 * until it picks none or the iteration bound is reached. Reaching the
 * bound is recorded as an orchestration error but keeps the data produced.
 * A pick that is not a candidate fails the run.
 */
export class MagenticStrategy implements OrchestrationStrategy {
  readonly type = "magentic";

  async run(run: ExecutionRun, input: DataMap): Promise<StrategyOutcome> {
    const candidates = magenticCandidates(run.graph);
    const maxIterations = run.limits.magenticMaxIterations;
    let data = input;

    for (let iteration = 0; ; iteration++) {
      if (!(await run.boundary())) return { status: "cancelled", output: data };

      const selected = await run.hooks.selector.select({
        executionId: run.executionId,
        candidates,
        data,
        steps: run.steps(),
        iteration,
        signal: run.signal,
      });
      if (!selected) break;

      const node = candidates.find((n) => n.id === selected.id);
      if (!node) {
        run.recordError(new OrchestrationError(`Selector chose "${selected.id}", which is not a candidate`));
        return { status: "failed", output: data };
      }

      if (iteration >= maxIterations) {
        run.recordError(
          new OrchestrationError(`Selection stopped after ${maxIterations} iterations`),
          { nodeId: node.id },
        );
        break;
      }

      const outcome = await run.runNode(node, data);
      if (!outcome.ok) return { status: "failed", output: data };
      data = outcome.output;
    }
    return { status: "completed", output: data };
  }
}
