import { isStructural, participates, pipelineOrder } from "../graph.js";
import type { ExecutionRun, OrchestrationStrategy, StrategyOutcome } from "../run.js";
import type { DataMap, WorkflowGraph, WorkflowNode } from "../types.js";

/** Participating nodes in pipeline order. */
export function sequentialPlan(graph: WorkflowGraph): WorkflowNode[] {
  return pipelineOrder(graph, graph.nodes.filter((n) => participates(n) || isStructural(n)));
}

/**
 * Walks the pipeline one node at a time, feeding each node's output to
 * the next. The first failure ends the run.
 */
export class SequentialStrategy implements OrchestrationStrategy {
  readonly type = "sequential";

  async run(run: ExecutionRun, input: DataMap): Promise<StrategyOutcome> {
    let data = input;
    for (const node of sequentialPlan(run.graph)) {
      if (!(await run.boundary())) return { status: "cancelled", output: data };
      const outcome = await run.runNode(node, data);
      if (!outcome.ok) return { status: "failed", output: data };
      data = outcome.output;
    }
    return { status: "completed", output: data };
  }
}
