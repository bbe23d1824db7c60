import { hasRole, isStructural, parallelEligible, participates } from "../graph.js";
import type { ExecutionRun, OrchestrationStrategy, StrategyOutcome } from "../run.js";
import type { DataMap, WorkflowGraph, WorkflowNode } from "../types.js";

export function concurrentBranches(graph: WorkflowGraph): WorkflowNode[] {
  return graph.nodes.filter(
    (n) => participates(n) && parallelEligible(n) && !isStructural(n) && !hasRole(n, "aggregator"),
  );
}

/**
 * Fans the input out to every parallel-eligible node and joins the
 * results keyed by node id. A failed branch is recorded on its step and
 * left out of the merged output; its siblings carry on.
 *
 * When the graph has an aggregator node it runs on the merged map as the
 * fan-in step, and its failure fails the run.
 */
export class ConcurrentStrategy implements OrchestrationStrategy {
  readonly type = "concurrent";

  async run(run: ExecutionRun, input: DataMap): Promise<StrategyOutcome> {
    if (!(await run.boundary())) return { status: "cancelled", output: input };

    const branches = concurrentBranches(run.graph);
    const outcomes = await Promise.all(branches.map((node) => run.runNode(node, input)));

    const merged: DataMap = {};
    let failures = 0;
    for (const outcome of outcomes) {
      if (outcome.ok) merged[outcome.step.nodeId] = outcome.output;
      else failures++;
    }
    if (failures > 0) {
      run.logger.info(`${failures} of ${branches.length} branches failed`);
    }

    const aggregator = run.graph.nodes.find((n) => participates(n) && hasRole(n, "aggregator"));
    if (!aggregator) return { status: "completed", output: merged };

    if (!(await run.boundary())) return { status: "cancelled", output: merged };
    const fanIn = await run.runNode(aggregator, merged);
    if (!fanIn.ok) return { status: "failed", output: merged };
    return { status: "completed", output: fanIn.output };
  }
}
