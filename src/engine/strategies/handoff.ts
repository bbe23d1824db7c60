import type { HandoffRouter, HandoffRequest } from "../collaborators.js";
import { evaluateCondition } from "../conditions.js";
import { OrchestrationError } from "../errors.js";
import { findNode, findStartNode, outgoingConnections } from "../graph.js";
import type { ExecutionRun, OrchestrationStrategy, StrategyOutcome } from "../run.js";
import type { Connection, DataMap } from "../types.js";

/**
 * Follows the highest-priority outgoing connection whose condition holds
 * for the current output. Connections without a condition always hold.
 */
export class ConditionHandoffRouter implements HandoffRouter {
  next(request: HandoffRequest): Connection | undefined {
    return request.outgoing.find((c) => evaluateCondition(c.condition, request.output));
  }
}

/**
 * Starts at the start (or coordinator) node and hands control along one
 * connection at a time. Reaching a node that already ran ends the walk.
 */
export class HandoffStrategy implements OrchestrationStrategy {
  readonly type = "handoff";

  async run(run: ExecutionRun, input: DataMap): Promise<StrategyOutcome> {
    const graph = run.graph;
    let current = findStartNode(graph);
    if (!current) {
      throw new OrchestrationError(`Workflow "${graph.id}" has no start or coordinator node`);
    }

    const visited = new Set<string>();
    let data = input;
    while (current) {
      if (visited.has(current.id)) {
        run.logger.debug(`handoff revisits "${current.id}"; ending walk`);
        break;
      }
      if (!(await run.boundary())) return { status: "cancelled", output: data };

      visited.add(current.id);
      const outcome = await run.runNode(current, data);
      if (!outcome.ok) return { status: "failed", output: data };
      data = outcome.output;

      const connection = await run.hooks.handoff.next({
        graph,
        current,
        output: data,
        outgoing: outgoingConnections(graph, current.id),
      });
      if (!connection) break;
      const target = findNode(graph, connection.to.nodeId);
      if (!target) {
        throw new OrchestrationError(
          `Connection "${connection.id}" hands off to unknown node "${connection.to.nodeId}"`,
        );
      }
      current = target;
    }
    return { status: "completed", output: data };
  }
}
