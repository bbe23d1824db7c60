/**
 * Graph snapshot and traversal helpers shared by the strategies.
 */

import { OrchestrationError, ValidationError } from "./errors.js";
import type {
  Connection,
  NodeType,
  OrchestrationRole,
  WorkflowGraph,
  WorkflowNode,
} from "./types.js";

// ---------------------------------------------------------------------------
// Node type normalization
// ---------------------------------------------------------------------------

export const LEGACY_TYPE_ALIASES: Readonly<Record<string, NodeType>> = {
  StartNode: "start",
  EndNode: "end",
  LLMAgent: "agent.llm",
  ToolAgent: "agent.tool",
  ConditionalAgent: "agent.conditional",
  ParallelAgent: "agent.parallel",
  CheckpointAgent: "agent.checkpoint",
  MCPAgent: "agent.mcp",
  FunctionNode: "function",
};

export function normalizeNodeType(type: string): string {
  return Object.hasOwn(LEGACY_TYPE_ALIASES, type) ? LEGACY_TYPE_ALIASES[type] : type;
}

export function isStructural(node: WorkflowNode): boolean {
  const type = normalizeNodeType(node.type);
  return type === "start" || type === "end";
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

/**
 * Copy and freeze a workflow so later edits to the stored definition
 * cannot reach an execution that already started.
 */
export function snapshotGraph(graph: WorkflowGraph): WorkflowGraph {
  let copy: WorkflowGraph;
  try {
    copy = structuredClone(graph);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Workflow "${graph.id}" cannot be copied: ${reason}`);
  }
  return deepFreeze(copy);
}

// ---------------------------------------------------------------------------
// Orchestration metadata
// ---------------------------------------------------------------------------

export function participates(node: WorkflowNode): boolean {
  return node.orchestration?.participates ?? true;
}

export function parallelEligible(node: WorkflowNode): boolean {
  return node.orchestration?.parallel ?? true;
}

export function hasRole(node: WorkflowNode, ...roles: OrchestrationRole[]): boolean {
  const declared: readonly OrchestrationRole[] = node.orchestration?.roles ?? [];
  return roles.some((r) => declared.includes(r));
}

export function priorityOf(node: WorkflowNode): number {
  return node.orchestration?.priority ?? 0;
}

/** Stable sort: higher priority first, declaration order otherwise. */
export function byPriority(nodes: readonly WorkflowNode[]): WorkflowNode[] {
  return nodes
    .map((node, index) => ({ node, index }))
    .sort((a, b) => priorityOf(b.node) - priorityOf(a.node) || a.index - b.index)
    .map((e) => e.node);
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

export function findNode(graph: WorkflowGraph, nodeId: string): WorkflowNode | undefined {
  return graph.nodes.find((n) => n.id === nodeId);
}

/** Outgoing connections, highest priority first, declaration order otherwise. */
export function outgoingConnections(graph: WorkflowGraph, nodeId: string): Connection[] {
  return graph.connections
    .map((connection, index) => ({ connection, index }))
    .filter((e) => e.connection.from.nodeId === nodeId)
    .sort(
      (a, b) =>
        (b.connection.priority ?? 0) - (a.connection.priority ?? 0) || a.index - b.index,
    )
    .map((e) => e.connection);
}

/** The first start-typed node, else the first coordinator. */
export function findStartNode(graph: WorkflowGraph): WorkflowNode | undefined {
  return (
    graph.nodes.find((n) => normalizeNodeType(n.type) === "start") ??
    graph.nodes.find((n) => hasRole(n, "coordinator"))
  );
}

// ---------------------------------------------------------------------------
// Pipeline order
// ---------------------------------------------------------------------------

function comparePosition(a: WorkflowNode, b: WorkflowNode): number {
  const ax = a.position?.x ?? 0;
  const bx = b.position?.x ?? 0;
  if (ax !== bx) return ax - bx;
  return (a.position?.y ?? 0) - (b.position?.y ?? 0);
}

/**
 * Topological order of the given nodes over the graph's connections
 * (Kahn). When several nodes are ready at once the leftmost declared
 * position wins, then declaration order.
 *
 * Throws OrchestrationError if the connections between these nodes
 * contain a cycle.
 */
export function pipelineOrder(
  graph: WorkflowGraph,
  nodes: readonly WorkflowNode[] = graph.nodes,
): WorkflowNode[] {
  const included = new Set(nodes.map((n) => n.id));
  const declIndex = new Map(nodes.map((n, i) => [n.id, i]));
  const inDegree = new Map<string, number>(nodes.map((n) => [n.id, 0]));
  const successors = new Map<string, string[]>();

  for (const c of graph.connections) {
    if (!included.has(c.from.nodeId) || !included.has(c.to.nodeId)) continue;
    if (c.from.nodeId === c.to.nodeId) {
      throw new OrchestrationError(`Node "${c.from.nodeId}" is connected to itself`);
    }
    const list = successors.get(c.from.nodeId) ?? [];
    list.push(c.to.nodeId);
    successors.set(c.from.nodeId, list);
    inDegree.set(c.to.nodeId, (inDegree.get(c.to.nodeId) ?? 0) + 1);
  }

  const compare = (a: WorkflowNode, b: WorkflowNode): number =>
    comparePosition(a, b) || (declIndex.get(a.id) ?? 0) - (declIndex.get(b.id) ?? 0);

  const ready = nodes.filter((n) => inDegree.get(n.id) === 0);
  const ordered: WorkflowNode[] = [];
  const byId = new Map(nodes.map((n) => [n.id, n]));

  while (ready.length > 0) {
    ready.sort(compare);
    const next = ready.shift();
    if (!next) break;
    ordered.push(next);
    for (const succ of successors.get(next.id) ?? []) {
      const remaining = (inDegree.get(succ) ?? 0) - 1;
      inDegree.set(succ, remaining);
      const node = byId.get(succ);
      if (remaining === 0 && node) ready.push(node);
    }
  }

  if (ordered.length !== nodes.length) {
    const stuck = nodes.filter((n) => !ordered.includes(n)).map((n) => n.id);
    throw new OrchestrationError(`Cycle between nodes: ${stuck.join(", ")}`);
  }
  return ordered;
}
