/**
 * Test-only helper for building WorkflowGraph objects inline.
 *
 * Nodes default to `function` nodes running the built-in `identity`
 * function, so a pipeline only needs ids and connections.
 */

import type {
  Connection,
  DataMap,
  NodeOrchestration,
  PortSpec,
  ScriptStep,
  WorkflowGraph,
  WorkflowNode,
} from "./types.js";

export type NodeSpec = {
  id: string;
  type?: string;
  name?: string;
  properties?: DataMap;
  orchestration?: NodeOrchestration;
  position?: { x: number; y: number };
  inputPorts?: PortSpec[];
  outputPorts?: PortSpec[];
};

export type ConnectionSpec = {
  from: string;
  to: string;
  id?: string;
  condition?: string;
  priority?: number;
  fromPort?: string;
  toPort?: string;
};

export type WorkflowSpec = {
  id?: string;
  name?: string;
  orchestration?: string;
  nodes: NodeSpec[];
  connections?: ConnectionSpec[];
  steps?: ScriptStep[];
};

/**
 * Build a WorkflowGraph from a concise shape.
 *
 * ```ts
 * const wf = workflow({
 *   orchestration: "sequential",
 *   nodes: [{ id: "a" }, { id: "b" }],
 *   connections: [{ from: "a", to: "b" }],
 * });
 * ```
 */
export function workflow(shape: WorkflowSpec): WorkflowGraph {
  const nodes: WorkflowNode[] = shape.nodes.map((n) => ({
    id: n.id,
    name: n.name ?? n.id,
    type: n.type ?? "function",
    properties: n.properties ?? (n.type ? {} : { function: "identity" }),
    inputPorts: n.inputPorts ?? [],
    outputPorts: n.outputPorts ?? [],
    ...(n.position ? { position: n.position } : {}),
    ...(n.orchestration ? { orchestration: n.orchestration } : {}),
  }));

  const connections: Connection[] = (shape.connections ?? []).map((c, i) => ({
    id: c.id ?? `c${i}`,
    from: c.fromPort ? { nodeId: c.from, port: c.fromPort } : { nodeId: c.from },
    to: c.toPort ? { nodeId: c.to, port: c.toPort } : { nodeId: c.to },
    ...(c.condition !== undefined ? { condition: c.condition } : {}),
    ...(c.priority !== undefined ? { priority: c.priority } : {}),
  }));

  return {
    id: shape.id ?? "wf",
    name: shape.name ?? "Test workflow",
    orchestration: shape.orchestration ?? "sequential",
    nodes,
    connections,
    ...(shape.steps ? { steps: shape.steps } : {}),
  };
}

/** `count` identity nodes n0..n(count-1) connected in a line. */
export function chain(count: number, overrides: Partial<WorkflowSpec> = {}): WorkflowGraph {
  const ids = Array.from({ length: count }, (_, i) => `n${i}`);
  return workflow({
    nodes: ids.map((id) => ({ id })),
    connections: ids.slice(1).map((id, i) => ({ from: ids[i], to: id })),
    ...overrides,
  });
}
