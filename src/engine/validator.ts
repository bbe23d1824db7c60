/**
 * Workflow validation: a TypeBox schema for the document shape, then
 * lint rules over the graph it describes.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConditionSyntaxError, parseCondition } from "./conditions.js";
import { ValidationError } from "./errors.js";
import { findStartNode } from "./graph.js";
import type { NodeDispatcher } from "./handlers.js";
import { isKnownOrchestrationType, resolveOrchestrationType } from "./strategies/index.js";
import type { Diagnostic, ScriptStep, Severity, WorkflowGraph, WorkflowNode } from "./types.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const Literals = <T extends string>(values: readonly T[]) => Type.Union(values.map((v) => Type.Literal(v)));

const PortSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  dataType: Type.Optional(Type.String()),
  required: Type.Optional(Type.Boolean()),
});

const RoleSchema = Literals([
  "primary_executor",
  "assistant",
  "validator",
  "aggregator",
  "coordinator",
  "observer",
  "custom",
] as const);

export const NodeSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  type: Type.String({ minLength: 1 }),
  position: Type.Optional(Type.Object({ x: Type.Number(), y: Type.Number() })),
  properties: Type.Record(Type.String(), Type.Unknown()),
  inputPorts: Type.Array(PortSchema),
  outputPorts: Type.Array(PortSchema),
  orchestration: Type.Optional(
    Type.Object({
      participates: Type.Optional(Type.Boolean()),
      parallel: Type.Optional(Type.Boolean()),
      roles: Type.Optional(Type.Array(RoleSchema)),
      priority: Type.Optional(Type.Number()),
    }),
  ),
});

const EndpointSchema = Type.Object({
  nodeId: Type.String({ minLength: 1 }),
  port: Type.Optional(Type.String()),
});

export const ConnectionSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  from: EndpointSchema,
  to: EndpointSchema,
  kind: Type.Optional(
    Literals(["data_flow", "control_flow", "conditional", "parallel", "error", "signal"] as const),
  ),
  condition: Type.Optional(Type.String()),
  priority: Type.Optional(Type.Number()),
});

const stepBase = {
  id: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
  order: Type.Optional(Type.Number()),
  enabled: Type.Optional(Type.Boolean()),
  onError: Type.Optional(Literals(["abort", "continue"] as const)),
};

export const ScriptStepSchema = Type.Recursive((Self) =>
  Type.Union([
    Type.Object({ ...stepBase, type: Type.Literal("agent_execution"), nodeIds: Type.Array(Type.String()) }),
    Type.Object({
      ...stepBase,
      type: Type.Literal("wait_condition"),
      condition: Type.String(),
      timeoutMs: Type.Optional(Type.Number({ minimum: 0 })),
      pollIntervalMs: Type.Optional(Type.Number({ minimum: 1 })),
    }),
    Type.Object({ ...stepBase, type: Type.Literal("merge_results"), sources: Type.Array(Type.String()) }),
    Type.Object({
      ...stepBase,
      type: Type.Literal("branch"),
      condition: Type.String(),
      then: Type.Array(Self),
      else: Type.Optional(Type.Array(Self)),
    }),
    Type.Object({
      ...stepBase,
      type: Type.Literal("loop"),
      body: Type.Array(Self),
      while: Type.Optional(Type.String()),
      maxIterations: Type.Optional(Type.Integer({ minimum: 1 })),
    }),
  ]),
);

export const WorkflowSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  description: Type.Optional(Type.String()),
  orchestration: Type.String(),
  nodes: Type.Array(NodeSchema),
  connections: Type.Array(ConnectionSchema),
  steps: Type.Optional(Type.Array(ScriptStepSchema)),
  metadata: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

/** True when the value has the shape of a workflow document. */
export function isWorkflowGraph(value: unknown): value is WorkflowGraph {
  return Value.Check(WorkflowSchema, value);
}

// ---------------------------------------------------------------------------
// Lint rules
// ---------------------------------------------------------------------------

function diag(
  rule: string,
  severity: Severity,
  message: string,
  opts?: { nodeId?: string; connectionId?: string; stepId?: string },
): Diagnostic {
  return { rule, severity, message, ...opts };
}

function conditionProblem(condition: string): string | undefined {
  try {
    parseCondition(condition);
    return undefined;
  } catch (err) {
    if (err instanceof ConditionSyntaxError) return err.message;
    throw err;
  }
}

function portKnown(ports: WorkflowNode["inputPorts"], port: string | undefined): boolean {
  if (port === undefined || ports.length === 0) return true;
  return ports.some((p) => p.id === port || p.name === port);
}

function flattenSteps(steps: readonly ScriptStep[]): ScriptStep[] {
  const all: ScriptStep[] = [];
  for (const step of steps) {
    all.push(step);
    if (step.type === "branch") all.push(...flattenSteps(step.then), ...flattenSteps(step.else ?? []));
    if (step.type === "loop") all.push(...flattenSteps(step.body));
  }
  return all;
}

/**
 * Run all lint rules over a graph that already has the right shape.
 * Node type and property rules need the dispatcher that will run the graph.
 */
export function lintWorkflow(graph: WorkflowGraph, dispatcher?: NodeDispatcher): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const nodeIds = new Set<string>();

  for (const node of graph.nodes) {
    if (nodeIds.has(node.id)) {
      diagnostics.push(diag("unique_node_ids", "error", `Duplicate node id "${node.id}"`, { nodeId: node.id }));
    }
    nodeIds.add(node.id);

    if (dispatcher) {
      if (!dispatcher.has(node.type)) {
        diagnostics.push(
          diag("node_type", "error", `Node "${node.id}" has unknown type "${node.type}"`, { nodeId: node.id }),
        );
      } else {
        for (const problem of dispatcher.validateNode(node)) {
          diagnostics.push(diag("node_properties", "error", problem, { nodeId: node.id }));
        }
      }
    }

    const condition = node.properties.condition;
    if (typeof condition === "string") {
      const problem = conditionProblem(condition);
      if (problem) diagnostics.push(diag("condition_syntax", "error", problem, { nodeId: node.id }));
    }
  }

  const byId = new Map(graph.nodes.map((n) => [n.id, n]));
  const connectionIds = new Set<string>();
  for (const c of graph.connections) {
    if (connectionIds.has(c.id)) {
      diagnostics.push(diag("unique_connection_ids", "warning", `Duplicate connection id "${c.id}"`, { connectionId: c.id }));
    }
    connectionIds.add(c.id);

    const from = byId.get(c.from.nodeId);
    const to = byId.get(c.to.nodeId);
    if (!from) {
      diagnostics.push(
        diag("connection_endpoints", "error", `Connection "${c.id}" starts at unknown node "${c.from.nodeId}"`, { connectionId: c.id }),
      );
    } else if (!portKnown(from.outputPorts, c.from.port)) {
      diagnostics.push(
        diag("connection_ports", "error", `Node "${from.id}" has no output port "${c.from.port}"`, { connectionId: c.id }),
      );
    }
    if (!to) {
      diagnostics.push(
        diag("connection_endpoints", "error", `Connection "${c.id}" ends at unknown node "${c.to.nodeId}"`, { connectionId: c.id }),
      );
    } else if (!portKnown(to.inputPorts, c.to.port)) {
      diagnostics.push(
        diag("connection_ports", "error", `Node "${to.id}" has no input port "${c.to.port}"`, { connectionId: c.id }),
      );
    }
    if (c.condition !== undefined) {
      const problem = conditionProblem(c.condition);
      if (problem) diagnostics.push(diag("condition_syntax", "error", problem, { connectionId: c.id }));
    }
  }

  if (!isKnownOrchestrationType(graph.orchestration)) {
    diagnostics.push(
      diag("orchestration_type", "warning", `Unknown orchestration type "${graph.orchestration}"; it will run as custom`),
    );
  }
  if (resolveOrchestrationType(graph.orchestration) === "handoff" && !findStartNode(graph)) {
    diagnostics.push(diag("handoff_start", "warning", "Handoff workflow has no start or coordinator node"));
  }

  const steps = flattenSteps(graph.steps ?? []);
  const stepIds = new Set<string>();
  for (const step of steps) {
    if (stepIds.has(step.id)) {
      diagnostics.push(diag("unique_step_ids", "error", `Duplicate step id "${step.id}"`, { stepId: step.id }));
    }
    stepIds.add(step.id);
  }
  for (const step of steps) {
    if (step.type === "agent_execution") {
      for (const nodeId of step.nodeIds) {
        if (!nodeIds.has(nodeId)) {
          diagnostics.push(
            diag("step_nodes", "error", `Step "${step.id}" references unknown node "${nodeId}"`, { stepId: step.id }),
          );
        }
      }
    }
    if (step.type === "merge_results") {
      for (const source of step.sources) {
        if (!stepIds.has(source)) {
          diagnostics.push(
            diag("step_sources", "error", `Step "${step.id}" merges unknown step "${source}"`, { stepId: step.id }),
          );
        }
      }
    }
    const conditions =
      step.type === "branch" || step.type === "wait_condition"
        ? [step.condition]
        : step.type === "loop" && step.while !== undefined
          ? [step.while]
          : [];
    for (const condition of conditions) {
      const problem = conditionProblem(condition);
      if (problem) diagnostics.push(diag("condition_syntax", "error", problem, { stepId: step.id }));
    }
  }

  return diagnostics;
}

/**
 * Check an untrusted document against the schema, then lint it.
 * Schema errors are reported alone since the lint rules need a well-formed graph.
 */
export function validateWorkflow(raw: unknown, dispatcher?: NodeDispatcher): Diagnostic[] {
  if (!isWorkflowGraph(raw)) {
    return [...Value.Errors(WorkflowSchema, raw)].map((e) =>
      diag("schema", "error", `${e.path || "/"}: ${e.message}`),
    );
  }
  return lintWorkflow(raw, dispatcher);
}

/** Validate and return the typed graph, or throw ValidationError listing every error. */
export function validateOrRaise(raw: unknown, dispatcher?: NodeDispatcher): WorkflowGraph {
  const diagnostics = validateWorkflow(raw, dispatcher);
  const errors = diagnostics.filter((d) => d.severity === "error");
  if (errors.length > 0 || !isWorkflowGraph(raw)) {
    const summary = errors.map((d) => d.message).join("; ");
    throw new ValidationError(`Workflow validation failed: ${summary}`, diagnostics);
  }
  return raw;
}
