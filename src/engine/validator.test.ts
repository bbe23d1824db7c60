import { describe, it, expect } from "vitest";
import { ValidationError } from "./errors.js";
import { createDefaultDispatcher } from "./handlers.js";
import { chain, workflow } from "./test-workflow-builder.js";
import { isWorkflowGraph, lintWorkflow, validateOrRaise, validateWorkflow } from "./validator.js";

function rules(diagnostics: Array<{ rule: string }>): string[] {
  return diagnostics.map((d) => d.rule);
}

describe("Validator", () => {
  const dispatcher = createDefaultDispatcher();

  it("accepts a well-formed pipeline", () => {
    expect(validateWorkflow(chain(3), dispatcher)).toEqual([]);
  });

  it("reports schema errors alone", () => {
    const diagnostics = validateWorkflow({ id: "wf", name: "x", orchestration: "sequential", nodes: "nope" });
    expect(diagnostics.length).toBeGreaterThan(0);
    expect(new Set(rules(diagnostics))).toEqual(new Set(["schema"]));
    expect(diagnostics.some((d) => d.message.startsWith("/nodes:"))).toBe(true);
  });

  it("type-guards workflow documents", () => {
    expect(isWorkflowGraph(chain(1))).toBe(true);
    expect(isWorkflowGraph({ id: "wf" })).toBe(false);
  });

  it("flags duplicate node ids", () => {
    const g = workflow({ nodes: [{ id: "a" }, { id: "a" }] });
    expect(lintWorkflow(g)).toEqual([
      { rule: "unique_node_ids", severity: "error", message: 'Duplicate node id "a"', nodeId: "a" },
    ]);
  });

  it("flags unknown node types and missing properties", () => {
    const g = workflow({
      nodes: [
        { id: "x", type: "weird" },
        { id: "t", type: "agent.tool" },
      ],
    });
    expect(lintWorkflow(g, dispatcher)).toEqual([
      { rule: "node_type", severity: "error", message: 'Node "x" has unknown type "weird"', nodeId: "x" },
      {
        rule: "node_properties",
        severity: "error",
        message: 'Node "t" (agent.tool) requires a "tool" property',
        nodeId: "t",
      },
    ]);
  });

  it("skips node type checks without a dispatcher", () => {
    expect(lintWorkflow(workflow({ nodes: [{ id: "x", type: "weird" }] }))).toEqual([]);
  });

  it("flags dangling connections", () => {
    const g = workflow({ nodes: [{ id: "a" }], connections: [{ id: "c1", from: "a", to: "ghost" }] });
    expect(lintWorkflow(g)).toEqual([
      {
        rule: "connection_endpoints",
        severity: "error",
        message: 'Connection "c1" ends at unknown node "ghost"',
        connectionId: "c1",
      },
    ]);
  });

  it("checks ports only where a node declares them", () => {
    const g = workflow({
      nodes: [
        { id: "a", outputPorts: [{ id: "out", name: "result" }] },
        { id: "b" },
      ],
      connections: [
        { id: "ok", from: "a", to: "b", fromPort: "result", toPort: "anything" },
        { id: "bad", from: "a", to: "b", fromPort: "other" },
      ],
    });
    expect(lintWorkflow(g)).toEqual([
      { rule: "connection_ports", severity: "error", message: 'Node "a" has no output port "other"', connectionId: "bad" },
    ]);
  });

  it("flags malformed conditions wherever they appear", () => {
    const g = workflow({
      nodes: [{ id: "a" }, { id: "b" }, { id: "c", type: "agent.conditional", properties: { condition: "x=1 &&" } }],
      connections: [{ id: "c1", from: "a", to: "b", condition: "=1" }],
      steps: [{ id: "s1", type: "branch", condition: "bad key=1", then: [] }],
    });
    expect(rules(lintWorkflow(g))).toEqual(["condition_syntax", "condition_syntax", "condition_syntax"]);
  });

  it("warns about unknown orchestration types", () => {
    const [d] = lintWorkflow(chain(1, { orchestration: "swarm" }));
    expect(d).toEqual({
      rule: "orchestration_type",
      severity: "warning",
      message: 'Unknown orchestration type "swarm"; it will run as custom',
    });
  });

  it("warns when a handoff workflow has no entry node", () => {
    expect(rules(lintWorkflow(chain(2, { orchestration: "handoff" })))).toEqual(["handoff_start"]);
  });

  it("checks script step references", () => {
    const g = workflow({
      orchestration: "custom",
      nodes: [{ id: "a" }],
      steps: [
        { id: "s1", type: "agent_execution", nodeIds: ["a", "ghost"] },
        { id: "s2", type: "merge_results", sources: ["s1", "s9"] },
        { id: "s3", type: "loop", body: [{ id: "s1", type: "agent_execution", nodeIds: [] }] },
      ],
    });
    expect(lintWorkflow(g)).toEqual([
      { rule: "unique_step_ids", severity: "error", message: 'Duplicate step id "s1"', stepId: "s1" },
      { rule: "step_nodes", severity: "error", message: 'Step "s1" references unknown node "ghost"', stepId: "s1" },
      { rule: "step_sources", severity: "error", message: 'Step "s2" merges unknown step "s9"', stepId: "s2" },
    ]);
  });

  it("validateOrRaise throws with every error, ignoring warnings", () => {
    const g = workflow({
      orchestration: "swarm",
      nodes: [{ id: "a" }, { id: "a" }],
      connections: [{ id: "c1", from: "a", to: "ghost" }],
    });
    let caught: unknown;
    try {
      validateOrRaise(g);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError && caught.message).toBe(
      'Workflow validation failed: Duplicate node id "a"; Connection "c1" ends at unknown node "ghost"',
    );
    expect(caught instanceof ValidationError && caught.diagnostics).toHaveLength(3);
  });

  it("validateOrRaise returns a graph that only has warnings", () => {
    const g = chain(1, { orchestration: "swarm" });
    expect(validateOrRaise(g, dispatcher)).toBe(g);
  });
});
