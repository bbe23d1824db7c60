import { describe, it, expect } from "vitest";
import type { HandoffRouter } from "../collaborators.js";
import { WorkflowEngine } from "../engine.js";
import { FunctionRegistry } from "../handlers.js";
import { silentLogger } from "../logger.js";
import { InMemoryWorkflowStore } from "../store.js";
import { workflow } from "../test-workflow-builder.js";
import type { WorkflowGraph } from "../types.js";
import { ConditionHandoffRouter } from "./handoff.js";

function engineFor(graph: WorkflowGraph, handoff?: HandoffRouter): WorkflowEngine {
  const functions = new FunctionRegistry();
  functions.register("fail", () => {
    throw new Error("refused");
  });
  return new WorkflowEngine({
    workflows: new InMemoryWorkflowStore([graph]),
    functions,
    logger: silentLogger,
    ...(handoff ? { hooks: { handoff } } : {}),
  });
}

const routed = workflow({
  orchestration: "handoff",
  nodes: [
    { id: "s", type: "start" },
    { id: "check", type: "agent.conditional", properties: { condition: "score=5" } },
    { id: "hi" },
    { id: "lo" },
  ],
  connections: [
    { from: "s", to: "check" },
    { from: "check", to: "hi", condition: "branch=true" },
    { from: "check", to: "lo", condition: "branch=false" },
  ],
});

describe("HandoffStrategy", () => {
  it("follows the connection whose condition holds", async () => {
    const engine = engineFor(routed);

    const high = await engine.runExecution("wf", { score: 5 });
    expect(high.steps.map((s) => s.nodeId)).toEqual(["s", "check", "hi"]);
    expect(high.outputData).toEqual({ score: 5, branch: "true" });

    const low = await engine.runExecution("wf", { score: 1 });
    expect(low.steps.map((s) => s.nodeId)).toEqual(["s", "check", "lo"]);
  });

  it("ends the walk when a node would run twice", async () => {
    const engine = engineFor(
      workflow({
        orchestration: "handoff",
        nodes: [{ id: "a", orchestration: { roles: ["coordinator"] } }, { id: "b" }, { id: "c" }],
        connections: [
          { from: "a", to: "b" },
          { from: "b", to: "c" },
          { from: "c", to: "a" },
        ],
      }),
    );

    const execution = await engine.runExecution("wf");

    expect(execution.status).toBe("completed");
    expect(execution.steps.map((s) => s.nodeId)).toEqual(["a", "b", "c"]);
  });

  it("prefers higher-priority connections", async () => {
    const engine = engineFor(
      workflow({
        orchestration: "handoff",
        nodes: [{ id: "s", type: "start" }, { id: "x" }, { id: "y" }],
        connections: [
          { from: "s", to: "x" },
          { from: "s", to: "y", priority: 2 },
        ],
      }),
    );
    const execution = await engine.runExecution("wf");
    expect(execution.steps.map((s) => s.nodeId)).toEqual(["s", "y"]);
  });

  it("fails without a start or coordinator node", async () => {
    const engine = engineFor(workflow({ orchestration: "handoff", nodes: [{ id: "a" }] }));
    const execution = await engine.runExecution("wf", { x: 1 });

    expect(execution.status).toBe("failed");
    expect(execution.steps).toEqual([]);
    expect(execution.errors).toHaveLength(1);
    expect(execution.errors[0]).toMatchObject({
      kind: "orchestration",
      message: 'Workflow "wf" has no start or coordinator node',
    });
    expect(execution.outputData).toEqual({});
  });

  it("stops at a failing node", async () => {
    const engine = engineFor(
      workflow({
        orchestration: "handoff",
        nodes: [{ id: "s", type: "start" }, { id: "bad", properties: { function: "fail" } }, { id: "after" }],
        connections: [
          { from: "s", to: "bad" },
          { from: "bad", to: "after" },
        ],
      }),
    );
    const execution = await engine.runExecution("wf");
    expect(execution.status).toBe("failed");
    expect(execution.steps.map((s) => [s.nodeId, s.status])).toEqual([
      ["s", "completed"],
      ["bad", "failed"],
    ]);
  });

  it("asks a custom router for the next connection", async () => {
    const seen: string[] = [];
    const router: HandoffRouter = {
      next(request) {
        seen.push(`${request.current.id}:${request.outgoing.length}`);
        return request.current.id === "s" ? request.outgoing[1] : undefined;
      },
    };
    const engine = engineFor(routed, router);
    const execution = await engine.runExecution("wf", { score: 5 });

    expect(execution.steps).toHaveLength(1);
    expect(seen).toEqual(["s:1"]);
  });
});

describe("ConditionHandoffRouter", () => {
  it("returns nothing when no condition holds", () => {
    const router = new ConditionHandoffRouter();
    const check = routed.nodes[1];
    const outgoing = routed.connections.filter((c) => c.from.nodeId === "check");
    expect(router.next({ graph: routed, current: check, output: { branch: "maybe" }, outgoing })).toBeUndefined();
    expect(router.next({ graph: routed, current: check, output: { branch: "false" }, outgoing })?.to.nodeId).toBe("lo");
  });
});
