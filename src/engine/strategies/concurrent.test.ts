import { describe, it, expect } from "vitest";
import { WorkflowEngine } from "../engine.js";
import { FunctionRegistry } from "../handlers.js";
import { silentLogger } from "../logger.js";
import { InMemoryWorkflowStore } from "../store.js";
import { workflow, type NodeSpec } from "../test-workflow-builder.js";
import type { WorkflowGraph } from "../types.js";
import { concurrentBranches } from "./concurrent.js";

function engineFor(graph: WorkflowGraph, functions = new FunctionRegistry()): WorkflowEngine {
  functions.register("fail", () => {
    throw new Error("branch down");
  });
  functions.register("tag", (input, args) => ({ ...input, from: args.from }));
  return new WorkflowEngine({ workflows: new InMemoryWorkflowStore([graph]), functions, logger: silentLogger });
}

const tagged = (id: string): NodeSpec => ({ id, properties: { function: "tag", arguments: { from: id } } });

describe("ConcurrentStrategy", () => {
  it("keeps going when one branch fails", async () => {
    const engine = engineFor(
      workflow({
        orchestration: "concurrent",
        nodes: [{ id: "b0" }, { id: "b1" }, { id: "b2", properties: { function: "fail" } }, { id: "b3" }],
      }),
    );
    const input = { q: "x" };

    const execution = await engine.runExecution("wf", input);

    expect(execution.status).toBe("completed");
    expect(execution.errors).toHaveLength(1);
    expect(execution.errors[0]).toMatchObject({ nodeId: "b2", message: "branch down" });
    expect(execution.steps.filter((s) => s.status === "completed")).toHaveLength(3);
    expect(execution.steps.filter((s) => s.status === "failed").map((s) => s.nodeId)).toEqual(["b2"]);
    expect(execution.outputData).toEqual({ b0: input, b1: input, b3: input });
  });

  it("runs the aggregator on the merged outputs", async () => {
    const engine = engineFor(
      workflow({
        orchestration: "concurrent",
        nodes: [tagged("b0"), tagged("b1"), { id: "agg", orchestration: { roles: ["aggregator"] } }],
      }),
    );

    const execution = await engine.runExecution("wf", { x: 1 });

    expect(execution.status).toBe("completed");
    expect(execution.steps.map((s) => s.nodeId).slice(-1)).toEqual(["agg"]);
    expect(execution.steps[2].inputData).toEqual({ b0: { x: 1, from: "b0" }, b1: { x: 1, from: "b1" } });
    expect(execution.outputData).toEqual({ b0: { x: 1, from: "b0" }, b1: { x: 1, from: "b1" } });
  });

  it("fails when the aggregator fails", async () => {
    const engine = engineFor(
      workflow({
        orchestration: "concurrent",
        nodes: [{ id: "b0" }, { id: "agg", properties: { function: "fail" }, orchestration: { roles: ["aggregator"] } }],
      }),
    );
    const execution = await engine.runExecution("wf", { x: 1 });
    expect(execution.status).toBe("failed");
    expect(execution.outputData).toEqual({ b0: { x: 1 } });
  });

  it("starts every branch before any finishes", async () => {
    const functions = new FunctionRegistry();
    let started = 0;
    let release: () => void = () => {};
    const allStarted = new Promise<void>((resolve) => {
      release = resolve;
    });
    functions.register("meet", async (input) => {
      started++;
      if (started === 3) release();
      await allStarted;
      return input;
    });
    const meet = (id: string): NodeSpec => ({ id, properties: { function: "meet" } });
    const engine = engineFor(
      workflow({ orchestration: "concurrent", nodes: [meet("a"), meet("b"), meet("c")] }),
      functions,
    );

    const execution = await engine.runExecution("wf");

    expect(execution.status).toBe("completed");
    expect(started).toBe(3);
  });

  it("selects participating, parallel-eligible work nodes only", () => {
    const g = workflow({
      nodes: [
        { id: "s", type: "start" },
        { id: "e", type: "end" },
        { id: "serial", orchestration: { parallel: false } },
        { id: "idle", orchestration: { participates: false } },
        { id: "agg", orchestration: { roles: ["aggregator"] } },
        { id: "work" },
      ],
    });
    expect(concurrentBranches(g).map((n) => n.id)).toEqual(["work"]);
  });
});
