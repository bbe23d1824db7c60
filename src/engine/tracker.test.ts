import { describe, it, expect } from "vitest";
import { NodeExecutionError, OrchestrationError } from "./errors.js";
import { ExecutionTracker } from "./tracker.js";
import type { EngineEvent } from "./types.js";

const FIXED = new Date("2026-01-01T00:00:00.000Z");

function tracked() {
  const events: EngineEvent[] = [];
  const tracker = ExecutionTracker.create({
    workflowId: "wf",
    orchestration: "sequential",
    input: { a: 1 },
    emit: (e) => events.push(e),
    clock: () => FIXED,
    id: "exec-1",
  });
  return { tracker, events };
}

const node = { id: "n1", name: "Node one" };

describe("ExecutionTracker", () => {
  it("creates a running execution and announces it", () => {
    const { tracker, events } = tracked();
    const snapshot = tracker.snapshot();

    expect(snapshot).toMatchObject({
      id: "exec-1",
      workflowId: "wf",
      orchestration: "sequential",
      status: "running",
      startedAt: "2026-01-01T00:00:00.000Z",
      inputData: { a: 1 },
      outputData: {},
      steps: [],
      errors: [],
    });
    expect(events).toEqual([
      {
        kind: "status_changed",
        timestamp: "2026-01-01T00:00:00.001Z",
        executionId: "exec-1",
        data: { from: null, to: "running" },
      },
    ]);
  });

  it("hands out strictly increasing timestamps from a stalled clock", () => {
    const { tracker } = tracked();
    expect(tracker.stamp()).toBe("2026-01-01T00:00:00.002Z");
    expect(tracker.stamp()).toBe("2026-01-01T00:00:00.003Z");
  });

  it("allows only legal status transitions", () => {
    const { tracker } = tracked();
    expect(tracker.transition("paused")).toBe(true);
    expect(tracker.transition("paused")).toBe(false);
    expect(tracker.transition("running")).toBe(true);
    expect(tracker.transition("completed")).toBe(true);
    expect(tracker.transition("running")).toBe(false);
    expect(tracker.status).toBe("completed");
    expect(tracker.snapshot().completedAt).toBeDefined();
  });

  it("records completed steps in order", () => {
    const { tracker, events } = tracked();
    const step = tracker.beginStep(node, { a: 1 });
    expect(step.status).toBe("running");
    tracker.completeStep(step, { a: 2 });

    const [recorded] = tracker.snapshot().steps;
    expect(recorded).toMatchObject({ nodeId: "n1", nodeName: "Node one", status: "completed", outputData: { a: 2 } });
    expect(recorded.completedAt && recorded.completedAt > recorded.startedAt).toBe(true);
    expect(events.map((e) => e.kind)).toEqual(["status_changed", "step_started", "step_completed"]);
  });

  it("records a failed step's error on the step and the execution", () => {
    const { tracker, events } = tracked();
    const step = tracker.beginStep(node, {});
    const error = tracker.failStep(step, new Error("boom"));

    expect(error).toMatchObject({ message: "boom", kind: "node_execution", nodeId: "n1", stepId: step.id });
    const snapshot = tracker.snapshot();
    expect(snapshot.steps[0].status).toBe("failed");
    expect(snapshot.steps[0].errors).toEqual([error]);
    expect(snapshot.errors).toEqual([error]);
    expect(events[events.length - 1]).toMatchObject({ kind: "execution_error", data: { error } });
  });

  it("keeps the kind of engine errors", () => {
    const { tracker } = tracked();
    expect(tracker.recordError(new OrchestrationError("stuck")).kind).toBe("orchestration");
    expect(tracker.recordError(new NodeExecutionError("bad", { nodeId: "x" })).kind).toBe("node_execution");
    expect(tracker.recordError("plain").message).toBe("plain");
  });

  it("refuses changes once terminal", () => {
    const { tracker } = tracked();
    tracker.finish("failed", { partial: true });
    expect(tracker.snapshot().outputData).toEqual({ partial: true });
    expect(() => tracker.beginStep(node, {})).toThrow(OrchestrationError);
    expect(() => tracker.recordError(new Error("late"))).toThrow("Execution exec-1 is failed; it can no longer change");
    expect(() => tracker.finish("completed", {})).toThrow(OrchestrationError);
  });

  it("returns detached snapshots", () => {
    const { tracker } = tracked();
    tracker.completeStep(tracker.beginStep(node, { a: 1 }), { b: 1 });
    const snapshot = tracker.snapshot();
    snapshot.steps[0].outputData.b = 99;
    snapshot.steps.pop();
    expect(tracker.snapshot().steps[0].outputData).toEqual({ b: 1 });
  });
});
