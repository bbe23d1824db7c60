import { describe, it, expect } from "vitest";
import type { CompletionProvider, CompletionRequest, NodeSelector } from "../collaborators.js";
import { WorkflowEngine, type EngineOptions } from "../engine.js";
import { silentLogger } from "../logger.js";
import { InMemoryWorkflowStore } from "../store.js";
import { workflow } from "../test-workflow-builder.js";
import type { WorkflowGraph } from "../types.js";
import { magenticCandidates, parseSelection, selectionPrompt } from "./magentic.js";

function engineFor(graph: WorkflowGraph, opts: Partial<EngineOptions> = {}): WorkflowEngine {
  return new WorkflowEngine({ workflows: new InMemoryWorkflowStore([graph]), logger: silentLogger, ...opts });
}

const team = workflow({
  orchestration: "magentic",
  nodes: [
    { id: "s", type: "start" },
    { id: "a", properties: { function: "identity", description: "writes" } },
    { id: "b", orchestration: { priority: 5 } },
    { id: "c" },
    { id: "e", type: "end" },
  ],
});

function scriptedProvider(replies: string[]): CompletionProvider & { requests: CompletionRequest[] } {
  const requests: CompletionRequest[] = [];
  return {
    name: "scripted",
    requests,
    async complete(req) {
      requests.push(req);
      return { text: replies[requests.length - 1] ?? "[DONE]", model: "test-model" };
    },
  };
}

describe("MagenticStrategy", () => {
  it("runs each candidate once by priority without a completion provider", async () => {
    const execution = await engineFor(team).runExecution("wf", { q: 1 });
    expect(execution.status).toBe("completed");
    expect(execution.steps.map((s) => s.nodeId)).toEqual(["b", "a", "c"]);
    expect(execution.outputData).toEqual({ q: 1 });
  });

  it("records an error when the iteration bound is reached", async () => {
    const stubborn: NodeSelector = {
      async select(request) {
        return request.candidates[0];
      },
    };
    const engine = engineFor(team, { hooks: { selector: stubborn }, settings: { magenticMaxIterations: 3 } });

    const execution = await engine.runExecution("wf");

    expect(execution.status).toBe("completed");
    expect(execution.steps.map((s) => s.nodeId)).toEqual(["b", "b", "b"]);
    expect(execution.errors).toHaveLength(1);
    expect(execution.errors[0]).toMatchObject({
      kind: "orchestration",
      message: "Selection stopped after 3 iterations",
      nodeId: "b",
    });
  });

  it("lets the model pick nodes until it says done", async () => {
    const provider = scriptedProvider(["[NEXT: c]", "I choose [next: a] now", "[DONE]"]);
    const engine = engineFor(team, { completion: provider });

    const execution = await engine.runExecution("wf", { q: 1 });

    expect(execution.steps.map((s) => s.nodeId)).toEqual(["c", "a"]);
    expect(provider.requests).toHaveLength(3);
    expect(provider.requests[2].prompt).toContain("Completed steps:\n- c: completed\n- a: completed");
  });

  it("tells the selector how many iterations have run", async () => {
    const iterations: number[] = [];
    const selector: NodeSelector = {
      async select(request) {
        iterations.push(request.iteration);
        return request.iteration < 2 ? request.candidates[2] : undefined;
      },
    };
    const execution = await engineFor(team, { hooks: { selector } }).runExecution("wf");
    expect(iterations).toEqual([0, 1, 2]);
    expect(execution.steps.map((s) => s.nodeId)).toEqual(["c", "c"]);
  });

  it("fails without running a node the selector made up", async () => {
    const ghost = { ...team.nodes[1], id: "ghost", name: "Ghost" };
    let calls = 0;
    const selector: NodeSelector = {
      async select() {
        calls++;
        return calls === 1 ? ghost : undefined;
      },
    };

    const execution = await engineFor(team, { hooks: { selector } }).runExecution("wf", { q: 1 });

    expect(execution.status).toBe("failed");
    expect(execution.steps).toEqual([]);
    expect(execution.errors).toEqual([
      expect.objectContaining({ kind: "orchestration", message: 'Selector chose "ghost", which is not a candidate' }),
    ]);
    expect(calls).toBe(1);
  });

  it("runs the workflow's own node when the selector returns a look-alike", async () => {
    const lookAlike = { ...team.nodes[3], name: "Renamed", properties: { function: "pick" } };
    const selector: NodeSelector = {
      async select(request) {
        return request.iteration === 0 ? lookAlike : undefined;
      },
    };

    const execution = await engineFor(team, { hooks: { selector } }).runExecution("wf", { q: 1 });

    expect(execution.steps.map((s) => [s.nodeId, s.nodeName])).toEqual([["c", "c"]]);
    expect(execution.outputData).toEqual({ q: 1 });
  });

  it("hands the selector copies of the recorded steps", async () => {
    const selector: NodeSelector = {
      async select(request) {
        for (const step of request.steps) {
          Object.assign(step, { nodeId: "tampered", status: "failed" });
        }
        return request.iteration < 2 ? request.candidates[request.iteration] : undefined;
      },
    };

    const execution = await engineFor(team, { hooks: { selector } }).runExecution("wf");

    expect(execution.steps.map((s) => [s.nodeId, s.status])).toEqual([
      ["b", "completed"],
      ["a", "completed"],
    ]);
  });
});

describe("selection helpers", () => {
  const candidates = magenticCandidates(team);

  it("excludes structural and idle nodes", () => {
    expect(candidates.map((n) => n.id)).toEqual(["b", "a", "c"]);
  });

  it("builds the selection prompt", () => {
    const prompt = selectionPrompt({
      executionId: "exec-1",
      candidates,
      data: { q: 1 },
      steps: [],
      iteration: 0,
      signal: new AbortController().signal,
    });
    expect(prompt).toBe(
      'Agents:\n- b: b\n- a: a (writes)\n- c: c\n\nCompleted steps:\n- none\n\nCurrent data: {"q":1}',
    );
  });

  it("parses selection markers", () => {
    expect(parseSelection("[NEXT: a]", candidates)?.id).toBe("a");
    expect(parseSelection("[next:c]", candidates)?.id).toBe("c");
    expect(parseSelection("[NEXT: zed]", candidates)).toBeUndefined();
    expect(parseSelection("[DONE] [NEXT: a]", candidates)).toBeUndefined();
    expect(parseSelection("no idea", candidates)).toBeUndefined();
  });
});
