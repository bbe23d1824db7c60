/**
 * Minimal example: run a custom step script with a simulated LLM.
 *
 *   npx tsx examples/hello-workflow.ts
 */

import {
  FunctionRegistry,
  InMemoryWorkflowStore,
  WorkflowEngine,
  createConsoleLogger,
  validateOrRaise,
} from "../src/index.js";
import type { CompletionProvider, EngineEvent, WorkflowGraph } from "../src/index.js";

// -- 1. Define a workflow -----------------------------------------------

const definition: WorkflowGraph = {
  id: "hello",
  name: "Outline then polish",
  orchestration: "custom",
  nodes: [
    {
      id: "outline",
      name: "Outline",
      type: "agent.llm",
      properties: { prompt: "Outline a talk about $topic", outputKey: "outline" },
      inputPorts: [],
      outputPorts: [],
    },
    {
      id: "count",
      name: "Count words",
      type: "function",
      properties: { function: "wordCount" },
      inputPorts: [],
      outputPorts: [],
    },
    {
      id: "polish",
      name: "Polish",
      type: "agent.llm",
      properties: { prompt: "Tighten this outline:\n$outline" },
      inputPorts: [],
      outputPorts: [],
    },
  ],
  connections: [],
  steps: [
    { id: "draft", type: "agent_execution", nodeIds: ["outline", "count"] },
    {
      id: "maybe-polish",
      type: "branch",
      condition: "long = true",
      then: [{ id: "tighten", type: "agent_execution", nodeIds: ["polish"] }],
    },
  ],
};

// -- 2. Validate --------------------------------------------------------

const graph = validateOrRaise(definition);
console.log("✅ Workflow validated:", graph.nodes.length, "nodes,", graph.steps?.length ?? 0, "steps");
console.log();

// -- 3. Collaborators (replace with AnthropicCompletionProvider) --------

const simulated: CompletionProvider = {
  name: "simulated",
  async complete(request) {
    console.log(`   🤖 prompt: "${request.prompt.slice(0, 60).replace(/\n/g, " ")}…"`);
    await new Promise((r) => setTimeout(r, 100));
    return { text: "1. Why tides happen\n2. Spring and neap tides\n3. Tide tables", model: "simulated" };
  },
};

const functions = new FunctionRegistry();
functions.register("wordCount", (input) => {
  const words = String(input.outline ?? "").split(/\s+/).filter(Boolean).length;
  return { ...input, words, long: words > 8 };
});

// -- 4. Run -------------------------------------------------------------

const engine = new WorkflowEngine({
  workflows: new InMemoryWorkflowStore([graph]),
  completion: simulated,
  functions,
  logger: createConsoleLogger("hello", "info"),
  onEvent(event: EngineEvent) {
    if (event.kind === "step_started") console.log(`▶️  ${event.data.step.nodeName}`);
    if (event.kind === "step_completed") console.log(`✅ ${event.data.step.nodeName}`);
  },
});

const execution = await engine.runExecution("hello", { topic: "tides" });

console.log();
console.log("Status:", execution.status);
console.log("Steps: ", execution.steps.map((s) => s.nodeId).join(" → "));
console.log("Output:", execution.outputData.response ?? execution.outputData.outline);
