/**
 * Node handlers and the dispatcher that resolves a node's declared type
 * to one of them.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type {
  CompletionProvider,
  ProtocolClient,
  ToolProvider,
} from "./collaborators.js";
import { evaluateCondition, lookupPath } from "./conditions.js";
import {
  CollaboratorError,
  EngineError,
  NodeExecutionError,
  ValidationError,
  toEngineError,
} from "./errors.js";
import { normalizeNodeType } from "./graph.js";
import type { Logger } from "./logger.js";
import type { Checkpoint, DataMap, WorkflowGraph, WorkflowNode } from "./types.js";

// ---------------------------------------------------------------------------
// Execution scope
// ---------------------------------------------------------------------------

/** Resolved per-node LLM configuration. */
export type AgentHandle = {
  nodeId: string;
  model?: string;
  system?: string;
  temperature?: number;
  maxTokens?: number;
};

/**
 * State that lives exactly as long as one execution: agent handles and
 * checkpoints. Never shared between executions.
 */
export class ExecutionScope {
  private _agents = new Map<string, AgentHandle>();
  private _checkpoints: Checkpoint[] = [];

  agentFor(nodeId: string, build: () => AgentHandle): AgentHandle {
    let handle = this._agents.get(nodeId);
    if (!handle) {
      handle = build();
      this._agents.set(nodeId, handle);
    }
    return handle;
  }

  get cachedAgentCount(): number {
    return this._agents.size;
  }

  addCheckpoint(checkpoint: Checkpoint): void {
    this._checkpoints.push(checkpoint);
  }

  checkpoints(): Checkpoint[] {
    return this._checkpoints.map((c) => ({ ...c, data: { ...c.data } }));
  }
}

export type NodeContext = {
  executionId: string;
  workflowId: string;
  graph: WorkflowGraph;
  signal: AbortSignal;
  scope: ExecutionScope;
  logger: Logger;
  now: () => string;
};

// ---------------------------------------------------------------------------
// Handler interface
// ---------------------------------------------------------------------------

export interface Handler {
  execute(node: WorkflowNode, input: DataMap, ctx: NodeContext): Promise<DataMap>;
  /** Static checks on the node's properties. Returns problems found. */
  validate?(node: WorkflowNode): string[];
}

// ---------------------------------------------------------------------------
// Property helpers
// ---------------------------------------------------------------------------

function stringProp(node: WorkflowNode, key: string): string | undefined {
  const value = node.properties[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function numberProp(node: WorkflowNode, key: string): number | undefined {
  const value = node.properties[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function recordProp(node: WorkflowNode, key: string): DataMap {
  const value = node.properties[key];
  if (value === null || typeof value !== "object" || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

function requireProps(node: WorkflowNode, ...keys: string[]): string[] {
  return keys
    .filter((k) => stringProp(node, k) === undefined)
    .map((k) => `Node "${node.id}" (${node.type}) requires a "${k}" property`);
}

function required(node: WorkflowNode, key: string): string {
  const value = stringProp(node, key);
  if (value === undefined) {
    throw new NodeExecutionError(`Node "${node.id}" has no "${key}" property`, { nodeId: node.id });
  }
  return value;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  return JSON.stringify(value);
}

/**
 * Replace `$key` and `$dotted.key` tokens with values from the data map.
 * Unknown tokens are left intact.
 */
export function expandVariables(text: string, data: DataMap): string {
  return text.replace(/\$([a-zA-Z_][a-zA-Z0-9_]*(?:\.[a-zA-Z_][a-zA-Z0-9_]*)*)/g, (match, key: string) => {
    const value = lookupPath(data, key);
    return value === undefined ? match : formatValue(value);
  });
}

function expandArguments(args: DataMap, data: DataMap): DataMap {
  const expanded: DataMap = {};
  for (const [key, value] of Object.entries(args)) {
    expanded[key] = typeof value === "string" ? expandVariables(value, data) : value;
  }
  return expanded;
}

async function callCollaborator<T>(collaborator: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof EngineError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new CollaboratorError(`${collaborator} call failed: ${message}`, {
      collaborator,
      cause: err instanceof Error ? err : undefined,
    });
  }
}

// ---------------------------------------------------------------------------
// Structural handlers
// ---------------------------------------------------------------------------

export class PassThroughHandler implements Handler {
  async execute(_node: WorkflowNode, input: DataMap): Promise<DataMap> {
    return { ...input };
  }
}

// ---------------------------------------------------------------------------
// LLM agent
// ---------------------------------------------------------------------------

/**
 * Build the user prompt for an LLM node: the expanded prompt template, an
 * optional assistant preamble, the input data and the agent's role.
 */
export function buildPrompt(node: WorkflowNode, input: DataMap): string {
  const sections: string[] = [];
  const template = stringProp(node, "prompt");
  if (template) sections.push(expandVariables(template, input));
  const assistant = stringProp(node, "assistantPrompt");
  if (assistant) sections.push(expandVariables(assistant, input));

  const entries = Object.entries(input);
  if (entries.length > 0) {
    sections.push(["Input Data:", ...entries.map(([k, v]) => `- ${k}: ${formatValue(v)}`)].join("\n"));
  }

  const description = stringProp(node, "description");
  if (description) sections.push(`Agent Role: ${description}`);
  return sections.join("\n\n");
}

export class LlmAgentHandler implements Handler {
  private _provider: CompletionProvider | undefined;
  private _defaultModel: string | undefined;

  constructor(provider: CompletionProvider | undefined, defaultModel?: string) {
    this._provider = provider;
    this._defaultModel = defaultModel;
  }

  validate(node: WorkflowNode): string[] {
    return requireProps(node, "prompt");
  }

  async execute(node: WorkflowNode, input: DataMap, ctx: NodeContext): Promise<DataMap> {
    const provider = this._provider;
    if (!provider) {
      throw new CollaboratorError("No completion provider configured", { collaborator: "completion" });
    }

    const agent = ctx.scope.agentFor(node.id, () => ({
      nodeId: node.id,
      model: stringProp(node, "model") ?? this._defaultModel,
      system: stringProp(node, "systemPrompt"),
      temperature: numberProp(node, "temperature"),
      maxTokens: numberProp(node, "maxTokens"),
    }));

    const result = await callCollaborator(provider.name, () =>
      provider.complete({
        model: agent.model,
        system: agent.system ? expandVariables(agent.system, input) : undefined,
        prompt: buildPrompt(node, input),
        temperature: agent.temperature,
        maxTokens: agent.maxTokens,
        signal: ctx.signal,
      }),
    );

    return { ...input, [stringProp(node, "outputKey") ?? "response"]: result.text };
  }
}

// ---------------------------------------------------------------------------
// Tool agent
// ---------------------------------------------------------------------------

export class ToolAgentHandler implements Handler {
  private _tools: ToolProvider | undefined;

  constructor(tools: ToolProvider | undefined) {
    this._tools = tools;
  }

  validate(node: WorkflowNode): string[] {
    return requireProps(node, "tool");
  }

  async execute(node: WorkflowNode, input: DataMap, ctx: NodeContext): Promise<DataMap> {
    const tools = this._tools;
    if (!tools) {
      throw new CollaboratorError("No tool provider configured", { collaborator: "tool" });
    }
    const name = required(node, "tool");
    const args = expandArguments(recordProp(node, "arguments"), input);
    const result = await callCollaborator("tool", () =>
      tools.invoke(name, args, { signal: ctx.signal, executionId: ctx.executionId, nodeId: node.id }),
    );
    return { ...input, [stringProp(node, "outputKey") ?? "toolResult"]: result };
  }
}

// ---------------------------------------------------------------------------
// Protocol (MCP) agent
// ---------------------------------------------------------------------------

export class McpAgentHandler implements Handler {
  private _client: ProtocolClient | undefined;

  constructor(client: ProtocolClient | undefined) {
    this._client = client;
  }

  validate(node: WorkflowNode): string[] {
    return requireProps(node, "serverId", "tool");
  }

  async execute(node: WorkflowNode, input: DataMap, ctx: NodeContext): Promise<DataMap> {
    const client = this._client;
    if (!client) {
      throw new CollaboratorError("No protocol client configured", { collaborator: "protocol" });
    }
    const serverId = required(node, "serverId");
    const tool = required(node, "tool");
    const args = expandArguments(recordProp(node, "arguments"), input);

    const result = await callCollaborator("protocol", async () => {
      if (client.status(serverId) !== "connected") {
        await client.connect(serverId);
      }
      return client.callTool(serverId, tool, args, ctx.signal);
    });
    return { ...input, [stringProp(node, "outputKey") ?? "mcpResult"]: result };
  }
}

// ---------------------------------------------------------------------------
// Conditional agent
// ---------------------------------------------------------------------------

export class ConditionalAgentHandler implements Handler {
  validate(node: WorkflowNode): string[] {
    return requireProps(node, "condition");
  }

  async execute(node: WorkflowNode, input: DataMap): Promise<DataMap> {
    const result = evaluateCondition(required(node, "condition"), input);
    return { ...input, branch: result ? "true" : "false" };
  }
}

// ---------------------------------------------------------------------------
// Parallel agent
// ---------------------------------------------------------------------------

const ParallelTasks = Type.Array(
  Type.Object({
    key: Type.String({ minLength: 1 }),
    tool: Type.String({ minLength: 1 }),
    arguments: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  }),
  { minItems: 1 },
);

type ParallelTask = Static<typeof ParallelTasks>[number];

/** Runs the node's tool tasks concurrently and collects each result under its key. */
export class ParallelAgentHandler implements Handler {
  private _tools: ToolProvider | undefined;

  constructor(tools: ToolProvider | undefined) {
    this._tools = tools;
  }

  validate(node: WorkflowNode): string[] {
    if (Value.Check(ParallelTasks, node.properties.tasks)) return [];
    return [`Node "${node.id}" (${node.type}) requires a non-empty "tasks" list of { key, tool, arguments? }`];
  }

  async execute(node: WorkflowNode, input: DataMap, ctx: NodeContext): Promise<DataMap> {
    const tools = this._tools;
    if (!tools) {
      throw new CollaboratorError("No tool provider configured", { collaborator: "tool" });
    }
    const tasks = node.properties.tasks;
    if (!Value.Check(ParallelTasks, tasks)) {
      throw new NodeExecutionError(`Node "${node.id}" has no valid "tasks" list`, { nodeId: node.id });
    }

    const run = (task: ParallelTask) =>
      callCollaborator("tool", () =>
        tools.invoke(task.tool, expandArguments(task.arguments ?? {}, input), {
          signal: ctx.signal,
          executionId: ctx.executionId,
          nodeId: node.id,
        }),
      );
    const results = await Promise.all(tasks.map(run));

    const output: DataMap = { ...input };
    tasks.forEach((task, i) => {
      output[task.key] = results[i];
    });
    return output;
  }
}

// ---------------------------------------------------------------------------
// Checkpoint agent
// ---------------------------------------------------------------------------

export class CheckpointAgentHandler implements Handler {
  async execute(node: WorkflowNode, input: DataMap, ctx: NodeContext): Promise<DataMap> {
    const savedAt = ctx.now();
    ctx.scope.addCheckpoint({ nodeId: node.id, savedAt, data: { ...input } });
    ctx.logger.debug(`checkpoint saved at node "${node.id}"`);
    return { ...input, checkpoint: { nodeId: node.id, savedAt } };
  }
}

// ---------------------------------------------------------------------------
// Function node
// ---------------------------------------------------------------------------

export type NodeFunction = (
  input: DataMap,
  args: DataMap,
  ctx: NodeContext,
) => DataMap | Promise<DataMap>;

export class FunctionRegistry {
  private _functions = new Map<string, NodeFunction>();

  constructor(withBuiltins = true) {
    if (withBuiltins) {
      this.register("identity", (input) => ({ ...input }));
      this.register("merge", (input, args) => ({ ...input, ...args }));
      this.register("pick", (input, args) => {
        const keys = Array.isArray(args.keys) ? args.keys.filter((k): k is string => typeof k === "string") : [];
        const picked: DataMap = {};
        for (const key of keys) {
          if (Object.hasOwn(input, key)) picked[key] = input[key];
        }
        return picked;
      });
    }
  }

  register(name: string, fn: NodeFunction): void {
    this._functions.set(name, fn);
  }

  get(name: string): NodeFunction | undefined {
    return this._functions.get(name);
  }

  has(name: string): boolean {
    return this._functions.has(name);
  }
}

export class FunctionNodeHandler implements Handler {
  private _functions: FunctionRegistry;

  constructor(functions: FunctionRegistry) {
    this._functions = functions;
  }

  validate(node: WorkflowNode): string[] {
    const problems = requireProps(node, "function");
    const name = stringProp(node, "function");
    if (name && !this._functions.has(name)) {
      problems.push(`Node "${node.id}" references unknown function "${name}"`);
    }
    return problems;
  }

  async execute(node: WorkflowNode, input: DataMap, ctx: NodeContext): Promise<DataMap> {
    const name = required(node, "function");
    const fn = this._functions.get(name);
    if (!fn) {
      throw new NodeExecutionError(`Unknown function "${name}"`, { nodeId: node.id });
    }
    return fn(input, expandArguments(recordProp(node, "arguments"), input), ctx);
  }
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export class NodeDispatcher {
  private _handlers = new Map<string, Handler>();

  register(type: string, handler: Handler): void {
    this._handlers.set(normalizeNodeType(type), handler);
  }

  resolve(type: string): Handler | undefined {
    return this._handlers.get(normalizeNodeType(type));
  }

  has(type: string): boolean {
    return this._handlers.has(normalizeNodeType(type));
  }

  validateNode(node: WorkflowNode): string[] {
    return this.resolve(node.type)?.validate?.(node) ?? [];
  }

  /**
   * Run a node's handler against a private copy of the input.
   * Anything the handler throws comes back as an EngineError.
   */
  async execute(node: WorkflowNode, input: DataMap, ctx: NodeContext): Promise<DataMap> {
    const handler = this.resolve(node.type);
    if (!handler) {
      throw new ValidationError(`No handler registered for node type "${node.type}"`);
    }
    try {
      return await handler.execute(node, { ...input }, ctx);
    } catch (err) {
      throw toEngineError(err, node.id);
    }
  }
}

export type DispatcherOptions = {
  completion?: CompletionProvider;
  tools?: ToolProvider;
  protocol?: ProtocolClient;
  functions?: FunctionRegistry;
  defaultModel?: string;
};

export function createDefaultDispatcher(opts: DispatcherOptions = {}): NodeDispatcher {
  const dispatcher = new NodeDispatcher();
  const passThrough = new PassThroughHandler();
  dispatcher.register("start", passThrough);
  dispatcher.register("end", passThrough);
  dispatcher.register("agent.llm", new LlmAgentHandler(opts.completion, opts.defaultModel));
  dispatcher.register("agent.tool", new ToolAgentHandler(opts.tools));
  dispatcher.register("agent.mcp", new McpAgentHandler(opts.protocol));
  dispatcher.register("agent.conditional", new ConditionalAgentHandler());
  dispatcher.register("agent.parallel", new ParallelAgentHandler(opts.tools));
  dispatcher.register("agent.checkpoint", new CheckpointAgentHandler());
  dispatcher.register("function", new FunctionNodeHandler(opts.functions ?? new FunctionRegistry()));
  return dispatcher;
}
