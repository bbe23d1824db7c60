/**
 * Contracts for the external collaborators the engine calls out to.
 * The engine owns none of this logic; adapters live in src/llm and
 * src/collaborators.
 */

import type {
  Connection,
  DataMap,
  Step,
  WaitConditionStep,
  WorkflowGraph,
  WorkflowNode,
} from "./types.js";

// ---------------------------------------------------------------------------
// LLM completion
// ---------------------------------------------------------------------------

export type CompletionRequest = {
  model?: string;
  system?: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export type CompletionResult = {
  text: string;
  model: string;
};

export interface CompletionProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export type ToolCallOptions = {
  signal?: AbortSignal;
  executionId?: string;
  nodeId?: string;
};

export interface ToolProvider {
  invoke(name: string, args: DataMap, options?: ToolCallOptions): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// Protocol client
// ---------------------------------------------------------------------------

export type ConnectionStatus = "connected" | "disconnected" | "error";

export interface ProtocolClient {
  connect(serverId: string): Promise<void>;
  disconnect(serverId: string): Promise<void>;
  status(serverId: string): ConnectionStatus;
  callTool(serverId: string, toolName: string, args: DataMap, signal?: AbortSignal): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// Strategy hooks
// ---------------------------------------------------------------------------

export type HandoffRequest = {
  graph: WorkflowGraph;
  current: WorkflowNode;
  output: DataMap;
  outgoing: Connection[];
};

/** Picks the single connection a handoff walk follows next, or none to stop. */
export interface HandoffRouter {
  next(request: HandoffRequest): Connection | undefined | Promise<Connection | undefined>;
}

export type SelectionRequest = {
  executionId: string;
  candidates: WorkflowNode[];
  data: DataMap;
  steps: readonly Step[];
  iteration: number;
  signal: AbortSignal;
};

/** Chooses the next node for a magentic run. `undefined` ends the run. */
export interface NodeSelector {
  select(request: SelectionRequest): Promise<WorkflowNode | undefined>;
}

export type GroupChatRequest = {
  executionId: string;
  workflowId: string;
  participants: WorkflowNode[];
  input: DataMap;
  signal: AbortSignal;
};

export interface GroupChatSession {
  converse(request: GroupChatRequest): Promise<DataMap>;
}

export type WaitRequest = {
  step: WaitConditionStep;
  data: DataMap;
  /** Outputs of earlier script steps, by step id. */
  outputs: Readonly<Record<string, DataMap>>;
};

export type WaitPredicate = (request: WaitRequest) => boolean | Promise<boolean>;
