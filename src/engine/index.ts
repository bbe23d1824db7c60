/**
 * Orchestration engine public API.
 */

// Types
export type {
  DataMap,
  NodeType, OrchestrationRole, PortSpec, NodeOrchestration, WorkflowNode,
  ConnectionKind, Endpoint, Connection, OrchestrationType, WorkflowGraph,
  ScriptStep, ScriptStepType, AgentExecutionStep, WaitConditionStep, MergeResultsStep, BranchStep, LoopStep,
  ExecutionStatus, StepStatus, ErrorKind, ExecutionError, Step, Execution, Checkpoint,
  EngineEvent, EngineEventKind, EventListener,
  Diagnostic, Severity,
} from "./types.js";
export { isTerminal, TERMINAL_STATUSES } from "./types.js";

// Errors
export {
  EngineError, ValidationError, NodeExecutionError, CollaboratorError, OrchestrationError,
  toEngineError, toExecutionError,
} from "./errors.js";

// Collaborator contracts
export type {
  CompletionProvider, CompletionRequest, CompletionResult,
  ToolProvider, ToolCallOptions,
  ProtocolClient, ConnectionStatus,
  HandoffRouter, HandoffRequest,
  NodeSelector, SelectionRequest,
  GroupChatSession, GroupChatRequest,
  WaitPredicate, WaitRequest,
} from "./collaborators.js";

// Conditions
export { evaluateCondition, parseCondition, resolveKey, ConditionSyntaxError } from "./conditions.js";
export type { Clause } from "./conditions.js";

// Graph helpers
export {
  snapshotGraph, pipelineOrder, findNode, findStartNode, outgoingConnections,
  normalizeNodeType, LEGACY_TYPE_ALIASES,
} from "./graph.js";

// Handlers
export {
  NodeDispatcher, createDefaultDispatcher, ExecutionScope, FunctionRegistry,
  PassThroughHandler, LlmAgentHandler, ToolAgentHandler, McpAgentHandler,
  ConditionalAgentHandler, ParallelAgentHandler, CheckpointAgentHandler, FunctionNodeHandler,
  buildPrompt, expandVariables,
} from "./handlers.js";
export type { Handler, NodeContext, NodeFunction, AgentHandle, DispatcherOptions } from "./handlers.js";

// Validation
export { validateWorkflow, validateOrRaise, lintWorkflow, isWorkflowGraph, WorkflowSchema } from "./validator.js";

// Strategies
export * from "./strategies/index.js";
export { ExecutionRun, RunControl } from "./run.js";
export type { OrchestrationStrategy, StrategyHooks, RunLimits, StrategyOutcome, NodeOutcome } from "./run.js";

// Tracking and engine
export { ExecutionTracker, snapshotExecution } from "./tracker.js";
export { WorkflowEngine } from "./engine.js";
export type { EngineOptions } from "./engine.js";
export { InMemoryWorkflowStore, InMemoryExecutionHistory } from "./store.js";
export type { WorkflowStore, ExecutionHistory } from "./store.js";
export { loadSettings, DEFAULT_SETTINGS, SettingsSchema } from "./settings.js";
export type { Settings } from "./settings.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
