/**
 * Core types for the agentweave orchestration engine.
 */

// ---------------------------------------------------------------------------
// Data maps
// ---------------------------------------------------------------------------

/** String-keyed map of loosely-typed values passed between nodes. */
export type DataMap = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Workflow graph model
// ---------------------------------------------------------------------------

export type NodeType =
  | "start"
  | "end"
  | "agent.llm"
  | "agent.tool"
  | "agent.conditional"
  | "agent.parallel"
  | "agent.checkpoint"
  | "agent.mcp"
  | "function";

export type OrchestrationRole =
  | "primary_executor"
  | "assistant"
  | "validator"
  | "aggregator"
  | "coordinator"
  | "observer"
  | "custom";

export type PortSpec = {
  readonly id: string;
  readonly name: string;
  readonly dataType?: string;
  readonly required?: boolean;
};

export type NodeOrchestration = {
  /** Whether orchestration strategies may pick this node. Default true. */
  readonly participates?: boolean;
  /** Whether the node may run as a concurrent branch. Default true. */
  readonly parallel?: boolean;
  readonly roles?: readonly OrchestrationRole[];
  /** Higher runs first where a strategy has to choose. Default 0. */
  readonly priority?: number;
};

export type WorkflowNode = {
  readonly id: string;
  readonly name: string;
  /** A NodeType, a legacy alias, or a custom type registered on the dispatcher. */
  readonly type: string;
  readonly position?: { readonly x: number; readonly y: number };
  readonly properties: Readonly<DataMap>;
  readonly inputPorts: readonly PortSpec[];
  readonly outputPorts: readonly PortSpec[];
  readonly orchestration?: NodeOrchestration;
};

export type ConnectionKind =
  | "data_flow"
  | "control_flow"
  | "conditional"
  | "parallel"
  | "error"
  | "signal";

export type Endpoint = {
  readonly nodeId: string;
  readonly port?: string;
};

export type Connection = {
  readonly id: string;
  readonly from: Endpoint;
  readonly to: Endpoint;
  readonly kind?: ConnectionKind;
  readonly condition?: string;
  readonly priority?: number;
};

export type OrchestrationType =
  | "sequential"
  | "concurrent"
  | "handoff"
  | "magentic"
  | "group_chat"
  | "custom";

export type WorkflowGraph = {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  /** Declared orchestration type. Unrecognized values run as "custom". */
  readonly orchestration: string;
  readonly nodes: readonly WorkflowNode[];
  readonly connections: readonly Connection[];
  readonly steps?: readonly ScriptStep[];
  readonly metadata?: Readonly<DataMap>;
};

// ---------------------------------------------------------------------------
// Custom step script
// ---------------------------------------------------------------------------

type ScriptStepBase = {
  readonly id: string;
  readonly name?: string;
  readonly order?: number;
  /** Default true. Disabled steps are skipped. */
  readonly enabled?: boolean;
  /** "abort" (default) fails the run; "continue" records the error and moves on. */
  readonly onError?: "abort" | "continue";
};

export type AgentExecutionStep = ScriptStepBase & {
  readonly type: "agent_execution";
  readonly nodeIds: readonly string[];
};

export type WaitConditionStep = ScriptStepBase & {
  readonly type: "wait_condition";
  readonly condition: string;
  readonly timeoutMs?: number;
  readonly pollIntervalMs?: number;
};

export type MergeResultsStep = ScriptStepBase & {
  readonly type: "merge_results";
  /** Ids of earlier script steps whose outputs are combined. */
  readonly sources: readonly string[];
};

export type BranchStep = ScriptStepBase & {
  readonly type: "branch";
  readonly condition: string;
  readonly then: readonly ScriptStep[];
  readonly else?: readonly ScriptStep[];
};

export type LoopStep = ScriptStepBase & {
  readonly type: "loop";
  readonly body: readonly ScriptStep[];
  /** Optional continuation condition checked before each pass. */
  readonly while?: string;
  readonly maxIterations?: number;
};

export type ScriptStep =
  | AgentExecutionStep
  | WaitConditionStep
  | MergeResultsStep
  | BranchStep
  | LoopStep;

export type ScriptStepType = ScriptStep["type"];

// ---------------------------------------------------------------------------
// Execution aggregate
// ---------------------------------------------------------------------------

export type ExecutionStatus =
  | "running"
  | "paused"
  | "completed"
  | "failed"
  | "cancelled";

export type StepStatus = "running" | "completed" | "failed";

export const TERMINAL_STATUSES: ReadonlySet<ExecutionStatus> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

export function isTerminal(status: ExecutionStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export type ErrorKind =
  | "validation"
  | "node_execution"
  | "collaborator"
  | "orchestration";

export type ExecutionError = {
  message: string;
  kind: ErrorKind;
  /** ISO-8601 */
  occurredAt: string;
  nodeId?: string;
  stepId?: string;
};

export type Step = {
  id: string;
  nodeId: string;
  nodeName: string;
  status: StepStatus;
  startedAt: string;
  completedAt?: string;
  inputData: DataMap;
  outputData: DataMap;
  errors: ExecutionError[];
};

export type Execution = {
  id: string;
  workflowId: string;
  orchestration: OrchestrationType;
  status: ExecutionStatus;
  startedAt: string;
  completedAt?: string;
  inputData: DataMap;
  outputData: DataMap;
  steps: Step[];
  errors: ExecutionError[];
};

export type Checkpoint = {
  nodeId: string;
  savedAt: string;
  data: DataMap;
};

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

type EventBase = {
  /** ISO-8601 */
  timestamp: string;
  executionId: string;
};

export type EngineEvent =
  | (EventBase & {
      kind: "status_changed";
      data: { from: ExecutionStatus | null; to: ExecutionStatus };
    })
  | (EventBase & { kind: "step_started"; data: { step: Step } })
  | (EventBase & { kind: "step_completed"; data: { step: Step } })
  | (EventBase & { kind: "execution_error"; data: { error: ExecutionError } });

export type EngineEventKind = EngineEvent["kind"];

export type EventListener = (event: EngineEvent) => void;

// ---------------------------------------------------------------------------
// Validation diagnostics
// ---------------------------------------------------------------------------

export type Severity = "error" | "warning" | "info";

export type Diagnostic = {
  rule: string;
  severity: Severity;
  message: string;
  nodeId?: string;
  connectionId?: string;
  stepId?: string;
};
