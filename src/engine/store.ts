/**
 * Workflow lookup and execution history. The engine only needs these
 * contracts; the in-memory versions back tests, the CLI and embedders
 * that keep no durable history.
 */

import { snapshotExecution } from "./tracker.js";
import type { Execution, WorkflowGraph } from "./types.js";

export interface WorkflowStore {
  getWorkflow(workflowId: string): Promise<WorkflowGraph | undefined>;
}

export interface ExecutionHistory {
  save(execution: Execution): Promise<void>;
  get(executionId: string): Promise<Execution | undefined>;
  listByWorkflow(workflowId: string): Promise<Execution[]>;
}

export class InMemoryWorkflowStore implements WorkflowStore {
  private _workflows = new Map<string, WorkflowGraph>();

  constructor(workflows: Iterable<WorkflowGraph> = []) {
    for (const workflow of workflows) this.save(workflow);
  }

  save(workflow: WorkflowGraph): void {
    this._workflows.set(workflow.id, workflow);
  }

  delete(workflowId: string): boolean {
    return this._workflows.delete(workflowId);
  }

  list(): WorkflowGraph[] {
    return [...this._workflows.values()];
  }

  async getWorkflow(workflowId: string): Promise<WorkflowGraph | undefined> {
    return this._workflows.get(workflowId);
  }
}

export class InMemoryExecutionHistory implements ExecutionHistory {
  private _executions = new Map<string, Execution>();

  async save(execution: Execution): Promise<void> {
    this._executions.set(execution.id, snapshotExecution(execution));
  }

  async get(executionId: string): Promise<Execution | undefined> {
    const found = this._executions.get(executionId);
    return found ? snapshotExecution(found) : undefined;
  }

  async listByWorkflow(workflowId: string): Promise<Execution[]> {
    return [...this._executions.values()]
      .filter((e) => e.workflowId === workflowId)
      .map(snapshotExecution);
  }
}
