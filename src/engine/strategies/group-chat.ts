import type { CompletionProvider, GroupChatRequest, GroupChatSession } from "../collaborators.js";
import { CollaboratorError, EngineError, OrchestrationError } from "../errors.js";
import { hasRole, participates } from "../graph.js";
import type { ExecutionRun, OrchestrationStrategy, StrategyOutcome } from "../run.js";
import type { DataMap, WorkflowGraph, WorkflowNode } from "../types.js";

export function groupChatParticipants(graph: WorkflowGraph): WorkflowNode[] {
  return graph.nodes.filter(
    (n) => participates(n) && hasRole(n, "primary_executor", "assistant", "coordinator"),
  );
}

export type ChatMessage = {
  speaker: string;
  text: string;
};

/**
 * Round-robin conversation: each participant speaks in turn through the
 * completion provider, seeing the transcript so far. The chat ends when a
 * message contains `[DONE]` or after `rounds` full rounds.
 */
export class TurnTakingGroupChat implements GroupChatSession {
  private _provider: CompletionProvider;
  private _rounds: number;
  private _model: string | undefined;

  constructor(provider: CompletionProvider, opts: { rounds?: number; model?: string } = {}) {
    this._provider = provider;
    this._rounds = opts.rounds ?? 3;
    this._model = opts.model;
  }

  async converse(request: GroupChatRequest): Promise<DataMap> {
    const transcript: ChatMessage[] = [];
    const task = JSON.stringify(request.input);
    let finished = false;

    for (let round = 0; round < this._rounds && !finished; round++) {
      for (const participant of request.participants) {
        if (request.signal.aborted) break;
        const result = await this._provider.complete({
          model: typeof participant.properties.model === "string" ? participant.properties.model : this._model,
          system: chatSystemPrompt(participant),
          prompt: [
            `Task: ${task}`,
            "",
            "Conversation so far:",
            ...(transcript.length > 0 ? transcript.map((m) => `${m.speaker}: ${m.text}`) : ["(nothing yet)"]),
            "",
            "Reply with your contribution. Include [DONE] when the task is complete.",
          ].join("\n"),
          signal: request.signal,
        });
        transcript.push({ speaker: participant.id, text: result.text });
        if (result.text.includes("[DONE]")) {
          finished = true;
          break;
        }
      }
    }

    const last = transcript[transcript.length - 1];
    return {
      ...request.input,
      transcript,
      response: last ? last.text.replace("[DONE]", "").trim() : "",
      participants: request.participants.map((p) => p.id),
    };
  }
}

function chatSystemPrompt(node: WorkflowNode): string {
  const instructions = node.properties.systemPrompt;
  const base = `You are ${node.name}, taking part in a group discussion.`;
  return typeof instructions === "string" ? `${base}\n${instructions}` : base;
}

/**
 * Hands the whole run to a group-chat session seeded with every
 * participant and records its result as one step, attributed to the
 * coordinator (or the first participant).
 */
export class GroupChatStrategy implements OrchestrationStrategy {
  readonly type = "group_chat";

  async run(run: ExecutionRun, input: DataMap): Promise<StrategyOutcome> {
    const participants = groupChatParticipants(run.graph);
    const anchor = participants.find((n) => hasRole(n, "coordinator")) ?? participants[0];
    if (!anchor) {
      throw new OrchestrationError(`Workflow "${run.graph.id}" has no group chat participants`);
    }
    const session = run.hooks.groupChat;
    if (!session) {
      throw new CollaboratorError("No group chat session configured", { collaborator: "group_chat" });
    }
    if (!(await run.boundary())) return { status: "cancelled", output: input };

    const outcome = await run.runSynthetic({ id: anchor.id, name: "Group chat" }, input, async () => {
      try {
        return await session.converse({
          executionId: run.executionId,
          workflowId: run.workflowId,
          participants,
          input,
          signal: run.signal,
        });
      } catch (err) {
        if (err instanceof EngineError) throw err;
        throw new CollaboratorError(`group chat failed: ${err instanceof Error ? err.message : String(err)}`, {
          collaborator: "group_chat",
          cause: err instanceof Error ? err : undefined,
        });
      }
    });
    if (!outcome.ok) return { status: "failed", output: input };
    return { status: "completed", output: outcome.output };
  }
}
