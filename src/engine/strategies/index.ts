import { OrchestrationError } from "../errors.js";
import type { OrchestrationStrategy } from "../run.js";
import type { OrchestrationType } from "../types.js";
import { ConcurrentStrategy } from "./concurrent.js";
import { CustomStrategy } from "./custom.js";
import { GroupChatStrategy } from "./group-chat.js";
import { HandoffStrategy } from "./handoff.js";
import { MagenticStrategy } from "./magentic.js";
import { SequentialStrategy } from "./sequential.js";

export { SequentialStrategy, sequentialPlan } from "./sequential.js";
export { ConcurrentStrategy, concurrentBranches } from "./concurrent.js";
export { HandoffStrategy, ConditionHandoffRouter } from "./handoff.js";
export {
  MagenticStrategy,
  PriorityNodeSelector,
  LlmNodeSelector,
  magenticCandidates,
  parseSelection,
  selectionPrompt,
  DEFAULT_MAX_ITERATIONS,
} from "./magentic.js";
export { GroupChatStrategy, TurnTakingGroupChat, groupChatParticipants } from "./group-chat.js";
export type { ChatMessage } from "./group-chat.js";
export {
  CustomStrategy,
  DEFAULT_SCRIPT_HOOKS,
  defaultScript,
  defaultWaitPredicate,
  orderSteps,
} from "./custom.js";
export type { ScriptState, ScriptStepHooks, StepResult } from "./custom.js";

const ORCHESTRATION_ALIASES: Readonly<Record<string, OrchestrationType>> = {
  sequential: "sequential",
  concurrent: "concurrent",
  handoff: "handoff",
  magentic: "magentic",
  group_chat: "group_chat",
  groupchat: "group_chat",
  custom: "custom",
};

/**
 * Normalize a declared orchestration type. Case, dashes and spaces are
 * ignored; anything unrecognized is "custom".
 */
export function resolveOrchestrationType(declared: string): OrchestrationType {
  const key = normalize(declared);
  return Object.hasOwn(ORCHESTRATION_ALIASES, key) ? ORCHESTRATION_ALIASES[key] : "custom";
}

export function isKnownOrchestrationType(declared: string): boolean {
  return Object.hasOwn(ORCHESTRATION_ALIASES, normalize(declared));
}

function normalize(declared: string): string {
  return declared.trim().toLowerCase().replace(/[-\s]+/g, "_");
}

/** Strategy implementations by type. Entries may be replaced for testing. */
export class StrategyRegistry {
  private _strategies = new Map<OrchestrationType, OrchestrationStrategy>();

  constructor() {
    for (const strategy of [
      new SequentialStrategy(),
      new ConcurrentStrategy(),
      new HandoffStrategy(),
      new MagenticStrategy(),
      new GroupChatStrategy(),
      new CustomStrategy(),
    ]) {
      this.register(strategy);
    }
  }

  register(strategy: OrchestrationStrategy): void {
    this._strategies.set(strategy.type, strategy);
  }

  /** Resolve once at execution start. Unrecognized types fall back to custom. */
  select(declared: string): OrchestrationStrategy {
    const type = resolveOrchestrationType(declared);
    const strategy = this._strategies.get(type) ?? this._strategies.get("custom");
    if (!strategy) {
      throw new OrchestrationError("No custom strategy registered");
    }
    return strategy;
  }
}
