import { describe, it, expect } from "vitest";
import type { ExecutionRun, OrchestrationStrategy, StrategyOutcome } from "../run.js";
import type { DataMap } from "../types.js";
import { isKnownOrchestrationType, resolveOrchestrationType, StrategyRegistry } from "./index.js";

describe("resolveOrchestrationType", () => {
  it("ignores case, dashes and spaces", () => {
    expect(resolveOrchestrationType(" Sequential ")).toBe("sequential");
    expect(resolveOrchestrationType("Group-Chat")).toBe("group_chat");
    expect(resolveOrchestrationType("group chat")).toBe("group_chat");
    expect(resolveOrchestrationType("GroupChat")).toBe("group_chat");
    expect(resolveOrchestrationType("MAGENTIC")).toBe("magentic");
  });

  it("falls back to custom", () => {
    expect(resolveOrchestrationType("swarm")).toBe("custom");
    expect(resolveOrchestrationType("constructor")).toBe("custom");
    expect(isKnownOrchestrationType("swarm")).toBe(false);
    expect(isKnownOrchestrationType("handoff")).toBe(true);
  });
});

describe("StrategyRegistry", () => {
  it("has a strategy for every orchestration type", () => {
    const registry = new StrategyRegistry();
    for (const type of ["sequential", "concurrent", "handoff", "magentic", "group_chat", "custom"] as const) {
      expect(registry.select(type).type).toBe(type);
    }
    expect(registry.select("unheard-of").type).toBe("custom");
  });

  it("lets a strategy be replaced", () => {
    class Noop implements OrchestrationStrategy {
      readonly type = "sequential";
      async run(_run: ExecutionRun, input: DataMap): Promise<StrategyOutcome> {
        return { status: "completed", output: input };
      }
    }
    const registry = new StrategyRegistry();
    const noop = new Noop();
    registry.register(noop);
    expect(registry.select("sequential")).toBe(noop);
  });
});
