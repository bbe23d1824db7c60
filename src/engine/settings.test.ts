import { describe, it, expect } from "vitest";
import { ValidationError } from "./errors.js";
import { DEFAULT_SETTINGS, loadSettings } from "./settings.js";

describe("loadSettings", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it("overlays environment variables", () => {
    const settings = loadSettings({
      AGENTWEAVE_MAX_ITERATIONS: "5",
      AGENTWEAVE_WAIT_TIMEOUT_MS: "0",
      AGENTWEAVE_LOG_LEVEL: "debug",
      AGENTWEAVE_MODEL: "claude-test",
    });
    expect(settings).toEqual({
      ...DEFAULT_SETTINGS,
      magenticMaxIterations: 5,
      waitTimeoutMs: 0,
      logLevel: "debug",
      model: "claude-test",
    });
  });

  it("ignores empty values", () => {
    expect(loadSettings({ AGENTWEAVE_LOOP_LIMIT: "" }).loopMaxIterations).toBe(10);
  });

  it("reports bad values under their variable name", () => {
    expect(() => loadSettings({ AGENTWEAVE_MAX_ITERATIONS: "abc" })).toThrow(ValidationError);
    expect(() => loadSettings({ AGENTWEAVE_MAX_ITERATIONS: "abc" })).toThrow(
      /^Invalid settings: AGENTWEAVE_MAX_ITERATIONS: /,
    );
    expect(() => loadSettings({ AGENTWEAVE_GROUP_CHAT_ROUNDS: "0" })).toThrow(/AGENTWEAVE_GROUP_CHAT_ROUNDS: /);
    expect(() => loadSettings({ AGENTWEAVE_LOG_LEVEL: "loud" })).toThrow(/AGENTWEAVE_LOG_LEVEL: /);
  });
});
