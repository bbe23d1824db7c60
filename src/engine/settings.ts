/**
 * Engine settings read from environment variables.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError } from "./errors.js";
import type { Diagnostic } from "./types.js";

export const SettingsSchema = Type.Object({
  magenticMaxIterations: Type.Integer({ minimum: 1 }),
  loopMaxIterations: Type.Integer({ minimum: 1 }),
  waitPollIntervalMs: Type.Integer({ minimum: 1 }),
  waitTimeoutMs: Type.Integer({ minimum: 0 }),
  groupChatRounds: Type.Integer({ minimum: 1 }),
  logLevel: Type.Union([
    Type.Literal("debug"),
    Type.Literal("info"),
    Type.Literal("warn"),
    Type.Literal("error"),
    Type.Literal("silent"),
  ]),
  model: Type.Optional(Type.String({ minLength: 1 })),
});

export type Settings = Static<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  magenticMaxIterations: 10,
  loopMaxIterations: 10,
  waitPollIntervalMs: 250,
  waitTimeoutMs: 30_000,
  groupChatRounds: 3,
  logLevel: "warn",
};

const ENV_KEYS: Record<keyof Settings, string> = {
  magenticMaxIterations: "AGENTWEAVE_MAX_ITERATIONS",
  loopMaxIterations: "AGENTWEAVE_LOOP_LIMIT",
  waitPollIntervalMs: "AGENTWEAVE_WAIT_POLL_MS",
  waitTimeoutMs: "AGENTWEAVE_WAIT_TIMEOUT_MS",
  groupChatRounds: "AGENTWEAVE_GROUP_CHAT_ROUNDS",
  logLevel: "AGENTWEAVE_LOG_LEVEL",
  model: "AGENTWEAVE_MODEL",
};

/**
 * Overlay environment variables on the defaults. A bad value is reported
 * under its variable name.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const raw: Record<string, unknown> = { ...DEFAULT_SETTINGS };
  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value === undefined || value === "") continue;
    raw[field] = field === "logLevel" || field === "model" ? value : Number(value);
  }

  if (Value.Check(SettingsSchema, raw)) return raw;

  const diagnostics: Diagnostic[] = [...Value.Errors(SettingsSchema, raw)].map((e) => {
    const field = e.path.replace(/^\//, "");
    const variable = Object.entries(ENV_KEYS).find(([key]) => key === field)?.[1] ?? field;
    return { rule: "settings", severity: "error", message: `${variable}: ${e.message}` };
  });
  throw new ValidationError(
    `Invalid settings: ${diagnostics.map((d) => d.message).join("; ")}`,
    diagnostics,
  );
}
