/**
 * Anthropic completion provider for the Messages API
 * (https://docs.anthropic.com/en/api/messages), over Node's fetch.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type {
  CompletionProvider,
  CompletionRequest,
  CompletionResult,
} from "../engine/collaborators.js";
import { CollaboratorError } from "../engine/errors.js";
import { ConfigurationError, NetworkError, errorFromStatusCode } from "./errors.js";
import { DEFAULT_RETRY_POLICY, retry, type RetryPolicy } from "./retry.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type AnthropicConfig = {
  /** API key. Falls back to ANTHROPIC_API_KEY env var. */
  apiKey?: string;
  /** Base URL. Falls back to ANTHROPIC_BASE_URL or default. */
  baseUrl?: string;
  apiVersion?: string;
  defaultModel?: string;
  defaultMaxTokens?: number;
  retry?: Partial<RetryPolicy>;
  fetch?: typeof fetch;
};

const PROVIDER = "anthropic";
const DEFAULT_BASE_URL = "https://api.anthropic.com";
const DEFAULT_API_VERSION = "2023-06-01";
const DEFAULT_MODEL = "claude-sonnet-4-5";
const DEFAULT_MAX_TOKENS = 4096;

// ---------------------------------------------------------------------------
// Wire types (subset we need)
// ---------------------------------------------------------------------------

type AnthropicRequest = {
  model: string;
  max_tokens: number;
  messages: Array<{ role: "user"; content: string }>;
  system?: string;
  temperature?: number;
};

const MessageResponse = Type.Object({
  model: Type.String(),
  content: Type.Array(
    Type.Object({
      type: Type.String(),
      text: Type.Optional(Type.String()),
    }),
  ),
});

const ErrorResponse = Type.Object({
  error: Type.Object({
    type: Type.String(),
    message: Type.String(),
  }),
});

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class AnthropicCompletionProvider implements CompletionProvider {
  readonly name = PROVIDER;
  private _apiKey: string;
  private _baseUrl: string;
  private _apiVersion: string;
  private _defaultModel: string;
  private _defaultMaxTokens: number;
  private _retryPolicy: RetryPolicy;
  private _fetch: typeof fetch;

  constructor(config: AnthropicConfig = {}) {
    const apiKey = config.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError(
        "Anthropic API key not provided. Set ANTHROPIC_API_KEY or pass apiKey in config.",
        PROVIDER,
      );
    }
    this._apiKey = apiKey;
    this._baseUrl = config.baseUrl ?? process.env.ANTHROPIC_BASE_URL ?? DEFAULT_BASE_URL;
    this._apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
    this._defaultModel = config.defaultModel ?? DEFAULT_MODEL;
    this._defaultMaxTokens = config.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
    this._retryPolicy = { ...DEFAULT_RETRY_POLICY, ...config.retry };
    this._fetch = config.fetch ?? globalThis.fetch;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const body: AnthropicRequest = {
      model: request.model ?? this._defaultModel,
      max_tokens: request.maxTokens ?? this._defaultMaxTokens,
      messages: [{ role: "user", content: request.prompt }],
    };
    if (request.system) body.system = request.system;
    if (request.temperature != null) body.temperature = request.temperature;

    const raw = await retry(() => this.post("/v1/messages", body, request.signal), this._retryPolicy, request.signal);
    const text = raw.content
      .filter((block) => block.type === "text")
      .map((block) => block.text ?? "")
      .join("");
    return { text, model: raw.model };
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private async post(path: string, body: AnthropicRequest, signal?: AbortSignal) {
    let res: Response;
    try {
      res = await this._fetch(`${this._baseUrl}${path}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-api-key": this._apiKey,
          "anthropic-version": this._apiVersion,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) {
        throw new CollaboratorError("Anthropic request aborted", { collaborator: PROVIDER });
      }
      const cause = err instanceof Error ? err : undefined;
      throw new NetworkError(`Network error calling Anthropic: ${String(err)}`, PROVIDER, cause);
    }

    const text = await res.text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw errorFromStatusCode(res.status, `Invalid JSON from Anthropic: ${text.slice(0, 200)}`, PROVIDER);
    }

    if (!res.ok || Value.Check(ErrorResponse, parsed)) {
      const detail = Value.Check(ErrorResponse, parsed) ? parsed.error : undefined;
      throw errorFromStatusCode(res.status, detail?.message ?? text.slice(0, 500), PROVIDER, {
        errorCode: detail?.type,
        retryAfter: parseRetryAfter(res.headers.get("retry-after")),
      });
    }
    if (!Value.Check(MessageResponse, parsed)) {
      throw errorFromStatusCode(res.status, `Unexpected response shape from Anthropic: ${text.slice(0, 200)}`, PROVIDER);
    }
    return parsed;
  }
}
