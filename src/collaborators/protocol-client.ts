/**
 * Model Context Protocol client over HTTP: JSON-RPC 2.0 messages POSTed
 * to each configured server, answered as JSON or as a server-sent event
 * stream.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ConnectionStatus, ProtocolClient } from "../engine/collaborators.js";
import { CollaboratorError } from "../engine/errors.js";
import type { DataMap } from "../engine/types.js";

export type ProtocolServerConfig = {
  id: string;
  url: string;
  headers?: Record<string, string>;
};

export const PROTOCOL_VERSION = "2024-11-05";

const RpcResponse = Type.Object({
  jsonrpc: Type.Literal("2.0"),
  id: Type.Optional(Type.Union([Type.String(), Type.Number(), Type.Null()])),
  result: Type.Optional(Type.Unknown()),
  error: Type.Optional(
    Type.Object({
      code: Type.Number(),
      message: Type.String(),
    }),
  ),
});

const ToolCallResult = Type.Object({
  content: Type.Optional(
    Type.Array(
      Type.Object({
        type: Type.String(),
        text: Type.Optional(Type.String()),
      }),
    ),
  ),
  structuredContent: Type.Optional(Type.Unknown()),
  isError: Type.Optional(Type.Boolean()),
});

type ServerState = {
  config: ProtocolServerConfig;
  status: ConnectionStatus;
  sessionId?: string;
};

function protocolError(serverId: string, message: string, cause?: Error): CollaboratorError {
  return new CollaboratorError(`MCP server "${serverId}": ${message}`, { collaborator: "protocol", cause });
}

/** Pull the JSON-RPC message with the given id out of a JSON or SSE body. */
export function parseRpcBody(contentType: string, body: string, id: number): unknown {
  if (!contentType.includes("text/event-stream")) return JSON.parse(body);
  for (const line of body.split("\n")) {
    if (!line.startsWith("data:")) continue;
    const data = line.slice(5).trim();
    if (!data) continue;
    const message: unknown = JSON.parse(data);
    if (Value.Check(RpcResponse, message) && message.id === id) return message;
  }
  return undefined;
}

export class HttpProtocolClient implements ProtocolClient {
  private _servers = new Map<string, ServerState>();
  private _fetch: typeof fetch;
  private _clientName: string;
  private _nextId = 1;

  constructor(servers: ProtocolServerConfig[], opts: { fetch?: typeof fetch; clientName?: string } = {}) {
    for (const config of servers) {
      this._servers.set(config.id, { config, status: "disconnected" });
    }
    this._fetch = opts.fetch ?? globalThis.fetch;
    this._clientName = opts.clientName ?? "agentweave";
  }

  status(serverId: string): ConnectionStatus {
    return this._servers.get(serverId)?.status ?? "disconnected";
  }

  async connect(serverId: string): Promise<void> {
    const server = this.server(serverId);
    try {
      await this.request(server, "initialize", {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { name: this._clientName, version: "0.1.0" },
      });
      await this.notify(server, "notifications/initialized");
      server.status = "connected";
    } catch (err) {
      server.status = "error";
      server.sessionId = undefined;
      throw err;
    }
  }

  async disconnect(serverId: string): Promise<void> {
    const server = this.server(serverId);
    server.status = "disconnected";
    server.sessionId = undefined;
  }

  /**
   * Call a tool on a connected server. Returns the structured content when
   * the server sends one, otherwise the concatenated text content.
   */
  async callTool(serverId: string, toolName: string, args: DataMap, signal?: AbortSignal): Promise<unknown> {
    const server = this.server(serverId);
    if (server.status !== "connected") {
      throw protocolError(serverId, "not connected");
    }
    const result = await this.request(server, "tools/call", { name: toolName, arguments: args }, signal);
    if (!Value.Check(ToolCallResult, result)) {
      throw protocolError(serverId, `unexpected result from tool "${toolName}"`);
    }
    const text = (result.content ?? [])
      .filter((c) => c.type === "text")
      .map((c) => c.text ?? "")
      .join("\n");
    if (result.isError) {
      throw protocolError(serverId, `tool "${toolName}" failed: ${text || "no details"}`);
    }
    return result.structuredContent ?? text;
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private server(serverId: string): ServerState {
    const server = this._servers.get(serverId);
    if (!server) {
      throw protocolError(serverId, "not configured");
    }
    return server;
  }

  private headers(server: ServerState): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
      ...server.config.headers,
    };
    if (server.sessionId) headers["Mcp-Session-Id"] = server.sessionId;
    return headers;
  }

  private async post(server: ServerState, message: DataMap, signal?: AbortSignal): Promise<Response> {
    try {
      return await this._fetch(server.config.url, {
        method: "POST",
        headers: this.headers(server),
        body: JSON.stringify(message),
        signal,
      });
    } catch (err) {
      throw protocolError(server.config.id, `request failed: ${String(err)}`, err instanceof Error ? err : undefined);
    }
  }

  private async notify(server: ServerState, method: string): Promise<void> {
    const res = await this.post(server, { jsonrpc: "2.0", method });
    if (!res.ok) {
      throw protocolError(server.config.id, `${method} returned HTTP ${res.status}`);
    }
  }

  private async request(server: ServerState, method: string, params: DataMap, signal?: AbortSignal): Promise<unknown> {
    const id = this._nextId++;
    const res = await this.post(server, { jsonrpc: "2.0", id, method, params }, signal);
    const body = await res.text();
    if (!res.ok) {
      throw protocolError(server.config.id, `${method} returned HTTP ${res.status}: ${body.slice(0, 200)}`);
    }
    const session = res.headers.get("mcp-session-id");
    if (session) server.sessionId = session;

    let message: unknown;
    try {
      message = parseRpcBody(res.headers.get("content-type") ?? "", body, id);
    } catch (err) {
      throw protocolError(server.config.id, `invalid ${method} response`, err instanceof Error ? err : undefined);
    }
    if (!Value.Check(RpcResponse, message)) {
      throw protocolError(server.config.id, `no JSON-RPC response to ${method}`);
    }
    if (message.error) {
      throw protocolError(server.config.id, `${method} error ${message.error.code}: ${message.error.message}`);
    }
    return message.result;
  }
}
