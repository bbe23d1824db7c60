export { ToolRegistry } from "./tool-registry.js";
export type { ToolDefinition } from "./tool-registry.js";
export { HttpProtocolClient, parseRpcBody, PROTOCOL_VERSION } from "./protocol-client.js";
export type { ProtocolServerConfig } from "./protocol-client.js";
