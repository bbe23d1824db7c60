/**
 * agentweave runs directed graphs of AI-agent nodes under pluggable
 * orchestration strategies, tracking every execution's steps and errors.
 *
 * @module agentweave
 */

export * from "./engine/index.js";
export * from "./llm/index.js";
export * from "./collaborators/index.js";
