/**
 * In-process tool provider: tools are registered by name with an optional
 * TypeBox schema that arguments must satisfy before the tool runs.
 */

import type { TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ToolCallOptions, ToolProvider } from "../engine/collaborators.js";
import { CollaboratorError } from "../engine/errors.js";
import type { DataMap } from "../engine/types.js";

export type ToolDefinition = {
  name: string;
  description?: string;
  parameters?: TSchema;
  execute: (args: DataMap, options: ToolCallOptions) => unknown;
};

export class ToolRegistry implements ToolProvider {
  private _tools = new Map<string, ToolDefinition>();

  constructor(tools: ToolDefinition[] = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: ToolDefinition): void {
    this._tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this._tools.delete(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this._tools.get(name);
  }

  names(): string[] {
    return [...this._tools.keys()];
  }

  async invoke(name: string, args: DataMap, options: ToolCallOptions = {}): Promise<unknown> {
    const tool = this._tools.get(name);
    if (!tool) {
      throw new CollaboratorError(`Unknown tool "${name}"`, { collaborator: "tool" });
    }
    if (tool.parameters && !Value.Check(tool.parameters, args)) {
      const problems = [...Value.Errors(tool.parameters, args)].map((e) => `${e.path || "/"} ${e.message}`);
      throw new CollaboratorError(`Invalid arguments for tool "${name}": ${problems.join("; ")}`, {
        collaborator: "tool",
      });
    }
    try {
      return await tool.execute(args, options);
    } catch (err) {
      if (err instanceof CollaboratorError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new CollaboratorError(`Tool "${name}" failed: ${message}`, {
        collaborator: "tool",
        cause: err instanceof Error ? err : undefined,
      });
    }
  }
}
