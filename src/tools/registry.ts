import type { RegisteredTool } from "../types/tool.js";

/**
 * Tools by name. The MCP server reads it to populate tools/list and dispatch tools/call.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): void {
    const { name } = tool.metadata;
    if (this.tools.has(name)) throw new Error(`Tool ${name} is already registered`);
    this.tools.set(name, tool);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  entries(): IterableIterator<[string, RegisteredTool]> {
    return this.tools.entries();
  }

  /** Tool names grouped by module, for the startup log line. */
  byModule(): Record<string, string[]> {
    const groups: Record<string, string[]> = {};
    for (const [name, tool] of this.tools) {
      (groups[tool.metadata.module] ??= []).push(name);
    }
    return groups;
  }

  get size(): number {
    return this.tools.size;
  }
}
