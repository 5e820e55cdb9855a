// This module holds the startup-time mapping from tool name to descriptor and handler.

import type { McpTool, ToolHandler } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';

export interface RegisteredTool {
  tool: McpTool;
  handler: ToolHandler;
}

export class ToolRegistry {
  private readonly entries = new Map<string, RegisteredTool>();

  // This method adds one tool and rejects duplicate names so a later registration cannot shadow an earlier one.
  public register(tool: McpTool, handler: ToolHandler): void {
    if (this.entries.has(tool.name)) {
      throw new AppError(500, 'duplicate_tool', `Tool already registered: ${tool.name}`);
    }

    this.entries.set(tool.name, { tool, handler });
  }

  public get(name: string): RegisteredTool | undefined {
    return this.entries.get(name);
  }

  public has(name: string): boolean {
    return this.entries.has(name);
  }

  // This method returns descriptors sorted by name so listings are deterministic.
  public list(): McpTool[] {
    return [...this.entries.values()]
      .map((entry) => entry.tool)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  public get size(): number {
    return this.entries.size;
  }
}
