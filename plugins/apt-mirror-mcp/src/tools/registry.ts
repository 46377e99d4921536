import type { RegisteredTool } from "../types/tool.js";
import { logger } from "../logger.js";

/** Tools by name in registration order; server.ts advertises and dispatches from it. */
export class ToolRegistry implements Iterable<RegisteredTool> {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): void {
    const { name, riskLevel } = tool.metadata;
    if (this.tools.has(name)) throw new Error(`Tool '${name}' is already registered`);
    this.tools.set(name, tool);
    logger.debug({ tool: name, riskLevel }, "Tool registered");
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  [Symbol.iterator](): Iterator<RegisteredTool> {
    return this.tools.values();
  }

  get size(): number {
    return this.tools.size;
  }
}
