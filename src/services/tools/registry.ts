// Tool Registry - Central catalog of invocable tools
// Tools are registered on startup, then the registry is frozen and only read

import { ToolFailureError } from './failures.js';
import { FailureKind } from './types.js';
import type { ToolDefinition } from './types.js';

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();
  private producers: Map<string, ToolDefinition[]> = new Map();
  private frozen = false;

  register(tool: ToolDefinition): void {
    if (this.frozen) {
      throw new Error(`Tool registry is frozen; cannot register "${tool.name}"`);
    }
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }

    this.tools.set(tool.name, tool);
    for (const exported of tool.exports) {
      const list = this.producers.get(exported) ?? [];
      list.push(tool);
      this.producers.set(exported, list);
    }
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  lookup(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  // For names the engine has already validated; a miss means the catalog changed underneath it
  require(name: string): ToolDefinition {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolFailureError({
        kind: FailureKind.INTERNAL_FAULT,
        message: `Tool "${name}" is not registered`,
        context: { tool: name },
      });
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Producers of an export, in registration order. */
  toolsExporting(exportName: string): ToolDefinition[] {
    return [...(this.producers.get(exportName) ?? [])];
  }

  /** First-registered producer wins ties. */
  defaultProducer(exportName: string): ToolDefinition | undefined {
    return this.producers.get(exportName)?.[0];
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  get size(): number {
    return this.tools.size;
  }
}
