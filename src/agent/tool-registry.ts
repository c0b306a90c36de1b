/**
 * Tool Registry - keyed tool set for seeding agent runs
 *
 * Tools are looked up by `meta.name`; registering a name twice replaces the
 * earlier tool. Registration order is preserved in `getAll()` and in the
 * definitions handed to the provider.
 */

import type { Logger } from "../log.js";
import type { JSONSchema, ToolDefinition } from "../providers/types.js";
import { toToolDefinitions } from "./convert.js";
import type { Tool, ToolMeta } from "./types.js";

/**
 * Tool Registry manages all available tools
 */
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private readonly logger: Logger;

  constructor(params: { logger: Logger; tools?: Tool[] }) {
    this.logger = params.logger.child({ component: "tool-registry" });
    for (const tool of params.tools ?? []) {
      this.register(tool);
    }
  }

  /**
   * Register a tool
   */
  register(tool: Tool): void {
    if (this.tools.has(tool.meta.name)) {
      this.logger.warn({ tool: tool.meta.name }, "Tool already registered, replacing");
    }
    this.tools.set(tool.meta.name, tool);
  }

  /**
   * Unregister a tool
   */
  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }

  /**
   * Get tool definitions for the provider
   */
  getDefinitions(): ToolDefinition[] {
    return toToolDefinitions(this.getAll());
  }

  getMetadata(): ToolMeta[] {
    return this.getAll().map((tool) => tool.meta);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get count(): number {
    return this.tools.size;
  }
}

/**
 * Helper to create tool parameters schema
 */
export function defineParams(
  properties: Record<string, { type: string; description?: string; enum?: string[] }>,
  required: string[] = []
): JSONSchema {
  return {
    type: "object",
    properties,
    required,
  };
}
