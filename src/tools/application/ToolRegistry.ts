// src/tools/application/ToolRegistry.ts

/**
 * In-process tool registry.
 *
 * Built once by the composition root, then frozen before the server starts
 * accepting requests. After that it is read-only, so concurrent requests
 * can read it without coordination.
 */

import type { ToolDefinition, ToolHandler } from '../domain/Tool';
import { DuplicateToolError, RegistryFrozenError, UnknownToolError } from '../domain/ToolErrors';

export interface RegisteredTool {
  definition: ToolDefinition;
  handler: ToolHandler;
}

/**
 * Read side of the registry, which is all the server needs.
 */
export interface IToolRegistry {
  list(): ToolDefinition[];
  get(name: string): RegisteredTool;
  has(name: string): boolean;
}

export class ToolRegistry implements IToolRegistry {
  // Map iteration follows insertion order, which gives listings their stable order.
  private readonly tools = new Map<string, RegisteredTool>();
  private frozen = false;

  public register(definition: ToolDefinition, handler: ToolHandler): this {
    if (this.frozen) {
      throw new RegistryFrozenError(definition.name);
    }
    if (this.tools.has(definition.name)) {
      throw new DuplicateToolError(definition.name);
    }

    this.tools.set(definition.name, {
      definition: freezeDefinition(definition),
      handler,
    });

    return this;
  }

  /**
   * Stop accepting registrations.
   */
  public freeze(): this {
    this.frozen = true;
    return this;
  }

  public isFrozen(): boolean {
    return this.frozen;
  }

  public list(): ToolDefinition[] {
    return Array.from(this.tools.values(), (entry) => entry.definition);
  }

  public get(name: string): RegisteredTool {
    const entry = this.tools.get(name);
    if (!entry) {
      throw new UnknownToolError(name);
    }
    return entry;
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }
}

function freezeDefinition(definition: ToolDefinition): ToolDefinition {
  const inputSchema = Object.freeze(
    Object.fromEntries(
      Object.entries(definition.inputSchema).map(([param, spec]) => [param, Object.freeze({ ...spec })]),
    ),
  );

  return Object.freeze({
    name: definition.name,
    description: definition.description,
    inputSchema,
  });
}
