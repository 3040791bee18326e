/**
 * Tool registry
 *
 * Built once at startup from a ToolDefinitionSource and never mutated after.
 * Concurrent requests read it without coordination.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { DiscoveredOperation, ToolDefinitionSource } from './types/host.js';
import type { DeclaredParameter, RegisteredTool } from './types/tool.js';
import { SchemaGenerator } from './schema-generator.js';
import { ToolGenerator } from './tool-generator.js';
import { ConfigurationError } from './errors.js';
import type { Logger } from './logger.js';

export interface RegistryBuildOptions {
  generator?: SchemaGenerator;
  logger?: Logger;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export class ToolRegistry {
  private static snapshots = new WeakMap<ToolDefinitionSource, ToolRegistry>();

  private readonly byName = new Map<string, RegisteredTool>();
  private readonly tools: readonly RegisteredTool[];
  private protocolTools?: readonly Tool[];

  private constructor(tools: RegisteredTool[]) {
    for (const tool of tools) {
      this.byName.set(tool.definition.name, tool);
    }
    this.tools = Object.freeze(tools);
  }

  /**
   * Build a registry from discovered operations.
   *
   * @throws ConfigurationError when two operations produce the same tool name
   */
  static build(operations: readonly DiscoveredOperation[], options: RegistryBuildOptions = {}): ToolRegistry {
    const generator = options.generator ?? new SchemaGenerator(options.logger);
    const tools: RegisteredTool[] = [];
    const owners = new Map<string, string>();

    for (const operation of operations) {
      const previousOwner = owners.get(operation.toolName);
      if (previousOwner !== undefined) {
        throw new ConfigurationError(`Duplicate tool name: ${operation.toolName}`, {
          toolName: operation.toolName,
          handlers: [previousOwner, `${operation.handlerId}.${operation.methodId}`],
        });
      }
      owners.set(operation.toolName, `${operation.handlerId}.${operation.methodId}`);

      const generated = generator.generateTool(operation);
      const parameters: readonly DeclaredParameter[] = Object.freeze(
        generated.parameters.map(param => Object.freeze(param))
      );

      tools.push(Object.freeze({
        definition: deepFreeze(generated.definition),
        handlerId: operation.handlerId,
        methodId: operation.methodId,
        isStatic: operation.isStatic,
        parameters,
      }));
    }

    options.logger?.info('Tool registry built', {
      toolCount: tools.length,
      tools: tools.map(tool => tool.definition.name),
    });

    return new ToolRegistry(tools);
  }

  /**
   * Registry snapshot for a source. Repeated calls with the same source object
   * return the same registry.
   */
  static fromSource(source: ToolDefinitionSource, options: RegistryBuildOptions = {}): ToolRegistry {
    const existing = ToolRegistry.snapshots.get(source);
    if (existing) return existing;

    const registry = ToolRegistry.build(source.discover(), options);
    ToolRegistry.snapshots.set(source, registry);
    return registry;
  }

  /** Registered tools in construction order */
  list(): readonly RegisteredTool[] {
    return this.tools;
  }

  lookup(name: string): RegisteredTool | undefined {
    return this.byName.get(name);
  }

  get size(): number {
    return this.tools.length;
  }

  /**
   * Tools as advertised by tools/list
   */
  toProtocolTools(): readonly Tool[] {
    if (!this.protocolTools) {
      const generator = new ToolGenerator();
      this.protocolTools = deepFreeze(this.tools.map(tool => generator.generateTool(tool.definition)));
    }
    return this.protocolTools;
  }
}
