/**
 * Process-scoped server context
 *
 * Constructed once at startup and passed explicitly to the dispatcher and the
 * transports. Everything in it is read-only for the lifetime of the process.
 */

import type { HandlerResolver, ToolDefinitionSource } from './types/host.js';
import { ToolRegistry } from './tool-registry.js';
import { SchemaGenerator } from './schema-generator.js';
import { MetricsCollector } from './metrics.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { DEFAULT_SERVER_INFO, PROTOCOL_VERSION } from './constants.js';

export interface ServerIdentity {
  name: string;
  version: string;
}

export interface ServerContext {
  readonly registry: ToolRegistry;
  readonly serverInfo: ServerIdentity;
  readonly protocolVersion: string;
  readonly resolver: HandlerResolver;
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
}

export interface ServerContextOptions {
  source: ToolDefinitionSource;
  resolver: HandlerResolver;
  logger?: Logger;
  metrics?: MetricsCollector;
  serverInfo?: ServerIdentity;
}

export function createServerContext(options: ServerContextOptions): ServerContext {
  const logger = options.logger ?? new ConsoleLogger();
  const registry = ToolRegistry.fromSource(options.source, {
    generator: new SchemaGenerator(logger),
    logger,
  });

  return Object.freeze({
    registry,
    serverInfo: Object.freeze({ ...(options.serverInfo ?? DEFAULT_SERVER_INFO) }),
    protocolVersion: PROTOCOL_VERSION,
    resolver: options.resolver,
    logger,
    metrics: options.metrics ?? new MetricsCollector({ enabled: false }),
  });
}
