/**
 * Main MCP server implementation
 *
 * Why: Single entry point that builds the server context from a tool source and
 * a handler resolver, then serves it over stdio or HTTP.
 */

import type { HandlerResolver, ToolDefinitionSource } from './types/host.js';
import type { HttpTransportConfig } from './types/http-transport.js';
import { createServerContext, type ServerContext, type ServerIdentity } from './server-context.js';
import { RequestDispatcher } from './dispatcher.js';
import { HttpTransport } from './http-transport.js';
import { StdioTransport, type StdioTransportOptions } from './stdio-transport.js';
import { ServiceHandlerResolver } from './handler-resolver.js';
import type { MetricsCollector } from './metrics.js';
import type { JsonRpcResponse } from './jsonrpc-validator.js';
import { ConsoleLogger, type Logger } from './logger.js';

export interface MCPServerOptions {
  source: ToolDefinitionSource;
  resolver: HandlerResolver;
  logger?: Logger;
  metrics?: MetricsCollector;
  serverInfo?: ServerIdentity;
}

export class MCPServer {
  private context: ServerContext;
  private dispatcher: RequestDispatcher;
  private httpTransport: HttpTransport | null = null;
  private stdioTransport: StdioTransport | null = null;

  /**
   * @throws ConfigurationError on duplicate tool names or unregistered handlers
   */
  constructor(options: MCPServerOptions) {
    const logger = options.logger ?? new ConsoleLogger();
    this.context = createServerContext({ ...options, logger });

    if (options.resolver instanceof ServiceHandlerResolver) {
      options.resolver.assertRegistered(this.context.registry.list().map(tool => tool.handlerId));
    }

    this.dispatcher = new RequestDispatcher(this.context);

    logger.info('MCP server initialized', {
      server: this.context.serverInfo.name,
      version: this.context.serverInfo.version,
      toolCount: this.context.registry.size,
    });
  }

  getContext(): ServerContext {
    return this.context;
  }

  /**
   * Handle one raw JSON-RPC frame
   */
  async handleMessage(raw: string, signal?: AbortSignal): Promise<JsonRpcResponse | undefined> {
    return this.dispatcher.handleRaw(raw, { signal });
  }

  async runStdio(options: StdioTransportOptions = {}): Promise<void> {
    this.stdioTransport = new StdioTransport(
      (raw, signal) => this.dispatcher.handleRaw(raw, { signal }),
      this.context.logger,
      options
    );
    await this.stdioTransport.start();
  }

  async runHttp(config: HttpTransportConfig): Promise<void> {
    this.httpTransport = new HttpTransport(
      config,
      (raw, signal) => this.dispatcher.handleRaw(raw, { signal }),
      this.context.logger,
      config.metricsEnabled ? this.context.metrics : undefined
    );
    await this.httpTransport.start();
  }

  /**
   * Stop transports, then dispose process-lifetime handlers
   */
  async stop(): Promise<void> {
    if (this.httpTransport) {
      await this.httpTransport.stop();
      this.httpTransport = null;
    }

    if (this.stdioTransport) {
      await this.stdioTransport.stop();
      this.stdioTransport = null;
    }

    if (this.context.resolver instanceof ServiceHandlerResolver) {
      await this.context.resolver.dispose();
    }
  }
}
