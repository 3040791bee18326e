/**
 * Prometheus Metrics Collector
 *
 * Why: Observability for production deployments
 *
 * Tracks:
 * - HTTP requests (status, method, path)
 * - JSON-RPC requests by method and outcome
 * - Tool calls (count, duration, in-flight, errors by kind)
 */

import { Registry, Counter, Gauge, Histogram } from 'prom-client';

export interface MetricsCollectorConfig {
  enabled: boolean;
  prefix?: string;
}

export type RpcOutcome = 'result' | 'error' | 'notification';

export class MetricsCollector {
  private registry: Registry;
  private enabled: boolean;

  // HTTP metrics
  private httpRequestsTotal: Counter;
  private httpRequestDuration: Histogram;

  // JSON-RPC metrics
  private rpcRequestsTotal: Counter;

  // Tool call metrics
  private toolCallsTotal: Counter;
  private toolCallDuration: Histogram;
  private toolCallsInFlight: Gauge;
  private toolCallErrors: Counter;

  constructor(config: MetricsCollectorConfig) {
    this.enabled = config.enabled;
    this.registry = new Registry();

    const prefix = config.prefix || 'mcp_';

    this.httpRequestsTotal = new Counter({
      name: `${prefix}http_requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'],
      registers: [this.registry],
    });

    this.httpRequestDuration = new Histogram({
      name: `${prefix}http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'path', 'status'],
      buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
      registers: [this.registry],
    });

    this.rpcRequestsTotal = new Counter({
      name: `${prefix}rpc_requests_total`,
      help: 'Total number of JSON-RPC messages handled',
      labelNames: ['method', 'outcome'],
      registers: [this.registry],
    });

    this.toolCallsTotal = new Counter({
      name: `${prefix}tool_calls_total`,
      help: 'Total number of MCP tool calls',
      labelNames: ['tool', 'status'],
      registers: [this.registry],
    });

    this.toolCallDuration = new Histogram({
      name: `${prefix}tool_call_duration_seconds`,
      help: 'MCP tool call duration in seconds',
      labelNames: ['tool', 'status'],
      buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
      registers: [this.registry],
    });

    this.toolCallsInFlight = new Gauge({
      name: `${prefix}tool_calls_in_flight`,
      help: 'Number of tool calls currently executing',
      registers: [this.registry],
    });

    this.toolCallErrors = new Counter({
      name: `${prefix}tool_call_errors_total`,
      help: 'Total number of MCP tool call errors',
      labelNames: ['tool', 'error_type'],
      registers: [this.registry],
    });
  }

  /**
   * Record HTTP request
   */
  recordHttpRequest(method: string, path: string, status: number, durationSeconds: number): void {
    if (!this.enabled) return;

    const labels = {
      method,
      path: this.normalizePath(path),
      status: status.toString(),
    };
    this.httpRequestsTotal.inc(labels);
    this.httpRequestDuration.observe(labels, durationSeconds);
  }

  /**
   * Record a handled JSON-RPC message.
   * Unknown methods are folded into one label value.
   */
  recordRpcRequest(method: string, outcome: RpcOutcome, known: boolean): void {
    if (!this.enabled) return;
    this.rpcRequestsTotal.inc({ method: known ? method : 'unknown', outcome });
  }

  toolCallStarted(): void {
    if (!this.enabled) return;
    this.toolCallsInFlight.inc();
  }

  /**
   * Record MCP tool call
   */
  recordToolCall(tool: string, status: 'success' | 'error', durationSeconds: number): void {
    if (!this.enabled) return;

    this.toolCallsInFlight.dec();
    this.toolCallsTotal.inc({ tool, status });
    this.toolCallDuration.observe({ tool, status }, durationSeconds);
  }

  /**
   * Record MCP tool call error
   */
  recordToolCallError(tool: string, errorType: string): void {
    if (!this.enabled) return;
    this.toolCallErrors.inc({ tool, error_type: errorType });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    if (!this.enabled) {
      return '# Metrics disabled\n';
    }
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Get registry (for testing)
   */
  getRegistry(): Registry {
    return this.registry;
  }

  /**
   * Normalize path for metrics
   *
   * Why: Avoid high cardinality in metrics labels (query strings carry ids)
   */
  private normalizePath(path: string): string {
    return path.split('?')[0];
  }
}
