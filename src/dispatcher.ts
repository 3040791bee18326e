/**
 * Request dispatcher
 *
 * Received -> Parsed -> Routed -> Handled | Errored -> Responded
 *
 * Takes one raw JSON-RPC frame and produces at most one response. Never throws
 * for a single bad request: every failure becomes an error response, and
 * notifications produce no response at all.
 */

import { MCP_METHODS, TIME } from './constants.js';
import {
  InvalidParamsError,
  MethodNotFoundError,
  ToolNotFoundError,
  type ToolInvokeError,
} from './errors.js';
import { ErrorMapper } from './error-mapper.js';
import { Invoker } from './invoker.js';
import { ParameterBinder } from './parameter-binder.js';
import type { ServerContext } from './server-context.js';
import {
  errorResponse,
  isNotification,
  isRecord,
  parseMessage,
  successResponse,
  validateEnvelope,
  type EnvelopeResult,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './jsonrpc-validator.js';

export interface DispatchOptions {
  /** Aborted by the transport when the client goes away */
  signal?: AbortSignal;
}

type Outcome =
  | { ok: true; result: unknown }
  | { ok: false; error: ToolInvokeError };

const KNOWN_METHODS: ReadonlySet<string> = new Set(Object.values(MCP_METHODS));

export class RequestDispatcher {
  private binder = new ParameterBinder();
  private invoker: Invoker;
  private errorMapper: ErrorMapper;

  constructor(private context: ServerContext) {
    this.invoker = new Invoker(context.resolver, context.logger);
    this.errorMapper = new ErrorMapper(context.logger);
  }

  /**
   * Handle a raw frame. Resolves to undefined when no response is due.
   */
  async handleRaw(raw: string, options: DispatchOptions = {}): Promise<JsonRpcResponse | undefined> {
    return this.dispatch(parseMessage(raw), options);
  }

  /**
   * Handle an already decoded message
   */
  async handleMessage(message: unknown, options: DispatchOptions = {}): Promise<JsonRpcResponse | undefined> {
    return this.dispatch(validateEnvelope(message), options);
  }

  private async dispatch(envelope: EnvelopeResult, options: DispatchOptions): Promise<JsonRpcResponse | undefined> {
    if (!envelope.ok) {
      this.context.logger.warn('Rejected malformed JSON-RPC message', {
        code: envelope.error.code,
        reason: envelope.error.message,
      });
      this.context.metrics.recordRpcRequest('invalid', 'error', false);
      return errorResponse(envelope.id, this.errorMapper.toJsonRpcError(envelope.error));
    }

    const request = envelope.request;
    const known = KNOWN_METHODS.has(request.method);

    if (isNotification(request)) {
      this.handleNotification(request);
      this.context.metrics.recordRpcRequest(request.method, 'notification', known);
      return undefined;
    }

    const id = request.id ?? null;
    let outcome: Outcome;
    try {
      outcome = await this.route(request, options);
    } catch (error) {
      // Routing returns its failures; anything thrown here is a fault
      const response = errorResponse(id, this.errorMapper.toJsonRpcError(error, { method: request.method }));
      this.context.metrics.recordRpcRequest(request.method, 'error', known);
      return response;
    }

    if (outcome.ok) {
      this.context.metrics.recordRpcRequest(request.method, 'result', known);
      return successResponse(id, outcome.result);
    }

    this.context.metrics.recordRpcRequest(request.method, 'error', known);
    return errorResponse(id, this.errorMapper.toJsonRpcError(outcome.error, { method: request.method }));
  }

  private handleNotification(request: JsonRpcRequest): void {
    if (request.method === MCP_METHODS.INITIALIZED) {
      this.context.logger.info('Client initialized');
      return;
    }
    this.context.logger.debug('Ignoring notification', { method: request.method });
  }

  private async route(request: JsonRpcRequest, options: DispatchOptions): Promise<Outcome> {
    switch (request.method) {
      case MCP_METHODS.INITIALIZE:
        return { ok: true, result: this.initializeResult(request.params) };

      case MCP_METHODS.INITIALIZED:
      case MCP_METHODS.PING:
        return { ok: true, result: {} };

      case MCP_METHODS.TOOLS_LIST:
        return { ok: true, result: { tools: this.context.registry.toProtocolTools() } };

      case MCP_METHODS.TOOLS_CALL:
        return this.callTool(request.params, options.signal);

      default:
        return { ok: false, error: new MethodNotFoundError(request.method) };
    }
  }

  private initializeResult(params: unknown): Record<string, unknown> {
    const clientInfo = isRecord(params) ? params.clientInfo : undefined;
    this.context.logger.info('Initialize request', {
      clientInfo,
      requestedProtocolVersion: isRecord(params) ? params.protocolVersion : undefined,
    });

    return {
      protocolVersion: this.context.protocolVersion,
      serverInfo: { ...this.context.serverInfo },
      capabilities: { tools: {} },
    };
  }

  private async callTool(params: unknown, signal?: AbortSignal): Promise<Outcome> {
    if (!isRecord(params) || typeof params.name !== 'string') {
      return {
        ok: false,
        error: new InvalidParamsError('tools/call requires params with a string "name"'),
      };
    }

    const toolName = params.name;
    const tool = this.context.registry.lookup(toolName);
    if (!tool) {
      return { ok: false, error: new ToolNotFoundError(toolName) };
    }

    const rawArguments = params.arguments ?? {};
    if (!isRecord(rawArguments)) {
      return {
        ok: false,
        error: new InvalidParamsError('tools/call "arguments" must be an object', 'INVALID_PARAMS', { toolName }),
      };
    }

    this.context.logger.debug('Tool call', { toolName, arguments: rawArguments });

    const startTime = Date.now();
    this.context.metrics.toolCallStarted();

    const bound = this.binder.bind(tool, rawArguments, signal);
    const invoked = bound.ok
      ? await this.invoker.invoke(tool, bound.values, signal)
      : bound;

    const durationSeconds = (Date.now() - startTime) / TIME.MS_PER_SECOND;

    if (invoked.ok) {
      this.context.metrics.recordToolCall(toolName, 'success', durationSeconds);
      return { ok: true, result: invoked.result };
    }

    this.context.metrics.recordToolCall(toolName, 'error', durationSeconds);
    this.context.metrics.recordToolCallError(toolName, invoked.error.kind);
    this.context.logger.warn('Tool call failed', {
      toolName,
      code: invoked.error.code,
      kind: invoked.error.kind,
      message: invoked.error.message,
    });

    return { ok: false, error: invoked.error };
  }
}
