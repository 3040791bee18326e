/**
 * Invoker
 *
 * Calls the host method behind a registered tool with already-bound arguments.
 * Instance methods get a fresh handler scope per call, disposed when the call
 * settles; static methods resolve their handler without a scope.
 *
 * The outcome is returned as a value. Thrown errors are classified here:
 * parameter-related ones become invalid params, everything else internal.
 */

import { ZodError } from 'zod';
import type { HandlerResolver, HandlerScope } from './types/host.js';
import type { RegisteredTool } from './types/tool.js';
import { isActionResult } from './action-result.js';
import {
  ArgumentError,
  ExecutionFailureError,
  InternalError,
  InvalidParamsError,
  RequestCancelledError,
  getErrorDetails,
  isToolInvokeError,
  toError,
  type ToolInvokeError,
} from './errors.js';
import type { Logger } from './logger.js';

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolCallResult {
  content: TextContent[];
}

export type InvokeResult =
  | { ok: true; result: ToolCallResult }
  | { ok: false; error: ToolInvokeError };

const PARAMETER_ERROR_NAMES: ReadonlySet<string> = new Set(['ArgumentError', 'ValidationError']);

/**
 * Whether an error thrown by a host method rejects its input
 */
export function isParameterError(error: unknown): boolean {
  if (error instanceof InvalidParamsError || error instanceof ArgumentError || error instanceof ZodError) {
    return true;
  }
  return error instanceof Error && PARAMETER_ERROR_NAMES.has(error.name);
}

function parameterErrorMessage(error: Error): string {
  if (error instanceof ZodError) {
    return error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return error.message;
}

/**
 * Map anything a host method threw to a protocol error
 */
export function classifyInvocationError(error: unknown, toolName: string): ToolInvokeError {
  if (isToolInvokeError(error)) {
    return error;
  }

  if (isParameterError(error)) {
    const err = toError(error);
    const paramName = error instanceof ArgumentError ? error.paramName : undefined;
    return new InvalidParamsError(parameterErrorMessage(err), 'INVALID_PARAMS', {
      toolName,
      ...(paramName ? { path: paramName } : {}),
    });
  }

  return new InternalError(`Tool execution failed: ${toolName}`, {
    toolName,
    cause: getErrorDetails(error),
  });
}

/**
 * Serialize a payload as the single text content item of a tool result
 */
export function wrapPayload(payload: unknown): ToolCallResult {
  const text = JSON.stringify(payload === undefined ? null : payload);
  return {
    content: [{ type: 'text', text: text ?? 'null' }],
  };
}

/**
 * Unwrap a result envelope; failure statuses become execution failures
 */
export function unwrapResult(value: unknown): unknown {
  if (!isActionResult(value)) {
    return value;
  }

  if (value.isFailure) {
    throw new ExecutionFailureError(
      value.message ?? `Operation failed with status ${value.status}`,
      value.status,
      value.value
    );
  }

  return value.value === undefined ? null : value.value;
}

export class Invoker {
  constructor(
    private resolver: HandlerResolver,
    private logger: Logger
  ) {}

  async invoke(tool: RegisteredTool, values: readonly unknown[], signal?: AbortSignal): Promise<InvokeResult> {
    const toolName = tool.definition.name;

    if (signal?.aborted) {
      return { ok: false, error: new RequestCancelledError(toolName) };
    }

    let scope: HandlerScope | undefined;

    try {
      let target: object;
      if (tool.isStatic) {
        target = this.resolver.resolveStatic(tool.handlerId);
      } else {
        scope = this.resolver.createScope();
        target = scope.resolve(tool.handlerId);
      }

      const method: unknown = Reflect.get(target, tool.methodId);
      if (typeof method !== 'function') {
        throw new InternalError(`Handler '${tool.handlerId}' has no method '${tool.methodId}'`, {
          toolName,
          handlerId: tool.handlerId,
          methodId: tool.methodId,
        });
      }

      const returned: unknown = Reflect.apply(method, target, [...values]);
      const settled = await this.settle(returned, toolName, signal);
      return { ok: true, result: wrapPayload(unwrapResult(settled)) };
    } catch (error) {
      return { ok: false, error: classifyInvocationError(error, toolName) };
    } finally {
      if (scope) {
        await this.disposeScope(scope, toolName);
      }
    }
  }

  /**
   * Await the method's result, or settle as cancelled if the signal aborts first.
   * A result arriving after cancellation is discarded.
   */
  private settle(returned: unknown, toolName: string, signal?: AbortSignal): Promise<unknown> {
    if (!signal) {
      return Promise.resolve(returned);
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => reject(new RequestCancelledError(toolName));
      signal.addEventListener('abort', onAbort, { once: true });

      void Promise.resolve(returned).then(
        value => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private async disposeScope(scope: HandlerScope, toolName: string): Promise<void> {
    try {
      await scope.dispose();
    } catch (error) {
      this.logger.warn('Failed to dispose handler scope', {
        toolName,
        error: getErrorDetails(error),
      });
    }
  }
}
