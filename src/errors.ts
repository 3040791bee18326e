/**
 * Structured error types for the tool dispatcher
 *
 * Every error carries its JSON-RPC error code, a machine-readable kind and
 * structured details so the error mapper can build the wire error without
 * inspecting messages.
 */

import { randomUUID } from 'node:crypto';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

/** Implementation-defined server error: the host reported a failure status */
export const EXECUTION_FAILURE_CODE = -32000;

/** Request cancelled by the client or the transport */
export const REQUEST_CANCELLED_CODE = -32800;

export type InvalidParamsKind = 'MISSING_REQUIRED' | 'TYPE_MISMATCH' | 'ENUM_VIOLATION' | 'INVALID_PARAMS';

export class ToolInvokeError extends Error {
  constructor(
    message: string,
    public code: number,
    public kind: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ToolInvokeError';
  }
}

export class ParseError extends ToolInvokeError {
  constructor(reason: string) {
    super(`Parse error: ${reason}`, ErrorCode.ParseError, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class InvalidRequestError extends ToolInvokeError {
  constructor(reason: string) {
    super(`Invalid request: ${reason}`, ErrorCode.InvalidRequest, 'INVALID_REQUEST');
    this.name = 'InvalidRequestError';
  }
}

export class MethodNotFoundError extends ToolInvokeError {
  constructor(method: string) {
    super(`Method not found: ${method}`, ErrorCode.MethodNotFound, 'METHOD_NOT_FOUND', { method });
    this.name = 'MethodNotFoundError';
  }
}

export class ToolNotFoundError extends ToolInvokeError {
  constructor(toolName: string) {
    super(`Tool not found: ${toolName}`, ErrorCode.MethodNotFound, 'TOOL_NOT_FOUND', { toolName });
    this.name = 'ToolNotFoundError';
  }
}

export class InvalidParamsError extends ToolInvokeError {
  constructor(
    message: string,
    public reason: InvalidParamsKind = 'INVALID_PARAMS',
    details?: Record<string, unknown>
  ) {
    super(message, ErrorCode.InvalidParams, reason, details);
    this.name = 'InvalidParamsError';
  }
}

export class InternalError extends ToolInvokeError {
  constructor(message: string = 'Internal error', details?: Record<string, unknown>) {
    super(message, ErrorCode.InternalError, 'INTERNAL_ERROR', details);
    this.name = 'InternalError';
  }
}

/**
 * The host operation completed but reported a failure status through its
 * result envelope
 */
export class ExecutionFailureError extends ToolInvokeError {
  constructor(message: string, status: number, payload?: unknown) {
    super(message, EXECUTION_FAILURE_CODE, 'EXECUTION_FAILURE', { status, payload });
    this.name = 'ExecutionFailureError';
  }
}

export class RequestCancelledError extends ToolInvokeError {
  constructor(toolName: string) {
    super(`Request cancelled: ${toolName}`, REQUEST_CANCELLED_CODE, 'REQUEST_CANCELLED', { toolName });
    this.name = 'RequestCancelledError';
  }
}

/**
 * Startup-time configuration problem (duplicate tool names, unknown handlers,
 * invalid environment). Never produced while serving a request.
 */
export class ConfigurationError extends ToolInvokeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.InternalError, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown by host methods to reject an argument value. Reported to the client as
 * invalid params rather than an internal error.
 */
export class ArgumentError extends Error {
  constructor(
    message: string,
    public paramName?: string
  ) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * Helper function to check if an error is a ToolInvokeError
 */
export function isToolInvokeError(error: unknown): error is ToolInvokeError {
  return error instanceof ToolInvokeError;
}

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isToolInvokeError(error)) {
    return {
      name: error.name,
      code: error.code,
      kind: error.kind,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}

/**
 * Normalize anything thrown into an Error instance for logging
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
