/**
 * Error mapper
 *
 * Why: Categorize errors as "safe" (caused by the request: bad params, unknown
 * tool, failure status reported by the host) vs "unsafe" (internal faults).
 * Safe errors carry their message and structured data to the client. Unsafe
 * errors show a generic message with a correlation id; details are only logged.
 */

import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { generateCorrelationId, getErrorDetails, isToolInvokeError, toError } from './errors.js';
import type { JsonRpcErrorObject } from './jsonrpc-validator.js';
import type { Logger } from './logger.js';

export class ErrorMapper {
  constructor(private logger: Logger) {}

  toJsonRpcError(error: unknown, context: Record<string, unknown> = {}): JsonRpcErrorObject {
    if (isToolInvokeError(error) && error.code !== ErrorCode.InternalError) {
      const mapped: JsonRpcErrorObject = {
        code: error.code,
        message: error.message,
      };
      if (error.details !== undefined) {
        mapped.data = { kind: error.kind, ...error.details };
      }
      return mapped;
    }

    const correlationId = generateCorrelationId();
    this.logger.error('Internal error while handling request', toError(error), {
      correlationId,
      ...context,
      errorDetails: getErrorDetails(error),
    });

    return {
      code: ErrorCode.InternalError,
      message: `Internal error (correlation ID: ${correlationId})`,
      data: { correlationId },
    };
  }
}
