/**
 * Tests for error utilities
 */

import { describe, it, expect } from 'vitest';
import {
  ArgumentError,
  ConfigurationError,
  EXECUTION_FAILURE_CODE,
  ExecutionFailureError,
  InternalError,
  InvalidParamsError,
  MethodNotFoundError,
  ParseError,
  REQUEST_CANCELLED_CODE,
  RequestCancelledError,
  ToolNotFoundError,
  generateCorrelationId,
  getErrorDetails,
  isToolInvokeError,
  toError,
} from './errors.js';

describe('generateCorrelationId', () => {
  it('should generate a valid UUID v4 format', () => {
    const id = generateCorrelationId();
    
    // UUID v4 format: xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx
    const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
    expect(id).toMatch(uuidRegex);
  });

  it('should generate unique IDs', () => {
    const ids = new Set<string>();
    
    // Generate 100 IDs and check for uniqueness
    for (let i = 0; i < 100; i++) {
      const id = generateCorrelationId();
      expect(ids.has(id)).toBe(false);
      ids.add(id);
    }
    
    expect(ids.size).toBe(100);
  });

  it('should have correct version (4) in UUID', () => {
    const id = generateCorrelationId();
    const parts = id.split('-');
    
    // Version should be 4 (first character of third group)
    expect(parts[2][0]).toBe('4');
  });

  it('should have correct variant in UUID', () => {
    const id = generateCorrelationId();
    const parts = id.split('-');
    
    // Variant should be 8, 9, a, or b (first character of fourth group)
    expect(['8', '9', 'a', 'b']).toContain(parts[3][0]);
  });
});


describe('error classes', () => {
  it('should carry JSON-RPC codes and kinds', () => {
    expect(new ParseError('Unexpected token')).toMatchObject({
      code: -32700,
      kind: 'PARSE_ERROR',
      message: 'Parse error: Unexpected token',
    });
    expect(new MethodNotFoundError('resources/list')).toMatchObject({
      code: -32601,
      message: 'Method not found: resources/list',
      details: { method: 'resources/list' },
    });
    expect(new ToolNotFoundError('Calc_Pow')).toMatchObject({
      code: -32601,
      kind: 'TOOL_NOT_FOUND',
      details: { toolName: 'Calc_Pow' },
    });
    expect(new InternalError().message).toBe('Internal error');
    expect(new InternalError().code).toBe(-32603);
  });

  it('should use the parameter reason as kind', () => {
    const error = new InvalidParamsError('Missing required parameter: b', 'MISSING_REQUIRED', { path: 'b' });

    expect(error.code).toBe(-32602);
    expect(error.kind).toBe('MISSING_REQUIRED');
    expect(error.reason).toBe('MISSING_REQUIRED');
    expect(error.name).toBe('InvalidParamsError');
  });

  it('should keep status and payload of execution failures', () => {
    const error = new ExecutionFailureError('Order 7 not found', 404, { id: 7 });

    expect(error.code).toBe(EXECUTION_FAILURE_CODE);
    expect(error.details).toEqual({ status: 404, payload: { id: 7 } });
  });

  it('should report cancellation with its own code', () => {
    const error = new RequestCancelledError('Greeting_Wait');

    expect(error.code).toBe(REQUEST_CANCELLED_CODE);
    expect(error.message).toBe('Request cancelled: Greeting_Wait');
  });

  it('should classify configuration errors as internal', () => {
    expect(new ConfigurationError('Duplicate tool name: X').code).toBe(-32603);
  });

  it('should not treat host argument errors as protocol errors', () => {
    const error = new ArgumentError('divisor must not be zero', 'divisor');

    expect(isToolInvokeError(error)).toBe(false);
    expect(isToolInvokeError(new InternalError())).toBe(true);
    expect(error.paramName).toBe('divisor');
  });
});

describe('getErrorDetails', () => {
  it('should include code and kind of protocol errors', () => {
    const details = getErrorDetails(new ToolNotFoundError('Calc_Pow'));

    expect(details).toMatchObject({
      name: 'ToolNotFoundError',
      code: -32601,
      kind: 'TOOL_NOT_FOUND',
      details: { toolName: 'Calc_Pow' },
    });
  });

  it('should describe plain errors and thrown values', () => {
    expect(getErrorDetails(new TypeError('bad'))).toMatchObject({ name: 'TypeError', message: 'bad' });
    expect(getErrorDetails('boom')).toEqual({ message: 'boom' });
  });
});

describe('toError', () => {
  it('should wrap non-errors and pass errors through', () => {
    const error = new Error('x');

    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });
});
