/**
 * JSON-RPC message parsing and validation utilities
 *
 * Why: Both transports hand raw frames to the dispatcher; envelope checks
 * live here so every transport reports malformed input the same way.
 */

import { JSON_RPC_VERSION } from './constants.js';
import { InvalidRequestError, ParseError, toError, type ToolInvokeError } from './errors.js';

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: typeof JSON_RPC_VERSION;
  method: string;
  params?: unknown;
  id?: JsonRpcId;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type EnvelopeResult =
  | { ok: true; request: JsonRpcRequest }
  | { ok: false; id: JsonRpcId; error: ToolInvokeError };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isValidId(value: unknown): value is JsonRpcId {
  return typeof value === 'string' || typeof value === 'number' || value === null;
}

/**
 * Request id to echo in a response; null when it cannot be determined
 */
export function extractId(message: unknown): JsonRpcId {
  if (!isRecord(message)) return null;
  const id = message.id;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

/**
 * A request without an id (or with a null id) expects no response
 */
export function isNotification(request: JsonRpcRequest): boolean {
  return request.id === undefined || request.id === null;
}

/**
 * Check a decoded message against the JSON-RPC 2.0 request envelope
 */
export function validateEnvelope(message: unknown): EnvelopeResult {
  const id = extractId(message);

  if (!isRecord(message)) {
    const what = Array.isArray(message) ? 'batch requests are not supported' : 'message must be an object';
    return { ok: false, id, error: new InvalidRequestError(what) };
  }

  if (message.jsonrpc !== JSON_RPC_VERSION) {
    return { ok: false, id, error: new InvalidRequestError('jsonrpc must be "2.0"') };
  }

  if (typeof message.method !== 'string') {
    return { ok: false, id, error: new InvalidRequestError('method must be a string') };
  }

  if ('id' in message && !isValidId(message.id)) {
    return { ok: false, id: null, error: new InvalidRequestError('id must be a string, number or null') };
  }

  const request: JsonRpcRequest = {
    jsonrpc: JSON_RPC_VERSION,
    method: message.method,
  };
  if ('params' in message) request.params = message.params;
  if (isValidId(message.id)) request.id = message.id;

  return { ok: true, request };
}

/**
 * Decode a raw frame and validate its envelope
 */
export function parseMessage(raw: string): EnvelopeResult {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch (error) {
    return { ok: false, id: null, error: new ParseError(toError(error).message) };
  }
  return validateEnvelope(message);
}

export function successResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: JSON_RPC_VERSION, id, result };
}

export function errorResponse(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcErrorResponse {
  return { jsonrpc: JSON_RPC_VERSION, id, error };
}
