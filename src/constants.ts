/**
 * Application constants
 */

/** MCP protocol revision advertised by initialize; not negotiated */
export const PROTOCOL_VERSION = '2025-06-18';

export const JSON_RPC_VERSION = '2.0';

export const DEFAULT_SERVER_INFO = {
  name: 'mcp-method-bridge',
  version: '0.1.0',
} as const;

/**
 * Protocol methods handled by the dispatcher
 */
export const MCP_METHODS = {
  INITIALIZE: 'initialize',
  INITIALIZED: 'notifications/initialized',
  PING: 'ping',
  TOOLS_LIST: 'tools/list',
  TOOLS_CALL: 'tools/call',
} as const;

export const TIME = {
  MS_PER_SECOND: 1000,
} as const;

/**
 * HTTP status codes
 */
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  ACCEPTED: 202,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_SERVER_ERROR: 500,
} as const;
