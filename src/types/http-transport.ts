/**
 * Type definitions for HTTP transport
 */

import type { JsonRpcResponse } from '../jsonrpc-validator.js';

export interface HttpTransportConfig {
  host: string;
  port: number;
  /** JSON-RPC endpoint path (default: /mcp) */
  path: string;
  metricsEnabled: boolean;
  metricsPath: string;
  allowedOrigins?: string[]; // Allowed origins/CIDR ranges
  maxBodySize?: string; // express body size limit (default: 1mb)
}

/**
 * Handles one raw JSON-RPC frame. Resolves to undefined for notifications.
 */
export type MessageHandler = (raw: string, signal: AbortSignal) => Promise<JsonRpcResponse | undefined>;
