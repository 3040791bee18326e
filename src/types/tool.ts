/**
 * Tool definition types
 *
 * ParameterInfo is the canonical, protocol-independent description of a tool
 * parameter. It is rendered to JSON Schema only when a tools/list response is built.
 */

import type { TypeRef } from './host.js';

export type JsonSchemaType = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array' | 'null';

export type ParameterSource = 'route' | 'query' | 'body' | 'header' | 'form';

export interface ParameterInfo {
  name: string;
  type: JsonSchemaType;
  required: boolean;
  /** Accepts null in addition to `type` */
  nullable?: boolean;
  description?: string;
  source?: ParameterSource;
  properties?: Record<string, ParameterInfo>;
  requiredProperties?: string[];
  items?: ParameterInfo;
  enum?: Array<string | number>;
  format?: string;
  default?: unknown;
}

export interface ToolDefinition {
  name: string;
  description?: string;
  inputSchema: ParameterInfo[];
}

/** A parameter as the host method declares it, in call order */
export interface DeclaredParameter {
  name: string;
  type: TypeRef;
  optional: boolean;
  default?: unknown;
  /** Absent for infrastructure parameters that are not exposed to clients */
  schema?: ParameterInfo;
}

export interface RegisteredTool {
  readonly definition: ToolDefinition;
  readonly handlerId: string;
  readonly methodId: string;
  readonly isStatic: boolean;
  readonly parameters: readonly DeclaredParameter[];
}
