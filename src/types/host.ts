/**
 * Host-side types: the declared shapes of host methods and the collaborators
 * that discover and resolve them.
 *
 * Why explicit type references: TypeScript types are erased at run time, so the
 * declared type of every host parameter travels with the discovered metadata
 * as a `TypeRef` value.
 */

import type { ParameterSource } from './tool.js';

export type PrimitiveName =
  | 'string'
  | 'char'
  | 'guid'
  | 'uri'
  | 'boolean'
  | 'byte'
  | 'sbyte'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64'
  | 'float'
  | 'double'
  | 'decimal'
  | 'date-time'
  | 'date'
  | 'time-span';

export interface PrimitiveTypeRef {
  kind: 'primitive';
  name: PrimitiveName;
  nullable?: boolean;
}

export interface EnumTypeRef {
  kind: 'enum';
  type: EnumType;
  nullable?: boolean;
}

export interface ArrayTypeRef {
  kind: 'array';
  element: TypeRef;
  nullable?: boolean;
}

export interface ObjectTypeRef {
  kind: 'object';
  type: ClassType;
  nullable?: boolean;
}

/** Free-form JSON, passed to the host untouched */
export interface UnknownTypeRef {
  kind: 'unknown';
}

/** Receives the request's AbortSignal; never exposed in the tool schema */
export interface SignalTypeRef {
  kind: 'signal';
}

export type TypeRef =
  | PrimitiveTypeRef
  | EnumTypeRef
  | ArrayTypeRef
  | ObjectTypeRef
  | UnknownTypeRef
  | SignalTypeRef;

export interface EnumMember {
  name: string;
  value: string | number;
}

export interface EnumType {
  name: string;
  members: readonly EnumMember[];
  /** 'integer' when every member is numeric, 'string' when every member is a string */
  base: 'integer' | 'string' | 'mixed';
}

export interface PropertyDecl {
  name: string;
  type: TypeRef;
  required?: boolean;
  description?: string;
  default?: unknown;
}

/**
 * A host class. `properties` is a thunk so that classes can reference
 * themselves or each other before both are defined.
 */
export interface ClassType {
  name: string;
  base?: ClassType;
  properties: () => readonly PropertyDecl[];
  create?: () => object;
}

export interface RawParameterMetadata {
  name: string;
  type: TypeRef;
  /** Explicit binding-source annotation, when the host declared one */
  source?: ParameterSource;
  optional?: boolean;
  default?: unknown;
  description?: string;
}

export type HttpVerb = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface DiscoveredOperation {
  toolName: string;
  handlerId: string;
  methodId: string;
  isStatic: boolean;
  description?: string;
  httpMethod?: HttpVerb;
  /** Action template first, then the owning controller template */
  routeTemplates: readonly string[];
  parameters: readonly RawParameterMetadata[];
}

export interface ToolDefinitionSource {
  discover(): readonly DiscoveredOperation[];
}

export interface BindingSourceInspector {
  explicitSource(parameter: RawParameterMetadata): ParameterSource | undefined;
  routeTemplates(operation: DiscoveredOperation): readonly string[];
}

export interface HandlerScope {
  resolve(handlerId: string): object;
  dispose(): Promise<void>;
}

export interface HandlerResolver {
  createScope(): HandlerScope;
  resolveStatic(handlerId: string): object;
}
