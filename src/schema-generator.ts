/**
 * Schema generator
 *
 * Turns discovered host-method metadata into ParameterInfo trees: JSON types,
 * required-ness, nested object properties (including inherited ones), array
 * item schemas, enum values and parameter sources.
 *
 * Pure with respect to its input; expanded class schemas are cached per class.
 */

import type {
  BindingSourceInspector,
  ClassType,
  DiscoveredOperation,
  EnumType,
  PrimitiveName,
  RawParameterMetadata,
  TypeRef,
} from './types/host.js';
import type { DeclaredParameter, JsonSchemaType, ParameterInfo, ToolDefinition } from './types/tool.js';
import { describeType, isNullable, resolveProperties } from './host-types.js';
import { inferParameterSource, metadataBindingSourceInspector, routeParametersOf } from './source-inference.js';
import type { Logger } from './logger.js';

interface ObjectSchema {
  properties: Record<string, ParameterInfo>;
  requiredProperties: string[];
}

/**
 * Per-generation traversal state. `expanding` holds the classes on the active
 * recursion path; `guardHits` counts how often the cycle guard fired.
 */
interface TraversalState {
  expanding: Set<ClassType>;
  guardHits: number;
}

export interface GeneratedTool {
  definition: ToolDefinition;
  parameters: DeclaredParameter[];
}

const PRIMITIVE_TYPES: Record<PrimitiveName, JsonSchemaType> = {
  string: 'string',
  char: 'string',
  guid: 'string',
  uri: 'string',
  'date-time': 'string',
  date: 'string',
  'time-span': 'string',
  boolean: 'boolean',
  byte: 'integer',
  sbyte: 'integer',
  int16: 'integer',
  uint16: 'integer',
  int32: 'integer',
  uint32: 'integer',
  int64: 'integer',
  uint64: 'integer',
  float: 'number',
  double: 'number',
  decimal: 'number',
};

const PRIMITIVE_FORMATS: Partial<Record<PrimitiveName, string>> = {
  guid: 'uuid',
  uri: 'uri',
  'date-time': 'date-time',
  date: 'date',
  'time-span': 'duration',
  int32: 'int32',
  int64: 'int64',
  float: 'float',
  double: 'double',
};

export class SchemaGenerator {
  private cache = new Map<ClassType, ObjectSchema>();
  private inspector: BindingSourceInspector;

  constructor(
    private logger?: Logger,
    inspector?: BindingSourceInspector
  ) {
    this.inspector = inspector ?? metadataBindingSourceInspector;
  }

  /**
   * Generate the tool definition and the declared call signature of an operation
   */
  generateTool(operation: DiscoveredOperation): GeneratedTool {
    const routeParameters = routeParametersOf(operation, this.inspector);
    const parameters: DeclaredParameter[] = [];
    const inputSchema: ParameterInfo[] = [];

    for (const raw of operation.parameters) {
      const declared: DeclaredParameter = {
        name: raw.name,
        type: raw.type,
        optional: Boolean(raw.optional),
        default: raw.default,
      };

      if (raw.type.kind !== 'signal') {
        declared.schema = this.generateParameter(raw, routeParameters);
        inputSchema.push(declared.schema);
      }

      parameters.push(declared);
    }

    this.logger?.debug('Generated tool schema', {
      toolName: operation.toolName,
      parameters: inputSchema.map(p => `${p.name}:${p.type}${p.source ? `@${p.source}` : ''}`),
    });

    return {
      definition: {
        name: operation.toolName,
        description: operation.description,
        inputSchema,
      },
      parameters,
    };
  }

  /**
   * Generate the schema of a single top-level parameter
   */
  generateParameter(raw: RawParameterMetadata, routeParameters: ReadonlySet<string> = new Set()): ParameterInfo {
    const source = inferParameterSource({
      parameter: raw,
      explicitSource: this.inspector.explicitSource(raw),
      routeParameters,
    });

    const description = raw.description ?? `Parameter ${raw.name} of type ${describeType(raw.type)}`;
    const schema = this.schemaForType(raw.type, raw.name, description, {
      expanding: new Set(),
      guardHits: 0,
    });

    schema.required = source === 'route' || (!raw.optional && raw.default === undefined);
    if (source) schema.source = source;
    if (raw.default !== undefined) schema.default = raw.default;

    return schema;
  }

  /**
   * Generate the schema of a type as it would appear under `name`.
   * `required` is false here; callers decide required-ness from context.
   */
  schemaForType(type: TypeRef, name: string, description: string, state: TraversalState): ParameterInfo {
    const schema = this.baseSchemaForType(type, name, description, state);
    // Cached object expansions are shared; flag a copy
    return type.kind !== 'unknown' && isNullable(type) ? { ...schema, nullable: true } : schema;
  }

  private baseSchemaForType(type: TypeRef, name: string, description: string, state: TraversalState): ParameterInfo {
    switch (type.kind) {
      case 'primitive': {
        const schema: ParameterInfo = {
          name,
          type: PRIMITIVE_TYPES[type.name],
          required: false,
          description,
        };
        const format = PRIMITIVE_FORMATS[type.name];
        if (format) schema.format = format;
        return schema;
      }

      case 'enum':
        return this.enumSchema(type.type, name, description);

      case 'array':
        return {
          name,
          type: 'array',
          required: false,
          description,
          items: this.schemaForType(
            type.element,
            'items',
            `Array item of type ${describeType(type.element)}`,
            state
          ),
        };

      case 'object':
        return this.objectSchema(type.type, name, description, state);

      case 'unknown':
        return { name, type: 'object', required: false, description, properties: {} };

      case 'signal':
        throw new Error(`Parameter '${name}' of type AbortSignal has no schema`);
    }
  }

  private enumSchema(type: EnumType, name: string, description: string): ParameterInfo {
    const allowed = type.members.map(m => `${m.name} (${JSON.stringify(m.value)})`).join(', ');
    const values = type.base === 'mixed'
      ? type.members.map(m => m.name)
      : type.members.map(m => m.value);

    return {
      name,
      type: type.base === 'integer' ? 'integer' : 'string',
      required: false,
      description: `${description}. Allowed values: ${allowed}`,
      enum: values,
    };
  }

  private objectSchema(cls: ClassType, name: string, description: string, state: TraversalState): ParameterInfo {
    if (state.expanding.has(cls)) {
      state.guardHits++;
      this.logger?.debug('Circular reference in schema generation', { type: cls.name, parameter: name });
      return {
        name,
        type: 'object',
        required: false,
        description: `Circular reference to ${cls.name}`,
      };
    }

    const expanded = this.expandClass(cls, state);
    const schema: ParameterInfo = {
      name,
      type: 'object',
      required: false,
      description,
      properties: expanded.properties,
    };
    if (expanded.requiredProperties.length > 0) {
      schema.requiredProperties = expanded.requiredProperties;
    }
    return schema;
  }

  private expandClass(cls: ClassType, state: TraversalState): ObjectSchema {
    const cached = this.cache.get(cls);
    if (cached) return cached;

    const hitsBefore = state.guardHits;
    state.expanding.add(cls);

    try {
      const properties: Record<string, ParameterInfo> = {};
      const requiredProperties: string[] = [];

      for (const prop of resolveProperties(cls)) {
        if (prop.type.kind === 'signal') continue;

        const propDescription = prop.description ?? `Property ${prop.name} of type ${describeType(prop.type)}`;
        const propSchema = this.schemaForType(prop.type, prop.name, propDescription, state);
        propSchema.required = prop.required;
        if (prop.default !== undefined) propSchema.default = prop.default;

        properties[prop.name] = propSchema;
        if (prop.required) requiredProperties.push(prop.name);
      }

      const result: ObjectSchema = { properties, requiredProperties };

      // A truncated expansion depends on the path it was reached from
      if (state.guardHits === hitsBefore) {
        this.cache.set(cls, result);
      }

      return result;
    } finally {
      state.expanding.delete(cls);
    }
  }
}
