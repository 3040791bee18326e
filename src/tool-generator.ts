/**
 * MCP tool rendering
 *
 * Why: ParameterInfo is protocol-independent. This is the one place it is
 * turned into the JSON Schema object that tools/list advertises.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ParameterInfo, ToolDefinition } from './types/tool.js';

/** Vendor keyword carrying the inferred binding source of a top-level parameter */
export const SOURCE_KEYWORD = 'x-source';

export class ToolGenerator {
  /**
   * Generate MCP tool from a tool definition
   */
  generateTool(toolDef: ToolDefinition): Tool {
    const tool: Tool = {
      name: toolDef.name,
      inputSchema: this.generateInputSchema(toolDef),
    };
    if (toolDef.description !== undefined) {
      tool.description = toolDef.description;
    }
    return tool;
  }

  /**
   * Generate JSON Schema for tool parameters
   *
   * Required-ness appears only as object-level `required` arrays, never as a
   * flag on the property itself.
   */
  private generateInputSchema(toolDef: ToolDefinition): Tool['inputSchema'] {
    const properties: Record<string, Record<string, unknown>> = {};
    const required: string[] = [];

    for (const param of toolDef.inputSchema) {
      const schema = this.parameterToJsonSchema(param);
      if (param.source) {
        schema[SOURCE_KEYWORD] = param.source;
      }
      properties[param.name] = schema;

      if (param.required) {
        required.push(param.name);
      }
    }

    const inputSchema: Tool['inputSchema'] = {
      type: 'object',
      properties,
    };
    if (required.length > 0) {
      inputSchema.required = required;
    }
    return inputSchema;
  }

  /**
   * Convert a parameter (or nested property) to JSON Schema
   */
  parameterToJsonSchema(param: ParameterInfo): Record<string, unknown> {
    const schema: Record<string, unknown> = {
      type: param.nullable ? [param.type, 'null'] : param.type,
    };

    if (param.description) {
      schema.description = param.description;
    }

    if (param.format) {
      schema.format = param.format;
    }

    if (param.enum) {
      schema.enum = param.nullable ? [...param.enum, null] : param.enum;
    }

    if (param.default !== undefined) {
      schema.default = param.default;
    }

    if (param.type === 'array' && param.items) {
      schema.items = this.parameterToJsonSchema(param.items);
    }

    if (param.type === 'object' && param.properties) {
      const properties: Record<string, Record<string, unknown>> = {};
      for (const [name, property] of Object.entries(param.properties)) {
        properties[name] = this.parameterToJsonSchema(property);
      }
      schema.properties = properties;

      if (param.requiredProperties && param.requiredProperties.length > 0) {
        schema.required = [...param.requiredProperties];
      }
    }

    return schema;
  }
}
