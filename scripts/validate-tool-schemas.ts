#!/usr/bin/env node

/**
 * Validates every generated tool input schema of the sample host against the
 * JSON Schema Draft-07 meta-schema, then compiles it in strict mode
 *
 * Why: Clients feed these schemas to their own validators; a schema that only
 * looks right is not enough
 */

import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ControllerToolSource } from '../src/controller-source.js';
import { ToolRegistry } from '../src/tool-registry.js';
import { SOURCE_KEYWORD } from '../src/tool-generator.js';
import { toError } from '../src/errors.js';
import { sampleControllers } from '../src/sample-host/index.js';

export interface SchemaCheck {
  tool: string;
  valid: boolean;
  errors: string[];
}

export function createSchemaValidator(): Ajv.default {
  const ajv = new Ajv.default({
    strict: true,
    allowUnionTypes: true,
    allErrors: true,
    verbose: true,
  });

  // Add format validators (uuid, date-time, int32, ...)
  addFormats.default(ajv);

  ajv.addKeyword({
    keyword: SOURCE_KEYWORD,
    schemaType: 'string',
  });

  return ajv;
}

export function checkToolSchemas(tools: readonly Tool[], ajv: Ajv.default = createSchemaValidator()): SchemaCheck[] {
  return tools.map(tool => {
    const errors: string[] = [];

    if (!ajv.validateSchema(tool.inputSchema)) {
      for (const error of ajv.errors ?? []) {
        errors.push(`${error.instancePath || '/'}: ${error.message ?? 'invalid'}`);
      }
    } else {
      try {
        ajv.compile(tool.inputSchema);
      } catch (e) {
        errors.push(`compile: ${toError(e).message}`);
      }
    }

    return { tool: tool.name, valid: errors.length === 0, errors };
  });
}

function validateToolSchemas(): void {
  const registry = ToolRegistry.build(new ControllerToolSource(sampleControllers).discover());
  const results = checkToolSchemas(registry.toProtocolTools());

  console.log('');
  console.log('═══════════════════════════════════════════════════');
  console.log('  TOOL SCHEMA VALIDATION');
  console.log('═══════════════════════════════════════════════════');
  console.log('');

  for (const result of results) {
    console.log(`${result.valid ? '✅' : '❌'} ${result.tool}`);
    for (const error of result.errors) {
      console.log(`    • ${error}`);
    }
  }

  const invalid = results.filter(result => !result.valid).length;
  console.log('');
  console.log(`${results.length - invalid}/${results.length} tool schemas valid`);
  console.log('');

  if (invalid > 0) {
    process.exit(1);
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  validateToolSchemas();
}
