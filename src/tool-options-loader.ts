/**
 * Tool naming options loader
 *
 * Reads `includeControllerNameInToolName` and `excludedControllers` from a
 * JSON or YAML file (by extension) and validates them.
 */

import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, toError } from './errors.js';
import type { ToolNamingOptions } from './controller-source.js';

const toolOptionsSchema = z
  .object({
    includeControllerNameInToolName: z.boolean().optional(),
    excludedControllers: z.array(z.string().min(1)).optional(),
  })
  .strict();

/**
 * Parse options file content
 */
export function parseToolOptions(content: string, format: 'json' | 'yaml'): ToolNamingOptions {
  let raw: unknown;
  try {
    raw = format === 'yaml' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Tool options are not valid ${format.toUpperCase()}: ${toError(error).message}`);
  }

  // An empty YAML document parses to null
  const parsed = toolOptionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`Invalid tool options: ${problems.join('; ')}`, { issues: problems });
  }

  return parsed.data;
}

export class ToolOptionsLoader {
  async load(optionsPath: string): Promise<ToolNamingOptions> {
    const content = await fs.readFile(optionsPath, 'utf-8');
    const format = optionsPath.endsWith('.yaml') || optionsPath.endsWith('.yml') ? 'yaml' : 'json';
    return parseToolOptions(content, format);
  }
}
