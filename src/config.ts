/**
 * Environment configuration
 *
 * Why validation: env vars come from the deployment. A typo in MCP_PORT or
 * LOG_FORMAT should stop startup with the variable named, not surface later.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_REDACT_KEYS, LogLevel, parseLogLevel } from './logger.js';
import { DEFAULT_SERVER_INFO } from './constants.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const commaList = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0));

const envSchema = z.object({
  MCP_TRANSPORT: z.enum(['stdio', 'http']).default('stdio'),
  MCP_HOST: z.string().min(1).default('127.0.0.1'),
  MCP_PORT: z.coerce.number().int().min(1).max(65535).default(3003),
  MCP_PATH: z.string().startsWith('/').default('/mcp'),
  MCP_SERVER_NAME: z.string().min(1).default(DEFAULT_SERVER_INFO.name),
  MCP_SERVER_VERSION: z.string().min(1).default(DEFAULT_SERVER_INFO.version),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return LogLevel.INFO;
      const level = parseLogLevel(value);
      if (level === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'expected one of debug, info, warn, error, silent',
        });
        return z.NEVER;
      }
      return level;
    }),
  LOG_FORMAT: z.enum(['console', 'json']).default('console'),
  LOG_REDACT_KEYS: commaList.optional(),
  METRICS_ENABLED: booleanFlag.default('false'),
  METRICS_PATH: z.string().startsWith('/').default('/metrics'),
  ALLOWED_ORIGINS: commaList.optional(),
  MCP_TOOL_OPTIONS_PATH: z.string().min(1).optional(),
});

export interface AppConfig {
  transport: 'stdio' | 'http';
  http: {
    host: string;
    port: number;
    path: string;
    allowedOrigins: string[];
  };
  server: {
    name: string;
    version: string;
  };
  logging: {
    level: LogLevel;
    format: 'console' | 'json';
    redactKeys: string[];
  };
  metrics: {
    enabled: boolean;
    path: string;
  };
  toolOptionsPath?: string;
}

/**
 * Parse configuration from environment variables.
 * Empty strings count as unset.
 *
 * @throws ConfigurationError naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, {
      variables: [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))],
    });
  }

  const values = parsed.data;
  return {
    transport: values.MCP_TRANSPORT,
    http: {
      host: values.MCP_HOST,
      port: values.MCP_PORT,
      path: values.MCP_PATH,
      allowedOrigins: values.ALLOWED_ORIGINS ?? [],
    },
    server: {
      name: values.MCP_SERVER_NAME,
      version: values.MCP_SERVER_VERSION,
    },
    logging: {
      level: values.LOG_LEVEL,
      format: values.LOG_FORMAT,
      redactKeys: values.LOG_REDACT_KEYS ?? [...DEFAULT_REDACT_KEYS],
    },
    metrics: {
      enabled: values.METRICS_ENABLED,
      path: values.METRICS_PATH,
    },
    toolOptionsPath: values.MCP_TOOL_OPTIONS_PATH,
  };
}
