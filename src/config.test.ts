/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { DEFAULT_REDACT_KEYS, LogLevel } from './logger.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      transport: 'stdio',
      http: { host: '127.0.0.1', port: 3003, path: '/mcp', allowedOrigins: [] },
      server: { name: 'mcp-method-bridge', version: '0.1.0' },
      logging: { level: LogLevel.INFO, format: 'console', redactKeys: DEFAULT_REDACT_KEYS },
      metrics: { enabled: false, path: '/metrics' },
      toolOptionsPath: undefined,
    });
  });

  it('should parse every supported variable', () => {
    const config = loadConfig({
      MCP_TRANSPORT: 'http',
      MCP_HOST: '0.0.0.0',
      MCP_PORT: '8080',
      MCP_PATH: '/rpc',
      MCP_SERVER_NAME: 'inventory-tools',
      MCP_SERVER_VERSION: '2.1.0',
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      LOG_REDACT_KEYS: 'sessionKey, pin',
      METRICS_ENABLED: 'yes',
      METRICS_PATH: '/stats',
      ALLOWED_ORIGINS: ' app.example.com, *.example.org ,',
      MCP_TOOL_OPTIONS_PATH: './tool-options.yaml',
    });

    expect(config).toEqual({
      transport: 'http',
      http: { host: '0.0.0.0', port: 8080, path: '/rpc', allowedOrigins: ['app.example.com', '*.example.org'] },
      server: { name: 'inventory-tools', version: '2.1.0' },
      logging: { level: LogLevel.DEBUG, format: 'json', redactKeys: ['sessionKey', 'pin'] },
      metrics: { enabled: true, path: '/stats' },
      toolOptionsPath: './tool-options.yaml',
    });
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ MCP_PORT: '   ', LOG_LEVEL: '' });

    expect(config.http.port).toBe(3003);
    expect(config.logging.level).toBe(LogLevel.INFO);
  });

  it('should name every invalid variable', () => {
    const load = () => loadConfig({ MCP_PORT: '70000', LOG_LEVEL: 'loud', MCP_TRANSPORT: 'ws' });

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow(/^Invalid configuration: /);
    expect(load).toThrow(/LOG_LEVEL: expected one of debug, info, warn, error, silent/);
    try {
      load();
    } catch (error) {
      expect(error).toMatchObject({
        details: { variables: expect.arrayContaining(['MCP_PORT', 'LOG_LEVEL', 'MCP_TRANSPORT']) },
      });
    }
  });

  it('should reject paths without a leading slash', () => {
    expect(() => loadConfig({ MCP_PATH: 'mcp' })).toThrow(/MCP_PATH/);
  });
});
