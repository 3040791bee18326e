#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Why: Reads env vars, starts the sample host over the configured transport,
 * shuts down gracefully on signals.
 */

import 'dotenv/config';
import { MCPServer } from './mcp-server.js';
import { ConsoleLogger, createLogger } from './logger.js';
import { loadConfig } from './config.js';
import { ControllerToolSource } from './controller-source.js';
import { ToolOptionsLoader } from './tool-options-loader.js';
import { MetricsCollector } from './metrics.js';
import { createSampleResolver, sampleControllers } from './sample-host/index.js';
import { toError } from './errors.js';

async function main(): Promise<void> {
  const logger = new ConsoleLogger();

  try {
    const config = loadConfig();
    const configured = createLogger({
      format: config.logging.format,
      level: config.logging.level,
      redactKeys: config.logging.redactKeys,
    });

    const namingOptions = config.toolOptionsPath
      ? await new ToolOptionsLoader().load(config.toolOptionsPath)
      : {};

    const server = new MCPServer({
      source: new ControllerToolSource(sampleControllers, namingOptions, configured),
      resolver: createSampleResolver(),
      logger: configured,
      metrics: new MetricsCollector({ enabled: config.metrics.enabled }),
      serverInfo: config.server,
    });

    if (config.transport === 'http') {
      await server.runHttp({
        host: config.http.host,
        port: config.http.port,
        path: config.http.path,
        metricsEnabled: config.metrics.enabled,
        metricsPath: config.metrics.path,
        allowedOrigins: config.http.allowedOrigins,
      });
    } else {
      await server.runStdio();
    }

    // Graceful shutdown handlers
    const shutdown = async (signal: string) => {
      configured.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await server.stop();
        configured.info('Server stopped successfully');
        process.exit(0);
      } catch (error) {
        configured.error('Error during shutdown', toError(error));
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.error('Fatal error', toError(error));
    process.exit(1);
  }
}

void main();
