/**
 * HTTP transport for MCP
 *
 * Why: Enables remote access. One JSON-RPC frame per POST; the response is the
 * JSON-RPC response, or 202 with an empty body for notifications.
 *
 * The body is read as text so malformed JSON reaches the dispatcher and is
 * answered with a JSON-RPC parse error instead of an express error page.
 */

import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import type { Logger } from './logger.js';
import type { HttpTransportConfig, MessageHandler } from './types/http-transport.js';
import type { MetricsCollector } from './metrics.js';
import { HTTP_STATUS, TIME } from './constants.js';
import { toError } from './errors.js';

const LOCAL_HOSTNAMES: ReadonlySet<string> = new Set(['localhost', '127.0.0.1', '::1']);

export class HttpTransport {
  private app: express.Application;
  private server: Server | null = null;
  private inFlight = new Set<AbortController>();
  private hasWarnedAboutBinding = false;

  constructor(
    private config: HttpTransportConfig,
    private handler: MessageHandler,
    private logger: Logger,
    private metrics?: MetricsCollector
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Express application (for testing with supertest)
   */
  getApp(): express.Application {
    return this.app;
  }

  /**
   * Setup Express middleware
   *
   * Why: Security (Origin validation), metrics
   */
  private setupMiddleware(): void {
    // Metrics: record every request once the response is finished
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      res.on('finish', () => {
        this.metrics?.recordHttpRequest(
          req.method,
          req.path,
          res.statusCode,
          (Date.now() - startTime) / TIME.MS_PER_SECOND
        );
      });
      next();
    });

    // Security: Origin validation (DNS rebinding protection)
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      if (this.config.host === '0.0.0.0' && !this.hasWarnedAboutBinding) {
        this.logger.warn('HTTP transport bound to 0.0.0.0 - accessible from network. Ensure firewall protection.');
        this.hasWarnedAboutBinding = true;
      }

      // Skip Origin check for localhost
      if (LOCAL_HOSTNAMES.has(req.hostname)) {
        next();
        return;
      }

      const origin = req.headers.origin;
      if (origin && !this.isAllowedOrigin(origin)) {
        this.logger.warn('Rejected request from disallowed origin', { origin, ip: req.ip });
        res.status(HTTP_STATUS.FORBIDDEN).json({
          error: 'Forbidden',
          message: 'Origin not allowed',
        });
        return;
      }

      next();
    });
  }

  /**
   * Check if origin is allowed
   *
   * Supports:
   * - Exact hostname: 'example.com', 'api.example.com'
   * - Wildcard subdomain: '*.example.com'
   * - IPv4 CIDR: '192.168.1.0/24', '10.0.0.0/8'
   */
  isAllowedOrigin(origin: string): boolean {
    if (!URL.canParse(origin)) {
      return false;
    }
    const hostname = new URL(origin).hostname;

    if (LOCAL_HOSTNAMES.has(hostname) || hostname === this.config.host) {
      return true;
    }

    return (this.config.allowedOrigins ?? []).some(allowed => this.matchOrigin(hostname, allowed));
  }

  /**
   * Match hostname against allowed origin pattern
   */
  private matchOrigin(hostname: string, pattern: string): boolean {
    if (hostname === pattern) {
      return true;
    }

    // Wildcard subdomain match (*.example.com)
    if (pattern.startsWith('*.')) {
      const domain = pattern.substring(2);
      return hostname.endsWith('.' + domain) || hostname === domain;
    }

    if (pattern.includes('/')) {
      return this.matchCIDR(hostname, pattern);
    }

    return false;
  }

  /**
   * Check if IPv4 address is within CIDR range
   *
   * Example: '192.168.1.50' matches '192.168.1.0/24'
   */
  private matchCIDR(ip: string, cidr: string): boolean {
    const [range, bits] = cidr.split('/');
    const maskBits = parseInt(bits, 10);

    if (isNaN(maskBits) || maskBits < 0 || maskBits > 32) {
      this.logger.warn('Invalid CIDR mask bits', { cidr });
      return false;
    }

    const ipInt = this.ipToInt(ip);
    const rangeInt = this.ipToInt(range);
    if (ipInt === null || rangeInt === null) {
      return false;
    }

    // /0 would shift by 32, which JavaScript treats as a shift by 0
    const mask = maskBits === 0 ? 0 : (0xFFFFFFFF << (32 - maskBits)) >>> 0;
    return ((ipInt & mask) >>> 0) === ((rangeInt & mask) >>> 0);
  }

  /**
   * Convert IPv4 address to 32-bit integer
   */
  private ipToInt(ip: string): number | null {
    const parts = ip.split('.');
    if (parts.length !== 4) {
      return null;
    }

    let result = 0;
    for (const part of parts) {
      const octet = parseInt(part, 10);
      if (isNaN(octet) || octet < 0 || octet > 255) {
        return null;
      }
      result = (result << 8) | octet;
    }

    return result >>> 0;
  }

  private setupRoutes(): void {
    const textBody = express.text({
      type: ['application/json', 'application/*+json', 'text/plain'],
      limit: this.config.maxBodySize ?? '1mb',
    });

    this.app.post(this.config.path, textBody, (req: Request, res: Response) => {
      void this.handlePost(req, res);
    });

    if (this.config.metricsEnabled) {
      this.app.get(this.config.metricsPath, (req: Request, res: Response) => {
        void this.handleMetrics(res);
      });
    }

    this.app.get('/health', (req: Request, res: Response) => {
      res.json({ status: 'ok', inFlight: this.inFlight.size });
    });
  }

  /**
   * Handle one JSON-RPC frame
   *
   * A client disconnect before the response is written aborts the call.
   */
  private async handlePost(req: Request, res: Response): Promise<void> {
    const body: unknown = req.body;
    const raw = typeof body === 'string' ? body : '';
    const controller = new AbortController();
    this.inFlight.add(controller);
    let clientGone = false;

    res.on('close', () => {
      if (!res.writableFinished) {
        clientGone = true;
        this.logger.info('Client disconnected before response, cancelling request');
        controller.abort();
      }
    });

    try {
      const response = await this.handler(raw, controller.signal);
      if (clientGone || res.writableEnded) {
        return;
      }
      if (response === undefined) {
        res.status(HTTP_STATUS.ACCEPTED).end();
        return;
      }
      res.status(HTTP_STATUS.OK).json(response);
    } catch (error) {
      this.logger.error('POST request error', toError(error));
      if (!res.headersSent) {
        res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({
          error: 'Internal Server Error',
          message: 'Unexpected transport failure',
        });
      }
    } finally {
      this.inFlight.delete(controller);
    }
  }

  /**
   * Prometheus scraping endpoint
   */
  private async handleMetrics(res: Response): Promise<void> {
    if (!this.metrics) {
      res.status(HTTP_STATUS.NOT_FOUND).json({ error: 'Not Found', message: 'Metrics disabled' });
      return;
    }

    try {
      const output = await this.metrics.getMetrics();
      res.set('Content-Type', this.metrics.contentType);
      res.send(output);
    } catch (error) {
      this.logger.error('Metrics endpoint error', toError(error));
      res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ error: 'Internal Server Error' });
    }
  }

  /**
   * Start HTTP server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info('HTTP transport started', {
          host: this.config.host,
          port: this.config.port,
          path: this.config.path,
          metrics: this.config.metricsEnabled,
        });
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  /**
   * Stop HTTP server, cancelling in-flight calls
   */
  async stop(): Promise<void> {
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();

    const server = this.server;
    if (!server) return;
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close(err => {
        if (err) {
          reject(err);
          return;
        }
        this.logger.info('HTTP transport stopped');
        resolve();
      });
    });
  }
}
