/**
 * Stdio transport
 *
 * Newline-delimited JSON-RPC: one frame per input line, one response line per
 * non-notification frame. Frames are handled concurrently, so responses may be
 * written in a different order than their requests arrived.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from './logger.js';
import type { MessageHandler } from './types/http-transport.js';
import { toError } from './errors.js';

export interface StdioTransportOptions {
  input?: Readable;
  output?: Writable;
}

export class StdioTransport {
  private input: Readable;
  private output: Writable;
  private reader: Interface | null = null;
  private pending = new Set<Promise<void>>();
  private controller = new AbortController();
  private closed: Promise<void> | null = null;

  constructor(
    private handler: MessageHandler,
    private logger: Logger,
    options: StdioTransportOptions = {}
  ) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  /**
   * Start reading frames. Resolves once the transport is listening; use
   * `whenClosed()` to wait for the input to end.
   */
  async start(): Promise<void> {
    if (this.reader) return;

    const reader = createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });
    this.reader = reader;

    reader.on('line', line => {
      if (line.trim() === '') return;
      this.track(this.handleLine(line));
    });

    this.closed = new Promise(resolve => {
      reader.once('close', () => {
        void this.drain().then(resolve);
      });
    });

    this.logger.info('Stdio transport started');
  }

  /**
   * Resolves when the input has ended and every pending frame was answered
   */
  async whenClosed(): Promise<void> {
    await this.closed;
  }

  async stop(): Promise<void> {
    this.controller.abort();
    this.reader?.close();
    this.reader = null;
    await this.drain();
    this.logger.info('Stdio transport stopped');
  }

  private track(task: Promise<void>): void {
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }

  private async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async handleLine(line: string): Promise<void> {
    try {
      const response = await this.handler(line, this.controller.signal);
      if (response !== undefined) {
        this.output.write(`${JSON.stringify(response)}\n`);
      }
    } catch (error) {
      this.logger.error('Failed to handle stdio frame', toError(error));
    }
  }
}
