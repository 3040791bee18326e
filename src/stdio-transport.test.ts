/**
 * Tests for the stdio transport
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough } from 'stream';
import { StdioTransport } from './stdio-transport.js';
import { RequestDispatcher } from './dispatcher.js';
import type { MessageHandler } from './types/http-transport.js';
import { createMockLogger, createSampleContext, notification, rpc, type MockLogger } from './testing/test-utils.js';

function collect(stream: PassThrough): () => unknown[] {
  let buffer = '';
  stream.on('data', (chunk: Buffer) => {
    buffer += chunk.toString('utf-8');
  });
  return () =>
    buffer
      .split('\n')
      .filter(line => line.length > 0)
      .map(line => JSON.parse(line));
}

function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('StdioTransport', () => {
  let logger: MockLogger;
  let input: PassThrough;
  let output: PassThrough;
  let handler: MessageHandler;

  beforeEach(() => {
    logger = createMockLogger();
    input = new PassThrough();
    output = new PassThrough();
    const dispatcher = new RequestDispatcher(createSampleContext({ logger }));
    handler = (raw, signal) => dispatcher.handleRaw(raw, { signal });
  });

  it('should write one response line per request', async () => {
    const responses = collect(output);
    const transport = new StdioTransport(handler, logger, { input, output });
    await transport.start();

    input.write(`${rpc(1, 'ping')}\n`);
    input.write(`${notification('notifications/initialized')}\n`);
    input.write('\n');
    input.end(`${rpc(2, 'tools/call', { name: 'Calc_Add', arguments: { a: 2, b: 3 } })}\n`);
    await transport.whenClosed();
    await flush();

    expect(responses()).toEqual(
      expect.arrayContaining([
        { jsonrpc: '2.0', id: 1, result: {} },
        { jsonrpc: '2.0', id: 2, result: { content: [{ type: 'text', text: '5' }] } },
      ])
    );
    expect(responses()).toHaveLength(2);
  });

  it('should answer malformed lines with a parse error', async () => {
    const responses = collect(output);
    const transport = new StdioTransport(handler, logger, { input, output });
    await transport.start();

    input.end('{not json}\n');
    await transport.whenClosed();
    await flush();

    expect(responses()).toEqual([
      { jsonrpc: '2.0', id: null, error: { code: -32700, message: expect.stringMatching(/^Parse error: /) } },
    ]);
  });

  it('should handle a final line without a newline', async () => {
    const responses = collect(output);
    const transport = new StdioTransport(handler, logger, { input, output });
    await transport.start();

    input.end(rpc(3, 'ping'));
    await transport.whenClosed();
    await flush();

    expect(responses()).toEqual([{ jsonrpc: '2.0', id: 3, result: {} }]);
  });

  it('should cancel pending calls on stop', async () => {
    const responses = collect(output);
    const transport = new StdioTransport(handler, logger, { input, output });
    await transport.start();

    input.write(`${rpc(4, 'tools/call', { name: 'Greeting_Wait', arguments: { milliseconds: 60000 } })}\n`);
    await flush();
    await transport.stop();
    await flush();

    expect(responses()).toEqual([
      {
        jsonrpc: '2.0',
        id: 4,
        error: {
          code: -32800,
          message: 'Request cancelled: Greeting_Wait',
          data: { kind: 'REQUEST_CANCELLED', toolName: 'Greeting_Wait' },
        },
      },
    ]);
  });

  it('should log handler failures and keep reading', async () => {
    const responses = collect(output);
    let calls = 0;
    const transport = new StdioTransport(
      async raw => {
        calls++;
        if (calls === 1) throw new Error('handler crashed');
        return handler(raw, new AbortController().signal);
      },
      logger,
      { input, output }
    );
    await transport.start();

    input.write(`${rpc(5, 'ping')}\n`);
    input.end(`${rpc(6, 'ping')}\n`);
    await transport.whenClosed();
    await flush();

    expect(logger.error).toHaveBeenCalledWith('Failed to handle stdio frame', expect.objectContaining({ message: 'handler crashed' }));
    expect(responses()).toEqual([{ jsonrpc: '2.0', id: 6, result: {} }]);
  });
});
