/**
 * Tests for the invoker
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { Invoker, classifyInvocationError, isParameterError, unwrapResult, wrapPayload, type InvokeResult } from './invoker.js';
import { ServiceHandlerResolver } from './handler-resolver.js';
import { ActionResult, Results } from './action-result.js';
import { ArgumentError, ExecutionFailureError, InternalError, InvalidParamsError, RequestCancelledError, ToolNotFoundError } from './errors.js';
import { CalcController, GreetingController, OrderController } from './sample-host/index.js';
import { createMockLogger, registeredTool, type MockLogger } from './testing/test-utils.js';
import { t } from './host-types.js';

function resultText(result: InvokeResult): string {
  if (!result.ok) throw new Error(`Unexpected failure: ${result.error.message}`);
  return result.result.content[0].text;
}

function failure(result: InvokeResult) {
  if (result.ok) throw new Error('Expected invocation to fail');
  return result.error;
}

describe('Invoker', () => {
  let logger: MockLogger;
  let resolver: ServiceHandlerResolver;
  let invoker: Invoker;

  beforeEach(() => {
    OrderController.reset();
    logger = createMockLogger();
    resolver = new ServiceHandlerResolver()
      .register('Calc', () => new CalcController())
      .registerStatic('Calc', CalcController)
      .register('Greeting', () => new GreetingController(() => new Date('2024-01-01T00:00:00.000Z')))
      .register('Orders', () => new OrderController());
    invoker = new Invoker(resolver, logger);
  });

  describe('results', () => {
    it('should serialize the return value as text content', async () => {
      const result = await invoker.invoke(registeredTool('Calc', 'add'), [10, 5]);

      expect(result).toEqual({ ok: true, result: { content: [{ type: 'text', text: '15' }] } });
    });

    it('should call static methods without a scope', async () => {
      const result = await invoker.invoke(registeredTool('Calc', 'getVersion', { isStatic: true }), []);

      expect(resultText(result)).toBe('"1.0.0"');
    });

    it('should await asynchronous methods', async () => {
      const result = await invoker.invoke(registeredTool('Greeting', 'getServerTime'), []);

      expect(resultText(result)).toBe('"2024-01-01T00:00:00.000Z"');
    });

    it('should unwrap successful result envelopes', async () => {
      const created = await invoker.invoke(registeredTool('Orders', 'create'), [
        't1',
        { name: 'Bulbs', priority: 1, tags: [], lines: [{ sku: 'B-1', quantity: 3, unitPrice: 2 }], requestedBy: 'sam' },
      ]);

      expect(JSON.parse(resultText(created))).toMatchObject({ id: 1, tenant: 't1', name: 'Bulbs', total: 6, status: 'open' });

      const cancelled = await invoker.invoke(registeredTool('Orders', 'cancel'), ['t1', 1]);
      expect(resultText(cancelled)).toBe('null');
    });
  });

  describe('failures', () => {
    it('should report failure envelopes as execution failures', async () => {
      const error = failure(await invoker.invoke(registeredTool('Orders', 'get'), ['t1', 7]));

      expect(error).toBeInstanceOf(ExecutionFailureError);
      expect(error.code).toBe(-32000);
      expect(error.message).toBe('Order 7 not found');
      expect(error.details).toMatchObject({ status: 404 });
    });

    it('should report argument errors as invalid params', async () => {
      const error = failure(await invoker.invoke(registeredTool('Calc', 'divide'), [1, 0]));

      expect(error).toBeInstanceOf(InvalidParamsError);
      expect(error.message).toBe('divisor must not be zero');
      expect(error.details).toEqual({ toolName: 'Calc_divide', path: 'divisor' });
    });

    it('should report other exceptions as internal errors', async () => {
      const error = failure(await invoker.invoke(registeredTool('Greeting', 'fail'), []));

      expect(error).toBeInstanceOf(InternalError);
      expect(error.message).toBe('Tool execution failed: Greeting_fail');
      expect(error.details).toMatchObject({ toolName: 'Greeting_fail', cause: { message: 'Simulated failure' } });
    });

    it('should report a missing method as an internal error', async () => {
      const error = failure(await invoker.invoke(registeredTool('Calc', 'multiply'), []));

      expect(error.message).toBe("Handler 'Calc' has no method 'multiply'");
      expect(error.code).toBe(-32603);
    });

    it('should report an unregistered handler as an internal error', async () => {
      const error = failure(await invoker.invoke(registeredTool('Weather', 'forecast'), []));

      expect(error.message).toBe("No handler registered for 'Weather'");
    });
  });

  describe('cancellation', () => {
    it('should not call the method when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const calls: string[] = [];
      resolver.register('Probe', () => ({ run: () => calls.push('run') }));

      const error = failure(await invoker.invoke(registeredTool('Probe', 'run'), [], controller.signal));

      expect(error).toBeInstanceOf(RequestCancelledError);
      expect(calls).toEqual([]);
    });

    it('should settle as cancelled when the signal aborts mid-call', async () => {
      const controller = new AbortController();
      const tool = registeredTool('Greeting', 'wait', {
        parameters: [{ name: 'milliseconds', type: t.int32() }, { name: 'signal', type: t.signal() }],
      });

      const pending = invoker.invoke(tool, [60_000, controller.signal], controller.signal);
      controller.abort();
      const error = failure(await pending);

      expect(error.code).toBe(-32800);
      expect(error.message).toBe('Request cancelled: Greeting_wait');
    });
  });

  describe('scopes', () => {
    it('should dispose the scope after the call', async () => {
      const events: string[] = [];
      resolver.register('Probe', () => ({
        run: () => events.push('run'),
        dispose: () => {
          events.push('dispose');
        },
      }));

      await invoker.invoke(registeredTool('Probe', 'run'), []);

      expect(events).toEqual(['run', 'dispose']);
    });

    it('should log disposal failures without failing the call', async () => {
      resolver.register('Probe', () => ({
        run: () => 'done',
        dispose: () => {
          throw new Error('close failed');
        },
      }));

      const result = await invoker.invoke(registeredTool('Probe', 'run'), []);

      expect(resultText(result)).toBe('"done"');
      expect(logger.warn).toHaveBeenCalledWith(
        'Failed to dispose handler scope',
        expect.objectContaining({ toolName: 'Probe_run' })
      );
    });
  });
});

describe('classifyInvocationError', () => {
  it('should pass protocol errors through', () => {
    const error = new ToolNotFoundError('X');

    expect(classifyInvocationError(error, 'X')).toBe(error);
  });

  it('should join zod issues into the message', () => {
    const parsed = z.object({ email: z.string() }).safeParse({ email: 5 });
    if (parsed.success) throw new Error('Expected validation to fail');

    const error = classifyInvocationError(parsed.error, 'Users_Create');

    expect(error).toBeInstanceOf(InvalidParamsError);
    expect(error.message).toBe('email: Expected string, received number');
    expect(error.details).toEqual({ toolName: 'Users_Create' });
  });

  it('should recognize validation errors by name', () => {
    const error = new Error('quantity must be positive');
    error.name = 'ValidationError';

    expect(isParameterError(error)).toBe(true);
    expect(isParameterError(new ArgumentError('bad'))).toBe(true);
    expect(isParameterError(new TypeError('bad'))).toBe(false);
  });
});

describe('wrapPayload', () => {
  it('should serialize undefined as null', () => {
    expect(wrapPayload(undefined)).toEqual({ content: [{ type: 'text', text: 'null' }] });
  });
});

describe('unwrapResult', () => {
  it('should return plain values unchanged', () => {
    const value = { a: 1 };

    expect(unwrapResult(value)).toBe(value);
  });

  it('should use a default message for failures without one', () => {
    expect(() => unwrapResult(Results.status(503))).toThrow('Operation failed with status 503');
  });

  it('should return the payload of successful envelopes', () => {
    expect(unwrapResult(Results.ok([1, 2]))).toEqual([1, 2]);
    expect(unwrapResult(new ActionResult(204))).toBeNull();
  });
});
