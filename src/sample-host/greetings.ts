/**
 * Greeting sample controller: optional parameters, async results and failures
 */

import { t } from '../host-types.js';
import type { ControllerDescriptor } from '../controller-source.js';

export class GreetingController {
  constructor(private clock: () => Date = () => new Date()) {}

  greet(name: string, title?: string): string {
    return title ? `Hello, ${title} ${name}!` : `Hello, ${name}!`;
  }

  async getServerTime(): Promise<string> {
    await Promise.resolve();
    return this.clock().toISOString();
  }

  async wait(milliseconds: number, signal: AbortSignal): Promise<string> {
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(resolve, milliseconds);
      signal.addEventListener('abort', () => {
        clearTimeout(timer);
        reject(signal.reason);
      }, { once: true });
    });
    return `Waited ${milliseconds} ms`;
  }

  fail(): never {
    throw new Error('Simulated failure');
  }
}

export const greetingController: ControllerDescriptor = {
  name: 'GreetingController',
  route: 'api/greetings',
  actions: [
    {
      method: 'greet',
      name: 'Greet',
      description: 'Greets a person, optionally with a title',
      httpMethod: 'GET',
      parameters: [
        { name: 'name', type: t.string(), description: 'Name of the person' },
        { name: 'title', type: t.string({ nullable: true }), optional: true },
      ],
    },
    {
      method: 'getServerTime',
      name: 'GetServerTime',
      description: 'Current server time (ISO 8601)',
      httpMethod: 'GET',
      route: 'time',
    },
    {
      method: 'wait',
      name: 'Wait',
      description: 'Completes after a delay; cancelled when the client goes away',
      httpMethod: 'POST',
      route: 'wait',
      parameters: [
        { name: 'milliseconds', type: t.int32(), optional: true, default: 100 },
        { name: 'signal', type: t.signal() },
      ],
    },
    {
      method: 'fail',
      name: 'TestError',
      description: 'Always fails',
      httpMethod: 'POST',
      route: 'fail',
    },
  ],
};
