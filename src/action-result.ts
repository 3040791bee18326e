/**
 * Result envelopes returned by host methods that report an HTTP-style status
 * alongside their payload. The invoker unwraps them: statuses below 400 yield
 * the payload, the rest become execution failures.
 */

import { HTTP_STATUS } from './constants.js';

export class ActionResult<T = unknown> {
  constructor(
    readonly status: number,
    readonly value?: T,
    readonly message?: string
  ) {}

  get isFailure(): boolean {
    return this.status >= HTTP_STATUS.BAD_REQUEST;
  }
}

export function isActionResult(value: unknown): value is ActionResult {
  return value instanceof ActionResult;
}

export const Results = {
  ok<T>(value?: T): ActionResult<T> {
    return new ActionResult(HTTP_STATUS.OK, value);
  },

  created<T>(value?: T): ActionResult<T> {
    return new ActionResult(HTTP_STATUS.CREATED, value);
  },

  noContent(): ActionResult<never> {
    return new ActionResult<never>(HTTP_STATUS.NO_CONTENT);
  },

  badRequest<T>(value?: T, message = 'Bad request'): ActionResult<T> {
    return new ActionResult(HTTP_STATUS.BAD_REQUEST, value, message);
  },

  notFound<T>(value?: T, message = 'Not found'): ActionResult<T> {
    return new ActionResult(HTTP_STATUS.NOT_FOUND, value, message);
  },

  status<T>(status: number, value?: T, message?: string): ActionResult<T> {
    return new ActionResult(status, value, message);
  },
};
