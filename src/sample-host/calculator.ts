/**
 * Calculator sample controller
 */

import { t } from '../host-types.js';
import { ArgumentError } from '../errors.js';
import type { ControllerDescriptor } from '../controller-source.js';

export class CalcController {
  static readonly VERSION = '1.0.0';

  add(a: number, b: number): number {
    return a + b;
  }

  subtract(a: number, b: number): number {
    return a - b;
  }

  divide(dividend: number, divisor: number): number {
    if (divisor === 0) {
      throw new ArgumentError('divisor must not be zero', 'divisor');
    }
    return dividend / divisor;
  }

  sum(values: number[]): number {
    return values.reduce((total, value) => total + value, 0);
  }

  static getVersion(): string {
    return CalcController.VERSION;
  }
}

export const calcController: ControllerDescriptor = {
  name: 'CalcController',
  route: 'api/[controller]',
  actions: [
    {
      method: 'add',
      name: 'Add',
      description: 'Adds two integers',
      httpMethod: 'GET',
      route: 'add',
      parameters: [
        { name: 'a', type: t.int32(), description: 'First addend' },
        { name: 'b', type: t.int32(), description: 'Second addend' },
      ],
    },
    {
      method: 'subtract',
      name: 'Subtract',
      description: 'Subtracts b from a',
      httpMethod: 'GET',
      route: 'subtract',
      parameters: [
        { name: 'a', type: t.int32() },
        { name: 'b', type: t.int32() },
      ],
    },
    {
      method: 'divide',
      name: 'Divide',
      description: 'Divides two numbers',
      httpMethod: 'GET',
      route: 'divide/{dividend}/{divisor}',
      parameters: [
        { name: 'dividend', type: t.double() },
        { name: 'divisor', type: t.double() },
      ],
    },
    {
      method: 'sum',
      name: 'Sum',
      description: 'Sums a list of numbers',
      httpMethod: 'POST',
      route: 'sum',
      parameters: [{ name: 'values', type: t.arrayOf(t.double()), source: 'body' }],
    },
    {
      method: 'getVersion',
      name: 'GetVersion',
      description: 'Returns the calculator version',
      httpMethod: 'GET',
      route: 'version',
      isStatic: true,
    },
  ],
};
