/**
 * Sample host: controllers and the resolver that serves them
 */

import { ServiceHandlerResolver } from '../handler-resolver.js';
import type { ControllerDescriptor } from '../controller-source.js';
import { CalcController, calcController } from './calculator.js';
import { GreetingController, greetingController } from './greetings.js';
import { OrderController, orderController } from './orders.js';
import { CatalogController, catalogController } from './catalog.js';

export const sampleControllers: readonly ControllerDescriptor[] = [
  calcController,
  greetingController,
  orderController,
  catalogController,
];

export function createSampleResolver(): ServiceHandlerResolver {
  return new ServiceHandlerResolver()
    .register('CalcController', () => new CalcController())
    .registerStatic('CalcController', CalcController)
    .register('GreetingController', () => new GreetingController())
    .register('OrdersController', () => new OrderController())
    .register('CatalogController', () => new CatalogController(), 'singleton');
}

export { CalcController, GreetingController, OrderController, CatalogController };
