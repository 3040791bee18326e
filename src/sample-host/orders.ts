/**
 * Order sample controller: nested, inherited and enum-typed parameters,
 * route parameters and result envelopes
 */

import { defineClass, defineEnum, t } from '../host-types.js';
import { Results, type ActionResult } from '../action-result.js';
import type { ControllerDescriptor } from '../controller-source.js';
import { HTTP_STATUS } from '../constants.js';

export enum Priority {
  Low = 0,
  Normal = 1,
  High = 2,
}

export enum OrderStatus {
  Open = 'open',
  Shipped = 'shipped',
  Cancelled = 'cancelled',
}

export interface Address {
  street: string;
  city: string;
  postalCode?: string;
}

export interface OrderLine {
  sku: string;
  quantity: number;
  unitPrice: number;
}

export class AuditedRequest {
  requestedBy = 'anonymous';
  requestedAt?: Date;
}

export class CreateOrderRequest extends AuditedRequest {
  name = '';
  priority: Priority = Priority.Normal;
  tags: string[] = [];
  lines: OrderLine[] = [];
  shippingAddress?: Address;
}

export interface Order {
  id: number;
  tenant: string;
  name: string;
  priority: Priority;
  status: OrderStatus;
  tags: string[];
  lines: OrderLine[];
  total: number;
  requestedBy: string;
  shippingAddress?: Address;
}

export const PriorityType = defineEnum('Priority', Priority);
export const OrderStatusType = defineEnum('OrderStatus', OrderStatus);

export const AddressType = defineClass('Address', {
  properties: () => [
    { name: 'street', type: t.string(), required: true },
    { name: 'city', type: t.string(), required: true },
    { name: 'postalCode', type: t.string({ nullable: true }) },
  ],
});

export const OrderLineType = defineClass('OrderLine', {
  properties: () => [
    { name: 'sku', type: t.string(), required: true },
    { name: 'quantity', type: t.int32(), required: true },
    { name: 'unitPrice', type: t.decimal(), required: true },
  ],
});

export const AuditedRequestType = defineClass('AuditedRequest', {
  properties: () => [
    { name: 'requestedBy', type: t.string(), description: 'Who placed the request' },
    { name: 'requestedAt', type: t.dateTime({ nullable: true }) },
  ],
  create: () => new AuditedRequest(),
});

export const CreateOrderRequestType = defineClass('CreateOrderRequest', {
  base: AuditedRequestType,
  properties: () => [
    { name: 'name', type: t.string(), required: true, description: 'Order name' },
    { name: 'priority', type: t.enumOf(PriorityType) },
    { name: 'tags', type: t.arrayOf(t.string()) },
    { name: 'lines', type: t.arrayOf(t.object(OrderLineType)) },
    { name: 'shippingAddress', type: t.object(AddressType, { nullable: true }) },
  ],
  create: () => new CreateOrderRequest(),
});

export class OrderController {
  private static nextId = 1;
  private static store = new Map<string, Order>();

  static reset(): void {
    OrderController.nextId = 1;
    OrderController.store.clear();
  }

  create(tenant: string, request: CreateOrderRequest): ActionResult<Order> {
    const order: Order = {
      id: OrderController.nextId++,
      tenant,
      name: request.name,
      priority: request.priority,
      status: OrderStatus.Open,
      tags: request.tags,
      lines: request.lines,
      total: request.lines.reduce((sum, line) => sum + line.quantity * line.unitPrice, 0),
      requestedBy: request.requestedBy,
      shippingAddress: request.shippingAddress,
    };
    OrderController.store.set(`${tenant}/${order.id}`, order);
    return Results.created(order);
  }

  get(tenant: string, id: number): ActionResult<Order> {
    const order = OrderController.store.get(`${tenant}/${id}`);
    return order ? Results.ok(order) : Results.notFound<Order>(undefined, `Order ${id} not found`);
  }

  list(tenant: string, status?: OrderStatus, take = 10): Order[] {
    return [...OrderController.store.values()]
      .filter(order => order.tenant === tenant && (status === undefined || order.status === status))
      .slice(0, take);
  }

  cancel(tenant: string, id: number): ActionResult {
    const order = OrderController.store.get(`${tenant}/${id}`);
    if (!order) {
      return Results.notFound(undefined, `Order ${id} not found`);
    }
    if (order.status !== OrderStatus.Open) {
      return Results.status(HTTP_STATUS.CONFLICT, undefined, `Order ${id} is ${order.status}`);
    }
    order.status = OrderStatus.Cancelled;
    return Results.noContent();
  }
}

export const orderController: ControllerDescriptor = {
  name: 'OrdersController',
  route: 'api/{tenant}/orders',
  actions: [
    {
      method: 'create',
      name: 'Create',
      description: 'Creates an order',
      httpMethod: 'POST',
      parameters: [
        { name: 'tenant', type: t.string() },
        { name: 'request', type: t.object(CreateOrderRequestType) },
      ],
    },
    {
      method: 'get',
      name: 'Get',
      description: 'Fetches an order by id',
      httpMethod: 'GET',
      route: '{id:int}',
      parameters: [
        { name: 'tenant', type: t.string() },
        { name: 'id', type: t.int32() },
      ],
    },
    {
      method: 'list',
      name: 'List',
      description: 'Lists orders of a tenant',
      httpMethod: 'GET',
      parameters: [
        { name: 'tenant', type: t.string() },
        { name: 'status', type: t.enumOf(OrderStatusType, { nullable: true }), optional: true },
        { name: 'take', type: t.int32(), optional: true, default: 10 },
      ],
    },
    {
      method: 'cancel',
      name: 'Cancel',
      description: 'Cancels an open order',
      httpMethod: 'DELETE',
      route: '{id:int}',
      parameters: [
        { name: 'tenant', type: t.string() },
        { name: 'id', type: t.int32() },
      ],
    },
  ],
};
