/**
 * Event handlers: side effects, read-model projection and compensation.
 *
 * @module application/handlers/eventHandlers
 */

import type { Allocated, Deallocated, OutOfStock } from '../../domain/events/events';
import { Allocate } from '../commands/commands';
import type { HandlerDefinition } from '../cqrs/IHandler';
import { allocate } from './commandHandlers';
import type { AppDependencies } from './dependencies';

export const OUT_OF_STOCK_DESTINATION = 'stock@made.com';
export const LINE_ALLOCATED_CHANNEL = 'line_allocated';

export const sendOutOfStockNotification: HandlerDefinition<OutOfStock, AppDependencies, 'notifications'> = {
  name: 'sendOutOfStockNotification',
  inject: ['notifications'],
  async handle(event, { notifications }) {
    await notifications.send(OUT_OF_STOCK_DESTINATION, `Out of stock for ${event.payload.sku}`);
  },
};

export const publishAllocatedEvent: HandlerDefinition<Allocated, AppDependencies, 'publish'> = {
  name: 'publishAllocatedEvent',
  inject: ['publish'],
  async handle(event, { publish }) {
    await publish.publish(LINE_ALLOCATED_CHANNEL, event);
  },
};

// Projector handlers write the view in their own transaction, so the view
// trails the write model until they have run.

export const addAllocationToReadModel: HandlerDefinition<Allocated, AppDependencies, 'uow'> = {
  name: 'addAllocationToReadModel',
  inject: ['uow'],
  async handle(event, { uow }) {
    const { orderid, sku, batchref } = event.payload;
    await uow.executeInTransaction(async (unitOfWork) => {
      await unitOfWork.allocationsView.upsert({ orderid, sku, batchref });
      await unitOfWork.commit();
    });
  },
};

export const removeAllocationFromReadModel: HandlerDefinition<Deallocated, AppDependencies, 'uow'> = {
  name: 'removeAllocationFromReadModel',
  inject: ['uow'],
  async handle(event, { uow }) {
    const { orderid, sku } = event.payload;
    await uow.executeInTransaction(async (unitOfWork) => {
      await unitOfWork.allocationsView.remove(orderid, sku);
      await unitOfWork.commit();
    });
  },
};

/**
 * Give a deallocated line another batch by running the allocate command
 * handler for it.
 */
export const reallocate: HandlerDefinition<Deallocated, AppDependencies, 'uow'> = {
  name: 'reallocate',
  inject: ['uow'],
  async handle(event, dependencies) {
    const { orderid, sku, qty } = event.payload;
    await allocate.handle(new Allocate(orderid, sku, qty), dependencies);
  },
};
