/**
 * @module application/handlers
 * @description Allocation handlers and their registries
 */

import { Allocated, Deallocated, OutOfStock } from '../../domain/events/events';
import { Allocate, ChangeBatchQuantity, CreateBatch } from '../commands/commands';
import { type HandlerRegistries, onCommand, onEvent } from '../cqrs/IHandler';
import { addBatch, allocate, changeBatchQuantity } from './commandHandlers';
import type { AppDependencies } from './dependencies';
import {
  addAllocationToReadModel,
  publishAllocatedEvent,
  reallocate,
  removeAllocationFromReadModel,
  sendOutOfStockNotification,
} from './eventHandlers';

export * from './commandHandlers';
export * from './eventHandlers';
export type { AppDependencies } from './dependencies';

/**
 * The allocation service's handler registries.
 *
 * Event handlers of the same event run in the order listed here.
 */
export function createHandlerRegistries(): HandlerRegistries<AppDependencies> {
  return {
    commands: [
      onCommand(CreateBatch, addBatch),
      onCommand(Allocate, allocate),
      onCommand(ChangeBatchQuantity, changeBatchQuantity),
    ],
    events: [
      onEvent(Allocated, publishAllocatedEvent),
      onEvent(Allocated, addAllocationToReadModel),
      onEvent(Deallocated, removeAllocationFromReadModel),
      onEvent(Deallocated, reallocate),
      onEvent(OutOfStock, sendOutOfStockNotification),
    ],
  };
}
