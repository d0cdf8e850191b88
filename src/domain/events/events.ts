/**
 * Allocation domain events.
 *
 * @module domain/events/events
 */

import { DomainEvent } from './IDomainEvent';

export interface AllocatedPayload {
  orderid: string;
  sku: string;
  qty: number;
  batchref: string;
}

export interface DeallocatedPayload {
  orderid: string;
  sku: string;
  qty: number;
}

export interface OutOfStockPayload {
  sku: string;
}

/**
 * An order line was allocated to a batch.
 */
export class Allocated extends DomainEvent<AllocatedPayload> {}

/**
 * An order line lost its batch (e.g. the batch quantity was reduced).
 */
export class Deallocated extends DomainEvent<DeallocatedPayload> {}

/**
 * No batch of the SKU could take the requested order line.
 */
export class OutOfStock extends DomainEvent<OutOfStockPayload> {}
