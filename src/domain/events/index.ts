/**
 * @module domain/events
 * @description Message hierarchy and allocation domain events
 */

// ============================================================================
// Core Abstractions
// ============================================================================

export { AggregateRoot, DomainEvent, MessageBase } from './IDomainEvent';
export type {
  IDomainEvent,
  IEventRaisingEntity,
  MessageKind,
  MessageMetadata,
  MessageType,
} from './IDomainEvent';

// ============================================================================
// Allocation Events
// ============================================================================

export { Allocated, Deallocated, OutOfStock } from './events';
export type { AllocatedPayload, DeallocatedPayload, OutOfStockPayload } from './events';
