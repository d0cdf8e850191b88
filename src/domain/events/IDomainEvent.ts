/**
 * allocation-core - Message and Domain Event Abstractions
 *
 * Defines the message hierarchy shared by the write side and the message bus.
 * A message is either a Command (an intent addressed to exactly one handler)
 * or a Domain Event (a fact broadcast to zero or more handlers). The two are
 * told apart by the `kind` discriminant.
 *
 * @module domain/events/IDomainEvent
 * @see {@link https://martinfowler.com/eaaDev/DomainEvent.html | Domain Event Pattern}
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Discriminant carried by every message.
 */
export type MessageKind = 'command' | 'event';

/**
 * Metadata attached to every message instance.
 *
 * @example
 * ```typescript
 * const metadata: MessageMetadata = {
 *   messageId: '550e8400-e29b-41d4-a716-446655440000',
 *   messageType: 'Allocated',
 *   occurredAt: '2024-01-15T10:30:00.000Z',
 * };
 * ```
 */
export interface MessageMetadata {
  /**
   * Unique identifier of this message instance (UUID v4).
   */
  messageId: string;

  /**
   * Concrete message type name (e.g. 'Allocate', 'OutOfStock').
   * Used for logging and for wire serialization.
   */
  messageType: string;

  /**
   * ISO 8601 timestamp of when the message was created.
   */
  occurredAt: string;
}

/**
 * Root of the message hierarchy.
 *
 * @remarks
 * Messages are immutable records: subclasses expose only `readonly` fields
 * and never mutate them after construction.
 */
export abstract class MessageBase {
  /**
   * Discriminates commands from events.
   */
  abstract readonly kind: MessageKind;

  /**
   * Identity and timing information for this message.
   */
  readonly metadata: MessageMetadata;

  protected constructor() {
    this.metadata = {
      messageId: uuidv4(),
      messageType: new.target.name,
      occurredAt: new Date().toISOString(),
    };
  }
}

/**
 * Constructor type of a concrete message class.
 *
 * Handler registries are keyed by these constructors, so the bus resolves
 * handlers by the message's concrete class rather than by a string name.
 *
 * @template T - The message type produced by the constructor
 */
export type MessageType<T extends MessageBase = MessageBase> = new (...args: never[]) => T;

/**
 * IDomainEvent - A fact that already happened inside the domain.
 *
 * @template TPayload - Shape of the event data
 */
export interface IDomainEvent<TPayload extends object = object> {
  readonly kind: 'event';
  readonly metadata: MessageMetadata;
  readonly payload: Readonly<TPayload>;
}

/**
 * Base class for domain events.
 *
 * @template TPayload - Shape of the event data
 *
 * @example
 * ```typescript
 * interface OutOfStockPayload {
 *   sku: string;
 * }
 *
 * class OutOfStock extends DomainEvent<OutOfStockPayload> {}
 *
 * const event = new OutOfStock({ sku: 'RED-CHAIR' });
 * event.metadata.messageType; // 'OutOfStock'
 * ```
 */
export abstract class DomainEvent<TPayload extends object = object>
  extends MessageBase
  implements IDomainEvent<TPayload>
{
  readonly kind = 'event' as const;

  constructor(public readonly payload: Readonly<TPayload>) {
    super();
  }

  /**
   * Wire form used by publishers: type name plus payload.
   */
  toJSON(): { type: string; messageId: string; occurredAt: string } & Readonly<TPayload> {
    return {
      type: this.metadata.messageType,
      messageId: this.metadata.messageId,
      occurredAt: this.metadata.occurredAt,
      ...this.payload,
    };
  }
}

/**
 * Entity that buffers the domain events it raises.
 */
export interface IEventRaisingEntity {
  /**
   * Events raised and not yet drained.
   */
  readonly domainEvents: readonly DomainEvent[];

  /**
   * Yield and remove pending events, oldest first.
   */
  drainEvents(): Generator<DomainEvent, void, undefined>;
}

/**
 * Aggregate root base class with an owned pending-event buffer.
 *
 * @remarks
 * Events are stored, never published, by the aggregate. The Unit of Work
 * that loaded or created the aggregate is the only party that drains the
 * buffer, after the handler that mutated the aggregate has returned.
 *
 * **Event Lifecycle:**
 * ```
 * 1. Aggregate raises event → stored in the private buffer
 * 2. Handler commits the Unit of Work
 * 3. Message bus asks the Unit of Work for new events
 * 4. Unit of Work drains every aggregate it has seen
 * 5. Drained events are queued on the bus, each exactly once
 * ```
 *
 * @example
 * ```typescript
 * class Product extends AggregateRoot {
 *   allocate(line: OrderLine): string | undefined {
 *     // ...
 *     this.raiseEvent(new Allocated({ ...line, batchref: batch.reference }));
 *     return batch.reference;
 *   }
 * }
 *
 * const events = [...product.drainEvents()];
 * product.domainEvents.length; // 0
 * ```
 */
export abstract class AggregateRoot implements IEventRaisingEntity {
  private pendingEvents: DomainEvent[] = [];

  get domainEvents(): readonly DomainEvent[] {
    return this.pendingEvents;
  }

  protected raiseEvent(event: DomainEvent): void {
    this.pendingEvents.push(event);
  }

  /**
   * Lazily drain the pending-event buffer.
   *
   * Each event is removed from the buffer at the moment it is yielded, so
   * an abandoned iteration leaves the remaining events in place and a
   * finished one leaves the buffer empty.
   */
  *drainEvents(): Generator<DomainEvent, void, undefined> {
    let event = this.pendingEvents.shift();
    while (event !== undefined) {
      yield event;
      event = this.pendingEvents.shift();
    }
  }
}
