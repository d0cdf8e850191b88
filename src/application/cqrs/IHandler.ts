/**
 * allocation-core - Message handler definitions and registrations
 *
 * A handler is declared as a plain definition: a name, the list of
 * capabilities it needs from the dependency registry, and a `handle`
 * function. Registering it for a message class with `onCommand` or
 * `onEvent` produces a registration the message bus binds once, at
 * construction, by resolving the declared capabilities and partially
 * applying them. No parameter-name reflection is involved.
 *
 * @module application/cqrs/IHandler
 */

import type { DependencyRegistry } from '../di/IDependencyInjection';
import type {
  DomainEvent,
  MessageKind,
  MessageType,
} from '../../domain/events/IDomainEvent';
import type { CommandBase } from './ICommand';

/**
 * Anything the message bus dispatches.
 */
export type Message = CommandBase | DomainEvent;

/**
 * A handler with its dependencies already applied.
 */
export type BoundHandler = (message: Message) => Promise<void>;

/**
 * Handler declaration.
 *
 * @template TMessage - The message class this handler accepts
 * @template TDeps - The dependency registry shape
 * @template TKey - Capability names this handler asks for
 *
 * @example
 * ```typescript
 * const sendOutOfStockNotification: HandlerDefinition<OutOfStock, AppDependencies, 'notifications'> = {
 *   name: 'sendOutOfStockNotification',
 *   inject: ['notifications'],
 *   async handle(event, { notifications }) {
 *     await notifications.send('stock@made.com', `Out of stock for ${event.payload.sku}`);
 *   },
 * };
 * ```
 */
export interface HandlerDefinition<
  TMessage extends Message,
  TDeps extends object,
  TKey extends keyof TDeps = never,
> {
  /**
   * Handler identity used in logs and configuration errors.
   */
  readonly name: string;

  /**
   * Names of the registry entries this handler receives. Only these
   * entries are passed; other registered capabilities are not.
   */
  readonly inject: readonly TKey[];

  handle(message: TMessage, dependencies: Pick<TDeps, TKey>): Promise<void>;
}

/**
 * A handler definition attached to a message class.
 */
export interface HandlerRegistration<TDeps extends object> {
  readonly kind: MessageKind;
  readonly messageType: MessageType;
  readonly handlerName: string;

  /**
   * Resolve the declared dependencies once and return the applied handler.
   *
   * @throws {DependencyResolutionError} If a declared name is not registered
   */
  bind(registry: DependencyRegistry<TDeps>): BoundHandler;
}

/**
 * Both handler registries, built once at the composition root and passed to
 * the message bus constructor.
 */
export interface HandlerRegistries<TDeps extends object> {
  /**
   * One registration per command class.
   */
  readonly commands: readonly HandlerRegistration<TDeps>[];

  /**
   * Event registrations; handlers of the same event run in this order.
   */
  readonly events: readonly HandlerRegistration<TDeps>[];
}

/**
 * Handler wiring error: a command with no handler, a command with several,
 * or a handler invoked with a message of the wrong class.
 */
export class HandlerConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerConfigurationError';
    Object.setPrototypeOf(this, HandlerConfigurationError.prototype);
  }
}

function register<TDeps extends object, TMessage extends Message, TKey extends keyof TDeps>(
  kind: MessageKind,
  messageType: MessageType<TMessage>,
  definition: HandlerDefinition<TMessage, TDeps, TKey>,
): HandlerRegistration<TDeps> {
  return {
    kind,
    messageType,
    handlerName: definition.name,
    bind(registry: DependencyRegistry<TDeps>): BoundHandler {
      const dependencies = registry.resolve(definition.inject, definition.name);
      return async (message: Message): Promise<void> => {
        if (!(message instanceof messageType)) {
          throw new HandlerConfigurationError(
            `Handler '${definition.name}' cannot handle ${message.metadata.messageType}`,
          );
        }
        await definition.handle(message, dependencies);
      };
    },
  };
}

/**
 * Register the single handler of a command class.
 *
 * @example
 * ```typescript
 * const registries: HandlerRegistries<AppDependencies> = {
 *   commands: [onCommand(Allocate, allocate), onCommand(CreateBatch, addBatch)],
 *   events: [onEvent(OutOfStock, sendOutOfStockNotification)],
 * };
 * ```
 */
export function onCommand<TDeps extends object, TCommand extends CommandBase, TKey extends keyof TDeps>(
  commandType: MessageType<TCommand>,
  definition: HandlerDefinition<TCommand, TDeps, TKey>,
): HandlerRegistration<TDeps> {
  return register('command', commandType, definition);
}

/**
 * Register one more handler of an event class.
 */
export function onEvent<TDeps extends object, TEvent extends DomainEvent, TKey extends keyof TDeps>(
  eventType: MessageType<TEvent>,
  definition: HandlerDefinition<TEvent, TDeps, TKey>,
): HandlerRegistration<TDeps> {
  return register('event', eventType, definition);
}
