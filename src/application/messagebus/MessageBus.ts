/**
 * allocation-core - Message Bus
 *
 * In-process dispatcher for commands and domain events. One `handle` call
 * drains a FIFO queue seeded with the given messages; every event raised by
 * a handler is appended to the end of that queue, so transitive events are
 * handled within the same call.
 *
 * @module application/messagebus/MessageBus
 */

import { MessageBase } from '../../domain/events/IDomainEvent';
import type { DomainEvent } from '../../domain/events/IDomainEvent';
import type { IUnitOfWork } from '../../domain/repository/IUnitOfWork';
import type { CommandBase } from '../cqrs/ICommand';
import {
  type BoundHandler,
  HandlerConfigurationError,
  type HandlerRegistries,
  type Message,
} from '../cqrs/IHandler';
import type { DependencyRegistry } from '../di/IDependencyInjection';
import type { ICloseable, ILogger } from '../ports';

/**
 * Capabilities every bus registry carries.
 */
export interface BusDependencies {
  uow: IUnitOfWork;
}

export interface MessageBusOptions<TDeps extends BusDependencies> {
  /**
   * Frozen capability registry. Its `uow` entry is the bus's Unit of Work.
   */
  dependencies: DependencyRegistry<TDeps>;
  handlers: HandlerRegistries<TDeps>;
  logger: ILogger;

  /**
   * Adapters owned by the bus, closed in order by `close()`.
   */
  resources?: readonly ICloseable[];
}

interface NamedHandler {
  readonly name: string;
  readonly invoke: BoundHandler;
}

/**
 * Message bus.
 *
 * @remarks
 * - A command has exactly one handler. Its failure aborts the whole
 *   `handle` call and reaches the caller unchanged.
 * - An event has zero or more handlers, run in registration order. A
 *   failing event handler is logged and skipped.
 * - Handlers are awaited one at a time, never concurrently.
 *
 * Not safe for concurrent `handle` calls: the bus shares one Unit of Work
 * across all handlers. Build one bus per concurrent caller.
 *
 * @example
 * ```typescript
 * const bus = bootstrap({ startStorage: false, sessionFactory, notifications, publish });
 *
 * await bus.handle([
 *   new CreateBatch('b1', 'SKU1', 50),
 *   new Allocate('o1', 'SKU1', 20),
 * ]);
 * ```
 */
export class MessageBus<TDeps extends BusDependencies> {
  readonly uow: IUnitOfWork;

  private readonly commandHandlers = new Map<unknown, NamedHandler>();
  private readonly eventHandlers = new Map<unknown, NamedHandler[]>();
  private readonly logger: ILogger;
  private readonly resources: readonly ICloseable[];

  /**
   * @throws {HandlerConfigurationError} If a command class has more than one
   *   handler or a registration is filed under the wrong kind
   * @throws {DependencyResolutionError} If a handler declares a capability
   *   the registry lacks
   */
  constructor(options: MessageBusOptions<TDeps>) {
    this.logger = options.logger;
    this.resources = options.resources ?? [];
    this.uow = options.dependencies.get('uow');

    for (const registration of options.handlers.commands) {
      if (registration.kind !== 'command') {
        throw new HandlerConfigurationError(
          `Handler '${registration.handlerName}' is registered for an event as a command handler`,
        );
      }
      const existing = this.commandHandlers.get(registration.messageType);
      if (existing) {
        throw new HandlerConfigurationError(
          `Command ${registration.messageType.name} has more than one handler: ` +
            `'${existing.name}', '${registration.handlerName}'`,
        );
      }
      this.commandHandlers.set(registration.messageType, {
        name: registration.handlerName,
        invoke: registration.bind(options.dependencies),
      });
    }

    for (const registration of options.handlers.events) {
      if (registration.kind !== 'event') {
        throw new HandlerConfigurationError(
          `Handler '${registration.handlerName}' is registered for a command as an event handler`,
        );
      }
      const handlers = this.eventHandlers.get(registration.messageType) ?? [];
      handlers.push({
        name: registration.handlerName,
        invoke: registration.bind(options.dependencies),
      });
      this.eventHandlers.set(registration.messageType, handlers);
    }
  }

  /**
   * Dispatch one message, or several in order, and every event they cause.
   *
   * @throws {HandlerConfigurationError} If a command has no handler
   * @throws Any error raised by a command handler
   */
  async handle(messages: Message | readonly Message[]): Promise<void> {
    const queue: Message[] = messages instanceof MessageBase ? [messages] : [...messages];

    let message = queue.shift();
    while (message !== undefined) {
      this.logger.debug(`Handling ${message.kind}`, {
        messageType: message.metadata.messageType,
        messageId: message.metadata.messageId,
      });

      if (message.kind === 'command') {
        await this.handleCommand(message, queue);
      } else {
        await this.handleEvent(message, queue);
      }
      message = queue.shift();
    }
  }

  /**
   * Release the Unit of Work and close every owned adapter. Each adapter is
   * closed even if an earlier one fails; the first failure is rethrown.
   */
  async close(): Promise<void> {
    await this.uow.dispose();

    const failures: unknown[] = [];
    for (const resource of this.resources) {
      try {
        await resource.close();
      } catch (error) {
        this.logger.error('Failed to close resource', error);
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private async handleCommand(command: CommandBase, queue: Message[]): Promise<void> {
    const handler = this.commandHandlers.get(command.constructor);
    if (!handler) {
      throw new HandlerConfigurationError(
        `No handler registered for command ${command.metadata.messageType}`,
      );
    }

    try {
      await handler.invoke(command);
    } catch (error) {
      this.logger.error('Exception handling command', error, {
        commandType: command.metadata.messageType,
        commandId: command.metadata.messageId,
        handler: handler.name,
      });
      throw error;
    }
    queue.push(...this.uow.collectNewEvents());
  }

  private async handleEvent(event: DomainEvent, queue: Message[]): Promise<void> {
    const handlers = this.eventHandlers.get(event.constructor) ?? [];

    for (const handler of handlers) {
      try {
        await handler.invoke(event);
      } catch (error) {
        this.logger.error('Exception handling event', error, {
          eventType: event.metadata.messageType,
          eventId: event.metadata.messageId,
          payload: event.payload,
          handler: handler.name,
        });
        continue;
      }
      queue.push(...this.uow.collectNewEvents());
    }
  }
}
