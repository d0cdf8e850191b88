/**
 * allocation-core - CQRS Command Interface
 *
 * Commands represent intentions to modify the system state. Each command
 * type is handled by exactly one handler registered on the message bus.
 *
 * @module application/cqrs/ICommand
 * @see {@link https://martinfowler.com/bliki/CQRS.html | CQRS Pattern}
 */

import { MessageBase, type MessageMetadata } from '../../domain/events/IDomainEvent';

/**
 * ICommand - Marker interface for CQRS commands.
 *
 * @remarks
 * Commands should be:
 * - **Immutable**: Once created, command data does not change
 * - **Task-based**: Named with imperative verbs (Allocate, CreateBatch)
 * - **Result-free**: Handling a command yields no value to the caller;
 *   results are read back through queries against the read model
 */
export interface ICommand {
  readonly kind: 'command';
  readonly metadata: MessageMetadata;
}

/**
 * Abstract base class for commands with metadata support.
 *
 * @example
 * ```typescript
 * class Allocate extends CommandBase {
 *   constructor(
 *     readonly orderid: string,
 *     readonly sku: string,
 *     readonly qty: number,
 *   ) {
 *     super();
 *   }
 * }
 *
 * const command = new Allocate('order-1', 'RED-CHAIR', 3);
 * command.metadata.messageType; // 'Allocate'
 * ```
 */
export abstract class CommandBase extends MessageBase implements ICommand {
  readonly kind = 'command' as const;

  protected constructor() {
    super();
  }
}
