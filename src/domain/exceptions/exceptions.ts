/**
 * allocation-core - Domain and persistence exceptions
 *
 * Business-rule violations raised by command handlers and storage failures
 * raised by the Unit of Work. These propagate to the caller of
 * `MessageBus.handle` when they occur in a command handler and are logged
 * and swallowed when they occur in an event handler.
 */

/**
 * Base class for errors raised by the allocation domain.
 *
 * @example
 * ```typescript
 * try {
 *   await bus.handle(new Allocate('order-1', 'NONEXISTENT', 10));
 * } catch (error) {
 *   if (error instanceof DomainException) {
 *     // map to a 4xx response in the entrypoint
 *   }
 * }
 * ```
 */
export class DomainException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DomainException';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A command referenced a SKU that has no product.
 */
export class InvalidSku extends DomainException {
  constructor(public readonly sku: string) {
    super(`Invalid sku ${sku}`);
    this.name = 'InvalidSku';
  }
}

/**
 * Optimistic concurrency check failed: the aggregate changed in storage
 * after it was loaded by this session.
 */
export class ConcurrencyError extends Error {
  constructor(
    public readonly aggregateId: string,
    public readonly expectedVersion: number,
  ) {
    super(
      `Concurrent modification of ${aggregateId}: expected stored version ${expectedVersion}`,
    );
    this.name = 'ConcurrencyError';
    Object.setPrototypeOf(this, ConcurrencyError.prototype);
  }
}

/**
 * Unit of Work misuse, e.g. committing with no active transaction.
 */
export class TransactionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransactionError';
    Object.setPrototypeOf(this, TransactionError.prototype);
  }
}

/**
 * A command referenced a batch reference that no product holds.
 */
export class InvalidBatchReference extends DomainException {
  constructor(public readonly reference: string) {
    super(`Invalid batch reference ${reference}`);
    this.name = 'InvalidBatchReference';
  }
}
