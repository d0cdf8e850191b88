/**
 * allocation-core - Unit of Work Interface
 *
 * Transaction management abstraction: one Unit of Work wraps one storage
 * session, owns the aggregates touched during the transaction and hands
 * their newly raised domain events to the message bus.
 *
 * @module domain/repository/IUnitOfWork
 * @see {@link https://martinfowler.com/eaaCatalog/unitOfWork.html | Unit of Work Pattern}
 */

import type { DomainEvent } from '../events/IDomainEvent';
import type {
  IAllocationsViewStore,
  IProductRepository,
  IProductStore,
} from './IRepository';

/**
 * Transaction isolation levels a storage session may run at.
 *
 * @remarks
 * The Unit of Work does not hide the level of the underlying backend.
 * Production SQLite sessions are serializable; the in-memory test backend
 * is weaker, and tests must not depend on stronger guarantees than it gives.
 */
export enum IsolationLevel {
  /**
   * Allows dirty reads, non-repeatable reads, and phantom reads.
   */
  ReadUncommitted = 'READ_UNCOMMITTED',

  /**
   * Prevents dirty reads but allows non-repeatable reads and phantom reads.
   */
  ReadCommitted = 'READ_COMMITTED',

  /**
   * Prevents dirty reads and non-repeatable reads but allows phantom reads.
   */
  RepeatableRead = 'REPEATABLE_READ',

  /**
   * Highest isolation level. Prevents all phenomena, including write skew
   * between concurrent allocations.
   */
  Serializable = 'SERIALIZABLE',
}

/**
 * Transaction state enumeration.
 *
 * Represents the current state of a Unit of Work transaction lifecycle.
 */
export enum TransactionState {
  /** No transaction has been started */
  Inactive = 'INACTIVE',
  /** Transaction is active and accepting operations */
  Active = 'ACTIVE',
  /** Transaction is being committed */
  Committing = 'COMMITTING',
  /** Transaction has been committed successfully */
  Committed = 'COMMITTED',
  /** Transaction is being rolled back */
  RollingBack = 'ROLLING_BACK',
  /** Transaction has been rolled back */
  RolledBack = 'ROLLED_BACK',
  /** Transaction encountered an error */
  Failed = 'FAILED',
}

/**
 * Result of a transaction completion (commit or rollback).
 *
 * @example
 * ```typescript
 * const result = await uow.commit();
 * logger.debug('Transaction committed', { duration: result.duration });
 * ```
 */
export interface TransactionResult {
  /**
   * Whether the transaction completed successfully.
   */
  success: boolean;

  /**
   * Duration of the transaction in milliseconds.
   */
  duration: number;

  /**
   * Number of aggregates flushed by a commit.
   */
  affectedCount?: number;
}

/**
 * Storage session boundary implemented by storage adapters.
 *
 * A session is exclusively owned by one Unit of Work for its lifetime and
 * must not be shared between concurrent callers.
 */
export interface StorageSession {
  readonly isolationLevel: IsolationLevel;
  readonly products: IProductStore;
  readonly allocationsView: IAllocationsViewStore;

  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;

  /**
   * Release the session's resources. Called exactly once.
   */
  close(): Promise<void>;
}

/**
 * Constructor of storage sessions, swapped at the composition root
 * (e.g. a file-backed database in production, an in-memory one in tests).
 */
export type SessionFactory = () => StorageSession;

/**
 * IUnitOfWork - Transaction scope plus event collection.
 *
 * @remarks
 * Nothing is ever committed implicitly. `executeInTransaction` guarantees the
 * session is released when the callback settles, rolling back whatever was
 * not explicitly committed.
 *
 * @example
 * ```typescript
 * await uow.executeInTransaction(async (u) => {
 *   const product = await u.products.get('RED-CHAIR');
 *   product?.allocate({ orderid: 'o1', sku: 'RED-CHAIR', qty: 1 });
 *   await u.commit();
 * });
 *
 * for (const event of uow.collectNewEvents()) {
 *   // Allocated { orderid: 'o1', ... }
 * }
 * ```
 */
export interface IUnitOfWork {
  /**
   * Unique identifier for this Unit of Work instance (UUID).
   */
  readonly id: string;

  /**
   * Current state of the transaction.
   */
  readonly state: TransactionState;

  /**
   * Isolation level of the active session, if any.
   */
  readonly isolationLevel: IsolationLevel | undefined;

  /**
   * Product repository bound to the active transaction.
   *
   * @throws {TransactionError} If no session is open
   */
  readonly products: IProductRepository;

  /**
   * Read-model store bound to the active transaction.
   *
   * @throws {TransactionError} If no session is open
   */
  readonly allocationsView: IAllocationsViewStore;

  /**
   * Open a session and begin a transaction. No-op when already active.
   */
  start(): Promise<void>;

  /**
   * Flush every seen aggregate and commit.
   *
   * @throws {TransactionError} If no transaction is active
   */
  commit(): Promise<TransactionResult>;

  /**
   * Roll back the active transaction. Idempotent when none is active.
   */
  rollback(): Promise<TransactionResult>;

  /**
   * Roll back anything uncommitted and release the session, once.
   */
  dispose(): Promise<void>;

  /**
   * Run a callback inside a transaction scope that is always released.
   *
   * @returns The callback result
   * @throws Rethrows any error from the callback after rollback
   */
  executeInTransaction<TResult>(
    callback: (unitOfWork: IUnitOfWork) => Promise<TResult>,
  ): Promise<TResult>;

  /**
   * Lazily drain pending events from every aggregate seen by the most
   * recent transaction. One-shot: events are removed as they are yielded.
   */
  collectNewEvents(): Generator<DomainEvent, void, undefined>;
}
