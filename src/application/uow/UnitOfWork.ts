/**
 * allocation-core - Unit of Work implementation
 *
 * Backend-agnostic: the storage backend is whatever the injected
 * `SessionFactory` produces.
 *
 * @module application/uow/UnitOfWork
 */

import { v4 as uuidv4 } from 'uuid';

import type { DomainEvent } from '../../domain/events/IDomainEvent';
import { TransactionError } from '../../domain/exceptions/exceptions';
import {
  type IAllocationsViewStore,
  type IProductRepository,
  TrackingProductRepository,
} from '../../domain/repository/IRepository';
import {
  type IsolationLevel,
  type IUnitOfWork,
  type SessionFactory,
  type StorageSession,
  type TransactionResult,
  TransactionState,
} from '../../domain/repository/IUnitOfWork';
import type { ILogger } from '../ports';

export class UnitOfWork implements IUnitOfWork {
  readonly id: string = uuidv4();

  private _state: TransactionState = TransactionState.Inactive;
  private session: StorageSession | undefined;
  private repository: TrackingProductRepository | undefined;
  private startedAt = 0;

  constructor(
    private readonly sessionFactory: SessionFactory,
    private readonly logger: ILogger,
  ) {}

  get state(): TransactionState {
    return this._state;
  }

  get isolationLevel(): IsolationLevel | undefined {
    return this.session?.isolationLevel;
  }

  get products(): IProductRepository {
    if (!this.session || !this.repository) {
      throw new TransactionError('No open session: call start() first');
    }
    return this.repository;
  }

  get allocationsView(): IAllocationsViewStore {
    return this.requireSession().allocationsView;
  }

  async start(): Promise<void> {
    if (this.session) {
      return;
    }
    const session = this.sessionFactory();
    await session.begin();
    this.session = session;
    this.repository = new TrackingProductRepository(session.products);
    this.startedAt = Date.now();
    this._state = TransactionState.Active;
    this.logger.debug('Unit of work started', {
      uowId: this.id,
      isolationLevel: session.isolationLevel,
    });
  }

  async commit(): Promise<TransactionResult> {
    const session = this.requireSession();
    if (this._state !== TransactionState.Active || !this.repository) {
      throw new TransactionError('No active transaction');
    }

    this._state = TransactionState.Committing;
    try {
      const seen = this.repository.seen;
      for (const product of seen) {
        await session.products.save(product);
      }
      await session.commit();
      this._state = TransactionState.Committed;

      const duration = Date.now() - this.startedAt;
      this.logger.debug('Unit of work committed', {
        uowId: this.id,
        duration,
        affectedCount: seen.length,
      });
      return { success: true, duration, affectedCount: seen.length };
    } catch (error) {
      this._state = TransactionState.Failed;
      try {
        await session.rollback();
      } finally {
        this.discardNewEvents();
      }
      throw error;
    }
  }

  async rollback(): Promise<TransactionResult> {
    const duration = Date.now() - this.startedAt;
    if (!this.session || this._state !== TransactionState.Active) {
      return { success: true, duration: 0 };
    }

    this._state = TransactionState.RollingBack;
    try {
      await this.session.rollback();
    } finally {
      this.discardNewEvents();
    }
    this._state = TransactionState.RolledBack;
    this.logger.debug('Unit of work rolled back', { uowId: this.id, duration });
    return { success: true, duration };
  }

  async dispose(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    try {
      await this.rollback();
    } finally {
      this.session = undefined;
      await session.close();
      if (this._state === TransactionState.RollingBack) {
        this._state = TransactionState.Failed;
      }
    }
  }

  async executeInTransaction<TResult>(
    callback: (unitOfWork: IUnitOfWork) => Promise<TResult>,
  ): Promise<TResult> {
    await this.start();
    try {
      return await callback(this);
    } finally {
      await this.dispose();
    }
  }

  *collectNewEvents(): Generator<DomainEvent, void, undefined> {
    if (!this.repository) {
      return;
    }
    for (const product of this.repository.seen) {
      yield* product.drainEvents();
    }
  }

  /**
   * Drop the events of a transaction that did not commit.
   */
  private discardNewEvents(): void {
    for (const event of this.collectNewEvents()) {
      this.logger.debug('Discarding event of rolled back transaction', {
        uowId: this.id,
        eventType: event.metadata.messageType,
      });
    }
  }

  private requireSession(): StorageSession {
    if (!this.session) {
      throw new TransactionError('No open session: call start() first');
    }
    return this.session;
  }
}
