/**
 * @fileoverview Integration tests for UnitOfWork over SQLite
 *
 * Every test runs against a fresh in-memory database shared by all the
 * sessions of its factory.
 */

import type Database from 'better-sqlite3';

import {
  Allocated,
  Batch,
  createSqliteSessionFactory,
  initializeSchema,
  IsolationLevel,
  openDatabase,
  Product,
  TransactionError,
  TransactionState,
  UnitOfWork,
} from '../../../src';
import { RecordingLogger } from '../../support/fakes';

describe('UnitOfWork (SQLite)', () => {
  let db: Database.Database;
  let logger: RecordingLogger;

  function createUnitOfWork(): UnitOfWork {
    return new UnitOfWork(createSqliteSessionFactory({ database: db }), logger);
  }

  async function seed(sku: string, ...batches: Batch[]): Promise<void> {
    await createUnitOfWork().executeInTransaction(async (uow) => {
      uow.products.add(new Product(sku, batches));
      await uow.commit();
    });
  }

  beforeEach(() => {
    db = openDatabase(':memory:');
    initializeSchema(db);
    logger = new RecordingLogger();
  });

  afterEach(() => {
    db.close();
  });

  // ==========================================================================
  // Transaction Flow
  // ==========================================================================

  describe('Transaction Flow', () => {
    it('should persist committed work', async () => {
      await seed('SKU1', new Batch('b1', 'SKU1', 100, new Date('2030-01-01T00:00:00.000Z')));

      const product = await createUnitOfWork().executeInTransaction((uow) => uow.products.get('SKU1'));

      expect(product?.batches.map((batch) => [batch.reference, batch.purchased, batch.eta?.toISOString()])).toEqual([
        ['b1', 100, '2030-01-01T00:00:00.000Z'],
      ]);
    });

    it('should roll back work that was never committed', async () => {
      await createUnitOfWork().executeInTransaction(async (uow) => {
        uow.products.add(new Product('SKU1', [new Batch('b1', 'SKU1', 100)]));
      });

      const product = await createUnitOfWork().executeInTransaction((uow) => uow.products.get('SKU1'));

      expect(product).toBeUndefined();
      expect(db.inTransaction).toBe(false);
    });

    it('should roll back and rethrow when the callback fails', async () => {
      const uow = createUnitOfWork();

      await expect(
        uow.executeInTransaction(async (unitOfWork) => {
          unitOfWork.products.add(new Product('SKU1', [new Batch('b1', 'SKU1', 100)]));
          throw new Error('handler failed');
        }),
      ).rejects.toThrow('handler failed');

      expect(uow.state).toBe(TransactionState.RolledBack);
      const count = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM products').get();
      expect(count?.n).toBe(0);
    });

    it('should persist allocations and the version number', async () => {
      await seed('SKU1', new Batch('b1', 'SKU1', 100));

      await createUnitOfWork().executeInTransaction(async (uow) => {
        const product = await uow.products.get('SKU1');
        product?.allocate({ orderid: 'o1', sku: 'SKU1', qty: 10 });
        await uow.commit();
      });

      const product = await createUnitOfWork().executeInTransaction((uow) => uow.products.get('SKU1'));
      expect(product?.versionNumber).toBe(1);
      expect(product?.findBatch('b1')?.allocatedLines).toEqual([{ orderid: 'o1', sku: 'SKU1', qty: 10 }]);
    });
  });

  // ==========================================================================
  // Transaction State Management
  // ==========================================================================

  describe('Transaction State Management', () => {
    it('should move through the transaction states', async () => {
      const uow = createUnitOfWork();
      expect(uow.state).toBe(TransactionState.Inactive);

      await uow.start();
      expect(uow.state).toBe(TransactionState.Active);
      expect(uow.isolationLevel).toBe(IsolationLevel.Serializable);

      const result = await uow.commit();
      expect(result).toMatchObject({ success: true, affectedCount: 0 });
      expect(uow.state).toBe(TransactionState.Committed);

      await uow.dispose();
      expect(uow.isolationLevel).toBeUndefined();
    });

    it('should refuse to commit without a transaction', async () => {
      await expect(createUnitOfWork().commit()).rejects.toThrow(TransactionError);
    });

    it('should refuse repository access without a transaction', () => {
      expect(() => createUnitOfWork().products).toThrow(TransactionError);
    });

    it('should treat rollback without a transaction as a no-op', async () => {
      await expect(createUnitOfWork().rollback()).resolves.toEqual({ success: true, duration: 0 });
    });
  });

  // ==========================================================================
  // Repository and Events
  // ==========================================================================

  describe('Repository and Events', () => {
    it('should return the same instance for repeated lookups', async () => {
      await seed('SKU1', new Batch('b1', 'SKU1', 100));

      await createUnitOfWork().executeInTransaction(async (uow) => {
        const first = await uow.products.get('SKU1');
        const second = await uow.products.get('SKU1');
        const byBatch = await uow.products.getByBatchRef('b1');

        expect(second).toBe(first);
        expect(byBatch).toBe(first);
      });
    });

    it('should yield new events once', async () => {
      await seed('SKU1', new Batch('b1', 'SKU1', 100));
      const uow = createUnitOfWork();

      await uow.executeInTransaction(async (unitOfWork) => {
        const product = await unitOfWork.products.get('SKU1');
        product?.allocate({ orderid: 'o1', sku: 'SKU1', qty: 10 });
        await unitOfWork.commit();
      });

      const events = [...uow.collectNewEvents()];
      expect(events).toHaveLength(1);
      expect(events[0]).toBeInstanceOf(Allocated);
      expect([...uow.collectNewEvents()]).toEqual([]);
    });

    it('should drop the events of a rolled back transaction', async () => {
      await seed('SKU1', new Batch('b1', 'SKU1', 100));
      const uow = createUnitOfWork();

      await uow.executeInTransaction(async (unitOfWork) => {
        const product = await unitOfWork.products.get('SKU1');
        product?.allocate({ orderid: 'o1', sku: 'SKU1', qty: 10 });
      });

      expect(uow.state).toBe(TransactionState.RolledBack);
      expect([...uow.collectNewEvents()]).toEqual([]);
    });
  });
});
