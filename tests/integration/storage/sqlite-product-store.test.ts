/**
 * @fileoverview Integration tests for the SQLite stores
 */

import type Database from 'better-sqlite3';

import {
  Batch,
  ConcurrencyError,
  initializeSchema,
  openDatabase,
  Product,
  SqliteAllocationsViewStore,
  SqliteProductStore,
} from '../../../src';

describe('SQLite stores', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(':memory:');
    initializeSchema(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('SqliteProductStore', () => {
    it('should reject a save based on a stale version', async () => {
      await new SqliteProductStore(db).save(new Product('SKU1', [new Batch('b1', 'SKU1', 100)]));
      const first = new SqliteProductStore(db);
      const second = new SqliteProductStore(db);
      const mine = await first.load('SKU1');
      const theirs = await second.load('SKU1');

      theirs?.allocate({ orderid: 'o1', sku: 'SKU1', qty: 10 });
      if (theirs) await second.save(theirs);
      mine?.allocate({ orderid: 'o2', sku: 'SKU1', qty: 10 });

      await expect(mine ? first.save(mine) : Promise.resolve()).rejects.toThrow(ConcurrencyError);
    });

    it('should reject creating a product that already exists', async () => {
      await new SqliteProductStore(db).save(new Product('SKU1'));

      await expect(new SqliteProductStore(db).save(new Product('SKU1'))).rejects.toThrow(
        'Concurrent modification of SKU1: expected stored version 0',
      );
    });

    it('should list stored allocations as read-model rows', async () => {
      const product = new Product('SKU1', [new Batch('b1', 'SKU1', 10), new Batch('b2', 'SKU1', 10)]);
      product.allocate({ orderid: 'o1', sku: 'SKU1', qty: 8 });
      product.allocate({ orderid: 'o2', sku: 'SKU1', qty: 8 });
      await new SqliteProductStore(db).save(product);

      await expect(new SqliteProductStore(db).listAllocations()).resolves.toEqual([
        { orderid: 'o1', sku: 'SKU1', batchref: 'b1' },
        { orderid: 'o2', sku: 'SKU1', batchref: 'b2' },
      ]);
    });
  });

  describe('SqliteAllocationsViewStore', () => {
    it('should keep one row per order and sku', async () => {
      const view = new SqliteAllocationsViewStore(db);

      await view.upsert({ orderid: 'o1', sku: 'SKU1', batchref: 'b1' });
      await view.upsert({ orderid: 'o1', sku: 'SKU1', batchref: 'b2' });
      await view.upsert({ orderid: 'o1', sku: 'SKU0', batchref: 'b7' });

      await expect(view.findByOrder('o1')).resolves.toEqual([
        { sku: 'SKU0', batchref: 'b7' },
        { sku: 'SKU1', batchref: 'b2' },
      ]);
    });

    it('should remove a row', async () => {
      const view = new SqliteAllocationsViewStore(db);
      await view.upsert({ orderid: 'o1', sku: 'SKU1', batchref: 'b1' });

      await view.remove('o1', 'SKU1');

      await expect(view.findByOrder('o1')).resolves.toEqual([]);
    });
  });

  describe('initializeSchema', () => {
    it('should be safe to run twice', () => {
      expect(() => initializeSchema(db)).not.toThrow();
    });
  });
});
