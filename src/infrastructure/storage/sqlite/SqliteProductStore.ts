/**
 * allocation-core - SQLite product store
 *
 * @module infrastructure/storage/sqlite/SqliteProductStore
 */

import type Database from 'better-sqlite3';

import { ConcurrencyError } from '../../../domain/exceptions/exceptions';
import { type BatchSnapshot, Product } from '../../../domain/model/Product';
import type { AllocationRecord, IProductStore } from '../../../domain/repository/IRepository';

interface ProductRow {
  sku: string;
  version_number: number;
}

interface BatchRow {
  reference: string;
  sku: string;
  purchased_quantity: number;
  eta: string | null;
}

interface AllocationRow {
  batch_reference: string;
  orderid: string;
  sku: string;
  qty: number;
}

/**
 * Loads and saves whole Product aggregates.
 *
 * @remarks
 * `save` updates `products.version_number` only where it still holds the
 * version this store loaded, so a write based on a stale read fails with
 * `ConcurrencyError` instead of overwriting.
 */
export class SqliteProductStore implements IProductStore {
  private readonly loadedVersions = new Map<string, number>();

  constructor(private readonly db: Database.Database) {}

  async load(sku: string): Promise<Product | undefined> {
    const row = this.db
      .prepare<[string], ProductRow>('SELECT sku, version_number FROM products WHERE sku = ?')
      .get(sku);
    if (!row) {
      return undefined;
    }

    const batchRows = this.db
      .prepare<[string], BatchRow>(
        'SELECT reference, sku, purchased_quantity, eta FROM batches WHERE sku = ? ORDER BY id',
      )
      .all(sku);
    const allocationRows = this.db
      .prepare<[string], AllocationRow>(
        `SELECT a.batch_reference, a.orderid, a.sku, a.qty
           FROM allocations a
           JOIN batches b ON b.reference = a.batch_reference
          WHERE b.sku = ?
          ORDER BY a.id`,
      )
      .all(sku);

    const batches: BatchSnapshot[] = batchRows.map((batch) => ({
      reference: batch.reference,
      sku: batch.sku,
      purchasedQuantity: batch.purchased_quantity,
      eta: batch.eta,
      allocations: allocationRows
        .filter((allocation) => allocation.batch_reference === batch.reference)
        .map(({ orderid, sku: lineSku, qty }) => ({ orderid, sku: lineSku, qty })),
    }));

    this.loadedVersions.set(row.sku, row.version_number);
    return Product.fromSnapshot({ sku: row.sku, versionNumber: row.version_number, batches });
  }

  async loadByBatchRef(reference: string): Promise<Product | undefined> {
    const row = this.db
      .prepare<[string], { sku: string }>('SELECT sku FROM batches WHERE reference = ?')
      .get(reference);
    return row ? this.load(row.sku) : undefined;
  }

  async save(product: Product): Promise<void> {
    const snapshot = product.toSnapshot();
    const expected = this.loadedVersions.get(snapshot.sku);

    if (expected === undefined) {
      const inserted = this.db
        .prepare('INSERT OR IGNORE INTO products (sku, version_number) VALUES (?, ?)')
        .run(snapshot.sku, snapshot.versionNumber);
      if (inserted.changes === 0) {
        throw new ConcurrencyError(snapshot.sku, 0);
      }
    } else {
      const updated = this.db
        .prepare('UPDATE products SET version_number = ? WHERE sku = ? AND version_number = ?')
        .run(snapshot.versionNumber, snapshot.sku, expected);
      if (updated.changes === 0) {
        throw new ConcurrencyError(snapshot.sku, expected);
      }
    }

    const upsertBatch = this.db.prepare(
      `INSERT INTO batches (reference, sku, purchased_quantity, eta) VALUES (?, ?, ?, ?)
       ON CONFLICT (reference) DO UPDATE SET
         purchased_quantity = excluded.purchased_quantity,
         eta = excluded.eta`,
    );
    const deleteAllocations = this.db.prepare('DELETE FROM allocations WHERE batch_reference = ?');
    const insertAllocation = this.db.prepare(
      'INSERT INTO allocations (batch_reference, orderid, sku, qty) VALUES (?, ?, ?, ?)',
    );

    for (const batch of snapshot.batches) {
      upsertBatch.run(batch.reference, batch.sku, batch.purchasedQuantity, batch.eta);
      deleteAllocations.run(batch.reference);
      for (const line of batch.allocations) {
        insertAllocation.run(batch.reference, line.orderid, line.sku, line.qty);
      }
    }

    this.loadedVersions.set(snapshot.sku, snapshot.versionNumber);
  }

  async listAllocations(): Promise<AllocationRecord[]> {
    return this.db
      .prepare<[], AllocationRecord>(
        'SELECT orderid, sku, batch_reference AS batchref FROM allocations ORDER BY id',
      )
      .all();
  }
}
