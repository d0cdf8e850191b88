/**
 * allocation-core - SQLite read-model store
 *
 * @module infrastructure/storage/sqlite/SqliteAllocationsViewStore
 */

import type Database from 'better-sqlite3';

import type {
  AllocationRecord,
  AllocationView,
  IAllocationsViewStore,
} from '../../../domain/repository/IRepository';

const UPSERT = `
  INSERT INTO allocations_view (orderid, sku, batchref) VALUES (?, ?, ?)
  ON CONFLICT (orderid, sku) DO UPDATE SET batchref = excluded.batchref
`;

export class SqliteAllocationsViewStore implements IAllocationsViewStore {
  constructor(private readonly db: Database.Database) {}

  async upsert(record: AllocationRecord): Promise<void> {
    this.db.prepare(UPSERT).run(record.orderid, record.sku, record.batchref);
  }

  async remove(orderid: string, sku: string): Promise<void> {
    this.db.prepare('DELETE FROM allocations_view WHERE orderid = ? AND sku = ?').run(orderid, sku);
  }

  async findByOrder(orderid: string): Promise<AllocationView[]> {
    return this.db
      .prepare<[string], AllocationView>(
        'SELECT sku, batchref FROM allocations_view WHERE orderid = ? ORDER BY sku',
      )
      .all(orderid);
  }

  async replaceAll(records: readonly AllocationRecord[]): Promise<void> {
    this.db.exec('DELETE FROM allocations_view');
    const upsert = this.db.prepare(UPSERT);
    for (const record of records) {
      upsert.run(record.orderid, record.sku, record.batchref);
    }
  }
}
