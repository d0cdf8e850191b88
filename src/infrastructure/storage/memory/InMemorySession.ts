/**
 * allocation-core - In-memory storage backend
 *
 * Fake backend for unit tests. A session buffers its writes and applies
 * them to the shared `InMemoryStore` on commit; reads see committed data
 * overlaid with the session's own writes (read committed).
 *
 * @module infrastructure/storage/memory/InMemorySession
 */

import { ConcurrencyError } from '../../../domain/exceptions/exceptions';
import { Product, type ProductSnapshot } from '../../../domain/model/Product';
import type {
  AllocationRecord,
  AllocationView,
  IAllocationsViewStore,
  IProductStore,
} from '../../../domain/repository/IRepository';
import {
  IsolationLevel,
  type SessionFactory,
  type StorageSession,
} from '../../../domain/repository/IUnitOfWork';

function viewKey(orderid: string, sku: string): string {
  return `${orderid}\u0000${sku}`;
}

/**
 * Committed state shared by every session of one factory.
 */
export class InMemoryStore {
  readonly products = new Map<string, ProductSnapshot>();
  readonly allocationsView = new Map<string, AllocationRecord>();

  /**
   * Number of successful commits, for assertions.
   */
  commits = 0;

  get sessionFactory(): SessionFactory {
    return () => new InMemorySession(this);
  }
}

export class InMemoryProductStore implements IProductStore {
  readonly pending = new Map<string, ProductSnapshot>();
  private readonly loadedVersions = new Map<string, number>();

  constructor(private readonly store: InMemoryStore) {}

  async load(sku: string): Promise<Product | undefined> {
    const snapshot = this.pending.get(sku) ?? this.store.products.get(sku);
    if (!snapshot) {
      return undefined;
    }
    this.loadedVersions.set(sku, snapshot.versionNumber);
    return Product.fromSnapshot(snapshot);
  }

  async loadByBatchRef(reference: string): Promise<Product | undefined> {
    const owner = this.snapshots().find((snapshot) =>
      snapshot.batches.some((batch) => batch.reference === reference),
    );
    return owner ? this.load(owner.sku) : undefined;
  }

  async save(product: Product): Promise<void> {
    const expected = this.loadedVersions.get(product.sku);
    const committed = this.store.products.get(product.sku);
    const stale =
      expected === undefined ? committed !== undefined : committed?.versionNumber !== expected;
    if (stale) {
      throw new ConcurrencyError(product.sku, expected ?? 0);
    }
    this.pending.set(product.sku, product.toSnapshot());
  }

  async listAllocations(): Promise<AllocationRecord[]> {
    return this.snapshots().flatMap((snapshot) =>
      snapshot.batches.flatMap((batch) =>
        batch.allocations.map((line) => ({
          orderid: line.orderid,
          sku: line.sku,
          batchref: batch.reference,
        })),
      ),
    );
  }

  reset(): void {
    this.pending.clear();
    this.loadedVersions.clear();
  }

  private snapshots(): ProductSnapshot[] {
    const merged = new Map(this.store.products);
    for (const [sku, snapshot] of this.pending) {
      merged.set(sku, snapshot);
    }
    return [...merged.values()];
  }
}

export class InMemoryAllocationsViewStore implements IAllocationsViewStore {
  /**
   * Row writes not yet committed; `null` marks a deletion.
   */
  readonly pending = new Map<string, AllocationRecord | null>();
  cleared = false;

  constructor(private readonly store: InMemoryStore) {}

  async upsert(record: AllocationRecord): Promise<void> {
    this.pending.set(viewKey(record.orderid, record.sku), { ...record });
  }

  async remove(orderid: string, sku: string): Promise<void> {
    this.pending.set(viewKey(orderid, sku), null);
  }

  async findByOrder(orderid: string): Promise<AllocationView[]> {
    const rows = new Map<string, AllocationRecord>(this.cleared ? [] : this.store.allocationsView);
    for (const [key, record] of this.pending) {
      if (record) {
        rows.set(key, record);
      } else {
        rows.delete(key);
      }
    }
    return [...rows.values()]
      .filter((record) => record.orderid === orderid)
      .map(({ sku, batchref }) => ({ sku, batchref }))
      .sort((a, b) => (a.sku < b.sku ? -1 : a.sku > b.sku ? 1 : 0));
  }

  async replaceAll(records: readonly AllocationRecord[]): Promise<void> {
    this.cleared = true;
    this.pending.clear();
    for (const record of records) {
      await this.upsert(record);
    }
  }

  reset(): void {
    this.pending.clear();
    this.cleared = false;
  }
}

export class InMemorySession implements StorageSession {
  readonly isolationLevel = IsolationLevel.ReadCommitted;
  readonly products: InMemoryProductStore;
  readonly allocationsView: InMemoryAllocationsViewStore;

  constructor(private readonly store: InMemoryStore) {
    this.products = new InMemoryProductStore(store);
    this.allocationsView = new InMemoryAllocationsViewStore(store);
  }

  async begin(): Promise<void> {
    this.products.reset();
    this.allocationsView.reset();
  }

  async commit(): Promise<void> {
    for (const [sku, snapshot] of this.products.pending) {
      this.store.products.set(sku, snapshot);
    }
    if (this.allocationsView.cleared) {
      this.store.allocationsView.clear();
    }
    for (const [key, record] of this.allocationsView.pending) {
      if (record) {
        this.store.allocationsView.set(key, record);
      } else {
        this.store.allocationsView.delete(key);
      }
    }
    this.store.commits += 1;
    this.products.reset();
    this.allocationsView.reset();
  }

  async rollback(): Promise<void> {
    this.products.reset();
    this.allocationsView.reset();
  }

  async close(): Promise<void> {
    await this.rollback();
  }
}
