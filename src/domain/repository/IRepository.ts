/**
 * allocation-core - Repository and storage-store interfaces
 *
 * Two layers:
 * - **Stores** (`IProductStore`, `IAllocationsViewStore`) are implemented by
 *   storage adapters and bound to one storage session.
 * - **Repositories** (`IProductRepository`) are what handlers see. The
 *   tracking repository wraps a store and remembers every aggregate it has
 *   handed out or received, so the Unit of Work can flush them on commit and
 *   drain their events afterwards.
 *
 * @module domain/repository/IRepository
 */

import { Product } from '../model/Product';

/**
 * Denormalized read-model row.
 */
export interface AllocationRecord {
  orderid: string;
  sku: string;
  batchref: string;
}

/**
 * What a read-model query returns for one order.
 */
export interface AllocationView {
  sku: string;
  batchref: string;
}

/**
 * Write-model persistence for Product aggregates, bound to one session.
 */
export interface IProductStore {
  load(sku: string): Promise<Product | undefined>;
  loadByBatchRef(reference: string): Promise<Product | undefined>;

  /**
   * Persist the full state of a product.
   *
   * @throws {ConcurrencyError} If the stored version moved since it was loaded
   */
  save(product: Product): Promise<void>;

  /**
   * Every current allocation in the write model, as read-model rows.
   */
  listAllocations(): Promise<AllocationRecord[]>;
}

/**
 * Read-model persistence, bound to one session.
 *
 * Keyed by `(orderid, sku)`; written only by projector event handlers.
 */
export interface IAllocationsViewStore {
  /**
   * Insert or replace the row for `(orderid, sku)`.
   */
  upsert(record: AllocationRecord): Promise<void>;
  remove(orderid: string, sku: string): Promise<void>;
  findByOrder(orderid: string): Promise<AllocationView[]>;

  /**
   * Replace the whole view.
   */
  replaceAll(records: readonly AllocationRecord[]): Promise<void>;
}

/**
 * Product repository as seen by handlers.
 */
export interface IProductRepository {
  add(product: Product): void;
  get(sku: string): Promise<Product | undefined>;
  getByBatchRef(reference: string): Promise<Product | undefined>;

  /**
   * Every stored allocation, as read-model rows. Reads storage directly, so
   * changes not yet flushed by a commit are not included.
   */
  listAllocations(): Promise<AllocationRecord[]>;
}

/**
 * Repository that records every aggregate passing through it.
 *
 * @remarks
 * Repeated lookups of the same SKU within one transaction return the same
 * instance, so events raised on it are never split across copies.
 */
export class TrackingProductRepository implements IProductRepository {
  private readonly tracked = new Map<string, Product>();

  constructor(private readonly store: IProductStore) {}

  /**
   * Aggregates loaded or added through this repository, in first-seen order.
   */
  get seen(): readonly Product[] {
    return [...this.tracked.values()];
  }

  add(product: Product): void {
    this.tracked.set(product.sku, product);
  }

  async get(sku: string): Promise<Product | undefined> {
    const known = this.tracked.get(sku);
    if (known) {
      return known;
    }
    const product = await this.store.load(sku);
    if (product) {
      this.tracked.set(product.sku, product);
    }
    return product;
  }

  async getByBatchRef(reference: string): Promise<Product | undefined> {
    for (const product of this.tracked.values()) {
      if (product.findBatch(reference)) {
        return product;
      }
    }
    const product = await this.store.loadByBatchRef(reference);
    if (!product) {
      return undefined;
    }
    const known = this.tracked.get(product.sku);
    if (known) {
      return known;
    }
    this.tracked.set(product.sku, product);
    return product;
  }

  listAllocations(): Promise<AllocationRecord[]> {
    return this.store.listAllocations();
  }
}
