/**
 * allocation-core - Product aggregate
 *
 * A Product owns every Batch of one SKU and is the consistency boundary for
 * allocation: all changes to the batches of a SKU go through it, and its
 * `versionNumber` is bumped on every allocation so that concurrent writers
 * can be detected by the storage adapter.
 *
 * @module domain/model/Product
 */

import { AggregateRoot } from '../events/IDomainEvent';
import { Allocated, Deallocated, OutOfStock } from '../events/events';

/**
 * A customer order line. Value object: two lines with the same fields are
 * the same line.
 */
export interface OrderLine {
  readonly orderid: string;
  readonly sku: string;
  readonly qty: number;
}

/**
 * Plain-data form of a batch, used by storage adapters.
 */
export interface BatchSnapshot {
  reference: string;
  sku: string;
  purchasedQuantity: number;
  eta: string | null;
  allocations: OrderLine[];
}

/**
 * Plain-data form of a product, used by storage adapters.
 */
export interface ProductSnapshot {
  sku: string;
  versionNumber: number;
  batches: BatchSnapshot[];
}

function lineKey(line: OrderLine): string {
  return `${line.orderid}\u0000${line.sku}\u0000${line.qty}`;
}

/**
 * A quantity of stock for one SKU, either in the warehouse (no ETA) or in
 * transit (ETA set).
 */
export class Batch {
  private purchasedQuantity: number;
  private readonly allocations = new Map<string, OrderLine>();

  constructor(
    readonly reference: string,
    readonly sku: string,
    qty: number,
    readonly eta: Date | null = null,
  ) {
    this.purchasedQuantity = qty;
  }

  get purchased(): number {
    return this.purchasedQuantity;
  }

  get allocatedQuantity(): number {
    let total = 0;
    for (const line of this.allocations.values()) {
      total += line.qty;
    }
    return total;
  }

  get availableQuantity(): number {
    return this.purchasedQuantity - this.allocatedQuantity;
  }

  /**
   * Allocated lines in allocation order.
   */
  get allocatedLines(): readonly OrderLine[] {
    return [...this.allocations.values()];
  }

  canAllocate(line: OrderLine): boolean {
    return this.sku === line.sku && this.availableQuantity >= line.qty;
  }

  isAllocated(line: OrderLine): boolean {
    return this.allocations.has(lineKey(line));
  }

  allocate(line: OrderLine): void {
    if (this.canAllocate(line)) {
      this.allocations.set(lineKey(line), { orderid: line.orderid, sku: line.sku, qty: line.qty });
    }
  }

  /**
   * Remove the oldest allocation and return it.
   */
  deallocateOne(): OrderLine | undefined {
    for (const [key, line] of this.allocations) {
      this.allocations.delete(key);
      return line;
    }
    return undefined;
  }

  changePurchasedQuantity(qty: number): void {
    this.purchasedQuantity = qty;
  }

  toSnapshot(): BatchSnapshot {
    return {
      reference: this.reference,
      sku: this.sku,
      purchasedQuantity: this.purchasedQuantity,
      eta: this.eta ? this.eta.toISOString() : null,
      allocations: [...this.allocatedLines],
    };
  }

  static fromSnapshot(snapshot: BatchSnapshot): Batch {
    const batch = new Batch(
      snapshot.reference,
      snapshot.sku,
      snapshot.purchasedQuantity,
      snapshot.eta === null ? null : new Date(snapshot.eta),
    );
    // Restored directly: the stored state may be over-allocated mid-change.
    for (const line of snapshot.allocations) {
      batch.allocations.set(lineKey(line), line);
    }
    return batch;
  }
}

/**
 * Warehouse stock (no ETA) sorts first, then earliest ETA.
 */
function byEta(a: Batch, b: Batch): number {
  if (a.eta === null) return b.eta === null ? 0 : -1;
  if (b.eta === null) return 1;
  return a.eta.getTime() - b.eta.getTime();
}

/**
 * Product aggregate root.
 *
 * @example
 * ```typescript
 * const product = new Product('SMALL-TABLE', [new Batch('b1', 'SMALL-TABLE', 20)]);
 * product.allocate({ orderid: 'o1', sku: 'SMALL-TABLE', qty: 2 }); // 'b1'
 * product.domainEvents[0]; // Allocated { orderid: 'o1', ..., batchref: 'b1' }
 * ```
 */
export class Product extends AggregateRoot {
  private readonly batchList: Batch[];

  constructor(
    readonly sku: string,
    batches: Batch[] = [],
    public versionNumber: number = 0,
  ) {
    super();
    this.batchList = [...batches];
  }

  get batches(): readonly Batch[] {
    return this.batchList;
  }

  addBatch(batch: Batch): void {
    this.batchList.push(batch);
  }

  findBatch(reference: string): Batch | undefined {
    return this.batchList.find((batch) => batch.reference === reference);
  }

  /**
   * Allocate an order line to the preferred batch.
   *
   * A line already held by one of this product's batches keeps its batch
   * and raises nothing.
   *
   * @returns The batch reference, or undefined when out of stock
   */
  allocate(line: OrderLine): string | undefined {
    const existing = this.batchList.find((batch) => batch.isAllocated(line));
    if (existing) {
      return existing.reference;
    }

    const batch = [...this.batchList].sort(byEta).find((candidate) => candidate.canAllocate(line));
    if (!batch) {
      this.raiseEvent(new OutOfStock({ sku: line.sku }));
      return undefined;
    }

    batch.allocate(line);
    this.versionNumber += 1;
    this.raiseEvent(
      new Allocated({
        orderid: line.orderid,
        sku: line.sku,
        qty: line.qty,
        batchref: batch.reference,
      }),
    );
    return batch.reference;
  }

  /**
   * Change a batch's purchased quantity, deallocating lines until the batch
   * is no longer over-allocated.
   */
  changeBatchQuantity(reference: string, qty: number): void {
    const batch = this.findBatch(reference);
    if (!batch) {
      return;
    }
    batch.changePurchasedQuantity(qty);
    while (batch.availableQuantity < 0) {
      const line = batch.deallocateOne();
      if (!line) break;
      this.raiseEvent(new Deallocated({ orderid: line.orderid, sku: line.sku, qty: line.qty }));
    }
  }

  toSnapshot(): ProductSnapshot {
    return {
      sku: this.sku,
      versionNumber: this.versionNumber,
      batches: this.batchList.map((batch) => batch.toSnapshot()),
    };
  }

  static fromSnapshot(snapshot: ProductSnapshot): Product {
    return new Product(
      snapshot.sku,
      snapshot.batches.map((batch) => Batch.fromSnapshot(batch)),
      snapshot.versionNumber,
    );
  }
}
