/**
 * @fileoverview Unit tests for the Product aggregate
 */

import { Allocated, Batch, Deallocated, OutOfStock, Product } from '../../../src';

const today = new Date('2030-01-01T00:00:00.000Z');
const tomorrow = new Date('2030-01-02T00:00:00.000Z');
const later = new Date('2030-01-10T00:00:00.000Z');

describe('Product', () => {
  describe('allocate', () => {
    it('should prefer warehouse stock over shipments', () => {
      const inStock = new Batch('in-stock', 'RETRO-CLOCK', 100);
      const shipment = new Batch('shipment', 'RETRO-CLOCK', 100, tomorrow);
      const product = new Product('RETRO-CLOCK', [shipment, inStock]);

      const ref = product.allocate({ orderid: 'o1', sku: 'RETRO-CLOCK', qty: 10 });

      expect(ref).toBe('in-stock');
      expect(inStock.availableQuantity).toBe(90);
      expect(shipment.availableQuantity).toBe(100);
    });

    it('should prefer earlier shipments', () => {
      const speedy = new Batch('speedy', 'MINIMALIST-SPOON', 100, today);
      const normal = new Batch('normal', 'MINIMALIST-SPOON', 100, tomorrow);
      const slow = new Batch('slow', 'MINIMALIST-SPOON', 100, later);
      const product = new Product('MINIMALIST-SPOON', [slow, normal, speedy]);

      expect(product.allocate({ orderid: 'o1', sku: 'MINIMALIST-SPOON', qty: 10 })).toBe('speedy');
    });

    it('should raise Allocated and bump the version', () => {
      const product = new Product('SKU1', [new Batch('b1', 'SKU1', 20)]);

      product.allocate({ orderid: 'o1', sku: 'SKU1', qty: 5 });

      expect(product.versionNumber).toBe(1);
      expect(product.domainEvents).toHaveLength(1);
      const [event] = product.domainEvents;
      expect(event).toBeInstanceOf(Allocated);
      expect(event.payload).toEqual({ orderid: 'o1', sku: 'SKU1', qty: 5, batchref: 'b1' });
    });

    it('should raise OutOfStock when no batch can take the line', () => {
      const product = new Product('SKU1', [new Batch('b1', 'SKU1', 10)]);

      const ref = product.allocate({ orderid: 'o1', sku: 'SKU1', qty: 20 });

      expect(ref).toBeUndefined();
      expect(product.versionNumber).toBe(0);
      const [event] = product.domainEvents;
      expect(event).toBeInstanceOf(OutOfStock);
      expect(event.payload).toEqual({ sku: 'SKU1' });
    });

    it('should return the existing batch for a line already allocated', () => {
      const product = new Product('SKU1', [new Batch('b1', 'SKU1', 20), new Batch('b2', 'SKU1', 20)]);
      const line = { orderid: 'o1', sku: 'SKU1', qty: 5 };

      product.allocate(line);
      const again = product.allocate({ ...line });

      expect(again).toBe('b1');
      expect(product.versionNumber).toBe(1);
      expect(product.domainEvents).toHaveLength(1);
      expect(product.findBatch('b1')?.availableQuantity).toBe(15);
    });
  });

  describe('changeBatchQuantity', () => {
    it('should deallocate the oldest lines until the batch fits', () => {
      const batch = new Batch('b1', 'SKU1', 20);
      const product = new Product('SKU1', [batch]);
      product.allocate({ orderid: 'o1', sku: 'SKU1', qty: 8 });
      product.allocate({ orderid: 'o2', sku: 'SKU1', qty: 8 });

      product.changeBatchQuantity('b1', 10);

      expect(batch.allocatedLines).toEqual([{ orderid: 'o2', sku: 'SKU1', qty: 8 }]);
      expect(batch.availableQuantity).toBe(2);
      const last = product.domainEvents[product.domainEvents.length - 1];
      expect(last).toBeInstanceOf(Deallocated);
      expect(last.payload).toEqual({ orderid: 'o1', sku: 'SKU1', qty: 8 });
      expect(product.domainEvents).toHaveLength(3);
    });

    it('should raise nothing when the batch still fits', () => {
      const product = new Product('SKU1', [new Batch('b1', 'SKU1', 20)]);
      product.allocate({ orderid: 'o1', sku: 'SKU1', qty: 8 });
      [...product.drainEvents()];

      product.changeBatchQuantity('b1', 8);

      expect(product.domainEvents).toHaveLength(0);
      expect(product.findBatch('b1')?.availableQuantity).toBe(0);
    });
  });

  describe('Snapshots', () => {
    it('should restore batches, ETAs and allocations', () => {
      const product = new Product('SKU1', [new Batch('b1', 'SKU1', 20, tomorrow)], 3);
      product.allocate({ orderid: 'o1', sku: 'SKU1', qty: 4 });

      const restored = Product.fromSnapshot(product.toSnapshot());

      expect(restored.versionNumber).toBe(4);
      expect(restored.findBatch('b1')?.eta?.toISOString()).toBe('2030-01-02T00:00:00.000Z');
      expect(restored.findBatch('b1')?.allocatedLines).toEqual([{ orderid: 'o1', sku: 'SKU1', qty: 4 }]);
      expect(restored.domainEvents).toHaveLength(0);
    });
  });
});
