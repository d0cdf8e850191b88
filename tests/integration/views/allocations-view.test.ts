/**
 * @fileoverview Read-model synchronization over SQLite
 *
 * The production handler registries, bootstrapped against a file database
 * in a temporary directory, with fake notifications and publisher.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import {
  Allocate,
  allocations,
  bootstrap,
  ChangeBatchQuantity,
  CreateBatch,
  openDatabase,
  rebuildAllocationsView,
} from '../../../src';
import { FakeNotifications, FakePublisher, RecordingLogger, testConfig } from '../../support/fakes';

describe('allocations_view (SQLite)', () => {
  let directory: string;
  let databasePath: string;

  function createBus() {
    const notifications = new FakeNotifications();
    const bus = bootstrap({
      config: { ...testConfig, databasePath },
      logger: new RecordingLogger(),
      notifications,
      publish: new FakePublisher(),
    });
    return { bus, notifications };
  }

  function countRows(table: 'allocations' | 'allocations_view'): number {
    const db = openDatabase(databasePath);
    try {
      return db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? -1;
    } finally {
      db.close();
    }
  }

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'allocation-'));
    databasePath = path.join(directory, 'nested', 'allocation.sqlite');
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('should create the schema on bootstrap', () => {
    createBus();

    expect(fs.existsSync(databasePath)).toBe(true);
    expect(countRows('allocations_view')).toBe(0);
  });

  it('should converge the view after allocation', async () => {
    const { bus } = createBus();

    await bus.handle([new CreateBatch('b1', 'SKU1', 50), new Allocate('o1', 'SKU1', 20)]);

    expect(await allocations('o1', bus.uow)).toEqual([{ sku: 'SKU1', batchref: 'b1' }]);
  });

  it('should follow reallocation after a batch shrinks', async () => {
    const { bus } = createBus();
    await bus.handle([
      new CreateBatch('b1', 'SKU1', 50),
      new CreateBatch('b2', 'SKU1', 50, new Date('2030-01-02T00:00:00.000Z')),
      new Allocate('o1', 'SKU1', 20),
      new Allocate('o2', 'SKU1', 20),
    ]);

    await bus.handle(new ChangeBatchQuantity('b1', 25));

    expect(await allocations('o1', bus.uow)).toEqual([{ sku: 'SKU1', batchref: 'b2' }]);
    expect(await allocations('o2', bus.uow)).toEqual([{ sku: 'SKU1', batchref: 'b1' }]);
  });

  it('should keep data across buses on the same file', async () => {
    await createBus().bus.handle([new CreateBatch('b1', 'SKU1', 50), new Allocate('o1', 'SKU1', 20)]);

    const { bus, notifications } = createBus();
    await bus.handle(new Allocate('o2', 'SKU1', 40));

    expect(notifications.sent.get('stock@made.com')).toEqual(['Out of stock for SKU1']);
    expect(countRows('allocations')).toBe(1);
  });

  it('should rebuild the view from the write tables', async () => {
    const { bus } = createBus();
    await bus.handle([new CreateBatch('b1', 'SKU1', 50), new Allocate('o1', 'SKU1', 20)]);
    const db = openDatabase(databasePath);
    try {
      db.exec('DELETE FROM allocations_view');
    } finally {
      db.close();
    }

    await expect(rebuildAllocationsView(bus.uow)).resolves.toBe(1);
    expect(await allocations('o1', bus.uow)).toEqual([{ sku: 'SKU1', batchref: 'b1' }]);
  });
});
