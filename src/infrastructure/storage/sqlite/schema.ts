/**
 * allocation-core - SQLite schema
 *
 * Write model (`products`, `batches`, `allocations`) and the denormalized
 * read model (`allocations_view`). The view has no foreign keys into the
 * write tables; only projector handlers write it.
 *
 * @module infrastructure/storage/sqlite/schema
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import Database from 'better-sqlite3';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS products (
    sku TEXT PRIMARY KEY,
    version_number INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS batches (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    reference TEXT NOT NULL UNIQUE,
    sku TEXT NOT NULL REFERENCES products (sku),
    purchased_quantity INTEGER NOT NULL,
    eta TEXT
  );

  CREATE TABLE IF NOT EXISTS allocations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    batch_reference TEXT NOT NULL REFERENCES batches (reference),
    orderid TEXT NOT NULL,
    sku TEXT NOT NULL,
    qty INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_allocations_batch ON allocations (batch_reference);

  CREATE TABLE IF NOT EXISTS allocations_view (
    orderid TEXT NOT NULL,
    sku TEXT NOT NULL,
    batchref TEXT NOT NULL,
    PRIMARY KEY (orderid, sku)
  );
`;

/**
 * Create every table that does not exist yet. Safe to run repeatedly.
 */
export function initializeSchema(db: Database.Database): void {
  db.exec(SCHEMA);
}

/**
 * Open a connection with the pragmas every session uses, creating the
 * parent directory of a file database when missing.
 */
export function openDatabase(filename: string): Database.Database {
  if (filename !== ':memory:') {
    const directory = path.dirname(filename);
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }
  }

  const db = new Database(filename);
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  return db;
}
