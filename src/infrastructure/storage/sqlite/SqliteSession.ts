/**
 * allocation-core - SQLite storage session
 *
 * @module infrastructure/storage/sqlite/SqliteSession
 */

import type Database from 'better-sqlite3';

import { IsolationLevel, type SessionFactory, type StorageSession } from '../../../domain/repository/IUnitOfWork';
import { openDatabase } from './schema';
import { SqliteAllocationsViewStore } from './SqliteAllocationsViewStore';
import { SqliteProductStore } from './SqliteProductStore';

/**
 * One transaction on one connection.
 *
 * `BEGIN IMMEDIATE` takes the database write lock up front, so concurrent
 * sessions on the same file are serialized.
 */
export class SqliteSession implements StorageSession {
  readonly isolationLevel = IsolationLevel.Serializable;
  readonly products: SqliteProductStore;
  readonly allocationsView: SqliteAllocationsViewStore;

  constructor(
    private readonly db: Database.Database,
    private readonly ownsConnection: boolean,
  ) {
    this.products = new SqliteProductStore(db);
    this.allocationsView = new SqliteAllocationsViewStore(db);
  }

  async begin(): Promise<void> {
    this.db.exec('BEGIN IMMEDIATE');
  }

  async commit(): Promise<void> {
    this.db.exec('COMMIT');
  }

  async rollback(): Promise<void> {
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
  }

  async close(): Promise<void> {
    if (this.ownsConnection) {
      this.db.close();
    }
  }
}

export type SqliteSessionFactoryOptions =
  | {
      /**
       * Database file; each session opens and closes its own connection.
       */
      filename: string;
    }
  | {
      /**
       * Connection shared by every session, e.g. an in-memory database.
       * Sessions never close it.
       */
      database: Database.Database;
    };

export function createSqliteSessionFactory(options: SqliteSessionFactoryOptions): SessionFactory {
  if ('database' in options) {
    const { database } = options;
    return () => new SqliteSession(database, false);
  }
  const { filename } = options;
  return () => new SqliteSession(openDatabase(filename), true);
}
