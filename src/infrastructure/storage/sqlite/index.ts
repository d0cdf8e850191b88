export { initializeSchema, openDatabase } from './schema';
export { SqliteAllocationsViewStore } from './SqliteAllocationsViewStore';
export { SqliteProductStore } from './SqliteProductStore';
export { createSqliteSessionFactory, SqliteSession } from './SqliteSession';
export type { SqliteSessionFactoryOptions } from './SqliteSession';
