/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Adapters behind the application ports:
 *
 * - **Config**: zod-validated environment
 * - **Logging**: pino
 * - **Notifications**: SMTP email via nodemailer
 * - **Messaging**: Redis pub/sub via ioredis
 * - **Storage**: SQLite via better-sqlite3, plus an in-memory fake
 *
 * @module infrastructure
 */

export * from './config';
export * from './logging';
export * from './messaging';
export * from './notifications';
export * from './storage';
