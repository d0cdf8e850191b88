/**
 * allocation-core - Composition root
 *
 * Builds the Unit of Work, the dependency registry and the message bus.
 * Every collaborator has a production default and can be replaced per call,
 * which is how tests swap in fakes.
 *
 * @module bootstrap
 */

import { DependencyRegistry } from './application/di/IDependencyInjection';
import { type AppDependencies, createHandlerRegistries } from './application/handlers';
import { MessageBus } from './application/messagebus/MessageBus';
import type { ICloseable, ILogger, INotifications, IPublisher } from './application/ports';
import { UnitOfWork } from './application/uow/UnitOfWork';
import type { SessionFactory } from './domain/repository/IUnitOfWork';
import { type AppConfig, loadConfig } from './infrastructure/config/config';
import { createLogger } from './infrastructure/logging/logger';
import { RedisEventPublisher } from './infrastructure/messaging/RedisEventPublisher';
import { EmailNotifications } from './infrastructure/notifications/EmailNotifications';
import { initializeSchema, openDatabase } from './infrastructure/storage/sqlite/schema';
import { createSqliteSessionFactory } from './infrastructure/storage/sqlite/SqliteSession';

export interface BootstrapOptions {
  /**
   * Defaults to `loadConfig(process.env)`.
   */
  config?: AppConfig;
  logger?: ILogger;

  /**
   * Storage initialization run before the bus is built. Defaults to creating
   * the SQLite schema in `config.databasePath`; `false` skips it.
   */
  startStorage?: ((config: AppConfig) => void) | false;
  sessionFactory?: SessionFactory;
  notifications?: INotifications;
  publish?: IPublisher;
}

function startSqliteStorage(config: AppConfig): void {
  const db = openDatabase(config.databasePath);
  try {
    initializeSchema(db);
  } finally {
    db.close();
  }
}

/**
 * Build a ready-to-use message bus.
 *
 * Default notification and publish adapters are owned by the bus and
 * released by `bus.close()`; overrides stay with the caller.
 *
 * @throws {ConfigurationError} If no config is given and the environment is invalid
 * @throws {DependencyResolutionError} If a handler needs a missing capability
 *
 * @example
 * ```typescript
 * const store = new InMemoryStore();
 * const bus = bootstrap({
 *   startStorage: false,
 *   sessionFactory: store.sessionFactory,
 *   notifications: new FakeNotifications(),
 *   publish: new FakePublisher(),
 * });
 *
 * await bus.handle(new CreateBatch('b1', 'SKU1', 50));
 * ```
 */
export function bootstrap(options: BootstrapOptions = {}): MessageBus<AppDependencies> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger({ name: 'allocation', level: config.logLevel });

  const startStorage = options.startStorage ?? startSqliteStorage;
  if (startStorage) {
    startStorage(config);
  }

  const sessionFactory =
    options.sessionFactory ?? createSqliteSessionFactory({ filename: config.databasePath });

  const resources: ICloseable[] = [];

  let notifications = options.notifications;
  if (!notifications) {
    const email = new EmailNotifications({
      host: config.smtp.host,
      port: config.smtp.port,
      from: config.notificationsFrom,
    });
    resources.push(email);
    notifications = email;
  }

  let publish = options.publish;
  if (!publish) {
    const redis = RedisEventPublisher.fromUrl(config.redisUrl);
    resources.push(redis);
    publish = redis;
  }

  const dependencies = new DependencyRegistry<AppDependencies>({
    uow: new UnitOfWork(sessionFactory, logger),
    notifications,
    publish,
  });

  return new MessageBus({
    dependencies,
    handlers: createHandlerRegistries(),
    logger,
    resources,
  });
}
