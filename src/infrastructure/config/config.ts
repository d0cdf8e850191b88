/**
 * allocation-core - Environment configuration
 *
 * @module infrastructure/config/config
 */

import { z } from 'zod';

const envSchema = z.object({
  ALLOCATION_DB_PATH: z.string().min(1).default('./data/allocation.sqlite'),
  SMTP_HOST: z.string().min(1).default('localhost'),
  SMTP_PORT: z.coerce.number().int().positive().default(1025),
  NOTIFICATIONS_FROM: z.string().email().default('allocations@example.com'),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export type LogLevel = Env['LOG_LEVEL'];

export interface AppConfig {
  databasePath: string;
  smtp: {
    host: string;
    port: number;
  };
  notificationsFrom: string;
  redisUrl: string;
  logLevel: LogLevel;
}

/**
 * The environment failed validation.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly keys: readonly string[],
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Validate the environment and map it to the application configuration.
 *
 * @throws {ConfigurationError} Listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigurationError(`Invalid configuration: ${keys.join(', ')}`, keys);
  }

  const values = parsed.data;
  return {
    databasePath: values.ALLOCATION_DB_PATH,
    smtp: { host: values.SMTP_HOST, port: values.SMTP_PORT },
    notificationsFrom: values.NOTIFICATIONS_FROM,
    redisUrl: values.REDIS_URL,
    logLevel: values.LOG_LEVEL,
  };
}
