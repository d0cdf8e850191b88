/**
 * @fileoverview Unit tests for environment configuration
 */

import { ConfigurationError, loadConfig } from '../../../src';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      databasePath: './data/allocation.sqlite',
      smtp: { host: 'localhost', port: 1025 },
      notificationsFrom: 'allocations@example.com',
      redisUrl: 'redis://localhost:6379',
      logLevel: 'info',
    });
  });

  it('should read and coerce provided values', () => {
    const config = loadConfig({
      ALLOCATION_DB_PATH: '/var/lib/allocation/db.sqlite',
      SMTP_HOST: 'mail.internal',
      SMTP_PORT: '2525',
      REDIS_URL: 'redis://cache:6380',
      LOG_LEVEL: 'debug',
    });

    expect(config.databasePath).toBe('/var/lib/allocation/db.sqlite');
    expect(config.smtp).toEqual({ host: 'mail.internal', port: 2525 });
    expect(config.redisUrl).toBe('redis://cache:6380');
    expect(config.logLevel).toBe('debug');
  });

  it('should list every invalid key', () => {
    let caught: unknown;
    try {
      loadConfig({ REDIS_URL: 'not a url', LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.keys).toEqual(['REDIS_URL', 'LOG_LEVEL']);
    expect(caught instanceof Error && caught.message).toBe('Invalid configuration: REDIS_URL, LOG_LEVEL');
  });

  it('should reject a non-numeric SMTP port', () => {
    expect(() => loadConfig({ SMTP_PORT: 'twenty-five' })).toThrow(ConfigurationError);
  });
});
