/**
 * allocation-core - pino-backed logger
 *
 * @module infrastructure/logging/logger
 */

import pino from 'pino';

import type { ILogger, LogMetadata } from '../../application/ports';
import type { LogLevel } from '../config/config';

export interface LoggerOptions {
  name: string;
  level?: LogLevel;

  /**
   * Destination stream; stdout when omitted.
   */
  destination?: pino.DestinationStream;
}

/**
 * Adapts a pino logger to the `ILogger` port.
 */
export class PinoLogger implements ILogger {
  constructor(private readonly logger: pino.Logger) {}

  debug(message: string, metadata: LogMetadata = {}): void {
    this.logger.debug(metadata, message);
  }

  info(message: string, metadata: LogMetadata = {}): void {
    this.logger.info(metadata, message);
  }

  warn(message: string, metadata: LogMetadata = {}): void {
    this.logger.warn(metadata, message);
  }

  error(message: string, error?: unknown, metadata: LogMetadata = {}): void {
    this.logger.error(error === undefined ? metadata : { ...metadata, err: error }, message);
  }

  /**
   * Logger with extra fields on every line.
   */
  child(bindings: LogMetadata): PinoLogger {
    return new PinoLogger(this.logger.child(bindings));
  }
}

export function createLogger(options: LoggerOptions): PinoLogger {
  const config: pino.LoggerOptions = {
    name: options.name,
    level: options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const logger = options.destination ? pino(config, options.destination) : pino(config);
  return new PinoLogger(logger);
}
