/**
 * allocation-core - Logger port
 *
 * Minimal structured logger required by the message bus, the Unit of Work
 * and the query handlers. The production adapter is pino-backed
 * (see `infrastructure/logging`); tests pass recording fakes.
 */

/**
 * Structured fields attached to a log line.
 */
export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;

  /**
   * Log an error. The error object is kept separate from the metadata so
   * adapters can serialize its stack.
   */
  error(message: string, error?: unknown, metadata?: LogMetadata): void;
}
