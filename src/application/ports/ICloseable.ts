/**
 * allocation-core - Closeable port
 *
 * Implemented by adapters that hold a connection or pool.
 */

export interface ICloseable {
  close(): Promise<void>;
}
