/**
 * allocation-core - Port Module
 *
 * Capability interfaces implemented by infrastructure adapters
 */

export type { ICloseable } from './ICloseable';
export type { ILogger, LogMetadata } from './ILogger';
export type { INotifications } from './INotifications';
export type { IPublisher } from './IPublisher';
