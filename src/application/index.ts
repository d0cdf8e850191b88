/**
 * @module application
 * @description Application layer exports
 */

// ============================================================================
// CQRS Pattern
// ============================================================================

export * from './cqrs';
export * from './commands';
export * from './queries';

// ============================================================================
// Dependency Injection
// ============================================================================

export * from './di';

// ============================================================================
// Handlers & Message Bus
// ============================================================================

export * from './handlers';
export * from './messagebus';
export * from './uow';

// ============================================================================
// Ports
// ============================================================================

export type { ILogger, INotifications, IPublisher, LogMetadata } from './ports';
