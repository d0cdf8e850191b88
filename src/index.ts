/**
 * @fileoverview allocation-core
 * @description
 * Application core of a stock allocation service: an in-process message
 * bus dispatching commands and domain events, a transactional Unit of Work,
 * declarative handler dependency injection and a denormalized read model
 * kept in sync by event handlers.
 *
 * @packageDocumentation
 * @module allocation-core
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';

// ============================================================================
// COMPOSITION ROOT
// ============================================================================

export { bootstrap } from './bootstrap';
export type { BootstrapOptions } from './bootstrap';
