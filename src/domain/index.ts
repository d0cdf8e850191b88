/**
 * @module domain
 * @description Domain layer exports
 */

// ============================================================================
// Domain Events
// ============================================================================

export * from './events';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';

// ============================================================================
// Model
// ============================================================================

export * from './model';

// ============================================================================
// Repository Pattern
// ============================================================================

export * from './repository';
