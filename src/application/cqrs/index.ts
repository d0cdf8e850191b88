/**
 * @fileoverview CQRS (Command Query Responsibility Segregation) Exports
 * @description
 * - Commands and their handler registrations (write side)
 * - Queries and query handlers (read side)
 *
 * @module application/cqrs
 */

// Command abstractions
export { CommandBase } from './ICommand';
export type { ICommand } from './ICommand';

// Handler abstractions
export { HandlerConfigurationError, onCommand, onEvent } from './IHandler';
export type {
  BoundHandler,
  HandlerDefinition,
  HandlerRegistration,
  HandlerRegistries,
  Message,
} from './IHandler';

// Query abstractions
export { QueryBase, QueryHandlerBase } from './IQuery';
export type { IQuery, IQueryHandler, QueryMetadata } from './IQuery';
