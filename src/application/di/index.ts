/**
 * @module application/di
 * @description Capability registry used for handler dependency injection
 */

export { DependencyRegistry, DependencyResolutionError } from './IDependencyInjection';
