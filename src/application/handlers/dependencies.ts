/**
 * Capabilities available to allocation handlers, keyed by the names
 * handlers list in their `inject` declarations.
 *
 * @module application/handlers/dependencies
 */

import type { IUnitOfWork } from '../../domain/repository/IUnitOfWork';
import type { INotifications, IPublisher } from '../ports';

export interface AppDependencies {
  uow: IUnitOfWork;
  notifications: INotifications;
  publish: IPublisher;
}
