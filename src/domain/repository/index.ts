/**
 * @module domain/repository
 * @description Repository, store and Unit of Work contracts
 */

export { TrackingProductRepository } from './IRepository';
export type {
  AllocationRecord,
  AllocationView,
  IAllocationsViewStore,
  IProductRepository,
  IProductStore,
} from './IRepository';

export { IsolationLevel, TransactionState } from './IUnitOfWork';
export type {
  IUnitOfWork,
  SessionFactory,
  StorageSession,
  TransactionResult,
} from './IUnitOfWork';
