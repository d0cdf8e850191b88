export {
  ConcurrencyError,
  DomainException,
  InvalidBatchReference,
  InvalidSku,
  TransactionError,
} from './exceptions';
