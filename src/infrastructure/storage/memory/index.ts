export {
  InMemoryAllocationsViewStore,
  InMemoryProductStore,
  InMemorySession,
  InMemoryStore,
} from './InMemorySession';
