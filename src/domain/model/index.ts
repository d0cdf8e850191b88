export { Batch, Product } from './Product';
export type { BatchSnapshot, OrderLine, ProductSnapshot } from './Product';
