export { Allocate, ChangeBatchQuantity, CreateBatch } from './commands';
