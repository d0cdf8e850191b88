export { UnitOfWork } from './UnitOfWork';
