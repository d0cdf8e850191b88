export { MessageBus } from './MessageBus';
export type { BusDependencies, MessageBusOptions } from './MessageBus';
