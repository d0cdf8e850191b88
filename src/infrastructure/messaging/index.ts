export { RedisEventPublisher } from './RedisEventPublisher';
export type { RedisPublishClient } from './RedisEventPublisher';
