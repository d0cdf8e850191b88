/**
 * allocation-core - Redis pub/sub publisher
 *
 * @module infrastructure/messaging/RedisEventPublisher
 */

import Redis from 'ioredis';

import type { ICloseable, IPublisher } from '../../application/ports';
import type { DomainEvent } from '../../domain/events/IDomainEvent';

/**
 * The subset of the ioredis client the publisher uses.
 */
export interface RedisPublishClient {
  publish(channel: string, message: string): Promise<number>;
  quit(): Promise<'OK'>;
}

/**
 * Publishes each event as JSON (`type`, `messageId`, `occurredAt` and the
 * payload fields) on the given channel.
 */
export class RedisEventPublisher implements IPublisher, ICloseable {
  constructor(private readonly client: RedisPublishClient) {}

  /**
   * Publisher on a lazily connecting client: no connection is made until
   * the first publish.
   */
  static fromUrl(url: string): RedisEventPublisher {
    return new RedisEventPublisher(new Redis(url, { lazyConnect: true }));
  }

  async publish(channel: string, event: DomainEvent): Promise<void> {
    await this.client.publish(channel, JSON.stringify(event));
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
