/**
 * allocation-core - Event publisher port
 *
 * Capability injected under the name `publish`, used to announce domain
 * events to other processes. The production adapter uses Redis pub/sub.
 */

import type { DomainEvent } from '../../domain/events/IDomainEvent';

export interface IPublisher {
  /**
   * Publish an event on a named channel.
   */
  publish(channel: string, event: DomainEvent): Promise<void>;
}
