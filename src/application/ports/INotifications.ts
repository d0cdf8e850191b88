/**
 * allocation-core - Notifications port
 *
 * Capability injected under the name `notifications`. Adapters: SMTP email
 * in production, in-process fakes in tests.
 *
 * @example
 * ```typescript
 * class FakeNotifications implements INotifications {
 *   readonly sent = new Map<string, string[]>();
 *
 *   async send(destination: string, message: string): Promise<void> {
 *     this.sent.set(destination, [...(this.sent.get(destination) ?? []), message]);
 *   }
 * }
 * ```
 */
export interface INotifications {
  /**
   * Deliver a human-readable message to a destination (e.g. an email
   * address). Failures surface as adapter-specific errors.
   */
  send(destination: string, message: string): Promise<void>;
}
