import type { InvalidationMessage, NotificationBus, Unsubscribe } from '../types.js';

/** Bus used when change notifications are disabled. Publishes go nowhere. */
export class NoopBus implements NotificationBus {
  readonly kind = 'noop';

  async publish(_message: InvalidationMessage): Promise<void> {}

  subscribe(): Unsubscribe {
    return () => {};
  }

  async close(): Promise<void> {}
}
