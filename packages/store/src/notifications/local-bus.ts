/**
 * In-process notification bus.
 *
 * Wraps Node.js `EventEmitter`. Every {@link LocalBus} attached to the same
 * {@link LocalChannel} sees every message published on it, which lets several
 * flag stores in one process (or one test) behave like a small fleet.
 *
 * @module store/notifications/local-bus
 */
import { EventEmitter } from 'node:events';
import { InvalidationMessageSchema } from '@flagsync/shared/flag-schemas';
import { NotificationError } from '../errors.js';
import type {
  InvalidationHandler,
  InvalidationMessage,
  NotificationBus,
  SubscribeOptions,
  Unsubscribe,
} from '../types.js';

/** Internal event name used for all invalidation messages. */
const MESSAGE_EVENT = '__flag_invalidation__';

/** Reasonable max-listener cap to avoid memory leaks without being too restrictive. */
const MAX_LISTENERS = 100;

/** A broadcast medium shared by every {@link LocalBus} created on it. */
export class LocalChannel {
  readonly ee = new EventEmitter();

  constructor() {
    this.ee.setMaxListeners(MAX_LISTENERS);
  }

  /** Number of listeners currently attached across all buses. */
  get listenerCount(): number {
    return this.ee.listenerCount(MESSAGE_EVENT);
  }
}

export class LocalBus implements NotificationBus {
  readonly kind = 'local';
  private readonly listeners = new Set<(message: InvalidationMessage) => void>();
  private closed = false;

  constructor(private readonly channel: LocalChannel = new LocalChannel()) {}

  /**
   * Broadcast a message to every subscriber on the channel.
   *
   * Subscribers receive a serialized copy, the same as they would from a
   * remote transport, so no object is shared between publisher and receiver.
   */
  async publish(message: InvalidationMessage): Promise<void> {
    if (this.closed) {
      throw new NotificationError('local bus is closed');
    }
    const copy = InvalidationMessageSchema.parse(JSON.parse(JSON.stringify(message)));
    this.channel.ee.emit(MESSAGE_EVENT, copy);
  }

  subscribe(handler: InvalidationHandler, _options?: SubscribeOptions): Unsubscribe {
    const listener = (message: InvalidationMessage): void => handler(message);
    this.listeners.add(listener);
    this.channel.ee.on(MESSAGE_EVENT, listener);

    return () => {
      if (this.listeners.delete(listener)) {
        this.channel.ee.removeListener(MESSAGE_EVENT, listener);
      }
    };
  }

  /** Detach every subscription made through this bus. */
  async close(): Promise<void> {
    this.closed = true;
    for (const listener of this.listeners) {
      this.channel.ee.removeListener(MESSAGE_EVENT, listener);
    }
    this.listeners.clear();
  }
}
