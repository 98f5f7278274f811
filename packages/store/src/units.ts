/**
 * Supervised units wrapping the cache and the persistence connection.
 *
 * @module store/units
 */
import { logError, noopLogger, type Logger } from '@flagsync/shared/logger';
import type { FlagCache } from './flag-cache.js';
import type { NotificationBus, PersistentStore, SupervisedUnit, Unsubscribe } from './types.js';

export const CACHE_UNIT = 'cache';
export const PERSISTENCE_UNIT = 'persistence';

/**
 * Owns the cache's bus subscription.
 *
 * Starting empties the cache and subscribes it; a transport error on the
 * subscription crashes the unit, because messages may have been missed,
 * and the restart comes back with an empty cache.
 */
export class CacheUnit implements SupervisedUnit {
  readonly name = CACHE_UNIT;
  private unsubscribe: Unsubscribe | null = null;

  constructor(
    private readonly cache: FlagCache,
    private readonly bus: NotificationBus,
    private readonly nodeId: string,
  ) {}

  async start(crash: (err: unknown) => void): Promise<void> {
    this.cache.reset();
    this.unsubscribe = this.cache.attach(this.bus, this.nodeId, { onError: crash });
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.cache.reset();
  }
}

export interface PersistenceUnitOptions {
  /** Ping interval; `0` disables the health check. */
  healthCheckIntervalMs: number;
  logger?: Logger;
}

/**
 * Owns the persistent store connection: opens it on start, pings it on an
 * interval, and crashes when a ping fails so the supervisor reconnects.
 */
export class PersistenceUnit implements SupervisedUnit {
  readonly name = PERSISTENCE_UNIT;
  private timer: NodeJS.Timeout | null = null;
  private pinging = false;
  private readonly logger: Logger;

  constructor(
    private readonly store: PersistentStore,
    private readonly options: PersistenceUnitOptions,
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  async start(crash: (err: unknown) => void): Promise<void> {
    await this.store.open();
    this.logger.debug(`[PersistenceUnit] Opened ${this.store.kind} store`);

    if (this.options.healthCheckIntervalMs > 0) {
      this.timer = setInterval(() => this.healthCheck(crash), this.options.healthCheckIntervalMs);
      this.timer.unref();
    }
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.store.close();
  }

  private healthCheck(crash: (err: unknown) => void): void {
    if (this.pinging) return;
    this.pinging = true;
    void this.store
      .ping()
      .catch((err: unknown) => {
        this.logger.warn(`[PersistenceUnit] Health check failed for ${this.store.kind} store`, logError(err));
        crash(err);
      })
      .finally(() => {
        this.pinging = false;
      });
  }
}
