/**
 * In-process, TTL-bounded cache of flag state.
 *
 * Each entry moves through a small state machine:
 *
 *   Absent --fetch--> Fresh --ttl elapses--> Stale --read--> Fresh
 *   Fresh | Stale --invalidate--> Absent
 *
 * Reads of a Fresh entry do no I/O. Absent and Stale reads fetch from the
 * persistent store; concurrent misses for one key share a single fetch.
 * Every invalidation bumps a per-key generation (or the global epoch for
 * `invalidateAll`); a fetch overtaken by one still answers its callers but
 * does not populate the cache, so an invalidation is never undone by a
 * read that started before it. Generations are only kept for keys with a
 * fetch in flight.
 *
 * Each caller bounds its own wait with its own `timeoutMs`; the shared fetch
 * itself carries no timer.
 *
 * The TTL bounds staleness when invalidation messages are lost.
 *
 * @module store/flag-cache
 */
import { noopLogger, type Logger } from '@flagsync/shared/logger';
import { StoreError } from './errors.js';
import { emptyFlag } from './gates.js';
import { withTimeout } from './lib/with-timeout.js';
import type {
  CacheEntry,
  CacheGetOptions,
  CacheStats,
  FlagName,
  FlagState,
  InvalidationMessage,
  NotificationBus,
  PersistentStore,
  SubscribeOptions,
  Unsubscribe,
} from './types.js';

export interface FlagCacheOptions {
  store: PersistentStore;
  /** Maximum entry age in milliseconds. */
  ttlMs: number;
  logger?: Logger;
}

export class FlagCache {
  private readonly store: PersistentStore;
  private readonly ttlMs: number;
  private readonly logger: Logger;

  private readonly entries = new Map<FlagName, CacheEntry>();
  private readonly inflight = new Map<FlagName, Promise<FlagState>>();
  private readonly generations = new Map<FlagName, number>();
  /** Number of fetches still running per key, including abandoned ones. */
  private readonly fetching = new Map<FlagName, number>();
  private epoch = 0;

  private readonly counters: CacheStats = {
    hits: 0,
    misses: 0,
    fetches: 0,
    selfEchoesIgnored: 0,
    remoteInvalidations: 0,
  };

  constructor(options: FlagCacheOptions) {
    this.store = options.store;
    this.ttlMs = options.ttlMs;
    this.logger = options.logger ?? noopLogger;
  }

  // --- Reads ---

  /**
   * Return the flag, fetching it from the persistent store when the entry
   * is Absent or Stale. A flag the store does not know is cached as the
   * empty flag.
   *
   * A reader that joins a fetch already in flight still waits at most its
   * own `timeoutMs`. When a reader gives up on the shared fetch, that fetch
   * is abandoned: later readers start a new one, and its late result is
   * not cached.
   *
   * @throws {StoreError} when the fetch fails or exceeds `timeoutMs`; the
   *         entry is left as it was so a later call can retry.
   */
  async get(name: FlagName, options?: CacheGetOptions): Promise<FlagState> {
    const entry = this.entries.get(name);
    if (entry && this.isFresh(entry)) {
      this.counters.hits++;
      return entry.flag;
    }

    this.counters.misses++;
    const shared = this.inflight.get(name) ?? this.fetch(name);
    try {
      return await withTimeout(shared, options?.timeoutMs, `get '${name}'`);
    } catch (err) {
      if (err instanceof StoreError && err.code === 'TIMEOUT' && this.inflight.get(name) === shared) {
        this.inflight.delete(name);
        this.supersedeFetches(name);
      }
      throw err;
    }
  }

  /** Inspect an entry without fetching, whether Fresh or Stale. */
  peek(name: FlagName): CacheEntry | undefined {
    return this.entries.get(name);
  }

  /** Whether an entry is young enough to be served without I/O. */
  isFresh(entry: CacheEntry): boolean {
    return Date.now() - entry.cachedAt <= this.ttlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Number of keys holding fetch bookkeeping. Zero once every fetch has settled. */
  get trackedKeys(): number {
    return this.generations.size;
  }

  stats(): CacheStats {
    return { ...this.counters };
  }

  // --- Invalidation ---

  /** Drop one entry; in-flight fetches for it will not repopulate it. */
  invalidate(name: FlagName): void {
    this.entries.delete(name);
    this.inflight.delete(name);
    this.supersedeFetches(name);
  }

  /** Drop every entry; in-flight fetches will not repopulate anything. */
  invalidateAll(): void {
    this.entries.clear();
    this.inflight.clear();
    this.generations.clear();
    this.epoch++;
  }

  /** Return to the empty state a fresh instance starts in. */
  reset(): void {
    this.invalidateAll();
  }

  /** Apply an inbound invalidation message. */
  apply(message: InvalidationMessage): void {
    if (message.target.scope === 'all') {
      this.invalidateAll();
    } else {
      this.invalidate(message.target.flagName);
    }
  }

  /**
   * Subscribe to a notification bus and apply every invalidation that did
   * not originate from `nodeId`. The writer's own process already applied
   * its change on the write path.
   */
  attach(bus: NotificationBus, nodeId: string, options?: SubscribeOptions): Unsubscribe {
    return bus.subscribe((message) => {
      if (message.origin === nodeId) {
        this.counters.selfEchoesIgnored++;
        return;
      }
      this.counters.remoteInvalidations++;
      this.logger.debug('[FlagCache] Remote invalidation', {
        target: message.target.scope === 'all' ? '*' : message.target.flagName,
        origin: message.origin,
      });
      this.apply(message);
    }, options);
  }

  // --- Internal Helpers ---

  private fetch(name: FlagName): Promise<FlagState> {
    const generation = this.generationOf(name);
    const epoch = this.epoch;
    this.counters.fetches++;
    this.fetching.set(name, (this.fetching.get(name) ?? 0) + 1);

    const promise: Promise<FlagState> = this.store
      .get(name)
      .then((flag) => {
        const value = flag ?? emptyFlag(name);
        if (this.epoch === epoch && this.generationOf(name) === generation) {
          this.entries.set(name, { flag: value, cachedAt: Date.now() });
        }
        return value;
      })
      .finally(() => {
        if (this.inflight.get(name) === promise) {
          this.inflight.delete(name);
        }
        const remaining = (this.fetching.get(name) ?? 1) - 1;
        if (remaining > 0) {
          this.fetching.set(name, remaining);
        } else {
          this.fetching.delete(name);
          this.generations.delete(name);
        }
      });

    this.inflight.set(name, promise);
    return promise;
  }

  /** Stop every fetch running for `name` from populating the cache. */
  private supersedeFetches(name: FlagName): void {
    if (this.fetching.has(name)) {
      this.generations.set(name, this.generationOf(name) + 1);
    } else {
      this.generations.delete(name);
    }
  }

  private generationOf(name: FlagName): number {
    return this.generations.get(name) ?? 0;
  }
}
