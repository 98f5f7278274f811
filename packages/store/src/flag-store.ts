/**
 * The flag store facade: the single entry point for the evaluation and
 * admin layers.
 *
 * Reads go through the cache when caching is enabled and the cache unit is
 * running, and straight to the persistent store otherwise. Writes persist
 * first; only after the store accepts a write does the facade invalidate
 * the local cache entry and, when change notifications are enabled,
 * broadcast an invalidation tagged with this node's identity. A rejected
 * write has no side effects.
 *
 * @module store/flag-store
 */
import {
  areChangeNotificationsEnabled,
  isCacheEnabled,
  type FlagStoreConfig,
} from '@flagsync/shared/config-schema';
import { FlagNameSchema, GateSchema } from '@flagsync/shared/flag-schemas';
import { logError, noopLogger, type Logger } from '@flagsync/shared/logger';
import { InvalidFlagError, toStoreError } from './errors.js';
import { FlagCache } from './flag-cache.js';
import { emptyFlag } from './gates.js';
import { createNodeId } from './identity.js';
import { withTimeout } from './lib/with-timeout.js';
import { Supervisor } from './supervisor.js';
import { CACHE_UNIT, CacheUnit, PersistenceUnit } from './units.js';
import type {
  FlagName,
  FlagState,
  FlagStoreStats,
  Gate,
  InvalidationTarget,
  LookupOptions,
  NotificationBus,
  PersistentStore,
  SupervisedUnit,
  UnitStatus,
} from './types.js';

export interface FlagStoreOptions {
  config: FlagStoreConfig;
  store: PersistentStore;
  bus: NotificationBus;
  /** Defaults to a freshly generated identity. */
  nodeId?: string;
  logger?: Logger;
}

export class FlagStore {
  readonly nodeId: string;
  private readonly config: FlagStoreConfig;
  private readonly store: PersistentStore;
  private readonly bus: NotificationBus;
  private readonly logger: Logger;
  private readonly cache: FlagCache | null;
  private readonly notificationsEnabled: boolean;
  private readonly supervisor: Supervisor;
  private readonly pendingPublishes = new Set<Promise<void>>();
  private readonly counters = { publishes: 0, publishFailures: 0, failClosedLookups: 0 };

  constructor(options: FlagStoreOptions) {
    this.config = options.config;
    this.store = options.store;
    this.bus = options.bus;
    this.nodeId = options.nodeId ?? createNodeId();
    this.logger = options.logger ?? noopLogger;
    this.notificationsEnabled = areChangeNotificationsEnabled(this.config);

    this.cache = isCacheEnabled(this.config)
      ? new FlagCache({
          store: this.store,
          ttlMs: this.config.cache.ttlSeconds * 1000,
          logger: this.logger,
        })
      : null;

    const units: SupervisedUnit[] = [
      new PersistenceUnit(this.store, {
        healthCheckIntervalMs: this.config.supervisor.healthCheckIntervalMs,
        logger: this.logger,
      }),
    ];
    if (this.cache) {
      units.push(new CacheUnit(this.cache, this.bus, this.nodeId));
    }
    this.supervisor = new Supervisor(units, this.config.supervisor, this.logger);
  }

  // --- Lifecycle ---

  async start(): Promise<void> {
    this.logger.info('[FlagStore] Starting', {
      nodeId: this.nodeId,
      persistence: this.store.kind,
      notifications: this.notificationsEnabled ? this.bus.kind : 'disabled',
      cacheTtlSeconds: this.cache ? this.config.cache.ttlSeconds : 0,
    });
    await this.supervisor.start();
  }

  /** Flush pending publishes, stop every unit, and close the bus. */
  async stop(): Promise<void> {
    await this.drain();
    await this.supervisor.stop();
    await this.bus.close();
  }

  /** Wait for every in-flight invalidation publish to settle. */
  async drain(): Promise<void> {
    while (this.pendingPublishes.size > 0) {
      await Promise.all([...this.pendingPublishes]);
    }
  }

  // --- Reads ---

  /**
   * Look up a flag. A flag that was never written comes back as the empty
   * (disabled) flag.
   *
   * When the store fails or times out, the lookup fails closed and returns
   * the empty flag, unless `strict` is set, in which case the
   * {@link StoreError} propagates.
   */
  async lookup(name: FlagName, options?: LookupOptions): Promise<FlagState> {
    const strict = options?.strict ?? this.config.lookup.strict;
    const timeoutMs = options?.timeoutMs ?? this.config.lookup.timeoutMs;

    try {
      if (this.cache && this.supervisor.isRunning(CACHE_UNIT)) {
        return await this.cache.get(name, { timeoutMs });
      }
      const flag = await withTimeout(this.store.get(name), timeoutMs, `get '${name}'`);
      return flag ?? emptyFlag(name);
    } catch (err) {
      const storeError = toStoreError(err, 'lookup');
      if (strict) throw storeError;

      this.counters.failClosedLookups++;
      this.logger.warn(`[FlagStore] Lookup of '${name}' failed, treating flag as disabled`, {
        code: storeError.code,
        ...logError(storeError),
      });
      return emptyFlag(name);
    }
  }

  /** Every stored flag, read straight from the persistent store. */
  all(): AsyncIterable<FlagState> {
    return this.store.getAll();
  }

  async allFlagNames(): Promise<FlagName[]> {
    return this.store.allFlagNames();
  }

  // --- Writes ---

  /**
   * Set a gate on a flag and return the flag as stored.
   *
   * @throws {StoreError} when the store rejects the write; nothing else changes.
   * @throws {InvalidFlagError} when the name or gate is malformed.
   */
  async write(name: FlagName, gate: Gate): Promise<FlagState> {
    assertValid(name, gate);
    const flag = await this.store.put(name, gate);
    this.changed({ scope: 'flag', flagName: name });
    return flag;
  }

  /** Remove the gate occupying `gate`'s slot and return the flag as stored. */
  async clear(name: FlagName, gate: Gate): Promise<FlagState> {
    assertValid(name, gate);
    const flag = await this.store.delete(name, gate);
    this.changed({ scope: 'flag', flagName: name });
    return flag;
  }

  /** Remove every gate of a flag. */
  async clearFlag(name: FlagName): Promise<void> {
    assertValid(name);
    await this.store.deleteFlag(name);
    this.changed({ scope: 'flag', flagName: name });
  }

  /** Empty this node's cache and tell every other node to empty theirs. */
  purgeCaches(): void {
    this.changed({ scope: 'all' });
  }

  // --- Capabilities & Diagnostics ---

  isCacheEnabled(): boolean {
    return this.cache !== null;
  }

  areChangeNotificationsEnabled(): boolean {
    return this.notificationsEnabled;
  }

  stats(): FlagStoreStats {
    const cacheStats = this.cache?.stats() ?? {
      hits: 0,
      misses: 0,
      fetches: 0,
      selfEchoesIgnored: 0,
      remoteInvalidations: 0,
    };
    return { ...cacheStats, ...this.counters };
  }

  status(): UnitStatus[] {
    return this.supervisor.status();
  }

  // --- Internal Helpers ---

  /**
   * Apply a committed change locally, then broadcast it. The local cache is
   * updated synchronously so the writer reads its own write; the publish is
   * fire-and-forget.
   */
  private changed(target: InvalidationTarget): void {
    if (this.cache) {
      if (target.scope === 'all') {
        this.cache.invalidateAll();
      } else {
        this.cache.invalidate(target.flagName);
      }
    }

    if (this.notificationsEnabled) {
      this.publish(target);
    }
  }

  private publish(target: InvalidationTarget): void {
    const message = { target, origin: this.nodeId, sentAt: new Date().toISOString() };

    const pending: Promise<void> = Promise.resolve()
      .then(() => this.bus.publish(message))
      .then(
        () => {
          this.counters.publishes++;
        },
        (err: unknown) => {
          this.counters.publishFailures++;
          this.logger.warn(`[FlagStore] Invalidation publish via ${this.bus.kind} failed`, {
            target,
            ...logError(err),
          });
        },
      )
      .finally(() => {
        this.pendingPublishes.delete(pending);
      });

    this.pendingPublishes.add(pending);
  }
}

function assertValid(name: FlagName, gate?: Gate): void {
  const issues: string[] = [];

  const nameResult = FlagNameSchema.safeParse(name);
  if (!nameResult.success) {
    issues.push(...nameResult.error.issues.map((i) => `name: ${i.message}`));
  }
  if (gate !== undefined) {
    const gateResult = GateSchema.safeParse(gate);
    if (!gateResult.success) {
      issues.push(...gateResult.error.issues.map((i) => `gate.${i.path.join('.')}: ${i.message}`));
    }
  }

  if (issues.length > 0) {
    throw new InvalidFlagError(`Invalid flag input: ${issues.join('; ')}`, issues);
  }
}
