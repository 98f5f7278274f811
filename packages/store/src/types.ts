/**
 * Internal type definitions for the @flagsync/store package.
 *
 * Flag and message shapes come from @flagsync/shared/flag-schemas and are
 * re-exported here so every module imports its types from one place.
 *
 * @module store/types
 */
import type {
  FlagName,
  FlagState,
  Gate,
  InvalidationMessage,
  InvalidationTarget,
} from '@flagsync/shared/flag-schemas';

export type { FlagName, FlagState, Gate, InvalidationMessage, InvalidationTarget };

export type Unsubscribe = () => void;

// === Persistence ===

/**
 * Durable source of truth for flag state.
 *
 * Adapters surface failures as {@link StoreError} and never retry; retry
 * policy belongs to the caller.
 */
export interface PersistentStore {
  /** Adapter identifier used in logs (`sqlite`, `file`, `memory`). */
  readonly kind: string;

  /** Read one flag. `null` means the flag has never been written. */
  get(name: FlagName): Promise<FlagState | null>;
  /** Upsert a gate and return the resulting flag. */
  put(name: FlagName, gate: Gate): Promise<FlagState>;
  /** Remove the gate matching `gate` and return the resulting flag. */
  delete(name: FlagName, gate: Gate): Promise<FlagState>;
  /** Remove every gate of a flag. */
  deleteFlag(name: FlagName): Promise<void>;
  /**
   * Lazily yield every stored flag. Each iteration starts a fresh scan, so
   * the returned iterable can be consumed more than once.
   */
  getAll(): AsyncIterable<FlagState>;
  allFlagNames(): Promise<FlagName[]>;

  open(): Promise<void>;
  close(): Promise<void>;
  /** Cheap round-trip used by the persistence unit's health check. */
  ping(): Promise<void>;
}

// === Notifications ===

export type InvalidationHandler = (message: InvalidationMessage) => void;

export interface SubscribeOptions {
  /** Called when the transport fails and messages may have been missed. */
  onError?: (err: unknown) => void;
}

/**
 * Best-effort broadcast channel shared by every process of the fleet.
 *
 * Subscribers receive every message, including the ones their own process
 * published; filtering by origin is the subscriber's job.
 */
export interface NotificationBus {
  readonly kind: string;
  publish(message: InvalidationMessage): Promise<void>;
  subscribe(handler: InvalidationHandler, options?: SubscribeOptions): Unsubscribe;
  close(): Promise<void>;
}

// === Cache ===

export interface CacheEntry {
  flag: FlagState;
  /** Unix timestamp (ms) of the fetch that produced this entry. */
  cachedAt: number;
}

export interface CacheGetOptions {
  /** Upper bound on the persistent fetch. Omit for no bound. */
  timeoutMs?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  fetches: number;
  selfEchoesIgnored: number;
  remoteInvalidations: number;
}

// === Facade ===

export interface LookupOptions {
  /** Propagate store errors instead of failing closed. */
  strict?: boolean;
  timeoutMs?: number;
}

export interface FlagStoreStats extends CacheStats {
  publishes: number;
  publishFailures: number;
  failClosedLookups: number;
}

// === Supervision ===

export type UnitState = 'stopped' | 'running' | 'restarting' | 'failed';

/** A restartable unit of work run by the {@link Supervisor}. */
export interface SupervisedUnit {
  readonly name: string;
  /**
   * Start the unit. The unit calls `crash` whenever it detects a failure it
   * cannot recover from in place; the supervisor then restarts it.
   */
  start(crash: (err: unknown) => void): Promise<void>;
  stop(): Promise<void>;
}

export interface UnitStatus {
  name: string;
  state: UnitState;
  restarts: number;
  lastError?: string;
}

export interface SupervisorOptions {
  /** Restarts tolerated within `windowMs` before a unit is marked failed. */
  maxRestarts: number;
  windowMs: number;
  /** Pause before each restart attempt. */
  restartDelayMs: number;
}
