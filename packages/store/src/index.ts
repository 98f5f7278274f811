/**
 * @flagsync/store -- Feature-toggle store with a distributed cache.
 *
 * Provides a TTL-bounded in-process cache, pluggable persistence (SQLite,
 * file documents, memory), pluggable invalidation broadcast (shared
 * directory, in-process), and a one-for-one supervisor for the cache and
 * persistence units.
 *
 * @module store
 */

// Main entry point
export { FlagStore } from './flag-store.js';
export type { FlagStoreOptions } from './flag-store.js';
export { createFlagStore, createPersistentStore, createNotificationBus } from './create-flag-store.js';
export type { CreateFlagStoreOptions } from './create-flag-store.js';

// Sub-modules (for advanced usage)
export { FlagCache } from './flag-cache.js';
export type { FlagCacheOptions } from './flag-cache.js';
export { Supervisor, DEFAULT_SUPERVISOR_OPTIONS } from './supervisor.js';
export { CacheUnit, PersistenceUnit, CACHE_UNIT, PERSISTENCE_UNIT } from './units.js';
export { MemoryStore } from './persistent/memory-store.js';
export { SqliteStore } from './persistent/sqlite-store.js';
export type { SqliteStoreOptions } from './persistent/sqlite-store.js';
export { FileStore, flagKey } from './persistent/file-store.js';
export type { FileStoreOptions } from './persistent/file-store.js';
export { LocalBus, LocalChannel } from './notifications/local-bus.js';
export { MaildirBus } from './notifications/maildir-bus.js';
export type { MaildirBusOptions } from './notifications/maildir-bus.js';
export { NoopBus } from './notifications/noop-bus.js';
export { createNodeId } from './identity.js';

// Errors
export { StoreError, NotificationError, InvalidFlagError } from './errors.js';
export type { StoreErrorCode } from './errors.js';

// Pure functions
export { emptyFlag, sameSlot, sortGates, withGate, withoutGate } from './gates.js';

// Types
export type {
  FlagName,
  FlagState,
  Gate,
  InvalidationMessage,
  InvalidationTarget,
  PersistentStore,
  NotificationBus,
  InvalidationHandler,
  SubscribeOptions,
  Unsubscribe,
  CacheEntry,
  CacheGetOptions,
  CacheStats,
  LookupOptions,
  FlagStoreStats,
  SupervisedUnit,
  SupervisorOptions,
  UnitState,
  UnitStatus,
} from './types.js';
