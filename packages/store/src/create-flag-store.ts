/**
 * Boot-time wiring: parse configuration once and build the facade with the
 * adapters it selects.
 *
 * @module store/create-flag-store
 */
import {
  ConfigError,
  areChangeNotificationsEnabled,
  parseConfig,
  type FlagStoreConfig,
  type PersistenceConfig,
} from '@flagsync/shared/config-schema';
import { createLogger, type Logger } from '@flagsync/shared/logger';
import { FlagStore } from './flag-store.js';
import { LocalBus, LocalChannel } from './notifications/local-bus.js';
import { MaildirBus } from './notifications/maildir-bus.js';
import { NoopBus } from './notifications/noop-bus.js';
import { FileStore } from './persistent/file-store.js';
import { MemoryStore } from './persistent/memory-store.js';
import { SqliteStore } from './persistent/sqlite-store.js';
import type { NotificationBus, PersistentStore } from './types.js';

export interface CreateFlagStoreOptions {
  /** Defaults to a consola logger at the configured level. */
  logger?: Logger;
  nodeId?: string;
  /** Channel shared by `local` buses; one is created when omitted. */
  channel?: LocalChannel;
}

/**
 * Build a {@link FlagStore} from raw configuration.
 *
 * The returned store is not started; call `start()` before use.
 *
 * @throws {ConfigError} when the configuration is invalid
 */
export function createFlagStore(rawConfig: unknown, options: CreateFlagStoreOptions = {}): FlagStore {
  const config = parseConfig(rawConfig);
  const logger = options.logger ?? createLogger({ level: config.logging.level, tag: 'flagsync' });

  return new FlagStore({
    config,
    store: createPersistentStore(config.persistence, logger),
    bus: createNotificationBus(config, logger, options.channel),
    nodeId: options.nodeId,
    logger,
  });
}

/** Instantiate the configured persistence adapter. */
export function createPersistentStore(config: PersistenceConfig, logger: Logger): PersistentStore {
  switch (config.adapter) {
    case 'memory':
      return new MemoryStore();
    case 'sqlite':
      return new SqliteStore({ dbPath: config.dbPath, tableName: config.tableName, logger });
    case 'file':
      return new FileStore({ dataDir: config.dataDir });
  }
}

/** Instantiate the configured notification adapter, or a no-op bus when notifications are off. */
export function createNotificationBus(
  config: FlagStoreConfig,
  logger: Logger,
  channel?: LocalChannel,
): NotificationBus {
  if (!areChangeNotificationsEnabled(config)) return new NoopBus();

  const notifications = config.notifications;
  switch (notifications.adapter) {
    case 'maildir':
      if (notifications.dataDir === null) {
        throw new ConfigError('notifications.dataDir is required for the maildir adapter', [
          'notifications.dataDir: Required',
        ]);
      }
      return new MaildirBus({
        rootDir: notifications.dataDir,
        retentionMs: notifications.retentionMs,
        logger,
      });
    case 'local':
      return new LocalBus(channel ?? new LocalChannel());
    case null:
      return new NoopBus();
  }
}
