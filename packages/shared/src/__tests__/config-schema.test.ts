import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  FLAG_STORE_CONFIG_DEFAULTS,
  areChangeNotificationsEnabled,
  isCacheEnabled,
  parseConfig,
} from '../config-schema.js';

function captureConfigError(input: unknown): ConfigError {
  try {
    parseConfig(input);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected parseConfig to throw');
}

describe('parseConfig defaults', () => {
  it('fills every section when given an empty object', () => {
    const config = parseConfig({});

    expect(config.cache).toEqual({ enabled: true, ttlSeconds: 60 });
    expect(config.persistence).toEqual({ adapter: 'memory' });
    expect(config.notifications).toEqual({
      enabled: true,
      adapter: null,
      dataDir: null,
      retentionMs: 300_000,
    });
    expect(config.lookup).toEqual({ strict: false, timeoutMs: 5000 });
    expect(config.supervisor).toEqual({
      maxRestarts: 3,
      windowMs: 5000,
      restartDelayMs: 1000,
      healthCheckIntervalMs: 30_000,
    });
    expect(config.logging).toEqual({ level: 'info' });
  });

  it('treats undefined input as an empty object', () => {
    expect(parseConfig(undefined)).toEqual(FLAG_STORE_CONFIG_DEFAULTS);
  });

  it('defaults the sqlite table name to flag_toggles', () => {
    const config = parseConfig({ persistence: { adapter: 'sqlite', dbPath: '/tmp/flags.db' } });
    expect(config.persistence).toEqual({
      adapter: 'sqlite',
      dbPath: '/tmp/flags.db',
      tableName: 'flag_toggles',
    });
  });

  it('keeps partial overrides and defaults the rest of the section', () => {
    const config = parseConfig({ cache: { ttlSeconds: 3600 } });
    expect(config.cache).toEqual({ enabled: true, ttlSeconds: 3600 });
  });
});

describe('parseConfig validation', () => {
  it('requires dataDir for the maildir adapter', () => {
    const err = captureConfigError({ notifications: { adapter: 'maildir' } });
    expect(err.issues).toEqual(['notifications.dataDir: dataDir is required for the maildir adapter']);
  });

  it('accepts the maildir adapter with a dataDir', () => {
    const config = parseConfig({ notifications: { adapter: 'maildir', dataDir: '/var/run/flags' } });
    expect(config.notifications.adapter).toBe('maildir');
    expect(config.notifications.dataDir).toBe('/var/run/flags');
  });

  it('rejects a negative TTL', () => {
    const err = captureConfigError({ cache: { ttlSeconds: -1 } });
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0].startsWith('cache.ttlSeconds: ')).toBe(true);
  });

  it('rejects a table name that is not a plain identifier', () => {
    const err = captureConfigError({
      persistence: { adapter: 'sqlite', dbPath: '/tmp/flags.db', tableName: 'flags; DROP TABLE x' },
    });
    expect(err.issues).toEqual(['persistence.tableName: must be a plain SQL identifier']);
  });

  it('rejects an unknown persistence adapter', () => {
    expect(() => parseConfig({ persistence: { adapter: 'mongo' } })).toThrow(ConfigError);
  });

  it('names the error class', () => {
    expect(captureConfigError({ lookup: { timeoutMs: 0 } }).name).toBe('ConfigError');
  });
});

describe('isCacheEnabled', () => {
  it('is true by default', () => {
    expect(isCacheEnabled(parseConfig({}))).toBe(true);
  });

  it('is false when the cache is switched off', () => {
    expect(isCacheEnabled(parseConfig({ cache: { enabled: false } }))).toBe(false);
  });

  it('is false when the TTL is zero', () => {
    expect(isCacheEnabled(parseConfig({ cache: { ttlSeconds: 0 } }))).toBe(false);
  });
});

describe('areChangeNotificationsEnabled', () => {
  it('is true with caching on and an adapter configured', () => {
    expect(areChangeNotificationsEnabled(parseConfig({ notifications: { adapter: 'local' } }))).toBe(true);
  });

  it('is false when no adapter is configured', () => {
    expect(areChangeNotificationsEnabled(parseConfig({}))).toBe(false);
  });

  it('is false when the cache is disabled', () => {
    const config = parseConfig({ cache: { enabled: false }, notifications: { adapter: 'local' } });
    expect(areChangeNotificationsEnabled(config)).toBe(false);
  });

  it('is false when explicitly disabled', () => {
    const config = parseConfig({ notifications: { enabled: false, adapter: 'local' } });
    expect(areChangeNotificationsEnabled(config)).toBe(false);
  });
});
