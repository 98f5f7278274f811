import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import Database from 'better-sqlite3';
import { SqliteStore } from '../persistent/sqlite-store.js';
import type { FlagState, Gate } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ENABLED: Gate = { type: 'boolean', enabled: true };

async function collect(iterable: AsyncIterable<FlagState>): Promise<FlagState[]> {
  const flags: FlagState[] = [];
  for await (const flag of iterable) flags.push(flag);
  return flags;
}

let tmpDir: string;
let dbPath: string;
let store: SqliteStore;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'flagsync-sqlite-test-'));
  dbPath = path.join(tmpDir, 'flags.db');
  store = new SqliteStore({ dbPath });
  await store.open();
});

afterEach(async () => {
  await store.close();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe('SqliteStore lifecycle', () => {
  it('uses WAL journal mode', () => {
    expect(store.isWalMode()).toBe(true);
  });

  it('answers pings while open', async () => {
    await expect(store.ping()).resolves.toBeUndefined();
  });

  it('rejects operations once closed', async () => {
    await store.close();

    await expect(store.get('dark_mode')).rejects.toMatchObject({
      name: 'StoreError',
      code: 'NOT_OPEN',
    });
    await expect(store.ping()).rejects.toMatchObject({ code: 'NOT_OPEN' });
  });

  it('keeps flags across reopen', async () => {
    await store.put('dark_mode', ENABLED);
    await store.close();

    const reopened = new SqliteStore({ dbPath });
    await reopened.open();
    expect(await reopened.get('dark_mode')).toEqual({ name: 'dark_mode', gates: [ENABLED] });
    await reopened.close();
  });

  it('reports an unusable database path as unavailable', async () => {
    const broken = new SqliteStore({ dbPath: path.join(tmpDir, 'missing', 'nested', 'flags.db') });

    await expect(broken.open()).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
  });

  it('uses the configured table name', async () => {
    const custom = new SqliteStore({ dbPath: path.join(tmpDir, 'custom.db'), tableName: 'feature_flags' });
    await custom.open();
    await custom.put('dark_mode', ENABLED);
    await custom.close();

    const db = new Database(path.join(tmpDir, 'custom.db'));
    const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM feature_flags').get();
    db.close();
    expect(row?.count).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Reads and writes
// ---------------------------------------------------------------------------

describe('SqliteStore get/put', () => {
  it('returns null for an unknown flag', async () => {
    expect(await store.get('never_written')).toBeNull();
  });

  it('replaces the boolean gate on a second put', async () => {
    await store.put('dark_mode', ENABLED);
    const flag = await store.put('dark_mode', { type: 'boolean', enabled: false });

    expect(flag).toEqual({ name: 'dark_mode', gates: [{ type: 'boolean', enabled: false }] });
    expect(await store.get('dark_mode')).toEqual(flag);
  });

  it('keeps one gate per actor and group target in canonical order', async () => {
    await store.put('checkout_v2', { type: 'group', for: 'beta', enabled: true });
    await store.put('checkout_v2', { type: 'actor', for: 'user:2', enabled: true });
    await store.put('checkout_v2', { type: 'actor', for: 'user:1', enabled: false });
    await store.put('checkout_v2', ENABLED);

    expect(await store.get('checkout_v2')).toEqual({
      name: 'checkout_v2',
      gates: [
        ENABLED,
        { type: 'actor', for: 'user:1', enabled: false },
        { type: 'actor', for: 'user:2', enabled: true },
        { type: 'group', for: 'beta', enabled: true },
      ],
    });
  });

  it('holds at most one percentage gate', async () => {
    await store.put('rollout', { type: 'percentage_of_time', for: 0.25 });
    const flag = await store.put('rollout', { type: 'percentage_of_actors', for: 0.1 });

    expect(flag).toEqual({ name: 'rollout', gates: [{ type: 'percentage_of_actors', for: 0.1 }] });
  });

  it('skips rows it cannot decode', async () => {
    await store.put('dark_mode', ENABLED);
    const db = new Database(dbPath);
    db.prepare(
      `INSERT INTO flag_toggles (flag_name, gate_type, target, enabled) VALUES ('dark_mode', 'percentage', 'time/abc', 1)`,
    ).run();
    db.close();

    expect(await store.get('dark_mode')).toEqual({ name: 'dark_mode', gates: [ENABLED] });
  });
});

describe('SqliteStore delete', () => {
  it('removes only the matching gate', async () => {
    await store.put('checkout_v2', ENABLED);
    await store.put('checkout_v2', { type: 'actor', for: 'user:1', enabled: true });

    const flag = await store.delete('checkout_v2', { type: 'actor', for: 'user:1', enabled: false });

    expect(flag).toEqual({ name: 'checkout_v2', gates: [ENABLED] });
  });

  it('removes the percentage gate whichever kind is named', async () => {
    await store.put('rollout', ENABLED);
    await store.put('rollout', { type: 'percentage_of_time', for: 0.5 });

    const flag = await store.delete('rollout', { type: 'percentage_of_actors', for: 0.5 });

    expect(flag).toEqual({ name: 'rollout', gates: [ENABLED] });
  });

  it('returns the empty flag after the last gate is removed', async () => {
    await store.put('dark_mode', ENABLED);

    expect(await store.delete('dark_mode', ENABLED)).toEqual({ name: 'dark_mode', gates: [] });
    expect(await store.get('dark_mode')).toBeNull();
  });

  it('deleteFlag removes every gate', async () => {
    await store.put('checkout_v2', ENABLED);
    await store.put('checkout_v2', { type: 'group', for: 'beta', enabled: true });

    await store.deleteFlag('checkout_v2');

    expect(await store.get('checkout_v2')).toBeNull();
  });
});

describe('SqliteStore scans', () => {
  it('lists distinct flag names in order', async () => {
    await store.put('dark_mode', ENABLED);
    await store.put('beta_banner', ENABLED);
    await store.put('beta_banner', { type: 'actor', for: 'user:1', enabled: true });

    expect(await store.allFlagNames()).toEqual(['beta_banner', 'dark_mode']);
  });

  it('iterates every flag and can be iterated again', async () => {
    await store.put('dark_mode', ENABLED);
    await store.put('beta_banner', { type: 'group', for: 'staff', enabled: true });

    const expected = [
      { name: 'beta_banner', gates: [{ type: 'group', for: 'staff', enabled: true }] },
      { name: 'dark_mode', gates: [ENABLED] },
    ];
    const flags = store.getAll();
    expect(await collect(flags)).toEqual(expected);
    expect(await collect(flags)).toEqual(expected);
  });
});
