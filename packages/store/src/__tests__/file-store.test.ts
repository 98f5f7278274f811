import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { FileStore, flagKey } from '../persistent/file-store.js';
import type { FlagState, Gate } from '../types.js';

const ENABLED: Gate = { type: 'boolean', enabled: true };

let tmpDir: string;
let store: FileStore;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'flagsync-file-test-'));
  store = new FileStore({ dataDir: tmpDir });
  await store.open();
});

afterEach(async () => {
  await store.close();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('flagKey', () => {
  it('is a 16-character hex digest', () => {
    expect(flagKey('dark_mode')).toMatch(/^[0-9a-f]{16}$/);
  });

  it('is stable and distinguishes names', () => {
    expect(flagKey('dark_mode')).toBe(flagKey('dark_mode'));
    expect(flagKey('dark_mode')).not.toBe(flagKey('dark_mode_v2'));
  });
});

describe('FileStore', () => {
  it('creates its directories on open', async () => {
    const entries = await fs.readdir(tmpDir);
    expect(entries.sort()).toEqual(['flags', 'tmp']);
  });

  it('returns null for an unknown flag', async () => {
    expect(await store.get('never_written')).toBeNull();
  });

  it('writes one document per flag and leaves tmp empty', async () => {
    await store.put('dark_mode', ENABLED);

    const document = path.join(tmpDir, 'flags', `${flagKey('dark_mode')}.json`);
    expect(JSON.parse(await fs.readFile(document, 'utf-8'))).toEqual({ name: 'dark_mode', gates: [ENABLED] });
    expect(await fs.readdir(path.join(tmpDir, 'tmp'))).toEqual([]);
  });

  it('merges gates into the stored flag', async () => {
    await store.put('checkout_v2', { type: 'actor', for: 'user:1', enabled: true });
    await store.put('checkout_v2', ENABLED);
    const flag = await store.put('checkout_v2', { type: 'percentage_of_time', for: 0.3 });

    expect(flag).toEqual({
      name: 'checkout_v2',
      gates: [ENABLED, { type: 'actor', for: 'user:1', enabled: true }, { type: 'percentage_of_time', for: 0.3 }],
    });
    expect(await store.get('checkout_v2')).toEqual(flag);
  });

  it('serializes concurrent writes to one flag', async () => {
    await Promise.all([
      store.put('checkout_v2', { type: 'actor', for: 'user:1', enabled: true }),
      store.put('checkout_v2', { type: 'actor', for: 'user:2', enabled: true }),
      store.put('checkout_v2', { type: 'actor', for: 'user:3', enabled: true }),
    ]);

    const flag = await store.get('checkout_v2');
    expect(flag?.gates).toHaveLength(3);
  });

  it('removes the document once the last gate is deleted', async () => {
    await store.put('dark_mode', ENABLED);

    expect(await store.delete('dark_mode', ENABLED)).toEqual({ name: 'dark_mode', gates: [] });
    expect(await store.get('dark_mode')).toBeNull();
    expect(await fs.readdir(path.join(tmpDir, 'flags'))).toEqual([]);
  });

  it('deletes a gate from a flag that was never written without error', async () => {
    expect(await store.delete('never_written', ENABLED)).toEqual({ name: 'never_written', gates: [] });
  });

  it('deleteFlag removes the document', async () => {
    await store.put('dark_mode', ENABLED);
    await store.deleteFlag('dark_mode');

    expect(await store.get('dark_mode')).toBeNull();
  });

  it('lists flag names and iterates every flag', async () => {
    await store.put('dark_mode', ENABLED);
    await store.put('beta_banner', ENABLED);

    expect(await store.allFlagNames()).toEqual(['beta_banner', 'dark_mode']);

    const names: string[] = [];
    for await (const flag of store.getAll()) names.push(flag.name);
    expect(names.sort()).toEqual(['beta_banner', 'dark_mode']);
  });

  it('reports a corrupt document as unavailable', async () => {
    await fs.writeFile(path.join(tmpDir, 'flags', `${flagKey('dark_mode')}.json`), '{not json');

    await expect(store.get('dark_mode')).rejects.toMatchObject({
      name: 'StoreError',
      code: 'STORE_UNAVAILABLE',
      message: `corrupt flag document ${flagKey('dark_mode')}.json`,
    });
  });

  it('reports a document that fails validation as unavailable', async () => {
    const bogus: unknown = { name: 'dark_mode', gates: [{ type: 'boolean' }] };
    await fs.writeFile(path.join(tmpDir, 'flags', `${flagKey('dark_mode')}.json`), JSON.stringify(bogus));

    await expect(store.get('dark_mode')).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
  });

  it('refuses a document that belongs to another flag', async () => {
    const document = path.join(tmpDir, 'flags', `${flagKey('dark_mode')}.json`);
    const foreign = JSON.stringify({ name: 'beta_banner', gates: [ENABLED] });
    await fs.writeFile(document, foreign);

    await expect(store.get('dark_mode')).rejects.toMatchObject({
      name: 'StoreError',
      code: 'CONFLICT',
      message: `flag document ${flagKey('dark_mode')}.json holds 'beta_banner', not 'dark_mode'`,
    });
    await expect(store.put('dark_mode', ENABLED)).rejects.toMatchObject({ code: 'CONFLICT' });
    await expect(store.deleteFlag('dark_mode')).rejects.toMatchObject({ code: 'CONFLICT' });
    expect(await fs.readFile(document, 'utf-8')).toBe(foreign);
  });

  it('reports the write failure itself when the temp file cannot be cleaned up', async () => {
    await fs.rm(path.join(tmpDir, 'tmp'), { recursive: true });
    await fs.writeFile(path.join(tmpDir, 'tmp'), 'not a directory');

    await expect(store.put('dark_mode', ENABLED)).rejects.toMatchObject({
      name: 'StoreError',
      code: 'STORE_UNAVAILABLE',
      message: expect.stringMatching(/^write failed: ENOTDIR/),
    });
  });

  it('is visible to a second instance on the same directory', async () => {
    const other = new FileStore({ dataDir: tmpDir });
    await other.open();

    await store.put('dark_mode', ENABLED);

    const flag: FlagState | null = await other.get('dark_mode');
    expect(flag).toEqual({ name: 'dark_mode', gates: [ENABLED] });
  });

  it('rejects operations before open', async () => {
    const closed = new FileStore({ dataDir: tmpDir });

    await expect(closed.get('dark_mode')).rejects.toMatchObject({ code: 'NOT_OPEN' });
    await expect(closed.ping()).rejects.toMatchObject({ code: 'NOT_OPEN' });
  });
});
