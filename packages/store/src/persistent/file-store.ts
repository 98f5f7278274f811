/**
 * Key-value persistent store on the local filesystem.
 *
 * Each flag is one JSON document at `{dataDir}/flags/{hash}.json`, where the
 * hash is a truncated SHA-256 of the flag name. Writes go to `tmp/` first and
 * are moved into place with an atomic rename, so readers in any process see
 * either the previous document or the new one, never a partial write.
 *
 * Read-modify-write cycles are serialized per flag inside the process.
 * Writers in different processes resolve last-write-wins.
 *
 * @module store/persistent/file-store
 */
import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ulid } from 'ulidx';
import { FlagStateSchema } from '@flagsync/shared/flag-schemas';
import { StoreError, toStoreError } from '../errors.js';
import { emptyFlag, withGate, withoutGate } from '../gates.js';
import { KeyedLock } from '../lib/keyed-lock.js';
import type { FlagName, FlagState, Gate, PersistentStore } from '../types.js';

// === Constants ===

/** Directory permission: rwx for owner only. */
const DIR_MODE = 0o700;

/** File permission: rw for owner only. */
const FILE_MODE = 0o600;

/** Length of the truncated hash used for document names. */
const HASH_LENGTH = 16;

const FILE_EXT = '.json';

/** Options for creating a FileStore. */
export interface FileStoreOptions {
  /** Root directory for flag documents (e.g. `/var/lib/flags`). */
  dataDir: string;
}

/**
 * Compute the filesystem-safe document key for a flag name.
 *
 * @param name - Any flag name
 * @returns A lowercase hex string of length {@link HASH_LENGTH}
 */
export function flagKey(name: FlagName): string {
  return createHash('sha256').update(name).digest('hex').slice(0, HASH_LENGTH);
}

export class FileStore implements PersistentStore {
  readonly kind = 'file';
  private readonly flagsDir: string;
  private readonly tmpDir: string;
  private readonly lock = new KeyedLock();
  private opened = false;

  constructor(private readonly options: FileStoreOptions) {
    this.flagsDir = path.join(options.dataDir, 'flags');
    this.tmpDir = path.join(options.dataDir, 'tmp');
  }

  // --- Lifecycle ---

  /** Create `flags/` and `tmp/` under the data directory. Idempotent. */
  async open(): Promise<void> {
    try {
      await fs.mkdir(this.flagsDir, { recursive: true, mode: DIR_MODE });
      await fs.mkdir(this.tmpDir, { recursive: true, mode: DIR_MODE });
      this.opened = true;
    } catch (err) {
      throw toStoreError(err, 'open');
    }
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async ping(): Promise<void> {
    this.assertOpen('ping');
    try {
      await fs.access(this.flagsDir);
    } catch (err) {
      throw toStoreError(err, 'ping');
    }
  }

  // --- Reads ---

  async get(name: FlagName): Promise<FlagState | null> {
    this.assertOpen('get');
    return this.readDocument(this.documentPath(name), name);
  }

  async allFlagNames(): Promise<FlagName[]> {
    const names: FlagName[] = [];
    for await (const flag of this.getAll()) {
      names.push(flag.name);
    }
    return names.sort();
  }

  getAll(): AsyncIterable<FlagState> {
    return {
      [Symbol.asyncIterator]: () => this.scan(),
    };
  }

  // --- Writes ---

  async put(name: FlagName, gate: Gate): Promise<FlagState> {
    this.assertOpen('put');
    return this.lock.run(name, async () => {
      const current = (await this.readDocument(this.documentPath(name), name)) ?? emptyFlag(name);
      const next = withGate(current, gate);
      await this.writeDocument(name, next);
      return next;
    });
  }

  async delete(name: FlagName, gate: Gate): Promise<FlagState> {
    this.assertOpen('delete');
    return this.lock.run(name, async () => {
      const current = await this.readDocument(this.documentPath(name), name);
      if (!current) return emptyFlag(name);

      const next = withoutGate(current, gate);
      if (next.gates.length === 0) {
        await this.removeDocument(name);
      } else {
        await this.writeDocument(name, next);
      }
      return next;
    });
  }

  async deleteFlag(name: FlagName): Promise<void> {
    this.assertOpen('deleteFlag');
    await this.lock.run(name, async () => {
      if (await this.readDocument(this.documentPath(name), name)) {
        await this.removeDocument(name);
      }
    });
  }

  // --- Internal Helpers ---

  private async *scan(): AsyncGenerator<FlagState> {
    this.assertOpen('getAll');
    let entries: string[];
    try {
      entries = await fs.readdir(this.flagsDir);
    } catch (err) {
      throw toStoreError(err, 'getAll');
    }

    for (const entry of entries.sort()) {
      if (!entry.endsWith(FILE_EXT)) continue;
      const flag = await this.readDocument(path.join(this.flagsDir, entry));
      if (flag) yield flag;
    }
  }

  private documentPath(name: FlagName): string {
    return path.join(this.flagsDir, flagKey(name) + FILE_EXT);
  }

  /**
   * Read and validate a document. A missing file is `null`, not an error.
   *
   * When `expectedName` is given, a document holding another flag (a
   * truncated-hash collision) is a `CONFLICT`.
   */
  private async readDocument(filePath: string, expectedName?: FlagName): Promise<FlagState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw toStoreError(err, 'read');
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreError(`corrupt flag document ${path.basename(filePath)}`, 'STORE_UNAVAILABLE', {
        cause: err,
      });
    }

    const parsed = FlagStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError(
        `invalid flag document ${path.basename(filePath)}: ${parsed.error.message}`,
        'STORE_UNAVAILABLE',
      );
    }
    if (expectedName !== undefined && parsed.data.name !== expectedName) {
      throw new StoreError(
        `flag document ${path.basename(filePath)} holds '${parsed.data.name}', not '${expectedName}'`,
        'CONFLICT',
      );
    }
    return parsed.data;
  }

  /**
   * Write flow:
   * 1. Serialize to `tmp/{ulid}.json` with exclusive create
   * 2. Atomic rename over `flags/{hash}.json`
   */
  private async writeDocument(name: FlagName, flag: FlagState): Promise<void> {
    const tmpPath = path.join(this.tmpDir, ulid() + FILE_EXT);
    try {
      await fs.writeFile(tmpPath, JSON.stringify(flag, null, 2), { flag: 'wx', mode: FILE_MODE });
      await fs.rename(tmpPath, this.documentPath(name));
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch(() => undefined);
      throw toStoreError(err, 'write');
    }
  }

  private async removeDocument(name: FlagName): Promise<void> {
    try {
      await fs.rm(this.documentPath(name), { force: true });
    } catch (err) {
      throw toStoreError(err, 'delete');
    }
  }

  private assertOpen(operation: string): void {
    if (!this.opened) {
      throw new StoreError(`file store at ${this.options.dataDir} is not open (${operation})`, 'NOT_OPEN');
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
