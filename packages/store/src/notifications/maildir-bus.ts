/**
 * Cross-process notification bus over a shared Maildir-style directory.
 *
 * Layout under `rootDir`:
 * - `tmp/`: in-flight writes, never watched
 * - `new/`: published messages, one `{ulid}.json` file each
 *
 * Publishing writes to `tmp/` with exclusive create and renames into `new/`,
 * so watchers never see a partial message. Every subscriber (in any process
 * sharing the directory) watches `new/` with chokidar and dispatches each
 * file that appears. Files are not consumed; they are pruned once older
 * than `retentionMs`. A subscriber that reads a file after it was pruned
 * simply misses that message, which the cache TTL bounds.
 *
 * @module store/notifications/maildir-bus
 */
import { mkdirSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import chokidar, { type FSWatcher } from 'chokidar';
import { decodeTime, monotonicFactory } from 'ulidx';
import { InvalidationMessageSchema } from '@flagsync/shared/flag-schemas';
import { logError, noopLogger, type Logger } from '@flagsync/shared/logger';
import { NotificationError } from '../errors.js';
import type {
  InvalidationHandler,
  InvalidationMessage,
  NotificationBus,
  SubscribeOptions,
  Unsubscribe,
} from '../types.js';

// === Constants ===

/** Directory permission: rwx for owner only. */
const DIR_MODE = 0o700;

/** File permission: rw for owner only. */
const FILE_MODE = 0o600;

const FILE_EXT = '.json';

const DEFAULT_RETENTION_MS = 300_000;

/** Minimum gap between two prune passes. */
const PRUNE_INTERVAL_MS = 10_000;

/** Monotonic ULID factory; keeps ordering within the same millisecond. */
const generateUlid = monotonicFactory();

// === Types ===

export interface MaildirBusOptions {
  /** Directory shared by every process of the fleet. */
  rootDir: string;
  /** Age after which published message files are deleted. */
  retentionMs?: number;
  logger?: Logger;
}

interface Watch {
  watcher: FSWatcher;
  ready: Promise<void>;
}

// === MaildirBus ===

/**
 * @example
 * ```ts
 * const bus = new MaildirBus({ rootDir: '/var/run/flags/bus' });
 * const unsubscribe = bus.subscribe((message) => console.log(message.target));
 * await bus.publish({ target: { scope: 'all' }, origin: nodeId, sentAt: new Date().toISOString() });
 * ```
 */
export class MaildirBus implements NotificationBus {
  readonly kind = 'maildir';
  private readonly tmpDir: string;
  private readonly newDir: string;
  private readonly retentionMs: number;
  private readonly logger: Logger;
  private readonly watches = new Set<Watch>();
  private lastPruneAt = 0;

  constructor(options: MaildirBusOptions) {
    this.tmpDir = path.join(options.rootDir, 'tmp');
    this.newDir = path.join(options.rootDir, 'new');
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.logger = options.logger ?? noopLogger;
  }

  // --- Publish ---

  async publish(message: InvalidationMessage): Promise<void> {
    const filename = generateUlid() + FILE_EXT;
    const tmpPath = path.join(this.tmpDir, filename);

    try {
      await this.ensureDirs();
      await fs.writeFile(tmpPath, JSON.stringify(message), { flag: 'wx', mode: FILE_MODE });
      await fs.rename(tmpPath, path.join(this.newDir, filename));
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch(() => undefined);
      const reason = err instanceof Error ? err.message : String(err);
      throw new NotificationError(`publish failed: ${reason}`, { cause: err });
    }

    await this.pruneIfDue();
  }

  // --- Subscribe ---

  /**
   * Watch `new/` and call `handler` for every message file that appears.
   *
   * Files already present when the watch starts are ignored. Watcher errors
   * are reported through `options.onError`.
   */
  subscribe(handler: InvalidationHandler, options?: SubscribeOptions): Unsubscribe {
    mkdirSync(this.newDir, { recursive: true, mode: DIR_MODE });

    const watcher = chokidar.watch(this.newDir, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
    });
    const ready = new Promise<void>((resolve) => {
      watcher.once('ready', () => resolve());
    });
    const watch: Watch = { watcher, ready };
    this.watches.add(watch);

    watcher.on('add', (filePath: string) => {
      this.dispatch(filePath, handler).catch((err: unknown) => {
        this.logger.warn('[MaildirBus] Dispatch failed', logError(err));
      });
    });

    watcher.on('error', (err: unknown) => {
      this.logger.error('[MaildirBus] Watcher error', logError(err));
      options?.onError?.(err);
    });

    return () => {
      if (this.watches.delete(watch)) {
        this.closeWatcher(watcher);
      }
    };
  }

  /** Resolve once every active watcher has finished its initial scan. */
  async waitUntilReady(): Promise<void> {
    await Promise.all([...this.watches].map((w) => w.ready));
  }

  async close(): Promise<void> {
    const watches = [...this.watches];
    this.watches.clear();
    await Promise.all(watches.map((w) => w.watcher.close()));
  }

  // --- Internal Helpers ---

  private async dispatch(filePath: string, handler: InvalidationHandler): Promise<void> {
    if (!filePath.endsWith(FILE_EXT)) return;

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      // Usually pruned between the add event and the read
      this.logger.debug('[MaildirBus] Message unreadable, skipping', {
        file: path.basename(filePath),
        ...logError(err),
      });
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger.warn('[MaildirBus] Dropping unparseable message', { file: path.basename(filePath) });
      return;
    }

    const parsed = InvalidationMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn('[MaildirBus] Dropping malformed message', {
        file: path.basename(filePath),
        issues: parsed.error.issues.map((i) => i.message),
      });
      return;
    }

    handler(parsed.data);
  }

  private async ensureDirs(): Promise<void> {
    await fs.mkdir(this.tmpDir, { recursive: true, mode: DIR_MODE });
    await fs.mkdir(this.newDir, { recursive: true, mode: DIR_MODE });
  }

  /** Delete message files older than the retention window, at most every {@link PRUNE_INTERVAL_MS}. */
  private async pruneIfDue(): Promise<void> {
    const now = Date.now();
    if (now - this.lastPruneAt < PRUNE_INTERVAL_MS) return;
    this.lastPruneAt = now;

    try {
      const entries = await fs.readdir(this.newDir);
      for (const entry of entries) {
        if (!entry.endsWith(FILE_EXT)) continue;
        const sentAt = safeDecodeTime(entry.slice(0, -FILE_EXT.length));
        if (sentAt !== null && now - sentAt > this.retentionMs) {
          await fs.rm(path.join(this.newDir, entry), { force: true });
        }
      }
    } catch (err) {
      this.logger.debug('[MaildirBus] Prune pass failed', logError(err));
    }
  }

  private closeWatcher(watcher: FSWatcher): void {
    watcher.close().catch((err: unknown) => {
      this.logger.warn('[MaildirBus] Failed to close watcher', logError(err));
    });
  }
}

function safeDecodeTime(id: string): number | null {
  try {
    return decodeTime(id);
  } catch {
    return null;
  }
}
