/**
 * Relational persistent store backed by SQLite.
 *
 * One row per gate in a single table (default `flag_toggles`), unique on
 * `(flag_name, gate_type, target)`. Percentage gates share the
 * `percentage` gate type and encode their kind in the target
 * (`time/0.25`, `actors/0.1`), so a flag can hold at most one of them.
 *
 * Uses the usual better-sqlite3 setup: WAL mode, PRAGMA user_version
 * migrations, prepared statements.
 *
 * @module store/persistent/sqlite-store
 */
import Database from 'better-sqlite3';
import { noopLogger, type Logger } from '@flagsync/shared/logger';
import { StoreError, toStoreError } from '../errors.js';
import { emptyFlag, sortGates } from '../gates.js';
import type { FlagName, FlagState, Gate, PersistentStore } from '../types.js';

// === Types ===

/** Raw row shape from the toggles table (snake_case). */
interface GateRow {
  flag_name: string;
  gate_type: string;
  target: string;
  enabled: number;
}

/** Options for creating a SqliteStore. */
export interface SqliteStoreOptions {
  /** Path to the database file, or `:memory:`. */
  dbPath: string;
  tableName?: string;
  logger?: Logger;
}

interface Statements {
  selectFlag: Database.Statement<[string], GateRow>;
  upsertGate: Database.Statement<[string, string, string, number]>;
  deleteGate: Database.Statement<[string, string, string]>;
  deletePercentage: Database.Statement<[string]>;
  deleteFlag: Database.Statement<[string]>;
  flagNames: Database.Statement<[], { flag_name: string }>;
  ping: Database.Statement<[], { ok: number }>;
}

// === Constants ===

const DEFAULT_TABLE = 'flag_toggles';

/** Target stored for the boolean gate, which has none of its own. */
const NO_TARGET = '_none';

const PERCENTAGE = 'percentage';

// === Migrations ===

function migrations(table: string): string[] {
  return [
    // Version 1: initial schema
    `CREATE TABLE IF NOT EXISTS ${table} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      flag_name TEXT NOT NULL,
      gate_type TEXT NOT NULL,
      target TEXT NOT NULL,
      enabled INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS idx_${table}_flag_gate_target ON ${table}(flag_name, gate_type, target);`,
  ];
}

// === SqliteStore ===

/**
 * SQLite-backed {@link PersistentStore}.
 *
 * @example
 * ```ts
 * const store = new SqliteStore({ dbPath: '/var/lib/flags/flags.db' });
 * await store.open();
 * await store.put('dark_mode', { type: 'boolean', enabled: true });
 * const flag = await store.get('dark_mode');
 * ```
 */
export class SqliteStore implements PersistentStore {
  readonly kind = 'sqlite';
  private readonly dbPath: string;
  private readonly table: string;
  private readonly logger: Logger;
  private db: Database.Database | null = null;
  private stmts: Statements | null = null;

  constructor(options: SqliteStoreOptions) {
    this.dbPath = options.dbPath;
    this.table = options.tableName ?? DEFAULT_TABLE;
    this.logger = options.logger ?? noopLogger;
  }

  // --- Lifecycle ---

  async open(): Promise<void> {
    if (this.db) return;
    try {
      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('busy_timeout = 5000');
      runMigrations(db, migrations(this.table));
      this.stmts = prepareStatements(db, this.table);
      this.db = db;
    } catch (err) {
      throw toStoreError(err, 'open');
    }
  }

  /** Close the database connection. Safe to call when already closed. */
  async close(): Promise<void> {
    const db = this.db;
    this.db = null;
    this.stmts = null;
    db?.close();
  }

  async ping(): Promise<void> {
    this.run('ping', (s) => s.ping.get());
  }

  /**
   * Check whether the database is using WAL journal mode.
   *
   * @returns `true` if WAL mode is active.
   */
  isWalMode(): boolean {
    const result = this.db?.pragma('journal_mode', { simple: true });
    return result === 'wal';
  }

  // --- Read Operations ---

  async get(name: FlagName): Promise<FlagState | null> {
    return this.run('get', (s) => this.loadFlag(s, name));
  }

  async allFlagNames(): Promise<FlagName[]> {
    return this.run('allFlagNames', (s) => s.flagNames.all().map((row) => row.flag_name));
  }

  getAll(): AsyncIterable<FlagState> {
    return {
      [Symbol.asyncIterator]: () => this.scan(),
    };
  }

  // --- Write Operations ---

  async put(name: FlagName, gate: Gate): Promise<FlagState> {
    return this.run('put', (s, db) => {
      const [gateType, target, enabled] = encodeGate(gate);
      const write = db.transaction(() => {
        if (gateType === PERCENTAGE) s.deletePercentage.run(name);
        s.upsertGate.run(name, gateType, target, enabled);
      });
      write();
      return this.loadFlag(s, name) ?? emptyFlag(name);
    });
  }

  async delete(name: FlagName, gate: Gate): Promise<FlagState> {
    return this.run('delete', (s) => {
      const [gateType, target] = encodeGate(gate);
      if (gateType === PERCENTAGE) {
        s.deletePercentage.run(name);
      } else {
        s.deleteGate.run(name, gateType, target);
      }
      return this.loadFlag(s, name) ?? emptyFlag(name);
    });
  }

  async deleteFlag(name: FlagName): Promise<void> {
    this.run('deleteFlag', (s) => s.deleteFlag.run(name));
  }

  // --- Internal Helpers ---

  /**
   * Names are read up front so no statement is left iterating while the
   * caller issues other queries on the same connection.
   */
  private async *scan(): AsyncGenerator<FlagState> {
    const names = await this.allFlagNames();
    for (const name of names) {
      const flag = await this.get(name);
      if (flag) yield flag;
    }
  }

  private loadFlag(s: Statements, name: FlagName): FlagState | null {
    const rows = s.selectFlag.all(name);
    if (rows.length === 0) return null;

    const gates: Gate[] = [];
    for (const row of rows) {
      const gate = decodeRow(row);
      if (gate) {
        gates.push(gate);
      } else {
        this.logger.warn(`[SqliteStore] Skipping unreadable gate row for '${name}'`, {
          gateType: row.gate_type,
          target: row.target,
        });
      }
    }
    return { name, gates: sortGates(gates) };
  }

  private run<T>(operation: string, fn: (stmts: Statements, db: Database.Database) => T): T {
    if (!this.db || !this.stmts) {
      throw new StoreError(`sqlite store is not open (${operation})`, 'NOT_OPEN');
    }
    try {
      return fn(this.stmts, this.db);
    } catch (err) {
      throw mapSqliteError(err, operation);
    }
  }
}

// === Helpers ===

function prepareStatements(db: Database.Database, table: string): Statements {
  return {
    selectFlag: db.prepare<[string], GateRow>(
      `SELECT flag_name, gate_type, target, enabled FROM ${table} WHERE flag_name = ? ORDER BY id`,
    ),
    upsertGate: db.prepare<[string, string, string, number]>(
      `INSERT INTO ${table} (flag_name, gate_type, target, enabled) VALUES (?, ?, ?, ?)
       ON CONFLICT(flag_name, gate_type, target) DO UPDATE SET enabled = excluded.enabled`,
    ),
    deleteGate: db.prepare<[string, string, string]>(
      `DELETE FROM ${table} WHERE flag_name = ? AND gate_type = ? AND target = ?`,
    ),
    deletePercentage: db.prepare<[string]>(
      `DELETE FROM ${table} WHERE flag_name = ? AND gate_type = '${PERCENTAGE}'`,
    ),
    deleteFlag: db.prepare<[string]>(`DELETE FROM ${table} WHERE flag_name = ?`),
    flagNames: db.prepare<[], { flag_name: string }>(
      `SELECT DISTINCT flag_name FROM ${table} ORDER BY flag_name`,
    ),
    ping: db.prepare<[], { ok: number }>(`SELECT 1 AS ok`),
  };
}

/** Run schema migrations based on PRAGMA user_version. */
function runMigrations(db: Database.Database, steps: string[]): void {
  const version = db.pragma('user_version', { simple: true });
  const currentVersion = typeof version === 'number' ? version : 0;
  if (currentVersion >= steps.length) return;

  const migrate = db.transaction(() => {
    for (let i = currentVersion; i < steps.length; i++) {
      db.exec(steps[i]);
    }
    db.pragma(`user_version = ${steps.length}`);
  });

  migrate();
}

/** Encode a gate as `[gate_type, target, enabled]` column values. */
function encodeGate(gate: Gate): [string, string, number] {
  switch (gate.type) {
    case 'boolean':
      return ['boolean', NO_TARGET, gate.enabled ? 1 : 0];
    case 'actor':
    case 'group':
      return [gate.type, gate.for, gate.enabled ? 1 : 0];
    case 'percentage_of_time':
      return [PERCENTAGE, `time/${gate.for}`, 1];
    case 'percentage_of_actors':
      return [PERCENTAGE, `actors/${gate.for}`, 1];
  }
}

/** Convert a stored row back into a gate. Returns `null` for rows this version cannot read. */
function decodeRow(row: GateRow): Gate | null {
  const enabled = row.enabled !== 0;
  switch (row.gate_type) {
    case 'boolean':
      return { type: 'boolean', enabled };
    case 'actor':
      return { type: 'actor', for: row.target, enabled };
    case 'group':
      return { type: 'group', for: row.target, enabled };
    case PERCENTAGE: {
      const [kind, raw] = row.target.split('/');
      const ratio = Number(raw);
      if (!(ratio > 0 && ratio < 1)) return null;
      if (kind === 'time') return { type: 'percentage_of_time', for: ratio };
      if (kind === 'actors') return { type: 'percentage_of_actors', for: ratio };
      return null;
    }
    default:
      return null;
  }
}

function mapSqliteError(err: unknown, operation: string): StoreError {
  if (err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT')) {
    return new StoreError(`${operation} failed: ${err.message}`, 'CONFLICT', { cause: err });
  }
  return toStoreError(err, operation);
}
