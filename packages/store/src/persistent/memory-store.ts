/**
 * In-process persistent store.
 *
 * Keeps flags in a Map for the lifetime of the instance. Used when no
 * durable adapter is configured, and as the stand-in backend in tests.
 *
 * @module store/persistent/memory-store
 */
import { StoreError } from '../errors.js';
import { emptyFlag, withGate, withoutGate } from '../gates.js';
import type { FlagName, FlagState, Gate, PersistentStore } from '../types.js';

export class MemoryStore implements PersistentStore {
  readonly kind = 'memory';
  private readonly flags = new Map<FlagName, FlagState>();
  private opened = false;

  async open(): Promise<void> {
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async get(name: FlagName): Promise<FlagState | null> {
    this.assertOpen();
    const flag = this.flags.get(name);
    return flag ? clone(flag) : null;
  }

  async put(name: FlagName, gate: Gate): Promise<FlagState> {
    this.assertOpen();
    const next = withGate(this.flags.get(name) ?? emptyFlag(name), gate);
    this.flags.set(name, next);
    return clone(next);
  }

  async delete(name: FlagName, gate: Gate): Promise<FlagState> {
    this.assertOpen();
    const current = this.flags.get(name);
    if (!current) return emptyFlag(name);

    const next = withoutGate(current, gate);
    if (next.gates.length === 0) {
      this.flags.delete(name);
    } else {
      this.flags.set(name, next);
    }
    return clone(next);
  }

  async deleteFlag(name: FlagName): Promise<void> {
    this.assertOpen();
    this.flags.delete(name);
  }

  async allFlagNames(): Promise<FlagName[]> {
    this.assertOpen();
    return [...this.flags.keys()].sort();
  }

  getAll(): AsyncIterable<FlagState> {
    return {
      [Symbol.asyncIterator]: () => this.scan(),
    };
  }

  private async *scan(): AsyncGenerator<FlagState> {
    for (const name of await this.allFlagNames()) {
      const flag = this.flags.get(name);
      if (flag) yield clone(flag);
    }
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new StoreError('memory store is not open', 'NOT_OPEN');
    }
  }
}

function clone(flag: FlagState): FlagState {
  return { name: flag.name, gates: flag.gates.map((g) => ({ ...g })) };
}
