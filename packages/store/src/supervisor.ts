/**
 * One-for-one supervisor for restartable units.
 *
 * Each unit runs in its own failure domain: when a unit reports a crash,
 * only that unit is stopped and started again. Restart intensity is tracked
 * per unit over a sliding window; a unit that crashes more than
 * `maxRestarts` times within `windowMs` is marked `failed` and left down,
 * while its siblings keep running.
 *
 * A unit that fails its very first start is handled exactly like a crash,
 * so one unavailable backend at boot does not prevent the others from
 * starting.
 *
 * @module store/supervisor
 */
import { logError, noopLogger, type Logger } from '@flagsync/shared/logger';
import type { SupervisedUnit, SupervisorOptions, UnitState, UnitStatus } from './types.js';

const DEFAULT_SUPERVISOR_OPTIONS: SupervisorOptions = {
  maxRestarts: 3,
  windowMs: 5000,
  restartDelayMs: 1000,
};

/** Supervisor bookkeeping for one unit. */
interface Child {
  unit: SupervisedUnit;
  state: UnitState;
  restarts: number;
  /** Timestamps (ms) of restarts still inside the intensity window. */
  recentRestarts: number[];
  lastError?: string;
  /** Incremented on every start; crash reports from older incarnations are ignored. */
  incarnation: number;
  pending: Promise<void> | null;
}

export class Supervisor {
  private readonly children: Child[];
  private readonly options: SupervisorOptions;
  private readonly logger: Logger;

  /**
   * @param units - Units in start order. They are stopped in reverse order.
   * @param options - Partial overrides merged with defaults.
   */
  constructor(units: SupervisedUnit[], options?: Partial<SupervisorOptions>, logger?: Logger) {
    const names = new Set<string>();
    for (const unit of units) {
      if (names.has(unit.name)) throw new Error(`Duplicate unit name: ${unit.name}`);
      names.add(unit.name);
    }

    this.children = units.map((unit) => ({
      unit,
      state: 'stopped',
      restarts: 0,
      recentRestarts: [],
      incarnation: 0,
      pending: null,
    }));
    this.options = { ...DEFAULT_SUPERVISOR_OPTIONS, ...options };
    this.logger = logger ?? noopLogger;
  }

  /** Start every unit in order. Start failures are retried in the background. */
  async start(): Promise<void> {
    for (const child of this.children) {
      if (child.state !== 'stopped') continue;
      try {
        await this.startChild(child);
        child.state = 'running';
        this.logger.info(`[Supervisor] Started '${child.unit.name}'`);
      } catch (err) {
        child.lastError = errorMessage(err);
        this.logger.warn(`[Supervisor] '${child.unit.name}' failed to start`, logError(err));
        this.scheduleRestart(child);
      }
    }
  }

  /** Stop every unit in reverse start order. Stop failures are logged. */
  async stop(): Promise<void> {
    for (const child of [...this.children].reverse()) {
      const wasActive = child.state === 'running' || child.state === 'restarting';
      child.state = 'stopped';
      child.incarnation++;
      if (child.pending) await child.pending;
      if (wasActive) await this.stopChild(child);
    }
  }

  /** Wait for every scheduled restart to finish (successfully or not). */
  async settled(): Promise<void> {
    for (;;) {
      const pending = this.children.flatMap((c) => (c.pending ? [c.pending] : []));
      if (pending.length === 0) return;
      await Promise.all(pending);
    }
  }

  isRunning(name: string): boolean {
    return this.children.some((c) => c.unit.name === name && c.state === 'running');
  }

  status(): UnitStatus[] {
    return this.children.map((c) => ({
      name: c.unit.name,
      state: c.state,
      restarts: c.restarts,
      ...(c.lastError !== undefined ? { lastError: c.lastError } : {}),
    }));
  }

  // --- Internal Helpers ---

  private async startChild(child: Child): Promise<void> {
    const incarnation = ++child.incarnation;
    await child.unit.start((err) => this.handleCrash(child, incarnation, err));
  }

  private async stopChild(child: Child): Promise<void> {
    try {
      await child.unit.stop();
    } catch (err) {
      this.logger.warn(`[Supervisor] Failed to stop '${child.unit.name}'`, logError(err));
    }
  }

  private handleCrash(child: Child, incarnation: number, err: unknown): void {
    if (incarnation !== child.incarnation || child.state !== 'running') return;

    child.lastError = errorMessage(err);
    this.logger.warn(`[Supervisor] '${child.unit.name}' crashed`, logError(err));
    this.scheduleRestart(child, true);
  }

  private scheduleRestart(child: Child, stopFirst = false): void {
    child.state = 'restarting';
    const run = this.restart(child, stopFirst)
      .catch((err: unknown) => {
        this.logger.error(`[Supervisor] Restart loop for '${child.unit.name}' aborted`, logError(err));
        child.state = 'failed';
      })
      .finally(() => {
        if (child.pending === run) child.pending = null;
      });
    child.pending = run;
  }

  private async restart(child: Child, stopFirst: boolean): Promise<void> {
    if (stopFirst) await this.stopChild(child);

    for (;;) {
      const now = Date.now();
      child.recentRestarts = child.recentRestarts.filter((t) => now - t < this.options.windowMs);
      if (child.recentRestarts.length >= this.options.maxRestarts) {
        child.state = 'failed';
        this.logger.error(
          `[Supervisor] '${child.unit.name}' exceeded ${this.options.maxRestarts} restarts in ${this.options.windowMs}ms; giving up`,
          { lastError: child.lastError },
        );
        return;
      }

      child.recentRestarts.push(now);
      child.restarts++;
      if (this.options.restartDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.options.restartDelayMs));
      }
      if (child.state !== 'restarting') return;

      try {
        await this.startChild(child);
        if (child.state !== 'restarting') {
          // stop() ran while we were starting
          await this.stopChild(child);
          return;
        }
        child.state = 'running';
        this.logger.info(`[Supervisor] Restarted '${child.unit.name}'`, { restarts: child.restarts });
        return;
      } catch (err) {
        child.lastError = errorMessage(err);
        this.logger.warn(`[Supervisor] Restart of '${child.unit.name}' failed`, logError(err));
        await this.stopChild(child);
      }
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export { DEFAULT_SUPERVISOR_OPTIONS };
