import { createConsola } from 'consola';

/** Minimal logger interface for cross-package dependency injection. */
export interface Logger {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

/** No-op logger for tests and optional logger defaults. */
export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/** Log level names accepted by the configuration. */
export type LogLevelName = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/** Maps log level names to numeric values for consola compatibility */
export const LOG_LEVEL_MAP: Record<LogLevelName, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/**
 * Create a consola-backed logger, optionally tagged with a component name.
 *
 * @param options.level - Level name, defaults to `info`.
 * @param options.tag - Component tag shown in every line (e.g. `flag-cache`).
 */
export function createLogger(options?: { level?: LogLevelName; tag?: string }): Logger {
  const base = createConsola({ level: LOG_LEVEL_MAP[options?.level ?? 'info'] });
  return options?.tag ? base.withTag(options.tag) : base;
}

/** Extract structured error fields for consistent logging. */
export function logError(err: unknown): { error: string; stack?: string } {
  if (err instanceof Error) return { error: err.message, stack: err.stack };
  return { error: String(err) };
}
