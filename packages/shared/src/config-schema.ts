import { z } from 'zod';

const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

const PersistenceConfigSchema = z.discriminatedUnion('adapter', [
  z.object({ adapter: z.literal('memory') }),
  z.object({
    adapter: z.literal('sqlite'),
    dbPath: z.string().min(1),
    tableName: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier')
      .default('flag_toggles'),
  }),
  z.object({
    adapter: z.literal('file'),
    dataDir: z.string().min(1),
  }),
]);

export const FlagStoreConfigSchema = z.object({
  cache: z
    .object({
      enabled: z.boolean().default(true),
      ttlSeconds: z.number().int().min(0).default(60),
    })
    .default(() => ({ enabled: true, ttlSeconds: 60 })),
  persistence: PersistenceConfigSchema.default(() => ({ adapter: 'memory' as const })),
  notifications: z
    .object({
      enabled: z.boolean().default(true),
      adapter: z.enum(['maildir', 'local']).nullable().default(null),
      dataDir: z.string().nullable().default(null),
      retentionMs: z.number().int().min(1000).default(300_000),
    })
    .refine((n) => n.adapter !== 'maildir' || n.dataDir !== null, {
      message: 'dataDir is required for the maildir adapter',
      path: ['dataDir'],
    })
    .default(() => ({ enabled: true, adapter: null, dataDir: null, retentionMs: 300_000 })),
  lookup: z
    .object({
      strict: z.boolean().default(false),
      timeoutMs: z.number().int().min(1).default(5000),
    })
    .default(() => ({ strict: false, timeoutMs: 5000 })),
  supervisor: z
    .object({
      maxRestarts: z.number().int().min(0).default(3),
      windowMs: z.number().int().min(1).default(5000),
      restartDelayMs: z.number().int().min(0).default(1000),
      healthCheckIntervalMs: z.number().int().min(0).default(30_000),
    })
    .default(() => ({
      maxRestarts: 3,
      windowMs: 5000,
      restartDelayMs: 1000,
      healthCheckIntervalMs: 30_000,
    })),
  logging: LoggingConfigSchema.default(() => ({ level: 'info' as const })),
});

export type FlagStoreConfig = z.infer<typeof FlagStoreConfigSchema>;
export type FlagStoreConfigInput = z.input<typeof FlagStoreConfigSchema>;
export type PersistenceConfig = FlagStoreConfig['persistence'];
export type NotificationsConfig = FlagStoreConfig['notifications'];

/** Raised when boot-time configuration fails schema validation. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate raw configuration and fill in defaults.
 *
 * @throws {ConfigError} listing every issue as `path: message`
 */
export function parseConfig(input: unknown): FlagStoreConfig {
  const result = FlagStoreConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid flag store configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/** Caching is on only when enabled and the TTL is non-zero. */
export function isCacheEnabled(config: FlagStoreConfig): boolean {
  return config.cache.enabled && config.cache.ttlSeconds > 0;
}

/** Change notifications need caching, the notifications switch, and an adapter. */
export function areChangeNotificationsEnabled(config: FlagStoreConfig): boolean {
  return (
    isCacheEnabled(config) &&
    config.notifications.enabled &&
    config.notifications.adapter !== null
  );
}

/** Defaults extracted from schema */
export const FLAG_STORE_CONFIG_DEFAULTS: FlagStoreConfig = FlagStoreConfigSchema.parse({});
