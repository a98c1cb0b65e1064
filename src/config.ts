/**
 * Configuration management using Zod for validation.
 *
 * Configuration is resolved once, at start-up, into a plain WarehouseConfig
 * object. Nothing downstream reads process.env.
 */

import { z } from 'zod';
import { ConfigurationError } from './types/errors.js';

/**
 * Environment schema with validation and defaults.
 */
const EnvSchema = z.object({
  // Snowflake connection
  SNOWFLAKE_ACCOUNT: z.string().optional(),
  SNOWFLAKE_USER: z.string().optional(),
  SNOWFLAKE_ROLE: z.string().optional(),
  SNOWFLAKE_WAREHOUSE: z.string().optional(),
  SNOWFLAKE_DATABASE: z.string().optional(),
  SNOWFLAKE_SCHEMA: z.string().optional(),

  // Key-pair authentication
  SNOWFLAKE_PRIVATE_KEY_PATH: z.string().optional(),
  SNOWFLAKE_PRIVATE_KEY_PASSPHRASE: z.string().optional(),

  // Local layout
  SNOWCACHE_SQL_ROOT: z.string().min(1).default('sql'),
  SNOWCACHE_CACHE_DIR: z.string().min(1).default('sql/caches'),

  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

type Env = z.infer<typeof EnvSchema>;

export type LogLevel = Env['LOG_LEVEL'];

/**
 * Fully resolved client configuration.
 */
export interface WarehouseConfig {
  account?: string;
  user?: string;
  role?: string;
  warehouse?: string;
  database?: string;
  schema?: string;
  privateKeyPath?: string;
  privateKeyPassphrase?: string;

  /**
   * Directory that relative `.sql` references are resolved under.
   */
  sqlRoot: string;

  /**
   * Directory holding the Parquet cache artifacts.
   */
  cacheDir: string;

  logLevel: LogLevel;
}

/**
 * Explicit values that take precedence over the environment.
 */
export type ConfigOverrides = Partial<WarehouseConfig>;

/**
 * Parse and validate configuration.
 *
 * Explicit overrides win; the environment only fills the gaps. Empty strings
 * count as unset, matching how shells export blank variables.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): WarehouseConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(
      'Configuration validation failed:',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const base = parsed.data;

  return {
    account: pick(overrides.account, base.SNOWFLAKE_ACCOUNT),
    user: pick(overrides.user, base.SNOWFLAKE_USER),
    role: pick(overrides.role, base.SNOWFLAKE_ROLE),
    warehouse: pick(overrides.warehouse, base.SNOWFLAKE_WAREHOUSE),
    database: pick(overrides.database, base.SNOWFLAKE_DATABASE),
    schema: pick(overrides.schema, base.SNOWFLAKE_SCHEMA),
    privateKeyPath: pick(overrides.privateKeyPath, base.SNOWFLAKE_PRIVATE_KEY_PATH),
    privateKeyPassphrase: pick(
      overrides.privateKeyPassphrase,
      base.SNOWFLAKE_PRIVATE_KEY_PASSPHRASE
    ),
    sqlRoot: overrides.sqlRoot || base.SNOWCACHE_SQL_ROOT,
    cacheDir: overrides.cacheDir || base.SNOWCACHE_CACHE_DIR,
    logLevel: overrides.logLevel ?? base.LOG_LEVEL,
  };
}

function pick(explicit: string | undefined, fallback: string | undefined): string | undefined {
  return explicit || fallback || undefined;
}
