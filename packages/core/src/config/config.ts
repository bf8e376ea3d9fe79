/**
 * Runtime configuration
 *
 * Environment variables are parsed once through a zod schema into a typed
 * config object that the application context hands to each component.
 */

import { join } from 'path'
import { homedir } from 'os'
import { z } from 'zod'
import { ConfigurationError } from '../errors/index.js'

/**
 * Default data directory: ~/.titlecache
 */
export const DEFAULT_HOME_DIR = join(homedir(), '.titlecache')

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const positiveInt = z.coerce.number().int().positive()

/** Every store call opens its own connection, so an in-memory database would start empty each time */
const IN_MEMORY_PATH = ':memory:'

/**
 * Zod schema for the TITLECACHE_* environment variables
 */
export const envSchema = z.object({
  TITLECACHE_DB_PATH: z
    .string()
    .min(1)
    .refine((path) => path !== IN_MEMORY_PATH, 'an in-memory database is not supported')
    .default(join(DEFAULT_HOME_DIR, 'titlecache.db')),
  TITLECACHE_DATA_DIR: z.string().min(1).default(join(DEFAULT_HOME_DIR, 'data')),
  TITLECACHE_CONNECTION_TIMEOUT_MS: positiveInt.default(30000),
  TITLECACHE_WAL: booleanFlag.default('true'),
  TITLECACHE_MEMORY_TTL_SECONDS: z.coerce.number().positive().default(3600),
  TITLECACHE_PERSISTENT_TTL_SECONDS: z.coerce.number().positive().default(172800),
  TITLECACHE_MAX_MEMORY_ENTRIES: positiveInt.default(1000),
  TITLECACHE_DOWNLOAD_PROTECTION_HOURS: z.coerce.number().nonnegative().default(36),
  TITLECACHE_DOWNLOAD_TIMEOUT_MS: positiveInt.default(30000),
  TITLECACHE_DOWNLOAD_MIN_BYTES: z.coerce.number().int().nonnegative().default(100000),
  TITLECACHE_DOWNLOAD_MAX_BYTES: positiveInt.default(50000000),
  TITLECACHE_DOWNLOAD_MAX_DECOMPRESSED_BYTES: positiveInt.default(500000000),
  TITLECACHE_TITLES_URL: z.string().url().optional(),
  TITLECACHE_DEFAULT_SOURCE: z.string().regex(/^[a-zA-Z][a-zA-Z0-9_]*$/).max(64).default('anidb'),
  TITLECACHE_TRANSACTION_LOGGING: booleanFlag.default('true'),
  TITLECACHE_RETENTION_DAYS: positiveInt.default(30),
  TITLECACHE_CLEANUP_INTERVAL_HOURS: z.coerce.number().positive().default(24),
  TITLECACHE_MAX_QUERY_LENGTH: positiveInt.default(100),
  TITLECACHE_SCHEDULER_INTERVAL_MINUTES: z.coerce.number().positive().default(60),
})

/**
 * Resolved configuration
 */
export interface TitleCacheConfig {
  database: {
    path: string
    connectionTimeoutMs: number
    enableWal: boolean
  }
  cache: {
    memoryTtlMs: number
    persistentTtlMs: number
    maxMemoryEntries: number
  }
  download: {
    dataDir: string
    protectionHours: number
    timeoutMs: number
    minFileSize: number
    maxFileSize: number
    /** Upper bound on the inflated titles file */
    maxDecompressedSize: number
    titlesUrl?: string
    /** Source the bulk titles file feeds */
    source: string
  }
  transactions: {
    enableLogging: boolean
    retentionDays: number
    cleanupIntervalHours: number
    maxQueryLength: number
  }
  scheduler: {
    intervalMs: number
  }
}

/**
 * Partial overrides applied on top of the environment
 */
export type ConfigOverrides = {
  [K in keyof TitleCacheConfig]?: Partial<TitleCacheConfig[K]>
}

/**
 * Load configuration from environment variables.
 *
 * Unset variables fall back to defaults; invalid values throw a
 * ConfigurationError listing every issue.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): TitleCacheConfig {
  const relevant: Record<string, string> = {}
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]
    if (value !== undefined && value !== '') {
      relevant[key] = value
    }
  }

  const parsed = envSchema.safeParse(relevant)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ')
    throw new ConfigurationError(`Invalid configuration: ${details}`, {
      cause: parsed.error,
      context: { issues: parsed.error.issues.length },
    })
  }

  const e = parsed.data
  const base: TitleCacheConfig = {
    database: {
      path: e.TITLECACHE_DB_PATH,
      connectionTimeoutMs: e.TITLECACHE_CONNECTION_TIMEOUT_MS,
      enableWal: e.TITLECACHE_WAL,
    },
    cache: {
      memoryTtlMs: e.TITLECACHE_MEMORY_TTL_SECONDS * 1000,
      persistentTtlMs: e.TITLECACHE_PERSISTENT_TTL_SECONDS * 1000,
      maxMemoryEntries: e.TITLECACHE_MAX_MEMORY_ENTRIES,
    },
    download: {
      dataDir: e.TITLECACHE_DATA_DIR,
      protectionHours: e.TITLECACHE_DOWNLOAD_PROTECTION_HOURS,
      timeoutMs: e.TITLECACHE_DOWNLOAD_TIMEOUT_MS,
      minFileSize: e.TITLECACHE_DOWNLOAD_MIN_BYTES,
      maxFileSize: e.TITLECACHE_DOWNLOAD_MAX_BYTES,
      maxDecompressedSize: e.TITLECACHE_DOWNLOAD_MAX_DECOMPRESSED_BYTES,
      titlesUrl: e.TITLECACHE_TITLES_URL,
      source: e.TITLECACHE_DEFAULT_SOURCE.toLowerCase(),
    },
    transactions: {
      enableLogging: e.TITLECACHE_TRANSACTION_LOGGING,
      retentionDays: e.TITLECACHE_RETENTION_DAYS,
      cleanupIntervalHours: e.TITLECACHE_CLEANUP_INTERVAL_HOURS,
      maxQueryLength: e.TITLECACHE_MAX_QUERY_LENGTH,
    },
    scheduler: {
      intervalMs: e.TITLECACHE_SCHEDULER_INTERVAL_MINUTES * 60 * 1000,
    },
  }

  const config: TitleCacheConfig = {
    database: { ...base.database, ...overrides.database },
    cache: { ...base.cache, ...overrides.cache },
    download: { ...base.download, ...overrides.download },
    transactions: { ...base.transactions, ...overrides.transactions },
    scheduler: { ...base.scheduler, ...overrides.scheduler },
  }

  if (config.database.path === IN_MEMORY_PATH) {
    throw new ConfigurationError('Invalid configuration: database.path: an in-memory database is not supported', {
      context: { issues: 1 },
    })
  }

  return config
}
