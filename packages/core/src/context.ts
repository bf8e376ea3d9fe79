/**
 * Application context
 *
 * Builds every component once, wired explicitly. Nothing here is global:
 * two contexts over two database files never share state.
 */

import { TransactionLog } from './analytics/TransactionLog.js'
import { CodecRegistry } from './cache/codecs.js'
import { createTieredCache, type TieredCache } from './cache/TieredCache.js'
import { loadConfig, type ConfigOverrides, type TitleCacheConfig } from './config/config.js'
import { SqliteStore } from './db/connection.js'
import { DownloadGate } from './download/DownloadGate.js'
import { HttpTitlesFetcher } from './download/HttpTitlesFetcher.js'
import type { TitlesFetcher } from './download/types.js'
import { ConfigurationError } from './errors/index.js'
import { AnalyticsScheduler } from './scheduler/AnalyticsScheduler.js'
import { MaintenanceScheduler } from './scheduler/MaintenanceScheduler.js'
import { TimerTicker, type Ticker } from './scheduler/Ticker.js'
import { SearchService } from './services/SearchService.js'
import { TitleIndex } from './titles/TitleIndex.js'
import { createLogger, MemoryLogAggregator, type Logger } from './utils/logger.js'

export interface AppContextOptions {
  /** Fully resolved config; skips environment parsing */
  config?: TitleCacheConfig
  env?: NodeJS.ProcessEnv
  overrides?: ConfigOverrides
  /** Replaces the HTTP fetcher built from TITLECACHE_TITLES_URL */
  fetcher?: TitlesFetcher
  codecs?: CodecRegistry
  /** Drives the schedulers and every component clock */
  ticker?: Ticker
  /** Start both schedulers immediately (default: false) */
  startSchedulers?: boolean
}

export interface AppContext {
  config: TitleCacheConfig
  logs: MemoryLogAggregator
  store: SqliteStore
  cache: TieredCache
  titles: TitleIndex
  gate: DownloadGate
  transactions: TransactionLog
  maintenance: MaintenanceScheduler
  analytics: AnalyticsScheduler
  search: SearchService
  /** Logger bound to this context's aggregator */
  logger(namespace: string): Logger
}

const unconfiguredFetcher: TitlesFetcher = {
  fetch: () =>
    Promise.reject(
      new ConfigurationError('TITLECACHE_TITLES_URL is not set; cannot download the titles file')
    ),
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = options.config ?? loadConfig(options.env, options.overrides)
  const logs = new MemoryLogAggregator()
  const logger = (namespace: string): Logger => createLogger(namespace, logs)
  const ticker = options.ticker ?? new TimerTicker()
  const now = (): number => ticker.now()

  const store = new SqliteStore(config.database.path, {
    timeoutMs: config.database.connectionTimeoutMs,
    wal: config.database.enableWal,
  })
  store.initialize()

  const cache = await createTieredCache({
    store,
    memoryTtlMs: config.cache.memoryTtlMs,
    persistentTtlMs: config.cache.persistentTtlMs,
    maxMemoryEntries: config.cache.maxMemoryEntries,
    codecs: options.codecs,
    logger: logger('TieredCache'),
    now,
  })

  const titles = new TitleIndex(store, { logger: logger('TitleIndex'), now })

  const titlesUrl = config.download.titlesUrl
  const fetcher =
    options.fetcher ??
    (titlesUrl !== undefined
      ? new HttpTitlesFetcher({ url: titlesUrl, timeoutMs: config.download.timeoutMs })
      : unconfiguredFetcher)

  const gate = new DownloadGate({
    titles,
    source: config.download.source,
    dataDir: config.download.dataDir,
    fetcher,
    protectionHours: config.download.protectionHours,
    minFileSize: config.download.minFileSize,
    maxFileSize: config.download.maxFileSize,
    maxDecompressedSize: config.download.maxDecompressedSize,
    logger: logger('DownloadGate'),
    now,
  })

  const transactions = new TransactionLog(store, {
    enableLogging: config.transactions.enableLogging,
    maxQueryLength: config.transactions.maxQueryLength,
    logger: logger('TransactionLog'),
    now,
  })

  // Transaction retention belongs to the analytics scheduler
  const maintenance = new MaintenanceScheduler({
    store,
    cache,
    gate,
    ticker,
    intervalMs: config.scheduler.intervalMs,
    logger: logger('MaintenanceScheduler'),
  })

  const analytics = new AnalyticsScheduler({
    transactions,
    cleanupIntervalHours: config.transactions.cleanupIntervalHours,
    retentionDays: config.transactions.retentionDays,
    ticker,
    intervalMs: config.scheduler.intervalMs,
    logger: logger('AnalyticsScheduler'),
  })

  const search = new SearchService({
    titles,
    cache,
    transactions,
    gates: [gate],
    logger: logger('SearchService'),
  })

  if (options.startSchedulers) {
    maintenance.start()
    analytics.start()
  }

  return {
    config,
    logs,
    store,
    cache,
    titles,
    gate,
    transactions,
    maintenance,
    analytics,
    search,
    logger,
  }
}

/**
 * Stop both schedulers; resolves after any running task has finished
 */
export async function closeAppContext(ctx: AppContext): Promise<void> {
  await Promise.all([ctx.maintenance.stop(), ctx.analytics.stop()])
}
