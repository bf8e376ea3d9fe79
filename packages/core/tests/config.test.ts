/**
 * Environment-driven configuration
 */

import { describe, it, expect } from 'vitest'
import { join } from 'path'
import { DEFAULT_HOME_DIR, loadConfig } from '../src/config/config.js'
import { ConfigurationError } from '../src/errors/index.js'

describe('loadConfig', () => {
  it('should apply defaults when nothing is set', () => {
    const config = loadConfig({})

    expect(config).toEqual({
      database: {
        path: join(DEFAULT_HOME_DIR, 'titlecache.db'),
        connectionTimeoutMs: 30000,
        enableWal: true,
      },
      cache: {
        memoryTtlMs: 3_600_000,
        persistentTtlMs: 172_800_000,
        maxMemoryEntries: 1000,
      },
      download: {
        dataDir: join(DEFAULT_HOME_DIR, 'data'),
        protectionHours: 36,
        timeoutMs: 30000,
        minFileSize: 100000,
        maxFileSize: 50000000,
        maxDecompressedSize: 500000000,
        titlesUrl: undefined,
        source: 'anidb',
      },
      transactions: {
        enableLogging: true,
        retentionDays: 30,
        cleanupIntervalHours: 24,
        maxQueryLength: 100,
      },
      scheduler: {
        intervalMs: 3_600_000,
      },
    })
  })

  it('should read TITLECACHE_* variables', () => {
    const config = loadConfig({
      TITLECACHE_DB_PATH: '/tmp/titles.db',
      TITLECACHE_WAL: 'no',
      TITLECACHE_MEMORY_TTL_SECONDS: '60',
      TITLECACHE_DOWNLOAD_PROTECTION_HOURS: '0',
      TITLECACHE_TITLES_URL: 'https://titles.example.test/dump.gz',
      TITLECACHE_DEFAULT_SOURCE: 'MyAnime',
      TITLECACHE_TRANSACTION_LOGGING: '0',
      TITLECACHE_SCHEDULER_INTERVAL_MINUTES: '5',
    })

    expect(config.database.path).toBe('/tmp/titles.db')
    expect(config.database.enableWal).toBe(false)
    expect(config.cache.memoryTtlMs).toBe(60_000)
    expect(config.download.protectionHours).toBe(0)
    expect(config.download.titlesUrl).toBe('https://titles.example.test/dump.gz')
    expect(config.download.source).toBe('myanime')
    expect(config.transactions.enableLogging).toBe(false)
    expect(config.scheduler.intervalMs).toBe(300_000)
  })

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ TITLECACHE_RETENTION_DAYS: '' }).transactions.retentionDays).toBe(30)
  })

  it('should ignore unrelated variables', () => {
    expect(() => loadConfig({ HOME: '/root', PATH: '/usr/bin' })).not.toThrow()
  })

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { TITLECACHE_DB_PATH: '/tmp/env.db' },
      { database: { path: '/tmp/override.db' }, download: { protectionHours: 1 } }
    )

    expect(config.database.path).toBe('/tmp/override.db')
    expect(config.database.connectionTimeoutMs).toBe(30000)
    expect(config.download.protectionHours).toBe(1)
    expect(config.download.timeoutMs).toBe(30000)
  })

  it('should reject invalid values with every issue listed', () => {
    const load = () =>
      loadConfig({
        TITLECACHE_MAX_MEMORY_ENTRIES: '-5',
        TITLECACHE_WAL: 'maybe',
      })

    expect(load).toThrow(ConfigurationError)
    try {
      load()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('CONFIGURATION_ERROR')
        expect(error.context).toEqual({ issues: 2 })
        expect(error.message).toContain('TITLECACHE_MAX_MEMORY_ENTRIES')
        expect(error.message).toContain('TITLECACHE_WAL')
      }
    }
  })

  it('should reject an in-memory database path', () => {
    expect(() => loadConfig({ TITLECACHE_DB_PATH: ':memory:' })).toThrow(
      'TITLECACHE_DB_PATH: an in-memory database is not supported'
    )
    expect(() => loadConfig({}, { database: { path: ':memory:' } })).toThrow(ConfigurationError)
  })

  it('should reject a source name that is not an identifier', () => {
    expect(() => loadConfig({ TITLECACHE_DEFAULT_SOURCE: 'drop table' })).toThrow(/TITLECACHE_DEFAULT_SOURCE/)
  })
})
