/**
 * Tiered cache
 * L1 (memory) + L2 (durable store) with promotion and sticky degraded mode
 */

import { performance } from 'perf_hooks'
import type { SqliteStore } from '../db/connection.js'
import { getErrorMessage } from '../errors/index.js'
import { createAuditEvent, createLogger, type Logger } from '../utils/logger.js'
import { createCacheEntry, generateCacheKey, isExpired, isValidCacheKey, methodFromKey, stableStringify } from './CacheEntry.js'
import { CodecRegistry } from './codecs.js'
import { DurableCache, type DurableCacheStats, type DurableCacheStore } from './DurableCache.js'
import { TTLCache, type TTLCacheStats } from './TTLCache.js'

/** Tiered cache configuration */
export interface TieredCacheOptions {
  l1: TTLCache<unknown>
  l2?: DurableCacheStore | null
  codecs?: CodecRegistry
  persistentTtlMs?: number  // L2 TTL in ms (default: 48 hours)
  logger?: Logger
  now?: () => number
}

/** Cache statistics */
export interface TieredCacheStats {
  l1Hits: number;       l1Misses: number
  l2Hits: number;       l2Misses: number
  totalHits: number;    totalMisses: number
  hitRate: number;      promotions: number
  avgL1AccessMs: number
  avgL2AccessMs: number
  durableAvailable: boolean
  l1: TTLCacheStats
  l2?: DurableCacheStats
}

/** Counts removed by clear / cleanupExpired */
export interface TierCounts {
  l1: number
  l2: number
}

const ACCESS_SAMPLE_SIZE = 100

function pushSample(samples: number[], value: number): void {
  samples.push(value)
  if (samples.length > ACCESS_SAMPLE_SIZE) {
    samples.shift()
  }
}

function average(samples: number[]): number {
  return samples.length > 0 ? samples.reduce((a, b) => a + b, 0) / samples.length : 0
}

/**
 * Two-tier cache. A single mutex serializes every operation on one instance,
 * so a slow L2 call holds up all concurrent callers of that instance.
 */
export class TieredCache {
  private readonly l1: TTLCache<unknown>
  private readonly l2: DurableCacheStore | null
  private readonly codecs: CodecRegistry
  private readonly persistentTtlMs: number
  private readonly log: Logger
  private readonly now: () => number

  private l2Available: boolean
  private lock: Promise<void> = Promise.resolve()

  private stats = {
    l1Hits: 0,
    l1Misses: 0,
    l2Hits: 0,
    l2Misses: 0,
    promotions: 0,
  }
  private l1AccessTimes: number[] = []
  private l2AccessTimes: number[] = []

  constructor(options: TieredCacheOptions) {
    this.l1 = options.l1
    this.l2 = options.l2 ?? null
    this.l2Available = this.l2 !== null
    this.codecs = options.codecs ?? new CodecRegistry()
    this.persistentTtlMs = options.persistentTtlMs ?? 48 * 60 * 60 * 1000
    this.log = options.logger ?? createLogger('TieredCache')
    this.now = options.now ?? (() => Date.now())
  }

  /**
   * Run `fn` with exclusive access to this cache instance
   */
  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.lock
    let release: () => void = () => {}
    this.lock = new Promise<void>((resolve) => {
      release = resolve
    })

    await previous
    try {
      return await fn()
    } finally {
      release()
    }
  }

  /**
   * Switch to L1-only for the rest of this instance's lifetime
   */
  private degrade(operation: string, error: unknown): void {
    if (!this.l2Available) return
    this.l2Available = false
    this.log.error(
      `Durable cache disabled after ${operation} failure, continuing in memory only`,
      error instanceof Error ? error : undefined,
      { operation, reason: getErrorMessage(error) }
    )
    this.log.auditLog(
      createAuditEvent('cache.degraded', 'TieredCache', 'persistent_cache', operation, 'error', {
        reason: getErrorMessage(error),
      })
    )
  }

  /**
   * Get a value (L1 first, then L2 with promotion)
   */
  get(key: string): Promise<unknown> {
    return this.withLock(async () => {
      const l1Start = performance.now()
      const cached = this.l1.get(key)
      pushSample(this.l1AccessTimes, performance.now() - l1Start)
      if (cached !== undefined) {
        this.stats.l1Hits++
        return cached
      }
      this.stats.l1Misses++

      if (!this.l2 || !this.l2Available || !isValidCacheKey(key)) {
        return undefined
      }

      const l2Start = performance.now()
      try {
        return await this.readThrough(this.l2, key)
      } catch (error) {
        this.stats.l2Misses++
        this.degrade('get', error)
        return undefined
      } finally {
        pushSample(this.l2AccessTimes, performance.now() - l2Start)
      }
    })
  }

  private async readThrough(l2: DurableCacheStore, key: string): Promise<unknown> {
    const entry = await l2.getEntry(key)
    if (!entry) {
      this.stats.l2Misses++
      return undefined
    }

    const now = this.now()
    if (isExpired(entry, now)) {
      await l2.deleteEntry(key)
      this.stats.l2Misses++
      return undefined
    }

    let value: unknown
    try {
      value = this.codecs.codecFor(entry.methodName).decode(entry.parsedDataJson)
    } catch (error) {
      this.log.warn('Discarding undecodable durable cache entry', {
        key,
        methodName: entry.methodName,
        reason: getErrorMessage(error),
      })
      await l2.deleteEntry(key)
      this.stats.l2Misses++
      return undefined
    }

    await l2.updateAccess(key)

    // Promote; L1 never outlives the durable copy
    this.l1.set(key, value, Math.min(this.l1.defaultTtlMs, entry.expiresAt - now))
    this.stats.l2Hits++
    this.stats.promotions++
    return value
  }

  /**
   * Store a value in both tiers. Storage failures never reach the caller.
   * `undefined` is not cacheable and is ignored. A key the durable store
   * rejects (see `isValidCacheKey`) is kept in memory only.
   */
  set(
    key: string,
    value: unknown,
    raw?: string | null,
    parameters?: Record<string, unknown>
  ): Promise<void> {
    return this.withLock(async () => {
      if (value === undefined) return

      this.l1.set(key, value)

      if (!this.l2 || !this.l2Available) return
      if (!isValidCacheKey(key)) {
        this.log.warn('Key not accepted by the durable cache, kept in memory only', {
          keyLength: key.length,
        })
        return
      }

      let payload: string
      try {
        payload = this.codecs.codecFor(methodFromKey(key)).encode(value)
      } catch (error) {
        this.log.warn('Value not encodable, kept in memory only', {
          key,
          reason: getErrorMessage(error),
        })
        return
      }

      try {
        const entry = createCacheEntry({
          key,
          parametersJson: parameters ? stableStringify(parameters) : '{}',
          parsedDataJson: payload,
          rawPayload: raw ?? null,
          ttlMs: this.persistentTtlMs,
          now: this.now(),
        })
        await this.l2.setEntry(entry)
      } catch (error) {
        this.degrade('set', error)
      }
    })
  }

  /**
   * Delete from both tiers
   * @returns true if either tier held the key
   */
  delete(key: string): Promise<boolean> {
    return this.withLock(async () => {
      let deleted = this.l1.delete(key)

      if (this.l2 && this.l2Available) {
        try {
          deleted = (await this.l2.deleteEntry(key)) || deleted
        } catch (error) {
          this.log.warn('Durable cache delete failed', { key, reason: getErrorMessage(error) })
        }
      }

      return deleted
    })
  }

  /**
   * Delete the entry cached for `method` called with `params`
   */
  invalidate(method: string, params: Record<string, unknown>): Promise<boolean> {
    return this.delete(generateCacheKey(method, params))
  }

  /**
   * Empty both tiers
   */
  clear(): Promise<TierCounts> {
    return this.withLock(async () => {
      const l1 = this.l1.size
      this.l1.clear()

      let l2 = 0
      if (this.l2 && this.l2Available) {
        try {
          l2 = await this.l2.clear()
        } catch (error) {
          this.log.warn('Durable cache clear failed', { reason: getErrorMessage(error) })
        }
      }

      return { l1, l2 }
    })
  }

  /**
   * Sweep expired entries from both tiers
   */
  cleanupExpired(): Promise<TierCounts> {
    return this.withLock(async () => {
      const l1 = this.l1.cleanupExpired()

      let l2 = 0
      if (this.l2 && this.l2Available) {
        try {
          l2 = await this.l2.cleanupExpired()
        } catch (error) {
          this.log.warn('Durable cache cleanup failed', { reason: getErrorMessage(error) })
        }
      }

      if (l1 + l2 > 0) {
        this.log.debug('Expired cache entries removed', { l1, l2 })
      }
      return { l1, l2 }
    })
  }

  /** Whether the durable tier is still in use */
  isDurableAvailable(): boolean {
    return this.l2Available
  }

  /**
   * Get cache statistics
   */
  getStats(): Promise<TieredCacheStats> {
    return this.withLock(async () => {
      const totalHits = this.stats.l1Hits + this.stats.l2Hits
      // An L1 miss that L2 answered is a hit overall
      const totalMisses = this.stats.l1Misses - this.stats.l2Hits
      const total = totalHits + totalMisses

      let l2: DurableCacheStats | undefined
      if (this.l2 && this.l2Available) {
        try {
          l2 = await this.l2.stats()
        } catch (error) {
          this.log.warn('Durable cache stats unavailable', { reason: getErrorMessage(error) })
        }
      }

      return {
        ...this.stats,
        totalHits,
        totalMisses,
        hitRate: total > 0 ? totalHits / total : 0,
        avgL1AccessMs: average(this.l1AccessTimes),
        avgL2AccessMs: average(this.l2AccessTimes),
        durableAvailable: this.l2Available,
        l1: this.l1.getStats(),
        l2,
      }
    })
  }
}

/** Options for createTieredCache */
export interface CreateTieredCacheOptions {
  /** Durable store; omitted means L1 only */
  store?: SqliteStore
  memoryTtlMs?: number
  persistentTtlMs?: number
  maxMemoryEntries?: number
  codecs?: CodecRegistry
  logger?: Logger
  now?: () => number
}

/**
 * Build both tiers and sweep expired durable entries once at start-up
 */
export async function createTieredCache(options: CreateTieredCacheOptions = {}): Promise<TieredCache> {
  const now = options.now ?? (() => Date.now())
  const cache = new TieredCache({
    l1: new TTLCache<unknown>({
      maxEntries: options.maxMemoryEntries,
      defaultTtlMs: options.memoryTtlMs,
      now,
    }),
    l2: options.store ? new DurableCache(options.store, { now }) : null,
    codecs: options.codecs,
    persistentTtlMs: options.persistentTtlMs,
    logger: options.logger,
    now,
  })

  await cache.cleanupExpired()
  return cache
}
