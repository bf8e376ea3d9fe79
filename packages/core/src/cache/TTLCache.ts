/**
 * In-process TTL cache (L1)
 * Bounded, expiring key -> value store with no persistence
 */

import { LRUCache } from 'lru-cache'

/** L1 configuration */
export interface TTLCacheOptions {
  maxEntries?: number   // Maximum entries (default: 1000)
  defaultTtlMs?: number // Default TTL in ms (default: 1 hour)
  now?: () => number    // Clock (default: Date.now)
}

/** L1 statistics */
export interface TTLCacheStats {
  hits: number
  misses: number
  evictions: number
  expirations: number
  size: number
  maxEntries: number
  hitRate: number
}

interface Slot<V> {
  value: V
  expiresAt: number
}

/**
 * L1 cache. When full, the least recently accessed entry is evicted.
 * Expiry uses absolute timestamps from the injected clock, checked on access.
 */
export class TTLCache<V = unknown> {
  private readonly cache: LRUCache<string, Slot<V>>
  private readonly now: () => number
  readonly maxEntries: number
  readonly defaultTtlMs: number

  private hits = 0
  private misses = 0
  private evictions = 0
  private expirations = 0

  constructor(options: TTLCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000
    this.defaultTtlMs = options.defaultTtlMs ?? 60 * 60 * 1000
    this.now = options.now ?? (() => Date.now())

    this.cache = new LRUCache<string, Slot<V>>({
      max: this.maxEntries,
      dispose: (_slot, _key, reason) => {
        if (reason === 'evict') {
          this.evictions++
        }
      },
    })
  }

  /**
   * Get a value; expired entries are removed and count as a miss
   */
  get(key: string): V | undefined {
    const slot = this.cache.get(key)
    if (!slot) {
      this.misses++
      return undefined
    }

    if (this.now() >= slot.expiresAt) {
      this.cache.delete(key)
      this.expirations++
      this.misses++
      return undefined
    }

    this.hits++
    return slot.value
  }

  /**
   * Store a value with absolute expiry = now + ttl
   */
  set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    this.cache.set(key, { value, expiresAt: this.now() + ttlMs })
  }

  /**
   * Presence check that does not touch recency or stats
   */
  has(key: string): boolean {
    const slot = this.cache.peek(key)
    return slot !== undefined && this.now() < slot.expiresAt
  }

  delete(key: string): boolean {
    return this.cache.delete(key)
  }

  clear(): void {
    this.cache.clear()
  }

  /**
   * Remove every expired entry
   * @returns Number of entries removed
   */
  cleanupExpired(): number {
    const now = this.now()
    const expired: string[] = []
    for (const [key, slot] of this.cache.entries()) {
      if (now >= slot.expiresAt) {
        expired.push(key)
      }
    }
    for (const key of expired) {
      this.cache.delete(key)
    }
    this.expirations += expired.length
    return expired.length
  }

  /** Current entry count, expired-but-unswept entries included */
  get size(): number {
    return this.cache.size
  }

  getStats(): TTLCacheStats {
    const total = this.hits + this.misses
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
      size: this.cache.size,
      maxEntries: this.maxEntries,
      hitRate: total > 0 ? this.hits / total : 0,
    }
  }
}
