/**
 * Durable cache (L2)
 * SQL-backed cache entries with TTL, access stats and size accounting.
 * Every driver failure leaves this class as a StorageError.
 */

import type { Database as DatabaseType } from 'better-sqlite3'
import { SqliteStore } from '../db/connection.js'
import { toStorageError } from '../errors/index.js'
import { type CacheEntry, type CacheEntryRow, rowToCacheEntry } from './CacheEntry.js'

/** Per-method breakdown in durable stats */
export interface MethodStats {
  methodName: string
  count: number
  totalBytes: number
  averageAccessCount: number
}

/** Durable cache statistics */
export interface DurableCacheStats {
  total: number
  expired: number
  active: number
  totalBytes: number
  fileBytes: number
  byMethod: MethodStats[]
}

/**
 * Operations the tiered cache needs from its durable tier
 */
export interface DurableCacheStore {
  getEntry(key: string): Promise<CacheEntry | null>
  setEntry(entry: CacheEntry): Promise<void>
  updateAccess(key: string): Promise<void>
  deleteEntry(key: string): Promise<boolean>
  clear(): Promise<number>
  cleanupExpired(): Promise<number>
  stats(): Promise<DurableCacheStats>
}

const ENTRY_COLUMNS = `cache_key, method_name, parameters_json, raw_payload, parsed_data_json,
  created_at, expires_at, access_count, last_accessed, data_size`

/**
 * L2 cache over the `persistent_cache` table
 */
export class DurableCache implements DurableCacheStore {
  private readonly store: SqliteStore
  private readonly now: () => number

  constructor(store: SqliteStore, options: { now?: () => number } = {}) {
    this.store = store
    this.now = options.now ?? (() => Date.now())
  }

  private run<T>(operation: string, fn: (db: DatabaseType) => T): Promise<T> {
    try {
      return Promise.resolve(this.store.withConnection(`cache.${operation}`, fn))
    } catch (error) {
      return Promise.reject(toStorageError(error, `cache.${operation}`))
    }
  }

  /**
   * Fetch an entry regardless of expiry; the caller decides what expired means
   */
  getEntry(key: string): Promise<CacheEntry | null> {
    return this.run('getEntry', (db) => {
      const row = db
        .prepare<[string], CacheEntryRow>(
          `SELECT ${ENTRY_COLUMNS} FROM persistent_cache WHERE cache_key = ?`
        )
        .get(key)
      return row ? rowToCacheEntry(row) : null
    })
  }

  setEntry(entry: CacheEntry): Promise<void> {
    return this.run('setEntry', (db) => {
      db.prepare(
        `INSERT OR REPLACE INTO persistent_cache (${ENTRY_COLUMNS})
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        entry.key,
        entry.methodName,
        entry.parametersJson,
        entry.rawPayload,
        entry.parsedDataJson,
        entry.createdAt,
        entry.expiresAt,
        entry.accessCount,
        entry.lastAccessed,
        entry.sizeBytes
      )
    })
  }

  /**
   * Increment access_count and bump last_accessed
   */
  updateAccess(key: string): Promise<void> {
    const now = this.now()
    return this.run('updateAccess', (db) => {
      db.prepare(
        `UPDATE persistent_cache
         SET access_count = access_count + 1, last_accessed = ?
         WHERE cache_key = ?`
      ).run(now, key)
    })
  }

  deleteEntry(key: string): Promise<boolean> {
    return this.run('deleteEntry', (db) => {
      return db.prepare('DELETE FROM persistent_cache WHERE cache_key = ?').run(key).changes > 0
    })
  }

  clear(): Promise<number> {
    return this.run('clear', (db) => db.prepare('DELETE FROM persistent_cache').run().changes)
  }

  /**
   * Remove entries whose expires_at <= now
   */
  cleanupExpired(): Promise<number> {
    const now = this.now()
    return this.run('cleanupExpired', (db) => {
      return db.prepare('DELETE FROM persistent_cache WHERE expires_at <= ?').run(now).changes
    })
  }

  stats(): Promise<DurableCacheStats> {
    const now = this.now()
    return this.run('stats', (db) => {
      const totals = db
        .prepare<[number], { total: number; expired: number | null; total_bytes: number | null }>(
          `SELECT COUNT(*) AS total,
                  SUM(CASE WHEN expires_at <= ? THEN 1 ELSE 0 END) AS expired,
                  SUM(data_size) AS total_bytes
           FROM persistent_cache`
        )
        .get(now)

      const byMethod = db
        .prepare<
          [],
          { method_name: string; count: number; total_bytes: number | null; avg_access: number | null }
        >(
          `SELECT method_name, COUNT(*) AS count, SUM(data_size) AS total_bytes,
                  AVG(access_count) AS avg_access
           FROM persistent_cache
           GROUP BY method_name
           ORDER BY count DESC, method_name ASC`
        )
        .all()

      const total = totals?.total ?? 0
      const expired = totals?.expired ?? 0
      return {
        total,
        expired,
        active: total - expired,
        totalBytes: totals?.total_bytes ?? 0,
        fileBytes: this.store.fileSize(),
        byMethod: byMethod.map((row) => ({
          methodName: row.method_name,
          count: row.count,
          totalBytes: row.total_bytes ?? 0,
          averageAccessCount: row.avg_access ?? 0,
        })),
      }
    })
  }
}
