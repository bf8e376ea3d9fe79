/**
 * TitleIndex - per-source title tables with tiered matching
 *
 * Provides:
 * - Source table creation
 * - Exact -> prefix -> substring search, deduplicated by external id
 * - Wholesale replacement after a bulk download
 * - Per-source metadata (download bookkeeping, load timestamps)
 */

import type { SqliteStore } from '../db/connection.js'
import { sourceSchemaSql } from '../db/schema.js'
import { NotInitializedError } from '../errors/index.js'
import {
  metadataTable,
  storageObjectName,
  titlesTable,
  validateSourceName,
  type SourceName,
} from '../security/identifiers.js'
import {
  buildCountQuery,
  buildDeleteQuery,
  buildSelectQuery,
  buildUpsertQuery,
  escapeLikePattern,
  type Condition,
  type SqlValue,
} from '../security/QueryBuilder.js'
import { createAuditEvent, createLogger, type Logger } from '../utils/logger.js'
import type { MatchType, MetadataEntry, SourceStats, TitleMatch, TitleRecord } from './types.js'
import type { CountRow, MetadataRow, TitleRow } from './TitleIndex.types.js'
import { normalizeTitle, rowToMetadataEntry, rowToTitleMatch } from './TitleIndex.helpers.js'

/** Queries shorter than this (after trimming) never reach storage */
export const MIN_QUERY_LENGTH = 2

const TITLE_COLUMNS = ['external_id', 'title_type', 'language', 'title']

const TIER_ORDER = [
  { column: 'title_type' },
  { column: 'language' },
  { column: 'external_id' },
  { column: 'title' },
]

/**
 * Title index over `{source}_titles` / `{source}_metadata`
 */
export class TitleIndex {
  private readonly store: SqliteStore
  private readonly log: Logger
  private readonly now: () => number

  constructor(store: SqliteStore, options: { logger?: Logger; now?: () => number } = {}) {
    this.store = store
    this.log = options.logger ?? createLogger('TitleIndex')
    this.now = options.now ?? (() => Date.now())
  }

  private source(name: string): SourceName {
    return validateSourceName(name, this.log)
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString()
  }

  // ==================== Source Tables ====================

  /**
   * Create the source's tables and indexes (idempotent)
   */
  initializeSource(name: string): void {
    const source = this.source(name)
    const upsert = buildUpsertQuery({
      table: metadataTable(source),
      values: { key: 'source_initialized', value: this.timestamp(), updated_at: this.timestamp() },
      conflict: 'key',
      onConflict: 'ignore',
    })

    this.store.withConnection('titles.initializeSource', (db) => {
      db.exec(sourceSchemaSql(source))
      db.prepare(upsert.sql).run(...upsert.params)
    })
    this.log.debug('Source initialized', { source })
  }

  /**
   * Whether the source's tables exist
   */
  isInitialized(name: string): boolean {
    const source = this.source(name)
    return this.store.withConnection('titles.isInitialized', (db) => {
      const row = db
        .prepare<[string], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
        )
        .get(storageObjectName(titlesTable(source)))
      return row !== undefined
    })
  }

  // ==================== Search ====================

  /**
   * Tiered title search.
   *
   * Tiers run in order (exact, prefix, substring) until `limit` distinct
   * external ids are collected. Within a tier rows are ordered by title type,
   * then language. The first match of an external id wins.
   */
  search(name: string, query: string, limit = 10): TitleMatch[] {
    const trimmed = query.trim()
    if (trimmed.length < MIN_QUERY_LENGTH || limit <= 0) {
      return []
    }

    const source = this.source(name)
    const normalized = normalizeTitle(trimmed)
    const escaped = escapeLikePattern(normalized)

    const tiers: Array<{ matchType: MatchType; where: Condition[] }> = [
      {
        matchType: 'exact',
        where: [{ column: 'title_normalized', op: '=', value: normalized }],
      },
      {
        matchType: 'prefix',
        where: [
          { column: 'title_normalized', op: 'LIKE', value: `${escaped}%`, escape: '\\' },
          { column: 'title_normalized', op: '!=', value: normalized },
        ],
      },
      {
        matchType: 'substring',
        where: [
          { column: 'title_normalized', op: 'LIKE', value: `%${escaped}%`, escape: '\\' },
          { column: 'title_normalized', op: 'NOT LIKE', value: `${escaped}%`, escape: '\\' },
        ],
      },
    ]

    return this.store.withConnection('titles.search', (db) => {
      const seen = new Set<number>()
      const results: TitleMatch[] = []

      for (const tier of tiers) {
        if (results.length >= limit) break

        const { sql, params } = buildSelectQuery({
          table: titlesTable(source),
          columns: TITLE_COLUMNS,
          where: tier.where,
          orderBy: TIER_ORDER,
        })

        for (const row of db.prepare<SqlValue[], TitleRow>(sql).iterate(...params)) {
          if (seen.has(row.external_id)) continue
          seen.add(row.external_id)
          results.push(rowToTitleMatch(row, tier.matchType))
          if (results.length >= limit) break
        }
      }

      return results
    })
  }

  // ==================== Bulk Replace ====================

  /**
   * Replace every title of a source in one transaction.
   *
   * @returns Number of rows inserted (duplicates are ignored)
   */
  bulkReplace(name: string, records: readonly TitleRecord[]): number {
    const source = this.source(name)
    const table = storageObjectName(titlesTable(source))
    const now = this.timestamp()
    const clear = buildDeleteQuery({ table: titlesTable(source) })
    const stamp = buildUpsertQuery({
      table: metadataTable(source),
      values: { key: 'last_titles_update', value: now, updated_at: now },
      conflict: 'key',
    })

    const inserted = this.store.withTransaction('titles.bulkReplace', (db) => {
      db.exec(sourceSchemaSql(source))
      db.prepare(clear.sql).run(...clear.params)

      const insert = db.prepare<[number, number, string, string, string, string]>(
        `INSERT OR IGNORE INTO ${table}
         (external_id, title_type, language, title, title_normalized, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )

      let count = 0
      for (const record of records) {
        count += insert.run(
          record.externalId,
          record.titleType,
          record.language,
          record.title,
          normalizeTitle(record.title),
          now
        ).changes
      }

      db.prepare(stamp.sql).run(...stamp.params)
      return count
    })

    this.log.auditLog(
      createAuditEvent('titles.replace', 'TitleIndex', table, 'bulk_replace', 'success', {
        records: records.length,
        inserted,
      })
    )
    return inserted
  }

  // ==================== Counts & Stats ====================

  countTitles(name: string): number {
    const source = this.source(name)
    const { sql, params } = buildCountQuery({ table: titlesTable(source) })
    return this.store.withConnection('titles.count', (db) => {
      return db.prepare<SqlValue[], CountRow>(sql).get(...params)?.count ?? 0
    })
  }

  /**
   * True when the source has at least one title; false when uninitialized
   */
  hasTitles(name: string): boolean {
    try {
      return this.countTitles(name) > 0
    } catch (error) {
      if (error instanceof NotInitializedError) return false
      throw error
    }
  }

  getStats(names: readonly string[]): SourceStats[] {
    return names.map((name) => {
      const source = this.source(name)
      if (!this.isInitialized(source)) {
        return { source, initialized: false, totalTitles: 0, uniqueIds: 0, lastUpdate: null }
      }

      const titles = storageObjectName(titlesTable(source))
      const metadata = storageObjectName(metadataTable(source))
      return this.store.withConnection('titles.stats', (db) => {
        const row = db
          .prepare<[], { total: number; unique_ids: number }>(
            `SELECT COUNT(*) AS total, COUNT(DISTINCT external_id) AS unique_ids FROM ${titles}`
          )
          .get()
        const lastUpdate = db
          .prepare<[string], { value: string | null }>(
            `SELECT value FROM ${metadata} WHERE key = ?`
          )
          .get('last_titles_update')

        return {
          source,
          initialized: true,
          totalTitles: row?.total ?? 0,
          uniqueIds: row?.unique_ids ?? 0,
          lastUpdate: lastUpdate?.value ?? null,
        }
      })
    })
  }

  // ==================== Metadata ====================

  getMetadata(name: string, key: string): string | null {
    const source = this.source(name)
    const { sql, params } = buildSelectQuery({
      table: metadataTable(source),
      columns: ['key', 'value', 'updated_at'],
      where: [{ column: 'key', op: '=', value: key }],
    })
    return this.store.withConnection('titles.getMetadata', (db) => {
      return db.prepare<SqlValue[], MetadataRow>(sql).get(...params)?.value ?? null
    })
  }

  setMetadata(name: string, key: string, value: string): void {
    const source = this.source(name)
    const now = this.timestamp()
    const { sql, params } = buildUpsertQuery({
      table: metadataTable(source),
      values: { key, value, updated_at: now },
      conflict: 'key',
    })
    this.store.withConnection('titles.setMetadata', (db) => {
      db.exec(sourceSchemaSql(source))
      db.prepare(sql).run(...params)
    })
  }

  /**
   * List metadata, newest key first, optionally filtered by key prefix
   */
  listMetadata(name: string, prefix?: string, limit?: number): MetadataEntry[] {
    const source = this.source(name)
    const { sql, params } = buildSelectQuery({
      table: metadataTable(source),
      columns: ['key', 'value', 'updated_at'],
      where:
        prefix !== undefined
          ? [{ column: 'key', op: 'LIKE', value: `${escapeLikePattern(prefix)}%`, escape: '\\' }]
          : undefined,
      orderBy: [{ column: 'key', direction: 'DESC' }],
      limit,
    })
    return this.store.withConnection('titles.listMetadata', (db) => {
      return db.prepare<SqlValue[], MetadataRow>(sql).all(...params).map(rowToMetadataEntry)
    })
  }

  deleteMetadata(name: string, key: string): boolean {
    const source = this.source(name)
    const { sql, params } = buildDeleteQuery({
      table: metadataTable(source),
      where: [{ column: 'key', op: '=', value: key }],
    })
    return this.store.withConnection('titles.deleteMetadata', (db) => {
      return db.prepare(sql).run(...params).changes > 0
    })
  }
}
