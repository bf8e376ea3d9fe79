/**
 * TransactionLog - append-only search log with analytics
 *
 * Provides:
 * - Search and details lookup logging (never fails the caller)
 * - Search statistics, response-time percentiles and query analytics
 * - Retention cleanup
 */

import type { SqliteStore } from '../db/connection.js'
import { TransactionLoggingError, getErrorMessage } from '../errors/index.js'
import { storageObjectName, systemTable } from '../security/identifiers.js'
import type { SqlValue } from '../security/QueryBuilder.js'
import { createAuditEvent, createLogger, type Logger } from '../utils/logger.js'
import type {
  DetailsLogInput,
  HighResultQuery,
  LengthCategoryStats,
  OverallStats,
  PerformanceBand,
  PerformanceMetrics,
  QueryAnalytics,
  SearchLogInput,
  SearchStats,
  SearchTransaction,
} from './types.js'
import type {
  BandRow,
  HighResultRow,
  HourRow,
  LengthRow,
  QueryCountRow,
  ResponseTimeRow,
  SearchTransactionRow,
  SourceRow,
  SummaryRow,
} from './TransactionLog.types.js'
import {
  computePercentiles,
  isLengthCategory,
  isPerformanceBand,
  round,
  rowToTransaction,
} from './TransactionLog.helpers.js'

const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS

/** Response time target used for SLA compliance */
export const SLA_TARGET_MS = 100

const TRANSACTIONS = storageObjectName(systemTable('search_transactions'))

export interface TransactionLogOptions {
  /** Disable to turn every log call into a no-op (default: true) */
  enableLogging?: boolean
  /** Longer query text is truncated (default: 100) */
  maxQueryLength?: number
  logger?: Logger
  now?: () => number
}

interface TimeWindow {
  where: string
  params: SqlValue[]
}

/**
 * Search transaction log over `search_transactions`
 */
export class TransactionLog {
  readonly enabled: boolean
  private readonly store: SqliteStore
  private readonly maxQueryLength: number
  private readonly log: Logger
  private readonly now: () => number

  constructor(store: SqliteStore, options: TransactionLogOptions = {}) {
    this.store = store
    this.enabled = options.enableLogging ?? true
    this.maxQueryLength = options.maxQueryLength ?? 100
    this.log = options.logger ?? createLogger('TransactionLog')
    this.now = options.now ?? (() => Date.now())
  }

  private isoNow(): string {
    return new Date(this.now()).toISOString()
  }

  private window(source: string | undefined, sinceMs: number): TimeWindow {
    const since = new Date(this.now() - sinceMs).toISOString()
    return source !== undefined
      ? { where: 'WHERE source = ? AND timestamp >= ?', params: [source, since] }
      : { where: 'WHERE timestamp >= ?', params: [since] }
  }

  // ==================== Logging ====================

  /**
   * Append a search transaction.
   *
   * @returns false when logging is disabled or the insert failed
   */
  logSearch(input: SearchLogInput): boolean {
    if (!this.enabled) return false
    return this.insert(input.source, input.query, input.resultCount, input.responseTimeMs, input.clientId)
  }

  /**
   * Append a details lookup, recorded as query `details:<id>`
   */
  logDetails(input: DetailsLogInput): boolean {
    if (!this.enabled) return false
    return this.insert(
      input.source,
      `details:${input.externalId}`,
      input.found ? 1 : 0,
      input.responseTimeMs,
      input.clientId
    )
  }

  private insert(
    source: string,
    query: string,
    resultCount: number,
    responseTimeMs: number,
    clientId: string | undefined
  ): boolean {
    const timestamp = this.isoNow()
    try {
      this.store.withConnection('transactions.insert', (db) => {
        db.prepare<[string, string, string, number, number, string | null, string]>(
          `INSERT INTO ${TRANSACTIONS}
           (timestamp, source, query, result_count, response_time_ms, client_identifier, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        ).run(
          timestamp,
          source,
          query.slice(0, this.maxQueryLength),
          resultCount,
          responseTimeMs,
          clientId ?? null,
          timestamp
        )
      })
      return true
    } catch (error) {
      const wrapped = new TransactionLoggingError(`Failed to log transaction: ${getErrorMessage(error)}`, {
        cause: error,
        context: { source },
      })
      this.log.warn(wrapped.message, wrapped.context)
      return false
    }
  }

  // ==================== Analytics ====================

  getSearchStats(source?: string, hours = 24): SearchStats {
    const { where, params } = this.window(source, hours * HOUR_MS)

    return this.store.withConnection('transactions.searchStats', (db) => {
      const summary = db
        .prepare<SqlValue[], SummaryRow>(
          `SELECT COUNT(*) AS total, AVG(response_time_ms) AS avg_response_time, AVG(result_count) AS avg_results
           FROM ${TRANSACTIONS} ${where}`
        )
        .get(...params)

      const popularQueries = db
        .prepare<SqlValue[], QueryCountRow>(
          `SELECT query, COUNT(*) AS count FROM ${TRANSACTIONS} ${where}
           GROUP BY query ORDER BY count DESC, query ASC LIMIT 10`
        )
        .all(...params)

      const hourRows = db
        .prepare<SqlValue[], HourRow>(
          `SELECT strftime('%H', timestamp) AS hour, COUNT(*) AS searches, AVG(response_time_ms) AS avg_time
           FROM ${TRANSACTIONS} ${where}
           GROUP BY hour ORDER BY hour`
        )
        .all(...params)

      const bands = db
        .prepare<SqlValue[], BandRow>(
          `SELECT
             CASE
               WHEN response_time_ms < 10 THEN 'excellent'
               WHEN response_time_ms < 50 THEN 'good'
               WHEN response_time_ms < 100 THEN 'fair'
               ELSE 'poor'
             END AS band,
             COUNT(*) AS count
           FROM ${TRANSACTIONS} ${where}
           GROUP BY band`
        )
        .all(...params)

      const performanceDistribution: Record<PerformanceBand, number> = {
        excellent: 0,
        good: 0,
        fair: 0,
        poor: 0,
      }
      for (const row of bands) {
        if (isPerformanceBand(row.band)) {
          performanceDistribution[row.band] = row.count
        }
      }

      return {
        source: source ?? null,
        periodHours: hours,
        totalSearches: summary?.total ?? 0,
        avgResponseTimeMs: round(summary?.avg_response_time, 2),
        avgResultsPerSearch: round(summary?.avg_results, 1),
        popularQueries: popularQueries.map((row) => ({ query: row.query, count: row.count })),
        hourlyDistribution: hourRows.flatMap((row) =>
          row.hour !== null
            ? [{ hour: row.hour, searches: row.searches, avgResponseTimeMs: round(row.avg_time, 2) }]
            : []
        ),
        performanceDistribution,
        generatedAt: this.isoNow(),
      }
    })
  }

  /**
   * Response-time percentiles and SLA compliance
   */
  getPerformanceMetrics(source?: string, hours = 24): PerformanceMetrics {
    const { where, params } = this.window(source, hours * HOUR_MS)

    const times = this.store.withConnection('transactions.performance', (db) => {
      return db
        .prepare<SqlValue[], ResponseTimeRow>(
          `SELECT response_time_ms FROM ${TRANSACTIONS} ${where} ORDER BY response_time_ms ASC`
        )
        .all(...params)
        .map((row) => row.response_time_ms)
    })

    const compliant = times.filter((ms) => ms < SLA_TARGET_MS).length
    const compliance = times.length > 0 ? (compliant / times.length) * 100 : 0

    return {
      source: source ?? null,
      periodHours: hours,
      percentiles: computePercentiles(times),
      sla: {
        targetMs: SLA_TARGET_MS,
        compliancePercentage: round(compliance, 1),
        compliantSearches: compliant,
        totalSearches: times.length,
      },
      generatedAt: this.isoNow(),
    }
  }

  getQueryAnalytics(source?: string, days = 7): QueryAnalytics {
    const { where, params } = this.window(source, days * DAY_MS)

    return this.store.withConnection('transactions.queryAnalytics', (db) => {
      const lengths = db
        .prepare<SqlValue[], LengthRow>(
          `SELECT
             CASE
               WHEN LENGTH(query) < 3 THEN 'short'
               WHEN LENGTH(query) < 10 THEN 'medium'
               ELSE 'long'
             END AS category,
             COUNT(*) AS count,
             AVG(result_count) AS avg_results
           FROM ${TRANSACTIONS} ${where}
           GROUP BY category`
        )
        .all(...params)

      const zeroResults = db
        .prepare<SqlValue[], QueryCountRow>(
          `SELECT query, COUNT(*) AS count FROM ${TRANSACTIONS} ${where} AND result_count = 0
           GROUP BY query ORDER BY count DESC, query ASC LIMIT 10`
        )
        .all(...params)

      const highResults = db
        .prepare<SqlValue[], HighResultRow>(
          `SELECT query, AVG(result_count) AS avg_results, COUNT(*) AS searches
           FROM ${TRANSACTIONS} ${where} AND result_count > 0
           GROUP BY query HAVING searches >= 2
           ORDER BY avg_results DESC, query ASC LIMIT 10`
        )
        .all(...params)

      const lengthDistribution: LengthCategoryStats[] = lengths.flatMap((row) =>
        isLengthCategory(row.category)
          ? [{ category: row.category, count: row.count, avgResults: round(row.avg_results, 1) }]
          : []
      )
      const highResultQueries: HighResultQuery[] = highResults.map((row) => ({
        query: row.query,
        avgResults: round(row.avg_results, 1),
        searches: row.searches,
      }))

      return {
        source: source ?? null,
        periodDays: days,
        lengthDistribution,
        zeroResultQueries: zeroResults.map((row) => ({ query: row.query, count: row.count })),
        highResultQueries,
        generatedAt: this.isoNow(),
      }
    })
  }

  /**
   * Totals over the last `hours`, per-source breakdown and the 10 newest rows
   */
  getOverallStats(hours = 24): OverallStats {
    const { where, params } = this.window(undefined, hours * HOUR_MS)

    return this.store.withConnection('transactions.overall', (db) => {
      const summary = db
        .prepare<SqlValue[], SummaryRow & { active_sources: number }>(
          `SELECT COUNT(*) AS total, COUNT(DISTINCT source) AS active_sources,
                  AVG(response_time_ms) AS avg_response_time, AVG(result_count) AS avg_results
           FROM ${TRANSACTIONS} ${where}`
        )
        .get(...params)

      const bySource = db
        .prepare<SqlValue[], SourceRow>(
          `SELECT source, COUNT(*) AS searches, AVG(response_time_ms) AS avg_time, AVG(result_count) AS avg_results
           FROM ${TRANSACTIONS} ${where}
           GROUP BY source ORDER BY searches DESC, source ASC`
        )
        .all(...params)

      const recent = db
        .prepare<SqlValue[], SearchTransactionRow>(
          `SELECT * FROM ${TRANSACTIONS} ${where} ORDER BY timestamp DESC, id DESC LIMIT 10`
        )
        .all(...params)

      return {
        summary: {
          totalSearches: summary?.total ?? 0,
          activeSources: summary?.active_sources ?? 0,
          avgResponseTimeMs: round(summary?.avg_response_time, 2),
          avgResultsPerSearch: round(summary?.avg_results, 1),
        },
        bySource: bySource.map((row) => ({
          source: row.source,
          searches: row.searches,
          avgResponseTimeMs: round(row.avg_time, 2),
          avgResults: round(row.avg_results, 1),
        })),
        recentActivity: recent.map(rowToTransaction),
        generatedAt: this.isoNow(),
      }
    })
  }

  /**
   * Newest transactions first
   */
  getRecent(limit = 10): SearchTransaction[] {
    return this.store.withConnection('transactions.recent', (db) => {
      return db
        .prepare<[number], SearchTransactionRow>(
          `SELECT * FROM ${TRANSACTIONS} ORDER BY timestamp DESC, id DESC LIMIT ?`
        )
        .all(limit)
        .map(rowToTransaction)
    })
  }

  // ==================== Retention ====================

  /**
   * Delete rows created more than `retentionDays` ago
   */
  cleanupOldTransactions(retentionDays = 30): number {
    const cutoff = new Date(this.now() - retentionDays * DAY_MS).toISOString()
    const deleted = this.store.withConnection('transactions.cleanup', (db) => {
      return db.prepare<[string]>(`DELETE FROM ${TRANSACTIONS} WHERE created_at < ?`).run(cutoff).changes
    })

    if (deleted > 0) {
      this.log.info('Cleaned up old search transactions', { deleted, retentionDays })
    }
    this.log.auditLog(
      createAuditEvent('transactions.cleanup', 'TransactionLog', TRANSACTIONS, 'cleanup', 'success', {
        deleted,
        retentionDays,
      })
    )
    return deleted
  }
}
