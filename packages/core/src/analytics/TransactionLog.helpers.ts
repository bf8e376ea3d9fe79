/**
 * TransactionLog Helpers
 */

import type {
  PerformanceBand,
  QueryLengthCategory,
  ResponseTimePercentiles,
  SearchTransaction,
} from './types.js'
import type { SearchTransactionRow } from './TransactionLog.types.js'

const PERFORMANCE_BANDS: readonly PerformanceBand[] = ['excellent', 'good', 'fair', 'poor']
const LENGTH_CATEGORIES: readonly QueryLengthCategory[] = ['short', 'medium', 'long']

export function rowToTransaction(row: SearchTransactionRow): SearchTransaction {
  return {
    id: row.id,
    timestamp: row.timestamp,
    source: row.source,
    query: row.query,
    resultCount: row.result_count,
    responseTimeMs: row.response_time_ms,
    clientId: row.client_identifier,
    createdAt: row.created_at,
  }
}

export function isPerformanceBand(value: string): value is PerformanceBand {
  return PERFORMANCE_BANDS.some((band) => band === value)
}

export function isLengthCategory(value: string): value is QueryLengthCategory {
  return LENGTH_CATEGORIES.some((category) => category === value)
}

/**
 * Value at index floor(n * p) of an ascending list, clamped to the last element.
 * Empty input yields 0.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0
  const index = Math.min(Math.floor(sorted.length * p), sorted.length - 1)
  return sorted[index] ?? 0
}

export function computePercentiles(sorted: readonly number[]): ResponseTimePercentiles {
  if (sorted.length === 0) {
    return { p50: 0, p90: 0, p95: 0, p99: 0, min: 0, max: 0, avg: 0 }
  }
  const sum = sorted.reduce((acc, value) => acc + value, 0)
  return {
    p50: percentile(sorted, 0.5),
    p90: percentile(sorted, 0.9),
    p95: percentile(sorted, 0.95),
    p99: percentile(sorted, 0.99),
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: sum / sorted.length,
  }
}

export function round(value: number | null | undefined, digits: number): number {
  if (value === null || value === undefined) return 0
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}
