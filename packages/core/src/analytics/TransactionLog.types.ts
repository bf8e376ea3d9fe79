/**
 * TransactionLog Internal Types
 *
 * Raw row shapes returned by the search_transactions queries.
 */

export interface SearchTransactionRow {
  id: number
  timestamp: string
  source: string
  query: string
  result_count: number
  response_time_ms: number
  client_identifier: string | null
  created_at: string
}

export interface SummaryRow {
  total: number
  avg_response_time: number | null
  avg_results: number | null
}

export interface QueryCountRow {
  query: string
  count: number
}

export interface HourRow {
  hour: string | null
  searches: number
  avg_time: number | null
}

export interface BandRow {
  band: string
  count: number
}

export interface LengthRow {
  category: string
  count: number
  avg_results: number | null
}

export interface HighResultRow {
  query: string
  avg_results: number
  searches: number
}

export interface SourceRow {
  source: string
  searches: number
  avg_time: number | null
  avg_results: number | null
}

export interface ResponseTimeRow {
  response_time_ms: number
}
