/**
 * Transaction log and analytics types
 */

export interface SearchLogInput {
  source: string
  query: string
  resultCount: number
  responseTimeMs: number
  clientId?: string
}

export interface DetailsLogInput {
  source: string
  externalId: number
  responseTimeMs: number
  found: boolean
  clientId?: string
}

/**
 * One logged search or details lookup
 */
export interface SearchTransaction {
  id: number
  timestamp: string
  source: string
  query: string
  resultCount: number
  responseTimeMs: number
  clientId: string | null
  createdAt: string
}

export type PerformanceBand = 'excellent' | 'good' | 'fair' | 'poor'

export type QueryLengthCategory = 'short' | 'medium' | 'long'

export interface QueryCount {
  query: string
  count: number
}

export interface HourlyBucket {
  /** Two-digit UTC hour, `00` to `23` */
  hour: string
  searches: number
  avgResponseTimeMs: number
}

export interface SearchStats {
  source: string | null
  periodHours: number
  totalSearches: number
  avgResponseTimeMs: number
  avgResultsPerSearch: number
  popularQueries: QueryCount[]
  hourlyDistribution: HourlyBucket[]
  performanceDistribution: Record<PerformanceBand, number>
  generatedAt: string
}

export interface ResponseTimePercentiles {
  p50: number
  p90: number
  p95: number
  p99: number
  min: number
  max: number
  avg: number
}

export interface SlaCompliance {
  targetMs: number
  compliancePercentage: number
  compliantSearches: number
  totalSearches: number
}

export interface PerformanceMetrics {
  source: string | null
  periodHours: number
  percentiles: ResponseTimePercentiles
  sla: SlaCompliance
  generatedAt: string
}

export interface LengthCategoryStats {
  category: QueryLengthCategory
  count: number
  avgResults: number
}

export interface HighResultQuery {
  query: string
  avgResults: number
  searches: number
}

export interface QueryAnalytics {
  source: string | null
  periodDays: number
  lengthDistribution: LengthCategoryStats[]
  zeroResultQueries: QueryCount[]
  highResultQueries: HighResultQuery[]
  generatedAt: string
}

export interface SourceBreakdown {
  source: string
  searches: number
  avgResponseTimeMs: number
  avgResults: number
}

export interface OverallStats {
  summary: {
    totalSearches: number
    activeSources: number
    avgResponseTimeMs: number
    avgResultsPerSearch: number
  }
  bySource: SourceBreakdown[]
  recentActivity: SearchTransaction[]
  generatedAt: string
}
