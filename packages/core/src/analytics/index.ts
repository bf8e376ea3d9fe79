export { TransactionLog, SLA_TARGET_MS, type TransactionLogOptions } from './TransactionLog.js'
export { percentile, computePercentiles } from './TransactionLog.helpers.js'
export type {
  SearchLogInput,
  DetailsLogInput,
  SearchTransaction,
  PerformanceBand,
  QueryLengthCategory,
  QueryCount,
  HourlyBucket,
  SearchStats,
  ResponseTimePercentiles,
  SlaCompliance,
  PerformanceMetrics,
  LengthCategoryStats,
  HighResultQuery,
  QueryAnalytics,
  SourceBreakdown,
  OverallStats,
} from './types.js'
