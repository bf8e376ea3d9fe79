/**
 * AnalyticsScheduler - transaction retention and daily reports
 */

import type { TransactionLog } from '../analytics/TransactionLog.js'
import type {
  OverallStats,
  PerformanceMetrics,
  QueryAnalytics,
  SearchStats,
} from '../analytics/types.js'
import { createLogger } from '../utils/logger.js'
import { MaintenanceTask } from './MaintenanceTask.js'
import { TaskScheduler, type TaskSchedulerOptions } from './TaskScheduler.js'

const CLEANUP_TASK = 'transaction_cleanup'

export type PerformanceRating = 'excellent' | 'good' | 'fair' | 'poor'

export interface AnalyticsSchedulerOptions extends TaskSchedulerOptions {
  transactions: TransactionLog
  /** Hours between cleanups (default: 24) */
  cleanupIntervalHours?: number
  /** Days of transactions to keep (default: 30) */
  retentionDays?: number
}

export interface CleanupResult {
  success: boolean
  deletedTransactions: number
  cleanupTime: string
  retentionDays: number
  error?: string
}

export interface DailyReport {
  reportType: 'daily_analytics'
  source: string | null
  reportDate: string
  generatedAt: string
  searchStatistics: SearchStats
  queryAnalytics: QueryAnalytics
  performanceMetrics: PerformanceMetrics
  overallStatistics: OverallStats
  summary: {
    totalSearches: number
    avgResponseTimeMs: number
    performanceRating: PerformanceRating
    topQuery: string | null
  }
}

export interface AnalyticsSchedulerStatus {
  running: boolean
  cleanupIntervalHours: number
  retentionDays: number
  lastCleanup: string | null
  nextCleanupDue: boolean
  lastDeleted: number | null
}

/**
 * Rate p95 latency together with SLA compliance
 */
export function ratePerformance(metrics: PerformanceMetrics): PerformanceRating {
  const p95 = metrics.percentiles.p95
  const compliance = metrics.sla.compliancePercentage
  if (p95 < 50 && compliance > 95) return 'excellent'
  if (p95 < 100 && compliance > 90) return 'good'
  if (p95 < 200 && compliance > 80) return 'fair'
  return 'poor'
}

export class AnalyticsScheduler extends TaskScheduler {
  readonly cleanupIntervalHours: number
  readonly retentionDays: number
  private readonly transactions: TransactionLog
  private readonly cleanupTask: MaintenanceTask

  constructor(options: AnalyticsSchedulerOptions) {
    super({
      ...options,
      logger: options.logger ?? createLogger('AnalyticsScheduler'),
    })
    this.transactions = options.transactions
    this.cleanupIntervalHours = options.cleanupIntervalHours ?? 24
    this.retentionDays = options.retentionDays ?? 30

    this.cleanupTask = new MaintenanceTask({
      name: CLEANUP_TASK,
      description: 'Delete search transactions past retention',
      intervalHours: this.cleanupIntervalHours,
      priority: 1,
      run: () => ({
        deletedTransactions: this.transactions.cleanupOldTransactions(this.retentionDays),
      }),
    })
    this.registerTask(this.cleanupTask)
  }

  /**
   * Run the retention cleanup immediately
   */
  async forceCleanup(): Promise<CleanupResult> {
    this.log.info('Forcing immediate transaction cleanup')
    const record = await this.runTaskNow(CLEANUP_TASK)
    const deleted = record?.result?.deletedTransactions
    return {
      success: record?.success ?? false,
      deletedTransactions: typeof deleted === 'number' ? deleted : 0,
      cleanupTime: record?.startedAt ?? new Date(this.ticker.now()).toISOString(),
      retentionDays: this.retentionDays,
      ...(record?.error !== undefined && { error: record.error }),
    }
  }

  /**
   * Last-24h statistics, query analytics and performance with a rating
   */
  generateDailyReport(source?: string): DailyReport {
    const searchStatistics = this.transactions.getSearchStats(source, 24)
    const queryAnalytics = this.transactions.getQueryAnalytics(source, 1)
    const performanceMetrics = this.transactions.getPerformanceMetrics(source, 24)
    const overallStatistics = this.transactions.getOverallStats(24)
    const generatedAt = new Date(this.ticker.now()).toISOString()

    const report: DailyReport = {
      reportType: 'daily_analytics',
      source: source ?? null,
      reportDate: generatedAt.slice(0, 10),
      generatedAt,
      searchStatistics,
      queryAnalytics,
      performanceMetrics,
      overallStatistics,
      summary: {
        totalSearches: searchStatistics.totalSearches,
        avgResponseTimeMs: searchStatistics.avgResponseTimeMs,
        performanceRating: ratePerformance(performanceMetrics),
        topQuery: searchStatistics.popularQueries[0]?.query ?? null,
      },
    }

    this.log.info('Daily report generated', {
      source: report.source,
      totalSearches: report.summary.totalSearches,
    })
    return report
  }

  getStatus(): AnalyticsSchedulerStatus {
    const lastRun = this.cleanupTask.lastRun
    const deleted = this.cleanupTask.lastResult?.deletedTransactions
    return {
      running: this.isRunning(),
      cleanupIntervalHours: this.cleanupIntervalHours,
      retentionDays: this.retentionDays,
      lastCleanup: lastRun !== null ? new Date(lastRun).toISOString() : null,
      nextCleanupDue: this.cleanupTask.isDue(this.ticker.now()),
      lastDeleted: typeof deleted === 'number' ? deleted : null,
    }
  }
}
