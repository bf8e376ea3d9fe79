/**
 * MaintenanceScheduler - periodic database housekeeping
 *
 * Default tasks, lowest priority number first:
 *   health_check (6h), analyze (24h), vacuum (weekly), index_optimization (24h),
 *   transaction_cleanup (24h), cache_cleanup (6h), download_housekeeping (24h),
 *   integrity_check (weekly)
 *
 * The optional tasks are registered only for the collaborators passed in.
 * An application that runs AnalyticsScheduler leaves `transactions` out, so
 * retention cleanup runs in one place.
 */

import type { TransactionLog } from '../analytics/TransactionLog.js'
import type { TieredCache } from '../cache/TieredCache.js'
import type { SqliteStore } from '../db/connection.js'
import type { DownloadGate } from '../download/DownloadGate.js'
import { createAuditEvent, createLogger } from '../utils/logger.js'
import {
  analyzeDatabase,
  healthCheck,
  integrityCheck,
  optimizeIndexes,
  vacuumDatabase,
} from './maintenanceTasks.js'
import { MetadataHistoryStore } from './historyStore.js'
import { MaintenanceTask, type TaskRunRecord, type TaskStatus } from './MaintenanceTask.js'
import { TaskScheduler, type TaskSchedulerOptions } from './TaskScheduler.js'

export interface MaintenanceSchedulerOptions extends TaskSchedulerOptions {
  store: SqliteStore
  /** Enables transaction_cleanup */
  transactions?: TransactionLog
  /** Enables cache_cleanup */
  cache?: TieredCache
  /** Enables download_housekeeping */
  gate?: DownloadGate
  /** Download attempt records kept by download_housekeeping (default: 50) */
  keepDownloadAttempts?: number
  /** Transaction retention (default: 30) */
  retentionDays?: number
  /** Interval of transaction_cleanup (default: 24) */
  cleanupIntervalHours?: number
  /** Keep run history in `schema_metadata` (default: true) */
  persistHistory?: boolean
}

export interface MaintenanceReport {
  startedAt: string
  completedAt: string
  durationMs: number
  tasksRun: number
  succeeded: number
  failed: number
  results: TaskRunRecord[]
}

export interface MaintenanceStatus {
  running: boolean
  intervalMs: number
  databasePath: string
  databaseSizeBytes: number
  tasks: TaskStatus[]
  historySize: number
  lastRun: TaskRunRecord | null
}

export class MaintenanceScheduler extends TaskScheduler {
  private readonly store: SqliteStore

  constructor(options: MaintenanceSchedulerOptions) {
    super({
      ...options,
      logger: options.logger ?? createLogger('MaintenanceScheduler'),
      historyStore:
        options.historyStore ??
        (options.persistHistory !== false
          ? new MetadataHistoryStore(options.store, 'maintenance_history')
          : undefined),
    })
    this.store = options.store
    const store = options.store

    this.registerTask(
      new MaintenanceTask({
        name: 'health_check',
        description: 'Perform database health checks',
        intervalHours: 6,
        priority: 1,
        maxDurationMinutes: 5,
        run: () => healthCheck(store),
      })
    )
    this.registerTask(
      new MaintenanceTask({
        name: 'analyze',
        description: 'Update query planner statistics',
        intervalHours: 24,
        priority: 2,
        maxDurationMinutes: 15,
        run: () => analyzeDatabase(store),
      })
    )
    this.registerTask(
      new MaintenanceTask({
        name: 'vacuum',
        description: 'Defragment database and reclaim space',
        intervalHours: 168,
        priority: 3,
        maxDurationMinutes: 60,
        run: () => vacuumDatabase(store),
      })
    )
    this.registerTask(
      new MaintenanceTask({
        name: 'index_optimization',
        description: 'Rebuild and optimize indexes',
        intervalHours: 24,
        priority: 4,
        run: () => optimizeIndexes(store),
      })
    )

    const transactions = options.transactions
    if (transactions?.enabled) {
      const retentionDays = options.retentionDays ?? 30
      this.registerTask(
        new MaintenanceTask({
          name: 'transaction_cleanup',
          description: 'Delete search transactions past retention',
          intervalHours: options.cleanupIntervalHours ?? 24,
          priority: 5,
          maxDurationMinutes: 10,
          run: () => ({
            deletedTransactions: transactions.cleanupOldTransactions(retentionDays),
            retentionDays,
          }),
        })
      )
    }

    const cache = options.cache
    if (cache) {
      this.registerTask(
        new MaintenanceTask({
          name: 'cache_cleanup',
          description: 'Sweep expired cache entries',
          intervalHours: 6,
          priority: 5,
          maxDurationMinutes: 10,
          run: async () => {
            const removed = await cache.cleanupExpired()
            return { memoryRemoved: removed.l1, durableRemoved: removed.l2 }
          },
        })
      )
    }

    const gate = options.gate
    if (gate) {
      const keep = options.keepDownloadAttempts ?? 50
      this.registerTask(
        new MaintenanceTask({
          name: 'download_housekeeping',
          description: 'Verify the titles file and prune old download attempts',
          intervalHours: 24,
          priority: 5,
          maxDurationMinutes: 5,
          run: async () => {
            const integrity = await gate.verifyFileIntegrity()
            if (!integrity.valid) {
              this.log.warn('Titles file failed verification', {
                source: gate.source,
                reason: integrity.reason,
              })
            }
            return {
              source: gate.source,
              fileValid: integrity.valid,
              validLines: integrity.validLines,
              attemptsRemoved: gate.cleanupOldAttempts(keep),
            }
          },
        })
      )
    }

    this.registerTask(
      new MaintenanceTask({
        name: 'integrity_check',
        description: 'Check database integrity',
        intervalHours: 168,
        priority: 6,
        maxDurationMinutes: 45,
        run: () => integrityCheck(store),
      })
    )
  }

  /**
   * Run every due task now
   */
  async runMaintenance(): Promise<MaintenanceReport> {
    const started = this.ticker.now()
    const results = await this.runDueTasks()
    const completed = this.ticker.now()
    const failed = results.filter((r) => !r.success).length

    this.log.auditLog(
      createAuditEvent(
        'maintenance.run',
        'MaintenanceScheduler',
        this.store.path,
        'run_maintenance',
        failed > 0 ? 'error' : 'success',
        { tasks: results.map((r) => r.task), failed }
      )
    )

    return {
      startedAt: new Date(started).toISOString(),
      completedAt: new Date(completed).toISOString(),
      durationMs: completed - started,
      tasksRun: results.length,
      succeeded: results.length - failed,
      failed,
      results,
    }
  }

  getStatus(): MaintenanceStatus {
    const now = this.ticker.now()
    const history = this.getHistory(1)
    return {
      running: this.isRunning(),
      intervalMs: this.intervalMs,
      databasePath: this.store.path,
      databaseSizeBytes: this.store.fileSize(),
      tasks: this.getTasks().map((task) => task.getStatus(now)),
      historySize: this.getHistorySize(),
      lastRun: history[0] ?? null,
    }
  }
}
