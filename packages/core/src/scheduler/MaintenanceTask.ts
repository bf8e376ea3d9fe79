/**
 * A named periodic task with run bookkeeping
 */

import { getErrorMessage } from '../errors/index.js'
import type { Logger } from '../utils/logger.js'

const HOUR_MS = 60 * 60 * 1000

export type TaskResult = Record<string, unknown>

export interface MaintenanceTaskOptions {
  name: string
  description: string
  intervalHours: number
  run: () => Promise<TaskResult> | TaskResult
  /** Lower runs first (default: 5) */
  priority?: number
  /** Expected upper bound, reported in status (default: 30) */
  maxDurationMinutes?: number
}

/**
 * Outcome of one execution
 */
export interface TaskRunRecord {
  task: string
  success: boolean
  startedAt: string
  durationMs: number
  result?: TaskResult
  error?: string
}

export interface TaskStatus {
  name: string
  description: string
  priority: number
  intervalHours: number
  maxDurationMinutes: number
  lastRun: string | null
  nextRun: string
  lastDurationMs: number | null
  runCount: number
  failureCount: number
  due: boolean
}

export class MaintenanceTask {
  readonly name: string
  readonly description: string
  readonly intervalHours: number
  readonly priority: number
  readonly maxDurationMinutes: number
  lastRun: number | null = null
  lastDurationMs: number | null = null
  lastResult: TaskResult | null = null
  runCount = 0
  failureCount = 0
  private readonly run: () => Promise<TaskResult> | TaskResult

  constructor(options: MaintenanceTaskOptions) {
    this.name = options.name
    this.description = options.description
    this.intervalHours = options.intervalHours
    this.run = options.run
    this.priority = options.priority ?? 5
    this.maxDurationMinutes = options.maxDurationMinutes ?? 30
  }

  /**
   * Never run, or at least one interval since the last run
   */
  isDue(now: number): boolean {
    if (this.lastRun === null) return true
    return now - this.lastRun >= this.intervalHours * HOUR_MS
  }

  nextRunAt(now: number): number {
    return this.lastRun === null ? now : this.lastRun + this.intervalHours * HOUR_MS
  }

  /**
   * Run once. Failures are recorded, logged and returned, never thrown.
   */
  async execute(clock: () => number, log: Logger): Promise<TaskRunRecord> {
    const startedAt = clock()
    log.info('Starting maintenance task', { task: this.name })

    try {
      const result = await this.run()
      const durationMs = clock() - startedAt
      this.lastRun = startedAt
      this.lastDurationMs = durationMs
      this.lastResult = result
      this.runCount++
      log.info('Completed maintenance task', { task: this.name, durationMs })
      return {
        task: this.name,
        success: true,
        startedAt: new Date(startedAt).toISOString(),
        durationMs,
        result,
      }
    } catch (error) {
      const durationMs = clock() - startedAt
      this.lastRun = startedAt
      this.lastDurationMs = durationMs
      this.failureCount++
      log.error(
        `Maintenance task failed: ${this.name}`,
        error instanceof Error ? error : undefined,
        { task: this.name }
      )
      return {
        task: this.name,
        success: false,
        startedAt: new Date(startedAt).toISOString(),
        durationMs,
        error: getErrorMessage(error),
      }
    }
  }

  getStatus(now: number): TaskStatus {
    return {
      name: this.name,
      description: this.description,
      priority: this.priority,
      intervalHours: this.intervalHours,
      maxDurationMinutes: this.maxDurationMinutes,
      lastRun: this.lastRun !== null ? new Date(this.lastRun).toISOString() : null,
      nextRun: new Date(this.nextRunAt(now)).toISOString(),
      lastDurationMs: this.lastDurationMs,
      runCount: this.runCount,
      failureCount: this.failureCount,
      due: this.isDue(now),
    }
  }
}
