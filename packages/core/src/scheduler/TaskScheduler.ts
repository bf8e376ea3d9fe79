/**
 * Cooperative task loop shared by the schedulers
 *
 * One background loop per instance: run the due tasks in priority order,
 * sleep for the interval, repeat. `stop()` cancels the sleep and waits for a
 * task that is already running.
 */

import { getErrorMessage } from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'
import type { HistoryStore } from './historyStore.js'
import { MaintenanceTask, type TaskRunRecord } from './MaintenanceTask.js'
import { TimerTicker, type Ticker } from './Ticker.js'

/** Run records kept in memory */
export const MAX_HISTORY = 100

export interface TaskSchedulerOptions {
  ticker?: Ticker
  /** Wake-up interval in ms (default: 1 hour) */
  intervalMs?: number
  logger?: Logger
  /** Persists run records; without one history lives in memory only */
  historyStore?: HistoryStore
}

export class TaskScheduler {
  protected readonly ticker: Ticker
  protected readonly log: Logger
  readonly intervalMs: number
  private tasks: MaintenanceTask[] = []
  private history: TaskRunRecord[] = []
  private controller: AbortController | null = null
  private loop: Promise<void> | null = null
  private lock: Promise<void> = Promise.resolve()
  private readonly historyStore: HistoryStore | null

  constructor(options: TaskSchedulerOptions = {}) {
    this.ticker = options.ticker ?? new TimerTicker()
    this.intervalMs = options.intervalMs ?? 60 * 60 * 1000
    this.log = options.logger ?? createLogger('TaskScheduler')
    this.historyStore = options.historyStore ?? null
    if (this.historyStore) {
      this.history = this.historyStore.load().slice(-MAX_HISTORY)
    }
  }

  /**
   * Serialize task passes between the loop and manual runs
   */
  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.lock
    let releaseLock: () => void = () => {}
    this.lock = new Promise<void>((resolve) => {
      releaseLock = resolve
    })

    try {
      await previous
      return await fn()
    } finally {
      releaseLock()
    }
  }

  // ==================== Tasks ====================

  /**
   * Add a task, replacing any task with the same name
   */
  registerTask(task: MaintenanceTask): void {
    // Resume the schedule from the newest persisted run
    for (let i = this.history.length - 1; i >= 0; i--) {
      const record = this.history[i]
      if (record?.task === task.name) {
        const startedAt = Date.parse(record.startedAt)
        if (!Number.isNaN(startedAt)) {
          task.lastRun = startedAt
        }
        break
      }
    }
    this.tasks = this.tasks.filter((t) => t.name !== task.name)
    this.tasks.push(task)
    // Array.prototype.sort is stable: equal priorities keep registration order
    this.tasks.sort((a, b) => a.priority - b.priority)
  }

  getTasks(): readonly MaintenanceTask[] {
    return this.tasks
  }

  getTask(name: string): MaintenanceTask | undefined {
    return this.tasks.find((t) => t.name === name)
  }

  /**
   * Run every due task in priority order. An aborted signal stops the pass
   * before the next task starts.
   */
  runDueTasks(signal?: AbortSignal): Promise<TaskRunRecord[]> {
    return this.withLock(async () => {
      const records: TaskRunRecord[] = []
      const now = this.ticker.now()
      for (const task of this.tasks.filter((t) => t.isDue(now))) {
        if (signal?.aborted) break
        records.push(await this.execute(task))
      }
      return records
    })
  }

  /**
   * Run one task regardless of its schedule
   *
   * @returns null when no task has that name
   */
  runTaskNow(name: string): Promise<TaskRunRecord | null> {
    const task = this.getTask(name)
    if (!task) {
      return Promise.resolve(null)
    }
    return this.withLock(() => this.execute(task))
  }

  private async execute(task: MaintenanceTask): Promise<TaskRunRecord> {
    const record = await task.execute(() => this.ticker.now(), this.log)
    this.history.push(record)
    if (this.history.length > MAX_HISTORY) {
      this.history = this.history.slice(-MAX_HISTORY)
    }
    if (this.historyStore) {
      try {
        this.historyStore.save(this.history)
      } catch (error) {
        this.log.warn('Could not persist task history', { reason: getErrorMessage(error) })
      }
    }
    return record
  }

  /**
   * Run records, newest first
   */
  getHistory(limit = 20): TaskRunRecord[] {
    return this.history.slice(-limit).reverse()
  }

  getHistorySize(): number {
    return this.history.length
  }

  // ==================== Lifecycle ====================

  isRunning(): boolean {
    return this.controller !== null
  }

  /**
   * Start the background loop (no-op when already running)
   */
  start(): void {
    if (this.controller) {
      return
    }
    const controller = new AbortController()
    this.controller = controller
    this.loop = this.runLoop(controller.signal)
    this.log.info('Scheduler started', { tasks: this.tasks.length, intervalMs: this.intervalMs })
  }

  /**
   * Stop the loop. Resolves once a task in flight has finished.
   */
  async stop(): Promise<void> {
    const controller = this.controller
    const loop = this.loop
    if (!controller) {
      return
    }
    this.controller = null
    this.loop = null
    controller.abort()
    await loop
    this.log.info('Scheduler stopped')
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runDueTasks(signal)
      } catch (error) {
        this.log.error('Scheduler pass failed', error instanceof Error ? error : undefined)
      }
      if (signal.aborted) break
      await this.ticker.sleep(this.intervalMs, signal)
    }
  }
}
