/**
 * Time source for the schedulers
 *
 * `TimerTicker` waits in real time. `ManualTicker` keeps virtual time that
 * only moves when `advance()` is called.
 */

export interface Ticker {
  now(): number
  /** Resolves after `ms`, or early once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export class TimerTicker implements Ticker {
  now(): number {
    return Date.now()
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve()
        return
      }

      const onAbort = (): void => {
        clearTimeout(timer)
        resolve()
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve()
      }, ms)
      // Don't prevent Node.js from exiting
      timer.unref()
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }
}

interface Sleeper {
  deadline: number
  resolve: () => void
}

export class ManualTicker implements Ticker {
  private current: number
  private sleepers: Sleeper[] = []

  constructor(start = 0) {
    this.current = start
  }

  now(): number {
    return this.current
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve()
        return
      }

      const sleeper: Sleeper = {
        deadline: this.current + ms,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort)
          resolve()
        },
      }
      const onAbort = (): void => {
        this.sleepers = this.sleepers.filter((s) => s !== sleeper)
        resolve()
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.sleepers.push(sleeper)
    })
  }

  /**
   * Move virtual time forward, wake every sleeper whose deadline passed and
   * let the woken code run until it blocks again.
   */
  async advance(ms: number): Promise<void> {
    this.current += ms
    const due = this.sleepers
      .filter((s) => s.deadline <= this.current)
      .sort((a, b) => a.deadline - b.deadline)
    this.sleepers = this.sleepers.filter((s) => s.deadline > this.current)
    for (const sleeper of due) {
      sleeper.resolve()
    }
    await settle()
  }

  /** Number of pending sleeps */
  get pending(): number {
    return this.sleepers.length
  }
}

/**
 * Yield one macrotask so queued promise continuations run
 */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}
