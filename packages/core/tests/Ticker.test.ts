/**
 * Virtual and real-time tickers
 */

import { describe, it, expect } from 'vitest'
import { ManualTicker, TimerTicker } from '../src/scheduler/Ticker.js'

describe('ManualTicker', () => {
  it('should only move when advanced', async () => {
    const ticker = new ManualTicker(1000)

    expect(ticker.now()).toBe(1000)
    await ticker.advance(500)
    expect(ticker.now()).toBe(1500)
  })

  it('should wake sleepers whose deadline has passed', async () => {
    const ticker = new ManualTicker()
    const woken: string[] = []
    void ticker.sleep(100).then(() => woken.push('short'))
    void ticker.sleep(300).then(() => woken.push('long'))

    await ticker.advance(99)
    expect(woken).toEqual([])
    expect(ticker.pending).toBe(2)

    await ticker.advance(1)
    expect(woken).toEqual(['short'])

    await ticker.advance(1000)
    expect(woken).toEqual(['short', 'long'])
    expect(ticker.pending).toBe(0)
  })

  it('should resolve a sleep early on abort', async () => {
    const ticker = new ManualTicker()
    const controller = new AbortController()
    const sleeping = ticker.sleep(60_000, controller.signal)

    controller.abort()
    await sleeping

    expect(ticker.pending).toBe(0)
    expect(ticker.now()).toBe(0)
  })

  it('should not wait when already aborted', async () => {
    const ticker = new ManualTicker()
    const controller = new AbortController()
    controller.abort()

    await ticker.sleep(60_000, controller.signal)

    expect(ticker.pending).toBe(0)
  })
})

describe('TimerTicker', () => {
  it('should resolve after the delay', async () => {
    const ticker = new TimerTicker()
    const start = Date.now()

    await ticker.sleep(20)

    expect(Date.now() - start).toBeGreaterThanOrEqual(15)
  })

  it('should resolve early on abort', async () => {
    const ticker = new TimerTicker()
    const controller = new AbortController()
    const start = Date.now()
    setTimeout(() => controller.abort(), 10)

    await ticker.sleep(60_000, controller.signal)

    expect(Date.now() - start).toBeLessThan(5_000)
  })
})
