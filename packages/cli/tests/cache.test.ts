/**
 * Cache command against a seeded durable tier
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createTieredCache, generateCacheKey, type TierCounts, type TieredCacheStats } from '@titlecache/core'
import { createWorkspace, runCli, type Workspace } from './fixtures.js'

describe('cache command', () => {
  let ws: Workspace

  beforeEach(async () => {
    ws = createWorkspace()
    vi.stubEnv('TITLECACHE_DEFAULT_SOURCE', '')
    const cache = await createTieredCache({ store: ws.store })
    await cache.set(generateCacheKey('anime_details', { id: 42 }), { id: 42, title: 'Trigun' })
  })

  afterEach(() => {
    ws.cleanup()
    vi.unstubAllEnvs()
  })

  it('should report durable entries', async () => {
    const { stdout, exitCode } = await runCli(['cache', 'stats', ...ws.pathArgs, '--json'])

    const stats: TieredCacheStats = JSON.parse(stdout)
    expect(exitCode).toBe(0)
    expect(stats.durableAvailable).toBe(true)
    expect(stats.l2).toMatchObject({ total: 1, active: 1, expired: 0 })
    expect(stats.l2?.byMethod.map((m) => [m.methodName, m.count])).toEqual([['anime_details', 1]])
  })

  it('should print the entry counts', async () => {
    const { stdout } = await runCli(['cache', 'stats', ...ws.pathArgs])

    expect(stdout).toContain('=== Durable Cache ===')
    expect(stdout).toContain('  Entries:  1 active, 0 expired')
  })

  it('should find nothing expired in a fresh cache', async () => {
    const { stdout } = await runCli(['cache', 'cleanup', ...ws.pathArgs, '--json'])

    const removed: TierCounts = JSON.parse(stdout)
    expect(removed).toEqual({ l1: 0, l2: 0 })
  })

  it('should clear the durable tier', async () => {
    const clear = await runCli(['cache', 'clear', ...ws.pathArgs, '--json'])
    expect(JSON.parse(clear.stdout)).toEqual({ l1: 0, l2: 1 })

    const { stdout } = await runCli(['cache', 'stats', ...ws.pathArgs, '--json'])
    const stats: TieredCacheStats = JSON.parse(stdout)
    expect(stats.l2?.total).toBe(0)
  })

  it('should fail when the database path is a directory', async () => {
    const { stderr, exitCode } = await runCli(['cache', 'stats', '--db', ws.dir, '--json'])

    expect(exitCode).toBe(1)
    expect(stderr).toMatch(/^Error: /)
  })
})
