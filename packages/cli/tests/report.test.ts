/**
 * Report command over seeded search transactions
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { TransactionLog, type CleanupResult, type DailyReport } from '@titlecache/core'
import { renderReport } from '../src/commands/report.js'
import { createWorkspace, runCli, type Workspace } from './fixtures.js'

describe('report command', () => {
  let ws: Workspace

  beforeEach(() => {
    ws = createWorkspace()
    vi.stubEnv('TITLECACHE_DEFAULT_SOURCE', '')
    const transactions = new TransactionLog(ws.store)
    transactions.logSearch({ source: 'anidb', query: 'bebop', resultCount: 3, responseTimeMs: 10 })
    transactions.logSearch({ source: 'anidb', query: 'bebop', resultCount: 3, responseTimeMs: 20 })
    transactions.logSearch({ source: 'mal', query: 'nothing here', resultCount: 0, responseTimeMs: 30 })
  })

  afterEach(() => {
    ws.cleanup()
    vi.unstubAllEnvs()
  })

  it('should summarize the last day across sources', async () => {
    const { stdout, exitCode } = await runCli(['report', ...ws.pathArgs, '--json'])

    const report: DailyReport = JSON.parse(stdout)
    expect(exitCode).toBe(0)
    expect(report.reportType).toBe('daily_analytics')
    expect(report.source).toBeNull()
    expect(report.summary).toEqual({
      totalSearches: 3,
      avgResponseTimeMs: 20,
      performanceRating: 'excellent',
      topQuery: 'bebop',
    })
  })

  it('should limit the report to one source', async () => {
    const { stdout } = await runCli(['report', '--source', 'mal', ...ws.pathArgs, '--json'])

    const report: DailyReport = JSON.parse(stdout)
    expect(report.source).toBe('mal')
    expect(report.summary.totalSearches).toBe(1)
    expect(report.queryAnalytics.zeroResultQueries).toEqual([{ query: 'nothing here', count: 1 }])
  })

  it('should render a readable report', async () => {
    const { stdout } = await runCli(['report', ...ws.pathArgs])

    expect(stdout).toContain('=== Daily Analytics: all sources ===')
    expect(stdout).toContain('  Searches:      3')
    expect(stdout).toContain('  Top query:     bebop')
    expect(stdout).toContain('Queries with no results:')
  })

  it('should clean up transactions past retention', async () => {
    const { stdout, exitCode } = await runCli(['report', 'cleanup', ...ws.pathArgs, '--json'])

    const result: CleanupResult = JSON.parse(stdout)
    expect(exitCode).toBe(0)
    expect(result).toMatchObject({ success: true, deletedTransactions: 0, retentionDays: 30 })
  })

  it('should describe the cleanup in text mode', async () => {
    const { stdout } = await runCli(['report', 'cleanup', ...ws.pathArgs])

    expect(stdout).toBe('Deleted 0 transactions older than 30 days.')
  })

  describe('renderReport', () => {
    it('should mark a day without searches', async () => {
      const { stdout } = await runCli(['report', '--source', 'kitsu', ...ws.pathArgs, '--json'])
      const text = renderReport(JSON.parse(stdout))

      expect(text).toContain('=== Daily Analytics: kitsu ===')
      expect(text).toContain('  Rating:        poor')
      expect(text).toContain('  Top query:     none')
      expect(text).not.toContain('Queries with no results:')
    })
  })
})
