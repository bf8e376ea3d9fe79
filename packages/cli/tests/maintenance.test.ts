/**
 * Maintenance command against a temp database
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { MaintenanceReport, MaintenanceStatus, TaskRunRecord } from '@titlecache/core'
import { createWorkspace, runCli, type Workspace } from './fixtures.js'

describe('maintenance command', () => {
  let ws: Workspace

  beforeEach(() => {
    ws = createWorkspace()
    vi.stubEnv('TITLECACHE_DEFAULT_SOURCE', '')
  })

  afterEach(() => {
    ws.cleanup()
    vi.unstubAllEnvs()
  })

  it('should run every task on a fresh database', async () => {
    const { stdout, exitCode } = await runCli(['maintenance', 'run', ...ws.pathArgs, '--json'])

    const report: MaintenanceReport = JSON.parse(stdout)
    expect(exitCode).toBe(0)
    expect(report.tasksRun).toBe(7)
    expect(report.failed).toBe(0)
    expect(report.results.map((r) => r.task)).toEqual([
      'health_check',
      'analyze',
      'vacuum',
      'index_optimization',
      'cache_cleanup',
      'download_housekeeping',
      'integrity_check',
    ])
  })

  it('should remember completed tasks between runs', async () => {
    await runCli(['maintenance', 'run', ...ws.pathArgs, '--json'])

    const { stdout } = await runCli(['maintenance', 'run', ...ws.pathArgs])

    expect(stdout).toContain('No maintenance tasks are due.')
  })

  it('should run a single named task', async () => {
    const { stdout, exitCode } = await runCli(['maintenance', 'run', '--task', 'vacuum', ...ws.pathArgs, '--json'])

    const record: TaskRunRecord = JSON.parse(stdout)
    expect(exitCode).toBe(0)
    expect(record.task).toBe('vacuum')
    expect(record.success).toBe(true)
  })

  it('should fail on an unknown task', async () => {
    const { stdout, exitCode } = await runCli(['maintenance', 'run', '--task', 'defragment', ...ws.pathArgs])

    expect(exitCode).toBe(1)
    expect(stdout).toBe('')
  })

  it('should list persisted runs in history', async () => {
    await runCli(['maintenance', 'run', ...ws.pathArgs, '--json'])

    const { stdout } = await runCli(['maintenance', 'history', ...ws.pathArgs, '--json'])

    const records: TaskRunRecord[] = JSON.parse(stdout)
    expect(records).toHaveLength(7)
    expect(records.every((r) => r.success)).toBe(true)
  })

  it('should say when no runs are recorded', async () => {
    const { stdout } = await runCli(['maintenance', 'history', ...ws.pathArgs])

    expect(stdout).toContain('No maintenance runs recorded.')
  })

  it('should report the schedule after a run', async () => {
    await runCli(['maintenance', 'run', ...ws.pathArgs, '--json'])

    const { stdout } = await runCli(['maintenance', 'status', ...ws.pathArgs, '--json'])

    const status: MaintenanceStatus = JSON.parse(stdout)
    expect(status.databasePath).toBe(ws.dbPath)
    expect(status.historySize).toBe(7)
    expect(status.tasks).toHaveLength(7)
    expect(status.tasks.some((t) => t.due)).toBe(false)
  })
})
