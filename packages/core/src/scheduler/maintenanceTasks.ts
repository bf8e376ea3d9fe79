/**
 * SQLite housekeeping routines run by the maintenance scheduler
 */

import { existsSync, statfsSync } from 'fs'
import { dirname } from 'path'
import type { SqliteStore } from '../db/connection.js'
import { getErrorMessage } from '../errors/index.js'

const LOW_DISK_BYTES = 100 * 1024 * 1024

interface NameRow {
  name: string
}

interface IntegrityRow {
  integrity_check: string
}

interface QuickCheckRow {
  quick_check: string
}

function databaseSize(store: SqliteStore): number {
  return store.withConnection('maintenance.size', (db) => {
    const pageCount = db.pragma('page_count', { simple: true })
    const pageSize = db.pragma('page_size', { simple: true })
    return typeof pageCount === 'number' && typeof pageSize === 'number' ? pageCount * pageSize : 0
  })
}

function userTables(store: SqliteStore): string[] {
  return store.withConnection('maintenance.tables', (db) =>
    db
      .prepare<[], NameRow>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all()
      .map((row) => row.name)
  )
}

export function vacuumDatabase(store: SqliteStore): Record<string, unknown> {
  const sizeBefore = databaseSize(store)
  store.withConnection('maintenance.vacuum', (db) => {
    db.exec('VACUUM')
  })
  const sizeAfter = databaseSize(store)
  return {
    sizeBeforeBytes: sizeBefore,
    sizeAfterBytes: sizeAfter,
    spaceReclaimedBytes: sizeBefore - sizeAfter,
  }
}

export function analyzeDatabase(store: SqliteStore): Record<string, unknown> {
  store.withConnection('maintenance.analyze', (db) => {
    db.exec('ANALYZE')
  })
  const tables = userTables(store)
  return { tablesAnalyzed: tables.length, tableNames: tables }
}

/**
 * Rebuild indexes and let SQLite refresh planner statistics where useful
 */
export function optimizeIndexes(store: SqliteStore): Record<string, unknown> {
  const indexes = store.withConnection('maintenance.optimize', (db) => {
    db.exec('REINDEX')
    db.pragma('optimize')
    return db
      .prepare<[], NameRow>(
        "SELECT name FROM sqlite_master WHERE type = 'index' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all()
      .map((row) => row.name)
  })
  return { indexesRebuilt: indexes.length, indexNames: indexes }
}

export type HealthReport = {
  healthy: boolean
  fileExists: boolean
  fileSizeBytes: number
  databaseAccessible: boolean
  tableCount: number
  freeDiskBytes: number | null
  issues: string[]
}

export function healthCheck(store: SqliteStore): HealthReport {
  const report: HealthReport = {
    healthy: false,
    fileExists: existsSync(store.path),
    fileSizeBytes: store.fileSize(),
    databaseAccessible: false,
    tableCount: 0,
    freeDiskBytes: null,
    issues: [],
  }

  if (!report.fileExists) {
    report.issues.push('Database file does not exist')
  }

  try {
    store.withConnection('maintenance.health', (db) => {
      report.databaseAccessible = true
      report.tableCount =
        db
          .prepare<[], { count: number }>(
            "SELECT COUNT(*) AS count FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'"
          )
          .get()?.count ?? 0
      const integrity = db.pragma('integrity_check(1)', { simple: true })
      if (integrity !== 'ok') {
        report.issues.push(`Integrity check failed: ${String(integrity)}`)
      }
    })
  } catch (error) {
    report.issues.push(`Connection failed: ${getErrorMessage(error)}`)
  }

  try {
    const stats = statfsSync(dirname(store.path))
    report.freeDiskBytes = stats.bavail * stats.bsize
    if (report.freeDiskBytes < LOW_DISK_BYTES) {
      report.issues.push('Low disk space (< 100MB)')
    }
  } catch (error) {
    report.issues.push(`Could not check disk space: ${getErrorMessage(error)}`)
  }

  report.healthy = report.issues.length === 0
  return report
}

export function integrityCheck(store: SqliteStore): Record<string, unknown> {
  return store.withConnection('maintenance.integrity', (db) => {
    const integrity = db
      .prepare<[], IntegrityRow>('PRAGMA integrity_check')
      .all()
      .map((row) => row.integrity_check)
    const foreignKeyViolations = db.prepare('PRAGMA foreign_key_check').all().length
    const quick = db
      .prepare<[], QuickCheckRow>('PRAGMA quick_check')
      .all()
      .map((row) => row.quick_check)

    const healthy =
      integrity.length === 1 &&
      integrity[0] === 'ok' &&
      foreignKeyViolations === 0 &&
      quick.length === 1 &&
      quick[0] === 'ok'

    return { healthy, integrityCheck: integrity, foreignKeyViolations, quickCheck: quick }
  })
}
