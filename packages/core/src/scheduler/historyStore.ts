/**
 * Durable scheduler history in `schema_metadata`
 *
 * The whole capped history is stored as one JSON array under a single key,
 * so a fresh process knows when each task last ran.
 */

import { z } from 'zod'
import type { SqliteStore } from '../db/connection.js'
import { storageObjectName, systemTable } from '../security/identifiers.js'
import type { TaskRunRecord } from './MaintenanceTask.js'

export interface HistoryStore {
  load(): TaskRunRecord[]
  save(records: readonly TaskRunRecord[]): void
}

const recordSchema = z.object({
  task: z.string(),
  success: z.boolean(),
  startedAt: z.string(),
  durationMs: z.number(),
  result: z.record(z.unknown()).optional(),
  error: z.string().optional(),
})

const METADATA = storageObjectName(systemTable('schema_metadata'))

export class MetadataHistoryStore implements HistoryStore {
  private readonly store: SqliteStore
  private readonly key: string

  constructor(store: SqliteStore, key: string) {
    this.store = store
    this.key = key
  }

  load(): TaskRunRecord[] {
    const raw = this.store.withConnection('scheduler.loadHistory', (db) => {
      return db
        .prepare<[string], { value: string | null }>(`SELECT value FROM ${METADATA} WHERE key = ?`)
        .get(this.key)?.value
    })
    if (raw === undefined || raw === null) {
      return []
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch {
      return []
    }
    const parsed = z.array(recordSchema).safeParse(json)
    return parsed.success ? parsed.data : []
  }

  save(records: readonly TaskRunRecord[]): void {
    this.store.withConnection('scheduler.saveHistory', (db) => {
      db.prepare<[string, string, string]>(
        `INSERT INTO ${METADATA} (key, value, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
      ).run(this.key, JSON.stringify(records), new Date().toISOString())
    })
  }
}
