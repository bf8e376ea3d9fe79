/**
 * Per-call connections to the durable store
 *
 * Each operation opens the database file, runs, and closes it again, so no
 * component holds a long-lived connection whose state could go stale.
 */

import Database from 'better-sqlite3'
import type { Database as DatabaseType } from 'better-sqlite3'
import { existsSync, mkdirSync, statSync } from 'fs'
import { dirname } from 'path'
import { toStorageError } from '../errors/index.js'
import { createDatabase } from './schema.js'

export interface SqliteStoreOptions {
  /** Busy timeout in ms (default: 30000) */
  timeoutMs?: number
  /** Enable WAL journaling (default: true) */
  wal?: boolean
  /** Create parent directories on initialize (default: true) */
  createDirectory?: boolean
}

/**
 * Handle on one SQLite file. Holds a path, never a connection.
 */
export class SqliteStore {
  readonly path: string
  private readonly timeoutMs: number
  private readonly wal: boolean
  private readonly createDirectory: boolean

  constructor(path: string, options: SqliteStoreOptions = {}) {
    this.path = path
    this.timeoutMs = options.timeoutMs ?? 30000
    this.wal = options.wal ?? true
    this.createDirectory = options.createDirectory ?? true
  }

  /**
   * Create the file, the core schema and pending migrations
   */
  initialize(): void {
    try {
      if (this.createDirectory && this.path !== ':memory:') {
        const dir = dirname(this.path)
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true })
        }
      }
      createDatabase(this.path, { wal: this.wal }).close()
    } catch (error) {
      throw toStorageError(error, 'initialize')
    }
  }

  /**
   * Open a connection, run `fn`, close the connection.
   *
   * Driver errors are rethrown as StorageError subclasses.
   */
  withConnection<T>(operation: string, fn: (db: DatabaseType) => T): T {
    let db: DatabaseType | undefined
    try {
      db = new Database(this.path, { timeout: this.timeoutMs, fileMustExist: this.path !== ':memory:' })
      return fn(db)
    } catch (error) {
      throw toStorageError(error, operation)
    } finally {
      db?.close()
    }
  }

  /**
   * Run `fn` inside a single transaction on a fresh connection
   */
  withTransaction<T>(operation: string, fn: (db: DatabaseType) => T): T {
    return this.withConnection(operation, (db) => db.transaction(() => fn(db))())
  }

  /**
   * Size of the database file in bytes (0 when missing)
   */
  fileSize(): number {
    try {
      return statSync(this.path).size
    } catch {
      return 0
    }
  }
}
