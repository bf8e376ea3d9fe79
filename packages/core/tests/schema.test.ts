/**
 * Core schema creation and migrations
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import Database from 'better-sqlite3'
import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { createDatabase, getSchemaVersion, runMigrations, SCHEMA_SQL, SCHEMA_VERSION, sourceSchemaSql } from '../src/db/schema.js'
import { SqliteStore } from '../src/db/connection.js'
import { NotInitializedError, StorageError } from '../src/errors/index.js'
import { validateSourceName } from '../src/security/identifiers.js'

function tableNames(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all()
    .map((row) => row.name)
}

describe('schema', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'titlecache-schema-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should create the core tables at the current version', () => {
    const db = createDatabase(join(dir, 'core.db'))
    try {
      expect(tableNames(db)).toEqual([
        'persistent_cache',
        'schema_metadata',
        'schema_version',
        'search_transactions',
      ])
      expect(getSchemaVersion(db)).toBe(SCHEMA_VERSION)
    } finally {
      db.close()
    }
  })

  it('should apply only pending migrations', () => {
    const path = join(dir, 'old.db')
    const old = new Database(path)
    old.exec(SCHEMA_SQL)
    old.prepare('INSERT INTO schema_version (version) VALUES (1)').run()

    try {
      expect(runMigrations(old)).toBe(SCHEMA_VERSION - 1)
      expect(getSchemaVersion(old)).toBe(SCHEMA_VERSION)
      expect(runMigrations(old)).toBe(0)
    } finally {
      old.close()
    }
  })

  it('should report version 0 for an empty file', () => {
    const db = new Database(join(dir, 'empty.db'))
    try {
      expect(getSchemaVersion(db)).toBe(0)
    } finally {
      db.close()
    }
  })

  it('should create per-source tables on demand', () => {
    const db = createDatabase(join(dir, 'source.db'))
    try {
      db.exec(sourceSchemaSql(validateSourceName('anidb')))
      expect(tableNames(db)).toContain('anidb_titles')
      expect(tableNames(db)).toContain('anidb_metadata')
    } finally {
      db.close()
    }
  })

  describe('SqliteStore', () => {
    it('should refuse to create a database outside initialize', () => {
      const store = new SqliteStore(join(dir, 'absent.db'))

      expect(() => store.withConnection('read', (db) => db.prepare('SELECT 1').get())).toThrow(StorageError)
    })

    it('should map a missing table to NotInitializedError', () => {
      const store = new SqliteStore(join(dir, 'store.db'))
      store.initialize()

      expect(() =>
        store.withConnection('read', (db) => db.prepare('SELECT * FROM anidb_titles').all())
      ).toThrow(NotInitializedError)
    })

    it('should roll back a failed transaction', () => {
      const store = new SqliteStore(join(dir, 'tx.db'))
      store.initialize()

      expect(() =>
        store.withTransaction('write', (db) => {
          db.prepare("INSERT INTO schema_metadata (key, value) VALUES ('pending', 'x')").run()
          throw new Error('abort')
        })
      ).toThrow(StorageError)

      const row = store.withConnection('read', (db) =>
        db.prepare("SELECT value FROM schema_metadata WHERE key = 'pending'").get()
      )
      expect(row).toBeUndefined()
    })
  })
})
