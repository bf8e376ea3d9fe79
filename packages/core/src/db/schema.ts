/**
 * SQLite Database Schema
 *
 * Core tables shared by every source: the durable cache, the search
 * transaction log and housekeeping metadata. Per-source title and metadata
 * tables are created on demand by the title index (see `sourceSchemaSql`).
 */

import Database from 'better-sqlite3'
import type { Database as DatabaseType } from 'better-sqlite3'
import { storageObjectName, titlesTable, metadataTable, type SourceName } from '../security/identifiers.js'

export const SCHEMA_VERSION = 2

/**
 * SQL statements for creating the core schema
 */
export const SCHEMA_SQL = `
PRAGMA synchronous = NORMAL;
PRAGMA temp_store = MEMORY;

-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Housekeeping key/value store
CREATE TABLE IF NOT EXISTS schema_metadata (
  key TEXT PRIMARY KEY,
  value TEXT,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Durable (L2) cache entries, timestamps in epoch milliseconds
CREATE TABLE IF NOT EXISTS persistent_cache (
  cache_key TEXT PRIMARY KEY,
  method_name TEXT NOT NULL,
  parameters_json TEXT NOT NULL,
  raw_payload TEXT,
  parsed_data_json TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  expires_at INTEGER NOT NULL,
  access_count INTEGER NOT NULL DEFAULT 1,
  last_accessed INTEGER NOT NULL,
  data_size INTEGER NOT NULL DEFAULT 0,
  CHECK (expires_at > created_at)
);

CREATE INDEX IF NOT EXISTS idx_persistent_cache_expires ON persistent_cache(expires_at);
CREATE INDEX IF NOT EXISTS idx_persistent_cache_method ON persistent_cache(method_name);
CREATE INDEX IF NOT EXISTS idx_persistent_cache_accessed ON persistent_cache(last_accessed);

-- Append-only search/lookup log
CREATE TABLE IF NOT EXISTS search_transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  source TEXT NOT NULL,
  query TEXT NOT NULL,
  result_count INTEGER NOT NULL DEFAULT 0,
  response_time_ms REAL NOT NULL DEFAULT 0,
  client_identifier TEXT,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_transactions_timestamp ON search_transactions(timestamp);
CREATE INDEX IF NOT EXISTS idx_transactions_source ON search_transactions(source);
CREATE INDEX IF NOT EXISTS idx_transactions_query ON search_transactions(query);
CREATE INDEX IF NOT EXISTS idx_transactions_created ON search_transactions(created_at);
`

/**
 * Migration definitions for schema upgrades
 */
export interface Migration {
  version: number
  description: string
  sql: string
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Initial schema creation',
    sql: SCHEMA_SQL,
  },
  {
    version: 2,
    description: 'Index search transactions by created_at for retention cleanup',
    sql: 'CREATE INDEX IF NOT EXISTS idx_transactions_created ON search_transactions(created_at);',
  },
]

/**
 * DDL for one source's title and metadata tables
 */
export function sourceSchemaSql(source: SourceName): string {
  const titles = storageObjectName(titlesTable(source))
  const metadata = storageObjectName(metadataTable(source))

  return `
CREATE TABLE IF NOT EXISTS ${titles} (
  external_id INTEGER NOT NULL,
  title_type INTEGER NOT NULL,
  language TEXT NOT NULL,
  title TEXT NOT NULL,
  title_normalized TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (external_id, title_type, language, title)
);

CREATE INDEX IF NOT EXISTS idx_${titles}_normalized ON ${titles}(title_normalized);
CREATE INDEX IF NOT EXISTS idx_${titles}_external_id ON ${titles}(external_id);
CREATE INDEX IF NOT EXISTS idx_${titles}_type ON ${titles}(title_type);
CREATE INDEX IF NOT EXISTS idx_${titles}_search ON ${titles}(title_normalized, title_type, language);

CREATE TABLE IF NOT EXISTS ${metadata} (
  key TEXT PRIMARY KEY,
  value TEXT,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`
}

/**
 * Initialize the database with the core schema
 */
export function initializeSchema(db: DatabaseType): void {
  db.exec(SCHEMA_SQL)

  db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION)
  db.prepare(
    `INSERT INTO schema_metadata (key, value, updated_at) VALUES ('schema_version', ?, datetime('now'))
     ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
  ).run(String(SCHEMA_VERSION))
}

/**
 * Get the current schema version from the database
 */
export function getSchemaVersion(db: DatabaseType): number {
  try {
    const result = db
      .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
      .get()
    return result?.version ?? 0
  } catch {
    // Table missing means nothing has been applied yet
    return 0
  }
}

/**
 * Run pending migrations to upgrade the schema
 */
export function runMigrations(db: DatabaseType): number {
  const currentVersion = getSchemaVersion(db)
  let migrationsRun = 0

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      db.exec(migration.sql)
      db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(migration.version)
      migrationsRun++
    }
  }

  return migrationsRun
}

/**
 * Open a database file, create the core schema and apply migrations
 */
export function createDatabase(path: string = ':memory:', options: { wal?: boolean } = {}): DatabaseType {
  const db = new Database(path)

  if (options.wal ?? true) {
    db.pragma('journal_mode = WAL')
  }

  if (getSchemaVersion(db) === 0) {
    initializeSchema(db)
  } else {
    runMigrations(db)
  }

  return db
}
