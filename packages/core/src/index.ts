/**
 * @titlecache/core - tiered cache, title index and download gate
 */

// Version
export const VERSION = '0.1.0'

// Database
export {
  SCHEMA_VERSION,
  SCHEMA_SQL,
  MIGRATIONS,
  createDatabase,
  initializeSchema,
  getSchemaVersion,
  runMigrations,
  sourceSchemaSql,
  type Migration,
} from './db/schema.js'
export { SqliteStore, type SqliteStoreOptions } from './db/connection.js'

// Errors
export * from './errors/index.js'

// Logging
export {
  LogLevel,
  MemoryLogAggregator,
  createLogger,
  createAuditEvent,
  createSecurityEvent,
  silentLogger,
  type Logger,
  type LogEntry,
  type LogAggregator,
  type AuditEvent,
  type AuditEventType,
  type SecurityEvent,
  type SecurityEventType,
} from './utils/logger.js'

// Configuration
export * from './config/index.js'

// Identifiers & queries
export * from './security/index.js'

// Cache
export * from './cache/index.js'

// Titles
export * from './titles/index.js'

// Download
export * from './download/index.js'

// Analytics
export * from './analytics/index.js'

// Schedulers
export * from './scheduler/index.js'

// Services
export * from './services/index.js'

// Context
export {
  createAppContext,
  closeAppContext,
  type AppContext,
  type AppContextOptions,
} from './context.js'
