/**
 * Logger Utility with Audit Support
 *
 * Structured logging with audit trails and security events. Output verbosity
 * is controlled through environment variables; retained entries go to an
 * aggregator owned by the application context.
 */

/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  AUDIT = 4,
  SECURITY = 5,
}

/**
 * Audit event types
 */
export type AuditEventType =
  | 'cache.degraded'
  | 'download.attempt'
  | 'download.protection_reset'
  | 'titles.replace'
  | 'maintenance.run'
  | 'transactions.cleanup'

/**
 * Security event types
 */
export type SecurityEventType =
  | 'validation.failed'
  | 'rate_limit.exceeded'
  | 'rate_limit.bypassed'
  | 'suspicious.pattern'

/**
 * Audit event structure
 */
export interface AuditEvent {
  /** Type of audit event */
  eventType: AuditEventType
  /** When the event occurred */
  timestamp: string
  /** Who performed the action (user, system, scheduler) */
  actor: string
  /** Resource being accessed (table, file, cache key) */
  resource: string
  /** Action being performed */
  action: string
  /** Result of the action */
  result: 'success' | 'blocked' | 'error'
  /** Additional context as key-value pairs */
  metadata?: Record<string, unknown>
}

/**
 * Security event structure
 */
export interface SecurityEvent {
  /** Type of security event */
  eventType: SecurityEventType
  /** When the event occurred */
  timestamp: string
  severity: 'low' | 'medium' | 'high' | 'critical'
  /** Resource being protected */
  resource: string
  /** Action that was blocked/detected */
  action: string
  details: string
  metadata?: Record<string, unknown>
}

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel
  timestamp: string
  namespace?: string
  message: string
  context?: Record<string, unknown>
  error?: Error
}

/**
 * Destination for retained log entries
 */
export interface LogAggregator {
  add(entry: LogEntry): void
  addAudit(event: AuditEvent): void
  addSecurity(event: SecurityEvent): void
  getLogs(): LogEntry[]
  getAuditEvents(): AuditEvent[]
  getSecurityEvents(): SecurityEvent[]
}

/**
 * Logger interface with audit support
 */
export interface Logger {
  warn: (message: string, context?: Record<string, unknown>) => void
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void
  info: (message: string, context?: Record<string, unknown>) => void
  debug: (message: string, context?: Record<string, unknown>) => void
  auditLog: (event: AuditEvent) => void
  securityLog: (event: SecurityEvent) => void
}

/**
 * In-memory log aggregator, bounded per stream
 */
export class MemoryLogAggregator implements LogAggregator {
  private logs: LogEntry[] = []
  private auditEvents: AuditEvent[] = []
  private securityEvents: SecurityEvent[] = []
  private maxSize: number

  constructor(maxSize = 10000) {
    this.maxSize = maxSize
  }

  add(entry: LogEntry): void {
    this.logs.push(entry)
    if (this.logs.length > this.maxSize) {
      this.logs.shift()
    }
  }

  addAudit(event: AuditEvent): void {
    this.auditEvents.push(event)
    if (this.auditEvents.length > this.maxSize) {
      this.auditEvents.shift()
    }
  }

  addSecurity(event: SecurityEvent): void {
    this.securityEvents.push(event)
    if (this.securityEvents.length > this.maxSize) {
      this.securityEvents.shift()
    }
  }

  getLogs(): LogEntry[] {
    return [...this.logs]
  }

  getAuditEvents(): AuditEvent[] {
    return [...this.auditEvents]
  }

  getSecurityEvents(): SecurityEvent[] {
    return [...this.securityEvents]
  }

  clear(): void {
    this.logs = []
    this.auditEvents = []
    this.securityEvents = []
  }
}

/**
 * Format log entry for output
 */
function formatLogEntry(entry: LogEntry, useJson: boolean): string {
  if (useJson) {
    return JSON.stringify({
      level: LogLevel[entry.level],
      timestamp: entry.timestamp,
      namespace: entry.namespace,
      message: entry.message,
      context: entry.context,
      error: entry.error
        ? {
            message: entry.error.message,
            stack: entry.error.stack,
          }
        : undefined,
    })
  }

  const prefix = entry.namespace ? `[titlecache:${entry.namespace}]` : '[titlecache]'
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : ''
  return `${prefix} ${entry.message}${contextStr}`
}

function formatAuditEvent(event: AuditEvent, useJson: boolean): string {
  if (useJson) {
    return JSON.stringify(event)
  }

  const metaStr = event.metadata ? ` ${JSON.stringify(event.metadata)}` : ''
  return `[AUDIT] ${event.eventType} | ${event.actor} -> ${event.action} on ${event.resource} = ${event.result}${metaStr}`
}

function formatSecurityEvent(event: SecurityEvent, useJson: boolean): string {
  if (useJson) {
    return JSON.stringify(event)
  }

  const metaStr = event.metadata ? ` ${JSON.stringify(event.metadata)}` : ''
  return `[SECURITY:${event.severity.toUpperCase()}] ${event.eventType} | ${event.action} on ${event.resource} - ${event.details}${metaStr}`
}

function createLoggerInstance(namespace?: string, aggregator?: LogAggregator): Logger {
  const useJson = process.env.LOG_FORMAT === 'json'
  const minLevel = process.env.LOG_LEVEL ? parseInt(process.env.LOG_LEVEL, 10) : LogLevel.WARN

  const shouldLog = (level: LogLevel): boolean => {
    // Keep test output clean; errors still surface
    if (process.env.NODE_ENV === 'test' && level === LogLevel.WARN) {
      return false
    }
    if (level === LogLevel.DEBUG || level === LogLevel.INFO) {
      return !!process.env.DEBUG
    }
    return level >= minLevel
  }

  const createLogEntry = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry => ({
    level,
    timestamp: new Date().toISOString(),
    namespace,
    message,
    context,
    error,
  })

  return {
    warn: (message: string, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.WARN, message, context)
      if (shouldLog(LogLevel.WARN)) {
        console.warn(formatLogEntry(entry, useJson))
      }
      aggregator?.add(entry)
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.ERROR, message, context, error)
      if (shouldLog(LogLevel.ERROR)) {
        console.error(formatLogEntry(entry, useJson))
        if (error && !useJson) {
          console.error(error)
        }
      }
      aggregator?.add(entry)
    },

    info: (message: string, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.INFO, message, context)
      if (shouldLog(LogLevel.INFO)) {
        console.info(formatLogEntry(entry, useJson))
      }
      aggregator?.add(entry)
    },

    debug: (message: string, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.DEBUG, message, context)
      if (shouldLog(LogLevel.DEBUG)) {
        console.debug(formatLogEntry(entry, useJson))
      }
      aggregator?.add(entry)
    },

    auditLog: (event: AuditEvent) => {
      const entry = createLogEntry(LogLevel.AUDIT, formatAuditEvent(event, false))
      // Opt-in so audit lines never mix into command output on stdout
      if (process.env.AUDIT_LOG === 'true' || (process.env.LOG_LEVEL !== undefined && shouldLog(LogLevel.AUDIT))) {
        console.log(formatAuditEvent(event, useJson))
      }
      aggregator?.add(entry)
      aggregator?.addAudit(event)
    },

    securityLog: (event: SecurityEvent) => {
      const entry = createLogEntry(LogLevel.SECURITY, formatSecurityEvent(event, false))
      // Security events always print outside of tests
      if (process.env.NODE_ENV !== 'test') {
        console.warn(formatSecurityEvent(event, useJson))
      }
      aggregator?.add(entry)
      aggregator?.addSecurity(event)
    },
  }
}

/**
 * Create a namespaced logger
 *
 * Environment variables:
 * - NODE_ENV=test: Suppress warn and security output
 * - DEBUG=true: Enable info and debug output
 * - LOG_FORMAT=json: Output logs in JSON format
 * - LOG_LEVEL=0-5: Minimum log level to output
 * - AUDIT_LOG=true: Enable audit log output (also enabled by LOG_LEVEL <= 4)
 *
 * @param namespace - The namespace prefix for log messages
 * @param aggregator - Retains every entry, printed or not
 *
 * @example
 * ```typescript
 * const log = createLogger('DownloadGate', ctx.logs)
 * log.warn('Download blocked', { hoursRemaining: 12.5 })
 * ```
 */
export function createLogger(namespace: string, aggregator?: LogAggregator): Logger {
  return createLoggerInstance(namespace, aggregator)
}

/**
 * No-op logger for testing or silent operation
 */
export const silentLogger: Logger = {
  warn: () => {},
  error: () => {},
  info: () => {},
  debug: () => {},
  auditLog: () => {},
  securityLog: () => {},
}

/**
 * Helper to create audit events with current timestamp
 */
export function createAuditEvent(
  eventType: AuditEventType,
  actor: string,
  resource: string,
  action: string,
  result: 'success' | 'blocked' | 'error',
  metadata?: Record<string, unknown>
): AuditEvent {
  return {
    eventType,
    timestamp: new Date().toISOString(),
    actor,
    resource,
    action,
    result,
    metadata,
  }
}

/**
 * Helper to create security events with current timestamp
 */
export function createSecurityEvent(
  eventType: SecurityEventType,
  severity: 'low' | 'medium' | 'high' | 'critical',
  resource: string,
  action: string,
  details: string,
  metadata?: Record<string, unknown>
): SecurityEvent {
  return {
    eventType,
    timestamp: new Date().toISOString(),
    severity,
    resource,
    action,
    details,
    metadata,
  }
}
