/**
 * Storage-object identifiers
 *
 * Table names for per-source data cannot be bound as SQL parameters, so they
 * are modelled as a closed union of permitted shapes. A `SourceName` can only
 * be obtained through `validateSourceName`, which makes an unvalidated
 * per-source table name unrepresentable.
 */

import { IdentifierValidationError } from '../errors/index.js'
import { createSecurityEvent, silentLogger, type Logger } from '../utils/logger.js'

declare const sourceNameBrand: unique symbol

/**
 * A source name that passed validation
 */
export type SourceName = string & { readonly [sourceNameBrand]: true }

/**
 * Fixed system tables
 */
export const SYSTEM_TABLES = [
  'persistent_cache',
  'search_transactions',
  'schema_metadata',
  'schema_version',
] as const

export type SystemTableName = (typeof SYSTEM_TABLES)[number]

/**
 * Every storage object the query layer may address
 */
export type StorageObject =
  | { kind: 'titles'; source: SourceName }
  | { kind: 'metadata'; source: SourceName }
  | { kind: 'system'; name: SystemTableName }

export const SOURCE_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*$/
export const MAX_SOURCE_NAME_LENGTH = 64

const COLUMN_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/

function isSourceName(value: string): value is SourceName {
  return value.length <= MAX_SOURCE_NAME_LENGTH && SOURCE_NAME_PATTERN.test(value)
}

function reject(identifier: string, reason: string, logger: Logger): never {
  logger.securityLog(
    createSecurityEvent(
      'validation.failed',
      'high',
      identifier.slice(0, 100),
      'validate_identifier',
      reason
    )
  )
  throw new IdentifierValidationError(`Invalid identifier '${identifier.slice(0, 100)}': ${reason}`, {
    identifier,
  })
}

/**
 * Validate a source name and brand it.
 *
 * Names are lowercased so `AniDB` and `anidb` address the same tables.
 *
 * @throws IdentifierValidationError when the name does not match `^[a-zA-Z][a-zA-Z0-9_]*$`
 */
export function validateSourceName(name: string, logger: Logger = silentLogger): SourceName {
  if (name.length === 0) {
    return reject(name, 'source name is empty', logger)
  }
  if (name.length > MAX_SOURCE_NAME_LENGTH) {
    return reject(name, `source name exceeds ${MAX_SOURCE_NAME_LENGTH} characters`, logger)
  }
  const lowered = name.toLowerCase()
  if (!isSourceName(lowered)) {
    return reject(name, 'source name must start with a letter and contain only letters, digits and underscores', logger)
  }
  return lowered
}

export function titlesTable(source: SourceName): StorageObject {
  return { kind: 'titles', source }
}

export function metadataTable(source: SourceName): StorageObject {
  return { kind: 'metadata', source }
}

export function systemTable(name: SystemTableName): StorageObject {
  return { kind: 'system', name }
}

/**
 * Render the SQL name of a storage object
 */
export function storageObjectName(obj: StorageObject): string {
  switch (obj.kind) {
    case 'titles':
      return `${obj.source}_titles`
    case 'metadata':
      return `${obj.source}_metadata`
    case 'system':
      return obj.name
  }
}

function isSystemTableName(value: string): value is SystemTableName {
  return SYSTEM_TABLES.some((name) => name === value)
}

/**
 * Parse an arbitrary table name back into a permitted shape.
 *
 * @throws IdentifierValidationError when the name matches no shape
 */
export function parseStorageObjectName(raw: string, logger: Logger = silentLogger): StorageObject {
  if (isSystemTableName(raw)) {
    return { kind: 'system', name: raw }
  }

  const match = /^(.+)_(titles|metadata)$/.exec(raw)
  const candidate = match?.[1]
  if (candidate !== undefined && candidate === candidate.toLowerCase() && isSourceName(candidate)) {
    return match?.[2] === 'titles'
      ? { kind: 'titles', source: candidate }
      : { kind: 'metadata', source: candidate }
  }

  return reject(raw, 'table name does not match any permitted pattern', logger)
}

/**
 * Validate a column name used in generated SQL
 */
export function assertColumnName(column: string, logger: Logger = silentLogger): string {
  if (!COLUMN_NAME_PATTERN.test(column) || column.length > 64) {
    return reject(column, 'column name must be lowercase letters, digits and underscores', logger)
  }
  return column
}
