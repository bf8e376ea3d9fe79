/**
 * Source names and storage-object identifiers
 */

import { describe, it, expect } from 'vitest'
import {
  assertColumnName,
  metadataTable,
  parseStorageObjectName,
  storageObjectName,
  systemTable,
  titlesTable,
  validateSourceName,
} from '../src/security/identifiers.js'
import { IdentifierValidationError } from '../src/errors/index.js'
import { createLogger, MemoryLogAggregator } from '../src/utils/logger.js'

describe('validateSourceName', () => {
  it('should accept letters, digits and underscores and lowercase the name', () => {
    expect(validateSourceName('AniDB')).toBe('anidb')
    expect(validateSourceName('my_source_2')).toBe('my_source_2')
  })

  it('should accept exactly 64 characters', () => {
    expect(validateSourceName('a'.repeat(64))).toBe('a'.repeat(64))
  })

  it.each([
    ['empty', ''],
    ['leading digit', '1anidb'],
    ['leading underscore', '_anidb'],
    ['hyphen', 'ani-db'],
    ['space', 'ani db'],
    ['injection', 'anidb; DROP TABLE schema_metadata'],
    ['too long', 'a'.repeat(65)],
  ])('should reject a name with %s', (_label, name) => {
    expect(() => validateSourceName(name)).toThrow(IdentifierValidationError)
  })

  it('should record a security event on rejection', () => {
    const logs = new MemoryLogAggregator()
    const logger = createLogger('identifiers', logs)

    expect(() => validateSourceName('bad-name', logger)).toThrow("Invalid identifier 'bad-name'")

    const events = logs.getSecurityEvents()
    expect(events).toHaveLength(1)
    expect(events[0]?.eventType).toBe('validation.failed')
    expect(events[0]?.resource).toBe('bad-name')
  })

  it('should expose the rejected identifier on the error', () => {
    try {
      validateSourceName('x y')
      expect.fail('expected validation to throw')
    } catch (error) {
      expect(error).toBeInstanceOf(IdentifierValidationError)
      if (error instanceof IdentifierValidationError) {
        expect(error.identifier).toBe('x y')
        expect(error.code).toBe('IDENTIFIER_VALIDATION_FAILED')
      }
    }
  })
})

describe('storage objects', () => {
  const source = validateSourceName('anidb')

  it('should render per-source and system table names', () => {
    expect(storageObjectName(titlesTable(source))).toBe('anidb_titles')
    expect(storageObjectName(metadataTable(source))).toBe('anidb_metadata')
    expect(storageObjectName(systemTable('persistent_cache'))).toBe('persistent_cache')
  })

  it('should parse permitted names back into their shape', () => {
    expect(parseStorageObjectName('anidb_titles')).toEqual({ kind: 'titles', source: 'anidb' })
    expect(parseStorageObjectName('my_src_metadata')).toEqual({ kind: 'metadata', source: 'my_src' })
    expect(parseStorageObjectName('search_transactions')).toEqual({
      kind: 'system',
      name: 'search_transactions',
    })
  })

  it.each(['sqlite_master', 'AniDB_titles', 'anidb_titles; --', 'users', '_titles'])(
    'should reject %s',
    (raw) => {
      expect(() => parseStorageObjectName(raw)).toThrow(IdentifierValidationError)
    }
  )
})

describe('assertColumnName', () => {
  it('should pass lowercase snake_case columns through', () => {
    expect(assertColumnName('title_normalized')).toBe('title_normalized')
  })

  it('should reject anything else', () => {
    expect(() => assertColumnName('Title')).toThrow(IdentifierValidationError)
    expect(() => assertColumnName('title; DROP')).toThrow(IdentifierValidationError)
  })
})
