/**
 * Error taxonomy and driver error mapping
 */

import { describe, it, expect } from 'vitest'
import {
  CorruptionError,
  DownloadRateLimitedError,
  getErrorMessage,
  isTitleCacheError,
  NotInitializedError,
  StorageError,
  TitleCacheError,
  toStorageError,
  wrapError,
} from '../src/errors/index.js'

function driverError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code })
}

describe('errors', () => {
  describe('toStorageError', () => {
    it('should map corruption codes to CorruptionError', () => {
      const error = toStorageError(driverError('file is not a database', 'SQLITE_NOTADB'), 'titles.search')

      expect(error).toBeInstanceOf(CorruptionError)
      expect(error).toBeInstanceOf(StorageError)
      expect(error.code).toBe('DB_CORRUPTION')
      expect(error.operation).toBe('titles.search')
    })

    it('should map a missing table to NotInitializedError', () => {
      const error = toStorageError(driverError('no such table: titles_anidb', 'SQLITE_ERROR'), 'titles.search')

      expect(error).toBeInstanceOf(NotInitializedError)
      expect(error.message).toBe('Durable store not initialized: no such table: titles_anidb')
    })

    it('should wrap anything else as StorageError', () => {
      const error = toStorageError(driverError('database is locked', 'SQLITE_BUSY'), 'cache.set')

      expect(error.constructor).toBe(StorageError)
      expect(error.message).toBe("Storage operation 'cache.set' failed: database is locked")
      expect(error.cause).toBeInstanceOf(Error)
    })

    it('should pass storage errors through unchanged', () => {
      const original = new StorageError('already mapped')

      expect(toStorageError(original, 'other')).toBe(original)
    })
  })

  describe('TitleCacheError', () => {
    it('should walk the cause chain', () => {
      const root = new Error('root')
      const middle = new StorageError('middle', { cause: root })
      const top = new TitleCacheError('top', { cause: middle })

      expect(top.getErrorChain().map((e) => e.message)).toEqual(['top', 'middle', 'root'])
      expect(top.toJSON()).toMatchObject({ name: 'TitleCacheError', code: 'TITLECACHE_ERROR', cause: 'middle' })
    })

    it('should carry the download window on rate limit errors', () => {
      const error = new DownloadRateLimitedError('blocked', {
        lastDownloadAt: new Date(0),
        nextAllowedAt: new Date(36 * 3600 * 1000),
        hoursRemaining: 12.5,
        protectionHours: 36,
      })

      expect(isTitleCacheError(error)).toBe(true)
      expect(error.hoursRemaining).toBe(12.5)
      expect(error.nextAllowedAt.toISOString()).toBe('1970-01-02T12:00:00.000Z')
    })
  })

  describe('helpers', () => {
    it('should extract messages from any thrown value', () => {
      expect(getErrorMessage(new Error('x'))).toBe('x')
      expect(getErrorMessage('plain')).toBe('plain')
      expect(getErrorMessage(42)).toBe('Unknown error')
    })

    it('should wrap foreign errors and keep our own', () => {
      const own = new TitleCacheError('own')

      expect(wrapError(own, 'ignored')).toBe(own)
      const wrapped = wrapError(new Error('inner'), 'outer', { code: 'OUTER' })
      expect(wrapped.message).toBe('outer')
      expect(wrapped.code).toBe('OUTER')
      expect(isTitleCacheError(new Error('nope'))).toBe(false)
    })
  })
})
