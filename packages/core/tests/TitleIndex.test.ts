/**
 * Per-source title index
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { TitleIndex, MIN_QUERY_LENGTH } from '../src/titles/TitleIndex.js'
import type { TitleRecord } from '../src/titles/types.js'
import { IdentifierValidationError, NotInitializedError } from '../src/errors/index.js'
import { createLogger, MemoryLogAggregator } from '../src/utils/logger.js'
import { createClock, createTempStore, type TempStore } from './fixtures/tempStore.js'

function record(externalId: number, title: string, titleType = 1, language = 'en'): TitleRecord {
  return { externalId, titleType, language, title }
}

describe('TitleIndex', () => {
  let temp: TempStore
  let index: TitleIndex
  let logs: MemoryLogAggregator

  beforeEach(() => {
    temp = createTempStore()
    logs = new MemoryLogAggregator()
    index = new TitleIndex(temp.store, {
      logger: createLogger('TitleIndex', logs),
      now: createClock(Date.UTC(2024, 0, 1)).now,
    })
  })

  afterEach(() => {
    temp.cleanup()
    vi.restoreAllMocks()
  })

  describe('initializeSource', () => {
    it('should create the tables once and report them', () => {
      expect(index.isInitialized('anidb')).toBe(false)

      index.initializeSource('anidb')
      index.initializeSource('anidb')

      expect(index.isInitialized('anidb')).toBe(true)
      expect(index.getMetadata('anidb', 'source_initialized')).toBe('2024-01-01T00:00:00.000Z')
    })

    it('should treat source names case-insensitively', () => {
      index.initializeSource('AniDB')
      expect(index.isInitialized('anidb')).toBe(true)
    })

    it('should reject invalid source names', () => {
      expect(() => index.initializeSource('ani-db')).toThrow(IdentifierValidationError)
    })
  })

  describe('search', () => {
    it('should rank the exact match before the substring match', () => {
      index.bulkReplace('anidb', [record(1, 'Cowboy Bebop'), record(2, 'Bebop')])

      const results = index.search('anidb', 'bebop', 10)

      expect(results.map((r) => [r.externalId, r.title, r.matchType])).toEqual([
        [2, 'Bebop', 'exact'],
        [1, 'Cowboy Bebop', 'substring'],
      ])
    })

    it('should run exact, prefix and substring tiers in order', () => {
      index.bulkReplace('anidb', [
        record(10, 'The Naruto Movie'),
        record(11, 'Naruto Shippuden'),
        record(12, 'Naruto'),
      ])

      const results = index.search('anidb', 'Naruto')

      expect(results.map((r) => [r.externalId, r.matchType])).toEqual([
        [12, 'exact'],
        [11, 'prefix'],
        [10, 'substring'],
      ])
    })

    it('should return each external id once, at its best tier', () => {
      index.bulkReplace('anidb', [
        record(1, 'Bebop', 2),
        record(1, 'Cowboy Bebop', 1),
        record(2, 'Bebop Deluxe', 1),
      ])

      const results = index.search('anidb', 'bebop')

      expect(results.map((r) => [r.externalId, r.title, r.matchType])).toEqual([
        [1, 'Bebop', 'exact'],
        [2, 'Bebop Deluxe', 'prefix'],
      ])
    })

    it('should order rows within a tier by title type then language', () => {
      index.bulkReplace('anidb', [
        record(3, 'Akira', 4, 'ja'),
        record(2, 'Akira', 1, 'ja'),
        record(1, 'Akira', 1, 'en'),
      ])

      expect(index.search('anidb', 'akira').map((r) => r.externalId)).toEqual([1, 2, 3])
    })

    it('should stop at the limit', () => {
      index.bulkReplace('anidb', [record(1, 'Bebop'), record(2, 'Bebop 2'), record(3, 'Cowboy Bebop')])

      const results = index.search('anidb', 'bebop', 2)

      expect(results.map((r) => r.externalId)).toEqual([1, 2])
    })

    it('should match case-insensitively and treat wildcards literally', () => {
      index.bulkReplace('anidb', [record(1, '100% Pascal-sensei'), record(2, '1000 Pascals')])

      const results = index.search('anidb', '100%')

      expect(results.map((r) => r.externalId)).toEqual([1])
      expect(index.search('anidb', 'PASCAL-SENSEI').map((r) => r.externalId)).toEqual([1])
    })

    it('should not touch storage for queries shorter than the minimum', () => {
      const spy = vi.spyOn(temp.store, 'withConnection')

      expect(MIN_QUERY_LENGTH).toBe(2)
      expect(index.search('anidb', 'a')).toEqual([])
      expect(index.search('anidb', '  b  ')).toEqual([])
      expect(index.search('ani-db', 'x')).toEqual([])
      expect(spy).not.toHaveBeenCalled()
    })

    it('should return nothing for a non-positive limit', () => {
      index.bulkReplace('anidb', [record(1, 'Bebop')])
      expect(index.search('anidb', 'bebop', 0)).toEqual([])
    })

    it('should throw NotInitializedError for a source without tables', () => {
      expect(() => index.search('unknown', 'bebop')).toThrow(NotInitializedError)
    })
  })

  describe('bulkReplace', () => {
    it('should replace every title of the source', () => {
      index.bulkReplace('anidb', [record(1, 'Old Title')])
      const inserted = index.bulkReplace('anidb', [record(2, 'New Title'), record(3, 'Other')])

      expect(inserted).toBe(2)
      expect(index.countTitles('anidb')).toBe(2)
      expect(index.search('anidb', 'old title')).toEqual([])
    })

    it('should leave the source empty after an empty replace', () => {
      index.bulkReplace('anidb', [record(1, 'Bebop')])

      expect(index.bulkReplace('anidb', [])).toBe(0)
      expect(index.search('anidb', 'bebop')).toEqual([])
      expect(index.hasTitles('anidb')).toBe(false)
    })

    it('should ignore duplicate records', () => {
      expect(index.bulkReplace('anidb', [record(1, 'Bebop'), record(1, 'Bebop')])).toBe(1)
    })

    it('should find every replaced title by its external id', () => {
      const records = [record(5, 'Trigun'), record(6, 'Planetes'), record(7, 'Monster')]
      index.bulkReplace('anidb', records)

      for (const r of records) {
        expect(index.search('anidb', r.title)[0]?.externalId).toBe(r.externalId)
      }
    })

    it('should keep sources separate', () => {
      index.bulkReplace('anidb', [record(1, 'Bebop')])
      index.bulkReplace('other', [record(9, 'Bebop')])

      expect(index.search('anidb', 'bebop').map((r) => r.externalId)).toEqual([1])
      expect(index.search('other', 'bebop').map((r) => r.externalId)).toEqual([9])
    })

    it('should stamp the update time and write an audit event', () => {
      index.bulkReplace('anidb', [record(1, 'Bebop')])

      expect(index.getMetadata('anidb', 'last_titles_update')).toBe('2024-01-01T00:00:00.000Z')
      const audit = logs.getAuditEvents().find((e) => e.eventType === 'titles.replace')
      expect(audit?.resource).toBe('anidb_titles')
      expect(audit?.metadata).toEqual({ records: 1, inserted: 1 })
    })
  })

  describe('stats and metadata', () => {
    it('should report per-source counts', () => {
      index.bulkReplace('anidb', [record(1, 'Bebop'), record(1, 'Cowboy Bebop'), record(2, 'Trigun')])

      expect(index.getStats(['anidb', 'missing'])).toEqual([
        {
          source: 'anidb',
          initialized: true,
          totalTitles: 3,
          uniqueIds: 2,
          lastUpdate: '2024-01-01T00:00:00.000Z',
        },
        { source: 'missing', initialized: false, totalTitles: 0, uniqueIds: 0, lastUpdate: null },
      ])
    })

    it('should report no titles for an uninitialized source', () => {
      expect(index.hasTitles('anidb')).toBe(false)
    })

    it('should set, list by prefix and delete metadata', () => {
      index.setMetadata('anidb', 'attempt_001', 'a')
      index.setMetadata('anidb', 'attempt_002', 'b')
      index.setMetadata('anidb', 'last_size', '10')

      expect(index.listMetadata('anidb', 'attempt_').map((e) => e.key)).toEqual(['attempt_002', 'attempt_001'])
      expect(index.listMetadata('anidb', 'attempt_', 1).map((e) => e.value)).toEqual(['b'])
      expect(index.deleteMetadata('anidb', 'last_size')).toBe(true)
      expect(index.getMetadata('anidb', 'last_size')).toBeNull()
    })

    it('should throw NotInitializedError reading metadata of an unknown source', () => {
      expect(() => index.getMetadata('unknown', 'key')).toThrow(NotInitializedError)
    })
  })
})
