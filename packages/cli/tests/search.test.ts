/**
 * Search command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { TransactionLog, type TitleSearchResult } from '@titlecache/core'
import { createSearchCommand, parseLimit, renderResults } from '../src/commands/search.js'
import { createWorkspace, runCli, seedTitles, type Workspace } from './fixtures.js'

function parseResult(stdout: string): TitleSearchResult {
  return JSON.parse(stdout)
}

describe('search command', () => {
  let ws: Workspace

  beforeEach(() => {
    ws = createWorkspace()
    seedTitles(ws.store)
    vi.stubEnv('TITLECACHE_DEFAULT_SOURCE', '')
  })

  afterEach(() => {
    ws.cleanup()
    vi.unstubAllEnvs()
  })

  describe('createSearchCommand', () => {
    it('should define the search options', () => {
      const cmd = createSearchCommand()

      expect(cmd.name()).toBe('search')
      expect(cmd.options.map((o) => o.long)).toEqual(['--db', '--data-dir', '--source', '--limit', '--load', '--json'])
      expect(cmd.options.find((o) => o.long === '--limit')?.defaultValue).toBe('10')
    })
  })

  describe('parseLimit', () => {
    it('should accept positive integers', () => {
      expect(parseLimit('5')).toBe(5)
    })

    it('should reject zero and non-numbers', () => {
      expect(() => parseLimit('0')).toThrow('Invalid limit: 0')
      expect(() => parseLimit('many')).toThrow('Invalid limit: many')
    })
  })

  describe('renderResults', () => {
    it('should say when nothing matched', () => {
      const text = renderResults({ source: 'anidb', query: 'zzz', matches: [], responseTimeMs: 1 })

      expect(text).toContain('No titles found for "zzz" in anidb')
    })
  })

  describe('running', () => {
    it('should rank exact matches before prefix matches', async () => {
      const { stdout, exitCode } = await runCli(['search', 'Cowboy Bebop', ...ws.pathArgs, '--json'])

      const result = parseResult(stdout)
      expect(exitCode).toBe(0)
      expect(result.source).toBe('anidb')
      expect(result.matches.map((m) => [m.externalId, m.matchType])).toEqual([
        [1, 'exact'],
        [5, 'prefix'],
      ])
    })

    it('should fall through to substring matches', async () => {
      const { stdout } = await runCli(['search', 'cowboy', ...ws.pathArgs, '--json'])

      expect(parseResult(stdout).matches.map((m) => [m.externalId, m.matchType])).toEqual([
        [1, 'prefix'],
        [5, 'prefix'],
        [30, 'substring'],
      ])
    })

    it('should honor --limit', async () => {
      const { stdout } = await runCli(['search', 'cowboy', ...ws.pathArgs, '--limit', '1', '--json'])

      expect(parseResult(stdout).matches.map((m) => m.externalId)).toEqual([1])
    })

    it('should print a table by default', async () => {
      const { stdout } = await runCli(['search', 'trigun', ...ws.pathArgs])

      expect(stdout).toContain('Trigun')
      expect(stdout).toContain('1 result(s) in')
    })

    it('should log the search with the cli client id', async () => {
      await runCli(['search', 'trigun', ...ws.pathArgs, '--json'])

      const [logged] = new TransactionLog(ws.store).getRecent(1)
      expect(logged).toMatchObject({ source: 'anidb', query: 'trigun', resultCount: 1, clientId: 'cli' })
    })

    it('should fail on an invalid limit', async () => {
      const { stderr, exitCode } = await runCli(['search', 'cowboy', ...ws.pathArgs, '--limit', '0'])

      expect(exitCode).toBe(1)
      expect(stderr).toContain('Search failed: Invalid limit: 0')
    })

    it('should fail for a source that was never loaded', async () => {
      const { stderr, exitCode } = await runCli(['search', 'cowboy', ...ws.pathArgs, '--source', 'mal'])

      expect(exitCode).toBe(1)
      expect(stderr).toContain('Durable store not initialized: no such table: mal_titles')
    })

    it('should not download when --load finds titles already loaded', async () => {
      const { stdout, exitCode } = await runCli(['search', 'trigun', ...ws.pathArgs, '--load', '--json'])

      expect(exitCode).toBe(0)
      expect(parseResult(stdout).matches).toHaveLength(1)
    })
  })
})
