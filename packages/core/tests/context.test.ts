/**
 * Application context wiring and isolation
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { generateCacheKey } from '../src/cache/CacheEntry.js'
import { closeAppContext, createAppContext, type AppContext } from '../src/context.js'
import type { TitlesFetcher } from '../src/download/types.js'
import { ManualTicker, settle } from '../src/scheduler/Ticker.js'
import { gzipLines, titleLines } from './fixtures/titles.js'

describe('createAppContext', () => {
  let dir: string
  let contexts: AppContext[]
  let fetcher: TitlesFetcher

  function env(name: string): NodeJS.ProcessEnv {
    return {
      TITLECACHE_DB_PATH: join(dir, `${name}.db`),
      TITLECACHE_DATA_DIR: join(dir, `${name}-data`),
      TITLECACHE_DOWNLOAD_MIN_BYTES: '100',
    }
  }

  async function open(name: string, extra: { fetcher?: TitlesFetcher; startSchedulers?: boolean } = {}): Promise<AppContext> {
    const ctx = await createAppContext({
      env: env(name),
      fetcher: extra.fetcher,
      ticker: new ManualTicker(Date.now()),
      startSchedulers: extra.startSchedulers,
    })
    contexts.push(ctx)
    return ctx
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'titlecache-context-'))
    contexts = []
    fetcher = { fetch: vi.fn(async () => gzipLines(['42|1|en|Trigun', ...titleLines(200, 100)])) }
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    await Promise.all(contexts.map((ctx) => closeAppContext(ctx)))
    rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('should build a working context from the environment', async () => {
    const ctx = await open('main', { fetcher })

    expect(ctx.config.database.path).toBe(join(dir, 'main.db'))
    expect(ctx.gate.filePath).toBe(join(dir, 'main-data', 'titles.dat.gz'))

    const report = await ctx.search.ensureTitlesLoaded('anidb')
    expect(report).toMatchObject({ action: 'loaded', downloaded: true, titlesLoaded: 201 })

    const result = ctx.search.searchTitles('anidb', 'trigun')
    expect(result.matches[0]?.externalId).toBe(42)
    expect(ctx.transactions.getRecent(1)[0]?.query).toBe('trigun')
  })

  it('should apply config overrides', async () => {
    const ctx = await createAppContext({
      env: env('override'),
      overrides: { transactions: { enableLogging: false } },
      ticker: new ManualTicker(0),
    })
    contexts.push(ctx)

    expect(ctx.transactions.enabled).toBe(false)
    expect(ctx.maintenance.getTask('transaction_cleanup')).toBeUndefined()
  })

  it('should run transaction retention only in the analytics scheduler', async () => {
    const ctx = await open('retention')

    expect(ctx.maintenance.getTask('transaction_cleanup')).toBeUndefined()
    expect(ctx.maintenance.getTask('download_housekeeping')).toBeDefined()
    expect(ctx.analytics.getStatus().retentionDays).toBe(30)
  })

  it('should keep two contexts apart', async () => {
    const first = await open('first', { fetcher })
    const second = await open('second', { fetcher })

    await first.search.ensureTitlesLoaded('anidb')
    first.search.searchTitles('anidb', 'trigun')
    const key = generateCacheKey('anime_details', { id: 1 })
    await first.cache.set(key, { id: 1 })

    expect(second.titles.hasTitles('anidb')).toBe(false)
    expect(second.transactions.getRecent()).toEqual([])
    expect(await second.cache.get(key)).toBeUndefined()
    expect(first.logs).not.toBe(second.logs)
  })

  it('should route component logs to the context aggregator', async () => {
    const ctx = await open('logs')

    ctx.logger('Example').warn('hello')

    expect(ctx.logs.getLogs().some((entry) => entry.namespace === 'Example' && entry.message === 'hello')).toBe(true)
  })

  it('should refuse to download without a titles URL', async () => {
    const ctx = await open('nourl')

    await expect(ctx.search.ensureTitlesLoaded('anidb')).rejects.toThrow(
      'Fetch failed: TITLECACHE_TITLES_URL is not set; cannot download the titles file'
    )
  })

  it('should start the schedulers on request and stop them on close', async () => {
    const ctx = await open('sched', { startSchedulers: true })
    await settle()

    expect(ctx.maintenance.isRunning()).toBe(true)
    expect(ctx.analytics.isRunning()).toBe(true)

    await closeAppContext(ctx)

    expect(ctx.maintenance.isRunning()).toBe(false)
    expect(ctx.analytics.isRunning()).toBe(false)
    expect(ctx.maintenance.getHistorySize()).toBeGreaterThan(0)
  })
})
