/**
 * SearchService - title search and details lookups
 *
 * Features:
 * - Titles bootstrap (download when allowed, then bulk load)
 * - Tiered title search with transaction logging
 * - Cache-through details lookups
 */

import { existsSync } from 'fs'
import { performance } from 'perf_hooks'
import type { TransactionLog } from '../analytics/TransactionLog.js'
import { generateCacheKey } from '../cache/CacheEntry.js'
import type { TieredCache } from '../cache/TieredCache.js'
import type { DownloadGate } from '../download/DownloadGate.js'
import { DownloadRateLimitedError, DownloadValidationError } from '../errors/index.js'
import type { TitleIndex } from '../titles/TitleIndex.js'
import { readTitlesFile } from '../titles/TitlesFile.js'
import { createLogger, type Logger } from '../utils/logger.js'
import type {
  DetailsProvider,
  DetailsResult,
  SearchTitlesOptions,
  TitleSearchResult,
  TitlesLoadReport,
} from './SearchService.types.js'

export interface SearchServiceOptions {
  titles: TitleIndex
  cache: TieredCache
  transactions: TransactionLog
  /** One gate per source that has a bulk titles file */
  gates?: DownloadGate[]
  logger?: Logger
}

function elapsed(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100
}

export class SearchService {
  private readonly titles: TitleIndex
  private readonly cache: TieredCache
  private readonly transactions: TransactionLog
  private readonly gates: Map<string, DownloadGate>
  private readonly log: Logger

  constructor(options: SearchServiceOptions) {
    this.titles = options.titles
    this.cache = options.cache
    this.transactions = options.transactions
    this.gates = new Map((options.gates ?? []).map((gate) => [gate.source.toLowerCase(), gate]))
    this.log = options.logger ?? createLogger('SearchService')
  }

  // ==================== Titles Bootstrap ====================

  /**
   * Make sure the source has titles, downloading and loading the bulk file
   * when needed. A stale file is still loaded when a fresh download is
   * blocked or rejected.
   */
  async ensureTitlesLoaded(source: string): Promise<TitlesLoadReport> {
    if (this.titles.hasTitles(source)) {
      return {
        source,
        action: 'already_loaded',
        downloaded: false,
        titlesLoaded: this.titles.countTitles(source),
        malformedLines: 0,
      }
    }

    const gate = this.gates.get(source.toLowerCase())
    if (!gate) {
      return this.unavailable(source, false, 'No titles download configured for source')
    }

    let downloaded = false
    if (gate.needsDownload()) {
      const decision = gate.canDownload()
      if (decision.allowed) {
        try {
          await gate.download()
          downloaded = true
        } catch (error) {
          // A concurrent bootstrap may have installed the file while this one waited
          const recoverable =
            error instanceof DownloadValidationError || error instanceof DownloadRateLimitedError
          if (!recoverable || !existsSync(gate.filePath)) {
            throw error
          }
          this.log.warn('Download rejected, loading existing titles file', {
            source,
            reason: error.message,
          })
        }
      } else if (!existsSync(gate.filePath)) {
        return this.unavailable(source, false, decision.reason ?? 'Download rate limited')
      }
    }

    return this.loadTitlesFile(source, downloaded)
  }

  /**
   * Replace the source's titles with the contents of its downloaded file
   */
  async loadTitlesFile(source: string, downloaded = false): Promise<TitlesLoadReport> {
    const gate = this.gates.get(source.toLowerCase())
    if (!gate) {
      return this.unavailable(source, downloaded, 'No titles download configured for source')
    }
    if (!existsSync(gate.filePath)) {
      return this.unavailable(source, downloaded, 'Titles file missing')
    }

    const parsed = await readTitlesFile(gate.filePath, this.log, gate.maxDecompressedSize)
    const inserted = this.titles.bulkReplace(source, parsed.records)
    this.log.info('Titles loaded', { source, inserted, malformed: parsed.malformedCount })

    return {
      source,
      action: 'loaded',
      downloaded,
      titlesLoaded: inserted,
      malformedLines: parsed.malformedCount,
    }
  }

  private unavailable(source: string, downloaded: boolean, reason: string): TitlesLoadReport {
    this.log.warn('Titles unavailable', { source, reason })
    return { source, action: 'unavailable', downloaded, titlesLoaded: 0, malformedLines: 0, reason }
  }

  // ==================== Search ====================

  /**
   * Tiered title search. The search is logged; logging never fails it.
   */
  searchTitles(source: string, query: string, options: SearchTitlesOptions = {}): TitleSearchResult {
    const start = performance.now()
    const matches = this.titles.search(source, query, options.limit ?? 10)
    const responseTimeMs = elapsed(start)

    this.transactions.logSearch({
      source,
      query,
      resultCount: matches.length,
      responseTimeMs,
      clientId: options.clientId,
    })

    return { source, query, matches, responseTimeMs }
  }

  // ==================== Details ====================

  /**
   * Cached details lookup. Only found entries are cached.
   */
  async getDetails<T>(
    source: string,
    externalId: number,
    provider: DetailsProvider<T>,
    options: { clientId?: string } = {}
  ): Promise<DetailsResult<T>> {
    const start = performance.now()
    const params = { source, externalId }
    const key = generateCacheKey(provider.method, params)

    let data: T | null = null
    let cached = false

    const hit = await this.cache.get(key)
    if (hit !== undefined) {
      const parsed = provider.schema.safeParse(hit)
      if (parsed.success) {
        data = parsed.data
        cached = true
      } else {
        this.log.warn('Cached details failed validation, refetching', { key })
        await this.cache.delete(key)
      }
    }

    if (!cached) {
      const fetched = await provider.fetchDetails(source, externalId)
      data = fetched.data
      if (data !== null) {
        await this.cache.set(key, data, fetched.raw ?? null, params)
      }
    }

    const responseTimeMs = elapsed(start)
    this.transactions.logDetails({
      source,
      externalId,
      responseTimeMs,
      found: data !== null,
      clientId: options.clientId,
    })

    return { source, externalId, data, cached, responseTimeMs }
  }
}
