/**
 * HTTP fetcher for the bulk titles file
 */

import { DownloadValidationError } from '../errors/index.js'
import type { TitlesFetcher } from './types.js'

export const DEFAULT_USER_AGENT = 'titlecache/1.0'

export interface HttpTitlesFetcherOptions {
  url: string
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number
  userAgent?: string
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch
}

export class HttpTitlesFetcher implements TitlesFetcher {
  private readonly url: string
  private readonly timeoutMs: number
  private readonly userAgent: string
  private readonly fetchImpl: typeof fetch

  constructor(options: HttpTitlesFetcherOptions) {
    this.url = options.url
    this.timeoutMs = options.timeoutMs ?? 30000
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
  }

  async fetch(): Promise<Uint8Array> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await this.fetchImpl(this.url, {
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal,
      })

      if (!response.ok) {
        throw new DownloadValidationError(`HTTP ${response.status} from titles source`, {
          step: 'fetch',
          context: { url: this.url, status: response.status },
        })
      }

      return new Uint8Array(await response.arrayBuffer())
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
