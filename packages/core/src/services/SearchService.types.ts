/**
 * SearchService Types
 */

import type { z } from 'zod'
import type { TitleMatch } from '../titles/types.js'

/**
 * Upstream lookup for one entry's details
 *
 * `schema` re-validates values that come back out of the cache.
 */
export interface DetailsProvider<T> {
  /** Cache method name, e.g. `anime_details` */
  readonly method: string
  readonly schema: z.ZodType<T>
  fetchDetails(source: string, externalId: number): Promise<{ data: T | null; raw?: string }>
}

export interface SearchTitlesOptions {
  limit?: number
  clientId?: string
}

export interface TitleSearchResult {
  source: string
  query: string
  matches: TitleMatch[]
  responseTimeMs: number
}

export interface DetailsResult<T> {
  source: string
  externalId: number
  data: T | null
  cached: boolean
  responseTimeMs: number
}

export type TitlesLoadAction = 'already_loaded' | 'loaded' | 'unavailable'

export interface TitlesLoadReport {
  source: string
  action: TitlesLoadAction
  downloaded: boolean
  titlesLoaded: number
  malformedLines: number
  reason?: string
}
