/**
 * Title index domain types
 */

/**
 * One title line from the bulk titles file
 */
export interface TitleRecord {
  externalId: number
  /** Upstream title type code (1 = primary, 2 = synonym, 3 = short, 4 = official) */
  titleType: number
  language: string
  title: string
}

/**
 * Which search tier produced a match
 */
export type MatchType = 'exact' | 'prefix' | 'substring'

/**
 * A ranked search result
 */
export interface TitleMatch extends TitleRecord {
  matchType: MatchType
}

/**
 * Per-source key/value metadata
 */
export interface MetadataEntry {
  key: string
  value: string | null
  updatedAt: string
}

/**
 * Title counts for one source
 */
export interface SourceStats {
  source: string
  initialized: boolean
  totalTitles: number
  uniqueIds: number
  lastUpdate: string | null
}
