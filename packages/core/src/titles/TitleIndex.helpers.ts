/**
 * TitleIndex Helpers
 *
 * Functions for transforming database rows to domain objects.
 */

import type { MatchType, MetadataEntry, TitleMatch } from './types.js'
import type { MetadataRow, TitleRow } from './TitleIndex.types.js'

/**
 * Convert a title row to a TitleMatch
 */
export function rowToTitleMatch(row: TitleRow, matchType: MatchType): TitleMatch {
  return {
    externalId: row.external_id,
    titleType: row.title_type,
    language: row.language,
    title: row.title,
    matchType,
  }
}

/**
 * Convert a metadata row to a MetadataEntry
 */
export function rowToMetadataEntry(row: MetadataRow): MetadataEntry {
  return {
    key: row.key,
    value: row.value,
    updatedAt: row.updated_at,
  }
}

/**
 * Normalized form used for every comparison
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase()
}
