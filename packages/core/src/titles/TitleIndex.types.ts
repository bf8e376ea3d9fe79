/**
 * TitleIndex row types
 *
 * Raw row shapes as returned by better-sqlite3.
 */

export interface TitleRow {
  external_id: number
  title_type: number
  language: string
  title: string
}

export interface MetadataRow {
  key: string
  value: string | null
  updated_at: string
}

export interface CountRow {
  count: number
}
