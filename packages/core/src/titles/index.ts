export { TitleIndex, MIN_QUERY_LENGTH } from './TitleIndex.js'
export { normalizeTitle, rowToTitleMatch, rowToMetadataEntry } from './TitleIndex.helpers.js'
export type { TitleRow, MetadataRow, CountRow } from './TitleIndex.types.js'
export {
  parseTitles,
  parseTitleLine,
  readTitlesFile,
  gunzipTitles,
  DEFAULT_MAX_DECOMPRESSED_BYTES,
  type ParsedTitles,
  type MalformedLine,
} from './TitlesFile.js'
export type { TitleRecord, TitleMatch, MatchType, MetadataEntry, SourceStats } from './types.js'
