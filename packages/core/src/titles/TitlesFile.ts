/**
 * Bulk titles file parsing
 *
 * Format: gzip-compressed text, one `external_id|title_type|language|title`
 * record per line. `#` lines are comments. Malformed lines are skipped.
 */

import { readFile } from 'fs/promises'
import { gunzipSync } from 'zlib'
import { DownloadValidationError, getErrorMessage } from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'
import type { TitleRecord } from './types.js'

/** Malformed lines kept in the parse result for diagnostics */
const MALFORMED_SAMPLE_SIZE = 20

/** Default bound on the inflated size of a titles file */
export const DEFAULT_MAX_DECOMPRESSED_BYTES = 500_000_000

export interface MalformedLine {
  lineNumber: number
  content: string
  reason: string
}

export interface ParsedTitles {
  records: TitleRecord[]
  totalLines: number
  commentLines: number
  malformedCount: number
  /** First few malformed lines */
  malformed: MalformedLine[]
}

/**
 * Parse a single line; returns the failure reason on mismatch
 */
export function parseTitleLine(line: string): TitleRecord | { error: string } {
  const first = line.indexOf('|')
  const second = first === -1 ? -1 : line.indexOf('|', first + 1)
  const third = second === -1 ? -1 : line.indexOf('|', second + 1)
  if (third === -1) {
    return { error: 'expected 4 pipe-delimited fields' }
  }

  const idText = line.slice(0, first).trim()
  const typeText = line.slice(first + 1, second).trim()
  const language = line.slice(second + 1, third).trim()
  // The title keeps any further pipes
  const title = line.slice(third + 1).trim()

  if (!/^\d+$/.test(idText)) {
    return { error: `invalid external id '${idText}'` }
  }
  if (!/^\d+$/.test(typeText)) {
    return { error: `invalid title type '${typeText}'` }
  }
  if (language.length === 0) {
    return { error: 'empty language' }
  }
  if (title.length === 0) {
    return { error: 'empty title' }
  }

  return {
    externalId: parseInt(idText, 10),
    titleType: parseInt(typeText, 10),
    language,
    title,
  }
}

/**
 * Parse decompressed titles text
 */
export function parseTitles(text: string, logger: Logger = createLogger('TitlesFile')): ParsedTitles {
  const result: ParsedTitles = {
    records: [],
    totalLines: 0,
    commentLines: 0,
    malformedCount: 0,
    malformed: [],
  }

  const lines = text.split(/\r?\n/)
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim() ?? ''
    if (line.length === 0) continue
    result.totalLines++

    if (line.startsWith('#')) {
      result.commentLines++
      continue
    }

    const parsed = parseTitleLine(line)
    if ('error' in parsed) {
      result.malformedCount++
      if (result.malformed.length < MALFORMED_SAMPLE_SIZE) {
        result.malformed.push({ lineNumber: i + 1, content: line.slice(0, 200), reason: parsed.error })
      }
      continue
    }
    result.records.push(parsed)
  }

  if (result.malformedCount > 0) {
    logger.warn('Skipped malformed title lines', {
      malformed: result.malformedCount,
      firstLine: result.malformed[0]?.lineNumber,
    })
  }

  return result
}

/**
 * Inflate gzip data, refusing to grow past `maxBytes`
 *
 * @throws DownloadValidationError (step `decompress`)
 */
export function gunzipTitles(compressed: Buffer, maxBytes = DEFAULT_MAX_DECOMPRESSED_BYTES): Buffer {
  try {
    return gunzipSync(compressed, { maxOutputLength: maxBytes })
  } catch (error) {
    const tooLarge = error instanceof RangeError
    throw new DownloadValidationError(
      tooLarge
        ? `Payload inflates past ${maxBytes} bytes`
        : `Payload does not decompress: ${getErrorMessage(error)}`,
      { step: 'decompress', cause: error, context: { maxDecompressedBytes: maxBytes } }
    )
  }
}

/**
 * Read, decompress and parse a gzip titles file
 */
export async function readTitlesFile(
  path: string,
  logger?: Logger,
  maxDecompressedBytes = DEFAULT_MAX_DECOMPRESSED_BYTES
): Promise<ParsedTitles> {
  const compressed = await readFile(path)
  return parseTitles(gunzipTitles(compressed, maxDecompressedBytes).toString('utf8'), logger)
}
