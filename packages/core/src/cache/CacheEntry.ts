/**
 * Durable cache entry structure
 * Typed record, its storage row, and the mapping between them
 */

import { createHash } from 'crypto'

/**
 * Entry stored in the durable (L2) tier
 */
export interface CacheEntry {
  /** Unique cache key, `method:hash` */
  key: string
  /** Method name the payload was produced by; selects the codec */
  methodName: string
  /** Serialized call parameters */
  parametersJson: string
  /** Raw upstream payload, if kept */
  rawPayload: string | null
  /** Serialized result payload */
  parsedDataJson: string
  /** Creation timestamp (ms) */
  createdAt: number
  /** Expiration timestamp (ms), always > createdAt */
  expiresAt: number
  accessCount: number
  /** Last access timestamp (ms) */
  lastAccessed: number
  /** UTF-8 size of payload plus raw payload */
  sizeBytes: number
}

/**
 * `persistent_cache` row
 */
export interface CacheEntryRow {
  cache_key: string
  method_name: string
  parameters_json: string
  raw_payload: string | null
  parsed_data_json: string
  created_at: number
  expires_at: number
  access_count: number
  last_accessed: number
  data_size: number
}

/**
 * Convert a `persistent_cache` row to a CacheEntry
 */
export function rowToCacheEntry(row: CacheEntryRow): CacheEntry {
  return {
    key: row.cache_key,
    methodName: row.method_name,
    parametersJson: row.parameters_json,
    rawPayload: row.raw_payload,
    parsedDataJson: row.parsed_data_json,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    accessCount: row.access_count,
    lastAccessed: row.last_accessed,
    sizeBytes: row.data_size,
  }
}

/**
 * Build a CacheEntry for a freshly fetched payload
 */
export function createCacheEntry(input: {
  key: string
  parametersJson?: string
  parsedDataJson: string
  rawPayload?: string | null
  ttlMs: number
  now?: number
}): CacheEntry {
  if (!isValidCacheKey(input.key)) {
    throw new Error('Invalid cache key: contains disallowed characters')
  }
  if (!(input.ttlMs > 0)) {
    throw new Error(`Cache TTL must be positive, got ${input.ttlMs}`)
  }

  const now = input.now ?? Date.now()
  const rawPayload = input.rawPayload ?? null
  return {
    key: input.key,
    methodName: methodFromKey(input.key),
    parametersJson: input.parametersJson ?? '{}',
    rawPayload,
    parsedDataJson: input.parsedDataJson,
    createdAt: now,
    // At least one millisecond so the row CHECK holds for sub-ms TTLs
    expiresAt: now + Math.max(1, Math.round(input.ttlMs)),
    accessCount: 1,
    lastAccessed: now,
    sizeBytes: utf8Size(input.parsedDataJson) + (rawPayload !== null ? utf8Size(rawPayload) : 0),
  }
}

/**
 * Check if cache entry is expired
 */
export function isExpired(entry: { expiresAt: number }, now: number = Date.now()): boolean {
  return now >= entry.expiresAt
}

/**
 * Validate cache key: non-empty, at most 1024 chars, no control characters
 */
export function isValidCacheKey(key: string): boolean {
  if (key.length === 0 || key.length > 1024) {
    return false
  }

  // eslint-disable-next-line no-control-regex
  if (/[\x00-\x1f\x7f]/.test(key)) {
    return false
  }

  return true
}

/**
 * Method name portion of a key (text before the first `:`)
 */
export function methodFromKey(key: string): string {
  const idx = key.indexOf(':')
  return idx === -1 ? key : key.slice(0, idx)
}

/**
 * JSON with object keys sorted at every depth
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val !== null && typeof val === 'object' && !Array.isArray(val)) {
      const sorted: Record<string, unknown> = {}
      for (const k of Object.keys(val).sort()) {
        sorted[k] = Reflect.get(val, k)
      }
      return sorted
    }
    return val
  })
}

/**
 * Generate a cache key: `method:` + first 16 hex chars of md5(sorted params JSON)
 *
 * @example
 * generateCacheKey('search_titles', { query: 'bebop', limit: 10 })
 * // 'search_titles:3f9c...' (16 hex chars)
 */
export function generateCacheKey(method: string, params: Record<string, unknown>): string {
  const digest = createHash('md5').update(stableStringify(params)).digest('hex').slice(0, 16)
  return `${method}:${digest}`
}

export function utf8Size(value: string): number {
  return Buffer.byteLength(value, 'utf8')
}
