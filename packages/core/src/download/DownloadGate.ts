/**
 * Download Gate
 *
 * Enforces a minimum interval between bulk titles downloads. The last
 * successful download time lives in the source's durable metadata, with a
 * plain-text log file as fallback. A download only advances that time once
 * the payload has been validated and moved into place.
 */

import { randomBytes } from 'crypto'
import { existsSync, readFileSync, statSync } from 'fs'
import { appendFile, mkdir, readFile, rename, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { z } from 'zod'
import {
  DownloadRateLimitedError,
  DownloadValidationError,
  getErrorMessage,
} from '../errors/index.js'
import type { TitleIndex } from '../titles/TitleIndex.js'
import { DEFAULT_MAX_DECOMPRESSED_BYTES, gunzipTitles, parseTitleLine } from '../titles/TitlesFile.js'
import {
  createAuditEvent,
  createLogger,
  createSecurityEvent,
  type Logger,
} from '../utils/logger.js'
import type {
  DownloadAttempt,
  DownloadAttemptStatus,
  DownloadDecision,
  DownloadResult,
  DownloadStatus,
  IntegrityReport,
  TitlesFetcher,
} from './types.js'

const HOUR_MS = 60 * 60 * 1000

export const GZIP_MAGIC = [0x1f, 0x8b] as const
export const ATTEMPT_KEY_PREFIX = 'download_attempt_'
export const FILE_LOG_NAME = 'download_log.txt'

/** Metadata keys written by the gate */
export const DOWNLOAD_METADATA_KEYS = {
  lastTimestamp: 'last_download_timestamp',
  lastSize: 'last_download_size',
  lastStatus: 'last_download_status',
  lastAttemptStatus: 'last_download_attempt_status',
  lastAttemptMessage: 'last_download_attempt_message',
} as const

const attemptSchema = z.object({
  status: z.enum(['started', 'success', 'failed', 'blocked', 'protection_reset']),
  message: z.string(),
  timestamp: z.string(),
})

export interface DownloadGateOptions {
  titles: TitleIndex
  source: string
  dataDir: string
  fetcher: TitlesFetcher
  /** Output file name (default: titles.dat.gz) */
  fileName?: string
  protectionHours?: number
  minFileSize?: number
  maxFileSize?: number
  /** Upper bound on the inflated payload (default: 500000000) */
  maxDecompressedSize?: number
  /** Age after which the local file counts as stale (default: 24h) */
  staleAfterHours?: number
  logger?: Logger
  now?: () => number
}

function parseJson(value: string | null): unknown {
  if (value === null) return undefined
  try {
    return JSON.parse(value)
  } catch {
    return undefined
  }
}

function formatHours(hours: number): string {
  return hours.toFixed(1)
}

function attemptStamp(date: Date): string {
  // 2026-10-19T08:30:05.123Z -> 20261019_083005_123
  const iso = date.toISOString()
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}_${iso.slice(20, 23)}`
}

/**
 * Protection-window gate for the bulk titles download
 */
export class DownloadGate {
  readonly source: string
  readonly filePath: string
  readonly protectionHours: number
  readonly maxDecompressedSize: number
  private readonly titles: TitleIndex
  private readonly dataDir: string
  private readonly fetcher: TitlesFetcher
  private readonly minFileSize: number
  private readonly maxFileSize: number
  private readonly staleAfterHours: number
  private readonly log: Logger
  private readonly now: () => number
  private readonly fileLogPath: string
  private sourceReady = false
  private attemptSeq = 0
  private downloadLock: Promise<void> = Promise.resolve()

  constructor(options: DownloadGateOptions) {
    this.titles = options.titles
    this.source = options.source
    this.dataDir = options.dataDir
    this.fetcher = options.fetcher
    this.filePath = join(options.dataDir, options.fileName ?? 'titles.dat.gz')
    this.fileLogPath = join(options.dataDir, FILE_LOG_NAME)
    this.protectionHours = options.protectionHours ?? 36
    this.minFileSize = options.minFileSize ?? 100000
    this.maxFileSize = options.maxFileSize ?? 50000000
    this.maxDecompressedSize = options.maxDecompressedSize ?? DEFAULT_MAX_DECOMPRESSED_BYTES
    this.staleAfterHours = options.staleAfterHours ?? 24
    this.log = options.logger ?? createLogger('DownloadGate')
    this.now = options.now ?? (() => Date.now())
  }

  private ensureSource(): void {
    if (!this.sourceReady) {
      this.titles.initializeSource(this.source)
      this.sourceReady = true
    }
  }

  // ==================== Gate ====================

  /**
   * Evaluate the protection window.
   * Blocked iff now - last successful download < protectionHours.
   */
  canDownload(): DownloadDecision {
    const last = this.lastDownloadTime()
    if (!last) {
      return { allowed: true, basis: 'none' }
    }

    const now = this.now()
    const elapsedMs = now - last.at.getTime()
    const protectionMs = this.protectionHours * HOUR_MS
    const hoursSinceLast = elapsedMs / HOUR_MS

    if (elapsedMs >= protectionMs) {
      return { allowed: true, lastDownloadAt: last.at, hoursSinceLast, basis: last.basis }
    }

    const nextAllowedAt = new Date(last.at.getTime() + protectionMs)
    const hoursRemaining = (protectionMs - elapsedMs) / HOUR_MS
    const reason =
      `Download rate limited. Last download was ${formatHours(hoursSinceLast)} hours ago. ` +
      `Must wait ${this.protectionHours} hours between downloads. ` +
      `Next download allowed at ${nextAllowedAt.toISOString()} (${formatHours(hoursRemaining)} hours remaining).`

    return {
      allowed: false,
      reason,
      lastDownloadAt: last.at,
      nextAllowedAt,
      hoursSinceLast,
      hoursRemaining,
      basis: last.basis,
    }
  }

  private lastDownloadTime(): { at: Date; basis: 'metadata' | 'file_log' } | null {
    this.ensureSource()
    const stored = this.titles.getMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastTimestamp)
    if (stored !== null) {
      const parsed = Date.parse(stored)
      if (!Number.isNaN(parsed)) {
        return { at: new Date(parsed), basis: 'metadata' }
      }
      this.log.warn('Ignoring unparsable last download timestamp', { value: stored })
    }

    const fromLog = this.readFileLog()
    return fromLog ? { at: fromLog, basis: 'file_log' } : null
  }

  private readFileLog(): Date | null {
    if (!existsSync(this.fileLogPath)) {
      return null
    }
    try {
      const lines = readFileSync(this.fileLogPath, 'utf8')
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
      for (let i = lines.length - 1; i >= 0; i--) {
        const parsed = Date.parse(lines[i] ?? '')
        if (!Number.isNaN(parsed)) {
          return new Date(parsed)
        }
      }
    } catch (error) {
      this.log.warn('Could not read download log', { reason: getErrorMessage(error) })
    }
    return null
  }

  // ==================== Download ====================

  /**
   * Fetch, validate and install the titles file.
   *
   * Calls are serialized: a download that overlaps a running one waits for
   * it, then sees the window that download opened.
   *
   * @throws DownloadRateLimitedError when blocked and not forced
   * @throws DownloadValidationError when the payload is rejected
   */
  download(options: { force?: boolean } = {}): Promise<DownloadResult> {
    return this.withDownloadLock(() => this.runDownload(options.force ?? false))
  }

  private async withDownloadLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.downloadLock
    let release: () => void = () => {}
    this.downloadLock = new Promise<void>((resolve) => {
      release = resolve
    })

    await previous
    try {
      return await fn()
    } finally {
      release()
    }
  }

  private async runDownload(force: boolean): Promise<DownloadResult> {
    if (force) {
      this.log.securityLog(
        createSecurityEvent(
          'rate_limit.bypassed',
          'high',
          this.filePath,
          'download',
          'Emergency override: download protection bypassed',
          { source: this.source, protectionHours: this.protectionHours }
        )
      )
    } else {
      const decision = this.canDownload()
      if (!decision.allowed) {
        const reason = decision.reason ?? 'Download rate limited'
        this.recordAttempt('blocked', reason)
        this.log.securityLog(
          createSecurityEvent('rate_limit.exceeded', 'medium', this.filePath, 'download', reason)
        )
        throw new DownloadRateLimitedError(reason, {
          lastDownloadAt: decision.lastDownloadAt ?? new Date(this.now()),
          nextAllowedAt: decision.nextAllowedAt ?? new Date(this.now()),
          hoursRemaining: decision.hoursRemaining ?? 0,
          protectionHours: this.protectionHours,
        })
      }
    }

    this.recordAttempt('started', force ? 'Forced download started' : 'Download started')
    const tmpPath = `${this.filePath}.${randomBytes(6).toString('hex')}.tmp`

    let installed: { sizeBytes: number; decompressedBytes: number }
    try {
      installed = await this.fetchAndInstall(tmpPath)
    } catch (error) {
      await rm(tmpPath, { force: true })
      this.recordAttempt('failed', getErrorMessage(error))
      this.log.error('Titles download failed', error instanceof Error ? error : undefined, {
        source: this.source,
      })
      throw error
    }
    const { sizeBytes, decompressedBytes } = installed

    // The file is in place: the protection window restarts now
    const downloadedAt = new Date(this.now())
    await this.commitDownload(downloadedAt, sizeBytes)

    this.recordAttempt('success', `Downloaded ${sizeBytes} bytes`)
    this.log.info('Titles file downloaded', {
      source: this.source,
      sizeBytes,
      decompressedBytes,
      forced: force,
    })

    return {
      path: this.filePath,
      sizeBytes,
      decompressedBytes,
      forced: force,
      downloadedAt,
    }
  }

  /**
   * Record the download time in the file log and in metadata. Either one
   * alone keeps the window closed, so a failure of one is logged, not thrown.
   */
  private async commitDownload(downloadedAt: Date, sizeBytes: number): Promise<void> {
    const stamp = downloadedAt.toISOString()
    let fileLogWritten = false

    try {
      await appendFile(this.fileLogPath, `${stamp}\n`)
      fileLogWritten = true
    } catch (error) {
      this.log.warn('Could not append to download log', { reason: getErrorMessage(error) })
    }

    try {
      this.titles.setMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastTimestamp, stamp)
      this.titles.setMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastSize, String(sizeBytes))
      this.titles.setMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastStatus, 'success')
    } catch (error) {
      this.log.error('Could not record download metadata', error instanceof Error ? error : undefined, {
        source: this.source,
        fileLogWritten,
      })
    }
  }

  private async fetchAndInstall(
    tmpPath: string
  ): Promise<{ sizeBytes: number; decompressedBytes: number }> {
    let bytes: Buffer
    try {
      bytes = Buffer.from(await this.fetcher.fetch())
    } catch (error) {
      throw new DownloadValidationError(`Fetch failed: ${getErrorMessage(error)}`, {
        step: 'fetch',
        cause: error,
      })
    }

    const decompressedBytes = this.validatePayload(bytes)

    try {
      await mkdir(this.dataDir, { recursive: true })
      await writeFile(tmpPath, bytes)
      await rename(tmpPath, this.filePath)
    } catch (error) {
      throw new DownloadValidationError(`Could not install titles file: ${getErrorMessage(error)}`, {
        step: 'write',
        cause: error,
      })
    }

    return { sizeBytes: bytes.length, decompressedBytes }
  }

  /**
   * Check magic bytes, full decompression and size bounds
   * @returns Decompressed size in bytes
   */
  validatePayload(bytes: Buffer): number {
    if (bytes.length < 2 || bytes[0] !== GZIP_MAGIC[0] || bytes[1] !== GZIP_MAGIC[1]) {
      throw new DownloadValidationError('Payload is not gzip data (bad magic bytes)', {
        step: 'magic',
        context: { sizeBytes: bytes.length },
      })
    }

    const decompressed = gunzipTitles(bytes, this.maxDecompressedSize)

    if (bytes.length < this.minFileSize) {
      throw new DownloadValidationError(
        `Payload too small: ${bytes.length} bytes (minimum ${this.minFileSize})`,
        { step: 'size', context: { sizeBytes: bytes.length, minFileSize: this.minFileSize } }
      )
    }
    if (bytes.length > this.maxFileSize) {
      throw new DownloadValidationError(
        `Payload too large: ${bytes.length} bytes (maximum ${this.maxFileSize})`,
        { step: 'size', context: { sizeBytes: bytes.length, maxFileSize: this.maxFileSize } }
      )
    }

    return decompressed.length
  }

  // ==================== Attempts & Status ====================

  private recordAttempt(status: DownloadAttemptStatus, message: string): void {
    const timestamp = new Date(this.now())
    this.attemptSeq++
    const key = `${ATTEMPT_KEY_PREFIX}${attemptStamp(timestamp)}_${String(this.attemptSeq).padStart(4, '0')}`
    const value = JSON.stringify({ status, message, timestamp: timestamp.toISOString() })

    try {
      this.ensureSource()
      this.titles.setMetadata(this.source, key, value)
      this.titles.setMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastAttemptStatus, status)
      this.titles.setMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastAttemptMessage, message)
    } catch (error) {
      // Attempt bookkeeping never changes the download outcome
      this.log.warn('Could not record download attempt', { status, reason: getErrorMessage(error) })
    }

    this.log.auditLog(
      createAuditEvent(
        status === 'protection_reset' ? 'download.protection_reset' : 'download.attempt',
        'DownloadGate',
        this.filePath,
        status,
        status === 'failed' ? 'error' : status === 'blocked' ? 'blocked' : 'success',
        { source: this.source, message }
      )
    )
  }

  /**
   * Recorded attempts, newest first
   */
  getHistory(limit = 10): DownloadAttempt[] {
    this.ensureSource()
    const attempts: DownloadAttempt[] = []
    for (const entry of this.titles.listMetadata(this.source, ATTEMPT_KEY_PREFIX, limit)) {
      const parsed = attemptSchema.safeParse(parseJson(entry.value))
      if (parsed.success) {
        attempts.push({ key: entry.key, ...parsed.data })
      } else {
        this.log.warn('Skipping unreadable download attempt', { key: entry.key })
      }
    }
    return attempts
  }

  /**
   * Delete all but the newest `keep` attempt records
   */
  cleanupOldAttempts(keep = 50): number {
    this.ensureSource()
    const entries = this.titles.listMetadata(this.source, ATTEMPT_KEY_PREFIX)
    let removed = 0
    for (const entry of entries.slice(keep)) {
      if (this.titles.deleteMetadata(this.source, entry.key)) {
        removed++
      }
    }
    return removed
  }

  /**
   * Clear the protection window. The next download is allowed immediately.
   */
  async resetProtection(): Promise<void> {
    this.ensureSource()
    this.titles.deleteMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastTimestamp)
    if (existsSync(this.fileLogPath)) {
      await writeFile(this.fileLogPath, '')
    }
    this.recordAttempt('protection_reset', 'Download protection reset')
    this.log.warn('Download protection reset', { source: this.source })
  }

  /**
   * File missing, older than the stale threshold, or implausibly small
   */
  needsDownload(): boolean {
    if (!existsSync(this.filePath)) {
      return true
    }
    const stats = statSync(this.filePath)
    const ageHours = (this.now() - stats.mtimeMs) / HOUR_MS
    return ageHours > this.staleAfterHours || stats.size < 1000
  }

  /**
   * The installed file must decompress and its first 1000 lines must hold
   * more than 100 well-formed records.
   */
  async verifyFileIntegrity(): Promise<IntegrityReport> {
    if (!existsSync(this.filePath)) {
      return { valid: false, checkedLines: 0, validLines: 0, reason: 'file missing' }
    }

    let text: string
    try {
      text = gunzipTitles(await readFile(this.filePath), this.maxDecompressedSize).toString('utf8')
    } catch (error) {
      return {
        valid: false,
        checkedLines: 0,
        validLines: 0,
        reason: `not valid gzip: ${getErrorMessage(error)}`,
      }
    }

    let checkedLines = 0
    let validLines = 0
    for (const raw of text.split(/\r?\n/)) {
      if (checkedLines >= 1000) break
      const line = raw.trim()
      if (line.length === 0 || line.startsWith('#')) continue
      checkedLines++
      if (!('error' in parseTitleLine(line))) {
        validLines++
      }
    }

    const valid = validLines > 100
    return valid
      ? { valid, checkedLines, validLines }
      : { valid, checkedLines, validLines, reason: `only ${validLines} valid lines` }
  }

  getStatus(): DownloadStatus {
    this.ensureSource()
    const fileExists = existsSync(this.filePath)
    const stats = fileExists ? statSync(this.filePath) : null
    const lastSize = this.titles.getMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastSize)

    return {
      source: this.source,
      filePath: this.filePath,
      fileExists,
      fileSizeBytes: stats?.size ?? 0,
      fileAgeHours: stats ? (this.now() - stats.mtimeMs) / HOUR_MS : null,
      protectionHours: this.protectionHours,
      decision: this.canDownload(),
      needsDownload: this.needsDownload(),
      lastDownloadSize: lastSize !== null ? Number(lastSize) : null,
      lastDownloadStatus: this.titles.getMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastStatus),
      lastAttemptStatus: this.titles.getMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastAttemptStatus),
      lastAttemptMessage: this.titles.getMetadata(this.source, DOWNLOAD_METADATA_KEYS.lastAttemptMessage),
    }
  }
}
