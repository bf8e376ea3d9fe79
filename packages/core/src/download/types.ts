/**
 * Download gate types
 */

export type DownloadAttemptStatus = 'started' | 'success' | 'failed' | 'blocked' | 'protection_reset'

/**
 * One audit entry for a download attempt
 */
export interface DownloadAttempt {
  /** Metadata key, sortable by time */
  key: string
  status: DownloadAttemptStatus
  message: string
  timestamp: string
}

/**
 * Result of evaluating the protection window
 */
export interface DownloadDecision {
  allowed: boolean
  /** Human-readable explanation when blocked */
  reason?: string
  lastDownloadAt?: Date
  nextAllowedAt?: Date
  hoursSinceLast?: number
  hoursRemaining?: number
  /** Where the last download time came from */
  basis: 'metadata' | 'file_log' | 'none'
}

export interface DownloadResult {
  path: string
  sizeBytes: number
  decompressedBytes: number
  forced: boolean
  downloadedAt: Date
}

export interface DownloadStatus {
  source: string
  filePath: string
  fileExists: boolean
  fileSizeBytes: number
  fileAgeHours: number | null
  protectionHours: number
  decision: DownloadDecision
  needsDownload: boolean
  lastDownloadSize: number | null
  lastDownloadStatus: string | null
  lastAttemptStatus: string | null
  lastAttemptMessage: string | null
}

export interface IntegrityReport {
  valid: boolean
  checkedLines: number
  validLines: number
  reason?: string
}

/**
 * Supplies the raw bytes of the bulk titles file
 */
export interface TitlesFetcher {
  fetch(): Promise<Uint8Array>
}
