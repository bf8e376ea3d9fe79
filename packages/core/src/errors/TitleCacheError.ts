/**
 * titlecache error classes
 *
 * Custom error classes with cause chaining so stack traces and context survive
 * the storage, download and cache layers.
 */

/**
 * Base error class for all titlecache errors.
 */
export class TitleCacheError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    options?: {
      code?: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'TitleCacheError'
    this.code = options?.code ?? 'TITLECACHE_ERROR'
    this.context = options?.context

    Error.captureStackTrace?.(this, this.constructor)
  }

  /**
   * Get the full error chain as an array
   */
  getErrorChain(): Error[] {
    const chain: Error[] = [this]
    let current: unknown = this.cause

    while (current instanceof Error) {
      chain.push(current)
      current = current.cause
    }

    return chain
  }

  /**
   * Format error with full context for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }
}

/**
 * Generic durable-store failure (I/O, locking, constraint errors)
 */
export class StorageError extends TitleCacheError {
  /** Operation that was running when the store failed */
  readonly operation?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      operation?: string
      code?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: options?.code ?? 'STORAGE_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        operation: options?.operation,
      },
    })
    this.name = 'StorageError'
    this.operation = options?.operation
  }
}

/**
 * A table the operation needs has not been created yet
 */
export class NotInitializedError extends StorageError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      operation?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, { ...options, code: 'DB_NOT_INITIALIZED' })
    this.name = 'NotInitializedError'
  }
}

/**
 * The database file is damaged or is not a database
 */
export class CorruptionError extends StorageError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      operation?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, { ...options, code: 'DB_CORRUPTION' })
    this.name = 'CorruptionError'
  }
}

/**
 * Bulk download attempted inside the protection window
 */
export class DownloadRateLimitedError extends TitleCacheError {
  readonly lastDownloadAt: Date
  readonly nextAllowedAt: Date
  readonly hoursRemaining: number
  readonly protectionHours: number

  constructor(
    message: string,
    details: {
      lastDownloadAt: Date
      nextAllowedAt: Date
      hoursRemaining: number
      protectionHours: number
    }
  ) {
    super(message, {
      code: 'DOWNLOAD_RATE_LIMITED',
      context: {
        lastDownloadAt: details.lastDownloadAt.toISOString(),
        nextAllowedAt: details.nextAllowedAt.toISOString(),
        hoursRemaining: details.hoursRemaining,
        protectionHours: details.protectionHours,
      },
    })
    this.name = 'DownloadRateLimitedError'
    this.lastDownloadAt = details.lastDownloadAt
    this.nextAllowedAt = details.nextAllowedAt
    this.hoursRemaining = details.hoursRemaining
    this.protectionHours = details.protectionHours
  }
}

/**
 * Downloaded payload rejected before it was moved into place
 */
export class DownloadValidationError extends TitleCacheError {
  /** Validation step that failed */
  readonly step: 'fetch' | 'magic' | 'decompress' | 'size' | 'write'

  constructor(
    message: string,
    options: {
      step: 'fetch' | 'magic' | 'decompress' | 'size' | 'write'
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'DOWNLOAD_VALIDATION_FAILED',
      cause: options.cause,
      context: { ...options.context, step: options.step },
    })
    this.name = 'DownloadValidationError'
    this.step = options.step
  }
}

/**
 * Writing a search transaction failed
 */
export class TransactionLoggingError extends TitleCacheError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'TRANSACTION_LOGGING_FAILED',
      cause: options?.cause,
      context: options?.context,
    })
    this.name = 'TransactionLoggingError'
  }
}

/**
 * A source or storage-object name did not match any permitted shape
 */
export class IdentifierValidationError extends TitleCacheError {
  /** The rejected identifier */
  readonly identifier: string

  constructor(
    message: string,
    options: {
      identifier: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'IDENTIFIER_VALIDATION_FAILED',
      context: { ...options.context, identifier: options.identifier },
    })
    this.name = 'IdentifierValidationError'
    this.identifier = options.identifier
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends TitleCacheError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      cause: options?.cause,
      context: options?.context,
    })
    this.name = 'ConfigurationError'
  }
}

/**
 * Wrap an unknown error in a TitleCacheError if not already one
 */
export function wrapError(
  error: unknown,
  message: string,
  options?: {
    code?: string
    context?: Record<string, unknown>
  }
): TitleCacheError {
  if (error instanceof TitleCacheError) {
    return error
  }

  return new TitleCacheError(message, {
    code: options?.code,
    cause: error,
    context: options?.context,
  })
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

/**
 * Check if error is a titlecache error
 */
export function isTitleCacheError(error: unknown): error is TitleCacheError {
  return error instanceof TitleCacheError
}

const CORRUPTION_CODES = new Set(['SQLITE_CORRUPT', 'SQLITE_NOTADB'])

/**
 * Map a driver error to the storage taxonomy.
 *
 * better-sqlite3 raises `SqliteError` with a `code` such as `SQLITE_CORRUPT`.
 */
export function toStorageError(error: unknown, operation: string): StorageError {
  if (error instanceof StorageError) {
    return error
  }

  const message = getErrorMessage(error)
  const code =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined

  if (code !== undefined && CORRUPTION_CODES.has(code)) {
    return new CorruptionError(`Durable store is corrupted: ${message}`, {
      cause: error,
      operation,
    })
  }

  if (message.includes('no such table')) {
    return new NotInitializedError(`Durable store not initialized: ${message}`, {
      cause: error,
      operation,
    })
  }

  return new StorageError(`Storage operation '${operation}' failed: ${message}`, {
    cause: error,
    operation,
  })
}
