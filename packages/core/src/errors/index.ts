/**
 * Error Classes Module
 *
 * @example
 * ```typescript
 * import { StorageError, toStorageError, getErrorMessage } from '@titlecache/core'
 *
 * try {
 *   db.prepare('SELECT 1').get()
 * } catch (error) {
 *   throw toStorageError(error, 'ping')
 * }
 * ```
 */

export {
  TitleCacheError,
  StorageError,
  NotInitializedError,
  CorruptionError,
  DownloadRateLimitedError,
  DownloadValidationError,
  TransactionLoggingError,
  IdentifierValidationError,
  ConfigurationError,
  wrapError,
  getErrorMessage,
  isTitleCacheError,
  toStorageError,
} from './TitleCacheError.js'
