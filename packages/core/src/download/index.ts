export {
  DownloadGate,
  GZIP_MAGIC,
  ATTEMPT_KEY_PREFIX,
  FILE_LOG_NAME,
  DOWNLOAD_METADATA_KEYS,
  type DownloadGateOptions,
} from './DownloadGate.js'
export {
  HttpTitlesFetcher,
  DEFAULT_USER_AGENT,
  type HttpTitlesFetcherOptions,
} from './HttpTitlesFetcher.js'
export type {
  DownloadAttempt,
  DownloadAttemptStatus,
  DownloadDecision,
  DownloadResult,
  DownloadStatus,
  IntegrityReport,
  TitlesFetcher,
} from './types.js'
