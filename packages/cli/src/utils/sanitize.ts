/**
 * Terminal-safe error output
 *
 * Database and data directory paths usually sit under a home directory, so
 * messages that carry them are shortened to `~` before they are printed.
 */

import { homedir } from 'os'
import { CorruptionError, getErrorMessage, NotInitializedError } from '@titlecache/core'

/** Per-user prefixes of other machines, found in forwarded messages */
const FOREIGN_HOME_PREFIXES: ReadonlyArray<[RegExp, string]> = [
  [/\/Users\/[^/]+\//g, '~/'],
  [/\/home\/[^/]+\//g, '~/'],
  [/C:\\Users\\[^\\]+\\/gi, '~\\'],
]

/**
 * Replace `home` and any other user's home prefix in `text` with `~`
 */
export function redactPaths(text: string, home = homedir()): string {
  const local = home.length > 0 ? text.split(home).join('~') : text
  return FOREIGN_HOME_PREFIXES.reduce((out, [pattern, replacement]) => out.replace(pattern, replacement), local)
}

/**
 * Message of any thrown value, with home paths redacted
 */
export function sanitizeError(error: unknown): string {
  return redactPaths(typeof error === 'string' ? error : getErrorMessage(error))
}

/**
 * What the user can do about a storage failure, if anything
 */
export function storageHint(error: unknown): string | null {
  if (error instanceof CorruptionError) {
    return 'The database file is damaged. Move it aside and rerun the command to rebuild it.'
  }
  if (error instanceof NotInitializedError) {
    return 'No titles have been loaded for this source yet.'
  }
  return null
}

/**
 * Print a sanitized error, plus a storage hint when one applies, and mark
 * the process as failed
 *
 * @param prefix - Text before the error (e.g., "Search failed:")
 */
export function logSanitizedError(prefix: string, error: unknown): void {
  console.error(prefix, sanitizeError(error))
  const hint = storageHint(error)
  if (hint) {
    console.error(hint)
  }
  process.exitCode = 1
}
