/**
 * CLI Configuration
 *
 * Maps the global command options onto core config overrides.
 */

import { join } from 'path'
import { DEFAULT_HOME_DIR, loadConfig, type ConfigOverrides, type TitleCacheConfig } from '@titlecache/core'

/**
 * Default database path: ~/.titlecache/titlecache.db
 */
export const DEFAULT_DB_PATH = join(DEFAULT_HOME_DIR, 'titlecache.db')

/**
 * Options every command accepts
 */
export interface ContextOptions {
  db?: string
  dataDir?: string
}

/**
 * Resolve config from the environment, with command-line paths taking precedence
 */
export function resolveConfig(
  options: ContextOptions,
  env: NodeJS.ProcessEnv = process.env
): TitleCacheConfig {
  const overrides: ConfigOverrides = {}
  if (options.db !== undefined) {
    overrides.database = { path: options.db }
  }
  if (options.dataDir !== undefined) {
    overrides.download = { dataDir: options.dataDir }
  }
  return loadConfig(env, overrides)
}
