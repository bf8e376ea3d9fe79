/**
 * Per-command application context
 */

import { Command } from 'commander'
import { closeAppContext, createAppContext, type AppContext, type AppContextOptions } from '@titlecache/core'
import { resolveConfig, type ContextOptions } from '../config.js'

/**
 * Add the options that locate the database and data directory
 */
export function addContextOptions(command: Command): Command {
  return command
    .option('-d, --db <path>', 'Database file path (default: $TITLECACHE_DB_PATH or ~/.titlecache/titlecache.db)')
    .option('--data-dir <path>', 'Directory for the downloaded titles file')
}

/**
 * Build a context, run `fn`, and always close the context afterwards
 */
export async function withAppContext<T>(
  options: ContextOptions,
  fn: (ctx: AppContext) => Promise<T>,
  contextOptions: Omit<AppContextOptions, 'config'> = {}
): Promise<T> {
  const ctx = await createAppContext({ ...contextOptions, config: resolveConfig(options) })
  try {
    return await fn(ctx)
  } finally {
    await closeAppContext(ctx)
  }
}
