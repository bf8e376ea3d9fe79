/**
 * Cache Command - Tiered cache inspection
 *
 * Usage:
 *   titlecache cache stats
 *   titlecache cache cleanup     # Sweep expired entries
 *   titlecache cache clear       # Empty both tiers
 */

import { Command } from 'commander'
import chalk from 'chalk'
import Table from 'cli-table3'
import type { ContextOptions } from '../config.js'
import { addContextOptions, withAppContext } from '../utils/context.js'
import { formatBytes } from '../utils/formatters.js'
import { logSanitizedError } from '../utils/sanitize.js'

type JsonOptions = ContextOptions & { json?: boolean }

async function showStats(options: JsonOptions): Promise<void> {
  try {
    await withAppContext(options, async (ctx) => {
      const stats = await ctx.cache.getStats()

      if (options.json) {
        console.log(JSON.stringify(stats, null, 2))
        return
      }

      console.log(chalk.bold.blue('\n=== Durable Cache ===\n'))
      if (!stats.l2) {
        console.log(chalk.yellow('  Durable tier unavailable'))
        return
      }
      console.log(`  Entries:  ${stats.l2.active} active, ${stats.l2.expired} expired`)
      console.log(`  Payload:  ${formatBytes(stats.l2.totalBytes)}`)
      console.log(`  File:     ${formatBytes(stats.l2.fileBytes)}`)
      console.log()

      if (stats.l2.byMethod.length > 0) {
        const table = new Table({
          head: [chalk.bold('Method'), chalk.bold('Entries'), chalk.bold('Size'), chalk.bold('Avg Reads')],
          colWidths: [30, 10, 12, 11],
        })
        for (const method of stats.l2.byMethod) {
          table.push([
            method.methodName,
            String(method.count),
            formatBytes(method.totalBytes),
            method.averageAccessCount.toFixed(1),
          ])
        }
        console.log(table.toString())
      }
    })
  } catch (error) {
    logSanitizedError(chalk.red('Error:'), error)
  }
}

async function runCleanup(options: JsonOptions): Promise<void> {
  try {
    await withAppContext(options, async (ctx) => {
      const removed = await ctx.cache.cleanupExpired()
      console.log(
        options.json
          ? JSON.stringify(removed, null, 2)
          : chalk.green(`Removed ${removed.l2} expired durable entries.`)
      )
    })
  } catch (error) {
    logSanitizedError(chalk.red('Error:'), error)
  }
}

async function runClear(options: JsonOptions): Promise<void> {
  try {
    await withAppContext(options, async (ctx) => {
      const removed = await ctx.cache.clear()
      console.log(
        options.json ? JSON.stringify(removed, null, 2) : chalk.green(`Cleared ${removed.l2} durable entries.`)
      )
    })
  } catch (error) {
    logSanitizedError(chalk.red('Error:'), error)
  }
}

/**
 * Create the cache command
 */
export function createCacheCommand(): Command {
  const cache = new Command('cache').description('Inspect and clean the durable cache')

  cache.addCommand(
    addContextOptions(new Command('stats'))
      .description('Show durable cache statistics')
      .option('--json', 'Output as JSON')
      .action(async (options: JsonOptions) => {
        await showStats(options)
      })
  )

  cache.addCommand(
    addContextOptions(new Command('cleanup'))
      .description('Delete expired entries')
      .option('--json', 'Output as JSON')
      .action(async (options: JsonOptions) => {
        await runCleanup(options)
      })
  )

  cache.addCommand(
    addContextOptions(new Command('clear'))
      .description('Delete every cached entry')
      .option('--json', 'Output as JSON')
      .action(async (options: JsonOptions) => {
        await runClear(options)
      })
  )

  return cache
}
