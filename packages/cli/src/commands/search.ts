/**
 * Search Command - Tiered title search
 *
 * Usage:
 *   titlecache search "cowboy bebop"
 *   titlecache search bebop --source anidb --limit 5
 *   titlecache search bebop --load        # Download and load titles first
 */

import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import Table from 'cli-table3'
import type { MatchType, TitleSearchResult } from '@titlecache/core'
import type { ContextOptions } from '../config.js'
import { addContextOptions, withAppContext } from '../utils/context.js'
import { formatDuration } from '../utils/formatters.js'
import { logSanitizedError } from '../utils/sanitize.js'

export interface SearchCommandOptions extends ContextOptions {
  source?: string
  limit: string
  load?: boolean
  json?: boolean
}

/**
 * Parse a positive integer option
 */
export function parseLimit(value: string): number {
  const limit = Number.parseInt(value, 10)
  if (!Number.isFinite(limit) || limit < 1) {
    throw new Error(`Invalid limit: ${value}`)
  }
  return limit
}

const MATCH_COLORS: Record<MatchType, (text: string) => string> = {
  exact: chalk.green,
  prefix: chalk.cyan,
  substring: chalk.dim,
}

/**
 * Render search results as a table
 */
export function renderResults(result: TitleSearchResult): string {
  if (result.matches.length === 0) {
    return chalk.yellow(`No titles found for "${result.query}" in ${result.source}`)
  }

  const table = new Table({
    head: [chalk.bold('ID'), chalk.bold('Title'), chalk.bold('Type'), chalk.bold('Lang'), chalk.bold('Match')],
    colWidths: [10, 50, 6, 8, 11],
    wordWrap: true,
  })

  for (const match of result.matches) {
    table.push([
      String(match.externalId),
      match.title,
      String(match.titleType),
      match.language,
      MATCH_COLORS[match.matchType](match.matchType),
    ])
  }

  return [
    table.toString(),
    chalk.dim(`${result.matches.length} result(s) in ${formatDuration(result.responseTimeMs)}`),
  ].join('\n')
}

async function runSearch(query: string, options: SearchCommandOptions): Promise<void> {
  try {
    const limit = parseLimit(options.limit)

    await withAppContext(options, async (ctx) => {
      const source = options.source ?? ctx.config.download.source

      if (options.load) {
        const spinner = ora(`Loading titles for ${source}...`).start()
        const report = await ctx.search.ensureTitlesLoaded(source)
        if (report.action === 'unavailable') {
          spinner.warn(chalk.yellow(`Titles unavailable: ${report.reason ?? 'unknown reason'}`))
        } else if (report.action === 'loaded') {
          spinner.succeed(`Loaded ${report.titlesLoaded} titles`)
        } else {
          spinner.stop()
        }
      }

      const result = ctx.search.searchTitles(source, query, { limit, clientId: 'cli' })

      if (options.json) {
        console.log(JSON.stringify(result, null, 2))
        return
      }
      console.log(renderResults(result))
    })
  } catch (error) {
    logSanitizedError(chalk.red('Search failed:'), error)
  }
}

/**
 * Create the search command
 */
export function createSearchCommand(): Command {
  return addContextOptions(new Command('search'))
    .description('Search titles by exact, prefix and substring match')
    .argument('<query>', 'Title to look for (at least 2 characters)')
    .option('-s, --source <name>', 'Title source (default: $TITLECACHE_DEFAULT_SOURCE)')
    .option('-l, --limit <number>', 'Maximum results to return', '10')
    .option('--load', 'Download and load the titles file when the source is empty')
    .option('--json', 'Output as JSON')
    .action(async (query: string, options: SearchCommandOptions) => {
      await runSearch(query, options)
    })
}
