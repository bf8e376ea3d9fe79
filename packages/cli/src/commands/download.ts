/**
 * Download Command - Bulk titles file
 *
 * Usage:
 *   titlecache download             # Download if outside the protection window
 *   titlecache download --force     # Bypass the protection window
 *   titlecache download status      # Show file and protection status
 *   titlecache download history     # Show recent attempts
 *   titlecache download reset       # Clear the protection timestamp
 */

import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import Table from 'cli-table3'
import { DownloadRateLimitedError, type DownloadAttemptStatus } from '@titlecache/core'
import type { ContextOptions } from '../config.js'
import { addContextOptions, withAppContext } from '../utils/context.js'
import { formatBytes, formatDate, formatHours } from '../utils/formatters.js'
import { logSanitizedError, sanitizeError } from '../utils/sanitize.js'

interface DownloadOptions extends ContextOptions {
  force?: boolean
  load?: boolean
  json?: boolean
}

const STATUS_COLORS: Record<DownloadAttemptStatus, (text: string) => string> = {
  started: chalk.blue,
  success: chalk.green,
  failed: chalk.red,
  blocked: chalk.yellow,
  protection_reset: chalk.magenta,
}

/**
 * Download, then load the file into the title index
 */
async function runDownload(options: DownloadOptions): Promise<void> {
  const spinner = ora()

  try {
    await withAppContext(options, async (ctx) => {
      spinner.start(options.force ? 'Forcing titles download...' : 'Downloading titles...')
      const result = await ctx.gate.download({ force: options.force ?? false })
      spinner.succeed(`Downloaded ${formatBytes(result.sizeBytes)} (${formatBytes(result.decompressedBytes)} uncompressed)`)

      let loaded: number | null = null
      if (options.load !== false) {
        spinner.start('Loading titles...')
        const report = await ctx.search.loadTitlesFile(ctx.gate.source, true)
        loaded = report.titlesLoaded
        spinner.succeed(`Loaded ${report.titlesLoaded} titles (${report.malformedLines} malformed lines skipped)`)
      }

      if (options.json) {
        console.log(JSON.stringify({ ...result, titlesLoaded: loaded }, null, 2))
      }
    })
  } catch (error) {
    if (error instanceof DownloadRateLimitedError) {
      spinner.warn(chalk.yellow('Download blocked by protection window'))
      console.error(`  Next download allowed: ${formatDate(error.nextAllowedAt)}`)
      console.error(`  Time remaining:        ${formatHours(error.hoursRemaining)}`)
      console.error(chalk.dim('  Use --force to bypass (emergency only).'))
      process.exitCode = 1
      return
    }
    spinner.fail('Download failed')
    logSanitizedError(chalk.red('Error:'), error)
  }
}

/**
 * Show file and protection status
 */
async function showStatus(options: ContextOptions & { json?: boolean }): Promise<void> {
  try {
    await withAppContext(options, async (ctx) => {
      const status = ctx.gate.getStatus()

      if (options.json) {
        console.log(JSON.stringify(status, null, 2))
        return
      }

      console.log(chalk.bold.blue('\n=== Download Status ===\n'))
      console.log(chalk.bold('Titles File:'))
      console.log(`  Source:      ${chalk.cyan(status.source)}`)
      console.log(`  Path:        ${sanitizeError(status.filePath)}`)
      console.log(`  Exists:      ${status.fileExists ? chalk.green('Yes') : chalk.red('No')}`)
      if (status.fileExists) {
        console.log(`  Size:        ${formatBytes(status.fileSizeBytes)}`)
        console.log(`  Age:         ${status.fileAgeHours === null ? 'N/A' : formatHours(status.fileAgeHours)}`)
      }
      console.log()

      const { decision } = status
      console.log(chalk.bold('Protection:'))
      console.log(`  Window:      ${status.protectionHours}h`)
      console.log(`  Last:        ${formatDate(decision.lastDownloadAt)} ${chalk.dim(`(${decision.basis})`)}`)
      console.log(`  Download:    ${decision.allowed ? chalk.green('Allowed') : chalk.yellow('Blocked')}`)
      if (!decision.allowed) {
        console.log(`  Next:        ${formatDate(decision.nextAllowedAt)}`)
        console.log(`  Remaining:   ${formatHours(decision.hoursRemaining ?? 0)}`)
      }
      console.log(`  Refresh due: ${status.needsDownload ? chalk.yellow('Yes') : chalk.dim('No')}`)
      if (status.lastAttemptStatus) {
        console.log(`  Last attempt: ${status.lastAttemptStatus} ${chalk.dim(status.lastAttemptMessage ?? '')}`)
      }
      console.log()
    })
  } catch (error) {
    logSanitizedError(chalk.red('Error:'), error)
  }
}

/**
 * Show recent download attempts
 */
async function showHistory(options: ContextOptions & { limit: string; json?: boolean }): Promise<void> {
  try {
    const limit = Number.parseInt(options.limit, 10) || 10
    await withAppContext(options, async (ctx) => {
      const attempts = ctx.gate.getHistory(limit)

      if (options.json) {
        console.log(JSON.stringify(attempts, null, 2))
        return
      }
      if (attempts.length === 0) {
        console.log(chalk.yellow('No download attempts recorded.'))
        return
      }

      const table = new Table({
        head: [chalk.bold('Time'), chalk.bold('Status'), chalk.bold('Message')],
        colWidths: [24, 18, 50],
        wordWrap: true,
      })
      for (const attempt of attempts) {
        table.push([formatDate(attempt.timestamp), STATUS_COLORS[attempt.status](attempt.status), attempt.message])
      }
      console.log(chalk.bold.blue('\n=== Download History ===\n'))
      console.log(table.toString())
    })
  } catch (error) {
    logSanitizedError(chalk.red('Error:'), error)
  }
}

/**
 * Clear the protection timestamp
 */
async function resetProtection(options: ContextOptions): Promise<void> {
  try {
    await withAppContext(options, async (ctx) => {
      await ctx.gate.resetProtection()
      console.log(chalk.green('Download protection reset.'))
    })
  } catch (error) {
    logSanitizedError(chalk.red('Error:'), error)
  }
}

/**
 * Create the download command with its subcommands
 */
export function createDownloadCommand(): Command {
  const download = addContextOptions(new Command('download'))
    .description('Download the bulk titles file (36h protection window)')
    .option('-f, --force', 'Bypass the protection window')
    .option('--no-load', 'Do not load the titles into the index')
    .option('--json', 'Output as JSON')
    .action(async (options: DownloadOptions) => {
      await runDownload(options)
    })

  download.addCommand(
    addContextOptions(new Command('status'))
      .description('Show titles file and protection status')
      .option('--json', 'Output as JSON')
      .action(async (options: ContextOptions & { json?: boolean }) => {
        await showStatus(options)
      })
  )

  download.addCommand(
    addContextOptions(new Command('history'))
      .description('Show recent download attempts')
      .option('-l, --limit <number>', 'Number of attempts to show', '10')
      .option('--json', 'Output as JSON')
      .action(async (options: ContextOptions & { limit: string; json?: boolean }) => {
        await showHistory(options)
      })
  )

  download.addCommand(
    addContextOptions(new Command('reset'))
      .description('Clear the last download timestamp (emergency only)')
      .action(async (options: ContextOptions) => {
        await resetProtection(options)
      })
  )

  return download
}
