/**
 * Report Command - Search analytics
 *
 * Usage:
 *   titlecache report                  # Daily report across sources
 *   titlecache report --source anidb
 *   titlecache report cleanup          # Delete transactions past retention
 */

import { Command } from 'commander'
import chalk from 'chalk'
import Table from 'cli-table3'
import type { DailyReport, PerformanceRating } from '@titlecache/core'
import type { ContextOptions } from '../config.js'
import { addContextOptions, withAppContext } from '../utils/context.js'
import { formatDate } from '../utils/formatters.js'
import { logSanitizedError } from '../utils/sanitize.js'

interface ReportOptions extends ContextOptions {
  source?: string
  json?: boolean
}

const RATING_COLORS: Record<PerformanceRating, (text: string) => string> = {
  excellent: chalk.green,
  good: chalk.cyan,
  fair: chalk.yellow,
  poor: chalk.red,
}

/**
 * Render the daily report for the terminal
 */
export function renderReport(report: DailyReport): string {
  const lines: string[] = []
  const { summary, performanceMetrics, searchStatistics, queryAnalytics } = report

  lines.push(chalk.bold.blue(`\n=== Daily Analytics: ${report.source ?? 'all sources'} ===\n`))
  lines.push(chalk.bold('Summary:'))
  lines.push(`  Searches:      ${summary.totalSearches}`)
  lines.push(`  Avg response:  ${summary.avgResponseTimeMs}ms`)
  lines.push(`  Rating:        ${RATING_COLORS[summary.performanceRating](summary.performanceRating)}`)
  lines.push(`  Top query:     ${summary.topQuery ?? chalk.dim('none')}`)
  lines.push('')

  const p = performanceMetrics.percentiles
  const sla = performanceMetrics.sla
  lines.push(chalk.bold('Response Times:'))
  lines.push(`  p50 ${p.p50}ms  p90 ${p.p90}ms  p95 ${p.p95}ms  p99 ${p.p99}ms`)
  lines.push(
    `  Under ${sla.targetMs}ms: ${sla.compliancePercentage}% (${sla.compliantSearches}/${sla.totalSearches})`
  )
  lines.push('')

  if (searchStatistics.popularQueries.length > 0) {
    const table = new Table({
      head: [chalk.bold('Popular Query'), chalk.bold('Count')],
      colWidths: [40, 8],
    })
    for (const entry of searchStatistics.popularQueries) {
      table.push([entry.query, String(entry.count)])
    }
    lines.push(table.toString())
  }

  if (queryAnalytics.zeroResultQueries.length > 0) {
    lines.push(chalk.bold('\nQueries with no results:'))
    for (const entry of queryAnalytics.zeroResultQueries) {
      lines.push(`  ${chalk.red('•')} ${entry.query} (${entry.count})`)
    }
  }

  lines.push(chalk.dim(`\nGenerated ${formatDate(report.generatedAt)}`))
  return lines.join('\n')
}

async function runReport(options: ReportOptions): Promise<void> {
  try {
    await withAppContext(options, async (ctx) => {
      const report = ctx.analytics.generateDailyReport(options.source)
      console.log(options.json ? JSON.stringify(report, null, 2) : renderReport(report))
    })
  } catch (error) {
    logSanitizedError(chalk.red('Report failed:'), error)
  }
}

async function runCleanup(options: ContextOptions & { json?: boolean }): Promise<void> {
  try {
    await withAppContext(options, async (ctx) => {
      const result = await ctx.analytics.forceCleanup()
      if (options.json) {
        console.log(JSON.stringify(result, null, 2))
      } else if (result.success) {
        console.log(
          chalk.green(`Deleted ${result.deletedTransactions} transactions older than ${result.retentionDays} days.`)
        )
      } else {
        console.log(chalk.red(`Cleanup failed: ${result.error ?? 'unknown error'}`))
      }
      if (!result.success) process.exitCode = 1
    })
  } catch (error) {
    logSanitizedError(chalk.red('Cleanup failed:'), error)
  }
}

/**
 * Create the report command
 */
export function createReportCommand(): Command {
  const report = addContextOptions(new Command('report'))
    .description('Show the daily search analytics report')
    .option('-s, --source <name>', 'Limit the report to one source')
    .option('--json', 'Output as JSON')
    .action(async (options: ReportOptions) => {
      await runReport(options)
    })

  report.addCommand(
    addContextOptions(new Command('cleanup'))
      .description('Delete search transactions past the retention period')
      .option('--json', 'Output as JSON')
      .action(async (options: ContextOptions & { json?: boolean }) => {
        await runCleanup(options)
      })
  )

  return report
}
