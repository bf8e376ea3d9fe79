/**
 * Maintenance Command - Database upkeep
 *
 * Usage:
 *   titlecache maintenance run            # Run every due task
 *   titlecache maintenance run --task vacuum
 *   titlecache maintenance status
 *   titlecache maintenance history
 */

import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import Table from 'cli-table3'
import type { TaskRunRecord } from '@titlecache/core'
import type { ContextOptions } from '../config.js'
import { addContextOptions, withAppContext } from '../utils/context.js'
import { formatBytes, formatDate, formatDuration } from '../utils/formatters.js'
import { logSanitizedError } from '../utils/sanitize.js'

interface RunOptions extends ContextOptions {
  task?: string
  json?: boolean
}

/**
 * Table of run records
 */
export function renderRunRecords(records: readonly TaskRunRecord[]): string {
  const table = new Table({
    head: [chalk.bold('Task'), chalk.bold('Result'), chalk.bold('Started'), chalk.bold('Duration'), chalk.bold('Error')],
    colWidths: [22, 8, 24, 10, 36],
    wordWrap: true,
  })
  for (const record of records) {
    table.push([
      record.task,
      record.success ? chalk.green('ok') : chalk.red('failed'),
      formatDate(record.startedAt),
      formatDuration(record.durationMs),
      record.error ?? '',
    ])
  }
  return table.toString()
}

async function runMaintenance(options: RunOptions): Promise<void> {
  const spinner = ora()

  try {
    await withAppContext(options, async (ctx) => {
      if (options.task !== undefined) {
        spinner.start(`Running ${options.task}...`)
        const record = await ctx.maintenance.runTaskNow(options.task)
        if (!record) {
          spinner.fail(`Unknown task: ${options.task}`)
          process.exitCode = 1
          return
        }
        spinner.stop()
        if (options.json) {
          console.log(JSON.stringify(record, null, 2))
          return
        }
        console.log(renderRunRecords([record]))
        if (!record.success) process.exitCode = 1
        return
      }

      spinner.start('Running due maintenance tasks...')
      const report = await ctx.maintenance.runMaintenance()
      spinner.stop()

      if (options.json) {
        console.log(JSON.stringify(report, null, 2))
        return
      }
      if (report.tasksRun === 0) {
        console.log(chalk.dim('No maintenance tasks are due.'))
        return
      }

      console.log(renderRunRecords(report.results))
      const summary = `${report.succeeded}/${report.tasksRun} tasks succeeded in ${formatDuration(report.durationMs)}`
      console.log(report.failed > 0 ? chalk.yellow(summary) : chalk.green(summary))
      if (report.failed > 0) process.exitCode = 1
    })
  } catch (error) {
    spinner.fail('Maintenance failed')
    logSanitizedError(chalk.red('Error:'), error)
  }
}

async function showStatus(options: ContextOptions & { json?: boolean }): Promise<void> {
  try {
    await withAppContext(options, async (ctx) => {
      const status = ctx.maintenance.getStatus()

      if (options.json) {
        console.log(JSON.stringify(status, null, 2))
        return
      }

      console.log(chalk.bold.blue('\n=== Maintenance Status ===\n'))
      console.log(`  Database size: ${formatBytes(status.databaseSizeBytes)}`)
      console.log(`  Runs recorded: ${status.historySize}`)
      console.log(`  Last run:      ${status.lastRun ? `${status.lastRun.task} at ${formatDate(status.lastRun.startedAt)}` : 'Never'}`)
      console.log()

      const table = new Table({
        head: [chalk.bold('Task'), chalk.bold('Priority'), chalk.bold('Every'), chalk.bold('Last Run'), chalk.bold('Next Run'), chalk.bold('Due')],
        colWidths: [22, 10, 8, 24, 24, 6],
      })
      for (const task of status.tasks) {
        table.push([
          task.name,
          String(task.priority),
          `${task.intervalHours}h`,
          formatDate(task.lastRun),
          formatDate(task.nextRun),
          task.due ? chalk.yellow('yes') : chalk.dim('no'),
        ])
      }
      console.log(table.toString())
    })
  } catch (error) {
    logSanitizedError(chalk.red('Error:'), error)
  }
}

async function showHistory(options: ContextOptions & { limit: string; json?: boolean }): Promise<void> {
  try {
    const limit = Number.parseInt(options.limit, 10) || 20
    await withAppContext(options, async (ctx) => {
      const records = ctx.maintenance.getHistory(limit)

      if (options.json) {
        console.log(JSON.stringify(records, null, 2))
        return
      }
      if (records.length === 0) {
        console.log(chalk.yellow('No maintenance runs recorded.'))
        return
      }
      console.log(chalk.bold.blue('\n=== Maintenance History ===\n'))
      console.log(renderRunRecords(records))
    })
  } catch (error) {
    logSanitizedError(chalk.red('Error:'), error)
  }
}

/**
 * Create the maintenance command
 */
export function createMaintenanceCommand(): Command {
  const maintenance = new Command('maintenance').description('Database maintenance tasks')

  maintenance.addCommand(
    addContextOptions(new Command('run'))
      .description('Run due maintenance tasks, or one task by name')
      .option('-t, --task <name>', 'Run this task regardless of schedule')
      .option('--json', 'Output as JSON')
      .action(async (options: RunOptions) => {
        await runMaintenance(options)
      })
  )

  maintenance.addCommand(
    addContextOptions(new Command('status'))
      .description('Show task schedule and database size')
      .option('--json', 'Output as JSON')
      .action(async (options: ContextOptions & { json?: boolean }) => {
        await showStatus(options)
      })
  )

  maintenance.addCommand(
    addContextOptions(new Command('history'))
      .description('Show recent task runs')
      .option('-l, --limit <number>', 'Number of runs to show', '20')
      .option('--json', 'Output as JSON')
      .action(async (options: ContextOptions & { limit: string; json?: boolean }) => {
        await showHistory(options)
      })
  )

  return maintenance
}
