/**
 * @titlecache/cli
 *
 * Command-line interface for the title cache.
 */

import { Command } from 'commander'
import { VERSION } from '@titlecache/core'
import {
  createCacheCommand,
  createDownloadCommand,
  createMaintenanceCommand,
  createReportCommand,
  createSearchCommand,
} from './commands/index.js'

/**
 * Build the program with every command registered
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('titlecache')
    .description('Title search over a locally cached bulk titles file')
    .version(VERSION)

  program.addCommand(createSearchCommand())
  program.addCommand(createDownloadCommand())
  program.addCommand(createMaintenanceCommand())
  program.addCommand(createReportCommand())
  program.addCommand(createCacheCommand())

  return program
}
