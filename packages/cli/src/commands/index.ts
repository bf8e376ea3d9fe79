/**
 * CLI Commands
 *
 * Export all CLI commands for registration.
 */

export { createSearchCommand } from './search.js'
export { createDownloadCommand } from './download.js'
export { createMaintenanceCommand } from './maintenance.js'
export { createReportCommand } from './report.js'
export { createCacheCommand } from './cache.js'
