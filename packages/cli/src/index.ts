#!/usr/bin/env node
/**
 * titlecache CLI entry point
 */

import { createProgram } from './cli.js'
import { logSanitizedError } from './utils/sanitize.js'

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    logSanitizedError('titlecache:', error)
  })
