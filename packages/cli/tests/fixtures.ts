/**
 * Temp workspaces and program runs for command tests
 */

import { vi } from 'vitest'
import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { SqliteStore, TitleIndex, type TitleRecord } from '@titlecache/core'
import { createProgram } from '../src/cli.js'

export interface Workspace {
  dir: string
  dbPath: string
  dataDir: string
  /** `--db` and `--data-dir` pointing into the workspace */
  pathArgs: string[]
  store: SqliteStore
  cleanup(): void
}

export function createWorkspace(): Workspace {
  const dir = mkdtempSync(join(tmpdir(), 'titlecache-cli-'))
  const dbPath = join(dir, 'titlecache.db')
  const dataDir = join(dir, 'data')
  const store = new SqliteStore(dbPath)
  store.initialize()
  return {
    dir,
    dbPath,
    dataDir,
    pathArgs: ['--db', dbPath, '--data-dir', dataDir],
    store,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  }
}

export const SAMPLE_TITLES: TitleRecord[] = [
  { externalId: 1, titleType: 1, language: 'en', title: 'Cowboy Bebop' },
  { externalId: 1, titleType: 2, language: 'ja', title: 'Kauboi Bibappu' },
  { externalId: 5, titleType: 1, language: 'en', title: 'Cowboy Bebop: The Movie' },
  { externalId: 30, titleType: 1, language: 'en', title: 'Space Cowboy Chronicles' },
  { externalId: 42, titleType: 1, language: 'en', title: 'Trigun' },
]

export function seedTitles(store: SqliteStore, source = 'anidb', records: readonly TitleRecord[] = SAMPLE_TITLES): void {
  new TitleIndex(store).bulkReplace(source, records)
}

export interface RunResult {
  stdout: string
  stderr: string
  exitCode: number
}

/**
 * Parse `args` through the full program, capturing console output
 */
export async function runCli(args: string[]): Promise<RunResult> {
  const out: string[] = []
  const err: string[] = []
  const log = vi.spyOn(console, 'log').mockImplementation((...parts: unknown[]) => {
    out.push(parts.map(String).join(' '))
  })
  const error = vi.spyOn(console, 'error').mockImplementation((...parts: unknown[]) => {
    err.push(parts.map(String).join(' '))
  })
  process.exitCode = undefined

  try {
    const program = createProgram().exitOverride()
    await program.parseAsync(['node', 'titlecache', ...args])
    return { stdout: out.join('\n'), stderr: err.join('\n'), exitCode: Number(process.exitCode ?? 0) }
  } finally {
    process.exitCode = undefined
    log.mockRestore()
    error.mockRestore()
  }
}
