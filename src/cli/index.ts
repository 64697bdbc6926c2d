#!/usr/bin/env node
/**
 * shcov CLI
 *
 * Commands:
 *   run    - Run a bash test script with line coverage
 *   report - Rebuild a report from a retained trace
 *   check  - Scan shell files for constructs that skew coverage
 *   init   - Create shcov.config.json
 */

import { fileURLToPath } from 'node:url'

const HELP = `
shcov - Line coverage for bash scripts

Usage:
  shcov <command> [options]

Commands:
  run         Run a test script and report coverage of the files it sources
  report      Rebuild a coverage report from a retained trace
  check       Check shell files for unterminated heredocs and ignore markers
  init        Create shcov.config.json

Options:
  --help      Show this help message

Environment:
  SHCOV_COVERAGE_DISABLE       Run without coverage when set
  SHCOV_COVERAGE_MIN_PERCENT   Minimum coverage per file (0-100)
  DEBUG                        Print per-file debug information

Examples:
  shcov run test/test-lib.sh
  shcov run --min 80 --reporters lcov test/test-lib.sh
  shcov check lib/
  shcov init -y
`

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(HELP)
    return 0
  }

  const [command, ...rest] = args

  // Dynamic imports keep each command's dependencies unloaded until needed
  switch (command) {
    case 'run': {
      const { runRun } = await import('./commands/run.js')
      return await runRun(rest)
    }
    case 'report': {
      const { runReport } = await import('./commands/report.js')
      return await runReport(rest)
    }
    case 'check': {
      const { runCheck } = await import('./commands/check.js')
      return await runCheck(rest)
    }
    case 'init':
      return await runInit(rest)
    default:
      console.error(`Unknown command: ${command}`)
      console.log(HELP)
      return 1
  }
}

async function runInit(args: string[]): Promise<number> {
  const { parseInitArgs, executeInit, INIT_HELP } = await import('./commands/init.js')

  const result = parseInitArgs(args)

  if (result.showHelp) {
    console.log(INIT_HELP)
    if (result.error) {
      console.error(result.error)
      return 1
    }
    return 0
  }

  if (!result.options) {
    console.error(result.error ?? 'Invalid arguments')
    return 1
  }

  const initResult = await executeInit(result.options)
  return initResult.success ? 0 : 1
}

// Only run main() when executed directly, not when imported for testing
const currentFile = fileURLToPath(import.meta.url).replace(/\\/g, '/')
const executedFile = process.argv[1]?.replace(/\\/g, '/')

const isMainModule = currentFile === executedFile
  || executedFile?.endsWith('/shcov')  // npm bin symlink name
  || executedFile?.endsWith('/cli/index.js')

// process.exitCode lets Node flush stdout before exiting
if (isMainModule) {
  main()
    .then((code) => {
      process.exitCode = code
    })
    .catch((err: unknown) => {
      console.error('Fatal error:', err)
      process.exitCode = 1
    })
}
