/**
 * Check Command
 *
 * Scans shell files for constructs that skew line coverage
 */

import { scanFiles } from '../../linter/scanner.js'
import { printReport, getExitCode } from '../../linter/reporter.js'
import { error, formatError } from '../../utils/logger.js'

export const CHECK_HELP = `
Usage: shcov check [options] <paths...>

Scan shell files for unterminated heredocs and unbalanced
"# critic ignore" / "# critic /ignore" markers.

Options:
  --json                Output results as JSON
  --no-fail             Exit with 0 even when issues are found
  --ignore <glob>       Glob pattern to skip (repeatable)
  --help                Show this help message

Examples:
  shcov check lib/
  shcov check scripts/deploy.sh --json
`

export interface CheckOptions {
  json?: boolean
  noFail?: boolean
  ignore?: string[]
}

export interface CheckParseResult {
  paths: string[]
  options: CheckOptions
  error?: string
  showHelp?: boolean
}

export function parseCheckArgs(args: string[]): CheckParseResult {
  const paths: string[] = []
  const options: CheckOptions = { ignore: [] }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === '--help' || arg === '-h') {
      return { paths, options, showHelp: true }
    } else if (arg === '--json') {
      options.json = true
    } else if (arg === '--no-fail') {
      options.noFail = true
    } else if (arg === '--ignore') {
      const value = args[i + 1]
      if (!value) {
        return { paths, options, error: 'Missing value for --ignore' }
      }
      options.ignore = [...(options.ignore ?? []), value]
      i++
    } else if (arg.startsWith('-')) {
      return { paths, options, error: `Unknown option: ${arg}`, showHelp: true }
    } else {
      paths.push(arg)
    }
  }

  if (paths.length === 0) {
    return { paths, options, error: 'No paths specified', showHelp: true }
  }

  return { paths, options }
}

export async function check(paths: string[], options: CheckOptions): Promise<number> {
  const { json = false, noFail = false, ignore = [] } = options

  try {
    const result = await scanFiles({ paths, cwd: process.cwd(), ignore })
    printReport(result, { json })
    return getExitCode(result, noFail)
  } catch (err) {
    error(`Error running check: ${formatError(err)}`)
    return 2
  }
}

/**
 * Run the check command
 */
export async function runCheck(args: string[]): Promise<number> {
  const result = parseCheckArgs(args)

  if (result.showHelp) {
    console.log(CHECK_HELP)
    if (result.error) {
      console.error(result.error)
      return 1
    }
    return 0
  }

  if (result.error) {
    console.error(result.error)
    return 1
  }

  return await check(result.paths, result.options)
}
