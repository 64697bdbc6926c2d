/**
 * shcov report command
 *
 * Recomputes a coverage report from a retained trace and symbol dump.
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { loadShcovConfig } from '../../utils/config.js'
import { error, formatError } from '../../utils/logger.js'
import { collectCoverage } from '../../core/engine.js'
import { parseSymbolListing } from '../../core/registry.js'
import { getCoverageExitCode } from '../../reporter/console.js'
import { publishReport } from '../../reporter/publish.js'
import { HARNESS_FILE } from '../../runner/index.js'
import {
  COVERAGE_FLAGS_HELP,
  configureLogging,
  createCoverageFlags,
  parseCoverageFlag,
  type CoverageFlags,
} from './options.js'

export const REPORT_HELP = `
Usage: shcov report --trace <file> --spec <file> [options]

Recompute a coverage report from a trace kept by "shcov run --debug --retain-trace".

Options:
  --trace <file>        Trace log written by the harness (required)
  --spec <file>         Test script of the traced run (required)
  --symbols <file>      Symbol dump written by the harness
  --harness <file>      Harness script of the traced run (default: bundled harness)
  --cwd <dir>           Working directory of the traced run (default: current)
${COVERAGE_FLAGS_HELP}
  --help                Show this help message

Examples:
  shcov report --trace /tmp/shcov-x/trace.log --symbols /tmp/shcov-x/symbols.txt --spec test/test-lib.sh
`

export interface ReportOptions extends CoverageFlags {
  trace: string
  spec: string
  symbols?: string
  harness?: string
  cwd?: string
}

export interface ReportParseResult {
  options?: ReportOptions
  error?: string
  showHelp?: boolean
}

const FILE_FLAGS = {
  '--trace': 'trace',
  '--spec': 'spec',
  '--symbols': 'symbols',
  '--harness': 'harness',
  '--cwd': 'cwd',
} as const

function isFileFlag(arg: string): arg is keyof typeof FILE_FLAGS {
  return Object.hasOwn(FILE_FLAGS, arg)
}

export function parseReportArgs(args: string[]): ReportParseResult {
  const flags = createCoverageFlags()
  const files: Partial<Record<(typeof FILE_FLAGS)[keyof typeof FILE_FLAGS], string>> = {}

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '--help' || arg === '-h') {
      return { showHelp: true }
    }

    if (isFileFlag(arg)) {
      const value = args[i + 1]
      if (!value) {
        return { error: `Missing value for ${arg}` }
      }
      files[FILE_FLAGS[arg]] = value
      i += 2
      continue
    }

    const result = parseCoverageFlag(args, i, flags)
    if (result === null) {
      return { error: `Unknown option: ${arg}`, showHelp: true }
    }
    if ('error' in result) {
      return { error: result.error }
    }
    i += result.consumed
  }

  const { trace, spec } = files
  if (!trace) {
    return { error: 'Missing required option --trace' }
  }
  if (!spec) {
    return { error: 'Missing required option --spec' }
  }

  return {
    options: { ...flags, trace, spec, symbols: files.symbols, harness: files.harness, cwd: files.cwd },
  }
}

/**
 * Execute the report command - exported for testing
 */
export async function executeReport(options: ReportOptions): Promise<number> {
  const cwd = resolve(options.cwd ?? process.cwd())

  try {
    const config = await loadShcovConfig({ cwd, configPath: options.configPath, overrides: options.overrides })
    configureLogging(config, options.json)

    const trace = await readFile(resolve(cwd, options.trace), 'utf-8')
    const symbols = options.symbols ? await readFile(resolve(cwd, options.symbols), 'utf-8') : ''

    const report = await collectCoverage({
      trace,
      declarations: parseSymbolListing(symbols, cwd),
      harnessFile: options.harness ? resolve(cwd, options.harness) : HARNESS_FILE,
      specFile: resolve(cwd, options.spec),
      cwd,
      options: config.coverage,
    })
    await publishReport(report, config, { json: options.json, cwd })

    return getCoverageExitCode(report)
  } catch (err) {
    error(`Error building report: ${formatError(err)}`)
    return 2
  }
}

/**
 * Run the report command
 */
export async function runReport(args: string[]): Promise<number> {
  const result = parseReportArgs(args)

  if (result.showHelp) {
    console.log(REPORT_HELP)
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

  return await executeReport(result.options)
}
