/**
 * shcov run command
 *
 * Runs a test script through the harness and reports line coverage of the
 * scripts it sourced.
 */

import { existsSync } from 'node:fs'
import { basename, resolve } from 'node:path'
import chalk from 'chalk'
import { loadShcovConfig } from '../../utils/config.js'
import { error, formatError } from '../../utils/logger.js'
import { collectCoverage } from '../../core/engine.js'
import { parseSymbolListing } from '../../core/registry.js'
import { getCoverageExitCode } from '../../reporter/console.js'
import { publishReport } from '../../reporter/publish.js'
import { HARNESS_FILE, runScript } from '../../runner/index.js'
import { withTraceArtifact } from '../../runner/trace-artifact.js'
import {
  COVERAGE_FLAGS_HELP,
  configureLogging,
  createCoverageFlags,
  parseCoverageFlag,
  type CoverageFlags,
} from './options.js'

export const RUN_HELP = `
Usage: shcov run [options] <test-script> [script args...]

Run a bash test script and report line coverage of the files it sources.
Functions declared in the test script itself are not measured.

Options:
  --no-coverage         Run without tracing
  --retain-trace        Keep the trace file when --debug is on
  --shell <path>        Bash executable (default: bash)
${COVERAGE_FLAGS_HELP}
  --help                Show this help message

Everything after the test script is passed to it. Use -- to pass a script
whose name starts with a dash.

Exit code: the script's own non-zero exit code, otherwise 1 when a file is
below the minimum coverage, otherwise 0. Harness failures exit with 2.

Examples:
  shcov run test/test-lib.sh
  shcov run --min 80 --reporters lcov,html test/test-lib.sh
  DEBUG=1 shcov run --retain-trace test/test-lib.sh
`

export interface RunOptions extends CoverageFlags {
  script: string
  args: string[]
}

export interface RunParseResult {
  options?: RunOptions
  error?: string
  showHelp?: boolean
}

export function parseRunArgs(args: string[]): RunParseResult {
  const flags = createCoverageFlags()

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '--help' || arg === '-h') {
      return { showHelp: true }
    }
    if (arg === '--') {
      i++
      break
    }
    if (!arg.startsWith('-')) {
      break
    }

    if (arg === '--no-coverage') {
      flags.overrides.coverage = { ...flags.overrides.coverage, enabled: false }
      i++
    } else if (arg === '--retain-trace') {
      flags.overrides.coverage = { ...flags.overrides.coverage, retainTraceOnDebug: true }
      i++
    } else if (arg === '--shell') {
      if (!args[i + 1]) {
        return { error: `Missing value for ${arg}` }
      }
      flags.overrides.shell = args[i + 1]
      i += 2
    } else {
      const result = parseCoverageFlag(args, i, flags)
      if (result === null) {
        return { error: `Unknown option: ${arg}`, showHelp: true }
      }
      if ('error' in result) {
        return { error: result.error }
      }
      i += result.consumed
    }
  }

  const script = args[i]
  if (script === undefined) {
    return { error: 'No test script specified', showHelp: true }
  }

  return { options: { ...flags, script, args: args.slice(i + 1) } }
}

/**
 * Execute the run command - exported for testing
 */
export async function executeRun(options: RunOptions): Promise<number> {
  const cwd = process.cwd()

  try {
    const config = await loadShcovConfig({ cwd, configPath: options.configPath, overrides: options.overrides })
    configureLogging(config, options.json)

    const script = resolve(cwd, options.script)
    if (!existsSync(script)) {
      error(`Test script not found: ${script}`)
      return 2
    }

    if (!options.json) {
      console.log(chalk.magenta(`[shcov] Running tests in ${basename(script)}`))
    }

    if (!config.coverage.enabled) {
      const result = await runScript({ script, args: options.args, cwd, shell: config.shell, stdoutToStderr: options.json })
      return result.exitCode
    }

    const retain = config.debug && config.coverage.retainTraceOnDebug
    return await withTraceArtifact({ retain }, async (artifact) => {
      const result = await runScript({
        script,
        args: options.args,
        cwd,
        shell: config.shell,
        artifact,
        stdoutToStderr: options.json,
      })
      const [trace, symbols] = await Promise.all([artifact.readTrace(), artifact.readSymbols()])

      const report = await collectCoverage({
        trace,
        declarations: parseSymbolListing(symbols, cwd),
        harnessFile: HARNESS_FILE,
        specFile: script,
        cwd,
        options: config.coverage,
      })
      await publishReport(report, config, { json: options.json, cwd })

      if (!options.json) {
        const status = result.exitCode === 0 ? chalk.green('passed') : chalk.red(`failed (exit code ${result.exitCode})`)
        console.log('')
        console.log(chalk.magenta(`[shcov] Tests ${status}`))
      }

      return result.exitCode !== 0 ? result.exitCode : getCoverageExitCode(report)
    })
  } catch (err) {
    error(`Error running ${options.script}: ${formatError(err)}`)
    return 2
  }
}

/**
 * Run the run command
 */
export async function runRun(args: string[]): Promise<number> {
  const result = parseRunArgs(args)

  if (result.showHelp) {
    console.log(RUN_HELP)
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

  return await executeRun(result.options)
}
