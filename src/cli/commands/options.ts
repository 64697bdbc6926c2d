/**
 * Flags shared by the run and report commands
 */

import type { ShcovConfig, CoverageOptions, ResolvedShcovConfig } from '../../utils/config.js'
import { isReporterType, REPORTER_TYPES } from '../../utils/config.js'
import { setLogging, setDebug, setTiming, setJsonOutput } from '../../utils/logger.js'
import type { ReporterType } from '../../types.js'

export const COVERAGE_FLAGS_HELP = `  --min <pct>           Minimum coverage percentage per file (default: 0)
  --count-ignored       Count ignored lines in the percentage denominator
  --include <glob>      Also report matching files (repeatable)
  --exclude <glob>      Never report matching files; adds to the configured excludes (repeatable)
  --reporters <list>    Istanbul reporters: ${REPORTER_TYPES.join(',')}
  -o, --output <dir>    Output directory for istanbul reporters (default: coverage)
  --json                Print the coverage report as JSON
  --debug               Print per-file debug information
  --log                 Print progress logs
  --timing              Print timing information
  --config <path>       Config file (default: shcov.config.json)`

export interface CoverageFlags {
  overrides: ShcovConfig
  configPath?: string
  json: boolean
}

export function createCoverageFlags(): CoverageFlags {
  return { overrides: {}, json: false }
}

export type FlagResult = { consumed: number } | { error: string } | null

function setCoverage(flags: CoverageFlags, options: CoverageOptions): void {
  flags.overrides.coverage = { ...flags.overrides.coverage, ...options }
}

export function parseReporters(value: string): ReporterType[] | string {
  const reporters = value
    .split(',')
    .map((reporter) => reporter.trim())
    .filter(Boolean)
  const invalid = reporters.filter((reporter) => !isReporterType(reporter))
  if (invalid.length > 0) {
    return `Unknown reporter: ${invalid.join(', ')}`
  }
  return reporters.filter(isReporterType)
}

/**
 * Try to parse the shared flag at `args[i]`. Returns null when the flag is
 * not one of the shared flags.
 */
export function parseCoverageFlag(args: string[], i: number, flags: CoverageFlags): FlagResult {
  const arg = args[i]
  const value = args[i + 1]
  const needsValue = () => ({ error: `Missing value for ${arg}` })

  switch (arg) {
    case '--min': {
      if (value === undefined) return needsValue()
      const minimumPercent = Number(value)
      if (Number.isNaN(minimumPercent) || minimumPercent < 0 || minimumPercent > 100) {
        return { error: `Invalid value for --min: ${value} (expected 0-100)` }
      }
      setCoverage(flags, { minimumPercent })
      return { consumed: 2 }
    }
    case '--count-ignored':
      setCoverage(flags, { countIgnoredLines: true })
      return { consumed: 1 }
    case '--include':
    case '--exclude': {
      if (value === undefined) return needsValue()
      if (arg === '--include') {
        setCoverage(flags, { include: [...(flags.overrides.coverage?.include ?? []), value] })
      } else {
        setCoverage(flags, { exclude: [...(flags.overrides.coverage?.exclude ?? []), value] })
      }
      return { consumed: 2 }
    }
    case '--reporters': {
      if (value === undefined) return needsValue()
      const reporters = parseReporters(value)
      if (typeof reporters === 'string') return { error: reporters }
      setCoverage(flags, { reporters })
      return { consumed: 2 }
    }
    case '-o':
    case '--output':
      if (value === undefined) return needsValue()
      setCoverage(flags, { outputDir: value })
      return { consumed: 2 }
    case '--json':
      flags.json = true
      return { consumed: 1 }
    case '--debug':
      flags.overrides.debug = true
      return { consumed: 1 }
    case '--log':
      flags.overrides.log = true
      return { consumed: 1 }
    case '--timing':
      flags.overrides.timing = true
      return { consumed: 1 }
    case '--config':
      if (value === undefined) return needsValue()
      flags.configPath = value
      return { consumed: 2 }
    default:
      return null
  }
}

/**
 * Apply the logging switches of a resolved config. With `json`, diagnostics
 * move to stderr.
 */
export function configureLogging(config: Pick<ResolvedShcovConfig, 'log' | 'debug' | 'timing'>, json = false): void {
  setLogging(config.log)
  setDebug(config.debug)
  setTiming(config.timing)
  setJsonOutput(json)
}
