/**
 * shcov Configuration
 *
 * Sources, lowest precedence first: built-in defaults, shcov.config.json,
 * environment variables, command line flags.
 */

import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import type { ReporterType } from '../types.js'
import { log, warn, formatError, safeJsonParse } from './logger.js'

export const CONFIG_FILE_NAME = 'shcov.config.json'

/**
 * Shell files picked up by `shcov check` when given a directory
 */
export const SHELL_FILE_PATTERN = '**/*.{sh,bash}'

export const DEFAULT_EXCLUDE_PATTERNS = ['**/node_modules/**', '**/.git/**']

export const REPORTER_TYPES: readonly ReporterType[] = [
  'html',
  'lcov',
  'json',
  'json-summary',
  'text-summary',
  'cobertura',
]

/**
 * Coverage section of the configuration
 */
export interface CoverageOptions {
  /** Trace the test script and report coverage (default: true) */
  enabled?: boolean
  /** Files below this percentage are flagged (default: 0, no minimum) */
  minimumPercent?: number
  /** Keep the trace artifact when running in debug mode (default: false) */
  retainTraceOnDebug?: boolean
  /**
   * Keep ignored lines in the percentage denominator instead of exempting
   * them (default: false). Ignored lines are never listed as uncovered.
   */
  countIgnoredLines?: boolean
  /**
   * Globs for files to report even when no function of theirs was declared
   * during the run (they then report 0%). Relative to the working directory.
   */
  include?: string[]
  /** Globs for files never to report */
  exclude?: string[]
  /** Istanbul reporters to write to outputDir (default: none) */
  reporters?: ReporterType[]
  /** Output directory for istanbul reporters (default: 'coverage') */
  outputDir?: string
}

export interface ShcovConfig {
  coverage?: CoverageOptions
  /** Debug output; together with coverage.retainTraceOnDebug keeps the trace */
  debug?: boolean
  /** Progress logging (default: false) */
  log?: boolean
  /** Timing logs only (default: false) */
  timing?: boolean
  /** Bash executable used to run test scripts (default: 'bash') */
  shell?: string
}

export interface ResolvedCoverageOptions {
  enabled: boolean
  minimumPercent: number
  retainTraceOnDebug: boolean
  countIgnoredLines: boolean
  include: string[]
  exclude: string[]
  reporters: ReporterType[]
  outputDir: string
}

export interface ResolvedShcovConfig {
  coverage: ResolvedCoverageOptions
  debug: boolean
  log: boolean
  timing: boolean
  shell: string
}

export const DEFAULT_COVERAGE_OPTIONS: ResolvedCoverageOptions = {
  enabled: true,
  minimumPercent: 0,
  retainTraceOnDebug: false,
  countIgnoredLines: false,
  include: [],
  exclude: DEFAULT_EXCLUDE_PATTERNS,
  reporters: [],
  outputDir: 'coverage',
}

export const DEFAULT_SHCOV_CONFIG: ResolvedShcovConfig = {
  coverage: DEFAULT_COVERAGE_OPTIONS,
  debug: false,
  log: false,
  timing: false,
  shell: 'bash',
}

/**
 * Clamp a percentage to an integer in 0..100
 */
export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0
  return Math.min(100, Math.max(0, Math.floor(value)))
}

/**
 * Resolve config with defaults
 */
export function resolveShcovConfig(config?: ShcovConfig): ResolvedShcovConfig {
  const coverage = config?.coverage
  const defaults = DEFAULT_SHCOV_CONFIG.coverage

  return {
    coverage: {
      enabled: coverage?.enabled ?? defaults.enabled,
      minimumPercent: clampPercent(coverage?.minimumPercent ?? defaults.minimumPercent),
      retainTraceOnDebug: coverage?.retainTraceOnDebug ?? defaults.retainTraceOnDebug,
      countIgnoredLines: coverage?.countIgnoredLines ?? defaults.countIgnoredLines,
      include: coverage?.include ?? defaults.include,
      exclude: coverage?.exclude ?? defaults.exclude,
      reporters: coverage?.reporters ?? defaults.reporters,
      outputDir: coverage?.outputDir ?? defaults.outputDir,
    },
    debug: config?.debug ?? DEFAULT_SHCOV_CONFIG.debug,
    log: config?.log ?? DEFAULT_SHCOV_CONFIG.log,
    timing: config?.timing ?? DEFAULT_SHCOV_CONFIG.timing,
    shell: config?.shell ?? DEFAULT_SHCOV_CONFIG.shell,
  }
}

/**
 * Merge two partial configs; values set in `override` win.
 */
export function mergeConfig(base: ShcovConfig, override: ShcovConfig): ShcovConfig {
  const merged: ShcovConfig = { ...base }
  for (const key of ['debug', 'log', 'timing', 'shell'] as const) {
    if (override[key] !== undefined) {
      Object.assign(merged, { [key]: override[key] })
    }
  }
  if (base.coverage || override.coverage) {
    const coverage: CoverageOptions = { ...base.coverage }
    for (const [key, value] of Object.entries(override.coverage ?? {})) {
      if (value !== undefined) {
        Object.assign(coverage, { [key]: value })
      }
    }
    merged.coverage = coverage
  }
  return merged
}

/**
 * Read the options carried by environment variables:
 * SHCOV_COVERAGE_DISABLE, SHCOV_COVERAGE_MIN_PERCENT and DEBUG.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ShcovConfig {
  const config: ShcovConfig = {}
  const coverage: CoverageOptions = {}

  if (env.SHCOV_COVERAGE_DISABLE) {
    coverage.enabled = false
  }
  if (env.SHCOV_COVERAGE_MIN_PERCENT) {
    const value = Number(env.SHCOV_COVERAGE_MIN_PERCENT)
    if (Number.isNaN(value)) {
      warn(`Ignoring SHCOV_COVERAGE_MIN_PERCENT: not a number (${env.SHCOV_COVERAGE_MIN_PERCENT})`)
    } else {
      coverage.minimumPercent = value
    }
  }
  if (env.DEBUG) {
    config.debug = true
  }

  if (Object.keys(coverage).length > 0) {
    config.coverage = coverage
  }
  return config
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

export function isReporterType(value: string): value is ReporterType {
  return REPORTER_TYPES.some((type) => type === value)
}

/**
 * Validate a parsed config file. Values of the wrong type are dropped with
 * a warning; unknown keys are ignored.
 */
export function parseConfigObject(value: unknown, source = CONFIG_FILE_NAME): ShcovConfig {
  if (!isRecord(value)) {
    warn(`Ignoring ${source}: expected a JSON object`)
    return {}
  }

  const config: ShcovConfig = {}
  const invalid = (key: string) => warn(`Ignoring invalid "${key}" in ${source}`)

  for (const key of ['debug', 'log', 'timing'] as const) {
    const item = value[key]
    if (item === undefined) continue
    if (typeof item === 'boolean') config[key] = item
    else invalid(key)
  }
  if (value.shell !== undefined) {
    if (typeof value.shell === 'string' && value.shell.length > 0) config.shell = value.shell
    else invalid('shell')
  }

  const coverage = value.coverage
  if (coverage === undefined) return config
  if (!isRecord(coverage)) {
    invalid('coverage')
    return config
  }

  const options: CoverageOptions = {}
  for (const key of ['enabled', 'retainTraceOnDebug', 'countIgnoredLines'] as const) {
    const item = coverage[key]
    if (item === undefined) continue
    if (typeof item === 'boolean') options[key] = item
    else invalid(`coverage.${key}`)
  }
  if (coverage.minimumPercent !== undefined) {
    if (typeof coverage.minimumPercent === 'number') options.minimumPercent = coverage.minimumPercent
    else invalid('coverage.minimumPercent')
  }
  for (const key of ['include', 'exclude'] as const) {
    const item = coverage[key]
    if (item === undefined) continue
    if (isStringArray(item)) options[key] = item
    else invalid(`coverage.${key}`)
  }
  if (coverage.reporters !== undefined) {
    const reporters = coverage.reporters
    if (isStringArray(reporters) && reporters.every(isReporterType)) options.reporters = reporters
    else invalid('coverage.reporters')
  }
  if (coverage.outputDir !== undefined) {
    if (typeof coverage.outputDir === 'string') options.outputDir = coverage.outputDir
    else invalid('coverage.outputDir')
  }

  config.coverage = options
  return config
}

// Cache for the parsed config file
let cachedFileConfig: ShcovConfig | null = null
let cachedConfigPath: string | null = null

/**
 * Read and validate a config file. Missing or unparseable files yield {}.
 */
export async function readConfigFile(configPath: string): Promise<ShcovConfig> {
  if (cachedFileConfig && cachedConfigPath === configPath) {
    return cachedFileConfig
  }

  let fileConfig: ShcovConfig = {}
  try {
    const content = await readFile(configPath, 'utf-8')
    const parsed = safeJsonParse(content, configPath)
    fileConfig = parsed === null ? {} : parseConfigObject(parsed, configPath)
  } catch (err) {
    // No config file is the common case
    log(`No config loaded from ${configPath}: ${formatError(err)}`)
  }

  cachedFileConfig = fileConfig
  cachedConfigPath = configPath
  return fileConfig
}

export interface LoadConfigOptions {
  /** Explicit config file (default: shcov.config.json in cwd) */
  configPath?: string
  cwd?: string
  env?: NodeJS.ProcessEnv
  /**
   * Options from the command line; they win over every other source, except
   * `coverage.exclude`, which adds to the excludes resolved from the others
   */
  overrides?: ShcovConfig
}

/**
 * Load the effective configuration
 */
export async function loadShcovConfig(options: LoadConfigOptions = {}): Promise<ResolvedShcovConfig> {
  const cwd = options.cwd ?? process.cwd()
  const configPath = options.configPath ? resolve(cwd, options.configPath) : join(cwd, CONFIG_FILE_NAME)

  const fileConfig = await readConfigFile(configPath)
  const envConfig = configFromEnv(options.env ?? process.env)

  const base = mergeConfig(fileConfig, envConfig)
  const overrides = options.overrides ?? {}
  const resolved = resolveShcovConfig(mergeConfig(base, overrides))

  const extraExclude = overrides.coverage?.exclude
  if (extraExclude) {
    const baseExclude = resolveShcovConfig(base).coverage.exclude
    resolved.coverage.exclude = [...new Set([...baseExclude, ...extraExclude])]
  }
  return resolved
}

/**
 * Clear cached configuration (useful for testing)
 */
export function clearConfigCache(): void {
  cachedFileConfig = null
  cachedConfigPath = null
}

/**
 * Normalize path separators for cross-platform compatibility
 */
export function normalizePath(filepath: string): string {
  return filepath.replace(/\\/g, '/')
}

