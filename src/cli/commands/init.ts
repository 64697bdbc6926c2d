/**
 * shcov init command
 *
 * Writes a shcov.config.json for the current project.
 */

import { existsSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { input, checkbox, confirm } from '@inquirer/prompts'
import type { ReporterType } from '../../types.js'
import {
  CONFIG_FILE_NAME,
  DEFAULT_COVERAGE_OPTIONS,
  REPORTER_TYPES,
  clampPercent,
  type ShcovConfig,
} from '../../utils/config.js'

export const INIT_HELP = `
Usage: shcov init [options]

Create ${CONFIG_FILE_NAME} in the current directory.

Options:
  -y, --yes             Skip prompts and use defaults
  --force               Overwrite an existing ${CONFIG_FILE_NAME}
  --help                Show this help message

Examples:
  shcov init             # Interactive mode
  shcov init -y          # Use defaults, no prompts
`

export interface InitOptions {
  force: boolean
  interactive: boolean
}

export interface InitParseResult {
  options?: InitOptions
  error?: string
  showHelp?: boolean
}

export interface InitAnswers {
  minimumPercent: number
  reporters: ReporterType[]
  outputDir: string
  countIgnoredLines: boolean
  retainTraceOnDebug: boolean
}

export interface InitResult {
  success: boolean
  error?: string
  /** Path of the written config file */
  path?: string
  config?: ShcovConfig
}

export const DEFAULT_INIT_ANSWERS: InitAnswers = {
  minimumPercent: 80,
  reporters: ['text-summary', 'lcov'],
  outputDir: DEFAULT_COVERAGE_OPTIONS.outputDir,
  countIgnoredLines: DEFAULT_COVERAGE_OPTIONS.countIgnoredLines,
  retainTraceOnDebug: DEFAULT_COVERAGE_OPTIONS.retainTraceOnDebug,
}

export function parseInitArgs(args: string[]): InitParseResult {
  if (args.includes('--help') || args.includes('-h')) {
    return { showHelp: true }
  }

  let force = false
  let interactive = true

  for (const arg of args) {
    if (arg === '--force') {
      force = true
    } else if (arg === '-y' || arg === '--yes') {
      interactive = false
    } else if (arg.startsWith('-')) {
      return { error: `Unknown option: ${arg}`, showHelp: true }
    } else {
      return { error: `Unexpected argument: ${arg}`, showHelp: true }
    }
  }

  return { options: { force, interactive } }
}

function validatePercent(value: string): true | string {
  const percent = Number(value)
  if (value.trim() === '' || Number.isNaN(percent) || percent < 0 || percent > 100) {
    return 'Enter a number between 0 and 100'
  }
  return true
}

/**
 * Run interactive prompts to get the config answers
 */
export async function promptForAnswers(defaults: InitAnswers): Promise<InitAnswers> {
  console.log('\n📊 shcov init\n')

  const minimumPercent = await input({
    message: 'Minimum coverage per file (%)',
    default: String(defaults.minimumPercent),
    validate: validatePercent,
  })

  const reporters = await checkbox<ReporterType>({
    message: 'Istanbul reports to write',
    choices: REPORTER_TYPES.map((value) => ({ name: value, value, checked: defaults.reporters.includes(value) })),
  })

  const outputDir = reporters.length > 0
    ? await input({ message: 'Report output directory', default: defaults.outputDir })
    : defaults.outputDir

  const countIgnoredLines = await confirm({
    message: 'Count "# critic ignore" regions in the percentage denominator?',
    default: defaults.countIgnoredLines,
  })

  const retainTraceOnDebug = await confirm({
    message: 'Keep the trace file when DEBUG is set?',
    default: defaults.retainTraceOnDebug,
  })

  return {
    minimumPercent: clampPercent(Number(minimumPercent)),
    reporters,
    outputDir,
    countIgnoredLines,
    retainTraceOnDebug,
  }
}

export function buildConfig(answers: InitAnswers): ShcovConfig {
  return {
    coverage: {
      minimumPercent: answers.minimumPercent,
      reporters: answers.reporters,
      outputDir: answers.outputDir,
      countIgnoredLines: answers.countIgnoredLines,
      retainTraceOnDebug: answers.retainTraceOnDebug,
      exclude: DEFAULT_COVERAGE_OPTIONS.exclude,
    },
  }
}

/**
 * Execute the init command
 */
export async function executeInit(options: InitOptions): Promise<InitResult> {
  const path = join(process.cwd(), CONFIG_FILE_NAME)

  if (existsSync(path) && !options.force) {
    console.error(`❌ ${CONFIG_FILE_NAME} already exists (use --force to overwrite)`)
    return { success: false, error: `${CONFIG_FILE_NAME} already exists` }
  }

  let answers = DEFAULT_INIT_ANSWERS
  if (options.interactive) {
    answers = await promptForAnswers(DEFAULT_INIT_ANSWERS)
  } else {
    console.log('📊 shcov init\n')
  }

  const config = buildConfig(answers)
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n', 'utf-8')
  console.log(`   ✓ Created ${CONFIG_FILE_NAME}`)

  console.log('\n📝 Next steps:')
  console.log('   1. Source the scripts under test from your test script')
  console.log('   2. Run it with coverage:')
  console.log('      shcov run path/to/test-script.sh')

  return { success: true, path, config }
}
