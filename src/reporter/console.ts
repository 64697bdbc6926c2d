/**
 * Console Reporter
 *
 * Prints one section per file plus a summary line
 */

import chalk from 'chalk'
import type { CoverageReport, FileCoverageResult, FileCoverageSuccess, LineNo } from '../types.js'

export interface ConsoleReporterOptions {
  /** Add the per-file debug block */
  debug?: boolean
  /** Print the report as JSON instead */
  json?: boolean
}

export interface JsonFileCoverage {
  file: string
  status: 'ok' | 'error'
  error?: string
  totalLines?: number
  linesOfCode?: number
  measurableLines?: number
  coveredLines?: number
  ignoredLines?: number
  percent?: number
  meetsMinimum?: boolean
  uncoveredLines?: LineNo[]
  coveredFunctions?: string[]
}

export interface JsonCoverageReport {
  minimumPercent: number
  meetsMinimum: boolean
  totals: CoverageReport['totals']
  files: JsonFileCoverage[]
}

function sortedLines(lines: Iterable<LineNo>): LineNo[] {
  return [...lines].sort((a, b) => a - b)
}

function formatLines(lines: Iterable<LineNo>, empty = 'none'): string {
  const sorted = sortedLines(lines)
  return sorted.length > 0 ? sorted.join(' ') : empty
}

export function toJsonFileCoverage(result: FileCoverageResult): JsonFileCoverage {
  if (result.status === 'error') {
    return { file: result.file, status: 'error', error: result.error }
  }
  return {
    file: result.file,
    status: 'ok',
    totalLines: result.totalLines,
    linesOfCode: result.linesOfCode,
    measurableLines: result.measurableLines.size,
    coveredLines: result.coveredCount,
    ignoredLines: result.ignoredLines.size,
    percent: result.percent,
    meetsMinimum: result.meetsMinimum,
    uncoveredLines: result.uncoveredLines,
    coveredFunctions: [...result.trace.symbolHits].sort(),
  }
}

export function toJsonReport(report: CoverageReport): JsonCoverageReport {
  return {
    minimumPercent: report.minimumPercent,
    meetsMinimum: report.meetsMinimum,
    totals: report.totals,
    files: report.files.map(toJsonFileCoverage),
  }
}

/**
 * Lines of one file's section, without a trailing blank line
 */
export function formatFileSection(result: FileCoverageResult, minimumPercent: number, debug = false): string[] {
  const lines = ['', chalk.cyan(result.file)]

  if (result.status === 'error') {
    lines.push(chalk.red(`  Error: ${result.error}`))
    return lines
  }

  const percentColor = result.percent < minimumPercent ? chalk.red : chalk.green
  lines.push(
    chalk.magenta(`  Total LOC: ${result.linesOfCode}`),
    chalk.green(`  Covered LOC: ${result.coveredCount}`),
    chalk.yellow(`  Ignored LOC: ${result.ignoredLines.size}`),
    percentColor(`  Coverage %: ${result.percent}`),
    `  Uncovered Lines: ${formatLines(result.uncoveredLines)}`
  )

  if (debug) {
    lines.push(...formatDebugBlock(result))
  }
  return lines
}

function formatDebugBlock(result: FileCoverageSuccess): string[] {
  const { classification } = result
  const excluded = new Set([...classification.blankOrComment, ...classification.structural])
  const lines = [
    '',
    chalk.dim('  Debug info'),
    chalk.dim(`    # lines in file: ${result.totalLines}`),
    chalk.dim(`    # lines of code: ${result.linesOfCode}`),
    chalk.dim(`    Empty lines: ${formatLines(excluded, '')}`),
    chalk.dim(`    Ignored lines: ${formatLines(result.ignoredLines, '')}`),
    chalk.dim(`    Covered lines: ${formatLines(result.coveredLines, '')}`),
  ]
  for (const heredoc of classification.heredocs) {
    lines.push(chalk.dim(`    Heredoc ${heredoc.terminator}: ${heredoc.start}-${heredoc.bodyEnd}`))
  }
  for (const issue of classification.issues) {
    lines.push(chalk.yellow(`    ⚠ line ${issue.line}: ${issue.message}`))
  }
  return lines
}

function printConsoleReport(report: CoverageReport, options: ConsoleReporterOptions): void {
  console.log('')
  console.log(chalk.magenta('[shcov] Coverage Report'))

  if (report.files.length === 0) {
    console.log('')
    console.log(chalk.dim('No source files to report. Only functions declared outside the test script are measured.'))
    return
  }

  for (const result of report.files) {
    for (const line of formatFileSection(result, report.minimumPercent, options.debug)) {
      console.log(line)
    }
  }

  const { totals } = report
  console.log('')
  console.log(chalk.bold(`All files: ${totals.percent}% (${totals.coveredCount}/${totals.linesToCover} lines)`))
  if (totals.erroredFiles > 0) {
    console.log(chalk.red(`${totals.erroredFiles} file${totals.erroredFiles === 1 ? '' : 's'} could not be read`))
  }

  const below = report.files.filter((result) => result.status === 'ok' && !result.meetsMinimum)
  if (below.length > 0) {
    console.log(chalk.red(`Coverage below the minimum of ${report.minimumPercent}% in:`))
    for (const result of below) {
      console.log(chalk.red(`  ${result.file}`))
    }
  }
}

/**
 * Print the coverage report
 */
export function printCoverageReport(report: CoverageReport, options: ConsoleReporterOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify(toJsonReport(report), null, 2))
  } else {
    printConsoleReport(report, options)
  }
}

/**
 * 1 when any measured file is below the configured minimum
 */
export function getCoverageExitCode(report: CoverageReport): number {
  return report.meetsMinimum ? 0 : 1
}
