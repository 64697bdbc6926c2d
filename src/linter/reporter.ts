/**
 * Console Reporter
 *
 * Formats and prints scan results to the console
 */

import chalk from 'chalk'
import type { ClassifierIssueType } from '../types.js'
import type { LintIssue, ScanResult } from './scanner.js'

export interface ReporterOptions {
  json?: boolean
}

const ISSUE_DESCRIPTIONS: Record<ClassifierIssueType, string> = {
  'unterminated-heredoc': 'Unterminated heredoc',
  'unmatched-ignore': 'Unclosed ignore region',
  'stray-ignore-close': 'Ignore close without an open',
  'nested-ignore': 'Nested ignore region',
}

function groupIssuesByFile(issues: LintIssue[]): Map<string, LintIssue[]> {
  const grouped = new Map<string, LintIssue[]>()

  for (const issue of issues) {
    const fileIssues = grouped.get(issue.file) ?? []
    fileIssues.push(issue)
    grouped.set(issue.file, fileIssues)
  }

  return grouped
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`
}

function printConsoleReport(result: ScanResult): void {
  const { issues, filesScanned, filesWithIssues } = result

  console.log('')
  console.log(chalk.bold('Shell Coverage Check'))
  console.log(chalk.gray('═'.repeat(60)))
  console.log('')

  if (issues.length === 0) {
    console.log(chalk.green('✓ No coverage issues found'))
    console.log(chalk.dim(`Scanned ${plural(filesScanned, 'file')}`))
    return
  }

  for (const [file, fileIssues] of groupIssuesByFile(issues)) {
    for (const issue of fileIssues) {
      console.log(chalk.underline(`${file}:${issue.line}`))
      console.log(chalk.yellow(`  ⚠ ${ISSUE_DESCRIPTIONS[issue.type]}: ${issue.message}`))
    }
    console.log('')
  }

  console.log(chalk.gray('─'.repeat(60)))
  console.log(chalk.yellow(`Found ${plural(issues.length, 'issue')} in ${plural(filesWithIssues, 'file')}`))
  console.log(chalk.dim(`Scanned ${plural(filesScanned, 'file')}`))
}

/**
 * Print scan results
 */
export function printReport(result: ScanResult, options: ReporterOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2))
  } else {
    printConsoleReport(result)
  }
}

/**
 * Get exit code based on results
 */
export function getExitCode(result: ScanResult, noFail: boolean): number {
  if (noFail) {
    return 0
  }
  return result.issues.length > 0 ? 1 : 0
}
