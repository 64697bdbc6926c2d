/**
 * Coverage calculation for one file
 *
 *   measurable = all lines − blank/comment − structural
 *   uncovered  = measurable − ignored − covered
 *
 * By default ignored lines are exempt: the denominator is
 * `measurable − ignored` and only covered lines inside it count.
 * With `countIgnoredLines` the denominator is `measurable ∪ ignored` and
 * the numerator `covered ∩ measurable`, so an ignored region lowers the
 * percentage and only disappears from the uncovered listing.
 */

import type { FileCoverageSuccess, FileTrace, LineClassification, LineNo, ResolvedSymbol } from '../types.js'

export interface FileCoverageInput {
  file: string
  classification: LineClassification
  /** Covered lines after heredoc expansion */
  coveredLines: ReadonlySet<LineNo>
  trace: FileTrace
  functions?: ResolvedSymbol[]
}

export interface CalculateOptions {
  minimumPercent: number
  countIgnoredLines: boolean
}

export function lineRange(count: number): LineNo[] {
  return Array.from({ length: count }, (_, index) => index + 1)
}

/**
 * Lines eligible for coverage: neither blank, comment nor structural
 */
export function measurableLinesOf(classification: LineClassification): Set<LineNo> {
  const { blankOrComment, structural } = classification
  return new Set(
    lineRange(classification.totalLines).filter((line) => !blankOrComment.has(line) && !structural.has(line))
  )
}

/**
 * Integer percentage; 100 when there is nothing to cover
 */
export function coveragePercent(covered: number, total: number): number {
  if (total === 0) return 100
  return Math.floor((covered * 100) / total)
}

export function computeFileCoverage(input: FileCoverageInput, options: CalculateOptions): FileCoverageSuccess {
  const { file, classification, coveredLines, trace, functions = [] } = input
  const measurable = measurableLinesOf(classification)
  const ignored = classification.ignored

  const denominator = new Set<LineNo>()
  for (const line of measurable) {
    if (options.countIgnoredLines || !ignored.has(line)) denominator.add(line)
  }
  if (options.countIgnoredLines) {
    for (const line of ignored) denominator.add(line)
  }

  const countable = options.countIgnoredLines ? measurable : denominator
  let coveredCount = 0
  for (const line of coveredLines) {
    if (countable.has(line)) coveredCount++
  }

  const uncoveredLines = [...measurable]
    .filter((line) => !ignored.has(line) && !coveredLines.has(line))
    .sort((a, b) => a - b)

  const percent = coveragePercent(coveredCount, denominator.size)

  return {
    status: 'ok',
    file,
    totalLines: classification.totalLines,
    linesOfCode: classification.totalLines - classification.blankOrComment.size,
    measurableLines: measurable,
    ignoredLines: ignored,
    coveredLines: new Set(coveredLines),
    uncoveredLines,
    linesToCover: denominator.size,
    coveredCount,
    percent,
    meetsMinimum: percent >= options.minimumPercent,
    classification,
    trace,
    functions,
  }
}
