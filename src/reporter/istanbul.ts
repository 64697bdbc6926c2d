/**
 * Istanbul export
 *
 * Converts shcov results to istanbul coverage data so the standard
 * reporters (lcov, html, json, cobertura, ...) can be written. Each
 * measured, non-ignored line becomes one statement; each subject function
 * declared in the file becomes one function entry.
 */

import { mkdir } from 'node:fs/promises'
import libCoverage from 'istanbul-lib-coverage'
import type { CoverageMap, FileCoverageData, Range } from 'istanbul-lib-coverage'
import type { Watermarks } from 'istanbul-lib-report'
import type { CoverageReport, FileCoverageSuccess, LineNo, ReporterType } from '../types.js'
import { warn, log, formatError } from '../utils/logger.js'

/**
 * Watermarks used for html and text reporters
 */
export const DEFAULT_WATERMARKS: Watermarks = {
  statements: [50, 80],
  functions: [50, 80],
  branches: [50, 80],
  lines: [50, 80],
}

function lineRange(line: LineNo): Range {
  return { start: { line, column: 0 }, end: { line, column: 0 } }
}

/**
 * Istanbul data for one successfully measured file
 */
export function toFileCoverageData(result: FileCoverageSuccess): FileCoverageData {
  const data: FileCoverageData = {
    path: result.file,
    statementMap: {},
    fnMap: {},
    branchMap: {},
    s: {},
    f: {},
    b: {},
  }

  const statementLines = [...result.measurableLines]
    .filter((line) => !result.ignoredLines.has(line))
    .sort((a, b) => a - b)

  statementLines.forEach((line, index) => {
    const key = String(index)
    const hits = result.trace.lineHits.get(line) ?? 0
    data.statementMap[key] = lineRange(line)
    // Heredoc bodies are covered without being traced
    data.s[key] = result.coveredLines.has(line) ? Math.max(hits, 1) : 0
  })

  result.functions.forEach((symbol, index) => {
    const key = String(index)
    data.fnMap[key] = {
      name: symbol.name,
      decl: lineRange(symbol.line),
      loc: lineRange(symbol.line),
      line: symbol.line,
    }
    data.f[key] = result.trace.symbolHits.has(symbol.name) ? 1 : 0
  })

  return data
}

/**
 * Coverage map of every readable file in the report
 */
export function toCoverageMap(report: CoverageReport): CoverageMap {
  const map = libCoverage.createCoverageMap({})
  for (const result of report.files) {
    if (result.status === 'ok') {
      map.addFileCoverage(toFileCoverageData(result))
    }
  }
  return map
}

export interface IstanbulReportOptions {
  outputDir: string
  reporters: ReporterType[]
}

/**
 * Write istanbul reports. A failing reporter is reported and skipped.
 * Returns the reporters that were written.
 */
export async function writeIstanbulReports(report: CoverageReport, options: IstanbulReportOptions): Promise<ReporterType[]> {
  if (options.reporters.length === 0) return []

  // Loaded on demand; most runs only print to the console
  const libReport = await import('istanbul-lib-report')
  const reports = await import('istanbul-reports')

  await mkdir(options.outputDir, { recursive: true })

  const context = libReport.default.createContext({
    dir: options.outputDir,
    coverageMap: toCoverageMap(report),
    watermarks: DEFAULT_WATERMARKS,
  })

  const written: ReporterType[] = []
  for (const reporter of options.reporters) {
    try {
      reports.default.create(reporter).execute(context)
      written.push(reporter)
    } catch (err) {
      warn(`Failed to generate ${reporter} report: ${formatError(err)}`)
    }
  }

  log(`Istanbul reports (${written.join(', ')}) written to ${options.outputDir}`)
  return written
}
