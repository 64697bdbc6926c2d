/**
 * Coverage Engine
 *
 * Runs once after the test script has exited:
 * registry → correlator → per file: classify, dedupe, expand heredocs, compute.
 */

import { readFile } from 'node:fs/promises'
import { relative } from 'node:path'
import { glob } from 'glob'
import { minimatch } from 'minimatch'
import type { CoverageReport, FileCoverageResult, SymbolDeclaration } from '../types.js'
import { normalizePath } from '../utils/config.js'
import { log, debug, warn, createTimer, formatError } from '../utils/logger.js'
import { classifySource } from './classifier.js'
import { SymbolRegistry } from './registry.js'
import { correlateTrace, coveredLinesOf, createFileTrace } from './trace.js'
import { expandHeredocs } from './heredoc.js'
import { computeFileCoverage, coveragePercent } from './calculator.js'

export interface EngineOptions {
  minimumPercent: number
  countIgnoredLines: boolean
  /** Globs of files to report even if none of their functions were declared */
  include: string[]
  /** Globs of files never to report */
  exclude: string[]
}

export interface CollectCoverageInput {
  /** Full text of the trace log */
  trace: string
  declarations: SymbolDeclaration[]
  harnessFile: string
  specFile: string
  /** Working directory of the traced process */
  cwd?: string
  options: EngineOptions
  readSource?: (file: string) => Promise<string>
}

const readSourceFile = (file: string): Promise<string> => readFile(file, 'utf-8')

function isExcluded(file: string, cwd: string, patterns: string[]): boolean {
  const relativeFile = normalizePath(relative(cwd, file))
  const absoluteFile = normalizePath(file)
  return patterns.some(
    (pattern) => minimatch(relativeFile, pattern, { dot: true }) || minimatch(absoluteFile, pattern, { dot: true })
  )
}

/**
 * Files to report: those declaring subject symbols plus include matches,
 * minus exclude matches, the harness and the test script
 */
export async function resolveReportFiles(
  registry: SymbolRegistry,
  cwd: string,
  options: Pick<EngineOptions, 'include' | 'exclude'>
): Promise<string[]> {
  const files = new Set(registry.subjectFiles())

  if (options.include.length > 0) {
    const matches = await glob(options.include, {
      cwd,
      absolute: true,
      nodir: true,
      ignore: options.exclude,
    })
    for (const match of matches) files.add(match)
  }

  files.delete(registry.harnessFile)
  files.delete(registry.specFile)

  return [...files].filter((file) => !isExcluded(file, cwd, options.exclude)).sort()
}

/**
 * Compute the coverage report. A file that cannot be read is reported as
 * errored; the others are still measured.
 */
export async function collectCoverage(input: CollectCoverageInput): Promise<CoverageReport> {
  const { options, cwd = process.cwd(), readSource = readSourceFile } = input
  const endTimer = createTimer('coverage')

  const registry = SymbolRegistry.fromDeclarations(input.declarations, {
    harnessFile: input.harnessFile,
    specFile: input.specFile,
  })
  const unresolved = registry.unresolved()
  if (unresolved.length > 0) {
    debug(`Symbols without a source location (not measured): ${unresolved.join(', ')}`)
  }

  const correlation = correlateTrace(input.trace, { registry, cwd })
  log(`Trace: ${correlation.files.size} file(s), ${correlation.excluded} harness/test records, ${correlation.skipped} skipped lines`)
  if (input.declarations.length === 0 && correlation.files.size > 0) {
    warn(
      `The trace has records from ${correlation.files.size} file(s) but no function declarations were recorded; ` +
        'no file can be reported'
    )
  }

  const reportFiles = await resolveReportFiles(registry, cwd, options)
  const untracked = [...correlation.files.keys()].filter((file) => !reportFiles.includes(file))
  if (untracked.length > 0) {
    debug(`Traced files outside the report: ${untracked.join(', ')}`)
  }

  const files: FileCoverageResult[] = []
  for (const file of reportFiles) {
    let text: string
    try {
      text = await readSource(file)
    } catch (err) {
      files.push({ status: 'error', file, error: formatError(err) })
      continue
    }

    const classification = classifySource(text)
    for (const issue of classification.issues) {
      debug(`  ${file}:${issue.line}: ${issue.message}`)
    }

    const trace = correlation.files.get(file) ?? createFileTrace()
    const covered = expandHeredocs(classification.heredocs, coveredLinesOf(trace))
    files.push(
      computeFileCoverage(
        { file, classification, coveredLines: covered, trace, functions: registry.symbolsIn(file) },
        options
      )
    )
  }

  let linesToCover = 0
  let coveredCount = 0
  let erroredFiles = 0
  let meetsMinimum = true
  for (const result of files) {
    if (result.status === 'error') {
      erroredFiles++
      continue
    }
    linesToCover += result.linesToCover
    coveredCount += result.coveredCount
    if (!result.meetsMinimum) meetsMinimum = false
  }

  endTimer()

  return {
    files,
    totals: {
      files: files.length,
      erroredFiles,
      linesToCover,
      coveredCount,
      percent: coveragePercent(coveredCount, linesToCover),
    },
    minimumPercent: options.minimumPercent,
    meetsMinimum,
    skippedTraceLines: correlation.skipped,
    excludedTraceLines: correlation.excluded,
  }
}
