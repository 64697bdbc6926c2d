/**
 * Shared types for shcov
 */

/**
 * 1-based line number within a source file
 */
export type LineNo = number

/**
 * Heredoc found by the classifier. `bodyEnd` is the terminator line, or the
 * last line of the file when the terminator never appears.
 */
export interface Heredoc {
  start: LineNo
  terminator: string
  bodyEnd: LineNo
  unterminated: boolean
}

export type ClassifierIssueType =
  | 'unterminated-heredoc'
  | 'unmatched-ignore'
  | 'stray-ignore-close'
  | 'nested-ignore'

export interface ClassifierIssue {
  type: ClassifierIssueType
  line: LineNo
  message: string
}

/**
 * Static classification of one source file. The sets may overlap.
 */
export interface LineClassification {
  totalLines: number
  blankOrComment: Set<LineNo>
  structural: Set<LineNo>
  ignored: Set<LineNo>
  heredocs: Heredoc[]
  issues: ClassifierIssue[]
}

/**
 * One entry of the declared-symbol enumeration. `file` and `line` are absent
 * when the interpreter could not say where the symbol came from.
 */
export interface SymbolDeclaration {
  name: string
  file?: string
  line?: number
}

export interface ResolvedSymbol {
  name: string
  file: string
  line: LineNo
}

/**
 * A parsed xtrace record
 */
export interface TraceEvent {
  file: string
  line: LineNo
  symbol?: string
  args: string
}

/**
 * Correlated trace of one subject file
 */
export interface FileTrace {
  /** Hit count per line (the multiset of executed lines) */
  lineHits: Map<LineNo, number>
  /** Subject symbols seen executing in this file */
  symbolHits: Set<string>
}

export interface FileCoverageSuccess {
  status: 'ok'
  file: string
  totalLines: number
  /** Lines of code: not blank, comment or structural */
  linesOfCode: number
  measurableLines: Set<LineNo>
  ignoredLines: Set<LineNo>
  coveredLines: Set<LineNo>
  uncoveredLines: LineNo[]
  /** Size of the percentage denominator */
  linesToCover: number
  /** Covered lines counted toward the percentage */
  coveredCount: number
  percent: number
  meetsMinimum: boolean
  classification: LineClassification
  trace: FileTrace
  /** Subject functions declared in this file */
  functions: ResolvedSymbol[]
}

export interface FileCoverageError {
  status: 'error'
  file: string
  error: string
}

export type FileCoverageResult = FileCoverageSuccess | FileCoverageError

export interface CoverageTotals {
  files: number
  erroredFiles: number
  linesToCover: number
  coveredCount: number
  percent: number
}

export interface CoverageReport {
  files: FileCoverageResult[]
  totals: CoverageTotals
  minimumPercent: number
  /** True when every successfully measured file met the minimum */
  meetsMinimum: boolean
  /** Trace records that did not match the record pattern */
  skippedTraceLines: number
  /** Trace records that belonged to the harness or the test script */
  excludedTraceLines: number
}

/**
 * Istanbul reporters shcov can write
 */
export type ReporterType = 'html' | 'lcov' | 'json' | 'json-summary' | 'text-summary' | 'cobertura'
