/**
 * shcov - Line coverage for bash scripts
 *
 * Programmatic API. Most users should run the CLI instead:
 *   shcov run test/test-lib.sh
 */

// ============================================================================
// Configuration
// ============================================================================
export {
  type ShcovConfig,
  type ResolvedShcovConfig,
  type CoverageOptions,
  type ResolvedCoverageOptions,
  resolveShcovConfig,
  loadShcovConfig,
  clearConfigCache,
  CONFIG_FILE_NAME,
  DEFAULT_SHCOV_CONFIG,
  DEFAULT_COVERAGE_OPTIONS,
} from './utils/config.js'

// ============================================================================
// Coverage engine
// ============================================================================
export {
  classifySource,
  SymbolRegistry,
  parseSymbolListing,
  parseTraceLine,
  correlateTrace,
  expandHeredocs,
  computeFileCoverage,
  collectCoverage,
  type CollectCoverageInput,
  type EngineOptions,
} from './core/index.js'

// ============================================================================
// Running and reporting
// ============================================================================
export {
  runScript,
  HARNESS_FILE,
  TraceArtifact,
  createTraceArtifact,
  withTraceArtifact,
  type RunScriptOptions,
  type RunScriptResult,
  type TraceArtifactOptions,
} from './runner/index.js'

export {
  printCoverageReport,
  getCoverageExitCode,
  toJsonReport,
  writeIstanbulReports,
  publishReport,
  type JsonCoverageReport,
} from './reporter/index.js'

// ============================================================================
// Common Types
// ============================================================================
export type {
  LineNo,
  Heredoc,
  ClassifierIssue,
  LineClassification,
  SymbolDeclaration,
  ResolvedSymbol,
  TraceEvent,
  FileTrace,
  FileCoverageResult,
  FileCoverageSuccess,
  FileCoverageError,
  CoverageTotals,
  CoverageReport,
  ReporterType,
} from './types.js'
