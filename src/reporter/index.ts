/**
 * Reporters
 */

export {
  printCoverageReport,
  formatFileSection,
  getCoverageExitCode,
  toJsonReport,
  toJsonFileCoverage,
  type ConsoleReporterOptions,
  type JsonCoverageReport,
  type JsonFileCoverage,
} from './console.js'

export {
  writeIstanbulReports,
  toCoverageMap,
  toFileCoverageData,
  DEFAULT_WATERMARKS,
  type IstanbulReportOptions,
} from './istanbul.js'

export { publishReport, type PublishOptions } from './publish.js'
