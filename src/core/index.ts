/**
 * Core Processing Modules
 *
 * Coverage pipeline: classify → register → correlate → expand → calculate
 */

export { classifySource, splitLines, isBlankOrComment, isStructural, findIgnoredLines, findHeredocs } from './classifier.js'
export { SymbolRegistry, parseSymbolListing, type RegistryOptions } from './registry.js'
export { parseTraceLine, correlateTrace, coveredLinesOf, type CorrelateOptions, type CorrelationResult } from './trace.js'
export { expandHeredocs } from './heredoc.js'
export { computeFileCoverage, measurableLinesOf, coveragePercent, lineRange, type CalculateOptions, type FileCoverageInput } from './calculator.js'
export { collectCoverage, resolveReportFiles, type CollectCoverageInput, type EngineOptions } from './engine.js'
