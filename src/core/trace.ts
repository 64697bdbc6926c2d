/**
 * Trace Correlator
 *
 * Reads the xtrace log written through the harness' PS4
 *   (${BASH_SOURCE}:${LINENO}):${FUNCNAME[0]:+${FUNCNAME[0]}():}
 * and groups executed lines and subject symbols by file.
 */

import { isAbsolute, resolve } from 'node:path'
import type { FileTrace, LineNo, TraceEvent } from '../types.js'
import type { SymbolRegistry } from './registry.js'

// Bash repeats the first PS4 character once per level of indirection
const TRACE_RECORD = /^\(+(.+?):(\d+)\):(?:(\S+?)\(\):)?(.*)$/

/**
 * Parse one trace record; anything that is not a record yields null
 */
export function parseTraceLine(line: string): TraceEvent | null {
  const match = TRACE_RECORD.exec(line.endsWith('\r') ? line.slice(0, -1) : line)
  if (!match) return null

  const [, file, lineNo, symbol, args] = match
  const event: TraceEvent = { file, line: Number(lineNo), args: args.trimStart() }
  if (symbol !== undefined && symbol !== '') {
    event.symbol = symbol
  }
  return event
}

export interface CorrelateOptions {
  registry: SymbolRegistry
  /** Directory relative trace paths are resolved against */
  cwd?: string
}

export interface CorrelationResult {
  files: Map<string, FileTrace>
  /** Lines that were not trace records */
  skipped: number
  /** Records from the harness or the test script */
  excluded: number
}

export function createFileTrace(): FileTrace {
  return { lineHits: new Map(), symbolHits: new Set() }
}

/**
 * Correlate a whole trace log. Record order does not matter.
 */
export function correlateTrace(text: string, options: CorrelateOptions): CorrelationResult {
  const { registry, cwd = process.cwd() } = options
  const files = new Map<string, FileTrace>()
  let skipped = 0
  let excluded = 0

  for (const line of text.split('\n')) {
    if (line === '') continue

    const event = parseTraceLine(line)
    if (!event) {
      skipped++
      continue
    }

    const file = isAbsolute(event.file) ? resolve(event.file) : resolve(cwd, event.file)
    if (file === registry.harnessFile || file === registry.specFile) {
      excluded++
      continue
    }

    let trace = files.get(file)
    if (!trace) {
      trace = createFileTrace()
      files.set(file, trace)
    }

    trace.lineHits.set(event.line, (trace.lineHits.get(event.line) ?? 0) + 1)
    if (event.symbol !== undefined && registry.isSubject(event.symbol)) {
      trace.symbolHits.add(event.symbol)
    }
  }

  return { files, skipped, excluded }
}

/**
 * Executed lines of a file, each once however often it ran
 */
export function coveredLinesOf(trace: FileTrace): Set<LineNo> {
  const covered = new Set<LineNo>()
  for (const [line, hits] of trace.lineHits) {
    if (hits > 0) covered.add(line)
  }
  return covered
}
