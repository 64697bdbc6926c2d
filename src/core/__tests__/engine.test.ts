import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { collectCoverage, resolveReportFiles, type CollectCoverageInput } from '../engine.js'
import { SymbolRegistry } from '../registry.js'
import { setDebug, setLogging } from '../../utils/logger.js'
import type { FileCoverageSuccess } from '../../types.js'

const CWD = '/project'
const HARNESS = '/opt/shcov/harness/shcov-harness.sh'
const SPEC = '/project/test/test-lib.sh'
const LIB = '/project/lib/lib.sh'
const UTIL = '/project/lib/util.sh'

// Scenario file: shebang, comment, 8 commands
const LIB_SOURCE = [
  '#!/usr/bin/env bash',
  '# helpers under test',
  'name=world',
  'echo "$name"',
  'echo 5',
  'echo 6',
  'echo 7',
  'echo 8',
  'echo 9',
  'echo 10',
].join('\n')

// Heredoc on line 12, terminator on line 16
const UTIL_SOURCE = [
  '#!/usr/bin/env bash',
  '',
  'usage() {',
  '  echo "usage"',
  '}',
  '',
  'render() {',
  '  local who=$1',
  '  echo "rendering $who"',
  '  # critic ignore',
  '  echo "never in tests"',
  '  cat <<EOF',
  'Hello, $who',
  'Welcome back',
  '',
  'EOF',
  '}',
].join('\n')

const SOURCES = new Map([
  [LIB, LIB_SOURCE],
  [UTIL, UTIL_SOURCE],
])

async function readSource(file: string): Promise<string> {
  const source = SOURCES.get(file)
  if (source === undefined) {
    throw new Error(`ENOENT: no such file or directory, open '${file}'`)
  }
  return source
}

function input(trace: string[], overrides: Partial<CollectCoverageInput> = {}): CollectCoverageInput {
  return {
    trace: trace.join('\n'),
    declarations: [
      { name: 'lib_main', file: LIB, line: 3 },
      { name: 'usage', file: UTIL, line: 3 },
      { name: 'render', file: UTIL, line: 7 },
      { name: 'test_render', file: SPEC, line: 5 },
    ],
    harnessFile: HARNESS,
    specFile: SPEC,
    cwd: CWD,
    options: { minimumPercent: 0, countIgnoredLines: false, include: [], exclude: [] },
    readSource,
    ...overrides,
  }
}

function fileResult(results: Awaited<ReturnType<typeof collectCoverage>>, file: string): FileCoverageSuccess {
  const result = results.files.find((entry) => entry.file === file)
  if (!result || result.status !== 'ok') {
    throw new Error(`no coverage for ${file}`)
  }
  return result
}

const LIB_TRACE = ['(/project/lib/lib.sh:3):name=world', '(/project/lib/lib.sh:4):echo world', '(lib/lib.sh:5):echo 5']

const UTIL_TRACE = [
  '(/project/lib/util.sh:8):render():local who=sam',
  '(/project/lib/util.sh:9):render():echo \'rendering sam\'',
  '(/project/lib/util.sh:12):render():cat',
]

describe('collectCoverage', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>

  beforeEach(() => {
    setLogging(false)
    setDebug(false)
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    consoleLogSpy.mockRestore()
  })

  it('should compute the percentage of a plain file', async () => {
    const report = await collectCoverage(input(LIB_TRACE))
    const lib = fileResult(report, LIB)

    expect(lib.measurableLines.size).toBe(8)
    expect(lib.coveredCount).toBe(3)
    expect(lib.percent).toBe(37)
    expect(lib.uncoveredLines).toEqual([6, 7, 8, 9, 10])
  })

  it('should leave ignored lines out of the uncovered listing', async () => {
    const report = await collectCoverage(input(UTIL_TRACE))
    const util = fileResult(report, UTIL)

    // The region opened on line 10 is never closed
    expect(util.ignoredLines).toEqual(new Set([10, 11, 12, 13, 14, 15, 16, 17]))
    expect(util.uncoveredLines).toEqual([4])
  })

  it('should cover the body of an executed heredoc', async () => {
    const source = UTIL_SOURCE.replace('  # critic ignore\n', '  # critic ignore\n  # critic /ignore\n')
    const report = await collectCoverage(
      input(
        [
          '(/project/lib/util.sh:8):render():local who=sam',
          '(/project/lib/util.sh:9):render():echo \'rendering sam\'',
          '(/project/lib/util.sh:13):render():cat',
        ],
        { readSource: async (file) => (file === UTIL ? source : LIB_SOURCE) }
      )
    )
    const util = fileResult(report, UTIL)

    expect(util.classification.heredocs).toEqual([{ start: 13, terminator: 'EOF', bodyEnd: 17, unterminated: false }])
    expect(util.coveredLines).toEqual(new Set([8, 9, 13, 14, 15, 16, 17]))
    expect(util.uncoveredLines).toEqual([4, 12])
  })

  it('should ignore malformed trace lines', async () => {
    const clean = await collectCoverage(input([...LIB_TRACE, ...UTIL_TRACE]))
    const noisy = await collectCoverage(
      input([LIB_TRACE[0], 'garbage text with no structure', ...LIB_TRACE.slice(1), ...UTIL_TRACE])
    )

    expect(noisy.files).toEqual(clean.files)
    expect(noisy.totals).toEqual(clean.totals)
    expect(noisy.skippedTraceLines).toBe(1)
    expect(clean.skippedTraceLines).toBe(0)
  })

  it('should count a line executed many times once', async () => {
    const report = await collectCoverage(input([...LIB_TRACE, LIB_TRACE[1], LIB_TRACE[1], LIB_TRACE[1]]))
    const lib = fileResult(report, LIB)

    expect(lib.trace.lineHits.get(4)).toBe(4)
    expect(lib.coveredCount).toBe(3)
    expect(lib.percent).toBe(37)
  })

  it('should warn when the trace has records but no declarations were dumped', async () => {
    const report = await collectCoverage(input([...LIB_TRACE, ...UTIL_TRACE], { declarations: [] }))

    expect(report.files).toEqual([])
    expect(consoleLogSpy).toHaveBeenCalledWith(
      'The trace has records from 2 file(s) but no function declarations were recorded; no file can be reported'
    )
  })

  it('should not warn about an empty dump when nothing outside the test script ran', async () => {
    await collectCoverage(input(['(test/test-lib.sh:6):echo ok'], { declarations: [] }))

    expect(consoleLogSpy).not.toHaveBeenCalled()
  })

  it('should not report the harness or the test script', async () => {
    const report = await collectCoverage(
      input([
        '(/opt/shcov/harness/shcov-harness.sh:41):source /project/test/test-lib.sh',
        '(test/test-lib.sh:6):test_render():render sam',
        ...LIB_TRACE,
      ])
    )

    expect(report.files.map((file) => file.file)).toEqual([LIB, UTIL])
    expect(report.excludedTraceLines).toBe(2)
  })

  it('should record which subject functions ran', async () => {
    const report = await collectCoverage(input(UTIL_TRACE))
    const util = fileResult(report, UTIL)

    expect(util.trace.symbolHits).toEqual(new Set(['render']))
    expect(util.functions.map((fn) => fn.name)).toEqual(['usage', 'render'])
  })

  it('should report an unreadable file as errored and measure the rest', async () => {
    const report = await collectCoverage(
      input(LIB_TRACE, {
        declarations: [
          { name: 'lib_main', file: LIB, line: 3 },
          { name: 'gone', file: '/project/lib/gone.sh', line: 1 },
        ],
      })
    )

    expect(report.files).toHaveLength(2)
    expect(report.files[0]).toEqual({
      status: 'error',
      file: '/project/lib/gone.sh',
      error: "ENOENT: no such file or directory, open '/project/lib/gone.sh'",
    })
    expect(report.totals).toEqual({ files: 2, erroredFiles: 1, linesToCover: 8, coveredCount: 3, percent: 37 })
  })

  it('should report 100% for an empty file', async () => {
    const report = await collectCoverage(
      input([], {
        declarations: [{ name: 'noop', file: '/project/lib/empty.sh', line: 1 }],
        readSource: async () => '',
      })
    )
    const empty = fileResult(report, '/project/lib/empty.sh')

    expect(empty.percent).toBe(100)
    expect(empty.meetsMinimum).toBe(true)
    expect(report.totals.percent).toBe(100)
  })

  it('should sum totals and check the minimum per file', async () => {
    const report = await collectCoverage(
      input([...LIB_TRACE, ...UTIL_TRACE], {
        options: { minimumPercent: 50, countIgnoredLines: false, include: [], exclude: [] },
      })
    )
    const util = fileResult(report, UTIL)

    expect(util.linesToCover).toBe(3)
    expect(util.coveredCount).toBe(2)
    expect(util.percent).toBe(66)
    expect(report.totals).toEqual({ files: 2, erroredFiles: 0, linesToCover: 11, coveredCount: 5, percent: 45 })
    expect(report.meetsMinimum).toBe(false)
    expect(report.minimumPercent).toBe(50)
  })

  it('should drop excluded files from the report', async () => {
    const report = await collectCoverage(
      input(LIB_TRACE, {
        options: { minimumPercent: 0, countIgnoredLines: false, include: [], exclude: ['lib/util.sh'] },
      })
    )

    expect(report.files.map((file) => file.file)).toEqual([LIB])
  })
})

describe('resolveReportFiles', () => {
  const registry = SymbolRegistry.fromDeclarations(
    [
      { name: 'a', file: LIB, line: 1 },
      { name: 'b', file: UTIL, line: 1 },
      { name: 'vendored', file: '/project/vendor/x.sh', line: 1 },
    ],
    { harnessFile: HARNESS, specFile: SPEC }
  )

  it('should list subject files sorted', async () => {
    expect(await resolveReportFiles(registry, CWD, { include: [], exclude: [] })).toEqual([
      LIB,
      UTIL,
      '/project/vendor/x.sh',
    ])
  })

  it('should match exclude globs against relative and absolute paths', async () => {
    expect(await resolveReportFiles(registry, CWD, { include: [], exclude: ['vendor/**'] })).toEqual([LIB, UTIL])
    expect(await resolveReportFiles(registry, CWD, { include: [], exclude: ['/project/lib/*.sh'] })).toEqual([
      '/project/vendor/x.sh',
    ])
  })
})
