import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { input, checkbox, confirm } from '@inquirer/prompts'
import { parseInitArgs, executeInit, buildConfig, DEFAULT_INIT_ANSWERS } from '../init.js'
import { parseConfigObject } from '../../../utils/config.js'

vi.mock('@inquirer/prompts', () => ({
  input: vi.fn(),
  checkbox: vi.fn(),
  confirm: vi.fn(),
}))

describe('parseInitArgs', () => {
  it('should default to interactive without overwriting', () => {
    expect(parseInitArgs([])).toEqual({ options: { force: false, interactive: true } })
  })

  it('should read -y and --force', () => {
    expect(parseInitArgs(['-y', '--force'])).toEqual({ options: { force: true, interactive: false } })
    expect(parseInitArgs(['--yes'])).toEqual({ options: { force: false, interactive: false } })
  })

  it('should reject unknown arguments', () => {
    expect(parseInitArgs(['--js'])).toEqual({ error: 'Unknown option: --js', showHelp: true })
    expect(parseInitArgs(['extra'])).toEqual({ error: 'Unexpected argument: extra', showHelp: true })
  })

  it('should show help', () => {
    expect(parseInitArgs(['--force', '--help'])).toEqual({ showHelp: true })
  })
})

describe('buildConfig', () => {
  it('should produce a config that loads back unchanged', () => {
    const config = buildConfig(DEFAULT_INIT_ANSWERS)

    expect(config).toEqual({
      coverage: {
        minimumPercent: 80,
        reporters: ['text-summary', 'lcov'],
        outputDir: 'coverage',
        countIgnoredLines: false,
        retainTraceOnDebug: false,
        exclude: ['**/node_modules/**', '**/.git/**'],
      },
    })
    expect(parseConfigObject(JSON.parse(JSON.stringify(config)))).toEqual(config)
  })
})

describe('executeInit', () => {
  let testDir: string
  let consoleLogSpy: ReturnType<typeof vi.spyOn>
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>

  const configFile = () => join(testDir, 'shcov.config.json')
  const readConfig = (): unknown => JSON.parse(readFileSync(configFile(), 'utf-8'))

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'shcov-init-test-'))
    vi.spyOn(process, 'cwd').mockReturnValue(testDir)
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.mocked(input).mockReset()
    vi.mocked(checkbox).mockReset()
    vi.mocked(confirm).mockReset()
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(testDir, { recursive: true, force: true })
  })

  it('should write the defaults with -y', async () => {
    const result = await executeInit({ force: false, interactive: false })

    expect(result).toEqual({ success: true, path: configFile(), config: buildConfig(DEFAULT_INIT_ANSWERS) })
    expect(readConfig()).toEqual(buildConfig(DEFAULT_INIT_ANSWERS))
    expect(input).not.toHaveBeenCalled()
    expect(consoleLogSpy).toHaveBeenCalledWith('   ✓ Created shcov.config.json')
  })

  it('should write the answers of the prompts', async () => {
    vi.mocked(input).mockResolvedValueOnce('65').mockResolvedValueOnce('reports/shell')
    vi.mocked(checkbox).mockResolvedValueOnce(['html'])
    vi.mocked(confirm).mockResolvedValueOnce(true).mockResolvedValueOnce(true)

    const result = await executeInit({ force: false, interactive: true })

    expect(result.success).toBe(true)
    expect(readConfig()).toEqual({
      coverage: {
        minimumPercent: 65,
        reporters: ['html'],
        outputDir: 'reports/shell',
        countIgnoredLines: true,
        retainTraceOnDebug: true,
        exclude: ['**/node_modules/**', '**/.git/**'],
      },
    })
  })

  it('should not ask for an output directory without reporters', async () => {
    vi.mocked(input).mockResolvedValueOnce('0')
    vi.mocked(checkbox).mockResolvedValueOnce([])
    vi.mocked(confirm).mockResolvedValueOnce(false).mockResolvedValueOnce(false)

    await executeInit({ force: false, interactive: true })

    expect(input).toHaveBeenCalledTimes(1)
    expect(readConfig()).toMatchObject({ coverage: { minimumPercent: 0, reporters: [], outputDir: 'coverage' } })
  })

  it('should keep an existing config without --force', async () => {
    writeFileSync(configFile(), '{"debug":true}\n')

    const result = await executeInit({ force: false, interactive: false })

    expect(result).toEqual({ success: false, error: 'shcov.config.json already exists' })
    expect(readFileSync(configFile(), 'utf-8')).toBe('{"debug":true}\n')
    expect(consoleErrorSpy).toHaveBeenCalledWith('❌ shcov.config.json already exists (use --force to overwrite)')
  })

  it('should overwrite an existing config with --force', async () => {
    writeFileSync(configFile(), '{"debug":true}\n')

    const result = await executeInit({ force: true, interactive: false })

    expect(result.success).toBe(true)
    expect(existsSync(configFile())).toBe(true)
    expect(readConfig()).toEqual(buildConfig(DEFAULT_INIT_ANSWERS))
  })
})
