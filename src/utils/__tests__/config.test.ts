import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import {
  resolveShcovConfig,
  mergeConfig,
  configFromEnv,
  parseConfigObject,
  loadShcovConfig,
  clearConfigCache,
  clampPercent,
  normalizePath,
  DEFAULT_SHCOV_CONFIG,
  DEFAULT_EXCLUDE_PATTERNS,
  CONFIG_FILE_NAME,
} from '../config.js'
import { setLogging } from '../logger.js'

describe('config', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>

  beforeEach(() => {
    clearConfigCache()
    setLogging(false)
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    consoleLogSpy.mockRestore()
  })

  describe('resolveShcovConfig', () => {
    it('should return defaults when no config provided', () => {
      expect(resolveShcovConfig()).toEqual({
        coverage: {
          enabled: true,
          minimumPercent: 0,
          retainTraceOnDebug: false,
          countIgnoredLines: false,
          include: [],
          exclude: DEFAULT_EXCLUDE_PATTERNS,
          reporters: [],
          outputDir: 'coverage',
        },
        debug: false,
        log: false,
        timing: false,
        shell: 'bash',
      })
    })

    it('should override defaults with provided config', () => {
      const config = resolveShcovConfig({
        coverage: { minimumPercent: 80, reporters: ['lcov'] },
        debug: true,
        shell: '/usr/local/bin/bash',
      })

      expect(config.coverage.minimumPercent).toBe(80)
      expect(config.coverage.reporters).toEqual(['lcov'])
      expect(config.coverage.enabled).toBe(true)
      expect(config.debug).toBe(true)
      expect(config.shell).toBe('/usr/local/bin/bash')
    })

    it('should clamp the minimum percentage', () => {
      expect(resolveShcovConfig({ coverage: { minimumPercent: 150 } }).coverage.minimumPercent).toBe(100)
      expect(resolveShcovConfig({ coverage: { minimumPercent: -5 } }).coverage.minimumPercent).toBe(0)
      expect(resolveShcovConfig({ coverage: { minimumPercent: 79.9 } }).coverage.minimumPercent).toBe(79)
    })
  })

  describe('clampPercent', () => {
    it('should map non-finite values to 0', () => {
      expect(clampPercent(Number.NaN)).toBe(0)
      expect(clampPercent(Number.POSITIVE_INFINITY)).toBe(0)
    })
  })

  describe('mergeConfig', () => {
    it('should let defined override values win', () => {
      const merged = mergeConfig(
        { debug: true, coverage: { minimumPercent: 50, outputDir: 'out' } },
        { debug: undefined, log: true, coverage: { minimumPercent: 90, include: undefined } }
      )

      expect(merged).toEqual({ debug: true, log: true, coverage: { minimumPercent: 90, outputDir: 'out' } })
    })

    it('should leave coverage out when neither side has it', () => {
      expect(mergeConfig({ timing: true }, {})).toEqual({ timing: true })
    })
  })

  describe('configFromEnv', () => {
    it('should read the coverage switches and DEBUG', () => {
      expect(
        configFromEnv({ SHCOV_COVERAGE_DISABLE: '1', SHCOV_COVERAGE_MIN_PERCENT: '75', DEBUG: '1' })
      ).toEqual({ debug: true, coverage: { enabled: false, minimumPercent: 75 } })
    })

    it('should return an empty config for an empty environment', () => {
      expect(configFromEnv({})).toEqual({})
    })

    it('should warn about a minimum that is not a number', () => {
      expect(configFromEnv({ SHCOV_COVERAGE_MIN_PERCENT: 'high' })).toEqual({})
      expect(consoleLogSpy).toHaveBeenCalledWith('Ignoring SHCOV_COVERAGE_MIN_PERCENT: not a number (high)')
    })
  })

  describe('parseConfigObject', () => {
    it('should keep valid values', () => {
      expect(
        parseConfigObject({
          debug: false,
          shell: 'bash',
          coverage: { enabled: true, minimumPercent: 60, exclude: ['vendor/**'], reporters: ['html', 'lcov'] },
        })
      ).toEqual({
        debug: false,
        shell: 'bash',
        coverage: { enabled: true, minimumPercent: 60, exclude: ['vendor/**'], reporters: ['html', 'lcov'] },
      })
    })

    it('should drop values of the wrong type with a warning', () => {
      const config = parseConfigObject({ log: 'yes', coverage: { minimumPercent: '80', reporters: ['pdf'] } })

      expect(config).toEqual({ coverage: {} })
      expect(consoleLogSpy).toHaveBeenCalledWith('Ignoring invalid "log" in shcov.config.json')
      expect(consoleLogSpy).toHaveBeenCalledWith('Ignoring invalid "coverage.minimumPercent" in shcov.config.json')
      expect(consoleLogSpy).toHaveBeenCalledWith('Ignoring invalid "coverage.reporters" in shcov.config.json')
    })

    it('should reject anything but an object', () => {
      expect(parseConfigObject([1, 2], 'custom.json')).toEqual({})
      expect(consoleLogSpy).toHaveBeenCalledWith('Ignoring custom.json: expected a JSON object')
    })
  })

  describe('loadShcovConfig', () => {
    let testDir: string

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'shcov-config-test-'))
    })

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true })
    })

    it('should fall back to defaults without a config file', async () => {
      expect(await loadShcovConfig({ cwd: testDir, env: {} })).toEqual(DEFAULT_SHCOV_CONFIG)
    })

    it('should layer file, environment and overrides', async () => {
      writeFileSync(
        join(testDir, CONFIG_FILE_NAME),
        JSON.stringify({ coverage: { minimumPercent: 40, outputDir: 'reports' }, timing: true })
      )

      const config = await loadShcovConfig({
        cwd: testDir,
        env: { SHCOV_COVERAGE_MIN_PERCENT: '60' },
        overrides: { coverage: { reporters: ['json'] } },
      })

      expect(config.coverage.minimumPercent).toBe(60)
      expect(config.coverage.outputDir).toBe('reports')
      expect(config.coverage.reporters).toEqual(['json'])
      expect(config.timing).toBe(true)
    })

    it('should let overrides beat the environment', async () => {
      const config = await loadShcovConfig({
        cwd: testDir,
        env: { SHCOV_COVERAGE_MIN_PERCENT: '60' },
        overrides: { coverage: { minimumPercent: 90 } },
      })

      expect(config.coverage.minimumPercent).toBe(90)
    })

    it('should add override excludes to the defaults', async () => {
      const config = await loadShcovConfig({
        cwd: testDir,
        env: {},
        overrides: { coverage: { exclude: ['vendor/**'] } },
      })

      expect(config.coverage.exclude).toEqual(['**/node_modules/**', '**/.git/**', 'vendor/**'])
      expect(DEFAULT_SHCOV_CONFIG.coverage.exclude).toEqual(['**/node_modules/**', '**/.git/**'])
    })

    it('should add override excludes to those of the config file', async () => {
      writeFileSync(join(testDir, CONFIG_FILE_NAME), JSON.stringify({ coverage: { exclude: ['fixtures/**'] } }))

      const config = await loadShcovConfig({
        cwd: testDir,
        env: {},
        overrides: { coverage: { exclude: ['vendor/**', 'fixtures/**'] } },
      })

      expect(config.coverage.exclude).toEqual(['fixtures/**', 'vendor/**'])
    })

    it('should read an explicit config path relative to cwd', async () => {
      writeFileSync(join(testDir, 'ci.json'), JSON.stringify({ coverage: { countIgnoredLines: true } }))

      const config = await loadShcovConfig({ cwd: testDir, configPath: 'ci.json', env: {} })

      expect(config.coverage.countIgnoredLines).toBe(true)
    })

    it('should use defaults for an unparseable file', async () => {
      writeFileSync(join(testDir, CONFIG_FILE_NAME), '{ not json')

      expect(await loadShcovConfig({ cwd: testDir, env: {} })).toEqual(DEFAULT_SHCOV_CONFIG)
    })
  })

  describe('normalizePath', () => {
    it('should convert backslashes', () => {
      expect(normalizePath('lib\\util.sh')).toBe('lib/util.sh')
    })
  })
})
