/**
 * Console output plus the configured istanbul reports
 */

import { resolve } from 'node:path'
import type { CoverageReport } from '../types.js'
import type { ResolvedShcovConfig } from '../utils/config.js'
import { printCoverageReport } from './console.js'
import { writeIstanbulReports } from './istanbul.js'

export interface PublishOptions {
  json?: boolean
  /** Base for a relative outputDir (default: process.cwd()) */
  cwd?: string
}

export async function publishReport(
  report: CoverageReport,
  config: ResolvedShcovConfig,
  options: PublishOptions = {}
): Promise<void> {
  printCoverageReport(report, { debug: config.debug, json: options.json })
  await writeIstanbulReports(report, {
    outputDir: resolve(options.cwd ?? process.cwd(), config.coverage.outputDir),
    reporters: config.coverage.reporters,
  })
}
