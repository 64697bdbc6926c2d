/**
 * File Scanner
 *
 * Finds shell files and reports the classifier diagnostics that would skew
 * their coverage: unterminated heredocs and unbalanced ignore markers.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { glob } from 'glob'
import { classifySource } from '../core/classifier.js'
import type { ClassifierIssue } from '../types.js'
import { DEFAULT_EXCLUDE_PATTERNS, SHELL_FILE_PATTERN, normalizePath } from '../utils/config.js'
import { warn, formatError } from '../utils/logger.js'

export interface ScanOptions {
  paths: string[]
  cwd?: string
  ignore?: string[]
}

export interface LintIssue extends ClassifierIssue {
  /** Path relative to the scan's cwd */
  file: string
}

export interface ScanResult {
  issues: LintIssue[]
  filesScanned: number
  filesWithIssues: number
}

const SHELL_FILE = /\.(?:sh|bash)$/

function toPattern(path: string): string {
  if (SHELL_FILE.test(path)) {
    return path
  }
  return `${path.replace(/\/+$/, '')}/${SHELL_FILE_PATTERN}`.replace(/^\.\//, '')
}

/**
 * Scan shell files for classifier issues
 */
export async function scanFiles(options: ScanOptions): Promise<ScanResult> {
  const { paths, cwd = process.cwd(), ignore = [] } = options
  const issues: LintIssue[] = []
  const filesWithIssues = new Set<string>()

  const files = await glob(paths.map(toPattern), {
    cwd,
    ignore: [...DEFAULT_EXCLUDE_PATTERNS, ...ignore],
    absolute: false,
    nodir: true,
  })
  files.sort()

  let filesScanned = 0
  for (const file of files) {
    const relativeFile = normalizePath(file)

    let text: string
    try {
      text = await readFile(join(cwd, file), 'utf-8')
    } catch (err) {
      warn(`Skipping ${relativeFile}: ${formatError(err)}`)
      continue
    }
    filesScanned++

    const { issues: fileIssues } = classifySource(text)
    if (fileIssues.length > 0) {
      issues.push(...fileIssues.map((issue) => ({ ...issue, file: relativeFile })))
      filesWithIssues.add(relativeFile)
    }
  }

  return {
    issues,
    filesScanned,
    filesWithIssues: filesWithIssues.size,
  }
}
