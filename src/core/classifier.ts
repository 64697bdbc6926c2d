/**
 * Line Classifier
 *
 * Static, text-only classification of shell script lines. Each category is
 * computed by its own pass over the lines; the resulting sets may overlap.
 */

import type { ClassifierIssue, Heredoc, LineClassification, LineNo } from '../types.js'

const BLANK_OR_COMMENT = /^\s*(?:#|$)/

// `name() {`, `name ()`, `function name {`, `function name() {`
const FUNCTION_HEADER = /^\s*(?:function\s+[^\s(){}]+(?:\s*\(\s*\))?|[^\s(){}=$#'"]+\s*\(\s*\))\s*\{?\s*$/

// A brace alone on its line: `}`, or the `{` of a header written without one
const LONE_BRACE = /^\s*[{}]\s*$/

const IGNORE_OPEN = /#\s*critic\s+ignore\b/
const IGNORE_CLOSE = /#\s*critic\s+\/ignore\b/

// `<<WORD`, `<<-WORD`, `<< 'WORD'`, `<<"WORD"`, `<<\WORD`; never `<<<`.
// An unquoted word runs up to whitespace or a shell metacharacter.
const HEREDOC_TOKEN = /(?<!<)<<(-?)[ \t]*(?:'([^']+)'|"([^"]+)"|\\?([A-Za-z_][^\s;&|<>()'"`]*))/

/**
 * Split source text into lines. A trailing newline does not open a new line.
 */
export function splitLines(text: string): string[] {
  if (text === '') return []
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line))
  if (lines[lines.length - 1] === '') {
    lines.pop()
  }
  return lines
}

function collectLines(lines: string[], predicate: (line: string) => boolean): Set<LineNo> {
  const result = new Set<LineNo>()
  lines.forEach((line, index) => {
    if (predicate(line)) result.add(index + 1)
  })
  return result
}

export function isBlankOrComment(line: string): boolean {
  return BLANK_OR_COMMENT.test(line)
}

export function isStructural(line: string): boolean {
  return FUNCTION_HEADER.test(line) || LONE_BRACE.test(line)
}

/**
 * Lines inside `# critic ignore` ... `# critic /ignore`, markers included.
 *
 * A second open marker inside a region is part of the region and changes
 * nothing; the first close marker ends it. A close marker outside any
 * region ignores nothing. An open marker without a close runs to end of file.
 */
export function findIgnoredLines(lines: string[]): { ignored: Set<LineNo>; issues: ClassifierIssue[] } {
  const ignored = new Set<LineNo>()
  const issues: ClassifierIssue[] = []
  let openedAt: LineNo | null = null

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index]
    const lineNo = index + 1
    if (openedAt === null) {
      if (IGNORE_OPEN.test(line)) {
        openedAt = lineNo
        ignored.add(lineNo)
      } else if (IGNORE_CLOSE.test(line)) {
        issues.push({
          type: 'stray-ignore-close',
          line: lineNo,
          message: `"critic /ignore" without a matching "critic ignore"`,
        })
      }
      continue
    }

    ignored.add(lineNo)
    if (IGNORE_CLOSE.test(line)) {
      openedAt = null
    } else if (IGNORE_OPEN.test(line)) {
      issues.push({
        type: 'nested-ignore',
        line: lineNo,
        message: `"critic ignore" inside the region opened on line ${openedAt}`,
      })
    }
  }

  if (openedAt !== null) {
    issues.push({
      type: 'unmatched-ignore',
      line: openedAt,
      message: `"critic ignore" is never closed; ignoring to end of file`,
    })
  }

  return { ignored, issues }
}

interface HeredocToken {
  terminator: string
  stripTabs: boolean
}

/**
 * Find a here-document redirection on a line
 */
export function matchHeredocToken(line: string): HeredocToken | null {
  if (isBlankOrComment(line)) return null
  const match = HEREDOC_TOKEN.exec(line)
  if (!match) return null
  const terminator = match[2] ?? match[3] ?? match[4]
  if (terminator === undefined) return null
  return { terminator, stripTabs: match[1] === '-' }
}

function isTerminatorLine(line: string, token: HeredocToken): boolean {
  const candidate = token.stripTabs ? line.replace(/^\t+/, '') : line
  return candidate === token.terminator
}

/**
 * Locate heredocs. Bodies are skipped, so text inside a body never starts
 * another heredoc. Without a terminator the body runs to end of file.
 */
export function findHeredocs(lines: string[]): { heredocs: Heredoc[]; issues: ClassifierIssue[] } {
  const heredocs: Heredoc[] = []
  const issues: ClassifierIssue[] = []

  let index = 0
  while (index < lines.length) {
    const token = matchHeredocToken(lines[index])
    if (!token) {
      index++
      continue
    }

    const start = index + 1
    let bodyEnd = lines.length
    let unterminated = true
    for (let next = index + 1; next < lines.length; next++) {
      if (isTerminatorLine(lines[next], token)) {
        bodyEnd = next + 1
        unterminated = false
        break
      }
    }

    if (unterminated) {
      issues.push({
        type: 'unterminated-heredoc',
        line: start,
        message: `heredoc "${token.terminator}" has no terminator; treating the rest of the file as its body`,
      })
    }

    heredocs.push({ start, terminator: token.terminator, bodyEnd, unterminated })
    index = bodyEnd
  }

  return { heredocs, issues }
}

/**
 * Classify every line of a source file
 */
export function classifySource(text: string): LineClassification {
  const lines = splitLines(text)
  const { ignored, issues: ignoreIssues } = findIgnoredLines(lines)
  const { heredocs, issues: heredocIssues } = findHeredocs(lines)

  return {
    totalLines: lines.length,
    blankOrComment: collectLines(lines, isBlankOrComment),
    structural: collectLines(lines, isStructural),
    ignored,
    heredocs,
    issues: [...ignoreIssues, ...heredocIssues].sort((a, b) => a.line - b.line),
  }
}
