/**
 * Heredoc Expander
 *
 * xtrace reports the command that opens a heredoc but none of the body
 * lines, so a covered start line covers the body through its terminator.
 */

import type { Heredoc, LineNo } from '../types.js'

/**
 * Returns a new set; `covered` is left untouched
 */
export function expandHeredocs(heredocs: readonly Heredoc[], covered: ReadonlySet<LineNo>): Set<LineNo> {
  const expanded = new Set(covered)
  for (const heredoc of heredocs) {
    if (!covered.has(heredoc.start)) continue
    for (let line = heredoc.start + 1; line <= heredoc.bodyEnd; line++) {
      expanded.add(line)
    }
  }
  return expanded
}
