/**
 * Logger for shcov
 *
 * Progress logs are off unless `log: true` is configured.
 * Debug output (`--debug` or DEBUG=1) also turns progress logs on and adds
 * classifier warnings such as unterminated heredocs.
 * While JSON output is on, stdout carries only the JSON document and every
 * diagnostic goes to stderr.
 */

let loggingEnabled = false
let debugEnabled = false
let timingEnabled = false
let jsonOutput = false

export function setLogging(enabled: boolean): void {
  loggingEnabled = enabled
}

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled
}

export function setTiming(enabled: boolean): void {
  timingEnabled = enabled
}

export function setJsonOutput(enabled: boolean): void {
  jsonOutput = enabled
}

export function isJsonOutput(): boolean {
  return jsonOutput
}

function write(...args: unknown[]): void {
  if (jsonOutput) {
    console.error(...args)
  } else {
    console.log(...args)
  }
}

export function isLoggingEnabled(): boolean {
  return loggingEnabled || debugEnabled
}

export function isDebugEnabled(): boolean {
  return debugEnabled
}

export function isTimingEnabled(): boolean {
  return timingEnabled
}

/**
 * Log a progress message (only if logging or debug is enabled)
 */
export function log(...args: unknown[]): void {
  if (isLoggingEnabled()) {
    write(...args)
  }
}

/**
 * Log a debug message (only in debug mode)
 */
export function debug(...args: unknown[]): void {
  if (debugEnabled) {
    write(...args)
  }
}

/**
 * Log a warning (always shown)
 */
export function warn(...args: unknown[]): void {
  write(...args)
}

/**
 * Log an error (always shown)
 */
export function error(...args: unknown[]): void {
  console.error(...args)
}

/**
 * Returns a function that prints the elapsed time for `label`.
 * A no-op when neither logging nor timing is on.
 */
export function createTimer(label: string): () => void {
  if (!isLoggingEnabled() && !timingEnabled) {
    return () => {}
  }
  const start = performance.now()
  return () => {
    const duration = performance.now() - start
    write(`  ⏱ ${label}: ${duration.toFixed(0)}ms`)
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return String(err)
}

/**
 * Parse JSON, logging and returning null on failure.
 * The result is `unknown`; callers validate the shape.
 */
export function safeJsonParse(json: string, context?: string): unknown {
  try {
    const parsed: unknown = JSON.parse(json)
    return parsed
  } catch (err) {
    const ctx = context ? ` (${context})` : ''
    log(`JSON parse failed${ctx}: ${formatError(err)}`)
    return null
  }
}
