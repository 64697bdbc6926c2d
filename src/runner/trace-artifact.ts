/**
 * Trace artifact
 *
 * Private temp directory holding the xtrace log and the symbol dump of one
 * run. Deleted by dispose(), by normal process exit and on SIGINT/SIGTERM,
 * unless retained for debugging.
 */

import { mkdtempSync, rmSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { log, warn } from '../utils/logger.js'

export const TRACE_FILE_NAME = 'trace.log'
export const SYMBOLS_FILE_NAME = 'symbols.txt'

export interface TraceArtifactOptions {
  /** Parent directory (default: the OS temp directory) */
  baseDir?: string
  /** Keep the files instead of deleting them */
  retain?: boolean
}

const CLEANUP_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

async function readIfPresent(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf-8')
  } catch (err) {
    // The script may exit before the harness writes anything
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return ''
    }
    throw err
  }
}

export class TraceArtifact {
  readonly dir: string
  readonly traceFile: string
  readonly symbolsFile: string
  readonly retain: boolean
  private disposed = false

  private readonly onExit = () => this.dispose()
  private readonly onSignal = (signal: NodeJS.Signals) => {
    this.dispose()
    // Re-raise so the default handler terminates the process
    process.kill(process.pid, signal)
  }

  constructor(options: TraceArtifactOptions = {}) {
    this.dir = mkdtempSync(join(options.baseDir ?? tmpdir(), 'shcov-'))
    this.traceFile = join(this.dir, TRACE_FILE_NAME)
    this.symbolsFile = join(this.dir, SYMBOLS_FILE_NAME)
    this.retain = options.retain ?? false

    process.once('exit', this.onExit)
    for (const signal of CLEANUP_SIGNALS) {
      process.once(signal, this.onSignal)
    }
    log(`Trace artifact: ${this.dir}`)
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  readTrace(): Promise<string> {
    return readIfPresent(this.traceFile)
  }

  readSymbols(): Promise<string> {
    return readIfPresent(this.symbolsFile)
  }

  /**
   * Delete the artifact (or announce where it was kept). Safe to call twice.
   */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true

    process.removeListener('exit', this.onExit)
    for (const signal of CLEANUP_SIGNALS) {
      process.removeListener(signal, this.onSignal)
    }

    if (this.retain) {
      warn(`Trace retained: ${this.traceFile}`)
      return
    }
    rmSync(this.dir, { recursive: true, force: true })
  }
}

export function createTraceArtifact(options: TraceArtifactOptions = {}): TraceArtifact {
  return new TraceArtifact(options)
}

/**
 * Run `fn` with a fresh artifact, disposing it on every exit path
 */
export async function withTraceArtifact<T>(
  options: TraceArtifactOptions,
  fn: (artifact: TraceArtifact) => Promise<T>
): Promise<T> {
  const artifact = createTraceArtifact(options)
  try {
    return await fn(artifact)
  } finally {
    artifact.dispose()
  }
}
