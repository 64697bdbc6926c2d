/**
 * Script Runner
 *
 * Runs a test script through the bash harness, with tracing routed to a
 * trace artifact when coverage is on.
 */

import { spawn } from 'node:child_process'
import { constants } from 'node:os'
import { fileURLToPath } from 'node:url'
import { log } from '../utils/logger.js'
import type { TraceArtifact } from './trace-artifact.js'

export type HarnessOutputs = Pick<TraceArtifact, 'traceFile' | 'symbolsFile'>

/**
 * Absolute path of the harness script; its own trace records are never measured
 */
export const HARNESS_FILE = fileURLToPath(new URL('../../harness/shcov-harness.sh', import.meta.url))

export interface RunScriptOptions {
  /** Absolute path of the test script */
  script: string
  args?: string[]
  cwd?: string
  /** Bash executable (default: 'bash') */
  shell?: string
  /** Receives the trace and symbol dump; omit to run without coverage */
  artifact?: HarnessOutputs
  env?: NodeJS.ProcessEnv
  /** Send the script's stdout to stderr, leaving stdout to the caller */
  stdoutToStderr?: boolean
}

export interface RunScriptResult {
  exitCode: number
  signal: NodeJS.Signals | null
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals))

/**
 * Exit status a shell would report for a process killed by `signal`
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0)
}

export function buildHarnessEnv(base: NodeJS.ProcessEnv, artifact?: HarnessOutputs): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base }
  delete env.SHCOV_TRACE_FILE
  delete env.SHCOV_SYMBOLS_FILE
  if (artifact) {
    env.SHCOV_TRACE_FILE = artifact.traceFile
    env.SHCOV_SYMBOLS_FILE = artifact.symbolsFile
  }
  return env
}

/**
 * Spawn the harness with inherited stdio and wait for it to exit
 */
export function runScript(options: RunScriptOptions): Promise<RunScriptResult> {
  const { script, args = [], cwd = process.cwd(), shell = 'bash', artifact, env = process.env, stdoutToStderr = false } = options

  log(`Running ${script} with ${shell}${artifact ? ' (coverage on)' : ''}`)

  return new Promise((resolve, reject) => {
    const child = spawn(shell, [HARNESS_FILE, script, ...args], {
      cwd,
      env: buildHarnessEnv(env, artifact),
      stdio: stdoutToStderr ? ['inherit', process.stderr, 'inherit'] : 'inherit',
    })

    child.on('error', reject)
    child.on('close', (code, signal) => {
      if (signal) {
        resolve({ exitCode: signalExitCode(signal), signal })
      } else {
        resolve({ exitCode: code ?? 1, signal: null })
      }
    })
  })
}

export {
  TraceArtifact,
  createTraceArtifact,
  withTraceArtifact,
  TRACE_FILE_NAME,
  SYMBOLS_FILE_NAME,
  type TraceArtifactOptions,
} from './trace-artifact.js'
