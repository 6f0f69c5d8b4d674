/**
 * jumpkey — External Processes
 *
 * Every collaborator (picker, menu, keystroke simulator, clipboard,
 * ssh) is a child process started through a ProcessRunner, so tests
 * can swap in a recording fake.
 */

import { spawn } from 'node:child_process'

export type CaptureResult = {
  stdout: string
  exitCode: number | null
}

export interface ProcessRunner {
  /** Run to completion, feeding `input` on stdin and capturing stdout. Stderr stays on the terminal. */
  capture(argv: readonly string[], input?: string): Promise<CaptureResult>
  /**
   * Feed `input` on stdin and resolve with the exit code once the process
   * exits, without waiting on its output streams. Tools like xclip fork a
   * child that keeps those open.
   */
  feed(argv: readonly string[], input?: string): Promise<number | null>
  /** Run attached to the current terminal and resolve with the exit code */
  interactive(argv: readonly string[]): Promise<number>
  /** Start a process that outlives this one. Nothing is awaited. */
  detached(argv: readonly string[]): void
}

function splitArgv(argv: readonly string[]): [string, string[]] {
  const [command, ...args] = argv
  if (!command) throw new Error('Empty command line')
  return [command, args]
}

export const nodeRunner: ProcessRunner = {
  capture(argv, input = '') {
    const [command, args] = splitArgv(argv)
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, { stdio: ['pipe', 'pipe', 'inherit'] })
      let stdout = ''

      proc.stdout.setEncoding('utf-8')
      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })
      proc.on('error', (err) => reject(new Error(`Failed to run ${command}: ${err.message}`)))
      proc.on('close', (exitCode) => resolve({ stdout, exitCode }))

      // Some pickers exit before draining stdin
      proc.stdin.on('error', () => proc.stdin.destroy())
      proc.stdin.end(input)
    })
  },

  feed(argv, input = '') {
    const [command, args] = splitArgv(argv)
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, { stdio: ['pipe', 'ignore', 'inherit'] })
      proc.on('error', (err) => reject(new Error(`Failed to run ${command}: ${err.message}`)))
      proc.on('exit', (exitCode) => resolve(exitCode))

      proc.stdin.on('error', () => proc.stdin.destroy())
      proc.stdin.end(input)
    })
  },

  interactive(argv) {
    const [command, args] = splitArgv(argv)
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, { stdio: 'inherit' })
      proc.on('error', (err) => reject(new Error(`Failed to run ${command}: ${err.message}`)))
      proc.on('close', (exitCode, signal) => resolve(exitCode ?? (signal ? 1 : 0)))
    })
  },

  detached(argv) {
    const [command, args] = splitArgv(argv)
    const proc = spawn(command, args, { detached: true, stdio: 'ignore' })
    proc.on('error', (err) => {
      process.stderr.write(`Failed to run ${command}: ${err.message}\n`)
    })
    proc.unref()
  },
}
