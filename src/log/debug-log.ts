/**
 * jumpkey — Debug Log
 *
 * Appends timestamped entries to a daily log file when `log: true`
 * is set in the config. Never pass secrets to it.
 */

import { mkdirSync, appendFileSync } from 'node:fs'
import { join } from 'node:path'
import { appHome } from '../config/paths.js'

export type Logger = {
  log(label: string, data?: unknown): void
}

export const silentLogger: Logger = {
  log() {},
}

function logPath(dir: string): string {
  const date = new Date().toISOString().slice(0, 10) // YYYY-MM-DD
  return join(dir, `debug-${date}.log`)
}

export function createDebugLogger(dir: string = appHome('logs')): Logger {
  return {
    log(label, data) {
      mkdirSync(dir, { recursive: true })
      const timestamp = new Date().toISOString()
      const separator = '-'.repeat(80)
      const body = data === undefined ? '' : `${JSON.stringify(data, null, 2)}\n`
      appendFileSync(logPath(dir), `\n${separator}\n[${timestamp}] ${label}\n${separator}\n${body}`, 'utf-8')
    },
  }
}
