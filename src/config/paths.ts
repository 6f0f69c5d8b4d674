/**
 * jumpkey — Paths
 *
 * Config, default inventory and debug logs live under one directory:
 * %APPDATA%\jumpkey on Windows, ~/.jumpkey elsewhere. Paths read from
 * the config may start with `~`.
 */

import { join } from 'node:path'
import { homedir } from 'node:os'

function baseDir(): string {
  if (process.platform !== 'win32') return join(homedir(), '.jumpkey')
  return join(process.env.APPDATA || join(homedir(), 'AppData', 'Roaming'), 'jumpkey')
}

/** A path inside the jumpkey directory, e.g. appHome('servers.csv') */
export function appHome(...segments: string[]): string {
  return join(baseDir(), ...segments)
}

/** Expand a leading `~` to the home directory */
export function expandHome(path: string): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return path
}
