/**
 * jumpkey — Config Loader
 *
 * Loads ~/.jumpkey/config.yaml, validates it, merges with defaults.
 * Falls back to defaults if the file doesn't exist.
 */

import { readFileSync, existsSync } from 'node:fs'
import { join } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { DEFAULT_CONFIG } from './defaults.js'
import type { JumpkeyConfig, ToolsConfig } from './types.js'
import { appHome, expandHome } from './paths.js'

export const CONFIG_PATH = join(appHome(), 'config.yaml')

const argvSchema = z.array(z.string().min(1)).min(1)

const configFileSchema = z.object({
  inventory: z.string().min(1).optional(),
  tools: z.object({
    picker: argvSchema.optional(),
    menu: argvSchema.optional(),
    typer: argvSchema.optional(),
    clipboard: argvSchema.optional(),
    ssh: argvSchema.optional(),
    proxy: argvSchema.optional(),
  }).optional(),
  log: z.boolean().optional(),
})

type ConfigFile = z.infer<typeof configFileSchema>

function mergeTools(base: ToolsConfig, override: ConfigFile['tools']): ToolsConfig {
  return {
    picker: override?.picker ?? base.picker,
    menu: override?.menu ?? base.menu,
    typer: override?.typer ?? base.typer,
    clipboard: override?.clipboard ?? base.clipboard,
    ssh: override?.ssh ?? base.ssh,
    proxy: override?.proxy ?? base.proxy,
  }
}

/** Merge a validated config file over the defaults (file wins) */
export function mergeConfig(base: JumpkeyConfig, file: ConfigFile): JumpkeyConfig {
  return {
    inventory: expandHome(file.inventory ?? base.inventory),
    tools: mergeTools(base.tools, file.tools),
    log: file.log ?? base.log,
  }
}

/** Load config from ~/.jumpkey/config.yaml, merged with defaults */
export function loadConfig(path: string = CONFIG_PATH): JumpkeyConfig {
  if (!existsSync(path)) {
    return DEFAULT_CONFIG
  }

  let raw: unknown
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    process.stderr.write(`WARNING: Ignoring unreadable config '${path}': ${reason}\n`)
    return DEFAULT_CONFIG
  }

  // An empty file parses to null
  if (raw === null || raw === undefined) return DEFAULT_CONFIG

  const parsed = configFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue.path.length ? issue.path.join('.') : 'root'
    process.stderr.write(`WARNING: Ignoring invalid config '${path}': ${where}: ${issue.message}\n`)
    return DEFAULT_CONFIG
  }

  return mergeConfig(DEFAULT_CONFIG, parsed.data)
}
