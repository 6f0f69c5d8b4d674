/**
 * jumpkey — Command Context
 *
 * Everything a command needs, built once from config. Tests build
 * their own with fakes in place of the external tools.
 */

import type { JumpkeyConfig } from '../config/types.js'
import type { LoadResult, HostRecord } from '../inventory/types.js'
import type { Logger } from '../log/debug-log.js'
import type { ProcessRunner } from '../system/process.js'
import { loadInventory } from '../inventory/store.js'
import { Picker } from '../ui/picker.js'
import { Menu } from '../ui/menu.js'
import { AutomationEngine } from '../automation/engine.js'
import { XdotoolKeyboard } from '../automation/keyboard.js'
import { COLOR_NAMES, isColorName } from '../automation/palette.js'
import { ClipboardGuard, DetachedClearScheduler, XclipClipboard } from '../clipboard/guard.js'
import { SessionLauncher } from '../session/launcher.js'
import { C, RESET } from '../ui/theme.js'

export type CommandContext = {
  config: JumpkeyConfig
  loadInventory: (path: string) => LoadResult
  picker: Picker
  automation: AutomationEngine
  clipboard: ClipboardGuard
  launcher: SessionLauncher
  logger: Logger
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export type ContextOptions = {
  /** Pause used between simulated keystrokes */
  sleep?: (ms: number) => Promise<void>
}

export function createCommandContext(
  config: JumpkeyConfig,
  runner: ProcessRunner,
  logger: Logger,
  options: ContextOptions = {},
): CommandContext {
  const { tools } = config
  const menu = new Menu(runner, tools.menu)

  const automation = new AutomationEngine({
    keyboard: new XdotoolKeyboard(runner, tools.typer),
    confirm: (prompt) => menu.confirm(prompt),
    chooseColor: async () => {
      const answer = await menu.ask('Pick a prompt color:', COLOR_NAMES, true)
      return isColorName(answer) ? answer : undefined
    },
    sleep: options.sleep,
    logger,
  })

  return {
    config,
    loadInventory,
    picker: new Picker(runner, tools.picker),
    automation,
    clipboard: new ClipboardGuard(
      new XclipClipboard(runner, tools.clipboard),
      new DetachedClearScheduler(runner, tools.clipboard),
      logger,
    ),
    launcher: new SessionLauncher(runner, tools, automation, logger),
    logger,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  }
}

// ── Host selection ──────────────────────────────────────────────────────────

export type HostSelection =
  | { kind: 'selected'; record: HostRecord }
  | { kind: 'none' }
  | { kind: 'first-run' }

/** Load the inventory and let the operator pick a host */
export async function selectHost(ctx: CommandContext): Promise<HostSelection> {
  const result = ctx.loadInventory(ctx.config.inventory)

  if (result.kind === 'created') {
    ctx.stderr(`${C.warning}Server list not found.${RESET}\nTemplate generated at '${result.path}'\n`)
    ctx.logger.log('inventory created', { path: result.path })
    return { kind: 'first-run' }
  }

  const name = await ctx.picker.select(result.inventory.keys())
  const record = name === undefined ? undefined : result.inventory.get(name)
  if (!record) return { kind: 'none' }

  ctx.logger.log('selected host', { host: record.name })
  return { kind: 'selected', record }
}
