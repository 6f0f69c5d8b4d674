/**
 * jumpkey — execute-convenience
 *
 * Lets the operator tick any of the automation actions and runs them
 * against the focused terminal, in the order the picker returns them.
 * Password entry and escalation ask for a host each time.
 */

import type { CommandContext } from './context.js'
import { selectHost } from './context.js'
import { field } from '../inventory/store.js'

type Convenience = {
  label: string
  /** false stops the remaining conveniences (first run, nothing to pick from) */
  run: (ctx: CommandContext) => Promise<boolean>
}

async function withCredential(
  ctx: CommandContext,
  action: (secret: string) => Promise<unknown>,
): Promise<boolean> {
  const selection = await selectHost(ctx)
  if (selection.kind === 'first-run') return false
  if (selection.kind === 'selected') await action(field(selection.record, 'credential'))
  return true
}

export const CONVENIENCES: readonly Convenience[] = [
  {
    label: 'Change prompt color',
    run: async (ctx) => {
      await ctx.automation.recolorPrompt()
      return true
    },
  },
  {
    label: 'Enter password',
    run: (ctx) => withCredential(ctx, (secret) => ctx.automation.typeCredential(secret)),
  },
  {
    label: 'Escalate to superuser',
    run: (ctx) => withCredential(ctx, (secret) => ctx.automation.escalatePrivilege(secret)),
  },
  {
    label: 'Clear screen',
    run: async (ctx) => {
      await ctx.automation.clearScreen()
      return true
    },
  },
]

export async function convenienceCommand(ctx: CommandContext): Promise<number> {
  const labels = CONVENIENCES.map((c) => c.label)
  const chosen = await ctx.picker.selectMany(labels, 'Choose a convenience to execute: ')

  for (const label of chosen) {
    const convenience = CONVENIENCES.find((c) => c.label === label)
    if (!convenience) continue
    ctx.logger.log('convenience', { label })
    if (!(await convenience.run(ctx))) break
  }

  return 0
}
