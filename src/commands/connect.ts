/**
 * jumpkey — connect / connect-proxied
 */

import type { CommandContext } from './context.js'
import { selectHost } from './context.js'

export async function connectCommand(ctx: CommandContext, proxied: boolean): Promise<number> {
  const selection = await selectHost(ctx)
  if (selection.kind !== 'selected') return 0

  return ctx.launcher.connect(selection.record, { proxied })
}
