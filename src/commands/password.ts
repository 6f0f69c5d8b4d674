/**
 * jumpkey — password
 */

import type { CommandContext } from './context.js'
import { selectHost } from './context.js'
import { field } from '../inventory/store.js'

export async function passwordCommand(ctx: CommandContext): Promise<number> {
  const selection = await selectHost(ctx)
  if (selection.kind !== 'selected') return 0

  await ctx.clipboard.copySensitive(field(selection.record, 'credential'))
  return 0
}
