/**
 * jumpkey — describe
 *
 * Prints what we know about a host and copies its address. The address
 * is not a secret, so the clipboard is left alone afterwards.
 */

import type { HostRecord } from '../inventory/types.js'
import type { CommandContext } from './context.js'
import { selectHost } from './context.js'
import { field } from '../inventory/store.js'
import { bold } from '../ui/theme.js'

export function describeLines(record: HostRecord): string[] {
  const address = field(record, 'address')
  const lines = [
    bold(record.name),
    `${bold('Description:')} ${field(record, 'description')}`,
  ]
  if (address) lines.push(`${bold('IP:')} ${address}`)
  return lines
}

export async function describeCommand(ctx: CommandContext): Promise<number> {
  const selection = await selectHost(ctx)
  if (selection.kind !== 'selected') return 0

  ctx.stdout(describeLines(selection.record).join('\n') + '\n')
  await ctx.clipboard.copyPlain(field(selection.record, 'address'))
  return 0
}
