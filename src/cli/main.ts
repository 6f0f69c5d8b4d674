/**
 * jumpkey — Command Dispatch
 *
 * Parses argv, runs the one requested action and returns the exit code.
 */

import type { CommandContext } from '../commands/context.js'
import { parseArgs, type Action } from './options.js'
import { usageHint, usageMarkdown } from './usage.js'
import { connectCommand } from '../commands/connect.js'
import { describeCommand } from '../commands/describe.js'
import { passwordCommand } from '../commands/password.js'
import { convenienceCommand } from '../commands/convenience.js'
import { renderMarkdown } from '../ui/markdown.js'
import { UsageError, errorMessage } from '../errors.js'
import { C, RESET } from '../ui/theme.js'

export type MainIO = {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

function runAction(action: Exclude<Action, 'help'>, ctx: CommandContext): Promise<number> {
  switch (action) {
    case 'connect':
      return connectCommand(ctx, false)
    case 'connect-proxied':
      return connectCommand(ctx, true)
    case 'describe':
      return describeCommand(ctx)
    case 'password':
      return passwordCommand(ctx)
    case 'convenience':
      return convenienceCommand(ctx)
  }
}

export async function main(
  argv: readonly string[],
  io: MainIO,
  createContext: () => CommandContext,
): Promise<number> {
  let action: Action
  try {
    action = parseArgs(argv)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    io.stderr(`${C.error}ERROR:${RESET} ${err.message}\n${usageHint()}\n`)
    return 1
  }

  if (action === 'help') {
    io.stdout(renderMarkdown(usageMarkdown()) + '\n')
    return 0
  }

  const ctx = createContext()
  try {
    return await runAction(action, ctx)
  } catch (err) {
    ctx.logger.log('error', { action, error: errorMessage(err) })
    io.stderr(`${C.error}ERROR:${RESET} ${errorMessage(err)}\n`)
    return 1
  }
}
