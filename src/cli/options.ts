/**
 * jumpkey — Command-Line Options
 *
 * Exactly one action per run. Short flags may be bundled, but `-hc`
 * names two actions and is rejected.
 */

import { UsageError } from '../errors.js'

export type Action =
  | 'connect'
  | 'connect-proxied'
  | 'describe'
  | 'password'
  | 'convenience'
  | 'help'

export type OptionSpec = {
  short: string
  long: string
  action: Action
  description: string
}

export const OPTIONS: readonly OptionSpec[] = [
  { short: 'c', long: 'connect', action: 'connect', description: 'Connects to selected instance through SSH' },
  { short: 'x', long: 'connect-proxied', action: 'connect-proxied', description: 'Connects to selected instance through SSH over proxychains' },
  { short: 'p', long: 'password', action: 'password', description: 'Copies password of selected instance to clipboard' },
  { short: 'd', long: 'describe', action: 'describe', description: 'Provides a description of selected instance and copies its IP' },
  { short: 't', long: 'execute-convenience', action: 'convenience', description: 'Executes convenience of choice' },
  { short: 'h', long: 'help', action: 'help', description: 'Shows this help message and exits' },
]

const BY_SHORT = new Map(OPTIONS.map((o) => [o.short, o.action]))
const BY_LONG = new Map(OPTIONS.map((o) => [o.long, o.action]))

/** Parse argv (without node and script) into the single requested action */
export function parseArgs(argv: readonly string[]): Action {
  const actions = new Set<Action>()

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === '--') {
      if (i + 1 < argv.length) throw new UsageError('Unrecognized argument.')
      break
    }

    if (arg.startsWith('--')) {
      const action = BY_LONG.get(arg.slice(2))
      if (!action) throw new UsageError('Unrecognized option.')
      actions.add(action)
      continue
    }

    if (arg.startsWith('-') && arg.length > 1) {
      for (const letter of arg.slice(1)) {
        const action = BY_SHORT.get(letter)
        if (!action) throw new UsageError('Unrecognized option.')
        actions.add(action)
      }
      continue
    }

    throw new UsageError('Unrecognized argument.')
  }

  if (actions.size > 1) throw new UsageError('Options are mutually exclusive.')

  const [action] = actions
  return action ?? 'help'
}
