/**
 * jumpkey — Fuzzy Picker
 *
 * Hands a list of lines to fzf (or whatever `tools.picker` names) and
 * reads back the chosen ones. Cancelling is not an error: it yields
 * nothing.
 */

import type { CaptureResult, ProcessRunner } from '../system/process.js'

/** Lines the picker printed; none when it exited non-zero (cancel, no match) */
function chosenLines({ stdout, exitCode }: CaptureResult): string[] {
  if (exitCode !== 0) return []
  return stdout.split('\n').map((line) => line.replace(/\r$/, '')).filter(Boolean)
}

export class Picker {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly argv: readonly string[],
  ) {}

  /** Pick one entry, or undefined on cancel / empty list */
  async select(names: Iterable<string>): Promise<string | undefined> {
    const options = [...names]
    if (options.length === 0) return undefined

    return chosenLines(await this.runner.capture(this.argv, options.join('\n')))[0]
  }

  /** Pick any number of entries, in the order the picker reports them */
  async selectMany(options: readonly string[], prompt: string): Promise<string[]> {
    if (options.length === 0) return []

    return chosenLines(await this.runner.capture([...this.argv, '-m', '--prompt', prompt], options.join('\n')))
  }
}
