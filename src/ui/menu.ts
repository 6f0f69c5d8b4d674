/**
 * jumpkey — Menu Prompts
 *
 * Confirm gates and the color chooser run through dmenu so they show
 * up over whichever window currently has focus.
 */

import type { ProcessRunner } from '../system/process.js'

export class Menu {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly argv: readonly string[],
  ) {}

  /** Show options and return the answer, '' on cancel (any non-zero exit) */
  async ask(prompt: string, options: readonly string[], caseInsensitive = false): Promise<string> {
    const argv = caseInsensitive ? [...this.argv, '-i', '-p', prompt] : [...this.argv, '-p', prompt]
    const { stdout, exitCode } = await this.runner.capture(argv, options.join('\n'))
    if (exitCode !== 0) return ''
    return stdout.replace(/\r?\n$/, '')
  }

  /** Confirm / Cancel. Empty or "cancel" (any case) declines; any other answer confirms. */
  async confirm(prompt: string): Promise<boolean> {
    const answer = (await this.ask(prompt, ['Confirm', 'Cancel'])).toLowerCase()
    return answer !== '' && answer !== 'cancel'
  }
}
