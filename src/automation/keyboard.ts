/**
 * jumpkey — Simulated Keyboard
 *
 * Types into whichever window has focus via xdotool. Each call resolves
 * once the keystrokes have been sent, so callers can order them. Text
 * goes over stdin (`type --file -`): it may start with `-` and must not
 * show up in the process list.
 */

import type { ProcessRunner } from '../system/process.js'

export interface Keyboard {
  type(text: string): Promise<void>
  key(name: string): Promise<void>
}

export class XdotoolKeyboard implements Keyboard {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly argv: readonly string[],
  ) {}

  async type(text: string): Promise<void> {
    await this.runner.feed([...this.argv, 'type', '--file', '-'], text)
  }

  async key(name: string): Promise<void> {
    await this.runner.feed([...this.argv, 'key', name])
  }
}
