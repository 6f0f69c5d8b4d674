/**
 * jumpkey — Clipboard Guard
 *
 * Copies text to the system clipboard. Sensitive values get a clear
 * scheduled in a detached process, so it still fires after jumpkey
 * itself has exited.
 */

import type { ProcessRunner } from '../system/process.js'
import type { Logger } from '../log/debug-log.js'
import { silentLogger } from '../log/debug-log.js'

export const CLEAR_AFTER_SECONDS = 10

export interface Clipboard {
  set(text: string): Promise<void>
}

/** Runs a clipboard clear some time from now, independent of this process */
export interface ClearScheduler {
  scheduleClear(afterSeconds: number): void
}

// ── xclip ───────────────────────────────────────────────────────────────────

export class XclipClipboard implements Clipboard {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly argv: readonly string[],
  ) {}

  async set(text: string): Promise<void> {
    await this.runner.feed(this.argv, text)
  }
}

/**
 * `sh -c 'sleep N && exec <clipboard tool> < /dev/null'`, detached and
 * unref'd. The tool's argv is passed as positional parameters.
 */
export class DetachedClearScheduler implements ClearScheduler {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly clipboardArgv: readonly string[],
  ) {}

  scheduleClear(afterSeconds: number): void {
    this.runner.detached([
      'sh',
      '-c',
      'sleep "$0" && exec "$@" < /dev/null',
      String(afterSeconds),
      ...this.clipboardArgv,
    ])
  }
}

// ── Guard ───────────────────────────────────────────────────────────────────

function stripTrailingNewlines(value: string): string {
  return value.replace(/[\r\n]+$/, '')
}

export class ClipboardGuard {
  constructor(
    private readonly clipboard: Clipboard,
    private readonly scheduler: ClearScheduler,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** Copy a secret; the clipboard is emptied CLEAR_AFTER_SECONDS later */
  async copySensitive(value: string): Promise<void> {
    await this.clipboard.set(stripTrailingNewlines(value))
    this.scheduler.scheduleClear(CLEAR_AFTER_SECONDS)
    this.logger.log('clipboard: copied sensitive value', { clearAfterSeconds: CLEAR_AFTER_SECONDS })
  }

  async copyPlain(value: string): Promise<void> {
    await this.clipboard.set(stripTrailingNewlines(value))
  }
}
