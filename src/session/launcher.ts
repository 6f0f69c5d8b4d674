/**
 * jumpkey — Session Launcher
 *
 * Starts the post-connect automation in the background, then hands the
 * terminal to ssh. The automation races the login prompt on fixed
 * delays only; it is advisory and nobody waits for it.
 */

import type { ProcessRunner } from '../system/process.js'
import type { ToolsConfig } from '../config/types.js'
import type { HostRecord } from '../inventory/types.js'
import type { AutomationEngine } from '../automation/engine.js'
import type { Logger } from '../log/debug-log.js'
import { effectivePort } from '../inventory/store.js'
import { errorMessage } from '../errors.js'

export type ConnectOptions = {
  proxied: boolean
}

/** ssh argv for a record, optionally wrapped in the proxy tool */
export function sshCommand(
  record: HostRecord,
  tools: Pick<ToolsConfig, 'ssh' | 'proxy'>,
  { proxied }: ConnectOptions,
): string[] {
  const ssh = [...tools.ssh, '-p', effectivePort(record), `${record.user}@${record.address}`]
  return proxied ? [...tools.proxy, ...ssh] : ssh
}

export class SessionLauncher {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly tools: Pick<ToolsConfig, 'ssh' | 'proxy'>,
    private readonly automation: AutomationEngine,
    private readonly logger: Logger,
  ) {}

  /** Resolves with the ssh client's exit code */
  async connect(record: HostRecord, options: ConnectOptions): Promise<number> {
    const argv = sshCommand(record, this.tools, options)
    this.logger.log('connect', { host: record.name, argv })

    // Fire and forget: the shell session below does not wait on this
    void this.automation.postConnect(record.credential).then(
      (result) => this.logger.log('post-connect automation finished', { host: record.name, result }),
      (err: unknown) => {
        this.logger.log('post-connect automation failed', { host: record.name, error: errorMessage(err) })
        process.stderr.write(`Post-connect automation failed: ${errorMessage(err)}\n`)
      },
    )

    return this.runner.interactive(argv)
  }
}
