#!/usr/bin/env node

/**
 * jumpkey — Entry Point
 *
 * Loads config → wires the external tools → runs the requested action.
 */

import { loadConfig } from './config/loader.js'
import { appHome } from './config/paths.js'
import { createDebugLogger, silentLogger } from './log/debug-log.js'
import { createCommandContext } from './commands/context.js'
import { nodeRunner } from './system/process.js'
import { main } from './cli/main.js'

const io = {
  stdout: (text: string) => process.stdout.write(text),
  stderr: (text: string) => process.stderr.write(text),
}

const exitCode = await main(process.argv.slice(2), io, () => {
  const config = loadConfig()
  const logger = config.log ? createDebugLogger(appHome('logs')) : silentLogger
  return createCommandContext(config, nodeRunner, logger)
})

process.exit(exitCode)
