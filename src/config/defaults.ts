/**
 * jumpkey — Config Defaults
 */

import type { JumpkeyConfig } from './types.js'
import { appHome } from './paths.js'

export const DEFAULT_CONFIG: JumpkeyConfig = {
  inventory: appHome('servers.csv'),
  tools: {
    picker: ['fzf'],
    menu: ['dmenu'],
    typer: ['xdotool'],
    clipboard: ['xclip', '-selection', 'clipboard'],
    ssh: ['ssh'],
    proxy: ['proxychains'],
  },
  log: false,
}
