/**
 * jumpkey — Config Types
 */

/** argv prefix of each external collaborator */
export type ToolsConfig = {
  picker: string[]
  menu: string[]
  typer: string[]
  clipboard: string[]
  ssh: string[]
  proxy: string[]
}

export type JumpkeyConfig = {
  inventory: string
  tools: ToolsConfig
  log?: boolean
}
