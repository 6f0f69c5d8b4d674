/**
 * jumpkey — Theme
 *
 * ANSI helpers for the few lines jumpkey prints itself.
 */

const ESC = '\x1b['
export const RESET = `${ESC}0m`
export const BOLD = `${ESC}1m`

// 256-color foreground
const fg = (code: number) => `${ESC}38;5;${code}m`

export const C = {
  warning: fg(214),  // amber
  error:   fg(196),  // red
} as const

export const bold = (text: string) => `${BOLD}${text}${RESET}`
