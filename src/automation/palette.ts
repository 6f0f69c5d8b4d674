/**
 * jumpkey — Prompt Palette
 *
 * Standard ANSI foreground codes offered when recoloring a remote prompt.
 */

export const PROMPT_COLORS = {
  Red: '31',
  Green: '32',
  Yellow: '33',
  Blue: '34',
  Magenta: '35',
  Cyan: '36',
  White: '37',
} as const

export type ColorName = keyof typeof PROMPT_COLORS

export const COLOR_NAMES = Object.keys(PROMPT_COLORS).filter(isColorName)

export function isColorName(value: string): value is ColorName {
  return Object.hasOwn(PROMPT_COLORS, value)
}

/** Shell line that sets a bold, colored `user@host` prompt */
export function promptCommand(color: ColorName): string {
  const code = PROMPT_COLORS[color]
  return `export PS1='\\e[1;${code}m\\u@\\h\\e[0m \\w\\n$ '`
}
