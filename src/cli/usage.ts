/**
 * jumpkey — Usage Text
 */

import { OPTIONS } from './options.js'

export const PROGRAM = 'jumpkey'

export function usageMarkdown(): string {
  const rows = OPTIONS.map((o) => `| \`-${o.short}\` \\| \`--${o.long}\` | ${o.description} |`)
  return [
    '# USAGE',
    '',
    `    ${PROGRAM} [OPTIONS]`,
    '',
    '# OPTIONS',
    '',
    '| Option | Description |',
    '| --- | --- |',
    ...rows,
    '',
  ].join('\n')
}

export function usageHint(): string {
  return `Try \`${PROGRAM} -h\` for more information.`
}
