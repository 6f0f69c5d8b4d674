/**
 * jumpkey — Markdown Renderer
 *
 * Renders markdown text to ANSI-styled terminal output
 * using marked + marked-terminal.
 */

import { Marked } from 'marked'
import { markedTerminal } from 'marked-terminal'

const marked = new Marked(
  markedTerminal({
    showSectionPrefix: false,
    reflowText:        true,
    width:             (process.stdout.columns || 80) - 4,
    tab:               4,
  })
)

/**
 * Render markdown text to ANSI-styled terminal string.
 * Returns the original text if parsing fails.
 */
export function renderMarkdown(text: string): string {
  try {
    const rendered = marked.parse(text, { async: false })
    // marked-terminal may add trailing newlines; trim to one
    return rendered.replace(/\n{3,}/g, '\n\n').trimEnd()
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`)
    return text
  }
}
