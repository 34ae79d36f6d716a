import type { CompletionSummary } from '../completion/completion-manager'
import type { LineRenderer } from './types'
import { columnsBetween, displayWidth } from './ansi'

const CLEAR_TO_END = '\x1B[J'

function cursorLeft(n: number): string {
  return n > 0 ? `\x1B[${n}D` : ''
}

function cursorRight(n: number): string {
  return n > 0 ? `\x1B[${n}C` : ''
}

function cursorUp(n: number): string {
  return n > 0 ? `\x1B[${n}A` : ''
}

// Lines printed under the prompt while cycling through several completions
export function formatCompletionSummary(summary: CompletionSummary): string[] {
  const lines = [`Completions (${summary.selected + 1}/${summary.total}):`]
  for (const item of summary.items)
    lines.push(`  ${item.selected ? '>' : ' '}${item.text}`)
  if (summary.hidden > 0)
    lines.push(`  ... (${summary.hidden} more)`)
  return lines
}

/**
 * Paints the prompt line onto a terminal through a write function. A redraw
 * returns to column 0, clears everything below, and repaints; whatever a
 * previous redraw printed under the line disappears with it.
 */
export class TerminalRenderer implements LineRenderer {
  private write: (data: string) => void
  private prompt: () => string

  constructor(write: (data: string) => void, prompt: () => string) {
    this.write = write
    this.prompt = prompt
  }

  redraw(text: string, cursor: number, summary?: CompletionSummary): void {
    const prompt = this.prompt()
    let out = `\r${CLEAR_TO_END}${prompt}${text}`

    if (summary) {
      const lines = formatCompletionSummary(summary)
      out += `\r\n${lines.join('\r\n')}`
      out += cursorUp(lines.length)
      out += `\r${cursorRight(displayWidth(prompt) + columnsBetween(text, 0, cursor))}`
    }
    else {
      out += cursorLeft(columnsBetween(text, cursor, Array.from(text).length))
    }

    this.write(out)
  }

  moveCursor(text: string, from: number, to: number): void {
    const columns = columnsBetween(text, from, to)
    this.write(columns >= 0 ? cursorRight(columns) : cursorLeft(-columns))
  }
}
