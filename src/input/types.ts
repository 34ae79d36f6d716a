import type { CompletionSummary } from '../completion/completion-manager'

export type KeyName =
  | 'backspace'
  | 'delete'
  | 'left'
  | 'right'
  | 'home'
  | 'end'
  | 'up'
  | 'down'
  | 'tab'
  | 'enter'
  | 'interrupt'
  | 'eof'
  | 'other'

export type KeyEvent =
  | { kind: 'char', char: string }
  | { kind: KeyName }

export type KeyResult =
  | { type: 'continue' }
  | { type: 'command', text: string }
  | { type: 'exit' }

/**
 * Terminal side of line editing. `redraw` repaints prompt and line;
 * `moveCursor` only moves the terminal cursor between two offsets of the
 * unchanged line.
 */
export interface LineRenderer {
  redraw: (text: string, cursor: number, summary?: CompletionSummary) => void
  moveCursor: (text: string, from: number, to: number) => void
}

/**
 * A terminal that can be switched into raw mode and read one key at a time.
 */
export interface RawTerminal {
  enableRawMode: () => void
  disableRawMode: () => void
  readKey: () => Promise<KeyEvent>
  write: (data: string) => void
  close?: () => void
}
