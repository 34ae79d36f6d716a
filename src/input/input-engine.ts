import type { CompletionSources } from '../completion/candidates'
import type { HistoryStore } from '../history'
import type { Logger } from '../logger'
import type { KeyEvent, KeyResult, LineRenderer } from './types'
import { CompletionManager } from '../completion/completion-manager'
import { HistoryNavigator } from '../history/history-navigator'
import { LineBuffer } from './line-buffer'

export interface InputEngineOptions {
  history: HistoryStore
  renderer: LineRenderer
  // Read on every first Tab press so completion sees the current cwd and aliases
  completionSources: () => CompletionSources
  showCompletionSummary?: boolean
  log?: Logger
}

const CONTINUE: KeyResult = { type: 'continue' }

/**
 * Key-event state machine for one prompt line. Each call to handleKey runs to
 * completion synchronously; editing keys cancel an active completion session,
 * cursor keys leave it alone.
 */
export class InputEngine {
  private buffer = new LineBuffer()
  private completion = new CompletionManager()
  private navigator: HistoryNavigator
  private renderer: LineRenderer
  private completionSources: () => CompletionSources
  private showCompletionSummary: boolean
  private log?: Logger

  constructor(options: InputEngineOptions) {
    this.navigator = new HistoryNavigator(options.history)
    this.renderer = options.renderer
    this.completionSources = options.completionSources
    this.showCompletionSummary = options.showCompletionSummary ?? true
    this.log = options.log
  }

  get text(): string {
    return this.buffer.text
  }

  get cursor(): number {
    return this.buffer.cursor
  }

  isBrowsingHistory(): boolean {
    return this.navigator.isBrowsing()
  }

  isCompleting(): boolean {
    return this.completion.isActive()
  }

  // Prepare for the next line: empty buffer, no session, not browsing
  reset(): void {
    this.buffer.clear()
    this.completion.reset()
    this.navigator.reset()
  }

  handleKey(event: KeyEvent): KeyResult {
    switch (event.kind) {
      case 'char': {
        const char = event.char
        this.edit(() => this.buffer.insert(char))
        return CONTINUE
      }

      case 'backspace':
        this.edit(() => this.buffer.deleteBackward())
        return CONTINUE

      case 'delete':
        this.edit(() => this.buffer.deleteForward())
        return CONTINUE

      case 'left':
        this.moveCursor(() => this.buffer.moveLeft())
        return CONTINUE

      case 'right':
        this.moveCursor(() => this.buffer.moveRight())
        return CONTINUE

      case 'home':
        this.moveCursor(() => this.buffer.moveToStart())
        return CONTINUE

      case 'end':
        this.moveCursor(() => this.buffer.moveToEnd())
        return CONTINUE

      case 'up':
        this.showHistoryEntry(this.navigator.up())
        return CONTINUE

      case 'down':
        this.showHistoryEntry(this.navigator.down())
        return CONTINUE

      case 'tab':
        this.complete()
        return CONTINUE

      case 'enter':
        return { type: 'command', text: this.buffer.text }

      case 'interrupt':
        return { type: 'exit' }

      case 'eof':
        return this.buffer.isEmpty() ? { type: 'exit' } : CONTINUE

      default:
        return CONTINUE
    }
  }

  private complete(): void {
    if (!this.completion.isActive()) {
      const result = this.completion.generate(this.buffer.text, this.buffer.cursor, this.completionSources())
      this.log?.debug(`${result.mode} completion for "${result.prefix}": ${result.candidates.length} candidate(s)`)
      if (this.completion.isEmpty())
        return
      this.completion.start(this.buffer.text, this.buffer.cursor)
    }
    else {
      this.completion.cycleNext()
    }

    this.completion.apply(this.buffer)
    this.redraw()
  }

  private showHistoryEntry(text: string | undefined): void {
    if (text === undefined)
      return
    this.completion.reset()
    this.buffer.set(text)
    this.redraw()
  }

  // Always repaint: a cancelled session may have left a summary under the line
  private edit(change: () => void): void {
    this.completion.reset()
    change()
    this.redraw()
  }

  private moveCursor(move: () => void): void {
    const from = this.buffer.cursor
    move()
    if (this.buffer.cursor !== from)
      this.renderer.moveCursor(this.buffer.text, from, this.buffer.cursor)
  }

  private redraw(): void {
    const summary = this.showCompletionSummary && this.completion.shouldShowSummary()
      ? this.completion.summary()
      : undefined
    this.renderer.redraw(this.buffer.text, this.buffer.cursor, summary)
  }
}
