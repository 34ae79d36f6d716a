import type { HistoryStore } from '../history'

export type HistoryState =
  | { kind: 'idle' }
  | { kind: 'browsing', index: number }

// A pure, testable history navigator. No TTY or rendering concerns.
// up()/down() return the text the line should show, or undefined when the
// key has no effect.
export class HistoryNavigator {
  private store: HistoryStore
  private state: HistoryState = { kind: 'idle' }

  constructor(store: HistoryStore) {
    this.store = store
  }

  // Move to the previous (older) entry; starts browsing at the newest one.
  up(): string | undefined {
    if (this.store.length === 0)
      return undefined

    if (this.state.kind === 'idle')
      return this.moveTo(this.store.length - 1)

    if (this.state.index > 0)
      return this.moveTo(this.state.index - 1)

    // Already at the oldest entry
    return undefined
  }

  // Move to the next (newer) entry; stepping past the newest stops browsing
  // and yields an empty line.
  down(): string | undefined {
    if (this.state.kind === 'idle')
      return undefined

    if (this.state.index < this.store.length - 1)
      return this.moveTo(this.state.index + 1)

    this.state = { kind: 'idle' }
    return ''
  }

  reset(): void {
    this.state = { kind: 'idle' }
  }

  isBrowsing(): boolean {
    return this.state.kind === 'browsing'
  }

  getState(): HistoryState {
    return this.state
  }

  private moveTo(index: number): string {
    this.state = { kind: 'browsing', index }
    return this.store.get(index) ?? ''
  }
}
