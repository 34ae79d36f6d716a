import type { LineBuffer } from '../input/line-buffer'
import type { CompletionResult, CompletionSources } from './candidates'
import { codePointLength } from '../input/line-buffer'
import { generateCandidates } from './candidates'

// Most candidates listed at once in the summary under the prompt
export const SUMMARY_LIMIT = 10

export interface CompletionSession {
  candidates: string[]
  selected: number
  prefix: string
  // Code point offset in the snapshot where the prefix begins
  anchor: number
  // The line as it was when the session started
  snapshot: string
}

export type CompletionState =
  | { kind: 'idle' }
  | { kind: 'active', session: CompletionSession }

export interface CompletionSummary {
  total: number
  selected: number
  items: Array<{ text: string, selected: boolean }>
  // Candidates beyond the visible window
  hidden: number
}

/**
 * Tracks one Tab-completion session: the candidates generated on the first
 * press, which one is selected, and the original line every substitution is
 * made against.
 */
export class CompletionManager {
  private state: CompletionState = { kind: 'idle' }
  private pending?: CompletionResult

  generate(text: string, cursor: number, sources: CompletionSources): CompletionResult {
    this.state = { kind: 'idle' }
    this.pending = generateCandidates(text, cursor, sources)
    return this.pending
  }

  /**
   * Begin cycling through the last generated candidates with the first one
   * selected. Does nothing when generation found none.
   */
  start(text: string, cursor: number): void {
    const result = this.pending
    if (!result || result.candidates.length === 0)
      return

    this.state = {
      kind: 'active',
      session: {
        candidates: result.candidates,
        selected: 0,
        prefix: result.prefix,
        anchor: Math.max(0, cursor - codePointLength(result.prefix)),
        snapshot: text,
      },
    }
    this.pending = undefined
  }

  // Substitute the selected candidate for the prefix, always starting from the snapshot
  apply(buffer: LineBuffer): void {
    if (this.state.kind !== 'active')
      return

    const { candidates, selected, prefix, anchor, snapshot } = this.state.session
    const candidate = candidates[selected]
    const chars = Array.from(snapshot)
    const end = anchor + codePointLength(prefix)
    const text = chars.slice(0, anchor).join('') + candidate + chars.slice(end).join('')
    buffer.set(text, anchor + codePointLength(candidate))
  }

  cycleNext(): void {
    if (this.state.kind !== 'active')
      return
    const session = this.state.session
    session.selected = (session.selected + 1) % session.candidates.length
  }

  reset(): void {
    this.state = { kind: 'idle' }
    this.pending = undefined
  }

  isActive(): boolean {
    return this.state.kind === 'active'
  }

  isEmpty(): boolean {
    if (this.state.kind === 'active')
      return false
    return !this.pending || this.pending.candidates.length === 0
  }

  shouldShowSummary(): boolean {
    return this.state.kind === 'active' && this.state.session.candidates.length > 1
  }

  getState(): CompletionState {
    return this.state
  }

  selectedCandidate(): string | undefined {
    if (this.state.kind !== 'active')
      return undefined
    return this.state.session.candidates[this.state.session.selected]
  }

  summary(limit = SUMMARY_LIMIT): CompletionSummary | undefined {
    if (this.state.kind !== 'active')
      return undefined

    const { candidates, selected } = this.state.session
    const start = summaryWindowStart(candidates.length, selected, limit)
    const items = candidates
      .slice(start, start + limit)
      .map((text, i) => ({ text, selected: start + i === selected }))

    return {
      total: candidates.length,
      selected,
      items,
      hidden: Math.max(0, candidates.length - limit),
    }
  }
}

/**
 * First index of the visible window: pinned to the start while the selection
 * is in the first half-window, pinned to the end while it is in the last one,
 * centred on the selection otherwise.
 */
export function summaryWindowStart(total: number, selected: number, limit = SUMMARY_LIMIT): number {
  if (total <= limit)
    return 0
  const half = Math.floor(limit / 2)
  if (selected < half)
    return 0
  if (selected > total - half)
    return total - limit
  return selected - half
}
