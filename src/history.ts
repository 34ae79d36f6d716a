/**
 * Bounded log of accepted commands, oldest first. An entry equal to the one
 * before it is never stored twice in a row; non-adjacent repeats are kept.
 */
export class HistoryStore implements Iterable<string> {
  private history: string[] = []
  private readonly maxEntries: number

  constructor(maxEntries = 1000) {
    this.maxEntries = Math.max(1, Math.floor(maxEntries))
  }

  append(command: string): void {
    if (this.history[this.history.length - 1] === command)
      return

    this.history.push(command)

    while (this.history.length > this.maxEntries)
      this.history.shift()
  }

  get length(): number {
    return this.history.length
  }

  get capacity(): number {
    return this.maxEntries
  }

  get(index: number): string | undefined {
    return this.history[index]
  }

  entries(): readonly string[] {
    return [...this.history]
  }

  [Symbol.iterator](): Iterator<string> {
    return this.history[Symbol.iterator]()
  }
}
