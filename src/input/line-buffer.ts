/**
 * Editable line with a cursor. Offsets count Unicode code points, so the
 * cursor always sits between two whole characters and an astral character
 * (emoji, CJK extension) is inserted and removed as one unit.
 */
export class LineBuffer {
  private chars: string[] = []
  private position = 0

  constructor(text = '') {
    this.set(text)
  }

  get text(): string {
    return this.chars.join('')
  }

  get cursor(): number {
    return this.position
  }

  get length(): number {
    return this.chars.length
  }

  isEmpty(): boolean {
    return this.chars.length === 0
  }

  // Text up to the cursor
  beforeCursor(): string {
    return this.chars.slice(0, this.position).join('')
  }

  insert(text: string): void {
    const inserted = Array.from(text)
    this.chars.splice(this.position, 0, ...inserted)
    this.position += inserted.length
  }

  deleteBackward(): boolean {
    if (this.position === 0)
      return false
    this.chars.splice(this.position - 1, 1)
    this.position--
    return true
  }

  deleteForward(): boolean {
    if (this.position >= this.chars.length)
      return false
    this.chars.splice(this.position, 1)
    return true
  }

  moveLeft(): boolean {
    if (this.position === 0)
      return false
    this.position--
    return true
  }

  moveRight(): boolean {
    if (this.position >= this.chars.length)
      return false
    this.position++
    return true
  }

  moveToStart(): void {
    this.position = 0
  }

  moveToEnd(): void {
    this.position = this.chars.length
  }

  /**
   * Replace the whole line. The cursor goes to the end unless a position is
   * given, in which case it is clamped to the new length.
   */
  set(text: string, cursor?: number): void {
    this.chars = Array.from(text)
    const target = cursor ?? this.chars.length
    this.position = Math.max(0, Math.min(target, this.chars.length))
  }

  clear(): void {
    this.chars = []
    this.position = 0
  }
}

/** Number of code points in a string. */
export function codePointLength(text: string): number {
  return Array.from(text).length
}

/** Code point aware `slice`. */
export function sliceCodePoints(text: string, start: number, end?: number): string {
  return Array.from(text).slice(start, end).join('')
}
