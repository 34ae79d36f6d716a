// Display-width helpers for placing the terminal cursor over a line that may
// contain wide (CJK) or zero-width (combining) characters.

// eslint-disable-next-line no-control-regex
const ANSI_REGEX = /\x1B\[[0-9;]*[A-Za-z]/g

export function stripAnsi(text: string): string {
  return text.replace(ANSI_REGEX, '')
}

function isControl(charCode: number): boolean {
  return (charCode >= 0 && charCode < 32) || charCode === 127
}

function isCombining(charCode: number): boolean {
  // Combining Diacritical Marks, and a few common zero-width ranges
  return (
    (charCode >= 0x0300 && charCode <= 0x036F)
    || (charCode >= 0x1AB0 && charCode <= 0x1AFF)
    || (charCode >= 0x1DC0 && charCode <= 0x1DFF)
    || (charCode >= 0x20D0 && charCode <= 0x20FF)
    || (charCode >= 0xFE20 && charCode <= 0xFE2F)
  )
}

function isWide(charCode: number): boolean {
  // A pragmatic subset of Unicode East Asian Wide ranges
  return (
    (charCode >= 0x1100 && charCode <= 0x115F) // Hangul Jamo
    || (charCode >= 0x2E80 && charCode <= 0xA4CF) // CJK Radicals .. Yi
    || (charCode >= 0xAC00 && charCode <= 0xD7A3) // Hangul Syllables
    || (charCode >= 0xF900 && charCode <= 0xFAFF) // CJK Compatibility Ideographs
    || (charCode >= 0xFE30 && charCode <= 0xFE6F) // CJK Compatibility Forms
    || (charCode >= 0xFF00 && charCode <= 0xFF60) // Fullwidth Forms
    || (charCode >= 0xFFE0 && charCode <= 0xFFE6)
    || (charCode >= 0x1F300 && charCode <= 0x1F64F) // Pictographs, emoticons
    || (charCode >= 0x1F900 && charCode <= 0x1F9FF)
    || (charCode >= 0x20000 && charCode <= 0x3FFFD) // CJK extensions
  )
}

export function wcwidth(ch: string): number {
  const code = ch.codePointAt(0) ?? 0
  if (isControl(code) || isCombining(code))
    return 0
  return isWide(code) ? 2 : 1
}

export function displayWidth(text: string): number {
  let width = 0
  for (const ch of stripAnsi(text)) width += wcwidth(ch)
  return width
}

/**
 * Terminal columns covered by the code points between two offsets of a
 * plain (unstyled) line. Negative when `to` is left of `from`.
 */
export function columnsBetween(text: string, from: number, to: number): number {
  const chars = Array.from(text)
  const lo = Math.min(from, to)
  const hi = Math.max(from, to)
  let width = 0
  for (const ch of chars.slice(lo, hi)) width += wcwidth(ch)
  return to >= from ? width : -width
}
