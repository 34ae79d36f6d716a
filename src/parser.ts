/**
 * Splits a command line into arguments, honoring single and double quotes
 * and backslash escapes. Quote characters are consumed; an unterminated
 * quote never closes and a trailing lone backslash is dropped.
 *
 * @example
 * tokenize(`'a b' c`) // ['a b', 'c']
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = []
  let current = ''
  let quoteChar = ''
  let escaped = false

  for (const char of input) {
    if (escaped) {
      current += char
      escaped = false
      continue
    }

    if (char === '\\') {
      escaped = true
      continue
    }

    if (!quoteChar && (char === '"' || char === '\'')) {
      quoteChar = char
      continue
    }

    if (quoteChar && char === quoteChar) {
      quoteChar = ''
      continue
    }

    if (!quoteChar && (char === ' ' || char === '\t')) {
      if (current) {
        tokens.push(current)
        current = ''
      }
      continue
    }

    current += char
  }

  if (current) {
    tokens.push(current)
  }

  return tokens
}
