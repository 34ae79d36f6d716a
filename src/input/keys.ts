import type { Key } from 'node:readline'
import type { KeyEvent, KeyName } from './types'

const NAMED_KEYS: Record<string, KeyName> = {
  backspace: 'backspace',
  delete: 'delete',
  left: 'left',
  right: 'right',
  home: 'home',
  end: 'end',
  up: 'up',
  down: 'down',
  tab: 'tab',
  return: 'enter',
  enter: 'enter',
}

// Translate a readline 'keypress' event into a KeyEvent
export function decodeKeypress(str: string | undefined, key: Key | undefined): KeyEvent {
  if (key?.ctrl && key.name === 'c')
    return { kind: 'interrupt' }
  if (key?.ctrl && key.name === 'd')
    return { kind: 'eof' }

  const named = key?.name && !key.ctrl && !key.meta && Object.hasOwn(NAMED_KEYS, key.name)
    ? NAMED_KEYS[key.name]
    : undefined
  if (named)
    return { kind: named }

  if (str && isPrintable(str) && !key?.ctrl && !key?.meta)
    return { kind: 'char', char: str }

  return { kind: 'other' }
}

// A single code point outside the C0/C1 control ranges
function isPrintable(str: string): boolean {
  const chars = Array.from(str)
  if (chars.length !== 1)
    return false
  const code = chars[0].codePointAt(0) ?? 0
  return code >= 0x20 && code !== 0x7F && !(code >= 0x80 && code < 0xA0)
}
