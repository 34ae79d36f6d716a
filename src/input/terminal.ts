import type { Key } from 'node:readline'
import type { KeyEvent, RawTerminal } from './types'
import process from 'node:process'
import { emitKeypressEvents } from 'node:readline'
import { decodeKeypress } from './keys'

// What NodeTerminal reads keys from; process.stdin satisfies it
export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
}

export interface TerminalOutput {
  write: (data: string) => unknown
}

// Closed input is not a Ctrl+D keypress: it ends the session even mid-line
const END_OF_INPUT: KeyEvent = { kind: 'interrupt' }

interface PendingRead {
  resolve: (event: KeyEvent) => void
  reject: (error: Error) => void
}

/**
 * RawTerminal over process.stdin/stdout. Keypresses are queued as they
 * arrive and handed out one per readKey() call, in arrival order. Once the
 * input has ended and the queue is drained every read yields an interrupt;
 * a stream error fails the pending and every later read.
 */
export class NodeTerminal implements RawTerminal {
  private stdin: TerminalInput
  private stdout: TerminalOutput
  private queue: KeyEvent[] = []
  private waiting: PendingRead[] = []
  private failure?: Error
  private ended = false
  private listening = false

  constructor(stdin: TerminalInput = process.stdin, stdout: TerminalOutput = process.stdout) {
    this.stdin = stdin
    this.stdout = stdout
  }

  enableRawMode(): void {
    if (this.stdin.isTTY)
      this.stdin.setRawMode?.(true)
    this.listen()
    this.stdin.resume()
  }

  disableRawMode(): void {
    if (this.stdin.isTTY)
      this.stdin.setRawMode?.(false)
    this.stdin.pause()
  }

  readKey(): Promise<KeyEvent> {
    const queued = this.queue.shift()
    if (queued)
      return Promise.resolve(queued)
    if (this.failure)
      return Promise.reject(this.failure)
    if (this.ended)
      return Promise.resolve(END_OF_INPUT)
    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject })
    })
  }

  write(data: string): void {
    this.stdout.write(data)
  }

  close(): void {
    this.stdin.off('keypress', this.onKeypress)
    this.stdin.off('end', this.onEnd)
    this.stdin.off('error', this.onError)
    this.listening = false
  }

  private listen(): void {
    if (this.listening)
      return
    emitKeypressEvents(this.stdin)
    this.stdin.on('keypress', this.onKeypress)
    this.stdin.on('end', this.onEnd)
    this.stdin.on('error', this.onError)
    this.listening = true
  }

  private deliver(event: KeyEvent): void {
    const next = this.waiting.shift()
    if (next)
      next.resolve(event)
    else
      this.queue.push(event)
  }

  private onKeypress = (str: string | undefined, key: Key | undefined): void => {
    this.deliver(decodeKeypress(str, key))
  }

  private onEnd = (): void => {
    this.ended = true
    for (const pending of this.waiting.splice(0))
      pending.resolve(END_OF_INPUT)
  }

  private onError = (error: Error): void => {
    this.failure = error
    for (const pending of this.waiting.splice(0))
      pending.reject(error)
  }
}
