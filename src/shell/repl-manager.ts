import type { KeyResult, LineRenderer, RawTerminal } from '../input/types'
import type { Logger } from '../logger'
import type { CommandResult } from '../types'
import type { WshShell } from './index'
import { InputEngine } from '../input/input-engine'
import { TerminalRenderer } from '../input/render'
import { red } from '../utils/style'

export const WELCOME_BANNER = 'Welcome to wsh - an interactive shell with history and tab completion!\n'
  + 'Type \'help\' for available commands or \'exit\' to quit.\n'
export const GOODBYE_BANNER = '\nGoodbye!\n'

/**
 * The interactive loop. Raw mode is held for the whole session and released
 * on every way out, including a failed key read or redraw; it is also
 * released while a command runs so the command sees a normal terminal.
 */
export class ReplManager {
  private shell: WshShell
  private terminal: RawTerminal
  private renderer: LineRenderer
  private log: Logger
  private running = false

  constructor(shell: WshShell, terminal: RawTerminal, log: Logger) {
    this.shell = shell
    this.terminal = terminal
    this.log = log
    this.renderer = new TerminalRenderer(data => this.terminal.write(data), () => this.shell.renderPrompt())
  }

  async start(): Promise<void> {
    if (this.running)
      return
    this.running = true

    const engine = new InputEngine({
      history: this.shell.getHistoryStore(),
      renderer: this.renderer,
      completionSources: () => this.shell.completionSources(),
      showCompletionSummary: this.shell.config.showCompletionSummary,
      log: this.log.withScope('input'),
    })

    this.terminal.write(WELCOME_BANNER)
    this.terminal.enableRawMode()
    try {
      while (this.running && this.shell.isRunning()) {
        this.renderer.redraw(engine.text, engine.cursor)

        const outcome = await this.readLine(engine)
        if (outcome.type !== 'command')
          break

        this.terminal.write('\r\n')
        await this.runCommand(outcome.text)
        engine.reset()
      }
    }
    finally {
      this.terminal.disableRawMode()
      this.running = false
    }
    this.terminal.write(GOODBYE_BANNER)
  }

  stop(): void {
    this.running = false
  }

  isRunning(): boolean {
    return this.running
  }

  // Feed keys to the engine until it accepts a line or asks to exit
  private async readLine(engine: InputEngine): Promise<KeyResult> {
    while (true) {
      const key = await this.terminal.readKey()
      const result = engine.handleKey(key)
      if (result.type !== 'continue')
        return result
    }
  }

  private async runCommand(command: string): Promise<void> {
    this.terminal.disableRawMode()
    try {
      const result = await this.shell.execute(command)
      this.printResult(result)
    }
    catch (error) {
      this.log.debug('command failed', error)
      this.printError(error instanceof Error ? error.message : String(error))
    }
    finally {
      this.terminal.enableRawMode()
    }
  }

  private printResult(result: CommandResult): void {
    if (result.streamed) {
      if (result.exitCode !== 0)
        this.printError(`command exited with status ${result.exitCode}`)
      return
    }

    if (result.stdout) {
      this.terminal.write(result.stdout)
      if (!result.stdout.endsWith('\n'))
        this.terminal.write('\n')
    }

    if (result.stderr) {
      const message = result.stderr.endsWith('\n') ? result.stderr : `${result.stderr}\n`
      this.terminal.write(red(message, this.shell.colorsEnabled()))
    }
  }

  private printError(message: string): void {
    this.terminal.write(`${red(`Error: ${message}`, this.shell.colorsEnabled())}\n`)
  }
}
