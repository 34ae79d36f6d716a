import type { CompletionSources } from '../completion/candidates'
import type { BuiltinCommand, CommandResult, Shell, WshConfig } from '../types'
import { statSync } from 'node:fs'
import { resolve } from 'node:path'
import process from 'node:process'
import { createBuiltins } from '../builtins'
import { defaultConfig } from '../config'
import { HistoryStore } from '../history'
import { Logger } from '../logger'
import { tokenize } from '../parser'
import { renderPrompt } from '../prompt'
import { getHomeDirectory, getPathDirectories, isExecutable } from '../utils/environment'
import { supportsColor } from '../utils/style'
import { CommandExecutor } from './command-executor'

export interface WshShellOptions {
  env?: NodeJS.ProcessEnv
  cwd?: string
  executor?: CommandExecutor
  log?: Logger
}

/**
 * Owns everything that outlives a single prompt line: working directory,
 * aliases, history, and command dispatch to built-ins or external programs.
 */
export class WshShell implements Shell {
  public config: WshConfig
  public cwd: string
  public home: string | undefined
  public aliases: Record<string, string>
  public builtins: Map<string, BuiltinCommand>
  public log: Logger

  private env: NodeJS.ProcessEnv
  private historyStore: HistoryStore
  private executor: CommandExecutor
  private running = true

  constructor(config: WshConfig = defaultConfig, options: WshShellOptions = {}) {
    this.config = config
    this.env = options.env ?? process.env
    this.cwd = options.cwd ?? process.cwd()
    this.home = getHomeDirectory(this.env)
    this.aliases = { ...config.aliases }
    this.builtins = createBuiltins()
    this.log = options.log ?? new Logger(config.verbose, 'shell', config.logging)
    this.historyStore = new HistoryStore(config.historySize)
    this.executor = options.executor ?? new CommandExecutor(this.log.withScope('exec'), { env: this.env })
  }

  get history(): readonly string[] {
    return this.historyStore.entries()
  }

  getHistoryStore(): HistoryStore {
    return this.historyStore
  }

  addToHistory(command: string): void {
    this.historyStore.append(command)
  }

  /**
   * Run one line: record it in history, expand aliases, then dispatch.
   * Blank input is ignored and not recorded.
   */
  async execute(command: string): Promise<CommandResult> {
    const trimmed = command.trim()
    if (!trimmed)
      return { exitCode: 0, stdout: '', stderr: '' }

    this.addToHistory(trimmed)
    return this.dispatch(tokenize(trimmed), new Set())
  }

  // Each alias expands at most once per line, so `ls -> ls -G` terminates
  private async dispatch(tokens: string[], expanded: Set<string>): Promise<CommandResult> {
    if (tokens.length === 0)
      return { exitCode: 0, stdout: '', stderr: '' }

    const [name, ...args] = tokens

    if (Object.hasOwn(this.aliases, name) && !expanded.has(name)) {
      expanded.add(name)
      this.log.debug(`expanding alias ${name}`)
      return this.dispatch([...tokenize(this.aliases[name]), ...args], expanded)
    }

    const builtin = this.builtins.get(name)
    if (builtin)
      return builtin.execute(args, this)

    return this.executor.run(name, args, this.cwd)
  }

  changeDirectory(path: string): boolean {
    const target = resolve(this.cwd, path)
    try {
      if (!statSync(target).isDirectory())
        return false
    }
    catch {
      return false
    }
    this.cwd = target
    return true
  }

  completionSources(): CompletionSources {
    return {
      builtins: Array.from(this.builtins.keys()),
      aliases: Object.keys(this.aliases),
      pathDirs: getPathDirectories(this.env),
      isExecutable,
      history: this.historyStore,
      home: this.home,
      cwd: this.cwd,
      log: this.log.withScope('completion'),
    }
  }

  colorsEnabled(): boolean {
    return this.config.enableColors && supportsColor({ env: this.env })
  }

  renderPrompt(): string {
    return renderPrompt(this.config.prompt, this.cwd, this.home, this.colorsEnabled())
  }

  isRunning(): boolean {
    return this.running
  }

  stop(): void {
    this.running = false
  }
}
