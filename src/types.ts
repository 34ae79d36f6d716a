export interface WshConfig {
  verbose: boolean
  /**
   * Prompt template. `{cwd}` is replaced with the working directory,
   * with the home directory shown as `~`.
   */
  prompt: string
  historySize: number
  enableColors: boolean
  // Print the candidate list under the prompt while cycling completions
  showCompletionSummary: boolean
  aliases: Record<string, string>
  logging: LoggingConfig
}

export interface LoggingConfig {
  timestamps?: boolean
  prefixes?: {
    debug?: string
    info?: string
    warn?: string
    error?: string
  }
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
  duration?: number
  /**
   * Indicates whether the command's output was already streamed live.
   * If true, callers should avoid re-printing stdout/stderr to prevent duplicates.
   * Builtins leave this unset and return buffered output.
   */
  streamed?: boolean
}

export interface BuiltinCommand {
  name: string
  description: string
  usage: string
  execute: (args: string[], shell: Shell) => Promise<CommandResult>
}

/**
 * The surface built-ins and the REPL see of the running shell.
 */
export interface Shell {
  config: WshConfig
  cwd: string
  home: string | undefined
  aliases: Record<string, string>
  builtins: Map<string, BuiltinCommand>
  readonly history: readonly string[]

  execute: (command: string) => Promise<CommandResult>
  changeDirectory: (path: string) => boolean
  isRunning: () => boolean
  stop: () => void
}
