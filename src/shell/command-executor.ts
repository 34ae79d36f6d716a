import type { Logger } from '../logger'
import type { CommandResult } from '../types'
import { spawn } from 'node:child_process'
import { constants } from 'node:os'
import process from 'node:process'

export interface CommandExecutorOptions {
  // 'inherit' hands the terminal to the child; 'pipe' captures its output
  stdio?: 'inherit' | 'pipe'
  env?: NodeJS.ProcessEnv
}

/**
 * Runs external programs directly (no intermediate /bin/sh, so no shell
 * grammar) in the shell's working directory.
 */
export class CommandExecutor {
  private log: Logger
  private stdio: 'inherit' | 'pipe'
  private env: NodeJS.ProcessEnv

  constructor(log: Logger, options: CommandExecutorOptions = {}) {
    this.log = log
    this.stdio = options.stdio ?? 'inherit'
    this.env = options.env ?? process.env
  }

  run(name: string, args: string[], cwd: string): Promise<CommandResult> {
    const start = performance.now()
    this.log.debug(`spawning ${name} with ${args.length} argument(s) in ${cwd}`)

    return new Promise((resolve) => {
      let stdout = ''
      let stderr = ''
      let settled = false

      const finish = (result: Omit<CommandResult, 'duration'>) => {
        if (settled)
          return
        settled = true
        resolve({ ...result, duration: performance.now() - start })
      }

      const child = spawn(name, args, {
        cwd,
        env: this.env,
        stdio: this.stdio,
        windowsHide: true,
      })

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString()
      })
      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString()
      })

      child.on('error', (error: NodeJS.ErrnoException) => {
        const reason = error.code === 'ENOENT' ? 'command not found' : error.message
        this.log.debug(`failed to spawn ${name}: ${error.message}`)
        finish({
          exitCode: error.code === 'ENOENT' ? 127 : 126,
          stdout: '',
          stderr: `wsh: failed to execute '${name}': ${reason}\n`,
        })
      })

      child.on('close', (code, signal) => {
        // A child that never started is reported by the 'error' handler
        if (child.pid === undefined)
          return
        const exitCode = code ?? (signal ? 128 + signalNumber(signal) : 1)
        finish({
          exitCode,
          stdout,
          stderr,
          streamed: this.stdio === 'inherit',
        })
      })
    })
  }
}

function signalNumber(signal: NodeJS.Signals): number {
  return Object.entries(constants.signals).find(([name]) => name === signal)?.[1] ?? 0
}
