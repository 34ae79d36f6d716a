import type { BuiltinCommand, CommandResult, Shell } from './types'

/**
 * HISTORY command - lists accepted commands, oldest first, numbered from 1
 */
export const historyCommand: BuiltinCommand = {
  name: 'history',
  description: 'Show command history',
  usage: 'history',
  async execute(_args: string[], shell: Shell): Promise<CommandResult> {
    const start = performance.now()

    if (shell.history.length === 0) {
      return {
        exitCode: 0,
        stdout: 'No history available\n',
        stderr: '',
        duration: performance.now() - start,
      }
    }

    const output = shell.history
      .map((cmd, index) => `${String(index + 1).padStart(4)}: ${cmd}`)
      .join('\n')

    return {
      exitCode: 0,
      stdout: `${output}\n`,
      stderr: '',
      duration: performance.now() - start,
    }
  },
}
