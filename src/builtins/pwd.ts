import type { BuiltinCommand, CommandResult, Shell } from './types'

/**
 * PWD (Print Working Directory) command - outputs the current working directory
 */
export const pwdCommand: BuiltinCommand = {
  name: 'pwd',
  description: 'Print the current working directory',
  usage: 'pwd',
  async execute(_args: string[], shell: Shell): Promise<CommandResult> {
    const start = performance.now()
    return {
      exitCode: 0,
      stdout: `${shell.cwd}\n`,
      stderr: '',
      duration: performance.now() - start,
    }
  },
}
