import type { BuiltinCommand, CommandResult, Shell } from './types'
import { expandTilde } from '../utils/expansion'

/**
 * CD (Change Directory) command - changes the current working directory
 * With no argument goes to $HOME, or `/` when HOME is unset.
 */
export const cdCommand: BuiltinCommand = {
  name: 'cd',
  description: 'Change the current directory',
  usage: 'cd [path]',
  async execute(args: string[], shell: Shell): Promise<CommandResult> {
    const start = performance.now()
    const home = shell.home

    const target = args[0] ? expandTilde(args[0], home) : (home || '/')

    if (!shell.changeDirectory(target)) {
      return {
        exitCode: 1,
        stdout: '',
        stderr: `cd: ${args[0] ?? target}: No such file or directory\n`,
        duration: performance.now() - start,
      }
    }

    return { exitCode: 0, stdout: '', stderr: '', duration: performance.now() - start }
  },
}
