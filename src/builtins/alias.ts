import type { BuiltinCommand, CommandResult, Shell } from './types'

/**
 * Alias command - `alias name command` defines an alias,
 * any other form lists the defined ones as `name -> command`
 */
export const aliasCommand: BuiltinCommand = {
  name: 'alias',
  description: 'Create or show aliases',
  usage: 'alias [name] [command]',
  async execute(args: string[], shell: Shell): Promise<CommandResult> {
    const start = performance.now()

    if (args.length === 2) {
      const [name, command] = args
      shell.aliases[name] = command
      return {
        exitCode: 0,
        stdout: `Alias '${name}' -> '${command}' added\n`,
        stderr: '',
        duration: performance.now() - start,
      }
    }

    const output = Object.entries(shell.aliases)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([name, command]) => `${name} -> ${command}\n`)
      .join('')

    return { exitCode: 0, stdout: output, stderr: '', duration: performance.now() - start }
  },
}
