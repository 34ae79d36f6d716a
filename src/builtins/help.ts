import type { BuiltinCommand, CommandResult, Shell } from './types'

const KEYBOARD_HELP = [
  'Keyboard shortcuts:',
  '  Ctrl+C / Ctrl+D - Exit',
  '  Up/Down arrows  - Navigate history',
  '  Left/Right      - Move cursor',
  '  Home/End        - Jump to line start/end',
  '  Tab             - Auto-complete commands and paths',
]

const COMPLETION_HELP = [
  'Autocompletion features:',
  '  - Built-in commands',
  '  - Executable commands in PATH',
  '  - File and directory paths',
  '  - Command aliases',
  '  - Commands from history',
]

/**
 * Help command - lists the built-ins, key bindings and completion sources,
 * or the usage of one built-in
 */
export const helpCommand: BuiltinCommand = {
  name: 'help',
  description: 'Show this help message',
  usage: 'help [command]',
  async execute(args: string[], shell: Shell): Promise<CommandResult> {
    const start = performance.now()

    if (args.length > 0) {
      const command = shell.builtins.get(args[0])
      if (!command) {
        return {
          exitCode: 1,
          stdout: '',
          stderr: `help: Unknown command: ${args[0]}\n`,
          duration: performance.now() - start,
        }
      }
      return {
        exitCode: 0,
        stdout: `${command.name}: ${command.description}\nUsage: ${command.usage}\n`,
        stderr: '',
        duration: performance.now() - start,
      }
    }

    const commands = Array.from(shell.builtins.values())
      .map(cmd => `  ${cmd.usage.padEnd(22)} - ${cmd.description}`)

    const lines = ['Built-in commands:', ...commands, '', ...KEYBOARD_HELP, '', ...COMPLETION_HELP]

    return {
      exitCode: 0,
      stdout: `${lines.join('\n')}\n`,
      stderr: '',
      duration: performance.now() - start,
    }
  },
}
