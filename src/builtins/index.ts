import type { BuiltinCommand } from '../types'
import { aliasCommand } from './alias'
import { cdCommand } from './cd'
import { exitCommand } from './exit'
import { helpCommand } from './help'
import { historyCommand } from './history'
import { pwdCommand } from './pwd'

export function createBuiltins(): Map<string, BuiltinCommand> {
  const builtins = new Map<string, BuiltinCommand>()
  for (const command of [cdCommand, pwdCommand, exitCommand, helpCommand, aliasCommand, historyCommand])
    builtins.set(command.name, command)
  return builtins
}

export { aliasCommand, cdCommand, exitCommand, helpCommand, historyCommand, pwdCommand }
