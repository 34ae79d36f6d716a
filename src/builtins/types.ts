export type { BuiltinCommand, CommandResult, Shell } from '../types'
