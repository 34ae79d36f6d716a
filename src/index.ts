export * from './completion'
export * from './config'
export * from './errors'
export * from './history'
export * from './history/history-navigator'
export * from './input/input-engine'
export * from './input/keys'
export * from './input/line-buffer'
export * from './input/render'
export * from './input/terminal'
export type * from './input/types'
export * from './logger'
export * from './parser'
export * from './prompt'
export * from './shell'
export * from './shell/command-executor'
export * from './shell/repl-manager'
export type * from './types'
