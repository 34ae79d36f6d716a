import type { Dirent } from 'node:fs'
import type { Logger } from '../logger'
import { readdirSync } from 'node:fs'
import { posix, resolve } from 'node:path'
import { sliceCodePoints } from '../input/line-buffer'
import { tokenize } from '../parser'
import { expandTilde } from '../utils/expansion'

export const BUILTIN_NAMES: readonly string[] = ['cd', 'pwd', 'exit', 'help', 'alias', 'history']

export type CompletionMode = 'command' | 'path'

export interface CompletionContext {
  mode: CompletionMode
  // The partial word before the cursor that completion extends
  prefix: string
}

export interface CompletionResult extends CompletionContext {
  candidates: string[]
}

/**
 * Everything candidate generation reads from the outside world. The shell
 * fills this from its own state and the process environment; tests pass
 * fixed directories instead.
 */
export interface CompletionSources {
  builtins?: readonly string[]
  aliases: readonly string[]
  pathDirs: readonly string[]
  isExecutable: (path: string) => boolean
  history: Iterable<string>
  home?: string
  // Directory that relative path prefixes are listed against
  cwd: string
  log?: Logger
}

/**
 * Decide whether the text before the cursor is completing a command name or
 * an argument path, and which partial word is being completed.
 */
export function classify(beforeCursor: string): CompletionContext {
  const tokens = tokenize(beforeCursor)
  const endsWithSpace = beforeCursor.endsWith(' ')

  if (tokens.length === 0 || (tokens.length === 1 && !endsWithSpace)) {
    return { mode: 'command', prefix: tokens[0] ?? '' }
  }

  // A trailing space means the next argument has not been typed yet
  return { mode: 'path', prefix: endsWithSpace ? '' : tokens[tokens.length - 1] }
}

export function generateCandidates(text: string, cursor: number, sources: CompletionSources): CompletionResult {
  const context = classify(sliceCodePoints(text, 0, cursor))
  const candidates = context.mode === 'command'
    ? getCommandCandidates(context.prefix, sources)
    : getPathCandidates(context.prefix, sources)
  return { ...context, candidates }
}

/**
 * Built-ins, aliases, executables on PATH and the first word of past
 * commands that start with `prefix`, sorted and deduplicated.
 */
export function getCommandCandidates(prefix: string, sources: CompletionSources): string[] {
  const match = (name: string) => name.startsWith(prefix)
  const builtins = sources.builtins ?? BUILTIN_NAMES

  const out: string[] = [
    ...builtins.filter(match),
    ...sources.aliases.filter(match),
    ...getPathCommands(prefix, sources),
  ]

  for (const command of sources.history) {
    const first = tokenize(command)[0]
    if (first !== undefined && match(first))
      out.push(first)
  }

  return [...new Set(out)].sort()
}

// One hit per executable name, even when it lives in several PATH directories
function getPathCommands(prefix: string, sources: CompletionSources): string[] {
  const seen = new Set<string>()
  const commands: string[] = []

  for (const dir of sources.pathDirs) {
    const entries = listDirectory(dir, sources)
    for (const entry of entries) {
      if (!entry.isFile())
        continue
      const name = entry.name
      if (!name.startsWith(prefix) || seen.has(name))
        continue
      if (sources.isExecutable(posix.join(dir, name))) {
        seen.add(name)
        commands.push(name)
      }
    }
  }

  return commands
}

/**
 * Entries of the directory named by `prefix` whose names extend its last
 * component. Directories get a trailing `/`; dot-files only appear when the
 * typed name itself starts with a dot.
 */
export function getPathCandidates(prefix: string, sources: CompletionSources): string[] {
  const expanded = expandTilde(prefix, sources.home)

  let dir: string
  let filter: string
  if (expanded.endsWith('/')) {
    dir = expanded
    filter = ''
  }
  else {
    dir = posix.dirname(expanded)
    filter = posix.basename(expanded)
  }

  const showHidden = filter.startsWith('.')
  const completions: string[] = []

  for (const entry of listDirectory(resolve(sources.cwd, dir), sources)) {
    const name = entry.name
    if (!name.startsWith(filter))
      continue
    if (name.startsWith('.') && !showHidden)
      continue

    let completion: string
    if (dir === '.')
      completion = name
    else if (dir.endsWith('/'))
      completion = `${dir}${name}`
    else
      completion = `${dir}/${name}`

    if (entry.isDirectory())
      completion += '/'

    completions.push(completion)
  }

  return completions.sort()
}

function listDirectory(dir: string, sources: CompletionSources): Dirent[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
  }
  catch (error) {
    sources.log?.debug(`skipping unreadable directory ${dir}:`, error)
    return []
  }
}
