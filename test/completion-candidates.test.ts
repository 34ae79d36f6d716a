import type { CompletionSources } from '../src/completion/candidates'
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { generateCandidates, getCommandCandidates, getPathCandidates } from '../src/completion/candidates'
import { isExecutable } from '../src/utils/environment'

let root: string
let binA: string
let binB: string
let work: string

function writeExecutable(path: string): void {
  writeFileSync(path, '#!/bin/sh\n')
  chmodSync(path, 0o755)
}

function sources(overrides: Partial<CompletionSources> = {}): CompletionSources {
  return {
    aliases: [],
    pathDirs: [],
    isExecutable,
    history: [],
    cwd: work,
    ...overrides,
  }
}

beforeAll(() => {
  root = mkdtempSync(join(tmpdir(), 'wsh-completion-'))
  binA = join(root, 'bin-a')
  binB = join(root, 'bin-b')
  work = join(root, 'work')
  mkdirSync(binA)
  mkdirSync(binB)
  mkdirSync(work)

  writeExecutable(join(binA, 'echo'))
  writeExecutable(join(binB, 'echo'))
  writeExecutable(join(binB, 'ed'))
  writeFileSync(join(binA, 'ecnotexec'), 'data')
  mkdirSync(join(binA, 'ecdir'))

  writeFileSync(join(work, 'notes.txt'), 'x')
  writeFileSync(join(work, '.bashrc'), 'x')
  mkdirSync(join(work, 'docs'))
  writeFileSync(join(work, 'docs', 'a.md'), 'x')
})

afterAll(() => {
  rmSync(root, { recursive: true, force: true })
})

describe('getCommandCandidates', () => {
  it('lists an executable found in several PATH directories once', () => {
    expect(getCommandCandidates('ec', sources({ pathDirs: [binA, binB] }))).toEqual(['echo'])
  })

  it('skips non-executable files and directories on PATH', () => {
    expect(getCommandCandidates('e', sources({ pathDirs: [binA, binB], builtins: [] }))).toEqual(['echo', 'ed'])
  })

  it('merges built-ins, aliases and history words, sorted and unique', () => {
    const result = getCommandCandidates('c', sources({
      aliases: ['cat', 'cd'],
      history: ['clear', 'cat notes.txt', 'ls'],
    }))
    expect(result).toEqual(['cat', 'cd', 'clear'])
  })

  it('ignores PATH directories that cannot be read', () => {
    expect(getCommandCandidates('ec', sources({ pathDirs: [join(root, 'missing'), binA] }))).toEqual(['echo'])
  })
})

describe('getPathCandidates', () => {
  it('lists the working directory without hidden files', () => {
    expect(getPathCandidates('', sources())).toEqual(['docs/', 'notes.txt'])
  })

  it('shows hidden files when the typed name starts with a dot', () => {
    expect(getPathCandidates('.', sources())).toEqual(['.bashrc'])
    expect(getPathCandidates('.b', sources())).toEqual(['.bashrc'])
  })

  it('marks directories with a trailing slash', () => {
    expect(getPathCandidates('do', sources())).toEqual(['docs/'])
  })

  it('lists inside a directory prefix ending in a slash', () => {
    expect(getPathCandidates('docs/', sources())).toEqual(['docs/a.md'])
  })

  it('keeps an absolute directory in the candidate', () => {
    expect(getPathCandidates(`${work}/no`, sources())).toEqual([`${work}/notes.txt`])
  })

  it('expands a leading tilde to the home directory', () => {
    expect(getPathCandidates('~/no', sources({ home: work }))).toEqual([`${work}/notes.txt`])
  })

  it('returns nothing for a directory that does not exist', () => {
    expect(getPathCandidates('missing/x', sources())).toEqual([])
  })
})

describe('generateCandidates', () => {
  it('classifies only the text before the cursor', () => {
    const result = generateCandidates('cat dox', 6, sources())
    expect(result).toEqual({ mode: 'path', prefix: 'do', candidates: ['docs/'] })
  })

  it('completes command names from PATH', () => {
    const result = generateCandidates('ec', 2, sources({ pathDirs: [binA] }))
    expect(result).toEqual({ mode: 'command', prefix: 'ec', candidates: ['echo'] })
  })
})
