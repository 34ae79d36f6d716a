import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import process from 'node:process'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { defaultConfig, loadWshConfig, mergeConfig, parseWshConfig, validateWshConfig } from '../src/config'
import { ConfigError } from '../src/errors'

describe('parseWshConfig', () => {
  it('merges the given keys over the defaults', () => {
    const config = parseWshConfig('{"historySize": 50, "aliases": {"ll": "ls -la"}}')
    expect(config.historySize).toBe(50)
    expect(config.aliases).toEqual({ ll: 'ls -la' })
    expect(config.prompt).toBe(defaultConfig.prompt)
    expect(config.enableColors).toBe(true)
  })

  it('merges log prefixes one level at a time', () => {
    const config = parseWshConfig('{"logging": {"prefixes": {"warn": "W"}}}')
    expect(config.logging).toEqual({
      timestamps: false,
      prefixes: { debug: 'DEBUG', info: 'INFO', warn: 'W', error: 'ERROR' },
    })
  })

  it('rejects malformed JSON', () => {
    expect(() => parseWshConfig('{', '/tmp/x.json')).toThrow(ConfigError)
    try {
      parseWshConfig('{', '/tmp/x.json')
    }
    catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      if (error instanceof ConfigError) {
        expect(error.message.startsWith('invalid JSON: ')).toBe(true)
        expect(error.path).toBe('/tmp/x.json')
      }
    }
  })

  it('names the offending key when a value has the wrong type', () => {
    expect(() => parseWshConfig('{"historySize": -1}')).toThrow(/^historySize: /)
    expect(() => parseWshConfig('{"aliases": {"ll": 3}}')).toThrow(/^aliases\.ll: /)
  })
})

describe('mergeConfig', () => {
  it('keeps existing aliases when adding new ones', () => {
    const base = { ...defaultConfig, aliases: { g: 'git' } }
    expect(mergeConfig(base, { aliases: { ll: 'ls -la' } }).aliases).toEqual({ g: 'git', ll: 'ls -la' })
  })
})

describe('loadWshConfig', () => {
  let home: string
  let stderr: string[]

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'wsh-config-'))
    stderr = []
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk))
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(home, { recursive: true, force: true })
  })

  it('reads ~/.wsh.json when present', () => {
    writeFileSync(join(home, '.wsh.json'), '{"prompt": "> "}')
    expect(loadWshConfig({ home, env: {} }).prompt).toBe('> ')
  })

  it('falls back to the defaults without a config file', () => {
    expect(loadWshConfig({ home, env: {} })).toEqual(defaultConfig)
  })

  it('prefers an explicit path and expands a leading tilde', () => {
    writeFileSync(join(home, '.wsh.json'), '{"prompt": "> "}')
    writeFileSync(join(home, 'custom.json'), '{"prompt": "% "}')
    expect(loadWshConfig({ path: '~/custom.json', home, env: {} }).prompt).toBe('% ')
  })

  it('reads the path in WSH_CONFIG', () => {
    const path = join(home, 'env.json')
    writeFileSync(path, '{"historySize": 7}')
    expect(loadWshConfig({ home, env: { WSH_CONFIG: path } }).historySize).toBe(7)
  })

  it('warns and uses the defaults when the explicit file is missing', () => {
    const path = join(home, 'missing.json')
    expect(loadWshConfig({ path, home, env: {} })).toEqual(defaultConfig)
    expect(stderr).toEqual([`[WARN] [config] Config file not found at ${path}, using defaults\n`])
  })

  it('throws for an invalid config file', () => {
    writeFileSync(join(home, '.wsh.json'), '{"verbose": "yes"}')
    expect(() => loadWshConfig({ home, env: {} })).toThrow(ConfigError)
  })
})

describe('validateWshConfig', () => {
  it('accepts the defaults', () => {
    expect(validateWshConfig(defaultConfig)).toEqual({ valid: true, errors: [], warnings: [] })
  })

  it('reports errors and warnings', () => {
    const result = validateWshConfig({
      ...defaultConfig,
      historySize: 0,
      prompt: '$ ',
      aliases: { 'two words': 'x', 'empty': '  ' },
    })
    expect(result.valid).toBe(false)
    expect(result.errors).toEqual([
      'historySize must be a positive integer (got: 0)',
      'alias names must be single words (got: "two words")',
      'alias "empty" expands to an empty command',
    ])
    expect(result.warnings).toEqual(['prompt does not contain {cwd}; the working directory will not be shown'])
  })
})
