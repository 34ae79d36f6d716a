import { mkdirSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { historyCommand } from '../src/builtins'
import { defaultConfig } from '../src/config'
import { Logger } from '../src/logger'
import { WshShell } from '../src/shell'

describe('built-in commands', () => {
  let root: string
  let home: string
  let shell: WshShell

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'wsh-builtins-'))
    home = join(root, 'home')
    mkdirSync(join(home, 'projects'), { recursive: true })
    mkdirSync(join(root, 'sub'))
    shell = new WshShell(defaultConfig, { env: { HOME: home, PATH: '' }, cwd: root, log: new Logger(false) })
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  describe('pwd', () => {
    it('prints the working directory', async () => {
      expect(await shell.execute('pwd')).toMatchObject({ exitCode: 0, stdout: `${root}\n`, stderr: '' })
    })
  })

  describe('cd', () => {
    it('changes to a relative directory', async () => {
      const result = await shell.execute('cd sub')
      expect(result.exitCode).toBe(0)
      expect(shell.cwd).toBe(join(root, 'sub'))
    })

    it('goes home without an argument', async () => {
      await shell.execute('cd')
      expect(shell.cwd).toBe(home)
    })

    it('expands a leading tilde', async () => {
      await shell.execute('cd ~/projects')
      expect(shell.cwd).toBe(join(home, 'projects'))
    })

    it('fails for a missing directory and stays put', async () => {
      const result = await shell.execute('cd nope')
      expect(result).toMatchObject({ exitCode: 1, stdout: '', stderr: 'cd: nope: No such file or directory\n' })
      expect(shell.cwd).toBe(root)
    })

    it('goes to / when HOME is unset', async () => {
      const homeless = new WshShell(defaultConfig, { env: { PATH: '' }, cwd: root, log: new Logger(false) })
      await homeless.execute('cd')
      expect(homeless.cwd).toBe('/')
    })
  })

  describe('history', () => {
    it('says so when nothing has been run', async () => {
      const result = await historyCommand.execute([], shell)
      expect(result.stdout).toBe('No history available\n')
    })

    it('numbers entries from one, including itself', async () => {
      await shell.execute('pwd')
      const result = await shell.execute('history')
      expect(result.stdout).toBe('   1: pwd\n   2: history\n')
    })
  })

  describe('alias', () => {
    it('defines and lists aliases', async () => {
      expect((await shell.execute('alias ll "ls -la"')).stdout).toBe('Alias \'ll\' -> \'ls -la\' added\n')
      await shell.execute('alias gs "git status"')
      expect((await shell.execute('alias')).stdout).toBe('gs -> git status\nll -> ls -la\n')
    })

    it('prints nothing when no aliases exist', async () => {
      expect(await shell.execute('alias')).toMatchObject({ exitCode: 0, stdout: '' })
    })
  })

  describe('exit', () => {
    it('stops the shell with the given status', async () => {
      const result = await shell.execute('exit 3')
      expect(result.exitCode).toBe(3)
      expect(shell.isRunning()).toBe(false)
    })

    it('rejects a non-numeric status and keeps running', async () => {
      const result = await shell.execute('exit soon')
      expect(result).toMatchObject({ exitCode: 1, stderr: 'exit: numeric argument required\n' })
      expect(shell.isRunning()).toBe(true)
    })
  })

  describe('help', () => {
    it('describes one built-in', async () => {
      expect((await shell.execute('help cd')).stdout).toBe('cd: Change the current directory\nUsage: cd [path]\n')
    })

    it('rejects an unknown name', async () => {
      expect(await shell.execute('help frobnicate')).toMatchObject({
        exitCode: 1,
        stderr: 'help: Unknown command: frobnicate\n',
      })
    })

    it('lists every built-in in order', async () => {
      const lines = (await shell.execute('help')).stdout.split('\n')
      expect(lines.slice(0, 7)).toEqual([
        'Built-in commands:',
        '  cd [path]              - Change the current directory',
        '  pwd                    - Print the current working directory',
        '  exit [code]            - Exit the shell',
        '  help [command]         - Show this help message',
        '  alias [name] [command] - Create or show aliases',
        '  history                - Show command history',
      ])
    })
  })
})
