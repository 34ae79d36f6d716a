#!/usr/bin/env -S npx tsx
import { readFileSync } from 'node:fs'
import process from 'node:process'
import { CAC } from 'cac'
import { z } from 'zod'
import { loadWshConfig, validateWshConfig } from '../src/config'
import { NodeTerminal } from '../src/input/terminal'
import { Logger } from '../src/logger'
import { WshShell } from '../src/shell'
import { ReplManager } from '../src/shell/repl-manager'

const { version } = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8')))

const cli = new CAC('wsh')

interface CliOptions {
  command?: string
  config?: string
  interactive?: boolean
  verbose?: boolean
}

cli
  .command('', 'Start the wsh shell')
  .option('-c, --command <command>', 'Run a single command and exit')
  .option('-f, --config <config>', 'Path to a JSON config file')
  .option('-i, --interactive', 'Start an interactive session')
  .option('--verbose', 'Enable verbose logging')
  .action(async (options: CliOptions) => {
    let exitCode = 0
    try {
      const loaded = loadWshConfig({ path: options.config })
      const config = { ...loaded, verbose: options.verbose ?? loaded.verbose }
      const log = new Logger(config.verbose, 'wsh', config.logging)

      const { errors, warnings } = validateWshConfig(config)
      for (const warning of warnings)
        log.warn(warning)
      if (errors.length > 0) {
        for (const error of errors)
          log.error(error)
        process.exit(1)
      }

      const shell = new WshShell(config, { log })

      if (options.command !== undefined && !options.interactive) {
        const result = await shell.execute(options.command)
        if (!result.streamed) {
          if (result.stdout)
            process.stdout.write(result.stdout)
          if (result.stderr)
            process.stderr.write(result.stderr)
        }
        exitCode = result.exitCode
      }
      else {
        const terminal = new NodeTerminal()
        const repl = new ReplManager(shell, terminal, log)
        try {
          await repl.start()
        }
        finally {
          terminal.close()
        }
      }
    }
    catch (err) {
      process.stderr.write(`Shell error: ${err instanceof Error ? err.message : String(err)}\n`)
      exitCode = 1
    }
    process.exit(exitCode)
  })

cli.version(version)
cli.help()
cli.parse()
