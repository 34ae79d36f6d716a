import type { WshConfig } from './types'
import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import process from 'node:process'
import { z } from 'zod'
import { ConfigError } from './errors'
import { Logger } from './logger'

export const defaultConfig: WshConfig = {
  verbose: false,
  prompt: '➜ {cwd} $ ',
  historySize: 1000,
  enableColors: true,
  showCompletionSummary: true,
  aliases: {},
  logging: {
    timestamps: false,
    prefixes: {
      debug: 'DEBUG',
      info: 'INFO',
      warn: 'WARN',
      error: 'ERROR',
    },
  },
}

// Shape of a user config file; every key is optional and merged over the defaults
export const WshConfigSchema = z.object({
  verbose: z.boolean().optional(),
  prompt: z.string().optional(),
  historySize: z.number().int().positive().optional(),
  enableColors: z.boolean().optional(),
  showCompletionSummary: z.boolean().optional(),
  aliases: z.record(z.string(), z.string()).optional(),
  logging: z.object({
    timestamps: z.boolean().optional(),
    prefixes: z.object({
      debug: z.string().optional(),
      info: z.string().optional(),
      warn: z.string().optional(),
      error: z.string().optional(),
    }).optional(),
  }).optional(),
})

export type WshConfigInput = z.infer<typeof WshConfigSchema>

export const DEFAULT_CONFIG_FILE = '.wsh.json'

export function mergeConfig(base: WshConfig, input: WshConfigInput): WshConfig {
  return {
    verbose: input.verbose ?? base.verbose,
    prompt: input.prompt ?? base.prompt,
    historySize: input.historySize ?? base.historySize,
    enableColors: input.enableColors ?? base.enableColors,
    showCompletionSummary: input.showCompletionSummary ?? base.showCompletionSummary,
    aliases: { ...base.aliases, ...input.aliases },
    logging: {
      timestamps: input.logging?.timestamps ?? base.logging.timestamps,
      prefixes: { ...base.logging.prefixes, ...input.logging?.prefixes },
    },
  }
}

/**
 * Parse the contents of a JSON config file. Throws a ConfigError naming
 * the offending keys when the document does not match the schema.
 */
export function parseWshConfig(source: string, path?: string): WshConfig {
  let raw: unknown
  try {
    raw = JSON.parse(source)
  }
  catch (error) {
    throw new ConfigError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`, path)
  }

  const parsed = WshConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(issues, path)
  }
  return mergeConfig(defaultConfig, parsed.data)
}

export interface LoadConfigOptions {
  path?: string
  home?: string
  env?: NodeJS.ProcessEnv
}

// Lookup order: explicit path, then $WSH_CONFIG, then ~/.wsh.json
export function loadWshConfig(options: LoadConfigOptions = {}): WshConfig {
  const env = options.env ?? process.env
  const home = options.home ?? env.HOME ?? homedir()
  const log = new Logger(false, 'config')

  const explicitPath = options.path || env.WSH_CONFIG
  if (explicitPath) {
    const abs = resolvePath(explicitPath, home)
    if (!existsSync(abs)) {
      log.warn(`Config file not found at ${abs}, using defaults`)
      return defaultConfig
    }
    return readConfigFile(abs)
  }

  const fallback = join(home, DEFAULT_CONFIG_FILE)
  if (existsSync(fallback))
    return readConfigFile(fallback)
  return defaultConfig
}

function readConfigFile(path: string): WshConfig {
  let source: string
  try {
    source = readFileSync(path, 'utf8')
  }
  catch (error) {
    throw new ConfigError(`cannot read config: ${error instanceof Error ? error.message : String(error)}`, path)
  }
  return parseWshConfig(source, path)
}

function resolvePath(p: string, home: string): string {
  // Support tilde expansion and relative paths
  if (p.startsWith('~')) {
    return resolve(home, `.${p.slice(1)}`)
  }
  return resolve(p)
}

// Validate a config and return errors/warnings without throwing.
export function validateWshConfig(cfg: WshConfig): { valid: boolean, errors: string[], warnings: string[] } {
  const errors: string[] = []
  const warnings: string[] = []

  if (!Number.isInteger(cfg.historySize) || cfg.historySize <= 0) {
    errors.push(`historySize must be a positive integer (got: ${cfg.historySize})`)
  }

  if (!cfg.prompt.includes('{cwd}')) {
    warnings.push('prompt does not contain {cwd}; the working directory will not be shown')
  }

  for (const [name, command] of Object.entries(cfg.aliases)) {
    if (!name.trim() || /\s/.test(name))
      errors.push(`alias names must be single words (got: "${name}")`)
    if (!command.trim())
      errors.push(`alias "${name}" expands to an empty command`)
  }

  return { valid: errors.length === 0, errors, warnings }
}
