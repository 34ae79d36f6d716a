import type { LoggingConfig } from './types'
import process from 'node:process'

/**
 * Log level type
 */
type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * ANSI color codes for terminal output
 */
const ANSI_COLORS = {
  reset: '\u001B[0m',
  dim: '\u001B[2m',
  red: '\u001B[31m',
  yellow: '\u001B[33m',
  blue: '\u001B[34m',
  cyan: '\u001B[36m',
} as const

const DEFAULT_PREFIXES: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
}

/**
 * Logger class with scoped output and configurable level prefixes
 */
export class Logger {
  private verbose: boolean
  private scopeName?: string
  private useColors: boolean
  private options: LoggingConfig

  constructor(verbose = false, scopeName?: string, options: LoggingConfig = {}) {
    this.verbose = verbose
    this.scopeName = scopeName
    this.options = options
    this.useColors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR
  }

  /**
   * Enable or disable verbose logging
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose
  }

  isVerbose(): boolean {
    return this.verbose
  }

  /**
   * Create a new logger instance with a scope
   */
  withScope(scope: string): Logger {
    return new Logger(this.verbose, scope, this.options)
  }

  /**
   * Format a log message with timestamp, level and scope
   */
  format(level: LogLevel, message: string): string {
    let formatted = ''

    if (this.options.timestamps) {
      formatted += `${this.colorize(new Date().toISOString(), 'dim')} `
    }

    formatted += `${this.getLevelString(level)} `

    if (this.scopeName) {
      formatted += `${this.colorize(`[${this.scopeName}]`, 'dim')} `
    }

    return formatted + message
  }

  private getLevelString(level: LogLevel): string {
    const levelStr = this.options.prefixes?.[level] ?? DEFAULT_PREFIXES[level]

    if (!this.useColors) {
      return `[${levelStr}]`
    }

    const colors = {
      debug: ANSI_COLORS.cyan,
      info: ANSI_COLORS.blue,
      warn: ANSI_COLORS.yellow,
      error: ANSI_COLORS.red,
    }

    return `${colors[level]}[${levelStr}]${ANSI_COLORS.reset}`
  }

  private colorize(text: string, style: keyof typeof ANSI_COLORS | 'none' = 'none'): string {
    if (!this.useColors || style === 'none') {
      return text
    }
    return `${ANSI_COLORS[style]}${text}${ANSI_COLORS.reset}`
  }

  private line(level: LogLevel, message: string, args: unknown[]): string {
    const extra = args.length ? ` ${args.map(formatArg).join(' ')}` : ''
    return `${this.format(level, message)}${extra}\n`
  }

  /**
   * Log a debug message (verbose only)
   */
  debug(message: string, ...args: unknown[]): void {
    if (!this.verbose)
      return
    process.stdout.write(this.line('debug', message, args))
  }

  info(message: string, ...args: unknown[]): void {
    process.stdout.write(this.line('info', message, args))
  }

  warn(message: string, ...args: unknown[]): void {
    process.stderr.write(this.line('warn', message, args))
  }

  error(message: string, ...args: unknown[]): void {
    process.stderr.write(this.line('error', message, args))
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error)
    return arg.message
  return String(arg)
}

// Create a default logger instance
export const logger: Logger = new Logger(Boolean(process.env.WSH_DEBUG))
