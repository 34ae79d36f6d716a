/*
 * Styling helpers for prompt, error and banner output.
 * Colour is on when the config allows it and the environment supports it.
 */

import process from 'node:process'

export interface StyleOptions {
  forceColor?: boolean
  noColor?: boolean
  env?: NodeJS.ProcessEnv
  isTTY?: boolean
}

function envBool(value: string | undefined): boolean | undefined {
  if (!value)
    return undefined
  const v = value.trim().toLowerCase()
  if (v === '')
    return undefined
  if (v === '0' || v === 'false' || v === 'no')
    return false
  return true
}

export function supportsColor(opts: StyleOptions = {}): boolean {
  if (opts.noColor)
    return false
  if (opts.forceColor)
    return true

  const env = opts.env ?? process.env
  if (env.NO_COLOR != null)
    return false

  const force = envBool(env.FORCE_COLOR)
  if (typeof force === 'boolean')
    return force

  if (env.TERM === 'dumb')
    return false

  return opts.isTTY ?? Boolean(process.stdout.isTTY)
}

const codes = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  green: '\u001B[32m',
}

function wrap(open: string, input: string, enable: boolean): string {
  if (!enable || !input)
    return input
  return open + input + codes.reset
}

export function green(input: string, enable: boolean = supportsColor()): string {
  return wrap(codes.green, input, enable)
}
export function red(input: string, enable: boolean = supportsColor()): string {
  return wrap(codes.red, input, enable)
}
