/**
 * Environment lookups used by completion and the built-ins. Each helper takes
 * the environment as a parameter so callers can pass a fixed one.
 */

import { statSync } from 'node:fs'
import { delimiter } from 'node:path'
import process from 'node:process'

export function getPathDirectories(env: NodeJS.ProcessEnv = process.env): string[] {
  const path = env.PATH
  if (!path)
    return []
  return path.split(delimiter).filter(Boolean)
}

export function getHomeDirectory(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.HOME || undefined
}

// True for a file with any execute bit set
export function isExecutable(path: string): boolean {
  try {
    const st = statSync(path)
    return st.isFile() && (st.mode & 0o111) !== 0
  }
  catch {
    return false
  }
}
