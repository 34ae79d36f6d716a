import { contractHome } from './utils/expansion'
import { green } from './utils/style'

/**
 * Expand a prompt template. `{cwd}` becomes the working directory with the
 * home directory abbreviated to `~`.
 */
export function formatPrompt(template: string, cwd: string, home: string | undefined): string {
  return template.replaceAll('{cwd}', contractHome(cwd, home))
}

export function renderPrompt(template: string, cwd: string, home: string | undefined, colors: boolean): string {
  return green(formatPrompt(template, cwd, home), colors)
}
