/**
 * Replace a leading `~` with the home directory. Without a home directory
 * the path is returned unchanged.
 */
export function expandTilde(path: string, home: string | undefined): string {
  if (!path.startsWith('~') || home === undefined)
    return path
  return home + path.slice(1)
}

/**
 * Inverse of expandTilde for display: a path inside the home directory is
 * shown relative to `~`.
 */
export function contractHome(path: string, home: string | undefined): string {
  if (!home)
    return path
  if (path === home)
    return '~'
  if (!path.startsWith(`${home}/`))
    return path
  return `~${path.slice(home.length)}`
}
