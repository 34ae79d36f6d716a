export class ConfigError extends Error {
  path?: string
  constructor(message: string, path?: string) {
    super(message)
    this.name = 'ConfigError'
    this.path = path
  }
}
