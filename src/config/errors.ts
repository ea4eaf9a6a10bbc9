/**
 * Error raised for invalid or incomplete configuration.
 * Configuration errors are raised immediately and never retried.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}
