/**
 * Error types raised outside the completion engine, and helpers to
 * normalize thrown values.
 */

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

export function getErrorMessage(error: unknown): string {
  return toError(error).message
}

/**
 * Invalid or unreadable configuration file.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Unknown special command or bad arguments to one.
 */
export class SpecialCommandError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SpecialCommandError'
  }
}

/**
 * Raised inside query execution when the caller's signal aborts.
 */
export class QueryCancelledError extends Error {
  constructor(message = 'Query cancelled') {
    super(message)
    this.name = 'QueryCancelledError'
  }
}
