export type CompletionErrorKind = 'OutOfRange' | 'NoSchema'

/**
 * Raised for caller mistakes only. Malformed SQL never raises.
 */
export class CompletionError extends Error {
  readonly kind: CompletionErrorKind

  constructor(kind: CompletionErrorKind, message: string) {
    super(message)
    this.name = 'CompletionError'
    this.kind = kind
  }
}

export function isCompletionError(error: unknown): error is CompletionError {
  return error instanceof CompletionError
}
