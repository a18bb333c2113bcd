export type ConverterErrorKind =
  | 'MISSING_CREDENTIAL'
  | 'CLIENT_INIT'
  | 'DIRECTORY_LIST'
  | 'LOCAL_IO'
  | 'REMOTE_SERVICE'
  | 'RELEASE_WARNING'
  | 'WRITE'

const FATAL_KINDS = new Set<ConverterErrorKind>(['MISSING_CREDENTIAL', 'CLIENT_INIT', 'DIRECTORY_LIST'])

export class ConverterError extends Error {
  readonly kind: ConverterErrorKind

  constructor(kind: ConverterErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConverterError'
    this.kind = kind
  }

  get fatal() {
    return FATAL_KINDS.has(this.kind)
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name
  return String(error)
}

// Errors that already carry a kind keep it; anything else is classified by the step it escaped from.
export function toConverterError(kind: ConverterErrorKind, error: unknown): ConverterError {
  if (error instanceof ConverterError) return error
  return new ConverterError(kind, describeError(error), { cause: error })
}
