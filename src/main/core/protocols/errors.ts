export type ProtocolSourceErrorCode = 'EMPTY_SOURCE' | 'MALFORMED_SOURCE' | 'UNREADABLE_SOURCE'

/**
 * Raised when a protocol table cannot be turned into a snapshot.
 * Lookups never raise it; a missing entry is reported as `undefined`.
 */
export class ProtocolSourceError extends Error {
  constructor(
    public readonly code: ProtocolSourceErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ProtocolSourceError'
  }
}

export function isProtocolSourceError(error: unknown): error is ProtocolSourceError {
  return error instanceof ProtocolSourceError
}
