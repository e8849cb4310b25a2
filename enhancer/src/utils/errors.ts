export type EnhanceErrorCode = 'READ_FAILED' | 'WRITE_FAILED' | 'INVALID_CONFIG'

/**
 * Errors that abort a whole document (or the run, for configuration).
 * Failures for a single repository never become one of these.
 */
export class EnhanceError extends Error {
  readonly code: EnhanceErrorCode
  readonly exitCode: number
  readonly details?: Record<string, unknown>

  constructor(
    code: EnhanceErrorCode,
    message: string,
    exitCode = 1,
    details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'EnhanceError'
    this.code = code
    this.exitCode = exitCode
    this.details = details
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
