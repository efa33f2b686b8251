export type InstallErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'OPERATION_FAILED'
  | 'INVALID_CONFIG'
  | 'INVALID_ARGUMENT'

export class InstallError extends Error {
  readonly code: InstallErrorCode
  readonly context?: Record<string, unknown>

  constructor(code: InstallErrorCode, message: string, options?: { context?: Record<string, unknown>, cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'InstallError'
    this.code = code
    this.context = options?.context
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

// Wrap a failed fs call. EACCES/EPERM mean the run lacks privilege for the directory
export function toInstallError(error: unknown, message: string, context?: Record<string, unknown>): InstallError {
  if (error instanceof InstallError) {
    return error
  }

  const code = errnoCode(error)
  const detail = error instanceof Error ? error.message : String(error)

  if (code === 'EACCES' || code === 'EPERM') {
    return new InstallError('PERMISSION_DENIED', `${message}: ${detail}`, { context, cause: error })
  }
  return new InstallError('OPERATION_FAILED', `${message}: ${detail}`, { context, cause: error })
}
