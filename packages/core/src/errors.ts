export type ErrorCode = 'CONFLICT' | 'SCAN_FAILED' | 'NOT_FOUND'

export class DepwatchError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export class ConflictError extends DepwatchError {
  constructor(readonly applicationName: string) {
    super('CONFLICT', `Application with name '${applicationName}' already exists.`)
  }
}

export class ScanError extends DepwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SCAN_FAILED', message, options)
  }
}

export class NotFoundError extends DepwatchError {
  constructor(message: string) {
    super('NOT_FOUND', message)
  }
}
