export type AttendanceErrorCode =
  | 'UNKNOWN_IDENTITY'
  | 'STORAGE_UNAVAILABLE'
  | 'NOTIFICATION_DELIVERY_FAILED'
  | 'UNAUTHORIZED'
  | 'MALFORMED_INPUT'

const httpStatusByCode: Record<AttendanceErrorCode, number> = {
  UNKNOWN_IDENTITY: 404,
  STORAGE_UNAVAILABLE: 503,
  NOTIFICATION_DELIVERY_FAILED: 502,
  UNAUTHORIZED: 401,
  MALFORMED_INPUT: 400,
}

export abstract class AttendanceError extends Error {
  abstract readonly code: AttendanceErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
  }

  get httpStatus(): number {
    return httpStatusByCode[this.code]
  }

  /** Retrying the same request may succeed later. */
  get retryable(): boolean {
    return this.code === 'STORAGE_UNAVAILABLE' || this.code === 'NOTIFICATION_DELIVERY_FAILED'
  }
}

export class UnknownIdentityError extends AttendanceError {
  readonly code = 'UNKNOWN_IDENTITY'
  readonly identity: string

  constructor(identity: string) {
    super(`Name "${identity}" is not bound`)
    this.name = 'UnknownIdentityError'
    this.identity = identity
  }
}

export class StorageUnavailableError extends AttendanceError {
  readonly code = 'STORAGE_UNAVAILABLE'
  readonly operation: string

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options)
    this.name = 'StorageUnavailableError'
    this.operation = operation
  }
}

export class MessageDeliveryError extends AttendanceError {
  readonly code = 'NOTIFICATION_DELIVERY_FAILED'
  readonly status?: number
  readonly body?: string

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'MessageDeliveryError'
    this.status = options.status
    this.body = options.body
  }
}

export class UnauthorizedError extends AttendanceError {
  readonly code = 'UNAUTHORIZED'

  constructor(message = 'unauthorized') {
    super(message)
    this.name = 'UnauthorizedError'
  }
}

export class MalformedInputError extends AttendanceError {
  readonly code = 'MALFORMED_INPUT'

  constructor(message: string) {
    super(message)
    this.name = 'MalformedInputError'
  }
}

export function isAttendanceError(error: unknown): error is AttendanceError {
  return error instanceof AttendanceError
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
