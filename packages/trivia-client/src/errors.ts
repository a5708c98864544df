import { type ResponseCode, ResponseCodes } from './request/response-code'
import type { QuestionType } from './request/parameters'

/**
 * Error thrown when a value object is constructed from invalid input.
 * Raised before any network I/O happens.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Error thrown when the API answers with a response code that signals a failure.
 *
 * `code` is the number the service actually sent, which differs from
 * `responseCode.code` when the service answered with a code this client does not know.
 */
export class ErrorResponseError extends Error {
  public readonly code: number

  constructor(
    public readonly responseCode: ResponseCode,
    message?: string,
    options: { code?: number; cause?: unknown } = {}
  ) {
    super(message ?? `${options.code ?? responseCode.code}: ${responseCode.meaning}`, {
      cause: options.cause,
    })
    if (!responseCode.isError && responseCode.name !== 'UNKNOWN') {
      throw new TypeError(
        `Constructing an ErrorResponseError with non-error response code ${responseCode.name} is forbidden`
      )
    }
    this.name = 'ErrorResponseError'
    this.code = options.code ?? responseCode.code
  }

  get meaning(): string {
    return this.responseCode.meaning
  }
}

/**
 * Network failure or cancellation while awaiting a response.
 * Always carries the UNKNOWN response code.
 */
export class TransportError extends ErrorResponseError {
  constructor(message: string, cause?: unknown) {
    super(ResponseCodes.UNKNOWN, message, { cause })
    this.name = 'TransportError'
  }
}

/**
 * Error thrown when the service breaks a protocol guarantee,
 * e.g. refusing to issue a session token
 */
export class UnexpectedStateError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'UnexpectedStateError'
  }
}

export class InvalidNarrowingError extends Error {
  constructor(
    public readonly expected: QuestionType,
    public readonly actual: QuestionType
  ) {
    super(`Cannot view a ${actual} question as ${expected}`)
    this.name = 'InvalidNarrowingError'
  }
}

/**
 * Error thrown when a response body does not have the documented shape
 */
export class DecodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'DecodeError'
  }
}

export class TokenStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TokenStateError'
  }
}

export class CancellationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'CancellationError'
  }
}
