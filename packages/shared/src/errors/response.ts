import { ErrorCode, ERROR_HTTP_STATUS } from './codes'
import type { ErrorContext } from './context'

/**
 * Standardized error response structure
 */
export interface ErrorResponse {
  error: {
    message: string
    code: ErrorCode
    httpStatus: number
    details?: ErrorContext
    traceId?: string
    timestamp: string
  }
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  message: string,
  code: ErrorCode,
  options?: {
    details?: ErrorContext
    traceId?: string
  }
): ErrorResponse {
  return {
    error: {
      message,
      code,
      httpStatus: ERROR_HTTP_STATUS[code],
      details: options?.details,
      traceId: options?.traceId,
      timestamp: new Date().toISOString(),
    },
  }
}

/**
 * Error raised anywhere in the engine. The code decides the HTTP status
 * the connection answers with.
 */
export class WireError extends Error {
  public readonly code: ErrorCode
  public readonly httpStatus: number
  public readonly details?: ErrorContext
  public readonly traceId?: string

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      details?: ErrorContext
      traceId?: string
      cause?: unknown
    }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'WireError'
    this.code = code
    this.httpStatus = ERROR_HTTP_STATUS[code]
    this.details = options?.details
    this.traceId = options?.traceId

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WireError)
    }
  }

  /**
   * Convert error to ErrorResponse format
   */
  toResponse(): ErrorResponse {
    return createErrorResponse(this.message, this.code, {
      details: this.details,
      traceId: this.traceId,
    })
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      httpStatus: this.httpStatus,
      details: this.details,
      traceId: this.traceId,
      stack: this.stack,
    }
  }
}

/**
 * Check if an error is a WireError
 */
export function isWireError(error: unknown): error is WireError {
  return error instanceof WireError
}

/**
 * Convert unknown error to WireError, keeping the original as `cause`
 */
export function toWireError(
  error: unknown,
  fallback: ErrorCode = ErrorCode.INTERNAL_ERROR,
  traceId?: string
): WireError {
  if (isWireError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new WireError(error.message, fallback, { traceId, cause: error })
  }

  return new WireError(String(error), fallback, { traceId })
}
