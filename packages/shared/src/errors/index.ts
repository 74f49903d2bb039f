/**
 * Shared error system for wirehttp
 *
 * This module provides a centralized error handling system with:
 * - Standardized error codes
 * - HTTP status mapping
 * - Error context for detailed information
 * - TraceID support for request correlation
 */

export { ErrorCode, ERROR_HTTP_STATUS, PARSE_ERROR_CODES } from './codes'
export type {
  ParseErrorContext,
  RouteErrorContext,
  FileErrorContext,
  ConnectionErrorContext,
  ValidationErrorContext,
  ErrorContext,
} from './context'
export {
  type ErrorResponse,
  WireError,
  createErrorResponse,
  isWireError,
  toWireError,
} from './response'
