/**
 * Error codes for the wirehttp engine
 * Organized by the pipeline stage that raises them
 */
export enum ErrorCode {
  // ============================================
  // Request parsing (400, 408, 413, 431, 505)
  // ============================================
  MALFORMED_REQUEST_LINE = 'MALFORMED_REQUEST_LINE',
  MALFORMED_HEADER = 'MALFORMED_HEADER',
  INCOMPLETE_REQUEST = 'INCOMPLETE_REQUEST',
  INCOMPLETE_BODY = 'INCOMPLETE_BODY',
  MALFORMED_BODY = 'MALFORMED_BODY',
  INVALID_CONTENT_LENGTH = 'INVALID_CONTENT_LENGTH',
  UNSUPPORTED_ENCODING = 'UNSUPPORTED_ENCODING',
  HEADERS_TOO_LARGE = 'HEADERS_TOO_LARGE',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  VERSION_NOT_SUPPORTED = 'VERSION_NOT_SUPPORTED',
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',

  // ============================================
  // Routing (404, 405)
  // ============================================
  ROUTE_NOT_FOUND = 'ROUTE_NOT_FOUND',
  METHOD_NOT_ALLOWED = 'METHOD_NOT_ALLOWED',

  // ============================================
  // Route registration
  // ============================================
  INVALID_ROUTE_PATTERN = 'INVALID_ROUTE_PATTERN',
  ROUTE_CONFLICT = 'ROUTE_CONFLICT',
  ROUTER_FROZEN = 'ROUTER_FROZEN',

  // ============================================
  // Middleware & handlers (401, 500)
  // ============================================
  UNAUTHORIZED = 'UNAUTHORIZED',
  MIDDLEWARE_ABORTED = 'MIDDLEWARE_ABORTED',
  RESPONSE_NOT_FINALIZED = 'RESPONSE_NOT_FINALIZED',
  CONTEXT_KEY_MISSING = 'CONTEXT_KEY_MISSING',
  INVALID_STATUS = 'INVALID_STATUS',

  // ============================================
  // Static files (403, 404, 500)
  // ============================================
  FORBIDDEN_PATH = 'FORBIDDEN_PATH',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  FILE_UNREADABLE = 'FILE_UNREADABLE',

  // ============================================
  // Connection & lifecycle
  // ============================================
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',
  BIND_FAILED = 'BIND_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // ============================================
  // General Errors (500)
  // ============================================
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Map error codes to HTTP status codes
 */
export const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  // Request parsing
  [ErrorCode.MALFORMED_REQUEST_LINE]: 400,
  [ErrorCode.MALFORMED_HEADER]: 400,
  [ErrorCode.INCOMPLETE_REQUEST]: 400,
  [ErrorCode.INCOMPLETE_BODY]: 400,
  [ErrorCode.MALFORMED_BODY]: 400,
  [ErrorCode.INVALID_CONTENT_LENGTH]: 400,
  [ErrorCode.UNSUPPORTED_ENCODING]: 400,
  [ErrorCode.HEADERS_TOO_LARGE]: 431,
  [ErrorCode.PAYLOAD_TOO_LARGE]: 413,
  [ErrorCode.VERSION_NOT_SUPPORTED]: 505,
  [ErrorCode.REQUEST_TIMEOUT]: 408,

  // Routing
  [ErrorCode.ROUTE_NOT_FOUND]: 404,
  [ErrorCode.METHOD_NOT_ALLOWED]: 405,

  // Route registration
  [ErrorCode.INVALID_ROUTE_PATTERN]: 500,
  [ErrorCode.ROUTE_CONFLICT]: 500,
  [ErrorCode.ROUTER_FROZEN]: 500,

  // Middleware & handlers
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.MIDDLEWARE_ABORTED]: 500,
  [ErrorCode.RESPONSE_NOT_FINALIZED]: 500,
  [ErrorCode.CONTEXT_KEY_MISSING]: 500,
  [ErrorCode.INVALID_STATUS]: 500,

  // Static files
  [ErrorCode.FORBIDDEN_PATH]: 403,
  [ErrorCode.FILE_NOT_FOUND]: 404,
  [ErrorCode.FILE_UNREADABLE]: 500,

  // Connection & lifecycle
  [ErrorCode.CONNECTION_CLOSED]: 500,
  [ErrorCode.BIND_FAILED]: 500,
  [ErrorCode.INVALID_CONFIG]: 500,

  // General Errors
  [ErrorCode.INTERNAL_ERROR]: 500,
}

/**
 * Codes raised while reading a request off the wire. The connection is
 * always closed after answering one of these.
 */
export const PARSE_ERROR_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.MALFORMED_REQUEST_LINE,
  ErrorCode.MALFORMED_HEADER,
  ErrorCode.INCOMPLETE_REQUEST,
  ErrorCode.INCOMPLETE_BODY,
  ErrorCode.MALFORMED_BODY,
  ErrorCode.INVALID_CONTENT_LENGTH,
  ErrorCode.UNSUPPORTED_ENCODING,
  ErrorCode.HEADERS_TOO_LARGE,
  ErrorCode.PAYLOAD_TOO_LARGE,
  ErrorCode.VERSION_NOT_SUPPORTED,
])
