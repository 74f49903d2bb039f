/**
 * Error context interfaces providing detailed information about errors
 * Each context type corresponds to a stage of the request pipeline
 */

/**
 * Wire parsing error context
 */
export interface ParseErrorContext {
  stage: 'request-line' | 'header' | 'body'
  line?: string
  expected?: number
  received?: number
  limit?: number
}

/**
 * Routing and registration error context
 */
export interface RouteErrorContext {
  method: string
  path: string
  allowed?: string[]
  conflictsWith?: string
}

/**
 * Static file error context
 */
export interface FileErrorContext {
  path: string
  operation: 'resolve' | 'open' | 'stat' | 'read'
  reason?: string
}

/**
 * Connection error context
 */
export interface ConnectionErrorContext {
  remoteAddress?: string
  remotePort?: number
  host?: string
  port?: number
  reason?: string
}

/**
 * Validation error context
 */
export interface ValidationErrorContext {
  issues: Array<{ field: string; message: string }>
}

/**
 * Union type of all error contexts
 */
export type ErrorContext =
  | ParseErrorContext
  | RouteErrorContext
  | FileErrorContext
  | ConnectionErrorContext
  | ValidationErrorContext
