/**
 * Middleware Pipeline System
 *
 * Runs the ordered middleware of a route, then its handler, over one
 * Context. Bundled middleware:
 * - CORS headers and preflight answers
 * - Request logging with TraceID
 * - Error formatting as JSON bodies
 * - Bearer token authentication
 */

import { ErrorCode, WireError, toWireError } from '@wirehttp/shared/errors'
import { generateTraceId, type Logger } from '@wirehttp/shared/logger'
import { createContextKey, type Context } from './context'

export type NextFunction = () => Promise<void>
export type Middleware = (ctx: Context, next: NextFunction) => Promise<void> | void
export type RouteHandler = (ctx: Context) => Promise<void> | void

/**
 * Execute a chain of middlewares followed by the handler.
 *
 * Anything thrown that is not a WireError is wrapped as
 * MIDDLEWARE_ABORTED. The chain must leave the response finalized.
 */
export async function executeMiddlewares(
  ctx: Context,
  middlewares: readonly Middleware[],
  handler: RouteHandler
): Promise<void> {
  const dispatch = async (index: number): Promise<void> => {
    const middleware = middlewares[index]
    if (!middleware) {
      await handler(ctx)
      return
    }

    let called = false
    await middleware(ctx, async () => {
      if (called) {
        throw new WireError('next() called multiple times', ErrorCode.MIDDLEWARE_ABORTED)
      }
      called = true
      await dispatch(index + 1)
    })
  }

  try {
    await dispatch(0)
  } catch (error) {
    throw toWireError(error, ErrorCode.MIDDLEWARE_ABORTED)
  }

  if (!ctx.response.finalized) {
    throw new WireError(
      `${ctx.request.method} ${ctx.request.path} completed without a response`,
      ErrorCode.RESPONSE_NOT_FINALIZED
    )
  }
}

/**
 * CORS Middleware
 * Answers preflight requests and adds CORS headers to responses
 */
export function corsMiddleware(options?: {
  origin?: string
  methods?: string[]
  headers?: string[]
  credentials?: boolean
}): Middleware {
  const {
    origin = '*',
    methods = ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    headers = ['Content-Type', 'Authorization', 'X-Trace-ID'],
    credentials = true,
  } = options || {}

  return async (ctx, next) => {
    if (ctx.request.method === 'OPTIONS') {
      ctx.response
        .setHeader('Access-Control-Allow-Origin', origin)
        .setHeader('Access-Control-Allow-Methods', methods.join(', '))
        .setHeader('Access-Control-Allow-Headers', headers.join(', '))
        .setHeader('Access-Control-Allow-Credentials', credentials.toString())
        .setHeader('Access-Control-Max-Age', '86400')
        .send(204)
      return
    }

    await next()

    ctx.response.setHeader('Access-Control-Allow-Origin', origin)
    if (credentials) {
      ctx.response.setHeader('Access-Control-Allow-Credentials', 'true')
    }
  }
}

/**
 * Trace id of the current request, set by loggerMiddleware
 */
export const TRACE_ID_KEY = createContextKey<string>('traceId')

/**
 * Request-scoped logger, set by loggerMiddleware
 */
export const REQUEST_LOGGER_KEY = createContextKey<Logger>('logger')

/**
 * Logger Middleware
 * Logs requests with TraceID support
 */
export function loggerMiddleware(logger?: Logger): Middleware {
  return async (ctx, next) => {
    const startTime = Date.now()
    const { method, path } = ctx.request

    // Extract or generate TraceID
    const traceId = ctx.header('X-Trace-ID') || generateTraceId()
    ctx.set(TRACE_ID_KEY, traceId)

    const requestLogger = logger?.child({ method, path }, { traceId, timestamp: startTime })
    if (requestLogger) {
      ctx.set(REQUEST_LOGGER_KEY, requestLogger)
      requestLogger.info(`${method} ${path}`, { query: ctx.request.query })
    }

    try {
      await next()
    } catch (error) {
      const wireError = toWireError(error, ErrorCode.MIDDLEWARE_ABORTED, traceId)
      requestLogger?.error(`${method} ${path} ERROR`, wireError, {
        code: wireError.code,
        duration: Date.now() - startTime,
      })
      throw wireError
    }

    requestLogger?.info(`${method} ${path} ${ctx.response.status}`, {
      status: ctx.response.status,
      duration: Date.now() - startTime,
    })
    ctx.response.setHeader('X-Trace-ID', traceId)
  }
}

/**
 * Error Handler Middleware
 * Catches errors and formats them as standardized JSON responses
 */
export function errorHandlerMiddleware(): Middleware {
  return async (ctx, next) => {
    try {
      await next()
    } catch (error) {
      const wireError = toWireError(error, ErrorCode.MIDDLEWARE_ABORTED, ctx.get(TRACE_ID_KEY))
      ctx.response.reset()
      ctx.json(wireError.httpStatus, wireError.toResponse())
    }
  }
}

/**
 * Bearer token of an authenticated request, set by bearerAuthMiddleware
 */
export const AUTH_TOKEN_KEY = createContextKey<string>('authToken')

/**
 * Bearer Auth Middleware
 * Short-circuits with 401 unless `verify` accepts the Authorization token
 */
export function bearerAuthMiddleware(
  verify: (token: string) => boolean | Promise<boolean>,
  options?: { realm?: string }
): Middleware {
  const realm = options?.realm ?? 'api'

  return async (ctx, next) => {
    const header = ctx.header('Authorization')
    const match = header ? /^Bearer[ \t]+(\S+)\s*$/i.exec(header) : null
    const token = match?.[1]

    if (!token || !(await verify(token))) {
      ctx.response.setHeader('WWW-Authenticate', `Bearer realm="${realm}"`)
      ctx.text(401, 'Unauthorized')
      return
    }

    ctx.set(AUTH_TOKEN_KEY, token)
    await next()
  }
}
