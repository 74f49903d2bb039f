/**
 * Per-connection request loop
 *
 * accepted → parsing → routing → executing → writing → (parsing | closed)
 *
 * Parse failures skip straight to writing an error and closing. Unmatched
 * routes are answered without executing anything. Every failure stays
 * inside this connection.
 */

import { ErrorCode, PARSE_ERROR_CODES, WireError, isWireError, toWireError } from '@wirehttp/shared/errors'
import type { ConnectionCloseReason, ServerEvent, ServerEventSink } from '../events'
import { ByteStreamReader } from './byte-reader'
import { Context } from './context'
import { executeMiddlewares, type Middleware, type RouteHandler } from './middleware'
import { parseRequest, type ParserLimits } from './parser'
import type { Request } from './request'
import { HttpResponse } from './response'
import { writeResponse } from './response-writer'
import type { Router } from './router'
import type { Transport } from './socket'
import { reasonPhrase } from './status'

export type ConnectionState = 'accepted' | 'parsing' | 'routing' | 'executing' | 'writing' | 'closed'

/**
 * Fills `response` for a failed request. `request` is absent when the
 * request could not be parsed.
 */
export type ErrorResponder = (error: WireError, response: HttpResponse, request?: Request) => void | Promise<void>

export const defaultErrorResponder: ErrorResponder = (error, response) => {
  response.setHeader('Content-Type', 'text/plain; charset=utf-8')
  response.send(error.httpStatus, reasonPhrase(error.httpStatus))
}

export interface ConnectionSettings {
  keepAlive: boolean
  limits: ParserLimits
  events: ServerEventSink
  errorResponder: ErrorResponder
}

export class HttpConnection {
  private _state: ConnectionState = 'accepted'
  private requests = 0
  private readonly reader: ByteStreamReader

  constructor(
    readonly id: number,
    private readonly conn: Transport,
    private readonly router: Router,
    private readonly settings: ConnectionSettings
  ) {
    this.reader = new ByteStreamReader(conn)
  }

  get state(): ConnectionState {
    return this._state
  }

  async run(): Promise<void> {
    this.emit({
      type: 'connection.opened',
      connectionId: this.id,
      remoteAddress: this.conn.remoteAddress,
      remotePort: this.conn.remotePort,
    })

    let reason: ConnectionCloseReason = 'io-error'
    try {
      reason = await this.serve()
    } catch (error) {
      if (this.conn.timedOut) {
        reason = 'timeout'
      } else {
        this.emit({ type: 'error', connectionId: this.id, error: toWireError(error, ErrorCode.CONNECTION_CLOSED) })
      }
    } finally {
      this._state = 'closed'
      this.conn.close()
      this.emit({ type: 'connection.closed', connectionId: this.id, requests: this.requests, reason })
    }
  }

  private async serve(): Promise<ConnectionCloseReason> {
    for (;;) {
      this._state = 'parsing'

      let request: Request | null
      try {
        request = await parseRequest(this.reader, this.settings.limits)
      } catch (error) {
        return this.rejectUnparseable(error)
      }
      if (!request) {
        return 'client-closed'
      }

      this.requests++
      if (!(await this.handle(request))) {
        return 'connection-close'
      }
    }
  }

  /**
   * Answer a parse failure and close. Timeouts and closed sockets end
   * the connection without a response.
   */
  private async rejectUnparseable(error: unknown): Promise<ConnectionCloseReason> {
    if (!isWireError(error)) {
      throw error
    }
    if (error.code === ErrorCode.REQUEST_TIMEOUT) {
      return 'timeout'
    }
    if (!PARSE_ERROR_CODES.has(error.code)) {
      return this.conn.timedOut ? 'timeout' : 'client-closed'
    }

    this.emit({ type: 'error', connectionId: this.id, error })
    const started = Date.now()
    const response = await this.errorResponse(error)
    response.setHeader('Connection', 'close')
    await this.write(response, false)
    this.emit({ type: 'response.sent', connectionId: this.id, status: response.status, durationMs: Date.now() - started })
    return 'parse-error'
  }

  /**
   * Route, execute and write one request
   * @returns whether the connection stays open for another request
   */
  private async handle(request: Request): Promise<boolean> {
    const started = Date.now()
    this.emit({
      type: 'request.received',
      connectionId: this.id,
      method: request.method,
      target: request.target,
      version: request.version,
    })

    const response = await this.respond(request)

    const keepAlive =
      this.settings.keepAlive &&
      request.keepAlive &&
      !response.headers.tokens('connection').includes('close')

    if (!keepAlive) {
      response.setHeader('Connection', 'close')
    } else if (request.version === 'HTTP/1.0') {
      response.setHeader('Connection', 'keep-alive')
    }

    await this.write(response, request.method === 'HEAD')
    this.emit({
      type: 'response.sent',
      connectionId: this.id,
      method: request.method,
      path: request.path,
      status: response.status,
      durationMs: Date.now() - started,
    })
    return keepAlive
  }

  private async respond(request: Request): Promise<HttpResponse> {
    this._state = 'routing'
    const match = this.router.match(request.method, request.segments)

    switch (match.kind) {
      case 'matched':
        this.emit({
          type: 'route.matched',
          connectionId: this.id,
          method: request.method,
          path: request.path,
          pattern: match.route.pattern,
          params: match.params,
        })
        return this.execute(new Context(request, match.params), match.middleware, match.route.handler)

      case 'options': {
        const allow = match.allowed.join(', ')
        return this.execute(new Context(request), match.middleware, ctx => {
          ctx.response.setHeader('Allow', allow)
          ctx.send(204)
        })
      }

      case 'method-not-allowed': {
        const response = await this.errorResponse(
          new WireError(`${request.method} is not allowed on ${request.path}`, ErrorCode.METHOD_NOT_ALLOWED, {
            details: { method: request.method, path: request.path, allowed: match.allowed },
          }),
          request
        )
        return response.setHeader('Allow', match.allowed.join(', '))
      }

      case 'not-found':
        return this.errorResponse(
          new WireError(`No route for ${request.path}`, ErrorCode.ROUTE_NOT_FOUND, {
            details: { method: request.method, path: request.path },
          }),
          request
        )
    }
  }

  private async execute(ctx: Context, middleware: readonly Middleware[], handler: RouteHandler): Promise<HttpResponse> {
    this._state = 'executing'
    try {
      await executeMiddlewares(ctx, middleware, handler)
      return ctx.response
    } catch (error) {
      const wireError = toWireError(error, ErrorCode.MIDDLEWARE_ABORTED)
      this.emit({ type: 'error', connectionId: this.id, error: wireError })
      await ctx.response.dispose()
      return this.errorResponse(wireError, ctx.request)
    }
  }

  private async errorResponse(error: WireError, request?: Request): Promise<HttpResponse> {
    const response = new HttpResponse()
    try {
      await this.settings.errorResponder(error, response, request)
      if (response.finalized) {
        return response
      }
      this.emit({
        type: 'error',
        connectionId: this.id,
        error: new WireError('Error responder left the response unfinalized', ErrorCode.RESPONSE_NOT_FINALIZED),
      })
    } catch (responderError) {
      this.emit({ type: 'error', connectionId: this.id, error: toWireError(responderError) })
    }

    await response.dispose()
    const fallback = new HttpResponse()
    await defaultErrorResponder(error, fallback, request)
    return fallback
  }

  private async write(response: HttpResponse, headOnly: boolean): Promise<void> {
    this._state = 'writing'
    try {
      await writeResponse(this.conn, response, { headOnly })
    } finally {
      await response.dispose()
    }
  }

  private emit(event: ServerEvent): void {
    this.settings.events.emit(event)
  }
}
