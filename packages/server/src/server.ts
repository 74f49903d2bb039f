/**
 * wirehttp Server Core
 * Accepts TCP connections and runs one request loop per connection
 */

import { createServer, type AddressInfo, type Server, type Socket } from 'node:net'
import { ErrorCode, WireError, toWireError } from '@wirehttp/shared/errors'
import { HttpConnection, defaultErrorResponder, type ConnectionSettings, type ErrorResponder } from './core/connection'
import type { Middleware } from './core/middleware'
import { DEFAULT_PARSER_LIMITS } from './core/parser'
import type { HttpMethod } from './core/request'
import { Router, type Route, type RouteArgs, type RouteGroup } from './core/router'
import { SocketConnection } from './core/socket'
import { noopEventSink, type ServerEvent, type ServerEventSink } from './events'
import { createStaticHandler } from './handlers/static'

export interface ServerOptions {
  host?: string
  port?: number
  /** Reuse connections between requests (default true) */
  keepAlive?: boolean
  /** Close a connection after this long without incoming bytes */
  idleTimeoutMs?: number
  maxHeaderBytes?: number
  maxBodyBytes?: number
  maxConnections?: number
  events?: ServerEventSink
  errorResponder?: ErrorResponder
}

export const DEFAULT_IDLE_TIMEOUT_MS = 5000

export class WireServer {
  readonly router = new Router()
  private server?: Server
  private readonly sockets = new Set<Socket>()
  private nextConnectionId = 1
  private readonly host: string
  private readonly port: number
  private readonly idleTimeoutMs: number
  private readonly maxConnections?: number
  private readonly events: ServerEventSink
  private readonly settings: ConnectionSettings

  constructor(options: ServerOptions = {}) {
    this.host = options.host ?? '0.0.0.0'
    this.port = options.port ?? 8080
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS
    this.maxConnections = options.maxConnections
    this.events = options.events ?? noopEventSink
    this.settings = {
      keepAlive: options.keepAlive ?? true,
      limits: {
        maxHeaderBytes: options.maxHeaderBytes ?? DEFAULT_PARSER_LIMITS.maxHeaderBytes,
        maxBodyBytes: options.maxBodyBytes ?? DEFAULT_PARSER_LIMITS.maxBodyBytes,
      },
      events: this.events,
      errorResponder: options.errorResponder ?? defaultErrorResponder,
    }
  }

  /**
   * Server-wide middleware, run before group and route middleware
   */
  use(...middleware: Middleware[]): this {
    this.router.use(...middleware)
    return this
  }

  addRoute(method: HttpMethod, pattern: string, ...args: RouteArgs): Route {
    return this.router.addRoute(method, pattern, ...args)
  }

  get(pattern: string, ...args: RouteArgs): Route {
    return this.router.addRoute('GET', pattern, ...args)
  }

  head(pattern: string, ...args: RouteArgs): Route {
    return this.router.addRoute('HEAD', pattern, ...args)
  }

  post(pattern: string, ...args: RouteArgs): Route {
    return this.router.addRoute('POST', pattern, ...args)
  }

  put(pattern: string, ...args: RouteArgs): Route {
    return this.router.addRoute('PUT', pattern, ...args)
  }

  patch(pattern: string, ...args: RouteArgs): Route {
    return this.router.addRoute('PATCH', pattern, ...args)
  }

  delete(pattern: string, ...args: RouteArgs): Route {
    return this.router.addRoute('DELETE', pattern, ...args)
  }

  options(pattern: string, ...args: RouteArgs): Route {
    return this.router.addRoute('OPTIONS', pattern, ...args)
  }

  group(prefix: string, ...middleware: Middleware[]): RouteGroup {
    return this.router.group(prefix, ...middleware)
  }

  /**
   * Serve the files below `root` at `GET <prefix>/*path`
   */
  serveStatic(prefix: string, root: string, ...middleware: Middleware[]): Route {
    const base = prefix.replace(/\/+$/, '')
    return this.router.addRoute('GET', `${base}/*path`, ...middleware, createStaticHandler({ root }))
  }

  get listening(): boolean {
    return this.server !== undefined
  }

  /**
   * Freeze the routes and start accepting connections
   * @returns The bound address, useful with port 0
   */
  async listen(): Promise<AddressInfo> {
    if (this.server) {
      throw new WireError('Server is already listening', ErrorCode.INTERNAL_ERROR)
    }

    this.router.freeze()
    for (const warning of this.router.warnings) {
      this.emit({ type: 'route.shadowed', ...warning })
    }

    const server = createServer({ pauseOnConnect: true, noDelay: true, allowHalfOpen: true }, socket =>
      this.accept(socket)
    )
    if (this.maxConnections !== undefined) {
      server.maxConnections = this.maxConnections
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        reject(
          new WireError(`Failed to bind ${this.host}:${this.port}: ${error.message}`, ErrorCode.BIND_FAILED, {
            details: { host: this.host, port: this.port, reason: error.message },
            cause: error,
          })
        )
      }
      server.once('error', onError)
      server.listen(this.port, this.host, () => {
        server.off('error', onError)
        resolve()
      })
    })

    server.on('error', error => this.emit({ type: 'error', error: toWireError(error) }))
    this.server = server

    const address = server.address()
    if (!address || typeof address === 'string') {
      throw new WireError('Listening socket has no TCP address', ErrorCode.BIND_FAILED, {
        details: { host: this.host, port: this.port },
      })
    }
    this.emit({ type: 'server.listening', host: address.address, port: address.port })
    return address
  }

  /**
   * Stop accepting and drop every open connection
   */
  async close(): Promise<void> {
    const server = this.server
    if (!server) {
      return
    }
    this.server = undefined

    const closed = new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()))
    })
    for (const socket of this.sockets) {
      socket.destroy()
    }
    await closed
    this.emit({ type: 'server.closed' })
  }

  private accept(socket: Socket): void {
    this.sockets.add(socket)
    socket.once('close', () => this.sockets.delete(socket))

    const connection = new HttpConnection(
      this.nextConnectionId++,
      new SocketConnection(socket, this.idleTimeoutMs),
      this.router,
      this.settings
    )
    connection.run().catch((error: unknown) => {
      this.emit({ type: 'error', connectionId: connection.id, error: toWireError(error) })
    })
  }

  private emit(event: ServerEvent): void {
    this.events.emit(event)
  }
}
