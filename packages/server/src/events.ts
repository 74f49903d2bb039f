/**
 * Structured server events
 *
 * The engine reports what happens through a sink and never formats log
 * lines itself. `createLoggerSink` adapts the sink onto the shared Logger.
 */

import type { WireError } from '@wirehttp/shared/errors'
import type { Logger } from '@wirehttp/shared/logger'
import type { HttpMethod, HttpVersion } from './core/request'

export type ConnectionCloseReason =
  | 'client-closed'
  | 'connection-close'
  | 'parse-error'
  | 'timeout'
  | 'io-error'

export type ServerEvent =
  | { type: 'server.listening'; host: string; port: number }
  | { type: 'server.closed' }
  | { type: 'connection.opened'; connectionId: number; remoteAddress?: string; remotePort?: number }
  | { type: 'connection.closed'; connectionId: number; requests: number; reason: ConnectionCloseReason }
  | { type: 'request.received'; connectionId: number; method: HttpMethod; target: string; version: HttpVersion }
  | {
      type: 'route.matched'
      connectionId: number
      method: HttpMethod
      path: string
      pattern: string
      params: Record<string, string>
    }
  | { type: 'route.shadowed'; method: HttpMethod; pattern: string; shadowedBy: string }
  | {
      type: 'response.sent'
      connectionId: number
      method?: HttpMethod
      path?: string
      status: number
      durationMs: number
    }
  | { type: 'error'; connectionId?: number; error: WireError }

export type ServerEventType = ServerEvent['type']

export interface ServerEventSink {
  emit(event: ServerEvent): void
}

export const noopEventSink: ServerEventSink = {
  emit: () => {},
}

/**
 * Collects events in memory
 */
export class EventRecorder implements ServerEventSink {
  readonly events: ServerEvent[] = []

  emit(event: ServerEvent): void {
    this.events.push(event)
  }

  ofType<K extends ServerEventType>(type: K): Extract<ServerEvent, { type: K }>[] {
    return this.events.filter((event): event is Extract<ServerEvent, { type: K }> => event.type === type)
  }
}

export function createLoggerSink(logger: Logger): ServerEventSink {
  return {
    emit(event) {
      switch (event.type) {
        case 'server.listening':
          logger.info(`Listening on ${event.host}:${event.port}`, { host: event.host, port: event.port })
          break
        case 'server.closed':
          logger.info('Server closed')
          break
        case 'connection.opened':
          logger.debug('Connection opened', {
            connectionId: event.connectionId,
            remoteAddress: event.remoteAddress,
            remotePort: event.remotePort,
          })
          break
        case 'connection.closed':
          logger.debug('Connection closed', {
            connectionId: event.connectionId,
            requests: event.requests,
            reason: event.reason,
          })
          break
        case 'request.received':
          logger.debug(`${event.method} ${event.target}`, {
            connectionId: event.connectionId,
            version: event.version,
          })
          break
        case 'route.matched':
          logger.debug(`Matched ${event.method} ${event.pattern}`, {
            connectionId: event.connectionId,
            path: event.path,
            params: event.params,
          })
          break
        case 'route.shadowed':
          logger.warn(`Route ${event.method} ${event.pattern} is unreachable behind ${event.shadowedBy}`, {
            method: event.method,
            pattern: event.pattern,
            shadowedBy: event.shadowedBy,
          })
          break
        case 'response.sent':
          logger.debug(`${event.method ?? '-'} ${event.path ?? '-'} ${event.status}`, {
            connectionId: event.connectionId,
            status: event.status,
            duration: event.durationMs,
          })
          break
        case 'error':
          if (event.error.httpStatus >= 500) {
            logger.error(event.error.message, event.error, {
              connectionId: event.connectionId,
              code: event.error.code,
            })
          } else {
            logger.warn(event.error.message, {
              connectionId: event.connectionId,
              code: event.error.code,
              details: event.error.details,
            })
          }
          break
      }
    },
  }
}
