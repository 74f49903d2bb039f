/**
 * Unit tests for server events and the logger sink
 */

import { describe, it, expect } from 'vitest'
import { ErrorCode, WireError } from '@wirehttp/shared/errors'
import { Logger, LogLevel, type LogEntry } from '@wirehttp/shared/logger'
import { EventRecorder, createLoggerSink } from '../src/events'

function recordingSink(level = LogLevel.DEBUG) {
  const entries: LogEntry[] = []
  const logger = new Logger({ level, writer: (_line, entry) => entries.push(entry) })
  return { sink: createLoggerSink(logger), entries }
}

describe('EventRecorder', () => {
  it('should keep events in order and filter by type', () => {
    const recorder = new EventRecorder()
    recorder.emit({ type: 'server.listening', host: '127.0.0.1', port: 8080 })
    recorder.emit({ type: 'connection.opened', connectionId: 1 })
    recorder.emit({ type: 'connection.opened', connectionId: 2 })

    expect(recorder.events).toHaveLength(3)
    expect(recorder.ofType('connection.opened').map(event => event.connectionId)).toEqual([1, 2])
    expect(recorder.ofType('server.closed')).toEqual([])
  })
})

describe('createLoggerSink', () => {
  it('should log lifecycle events at info', () => {
    const { sink, entries } = recordingSink()

    sink.emit({ type: 'server.listening', host: '127.0.0.1', port: 8080 })
    sink.emit({ type: 'server.closed' })

    expect(entries.map(entry => [entry.level, entry.message])).toEqual([
      [LogLevel.INFO, 'Listening on 127.0.0.1:8080'],
      [LogLevel.INFO, 'Server closed'],
    ])
  })

  it('should log per-request events at debug', () => {
    const { sink, entries } = recordingSink()

    sink.emit({ type: 'request.received', connectionId: 3, method: 'GET', target: '/a?b=1', version: 'HTTP/1.1' })
    sink.emit({ type: 'response.sent', connectionId: 3, method: 'GET', path: '/a', status: 200, durationMs: 4 })

    expect(entries.map(entry => [entry.level, entry.message])).toEqual([
      [LogLevel.DEBUG, 'GET /a?b=1'],
      [LogLevel.DEBUG, 'GET /a 200'],
    ])
    expect(entries[1]?.context).toEqual({ connectionId: 3, status: 200, duration: 4 })
  })

  it('should drop debug events below the configured level', () => {
    const { sink, entries } = recordingSink(LogLevel.INFO)

    sink.emit({ type: 'connection.opened', connectionId: 1, remoteAddress: '127.0.0.1', remotePort: 5000 })
    sink.emit({ type: 'connection.closed', connectionId: 1, requests: 0, reason: 'client-closed' })

    expect(entries).toEqual([])
  })

  it('should warn about shadowed routes', () => {
    const { sink, entries } = recordingSink()

    sink.emit({ type: 'route.shadowed', method: 'GET', pattern: '/users/all', shadowedBy: '/users/:id' })

    expect(entries[0]?.level).toBe(LogLevel.WARN)
    expect(entries[0]?.message).toBe('Route GET /users/all is unreachable behind /users/:id')
  })

  it('should log server errors at error and client errors at warn', () => {
    const { sink, entries } = recordingSink()

    sink.emit({ type: 'error', connectionId: 1, error: new WireError('kaput', ErrorCode.MIDDLEWARE_ABORTED) })
    sink.emit({ type: 'error', connectionId: 1, error: new WireError('bad line', ErrorCode.MALFORMED_REQUEST_LINE) })

    expect(entries.map(entry => [entry.level, entry.message])).toEqual([
      [LogLevel.ERROR, 'kaput'],
      [LogLevel.WARN, 'bad line'],
    ])
    expect(entries[1]?.context).toEqual({ connectionId: 1, code: 'MALFORMED_REQUEST_LINE' })
  })
})
