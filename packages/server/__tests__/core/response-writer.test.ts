/**
 * Unit tests for response serialization
 */

import { describe, it, expect, vi } from 'vitest'
import { ErrorCode } from '@wirehttp/shared/errors'
import { HttpResponse, type StreamedBody } from '../../src/core/response'
import { serializeHead, serializeResponse, writeResponse } from '../../src/core/response-writer'
import { BufferSink, parseResponse, rejection } from '../helpers'

function streamOf(length: number, pieces: string[]) {
  const close = vi.fn(async (): Promise<void> => undefined)
  const body = {
    length,
    chunks: (async function* () {
      for (const piece of pieces) {
        yield Buffer.from(piece)
      }
    })(),
    close,
  } satisfies StreamedBody
  return body
}

describe('serializeResponse', () => {
  it('should write the exact bytes of a minimal response', () => {
    const response = new HttpResponse().send(200, 'hello')

    expect(serializeResponse(response).toString('latin1')).toBe('HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nhello')
  })

  it('should write headers in insertion order after Content-Length', () => {
    const response = new HttpResponse()
      .setHeader('Content-Type', 'text/plain')
      .setHeader('X-Request-Id', 'abc')
      .send(404, 'missing')

    expect(serializeResponse(response).toString('latin1')).toBe(
      'HTTP/1.1 404 Not Found\r\nContent-Length: 7\r\nContent-Type: text/plain\r\nX-Request-Id: abc\r\n\r\nmissing'
    )
  })

  it('should compute Content-Length in bytes and ignore one set by the handler', () => {
    const response = new HttpResponse().setHeader('Content-Length', '999').send(200, 'añb')

    const parsed = parseResponse(serializeResponse(response))
    expect(parsed.headers).toEqual([['Content-Length', '4']])
    expect(parsed.body.toString('utf8')).toBe('añb')
  })

  it('should drop a Transfer-Encoding header', () => {
    const response = new HttpResponse().setHeader('Transfer-Encoding', 'chunked').send(200, 'x')
    expect(parseResponse(serializeResponse(response)).header('transfer-encoding')).toBeUndefined()
  })

  it('should write one Set-Cookie line per cookie', () => {
    const response = new HttpResponse().setCookie('a', '1').setCookie('b', '2', { path: '/' }).end(204)

    expect(serializeResponse(response).toString('latin1')).toBe(
      'HTTP/1.1 204 No Content\r\nSet-Cookie: a=1\r\nSet-Cookie: b=2; Path=/\r\n\r\n'
    )
  })

  it.each([204, 304, 101])('should omit Content-Length and body for status %s', status => {
    const response = new HttpResponse().send(status, 'ignored')
    const text = serializeResponse(response).toString('latin1')

    expect(text).not.toContain('Content-Length')
    expect(text.endsWith('\r\n\r\n')).toBe(true)
  })

  it('should keep Content-Length and drop the body for HEAD', () => {
    const response = new HttpResponse().send(200, 'hello')

    expect(serializeResponse(response, { headOnly: true }).toString('latin1')).toBe(
      'HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\n'
    )
  })

  it('should use a generic reason phrase for unlisted codes', () => {
    const response = new HttpResponse().end(599)
    expect(serializeHead(response).toString('latin1').split('\r\n')[0]).toBe('HTTP/1.1 599 Unknown')
  })

  it('should read back the status, every header and the body bytes', () => {
    const body = Buffer.from(Array.from({ length: 256 }, (_, byte) => byte))
    const response = new HttpResponse()
      .setHeader('Content-Type', 'application/octet-stream')
      .setHeader('X-Request-Id', 'req-1')
      .setHeader('Cache-Control', 'no-store, max-age=0')
      .setCookie('session', 'abc', { path: '/', httpOnly: true })
      .setCookie('theme', 'dark')
      .send(201, body)

    const parsed = parseResponse(serializeResponse(response))

    expect(parsed.status).toBe(201)
    expect(parsed.reason).toBe('Created')
    expect(parsed.headers).toEqual([
      ['Content-Length', '256'],
      ['Content-Type', 'application/octet-stream'],
      ['X-Request-Id', 'req-1'],
      ['Cache-Control', 'no-store, max-age=0'],
      ['Set-Cookie', 'session=abc; Path=/; HttpOnly'],
      ['Set-Cookie', 'theme=dark'],
    ])
    expect(parsed.body.equals(body)).toBe(true)
  })
})

describe('writeResponse', () => {
  it('should write an in-memory response in a single write', async () => {
    const sink = new BufferSink()
    await writeResponse(sink, new HttpResponse().send(200, 'hello'))

    expect(sink.chunks).toHaveLength(1)
    expect(sink.toString()).toBe('HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nhello')
  })

  it('should stream chunks after the head and close the body', async () => {
    const sink = new BufferSink()
    const body = streamOf(8, ['abc', 'def', 'gh'])

    await writeResponse(sink, new HttpResponse().stream(200, body))

    expect(sink.chunks.map(chunk => chunk.toString('latin1'))).toEqual([
      'HTTP/1.1 200 OK\r\nContent-Length: 8\r\n\r\n',
      'abc',
      'def',
      'gh',
    ])
    expect(body.close).toHaveBeenCalledTimes(1)
  })

  it('should stop at the declared length', async () => {
    const sink = new BufferSink()
    await writeResponse(sink, new HttpResponse().stream(200, streamOf(4, ['abc', 'def', 'ghi'])))

    expect(parseResponse(sink.output).body.toString()).toBe('abcd')
    expect(sink.output.length).toBe('HTTP/1.1 200 OK\r\nContent-Length: 4\r\n\r\n'.length + 4)
  })

  it('should fail and still close when the stream ends early', async () => {
    const sink = new BufferSink()
    const body = streamOf(10, ['abc'])

    const error = await rejection(writeResponse(sink, new HttpResponse().stream(200, body)))

    expect(error.code).toBe(ErrorCode.INTERNAL_ERROR)
    expect(body.close).toHaveBeenCalledTimes(1)
  })

  it('should write only the head of a streamed HEAD response', async () => {
    const sink = new BufferSink()
    const body = streamOf(3, ['abc'])

    await writeResponse(sink, new HttpResponse().stream(200, body), { headOnly: true })

    expect(sink.toString()).toBe('HTTP/1.1 200 OK\r\nContent-Length: 3\r\n\r\n')
    expect(body.close).toHaveBeenCalledTimes(1)
  })
})
