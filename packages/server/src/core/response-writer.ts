/**
 * Response serialization
 *
 * Status line, computed Content-Length, handler headers in insertion
 * order, Set-Cookie lines, blank line, body.
 */

import { ErrorCode, WireError } from '@wirehttp/shared/errors'
import { isStreamedBody, type HttpResponse } from './response'
import type { ByteSink } from './socket'
import { isBodylessStatus, reasonPhrase } from './status'

export interface WriteOptions {
  /** Answering a HEAD request: keep Content-Length, drop the body */
  headOnly?: boolean
}

// framing headers are always computed here
const COMPUTED_HEADERS = new Set(['content-length', 'transfer-encoding'])

export function serializeHead(response: HttpResponse): Buffer {
  const lines = [`HTTP/1.1 ${response.status} ${reasonPhrase(response.status)}`]

  if (!isBodylessStatus(response.status)) {
    lines.push(`Content-Length: ${response.body.length}`)
  }
  for (const [name, value] of response.headers) {
    if (!COMPUTED_HEADERS.has(name.toLowerCase())) {
      lines.push(`${name}: ${value}`)
    }
  }
  for (const cookie of response.cookies) {
    lines.push(`Set-Cookie: ${cookie}`)
  }

  return Buffer.from(`${lines.join('\r\n')}\r\n\r\n`, 'latin1')
}

/**
 * Serialize a response with an in-memory body into one buffer
 */
export function serializeResponse(response: HttpResponse, options: WriteOptions = {}): Buffer {
  const head = serializeHead(response)
  const body = response.body
  if (options.headOnly || isBodylessStatus(response.status) || isStreamedBody(body)) {
    return head
  }
  return Buffer.concat([head, body])
}

/**
 * Write the response to the sink. A streamed body is written chunk by
 * chunk and closed whatever happens.
 */
export async function writeResponse(sink: ByteSink, response: HttpResponse, options: WriteOptions = {}): Promise<void> {
  const body = response.body
  const skipBody = options.headOnly === true || isBodylessStatus(response.status)

  if (!isStreamedBody(body)) {
    await sink.write(serializeResponse(response, options))
    return
  }

  try {
    await sink.write(serializeHead(response))
    if (skipBody) {
      return
    }

    let remaining = body.length
    for await (const chunk of body.chunks) {
      if (remaining <= 0) {
        break
      }
      const piece = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk
      await sink.write(piece)
      remaining -= piece.length
    }

    if (remaining > 0) {
      throw new WireError(
        `Streamed body ended ${remaining} bytes short of its declared length`,
        ErrorCode.INTERNAL_ERROR
      )
    }
  } finally {
    await body.close()
  }
}
