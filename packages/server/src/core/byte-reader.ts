/**
 * Buffered reader over a byte source
 *
 * Turns arbitrarily split socket reads into CRLF-terminated lines and
 * exact-length chunks. Bytes past the current request stay buffered for
 * the next one on the same connection.
 */

import { ErrorCode, WireError } from '@wirehttp/shared/errors'

/**
 * Pull-based byte producer. An empty buffer means end of stream.
 */
export interface ByteSource {
  read(): Promise<Buffer>
}

interface DynBuf {
  data: Buffer
  length: number
  readOffset: number
}

const CRLF = Buffer.from('\r\n')

function bufView(buf: DynBuf): Buffer {
  return buf.data.subarray(buf.readOffset, buf.readOffset + buf.length)
}

function bufPush(buf: DynBuf, chunk: Buffer): void {
  const needed = buf.length + chunk.length

  if (buf.readOffset + needed > buf.data.length) {
    if (needed <= buf.data.length) {
      // enough room once the consumed prefix is dropped
      buf.data.copyWithin(0, buf.readOffset, buf.readOffset + buf.length)
    } else {
      let capacity = Math.max(buf.data.length, 32)
      while (capacity < needed) {
        capacity *= 2
      }
      const grown = Buffer.alloc(capacity)
      buf.data.copy(grown, 0, buf.readOffset, buf.readOffset + buf.length)
      buf.data = grown
    }
    buf.readOffset = 0
  }

  chunk.copy(buf.data, buf.readOffset + buf.length)
  buf.length = needed
}

function bufPop(buf: DynBuf, count: number): void {
  buf.readOffset += count
  buf.length -= count
  if (buf.length === 0) {
    buf.readOffset = 0
  }
}

export class ByteStreamReader {
  private buf: DynBuf = { data: Buffer.alloc(0), length: 0, readOffset: 0 }
  private eof = false

  constructor(private readonly source: ByteSource) {}

  /**
   * Number of bytes received but not yet consumed
   */
  get buffered(): number {
    return this.buf.length
  }

  /**
   * Read the next CRLF-terminated line, without the terminator.
   *
   * Resolves `null` when the stream ends before any byte of a new line.
   * Fails with HEADERS_TOO_LARGE once more than `limit` bytes arrive
   * without a CRLF, and with INCOMPLETE_REQUEST when the stream ends
   * mid-line.
   */
  async readLine(limit: number): Promise<string | null> {
    let scanFrom = 0

    for (;;) {
      const view = bufView(this.buf)
      const idx = view.indexOf(CRLF, scanFrom)

      if (idx >= 0) {
        if (idx > limit) {
          throw this.lineTooLong(limit)
        }
        const line = view.toString('latin1', 0, idx)
        bufPop(this.buf, idx + CRLF.length)
        return line
      }

      if (view.length > limit + 1) {
        throw this.lineTooLong(limit)
      }

      // a CR may be waiting for its LF in the next chunk
      scanFrom = Math.max(0, view.length - 1)

      if (!(await this.fill())) {
        if (this.buf.length === 0) {
          return null
        }
        throw new WireError('Connection closed in the middle of a line', ErrorCode.INCOMPLETE_REQUEST, {
          details: { stage: 'header', received: this.buf.length },
        })
      }
    }
  }

  /**
   * Read exactly `count` bytes, suspending until they arrive.
   * Fails with INCOMPLETE_BODY if the stream ends first.
   */
  async readExact(count: number): Promise<Buffer> {
    while (this.buf.length < count) {
      if (!(await this.fill())) {
        throw new WireError(
          `Connection closed after ${this.buf.length} of ${count} body bytes`,
          ErrorCode.INCOMPLETE_BODY,
          { details: { stage: 'body', expected: count, received: this.buf.length } }
        )
      }
    }

    const chunk = Buffer.from(bufView(this.buf).subarray(0, count))
    bufPop(this.buf, count)
    return chunk
  }

  private async fill(): Promise<boolean> {
    if (this.eof) {
      return false
    }
    const chunk = await this.source.read()
    if (chunk.length === 0) {
      this.eof = true
      return false
    }
    bufPush(this.buf, chunk)
    return true
  }

  private lineTooLong(limit: number): WireError {
    return new WireError(`Header section exceeds ${limit} bytes`, ErrorCode.HEADERS_TOO_LARGE, {
      details: { stage: 'header', limit },
    })
  }
}
