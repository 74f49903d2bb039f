/**
 * Mutable response built by middleware and handlers
 */

import { ErrorCode, WireError } from '@wirehttp/shared/errors'
import { serializeCookie, type CookieOptions } from './cookies'
import { HeaderMap } from './headers'
import { isValidStatus } from './status'

/**
 * Body produced lazily, e.g. from an open file. `close` releases the
 * underlying resource and must be safe to call more than once.
 */
export interface StreamedBody {
  readonly length: number
  readonly chunks: AsyncIterable<Buffer>
  close(): Promise<void>
}

export type ResponseBody = Buffer | StreamedBody

export function isStreamedBody(body: ResponseBody): body is StreamedBody {
  return !Buffer.isBuffer(body)
}

const EMPTY = Buffer.alloc(0)

export class HttpResponse {
  readonly headers = new HeaderMap()
  private _status = 200
  private _body: ResponseBody = EMPTY
  private _finalized = false
  private _cookies: string[] = []
  // streams replaced by reset() or a second send, closed on dispose
  private discarded: StreamedBody[] = []
  private disposed = false

  get status(): number {
    return this._status
  }

  set status(value: number) {
    if (!isValidStatus(value)) {
      throw new WireError(`Invalid status code ${value}`, ErrorCode.INVALID_STATUS)
    }
    this._status = value
  }

  get body(): ResponseBody {
    return this._body
  }

  get finalized(): boolean {
    return this._finalized
  }

  /**
   * Serialized Set-Cookie values, in the order they were added
   */
  get cookies(): readonly string[] {
    return this._cookies
  }

  setHeader(name: string, value: string): this {
    this.headers.set(name, value)
    return this
  }

  setCookie(name: string, value: string, options?: CookieOptions): this {
    this._cookies.push(serializeCookie(name, value, options))
    return this
  }

  /**
   * Set status and an in-memory body, and mark the response finalized
   */
  send(status: number, body: string | Uint8Array = EMPTY): this {
    this.status = status
    this.replaceBody(typeof body === 'string' ? Buffer.from(body, 'utf8') : Buffer.from(body))
    this._finalized = true
    return this
  }

  stream(status: number, body: StreamedBody): this {
    this.status = status
    this.replaceBody(body)
    this._finalized = true
    return this
  }

  /**
   * Finalize with the current status and an empty body
   */
  end(status?: number): this {
    return this.send(status ?? this._status)
  }

  /**
   * Drop everything set so far, so an error response can be written
   */
  reset(): this {
    this.headers.clear()
    this._cookies = []
    this._status = 200
    this.replaceBody(EMPTY)
    this._finalized = false
    return this
  }

  /**
   * Close every streamed body this response has held
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return
    }
    this.disposed = true
    const streams = [...this.discarded]
    if (isStreamedBody(this._body)) {
      streams.push(this._body)
    }
    this.discarded = []
    await Promise.all(streams.map(stream => stream.close()))
  }

  private replaceBody(body: ResponseBody): void {
    if (isStreamedBody(this._body) && this._body !== body) {
      this.discarded.push(this._body)
    }
    this._body = body
  }
}
