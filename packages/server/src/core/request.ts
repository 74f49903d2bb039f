/**
 * Parsed HTTP request
 */

import { ErrorCode } from '@wirehttp/shared/errors'
import { parseUrlEncoded, decodeComponent, splitPathSegments } from '../utils/url-encoding'
import { parseCookieHeader } from './cookies'
import { HeaderMap, type HeaderInit, type ReadonlyHeaderMap } from './headers'

export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'] as const

export type HttpMethod = (typeof HTTP_METHODS)[number]

export type HttpVersion = 'HTTP/1.0' | 'HTTP/1.1'

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some(method => method === value)
}

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded'

export interface Request {
  readonly method: HttpMethod
  /** Request target exactly as received */
  readonly target: string
  /** Percent-decoded path component */
  readonly path: string
  /** Decoded, non-empty path segments */
  readonly segments: readonly string[]
  readonly query: Readonly<Record<string, string>>
  readonly version: HttpVersion
  readonly headers: ReadonlyHeaderMap
  readonly body: Buffer
  /** Decoded fields of an urlencoded body, `null` for other content types */
  readonly form: Readonly<Record<string, string>> | null
  readonly cookies: Readonly<Record<string, string>>
  /** Whether the client allows the connection to be reused */
  readonly keepAlive: boolean
}

export interface RequestInit {
  method?: HttpMethod
  target?: string
  version?: HttpVersion
  headers?: HeaderMap | HeaderInit
  body?: Buffer | string
}

/**
 * Media type of a Content-Type value, lowercased and without parameters
 */
export function mediaType(contentType: string | undefined): string | undefined {
  if (contentType === undefined) {
    return undefined
  }
  const semi = contentType.indexOf(';')
  return (semi === -1 ? contentType : contentType.slice(0, semi)).trim().toLowerCase()
}

function allowsKeepAlive(version: HttpVersion, headers: HeaderMap): boolean {
  const tokens = headers.tokens('connection')
  if (version === 'HTTP/1.0') {
    return tokens.includes('keep-alive')
  }
  return !tokens.includes('close')
}

/**
 * Assemble an immutable Request from its wire parts.
 * Fails with MALFORMED_REQUEST_LINE or MALFORMED_BODY on bad percent-encoding.
 */
export function createRequest(init: RequestInit = {}): Request {
  const method = init.method ?? 'GET'
  const target = init.target ?? '/'
  const version = init.version ?? 'HTTP/1.1'
  const headers = init.headers instanceof HeaderMap ? init.headers : new HeaderMap(init.headers)
  const body = typeof init.body === 'string' ? Buffer.from(init.body) : (init.body ?? Buffer.alloc(0))

  const q = target.indexOf('?')
  const rawPath = q === -1 ? target : target.slice(0, q)
  const rawQuery = q === -1 ? '' : target.slice(q + 1)

  const form =
    mediaType(headers.get('content-type')) === FORM_CONTENT_TYPE
      ? Object.freeze(parseUrlEncoded(body.toString('utf8'), ErrorCode.MALFORMED_BODY))
      : null

  return Object.freeze({
    method,
    target,
    path: decodeComponent(rawPath, ErrorCode.MALFORMED_REQUEST_LINE),
    segments: Object.freeze(splitPathSegments(rawPath)),
    query: Object.freeze(parseUrlEncoded(rawQuery, ErrorCode.MALFORMED_REQUEST_LINE)),
    version,
    headers,
    body,
    form,
    cookies: Object.freeze(parseCookieHeader(headers.get('cookie'))),
    keepAlive: allowsKeepAlive(version, headers),
  })
}
