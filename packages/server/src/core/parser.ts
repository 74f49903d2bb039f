/**
 * HTTP/1.1 request parser
 *
 * Reads one request off a ByteStreamReader: request line, header
 * section, then a Content-Length delimited body.
 */

import { ErrorCode, WireError } from '@wirehttp/shared/errors'
import type { ByteStreamReader } from './byte-reader'
import { HeaderMap } from './headers'
import { createRequest, isHttpMethod, type HttpMethod, type HttpVersion, type Request } from './request'

export interface ParserLimits {
  /** Request line plus header section, CRLFs included */
  maxHeaderBytes: number
  maxBodyBytes: number
}

export const DEFAULT_PARSER_LIMITS: ParserLimits = {
  maxHeaderBytes: 8 * 1024,
  maxBodyBytes: 1024 * 1024,
}

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/
const TARGET = /^\/[\x21-\x7E]*$/
const VERSION = /^HTTP\/(\d)\.(\d)$/
const HEADER_LINE = /^([^:]*):(.*)$/
const FIELD_VALUE = /^[\t\x20-\x7E\x80-\xFF]*$/
const DIGITS = /^\d+$/

/**
 * Headers that may not be repeated
 */
const SINGLETON_HEADERS = new Set(['host'])

interface RequestLine {
  method: HttpMethod
  target: string
  version: HttpVersion
}

function malformedLine(line: string, reason: string): WireError {
  return new WireError(`Malformed request line: ${reason}`, ErrorCode.MALFORMED_REQUEST_LINE, {
    details: { stage: 'request-line', line: line.slice(0, 200) },
  })
}

export function parseRequestLine(line: string): RequestLine {
  const parts = line.split(' ')
  if (parts.length !== 3) {
    throw malformedLine(line, 'expected METHOD SP TARGET SP VERSION')
  }
  const [method = '', target = '', version = ''] = parts

  if (!TOKEN.test(method) || !isHttpMethod(method)) {
    throw malformedLine(line, `unrecognized method "${method}"`)
  }
  if (!TARGET.test(target)) {
    throw malformedLine(line, `invalid request target "${target}"`)
  }

  const match = VERSION.exec(version)
  if (!match) {
    throw malformedLine(line, `invalid version "${version}"`)
  }
  if (version !== 'HTTP/1.1' && version !== 'HTTP/1.0') {
    throw new WireError(`${version} is not supported`, ErrorCode.VERSION_NOT_SUPPORTED, {
      details: { stage: 'request-line', line },
    })
  }

  return { method, target, version }
}

/**
 * Add one `Name: Value` field line to `headers`.
 *
 * Repeated fields are joined in order with ", " (Cookie with "; ").
 * Repeated Content-Length fields must agree, and Host may not repeat.
 */
export function parseHeaderLine(line: string, headers: HeaderMap): void {
  const match = HEADER_LINE.exec(line)
  const name = match?.[1] ?? ''
  const rawValue = match?.[2] ?? ''

  if (!match || !TOKEN.test(name) || !FIELD_VALUE.test(rawValue)) {
    throw new WireError('Malformed header field', ErrorCode.MALFORMED_HEADER, {
      details: { stage: 'header', line: line.slice(0, 200) },
    })
  }

  const value = rawValue.replace(/^[ \t]+|[ \t]+$/g, '')
  const key = name.toLowerCase()
  const existing = headers.get(key)

  if (existing === undefined) {
    headers.set(name, value)
    return
  }

  if (key === 'content-length') {
    if (existing !== value) {
      throw new WireError('Conflicting Content-Length fields', ErrorCode.INVALID_CONTENT_LENGTH, {
        details: { stage: 'header', line },
      })
    }
    return
  }
  if (SINGLETON_HEADERS.has(key)) {
    throw new WireError(`Repeated ${name} field`, ErrorCode.MALFORMED_HEADER, {
      details: { stage: 'header', line },
    })
  }

  headers.append(name, value, key === 'cookie' ? '; ' : ', ')
}

function headerBudgetExceeded(limit: number): WireError {
  return new WireError(`Header section exceeds ${limit} bytes`, ErrorCode.HEADERS_TOO_LARGE, {
    details: { stage: 'header', limit },
  })
}

function bodyLength(headers: HeaderMap, limits: ParserLimits): number {
  if (headers.has('transfer-encoding')) {
    throw new WireError(
      `Transfer-Encoding "${headers.get('transfer-encoding')}" is not supported`,
      ErrorCode.UNSUPPORTED_ENCODING,
      { details: { stage: 'body' } }
    )
  }

  const contentLength = headers.get('content-length')
  if (contentLength === undefined) {
    return 0
  }
  if (!DIGITS.test(contentLength)) {
    throw new WireError(`Invalid Content-Length "${contentLength}"`, ErrorCode.INVALID_CONTENT_LENGTH, {
      details: { stage: 'header', line: `Content-Length: ${contentLength}` },
    })
  }

  const length = Number(contentLength)
  if (length > limits.maxBodyBytes) {
    throw new WireError(
      `Body of ${length} bytes exceeds the ${limits.maxBodyBytes} byte limit`,
      ErrorCode.PAYLOAD_TOO_LARGE,
      { details: { stage: 'body', expected: length, limit: limits.maxBodyBytes } }
    )
  }
  return length
}

/**
 * Read the next request from the connection.
 *
 * Resolves `null` when the client closes the connection cleanly between
 * requests. Every other failure rejects with a WireError whose code is
 * one of the parse error codes.
 */
export async function parseRequest(
  reader: ByteStreamReader,
  limits: ParserLimits = DEFAULT_PARSER_LIMITS
): Promise<Request | null> {
  let budget = limits.maxHeaderBytes

  const consume = (line: string): void => {
    budget -= line.length + 2
    if (budget < 0) {
      throw headerBudgetExceeded(limits.maxHeaderBytes)
    }
  }

  // tolerate stray CRLFs left between pipelined requests
  let line = await reader.readLine(budget)
  while (line === '') {
    consume(line)
    line = await reader.readLine(budget)
  }
  if (line === null) {
    return null
  }
  consume(line)

  const { method, target, version } = parseRequestLine(line)

  const headers = new HeaderMap()
  for (;;) {
    const headerLine = await reader.readLine(budget)
    if (headerLine === null) {
      throw new WireError('Connection closed before the end of the header section', ErrorCode.INCOMPLETE_REQUEST, {
        details: { stage: 'header' },
      })
    }
    consume(headerLine)
    if (headerLine === '') {
      break
    }
    parseHeaderLine(headerLine, headers)
  }

  const length = bodyLength(headers, limits)
  const body = length > 0 ? await reader.readExact(length) : Buffer.alloc(0)

  return createRequest({ method, target, version, headers, body })
}
