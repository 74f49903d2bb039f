/**
 * Percent-decoding for request targets and urlencoded bodies
 */

import { ErrorCode, WireError } from '@wirehttp/shared/errors'

export function decodeComponent(value: string, code: ErrorCode): string {
  try {
    return decodeURIComponent(value)
  } catch (error) {
    throw new WireError(`Invalid percent-encoding in "${value}"`, code, { cause: error })
  }
}

/**
 * Split a raw path into decoded, non-empty segments.
 * `/a//b/` and `/a/b` yield the same segments.
 */
export function splitPathSegments(rawPath: string): string[] {
  return rawPath
    .split('/')
    .filter(segment => segment.length > 0)
    .map(segment => decodeComponent(segment, ErrorCode.MALFORMED_REQUEST_LINE))
}

/**
 * Parse `a=1&b=2` pairs. `+` decodes to a space, a key without `=` maps to
 * the empty string, and the last occurrence of a key wins.
 */
export function parseUrlEncoded(input: string, code: ErrorCode): Record<string, string> {
  const fields = new Map<string, string>()

  for (const pair of input.split('&')) {
    if (pair.length === 0) {
      continue
    }
    const eq = pair.indexOf('=')
    const rawKey = eq === -1 ? pair : pair.slice(0, eq)
    const rawValue = eq === -1 ? '' : pair.slice(eq + 1)
    const key = decodeComponent(rawKey.replace(/\+/g, ' '), code)
    if (key.length === 0) {
      continue
    }
    fields.set(key, decodeComponent(rawValue.replace(/\+/g, ' '), code))
  }

  return Object.fromEntries(fields)
}
