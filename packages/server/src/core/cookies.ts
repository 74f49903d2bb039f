/**
 * Cookie header parsing and Set-Cookie serialization
 */

import { ErrorCode, WireError } from '@wirehttp/shared/errors'

export interface CookieOptions {
  path?: string
  domain?: string
  expires?: Date
  maxAge?: number
  secure?: boolean
  httpOnly?: boolean
  sameSite?: 'Strict' | 'Lax' | 'None'
}

const COOKIE_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/
const COOKIE_VALUE = /^[\x21\x23-\x2B\x2D-\x3A\x3C-\x5B\x5D-\x7E]*$/
const ATTRIBUTE_VALUE = /^[^\x00-\x1F\x7F;]*$/

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value)
  } catch {
    return value
  }
}

/**
 * Parse a `Cookie` request header. The first occurrence of a name wins;
 * pairs without `=` are skipped and quoted values are unwrapped.
 */
export function parseCookieHeader(header: string | undefined): Record<string, string> {
  const cookies = new Map<string, string>()
  if (!header) {
    return {}
  }

  for (const part of header.split(';')) {
    const eq = part.indexOf('=')
    if (eq === -1) {
      continue
    }
    const name = part.slice(0, eq).trim()
    let value = part.slice(eq + 1).trim()
    if (name.length === 0 || cookies.has(name)) {
      continue
    }
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1)
    }
    cookies.set(name, safeDecode(value))
  }

  return Object.fromEntries(cookies)
}

export function serializeCookie(name: string, value: string, options: CookieOptions = {}): string {
  if (!COOKIE_NAME.test(name)) {
    throw new WireError(`Invalid cookie name "${name}"`, ErrorCode.INTERNAL_ERROR)
  }
  const encoded = COOKIE_VALUE.test(value) ? value : encodeURIComponent(value)

  const parts = [`${name}=${encoded}`]
  if (options.path !== undefined) {
    parts.push(`Path=${checkAttribute('Path', options.path)}`)
  }
  if (options.domain !== undefined) {
    parts.push(`Domain=${checkAttribute('Domain', options.domain)}`)
  }
  if (options.expires) {
    parts.push(`Expires=${options.expires.toUTCString()}`)
  }
  if (options.maxAge !== undefined) {
    parts.push(`Max-Age=${Math.trunc(options.maxAge)}`)
  }
  if (options.secure) {
    parts.push('Secure')
  }
  if (options.httpOnly) {
    parts.push('HttpOnly')
  }
  if (options.sameSite) {
    parts.push(`SameSite=${options.sameSite}`)
  }
  return parts.join('; ')
}

function checkAttribute(attribute: string, value: string): string {
  if (!ATTRIBUTE_VALUE.test(value)) {
    throw new WireError(`Invalid cookie ${attribute} "${value}"`, ErrorCode.INTERNAL_ERROR)
  }
  return value
}
