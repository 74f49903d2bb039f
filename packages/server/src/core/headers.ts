/**
 * Case-insensitive header map
 *
 * Lookups ignore case; iteration yields the casing of the first field line
 * (or the last `set`) so responses serialize the names handlers wrote.
 */

import { ErrorCode, WireError } from '@wirehttp/shared/errors'

export interface ReadonlyHeaderMap extends Iterable<[string, string]> {
  get(name: string): string | undefined
  has(name: string): boolean
  readonly size: number
  toObject(): Record<string, string>
}

export type HeaderInit = Record<string, string> | Iterable<readonly [string, string]>

interface HeaderEntry {
  name: string
  value: string
}

function isPairIterable(init: HeaderInit): init is Iterable<readonly [string, string]> {
  return Symbol.iterator in init
}

const CRLF_PATTERN = /[\r\n]/
// the head goes out as latin1, one byte per character
const NON_LATIN1_PATTERN = /[^\u0000-\u00ff]/

function assertSafe(name: string, value: string): void {
  if (name.length === 0 || CRLF_PATTERN.test(name) || CRLF_PATTERN.test(value)) {
    throw new WireError(`Invalid header field "${name}"`, ErrorCode.INTERNAL_ERROR)
  }
  if (NON_LATIN1_PATTERN.test(name) || NON_LATIN1_PATTERN.test(value)) {
    throw new WireError(`Invalid header field "${name}": characters above U+00FF`, ErrorCode.INTERNAL_ERROR)
  }
}

export class HeaderMap implements ReadonlyHeaderMap {
  private entries = new Map<string, HeaderEntry>()

  constructor(init?: HeaderInit) {
    if (!init) {
      return
    }
    const pairs = isPairIterable(init) ? init : Object.entries(init)
    for (const [name, value] of pairs) {
      this.append(name, value)
    }
  }

  get(name: string): string | undefined {
    return this.entries.get(name.toLowerCase())?.value
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase())
  }

  /**
   * Replace any existing value
   */
  set(name: string, value: string): this {
    assertSafe(name, value)
    this.entries.set(name.toLowerCase(), { name, value })
    return this
  }

  /**
   * Combine with an existing value, in order
   */
  append(name: string, value: string, separator = ', '): this {
    assertSafe(name, value)
    const key = name.toLowerCase()
    const existing = this.entries.get(key)
    if (existing) {
      existing.value = `${existing.value}${separator}${value}`
    } else {
      this.entries.set(key, { name, value })
    }
    return this
  }

  delete(name: string): boolean {
    return this.entries.delete(name.toLowerCase())
  }

  clear(): void {
    this.entries.clear()
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * Comma-separated tokens of a list header, lowercased
   */
  tokens(name: string): string[] {
    const value = this.get(name)
    if (value === undefined) {
      return []
    }
    return value
      .split(',')
      .map(token => token.trim().toLowerCase())
      .filter(token => token.length > 0)
  }

  /**
   * Plain object keyed by lowercase name
   */
  toObject(): Record<string, string> {
    const result: Record<string, string> = {}
    for (const [key, entry] of this.entries) {
      result[key] = entry.value
    }
    return result
  }

  *[Symbol.iterator](): IterableIterator<[string, string]> {
    for (const entry of this.entries.values()) {
      yield [entry.name, entry.value]
    }
  }
}
