/**
 * Per-request context
 *
 * Carries the parsed request, the response under construction, the
 * matched path params and a typed extension store. One Context exists
 * per request and is never shared between connections.
 */

import { ErrorCode, WireError } from '@wirehttp/shared/errors'
import type { CookieOptions } from './cookies'
import type { Request } from './request'
import { HttpResponse, type StreamedBody } from './response'

/**
 * Typed key into the context extension store.
 *
 * Values live in a WeakMap held by the key itself, keyed by the owning
 * context, so a lookup is typed by the key that wrote it.
 */
export class ContextKey<T> {
  private readonly slots = new WeakMap<object, { value: T }>()

  constructor(readonly name: string) {}

  /** @internal */
  slot(owner: object): { value: T } | undefined {
    return this.slots.get(owner)
  }

  /** @internal */
  write(owner: object, value: T): void {
    this.slots.set(owner, { value })
  }

  /** @internal */
  remove(owner: object): boolean {
    return this.slots.delete(owner)
  }
}

export function createContextKey<T>(name: string): ContextKey<T> {
  return new ContextKey<T>(name)
}

// Names like "constructor" must not resolve through Object.prototype
function ownField(fields: Readonly<Record<string, string>>, name: string): string | undefined {
  return Object.hasOwn(fields, name) ? fields[name] : undefined
}

export class Context {
  readonly response = new HttpResponse()
  // identity for the extension store
  private readonly store = {}

  constructor(
    readonly request: Request,
    readonly params: Readonly<Record<string, string>> = {}
  ) {}

  get<T>(key: ContextKey<T>): T | undefined {
    return key.slot(this.store)?.value
  }

  set<T>(key: ContextKey<T>, value: T): this {
    key.write(this.store, value)
    return this
  }

  has<T>(key: ContextKey<T>): boolean {
    return key.slot(this.store) !== undefined
  }

  delete<T>(key: ContextKey<T>): boolean {
    return key.remove(this.store)
  }

  /**
   * Like `get`, but a missing key fails with CONTEXT_KEY_MISSING
   */
  require<T>(key: ContextKey<T>): T {
    const slot = key.slot(this.store)
    if (!slot) {
      throw new WireError(`Context key "${key.name}" is not set`, ErrorCode.CONTEXT_KEY_MISSING)
    }
    return slot.value
  }

  param(name: string): string | undefined {
    return ownField(this.params, name)
  }

  query(name: string): string | undefined {
    return ownField(this.request.query, name)
  }

  header(name: string): string | undefined {
    return this.request.headers.get(name)
  }

  cookie(name: string): string | undefined {
    return ownField(this.request.cookies, name)
  }

  /**
   * Field of an urlencoded form body
   */
  formValue(name: string): string | undefined {
    return this.request.form ? ownField(this.request.form, name) : undefined
  }

  send(status: number, body?: string | Uint8Array): this {
    this.response.send(status, body)
    return this
  }

  text(status: number, body: string): this {
    this.response.setHeader('Content-Type', 'text/plain; charset=utf-8')
    return this.send(status, body)
  }

  html(status: number, body: string): this {
    this.response.setHeader('Content-Type', 'text/html; charset=utf-8')
    return this.send(status, body)
  }

  json(status: number, data: unknown): this {
    this.response.setHeader('Content-Type', 'application/json')
    return this.send(status, JSON.stringify(data))
  }

  /**
   * Non-ASCII characters in `location` are percent-encoded as UTF-8
   */
  redirect(location: string, status = 302): this {
    this.response.setHeader('Location', location.replace(/[^\u0000-\u007f]+/g, encodeURI))
    return this.send(status)
  }

  stream(status: number, body: StreamedBody): this {
    this.response.stream(status, body)
    return this
  }

  setCookie(name: string, value: string, options?: CookieOptions): this {
    this.response.setCookie(name, value, options)
    return this
  }
}
