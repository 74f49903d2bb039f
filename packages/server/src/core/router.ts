/**
 * HTTP Router with Pattern Matching
 *
 * Supports literal segments, path parameters (e.g. /users/:id) and a
 * trailing wildcard (e.g. /static/*path). Routes are tried in
 * registration order and the first match wins. The table is frozen
 * before the server accepts connections and shared read-only after.
 */

import { ErrorCode, WireError } from '@wirehttp/shared/errors'
import { decodeComponent, splitPathSegments } from '../utils/url-encoding'
import type { Middleware, RouteHandler } from './middleware'
import { HTTP_METHODS, type HttpMethod } from './request'

export type Segment =
  | { kind: 'literal'; value: string }
  | { kind: 'param'; name: string }
  | { kind: 'wildcard'; name: string }

export interface RouteScope {
  readonly prefix: readonly Segment[]
  readonly middleware: Middleware[]
  readonly parent?: RouteScope
}

export interface Route {
  readonly method: HttpMethod
  /** Full pattern, group prefix included */
  readonly pattern: string
  readonly segments: readonly Segment[]
  readonly middleware: readonly Middleware[]
  readonly handler: RouteHandler
  readonly scope: RouteScope
}

export interface RouteWarning {
  method: HttpMethod
  pattern: string
  shadowedBy: string
}

export type RouteMatch =
  | {
      kind: 'matched'
      route: Route
      params: Record<string, string>
      /** Full chain: server, groups outermost-first, then route middleware */
      middleware: readonly Middleware[]
    }
  | { kind: 'options'; allowed: HttpMethod[]; middleware: readonly Middleware[] }
  | { kind: 'method-not-allowed'; allowed: HttpMethod[] }
  | { kind: 'not-found' }

/**
 * Route middleware, in order, followed by the handler
 */
export type RouteArgs = [...middleware: Middleware[], handler: RouteHandler]

const PARAM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/

function invalidPattern(pattern: string, reason: string): WireError {
  return new WireError(`Invalid route pattern "${pattern}": ${reason}`, ErrorCode.INVALID_ROUTE_PATTERN, {
    details: { method: '*', path: pattern },
  })
}

/**
 * Parse a route pattern into segments
 */
export function parsePattern(pattern: string): Segment[] {
  if (!pattern.startsWith('/')) {
    throw invalidPattern(pattern, 'must start with "/"')
  }

  const raw = pattern.split('/').filter(part => part.length > 0)
  const names = new Set<string>()
  const segments: Segment[] = []

  for (const [index, part] of raw.entries()) {
    if (part.startsWith(':') || part.startsWith('*')) {
      const wildcard = part.startsWith('*')
      const name = wildcard && part.length === 1 ? '*' : part.slice(1)

      if ((name !== '*' && !PARAM_NAME.test(name)) || name === '__proto__') {
        throw invalidPattern(pattern, `invalid parameter name "${name}"`)
      }
      if (names.has(name)) {
        throw invalidPattern(pattern, `duplicate parameter "${name}"`)
      }
      if (wildcard && index !== raw.length - 1) {
        throw invalidPattern(pattern, 'a wildcard must be the last segment')
      }
      names.add(name)
      segments.push(wildcard ? { kind: 'wildcard', name } : { kind: 'param', name })
    } else {
      segments.push({ kind: 'literal', value: decodeComponent(part, ErrorCode.INVALID_ROUTE_PATTERN) })
    }
  }

  return segments
}

export function formatPattern(segments: readonly Segment[]): string {
  const parts = segments.map(segment => {
    switch (segment.kind) {
      case 'literal':
        return segment.value
      case 'param':
        return `:${segment.name}`
      case 'wildcard':
        return segment.name === '*' ? '*' : `*${segment.name}`
    }
  })
  return `/${parts.join('/')}`
}

/**
 * Match decoded path segments against a pattern
 * @returns Extracted params, or null if no match
 */
export function matchSegments(
  pattern: readonly Segment[],
  segments: readonly string[]
): Record<string, string> | null {
  const params: Record<string, string> = {}

  for (const [index, segment] of pattern.entries()) {
    if (segment.kind === 'wildcard') {
      params[segment.name] = segments.slice(index).join('/')
      return params
    }

    const value = segments[index]
    if (value === undefined) {
      return null
    }
    if (segment.kind === 'param') {
      params[segment.name] = value
    } else if (segment.value !== value) {
      return null
    }
  }

  return segments.length === pattern.length ? params : null
}

/**
 * Identical shape: same literals, params and wildcards at the same
 * positions, whatever the parameter names
 */
function sameShape(a: readonly Segment[], b: readonly Segment[]): boolean {
  return (
    a.length === b.length &&
    a.every((segment, index) => {
      const other = b[index]
      if (!other || other.kind !== segment.kind) {
        return false
      }
      return segment.kind !== 'literal' || (other.kind === 'literal' && other.value === segment.value)
    })
  )
}

/**
 * Whether every path `b` matches is also matched by `a`
 */
function covers(a: readonly Segment[], b: readonly Segment[]): boolean {
  for (const [index, segment] of a.entries()) {
    if (segment.kind === 'wildcard') {
      return true
    }
    const other = b[index]
    if (!other || other.kind === 'wildcard') {
      return false
    }
    if (segment.kind === 'literal' && (other.kind !== 'literal' || other.value !== segment.value)) {
      return false
    }
  }
  return a.length === b.length
}

function isFunction(value: unknown): value is RouteHandler {
  return typeof value === 'function'
}

function splitArgs(args: RouteArgs): [readonly Middleware[], RouteHandler] {
  const handler = args[args.length - 1]
  const middleware: Middleware[] = args.slice(0, -1)
  if (!isFunction(handler) || middleware.some(entry => typeof entry !== 'function')) {
    throw new WireError('A route takes middleware functions followed by a handler', ErrorCode.INTERNAL_ERROR)
  }
  return [middleware, handler]
}

/**
 * Registration surface shared by the router and its groups
 */
abstract class RouteRegistrar {
  protected abstract readonly scope: RouteScope
  protected abstract readonly router: Router

  addRoute(method: HttpMethod, pattern: string, ...args: RouteArgs): Route {
    return this.router.register(this.scope, method, pattern, ...splitArgs(args))
  }

  get(pattern: string, ...args: RouteArgs): Route {
    return this.router.register(this.scope, 'GET', pattern, ...splitArgs(args))
  }

  head(pattern: string, ...args: RouteArgs): Route {
    return this.router.register(this.scope, 'HEAD', pattern, ...splitArgs(args))
  }

  post(pattern: string, ...args: RouteArgs): Route {
    return this.router.register(this.scope, 'POST', pattern, ...splitArgs(args))
  }

  put(pattern: string, ...args: RouteArgs): Route {
    return this.router.register(this.scope, 'PUT', pattern, ...splitArgs(args))
  }

  patch(pattern: string, ...args: RouteArgs): Route {
    return this.router.register(this.scope, 'PATCH', pattern, ...splitArgs(args))
  }

  delete(pattern: string, ...args: RouteArgs): Route {
    return this.router.register(this.scope, 'DELETE', pattern, ...splitArgs(args))
  }

  options(pattern: string, ...args: RouteArgs): Route {
    return this.router.register(this.scope, 'OPTIONS', pattern, ...splitArgs(args))
  }

  /**
   * Middleware for every route in this scope, including routes
   * registered before this call
   */
  use(...middleware: Middleware[]): this {
    this.router.assertMutable()
    this.scope.middleware.push(...middleware)
    return this
  }

  /**
   * Nested scope whose routes get `prefix` and `middleware`
   */
  group(prefix: string, ...middleware: Middleware[]): RouteGroup {
    this.router.assertMutable()
    const scope: RouteScope = {
      prefix: [...this.scope.prefix, ...parsePattern(prefix)],
      middleware: [...middleware],
      parent: this.scope,
    }
    return new RouteGroup(this.router, scope)
  }
}

export class RouteGroup extends RouteRegistrar {
  constructor(
    protected override readonly router: Router,
    protected override readonly scope: RouteScope
  ) {
    super()
  }
}

export class Router extends RouteRegistrar {
  protected override readonly scope: RouteScope = { prefix: [], middleware: [] }
  protected override readonly router: Router = this
  private table: Route[] = []
  private chains = new Map<Route, readonly Middleware[]>()
  private _warnings: RouteWarning[] = []
  private frozen = false

  get routes(): readonly Route[] {
    return this.table
  }

  /**
   * Routes accepted but unreachable behind an earlier route
   */
  get warnings(): readonly RouteWarning[] {
    return this._warnings
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  /**
   * Register a route in `scope`
   * @internal use addRoute or a verb method
   */
  register(
    scope: RouteScope,
    method: HttpMethod,
    pattern: string,
    middleware: readonly Middleware[],
    handler: RouteHandler
  ): Route {
    this.assertMutable()

    const segments = [...scope.prefix, ...parsePattern(pattern)]
    const fullPattern = formatPattern(segments)

    const sameMethod = this.table.filter(existing => existing.method === method)
    const conflict = sameMethod.find(existing => sameShape(existing.segments, segments))
    if (conflict) {
      throw new WireError(`${method} ${fullPattern} conflicts with ${conflict.pattern}`, ErrorCode.ROUTE_CONFLICT, {
        details: { method, path: fullPattern, conflictsWith: conflict.pattern },
      })
    }
    const shadow = sameMethod.find(existing => covers(existing.segments, segments))
    if (shadow) {
      this._warnings.push({ method, pattern: fullPattern, shadowedBy: shadow.pattern })
    }

    const route: Route = {
      method,
      pattern: fullPattern,
      segments,
      middleware: [...middleware],
      handler,
      scope,
    }
    this.table.push(route)
    return route
  }

  /**
   * Seal the table; later registration fails with ROUTER_FROZEN
   */
  freeze(): this {
    if (!this.frozen) {
      this.frozen = true
      this.chains = new Map(this.table.map(route => [route, this.chainFor(route)]))
    }
    return this
  }

  assertMutable(): void {
    if (this.frozen) {
      throw new WireError('Routes cannot be changed once the server is listening', ErrorCode.ROUTER_FROZEN)
    }
  }

  /**
   * Match a request against the table
   * @param segments - Decoded path segments
   */
  match(method: HttpMethod, segments: readonly string[]): RouteMatch {
    let fallback: { route: Route; params: Record<string, string> } | undefined
    const allowed = new Set<HttpMethod>()

    for (const route of this.table) {
      const params = matchSegments(route.segments, segments)
      if (!params) {
        continue
      }
      if (route.method === method) {
        return this.matched(route, params)
      }
      if (method === 'HEAD' && route.method === 'GET' && !fallback) {
        fallback = { route, params }
      }
      allowed.add(route.method)
    }

    if (fallback) {
      return this.matched(fallback.route, fallback.params)
    }
    if (allowed.size === 0) {
      return { kind: 'not-found' }
    }

    if (allowed.has('GET')) {
      allowed.add('HEAD')
    }
    allowed.add('OPTIONS')
    const methods = HTTP_METHODS.filter(candidate => allowed.has(candidate))

    if (method === 'OPTIONS') {
      return { kind: 'options', allowed: methods, middleware: [...this.scope.middleware] }
    }
    return { kind: 'method-not-allowed', allowed: methods }
  }

  /**
   * Match by request target, e.g. `/users/42?full=1`
   */
  lookup(method: HttpMethod, target: string): RouteMatch {
    const q = target.indexOf('?')
    return this.match(method, splitPathSegments(q === -1 ? target : target.slice(0, q)))
  }

  private matched(route: Route, params: Record<string, string>): RouteMatch {
    return {
      kind: 'matched',
      route,
      params,
      middleware: this.chains.get(route) ?? this.chainFor(route),
    }
  }

  private chainFor(route: Route): Middleware[] {
    const scopes: RouteScope[] = []
    for (let scope: RouteScope | undefined = route.scope; scope; scope = scope.parent) {
      scopes.unshift(scope)
    }
    return [...scopes.flatMap(scope => scope.middleware), ...route.middleware]
  }
}
