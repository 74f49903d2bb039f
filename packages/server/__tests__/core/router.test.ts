/**
 * Unit tests for Router
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { ErrorCode } from '@wirehttp/shared/errors'
import type { Middleware, RouteHandler } from '../../src/core/middleware'
import { Router, parsePattern, type RouteMatch } from '../../src/core/router'
import { thrown } from '../helpers'

const ok: RouteHandler = ctx => {
  ctx.text(200, 'ok')
}

function expectMatch(result: RouteMatch) {
  if (result.kind !== 'matched') {
    throw new Error(`Expected a match, got ${result.kind}`)
  }
  return result
}

const noop = (): Middleware => async (_ctx, next) => {
  await next()
}

describe('Router', () => {
  let router: Router

  beforeEach(() => {
    router = new Router()
  })

  describe('match', () => {
    it('should match exact literal routes', () => {
      router.get('/hello', ok)

      const result = expectMatch(router.match('GET', ['hello']))
      expect(result.route.pattern).toBe('/hello')
      expect(result.params).toEqual({})
    })

    it('should extract path parameters', () => {
      router.get('/users/:id/posts/:postId', ok)

      const result = expectMatch(router.match('GET', ['users', '42', 'posts', '7']))
      expect(result.params).toEqual({ id: '42', postId: '7' })
    })

    it('should not match paths with a different segment count', () => {
      router.get('/users/:id', ok)

      expect(router.match('GET', ['users']).kind).toBe('not-found')
      expect(router.match('GET', ['users', '1', 'extra']).kind).toBe('not-found')
    })

    it('should let the first registered route win', () => {
      const byId = router.get('/users/:id', ok)
      router.get('/users/all', ok)

      const result = expectMatch(router.match('GET', ['users', 'all']))
      expect(result.route).toBe(byId)
      expect(result.params).toEqual({ id: 'all' })
    })

    it('should reach a literal route registered before a parameter route', () => {
      const all = router.get('/users/all', ok)
      const byId = router.get('/users/:id', ok)

      expect(expectMatch(router.match('GET', ['users', 'all'])).route).toBe(all)
      expect(expectMatch(router.match('GET', ['users', '7'])).route).toBe(byId)
      expect(router.warnings).toEqual([])
    })

    it('should capture the rest of the path in a wildcard', () => {
      router.get('/static/*path', ok)

      expect(expectMatch(router.match('GET', ['static', 'css', 'site.css'])).params).toEqual({
        path: 'css/site.css',
      })
      expect(expectMatch(router.match('GET', ['static'])).params).toEqual({ path: '' })
    })

    it('should name a bare wildcard "*"', () => {
      router.get('/files/*', ok)
      expect(expectMatch(router.match('GET', ['files', 'a', 'b'])).params).toEqual({ '*': 'a/b' })
    })

    it('should return not-found when no pattern matches', () => {
      router.get('/hello', ok)
      expect(router.match('GET', ['nope'])).toEqual({ kind: 'not-found' })
    })

    it('should list allowed methods when only the method differs', () => {
      router.get('/items', ok)
      router.post('/items', ok)

      expect(router.match('DELETE', ['items'])).toEqual({
        kind: 'method-not-allowed',
        allowed: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      })
    })

    it('should answer HEAD with the GET route', () => {
      const page = router.get('/page', ok)
      expect(expectMatch(router.match('HEAD', ['page'])).route).toBe(page)
    })

    it('should prefer an explicit HEAD route over the GET fallback', () => {
      router.get('/page', ok)
      const head = router.head('/page', ok)
      expect(expectMatch(router.match('HEAD', ['page'])).route).toBe(head)
    })

    it('should answer OPTIONS on a known path with the server middleware', () => {
      const mw = noop()
      router.use(mw)
      router.put('/items/:id', ok)

      const result = router.match('OPTIONS', ['items', '3'])
      if (result.kind !== 'options') {
        throw new Error(`Expected options, got ${result.kind}`)
      }
      expect(result.allowed).toEqual(['PUT', 'OPTIONS'])
      expect(result.middleware).toEqual([mw])
    })

    it('should use an explicit OPTIONS route when registered', () => {
      const options = router.options('/items', ok)
      expect(expectMatch(router.match('OPTIONS', ['items'])).route).toBe(options)
    })

    it('should look up a raw target', () => {
      router.get('/files/:name', ok)

      expect(expectMatch(router.lookup('GET', '/files/a%20b?download=1')).params).toEqual({ name: 'a b' })
    })
  })

  describe('registration', () => {
    it('should take route middleware as separate arguments before the handler', () => {
      const first = noop()
      const second = noop()

      const route = router.addRoute('GET', '/x', first, second, ok)
      router.post('/y', first, ok)

      expect(route.middleware).toEqual([first, second])
      expect(route.handler).toBe(ok)
      expect(expectMatch(router.match('GET', ['x'])).middleware).toEqual([first, second])
      expect(expectMatch(router.match('POST', ['y'])).middleware).toEqual([first])
    })

    it('should register a route for every verb', () => {
      router.get('/r', ok)
      router.head('/r', ok)
      router.post('/r', ok)
      router.put('/r', ok)
      router.patch('/r', ok)
      router.delete('/r', ok)
      router.options('/r', ok)
      router.addRoute('GET', '/other', ok)

      expect(router.routes.map(route => `${route.method} ${route.pattern}`)).toEqual([
        'GET /r',
        'HEAD /r',
        'POST /r',
        'PUT /r',
        'PATCH /r',
        'DELETE /r',
        'OPTIONS /r',
        'GET /other',
      ])
    })

    it('should reject a route with the same method and shape', () => {
      router.get('/users/:id', ok)

      const error = thrown(() => router.get('/users/:name', ok))
      expect(error.code).toBe(ErrorCode.ROUTE_CONFLICT)
      expect(error.details).toEqual({ method: 'GET', path: '/users/:name', conflictsWith: '/users/:id' })
    })

    it('should allow the same pattern under another method', () => {
      router.get('/users/:id', ok)
      router.delete('/users/:id', ok)
      expect(router.routes).toHaveLength(2)
    })

    it('should record a warning for a route hidden behind an earlier one', () => {
      router.get('/users/:id', ok)
      router.get('/users/all', ok)
      router.get('/assets/*rest', ok)
      router.get('/assets/logo.png', ok)

      expect(router.warnings).toEqual([
        { method: 'GET', pattern: '/users/all', shadowedBy: '/users/:id' },
        { method: 'GET', pattern: '/assets/logo.png', shadowedBy: '/assets/*rest' },
      ])
    })

    it.each([
      ['a missing leading slash', 'users'],
      ['a wildcard before the end', '/a/*rest/b'],
      ['an invalid parameter name', '/:1bad'],
      ['a parameter named __proto__', '/users/:__proto__'],
      ['an empty parameter name', '/users/:'],
      ['a duplicate parameter', '/:id/x/:id'],
      ['invalid percent-encoding', '/a%zz'],
    ])('should reject %s with INVALID_ROUTE_PATTERN', (_, pattern) => {
      expect(thrown(() => router.get(pattern, ok)).code).toBe(ErrorCode.INVALID_ROUTE_PATTERN)
    })
  })

  describe('groups', () => {
    it('should prefix group routes and order middleware outermost first', () => {
      const server = noop()
      const api = noop()
      const v1 = noop()
      const route = noop()
      router.use(server)
      const apiGroup = router.group('/api', api)
      apiGroup.group('/v1', v1).get('/users/:id', route, ok)

      const result = expectMatch(router.match('GET', ['api', 'v1', 'users', '5']))
      expect(result.route.pattern).toBe('/api/v1/users/:id')
      expect(result.params).toEqual({ id: '5' })
      expect(result.middleware.map(mw => [server, api, v1, route].indexOf(mw))).toEqual([0, 1, 2, 3])
    })

    it('should apply scope middleware added after a route was registered', () => {
      const late = noop()
      const group = router.group('/admin')
      group.get('/stats', ok)
      group.use(late)

      expect(expectMatch(router.match('GET', ['admin', 'stats'])).middleware).toEqual([late])
    })

    it('should not leak group middleware to sibling routes', () => {
      router.group('/private', noop()).get('/data', ok)
      router.get('/public', ok)

      expect(expectMatch(router.match('GET', ['public'])).middleware).toEqual([])
    })
  })

  describe('freeze', () => {
    it('should refuse changes once frozen', () => {
      router.get('/a', ok)
      router.freeze()

      expect(router.isFrozen).toBe(true)
      expect(thrown(() => router.get('/b', ok)).code).toBe(ErrorCode.ROUTER_FROZEN)
      expect(thrown(() => router.use(noop())).code).toBe(ErrorCode.ROUTER_FROZEN)
      expect(thrown(() => router.group('/g')).code).toBe(ErrorCode.ROUTER_FROZEN)
    })

    it('should keep matching after freezing', () => {
      const mw = noop()
      router.use(mw)
      router.get('/a', ok)
      router.freeze()

      expect(expectMatch(router.match('GET', ['a'])).middleware).toEqual([mw])
    })
  })
})

describe('parsePattern', () => {
  it('should decode literal segments', () => {
    expect(parsePattern('/files/a%20b/:name/*rest')).toEqual([
      { kind: 'literal', value: 'files' },
      { kind: 'literal', value: 'a b' },
      { kind: 'param', name: 'name' },
      { kind: 'wildcard', name: 'rest' },
    ])
  })

  it('should parse the root pattern to no segments', () => {
    expect(parsePattern('/')).toEqual([])
  })
})
