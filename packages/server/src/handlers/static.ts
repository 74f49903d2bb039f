/**
 * Static File Handler
 * Streams files below a root directory
 */

import { open, realpath, type FileHandle } from 'node:fs/promises'
import { resolve } from 'node:path'
import { ErrorCode, WireError, isWireError } from '@wirehttp/shared/errors'
import type { RouteHandler } from '../core/middleware'
import type { StreamedBody } from '../core/response'
import { getContentType, isWithinRoot, resolveWithinRoot } from '../utils/path-validator'

export interface StaticHandlerOptions {
  /** Directory files are served from */
  root: string
  /** Route param holding the requested path */
  param?: string
  chunkSize?: number
}

export const DEFAULT_CHUNK_SIZE = 64 * 1024

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'ELOOP', 'ENAMETOOLONG'])

type FileOperation = 'resolve' | 'open' | 'stat' | 'read'

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

function fileError(error: unknown, path: string, operation: FileOperation): WireError {
  if (isWireError(error)) {
    return error
  }
  const code = errnoCode(error)
  const reason = error instanceof Error ? error.message : String(error)

  if (code !== undefined && NOT_FOUND_CODES.has(code)) {
    return new WireError(`File not found: ${path}`, ErrorCode.FILE_NOT_FOUND, {
      details: { path, operation, reason: code },
      cause: error,
    })
  }
  return new WireError(`Cannot read ${path}: ${reason}`, ErrorCode.FILE_UNREADABLE, {
    details: { path, operation, reason: code ?? reason },
    cause: error,
  })
}

/**
 * Wrap an open file as a streamed body. The handle is closed once, by
 * whoever calls `close` first.
 */
export function fileBody(handle: FileHandle, size: number, path: string, chunkSize = DEFAULT_CHUNK_SIZE): StreamedBody {
  let closed = false

  async function* chunks(): AsyncGenerator<Buffer> {
    let position = 0
    while (position < size) {
      const buffer = Buffer.alloc(Math.min(chunkSize, size - position))
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, position).catch((error: unknown) => {
        throw fileError(error, path, 'read')
      })
      if (bytesRead === 0) {
        return
      }
      position += bytesRead
      yield bytesRead === buffer.length ? buffer : buffer.subarray(0, bytesRead)
    }
  }

  return {
    length: size,
    chunks: chunks(),
    async close() {
      if (closed) {
        return
      }
      closed = true
      await handle.close()
    },
  }
}

/**
 * Open `requested` below `root` for streaming.
 *
 * Symlinks are resolved before the containment check, so a link that
 * points outside the root is forbidden too.
 */
export async function openStaticFile(root: string, requested: string, chunkSize?: number): Promise<StreamedBody> {
  const target = resolveWithinRoot(requested, root)

  const [realRoot, realTarget] = await Promise.all([realpath(root), realpath(target)]).catch((error: unknown) => {
    throw fileError(error, requested, 'resolve')
  })
  if (!isWithinRoot(realTarget, realRoot)) {
    throw new WireError(`Access to "${requested}" is forbidden`, ErrorCode.FORBIDDEN_PATH, {
      details: { path: requested, operation: 'resolve', reason: 'symlink outside of root' },
    })
  }

  const handle = await open(realTarget, 'r').catch((error: unknown) => {
    throw fileError(error, requested, 'open')
  })

  try {
    const stats = await handle.stat()
    if (!stats.isFile()) {
      throw new WireError(`Not a regular file: ${requested}`, ErrorCode.FILE_NOT_FOUND, {
        details: { path: requested, operation: 'stat', reason: 'not a regular file' },
      })
    }
    return fileBody(handle, stats.size, requested, chunkSize)
  } catch (error) {
    await handle.close()
    throw fileError(error, requested, 'stat')
  }
}

/**
 * Handler for routes such as `GET /static/*path`
 */
export function createStaticHandler(options: StaticHandlerOptions): RouteHandler {
  const root = resolve(options.root)
  const param = options.param ?? 'path'

  return async ctx => {
    const requested = ctx.param(param) ?? ''
    const body = await openStaticFile(root, requested, options.chunkSize)
    ctx.response.setHeader('Content-Type', getContentType(requested))
    ctx.stream(200, body)
  }
}
