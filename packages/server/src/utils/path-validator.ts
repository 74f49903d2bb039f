/**
 * Path Validation Utilities
 */

import { isAbsolute, relative, resolve, sep } from 'node:path'
import { lookup } from 'mime-types'
import { ErrorCode, WireError } from '@wirehttp/shared/errors'

function forbidden(path: string, reason: string): WireError {
  return new WireError(`Access to "${path}" is forbidden`, ErrorCode.FORBIDDEN_PATH, {
    details: { path, operation: 'resolve', reason },
  })
}

/**
 * Whether `target` is `root` itself or somewhere below it
 */
export function isWithinRoot(target: string, root: string): boolean {
  const relativePath = relative(root, target)
  return !(relativePath === '..' || relativePath.startsWith('..' + sep) || isAbsolute(relativePath))
}

/**
 * Resolve a user-provided path against `root`
 * - Strips leading slashes to treat it as a relative path
 * - Rejects NUL bytes and any `..` segment outright
 * - Ensures the resolved path stays within root
 */
export function resolveWithinRoot(path: string, root: string): string {
  if (path.includes('\0')) {
    throw forbidden(path, 'NUL byte in path')
  }

  const cleanPath = path.replace(/^[/\\]+/, '')
  if (cleanPath.split(/[/\\]+/).includes('..')) {
    throw forbidden(path, 'parent directory segment')
  }

  const normalizedBase = resolve(root)
  const normalizedPath = resolve(normalizedBase, cleanPath)

  if (!isWithinRoot(normalizedPath, normalizedBase)) {
    throw forbidden(path, 'outside of root')
  }
  return normalizedPath
}

export function getContentType(filePath: string): string {
  const mimeType = lookup(filePath)
  return mimeType || 'application/octet-stream'
}
