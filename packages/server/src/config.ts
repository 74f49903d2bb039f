/**
 * Server configuration from environment variables
 */

import { z } from 'zod'
import { ErrorCode, WireError } from '@wirehttp/shared/errors'
import { LogLevel } from '@wirehttp/shared/logger'
import type { ServerOptions } from './server'

// unset and empty variables both take the default
function blankAsUndefined<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema)
}

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'], {
    errorMap: () => ({ message: 'Expected true or false' }),
  })
  .transform(value => value === 'true' || value === '1' || value === 'yes')

export const ServerEnvSchema = z.object({
  HOST: blankAsUndefined(z.string().default('0.0.0.0')),
  PORT: blankAsUndefined(z.coerce.number().int().min(0).max(65535).default(8080)),
  STATIC_ROOT: blankAsUndefined(z.string().optional()),
  STATIC_PREFIX: blankAsUndefined(z.string().startsWith('/', 'Must start with "/"').default('/static')),
  ENABLE_CORS: blankAsUndefined(BooleanFlagSchema.default('false')),
  KEEP_ALIVE: blankAsUndefined(BooleanFlagSchema.default('true')),
  IDLE_TIMEOUT_MS: blankAsUndefined(z.coerce.number().int().positive().default(5000)),
  MAX_HEADER_BYTES: blankAsUndefined(z.coerce.number().int().min(256).default(8192)),
  MAX_BODY_BYTES: blankAsUndefined(z.coerce.number().int().nonnegative().default(1048576)),
  MAX_CONNECTIONS: blankAsUndefined(z.coerce.number().int().positive().optional()),
  LOG_LEVEL: blankAsUndefined(z.nativeEnum(LogLevel).default(LogLevel.INFO)),
  LOG_JSON: blankAsUndefined(BooleanFlagSchema.default('false')),
})

export interface ServerConfig {
  host: string
  port: number
  staticRoot?: string
  staticPrefix: string
  enableCors: boolean
  keepAlive: boolean
  idleTimeoutMs: number
  maxHeaderBytes: number
  maxBodyBytes: number
  maxConnections?: number
  logLevel: LogLevel
  logJson: boolean
}

/**
 * Validate environment variables into a ServerConfig.
 * Fails with INVALID_CONFIG listing every offending variable.
 */
export function loadServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const result = ServerEnvSchema.safeParse(env)

  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
    }))
    throw new WireError(
      `Invalid configuration: ${issues.map(issue => `${issue.field}: ${issue.message}`).join('; ')}`,
      ErrorCode.INVALID_CONFIG,
      { details: { issues } }
    )
  }

  const data = result.data
  return {
    host: data.HOST,
    port: data.PORT,
    staticRoot: data.STATIC_ROOT,
    staticPrefix: data.STATIC_PREFIX,
    enableCors: data.ENABLE_CORS,
    keepAlive: data.KEEP_ALIVE,
    idleTimeoutMs: data.IDLE_TIMEOUT_MS,
    maxHeaderBytes: data.MAX_HEADER_BYTES,
    maxBodyBytes: data.MAX_BODY_BYTES,
    maxConnections: data.MAX_CONNECTIONS,
    logLevel: data.LOG_LEVEL,
    logJson: data.LOG_JSON,
  }
}

export function toServerOptions(config: ServerConfig): ServerOptions {
  return {
    host: config.host,
    port: config.port,
    keepAlive: config.keepAlive,
    idleTimeoutMs: config.idleTimeoutMs,
    maxHeaderBytes: config.maxHeaderBytes,
    maxBodyBytes: config.maxBodyBytes,
    maxConnections: config.maxConnections,
  }
}
