/**
 * wirehttp: an HTTP/1.1 server engine on raw TCP sockets
 */

export * from './core'

export { WireServer, DEFAULT_IDLE_TIMEOUT_MS } from './server'
export type { ServerOptions } from './server'

export { EventRecorder, createLoggerSink, noopEventSink } from './events'
export type { ConnectionCloseReason, ServerEvent, ServerEventSink, ServerEventType } from './events'

export { DEFAULT_CHUNK_SIZE, createStaticHandler, fileBody, openStaticFile } from './handlers/static'
export type { StaticHandlerOptions } from './handlers/static'

export { getContentType, isWithinRoot, resolveWithinRoot } from './utils/path-validator'

export { ServerEnvSchema, loadServerConfig, toServerOptions } from './config'
export type { ServerConfig } from './config'
