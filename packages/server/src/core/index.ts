/**
 * Core Architecture Components
 *
 * Exports the building blocks of the request pipeline
 */

export { ByteStreamReader } from './byte-reader'
export type { ByteSource } from './byte-reader'

export { SocketConnection } from './socket'
export type { ByteSink, Transport } from './socket'

export { HeaderMap } from './headers'
export type { HeaderInit, ReadonlyHeaderMap } from './headers'

export { parseCookieHeader, serializeCookie } from './cookies'
export type { CookieOptions } from './cookies'

export { HTTP_METHODS, FORM_CONTENT_TYPE, createRequest, isHttpMethod, mediaType } from './request'
export type { HttpMethod, HttpVersion, Request, RequestInit } from './request'

export { DEFAULT_PARSER_LIMITS, parseHeaderLine, parseRequest, parseRequestLine } from './parser'
export type { ParserLimits } from './parser'

export { HttpResponse, isStreamedBody } from './response'
export type { ResponseBody, StreamedBody } from './response'

export { serializeHead, serializeResponse, writeResponse } from './response-writer'
export type { WriteOptions } from './response-writer'

export { isBodylessStatus, isValidStatus, reasonPhrase } from './status'

export { Context, ContextKey, createContextKey } from './context'

export {
  AUTH_TOKEN_KEY,
  REQUEST_LOGGER_KEY,
  TRACE_ID_KEY,
  bearerAuthMiddleware,
  corsMiddleware,
  errorHandlerMiddleware,
  executeMiddlewares,
  loggerMiddleware,
} from './middleware'
export type { Middleware, NextFunction, RouteHandler } from './middleware'

export { RouteGroup, Router, formatPattern, matchSegments, parsePattern } from './router'
export type { Route, RouteArgs, RouteMatch, RouteScope, RouteWarning, Segment } from './router'

export { HttpConnection, defaultErrorResponder } from './connection'
export type { ConnectionSettings, ConnectionState, ErrorResponder } from './connection'
