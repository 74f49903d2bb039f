/**
 * Shared logger system for wirehttp
 *
 * Structured logging with levels, trace ids, JSON or human-readable
 * output and child loggers carrying bound fields.
 */

export {
  LogLevel,
  Logger,
  createLogger,
  isLogLevel,
  type LogEntry,
  type LogWriter,
  type LoggerConfig,
} from './logger'
export {
  generateTraceId,
  createTraceContext,
  createChildSpan,
  type TraceContext,
} from './trace'
