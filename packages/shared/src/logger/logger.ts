/**
 * Structured logger with TraceID support
 */

import type { TraceContext } from './trace'

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

/**
 * Log level priority for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  name?: string
  traceId?: string
  spanId?: string
  context?: Record<string, unknown>
}

/**
 * Destination for formatted log lines
 */
export type LogWriter = (line: string, entry: LogEntry) => void

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel
  name?: string
  enableJson: boolean
  enableColor: boolean
  writer: LogWriter
}

const consoleWriter: LogWriter = (line, entry) => {
  if (entry.level === LogLevel.ERROR || entry.level === LogLevel.WARN) {
    console.error(line)
  } else {
    console.log(line)
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY
}

/**
 * Logger class with TraceID support
 */
export class Logger {
  private config: LoggerConfig
  private traceContext?: TraceContext
  private bindings: Record<string, unknown>

  constructor(config: Partial<LoggerConfig> = {}, bindings: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      name: config.name,
      enableJson: config.enableJson ?? false,
      enableColor: config.enableColor ?? true,
      writer: config.writer ?? consoleWriter,
    }
    this.bindings = bindings
  }

  get level(): LogLevel {
    return this.config.level
  }

  /**
   * Set trace context for all subsequent logs
   */
  setTraceContext(context: TraceContext): void {
    this.traceContext = context
  }

  clearTraceContext(): void {
    this.traceContext = undefined
  }

  /**
   * Create a child logger sharing configuration and trace context.
   * Bindings are merged into the context of every entry it writes.
   */
  child(bindings: Record<string, unknown>, trace?: Partial<TraceContext>): Logger {
    const childLogger = new Logger(this.config, { ...this.bindings, ...bindings })
    if (this.traceContext) {
      childLogger.setTraceContext({ ...this.traceContext, ...trace })
    } else if (trace?.traceId) {
      childLogger.setTraceContext({ timestamp: Date.now(), ...trace, traceId: trace.traceId })
    }
    return childLogger
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level]
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context)
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, {
      ...context,
      ...(error
        ? {
            error: {
              name: error.name,
              message: error.message,
              stack: error.stack,
            },
          }
        : {}),
    })
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return
    }

    const merged = { ...this.bindings, ...context }
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      name: this.config.name,
      traceId: this.traceContext?.traceId,
      spanId: this.traceContext?.spanId,
      context: Object.keys(merged).length > 0 ? merged : undefined,
    }

    this.config.writer(this.format(entry), entry)
  }

  /**
   * Render an entry as one JSON object or one human-readable line
   */
  format(entry: LogEntry): string {
    if (this.config.enableJson) {
      return JSON.stringify(entry)
    }

    const { level, message, timestamp, name, traceId, context } = entry
    const nameStr = name ? ` (${name})` : ''
    const contextStr = context ? ` ${JSON.stringify(context)}` : ''
    const traceStr = traceId ? ` [trace:${traceId}]` : ''
    const line = `[${timestamp}] ${level.toUpperCase()}${nameStr}:${traceStr} ${message}${contextStr}`

    return this.config.enableColor ? this.colorizeLog(level, line) : line
  }

  private colorizeLog(level: LogLevel, message: string): string {
    const colors = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m', // Green
      [LogLevel.WARN]: '\x1b[33m', // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
    }
    const reset = '\x1b[0m'
    return `${colors[level]}${message}${reset}`
  }
}

export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config)
}
