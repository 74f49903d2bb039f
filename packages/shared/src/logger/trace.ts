/**
 * TraceID generation for correlating the log lines of one request
 */

import { randomBytes } from 'node:crypto'

/**
 * Generate a unique trace ID, e.g. `req_lz3k1x_9f2c4a7e1b0d`
 */
export function generateTraceId(prefix = 'req'): string {
  const timestamp = Date.now().toString(36)
  const randomPart = randomBytes(6).toString('hex')
  return `${prefix}_${timestamp}_${randomPart}`
}

export interface TraceContext {
  traceId: string
  spanId?: string
  parentSpanId?: string
  timestamp: number
}

export function createTraceContext(traceId?: string): TraceContext {
  return {
    traceId: traceId || generateTraceId(),
    timestamp: Date.now(),
  }
}

/**
 * Create a child span from parent trace context
 */
export function createChildSpan(parent: TraceContext): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateTraceId('span'),
    parentSpanId: parent.spanId,
    timestamp: Date.now(),
  }
}
