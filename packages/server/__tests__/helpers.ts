/**
 * Test doubles for the byte-level seams, plus a raw TCP client
 */

import { connect, type Socket } from 'node:net'
import { WireError } from '@wirehttp/shared/errors'
import type { ByteSource } from '../src/core/byte-reader'
import type { Transport } from '../src/core/socket'

/**
 * The WireError `promise` rejects with
 */
export async function rejection(promise: Promise<unknown>): Promise<WireError> {
  try {
    await promise
  } catch (error) {
    if (error instanceof WireError) {
      return error
    }
    throw error
  }
  throw new Error('Expected the promise to reject')
}

/**
 * The WireError `fn` throws
 */
export function thrown(fn: () => unknown): WireError {
  try {
    fn()
  } catch (error) {
    if (error instanceof WireError) {
      return error
    }
    throw error
  }
  throw new Error('Expected the call to throw')
}

/**
 * Replays the given chunks one read at a time, then reports end of stream
 */
export class ChunkSource implements ByteSource {
  private readonly chunks: Buffer[]
  reads = 0

  constructor(chunks: Array<string | Buffer>) {
    this.chunks = chunks.map(chunk => (typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk))
  }

  async read(): Promise<Buffer> {
    this.reads++
    return this.chunks.shift() ?? Buffer.alloc(0)
  }
}

/**
 * Split `input` into pieces of at most `size` characters
 */
export function splitEvery(input: string, size: number): string[] {
  const pieces: string[] = []
  for (let i = 0; i < input.length; i += size) {
    pieces.push(input.slice(i, i + size))
  }
  return pieces
}

export class BufferSink {
  readonly chunks: Buffer[] = []

  async write(chunk: Buffer): Promise<void> {
    this.chunks.push(Buffer.from(chunk))
  }

  get output(): Buffer {
    return Buffer.concat(this.chunks)
  }

  toString(): string {
    return this.output.toString('latin1')
  }
}

/**
 * In-memory transport: reads replay `chunks`, writes are collected
 */
export class MemoryTransport extends BufferSink implements Transport {
  readonly remoteAddress = '127.0.0.1'
  readonly remotePort = 40000
  timedOut = false
  closed = false
  destroyed = false
  private readonly source: ChunkSource

  constructor(chunks: Array<string | Buffer>) {
    super()
    this.source = new ChunkSource(chunks)
  }

  read(): Promise<Buffer> {
    return this.source.read()
  }

  close(): void {
    this.closed = true
  }

  destroy(): void {
    this.destroyed = true
  }
}

export interface ParsedResponse {
  status: number
  reason: string
  headers: Array<[string, string]>
  body: Buffer
  /** Case-insensitive lookup of the first field with this name */
  header(name: string): string | undefined
}

const HEAD_END = '\r\n\r\n'

function parseHead(head: string): Omit<ParsedResponse, 'body'> {
  const [statusLine = '', ...lines] = head.split('\r\n')
  const match = /^HTTP\/1\.1 (\d{3}) (.*)$/.exec(statusLine)
  if (!match) {
    throw new Error(`Bad status line: ${statusLine}`)
  }
  const headers = lines.map((line): [string, string] => {
    const colon = line.indexOf(':')
    return [line.slice(0, colon), line.slice(colon + 1).trim()]
  })
  return {
    status: Number(match[1]),
    reason: match[2] ?? '',
    headers,
    header: name => headers.find(([key]) => key.toLowerCase() === name.toLowerCase())?.[1],
  }
}

/**
 * Parse the first response in `raw` the way a client would.
 * @returns The response and the number of bytes it took, or null if incomplete
 */
export function readResponse(raw: Buffer, headOnly = false): { response: ParsedResponse; consumed: number } | null {
  const text = raw.toString('latin1')
  const end = text.indexOf(HEAD_END)
  if (end === -1) {
    return null
  }
  const head = parseHead(text.slice(0, end))
  const length = headOnly ? 0 : Number(head.header('content-length') ?? '0')
  const bodyStart = end + HEAD_END.length
  if (raw.length < bodyStart + length) {
    return null
  }
  return {
    response: { ...head, body: raw.subarray(bodyStart, bodyStart + length) },
    consumed: bodyStart + length,
  }
}

export function parseResponse(raw: Buffer, headOnly = false): ParsedResponse {
  const result = readResponse(raw, headOnly)
  if (!result) {
    throw new Error(`Incomplete response: ${JSON.stringify(raw.toString('latin1'))}`)
  }
  return result.response
}

/**
 * Raw TCP client that reads responses byte-exactly
 */
export class RawClient {
  private buffer = Buffer.alloc(0)
  private closed = false
  private waiters: Array<() => void> = []
  error?: Error

  private constructor(private readonly socket: Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk])
      this.wake()
    })
    socket.on('error', (error: Error) => {
      this.error = error
    })
    socket.on('close', () => {
      this.closed = true
      this.wake()
    })
  }

  static connect(port: number, host = '127.0.0.1'): Promise<RawClient> {
    return new Promise((resolve, reject) => {
      const socket = connect({ port, host }, () => {
        socket.off('error', reject)
        resolve(new RawClient(socket))
      })
      socket.once('error', reject)
    })
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Bytes received and not yet consumed by readResponse */
  get pending(): Buffer {
    return this.buffer
  }

  write(data: string | Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(data, error => (error ? reject(error) : resolve()))
    })
  }

  async readResponse(options: { headOnly?: boolean } = {}): Promise<ParsedResponse> {
    for (;;) {
      const result = readResponse(this.buffer, options.headOnly)
      if (result) {
        this.buffer = this.buffer.subarray(result.consumed)
        return result.response
      }
      if (this.closed) {
        throw new Error(`Connection closed before a full response: ${JSON.stringify(this.buffer.toString('latin1'))}`)
      }
      await this.next()
    }
  }

  /**
   * Everything the server sends until it closes the connection
   */
  async readUntilClose(): Promise<Buffer> {
    while (!this.closed) {
      await this.next()
    }
    const rest = this.buffer
    this.buffer = Buffer.alloc(0)
    return rest
  }

  async waitForClose(): Promise<void> {
    while (!this.closed) {
      await this.next()
    }
  }

  end(): void {
    this.socket.end()
  }

  /** Stop reading, so the server's writes back up */
  pause(): void {
    this.socket.pause()
  }

  destroy(): void {
    this.socket.destroy()
  }

  private next(): Promise<void> {
    return new Promise(resolve => this.waiters.push(resolve))
  }

  private wake(): void {
    const waiters = this.waiters
    this.waiters = []
    for (const waiter of waiters) {
      waiter()
    }
  }
}
