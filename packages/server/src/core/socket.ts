/**
 * Promise-based wrapper around a paused TCP socket
 *
 * The socket only flows while a read is pending; each `data` event
 * settles that read and pauses it again. The idle timer is armed while
 * waiting for bytes, while a write has not drained and while a close is
 * flushing, so a slow handler never trips it but a client that stops
 * reading does.
 */

import type { Socket } from 'node:net'
import { ErrorCode, WireError } from '@wirehttp/shared/errors'
import type { ByteSource } from './byte-reader'

export interface ByteSink {
  write(chunk: Buffer): Promise<void>
}

/**
 * Both directions of one client connection
 */
export interface Transport extends ByteSource, ByteSink {
  readonly remoteAddress?: string
  readonly remotePort?: number
  /** Whether the idle timer closed the connection */
  readonly timedOut: boolean
  /** Flush pending writes, then close */
  close(): void
  destroy(): void
}

interface PendingRead {
  resolve: (chunk: Buffer) => void
  reject: (reason: Error) => void
}

interface PendingWrite {
  resolve: () => void
  reject: (reason: Error) => void
}

const EMPTY = Buffer.alloc(0)

export class SocketConnection implements Transport {
  private err: Error | null = null
  private ended = false
  private closed = false
  private closing = false
  private reader: PendingRead | null = null
  private readonly writers = new Set<PendingWrite>()
  private queued: Buffer[] = []

  constructor(
    readonly socket: Socket,
    private readonly idleTimeoutMs: number
  ) {
    socket.on('data', (chunk: Buffer) => {
      socket.pause()
      if (this.reader) {
        this.settle().resolve(chunk)
      } else {
        this.queued.push(chunk)
      }
    })

    socket.on('end', () => {
      this.ended = true
      if (this.reader) {
        this.settle().resolve(EMPTY)
      }
    })

    socket.on('timeout', () => {
      const message =
        this.reader || this.writers.size === 0
          ? `No data received for ${this.idleTimeoutMs}ms`
          : `Client stopped reading for ${this.idleTimeoutMs}ms`
      this.fail(
        new WireError(message, ErrorCode.REQUEST_TIMEOUT, {
          details: this.describe('idle timeout'),
        })
      )
      socket.destroy()
    })

    socket.on('error', (error: Error) => {
      this.fail(
        new WireError(error.message, ErrorCode.CONNECTION_CLOSED, {
          details: this.describe('socket error'),
          cause: error,
        })
      )
    })

    socket.on('close', () => {
      this.closed = true
      if (this.reader) {
        if (this.ended && !this.err) {
          this.settle().resolve(EMPTY)
        } else {
          this.settle().reject(this.err ?? this.closedError())
        }
      }
      for (const writer of this.writers) {
        writer.reject(this.err ?? this.closedError())
      }
      this.writers.clear()
      this.armTimer()
    })
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort
  }

  get timedOut(): boolean {
    return this.err instanceof WireError && this.err.code === ErrorCode.REQUEST_TIMEOUT
  }

  read(): Promise<Buffer> {
    const next = this.queued.shift()
    if (next) {
      return Promise.resolve(next)
    }

    return new Promise<Buffer>((resolve, reject) => {
      if (this.err) {
        reject(this.err)
        return
      }
      if (this.ended) {
        resolve(EMPTY)
        return
      }
      if (this.closed) {
        reject(this.closedError())
        return
      }

      this.reader = { resolve, reject }
      this.armTimer()
      this.socket.resume()
    })
  }

  write(chunk: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.err) {
        reject(this.err)
        return
      }
      if (this.closed || this.socket.destroyed || !this.socket.writable) {
        reject(this.closedError())
        return
      }

      const writer: PendingWrite = { resolve, reject }
      this.writers.add(writer)
      this.armTimer()
      this.socket.write(chunk, error => {
        if (!this.writers.delete(writer)) {
          return
        }
        this.armTimer()
        if (error) {
          reject(
            this.err ??
              new WireError(error.message, ErrorCode.CONNECTION_CLOSED, {
                details: this.describe('write failed'),
                cause: error,
              })
          )
        } else {
          resolve()
        }
      })
    })
  }

  /**
   * Flush pending writes, send FIN and release the socket. A client that
   * never drains the flush is cut off after the idle timeout.
   */
  close(): void {
    if (this.socket.destroyed || this.closing) {
      return
    }
    this.closing = true
    this.armTimer()
    this.socket.end(() => this.socket.destroy())
  }

  destroy(): void {
    this.socket.destroy()
  }

  private settle(): PendingRead {
    const reader = this.reader
    if (!reader) {
      throw new WireError('No pending read to settle', ErrorCode.INTERNAL_ERROR)
    }
    this.reader = null
    this.armTimer()
    return reader
  }

  private armTimer(): void {
    const waiting = !this.closed && (this.reader !== null || this.writers.size > 0 || this.closing)
    this.socket.setTimeout(waiting ? this.idleTimeoutMs : 0)
  }

  private fail(error: WireError): void {
    this.err ??= error
    if (this.reader) {
      this.settle().reject(this.err)
    }
  }

  private closedError(): WireError {
    return new WireError('Connection closed', ErrorCode.CONNECTION_CLOSED, {
      details: this.describe('closed'),
    })
  }

  private describe(reason: string) {
    return {
      remoteAddress: this.socket.remoteAddress,
      remotePort: this.socket.remotePort,
      reason,
    }
  }
}
