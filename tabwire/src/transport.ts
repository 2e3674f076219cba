import WebSocket from 'ws'
import type { CdpLogger } from './cdp-log.js'
import { ConnectError, TransportClosedError } from './errors.js'

type Waiter = {
  resolve: (frame: string) => void
  reject: (error: Error) => void
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8')
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8')
  }
  return Buffer.from(data).toString('utf8')
}

/**
 * Message-framed duplex channel to the browser's DevTools endpoint.
 *
 * Inbound frames are queued until someone calls receive(); only one reader is
 * expected at a time (the negotiator during startup, then the dispatcher).
 * Outbound frames go through a single write chain so concurrent senders never
 * interleave.
 */
export class Transport {
  private ws: WebSocket
  private cdpLogger?: CdpLogger
  private inbox: string[] = []
  private waiters: Waiter[] = []
  private closedError: TransportClosedError | null = null
  private writing: Promise<void> = Promise.resolve()

  constructor(ws: WebSocket, { cdpLogger }: { cdpLogger?: CdpLogger } = {}) {
    this.ws = ws
    this.cdpLogger = cdpLogger
    ws.on('message', (data) => {
      this.onFrame(rawDataToString(data))
    })
    ws.on('close', (code, reason) => {
      const suffix = reason.length > 0 ? `: ${reason.toString('utf8')}` : ''
      this.onClosed(new TransportClosedError(`Connection to the browser closed (code ${code}${suffix})`))
    })
    ws.on('error', (error) => {
      this.onClosed(new TransportClosedError(`Connection to the browser failed: ${error.message}`, { cause: error }))
    })
  }

  /** Next inbound frame. Rejects with TransportClosedError once the channel is gone and drained. */
  receive(): Promise<string> {
    const frame = this.inbox.shift()
    if (frame !== undefined) {
      return Promise.resolve(frame)
    }
    if (this.closedError) {
      return Promise.reject(this.closedError)
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject })
    })
  }

  send(message: unknown): Promise<void> {
    if (this.closedError) {
      return Promise.reject(this.closedError)
    }
    const text = JSON.stringify(message)
    this.cdpLogger?.log({ timestamp: new Date().toISOString(), direction: 'to-browser', message })

    const write = this.writing.then(() => this.write(text))
    // Ordering only: the failure itself is reported through `write`.
    this.writing = write.then(
      () => undefined,
      () => undefined,
    )
    return write
  }

  /** Idempotent. */
  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(1000, 'Client closed')
    }
    this.onClosed(new TransportClosedError())
  }

  private write(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.closedError) {
        reject(this.closedError)
        return
      }
      this.ws.send(text, (error) => {
        if (error) {
          reject(new TransportClosedError(`Failed to write to the browser: ${error.message}`, { cause: error }))
          return
        }
        resolve()
      })
    })
  }

  private onFrame(frame: string): void {
    if (this.cdpLogger) {
      this.cdpLogger.log({ timestamp: new Date().toISOString(), direction: 'from-browser', message: parseForLog(frame) })
    }
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter.resolve(frame)
      return
    }
    this.inbox.push(frame)
  }

  private onClosed(error: TransportClosedError): void {
    if (this.closedError) {
      return
    }
    this.closedError = error
    const waiters = this.waiters
    this.waiters = []
    for (const waiter of waiters) {
      waiter.reject(error)
    }
  }
}

function parseForLog(frame: string): unknown {
  try {
    return JSON.parse(frame)
  } catch {
    return frame
  }
}

/** Opens a WebSocket to the DevTools endpoint. */
export function openTransport(
  url: string,
  { cdpLogger, timeout = 10000 }: { cdpLogger?: CdpLogger; timeout?: number } = {},
): Promise<Transport> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url, { perMessageDeflate: false, maxPayload: 256 * 1024 * 1024 })
    let settled = false

    const timer = setTimeout(() => {
      settled = true
      reject(new ConnectError(url, { cause: new Error(`timed out after ${timeout}ms`) }))
      // terminate() on a connecting socket reports through 'error', which onError ignores now
      ws.terminate()
    }, timeout)

    const onError = (error: Error) => {
      if (settled) {
        return
      }
      settled = true
      clearTimeout(timer)
      reject(new ConnectError(url, { cause: error }))
    }

    ws.on('error', onError)
    ws.once('open', () => {
      if (settled) {
        return
      }
      settled = true
      clearTimeout(timer)
      ws.off('error', onError)
      resolve(new Transport(ws, { cdpLogger }))
    })
  })
}
