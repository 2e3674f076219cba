export class TabwireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The browser process could not be started. */
export class LaunchError extends TabwireError {
  constructor(executable: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super(`Failed to launch browser ${executable}${reason}`, options)
  }
}

/** The DevTools endpoint address was never printed, or stderr closed first. */
export class HandshakeError extends TabwireError {}

export class ConnectError extends TabwireError {
  readonly url: string

  constructor(url: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super(`Failed to connect to ${url}${reason}`, options)
    this.url = url
  }
}

export class TargetError extends TabwireError {}

/** Protocol-level error or an exception thrown by evaluated page script. */
export class RemoteError extends TabwireError {
  readonly code?: number

  constructor(message: string, { code }: { code?: number } = {}) {
    super(message)
    this.code = code
  }
}

export class TransportClosedError extends TabwireError {
  constructor(message = 'Connection to the browser is closed', options?: { cause?: unknown }) {
    super(message, options)
  }
}

export class ArgumentMismatchError extends TabwireError {
  readonly expected: number
  readonly received: number

  constructor({ expected, received }: { expected: number; received: number }) {
    super(`Function arguments mismatch: expected ${expected}, got ${received}`)
    this.expected = expected
    this.received = received
  }
}

export class ArgumentTypeError extends TabwireError {
  constructor() {
    super('Function arguments mismatch: unexpected argument types')
  }
}

export class RequestTimeoutError extends TabwireError {
  constructor(method: string, timeout: number) {
    super(`Request timeout after ${timeout}ms: ${method}`)
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
