import type { StoreApi } from 'zustand/vanilla'
import { takePendingRequest, type ConnectionState } from './connection-state.js'
import type { Logger } from './create-logger.js'
import { RemoteError, TransportClosedError } from './errors.js'
import {
  decodeBindingCall,
  decodeMessage,
  decodeReplyOutcome,
  decodeTargetMessage,
  type BindingCall,
  type EventMessage,
  type ReplyMessage,
} from './protocol.js'
import type { Transport } from './transport.js'
import { isRecord } from './utils.js'

export type DispatcherOptions = {
  transport: Pick<Transport, 'receive'>
  store: StoreApi<ConnectionState>
  logger?: Logger
  /** Session events, after diagnostic logging. */
  onEvent: (method: string, params: Record<string, unknown>) => void
  /** Called for each shim call whose name has a registered handler. Must not block. */
  onBindingCall: (call: BindingCall) => void
  /** The attached target went away. The dispatcher stops after this. */
  onTargetDestroyed: () => void
  /** The transport ended underneath the dispatcher. */
  onTransportClosed: (error: TransportClosedError) => void
}

export type FrameResult = 'continue' | 'stop'

/**
 * The only reader of the transport once the session is attached. Every frame is
 * routed to exactly one place: a pending request, the event listeners (plus the
 * logger for console output), or a binding invocation.
 */
export class Dispatcher {
  private options: DispatcherOptions

  constructor(options: DispatcherOptions) {
    this.options = options
  }

  /** Reads until the transport closes or the target is destroyed. Never throws. */
  async run(): Promise<void> {
    const { transport, onTransportClosed } = this.options
    while (true) {
      let frame: string
      try {
        frame = await transport.receive()
      } catch (error) {
        onTransportClosed(error instanceof TransportClosedError ? error : new TransportClosedError(undefined, { cause: error }))
        return
      }
      if (this.handleFrame(frame) === 'stop') {
        return
      }
    }
  }

  handleFrame(frame: string): FrameResult {
    const message = decodeMessage(frame)
    switch (message.kind) {
      case 'noise': {
        this.options.logger?.log('Dropping undecodable frame:', message.raw)
        return 'continue'
      }
      case 'reply': {
        this.handleTopLevelReply(message)
        return 'continue'
      }
      case 'event': {
        return this.handleTopLevelEvent(message)
      }
    }
  }

  private handleTopLevelEvent(message: EventMessage): FrameResult {
    const { store } = this.options
    if (message.method === 'Target.receivedMessageFromTarget') {
      const targetMessage = decodeTargetMessage(message.params)
      if (!targetMessage || targetMessage.sessionId !== store.getState().sessionId) {
        return 'continue'
      }
      this.handleSessionFrame(targetMessage.message)
      return 'continue'
    }

    if (message.method === 'Target.targetDestroyed' && message.params.targetId === store.getState().targetId) {
      this.options.onTargetDestroyed()
      return 'stop'
    }
    return 'continue'
  }

  /** Top-level replies only matter when the sendMessageToTarget wrapper itself failed. */
  private handleTopLevelReply(message: ReplyMessage): void {
    if (!message.error) {
      return
    }
    const pending = takePendingRequest(this.options.store, message.id)
    pending?.reject(new RemoteError(message.error.message, { code: message.error.code }))
  }

  private handleSessionFrame(frame: string): void {
    const message = decodeMessage(frame)
    switch (message.kind) {
      case 'noise': {
        this.options.logger?.log('Dropping undecodable session frame:', message.raw)
        return
      }
      case 'reply': {
        this.resolveReply(message, frame)
        return
      }
      case 'event': {
        this.handleSessionEvent(message)
        return
      }
    }
  }

  private handleSessionEvent({ method, params }: EventMessage): void {
    const { logger, store } = this.options
    switch (method) {
      case 'Runtime.consoleAPICalled': {
        logger?.log(formatConsoleCall(params))
        break
      }
      case 'Runtime.exceptionThrown': {
        logger?.error(formatException(params))
        break
      }
      case 'Runtime.bindingCalled': {
        const call = decodeBindingCall(params)
        if (call && store.getState().bindings.has(call.name)) {
          this.options.onBindingCall(call)
        }
        return
      }
    }
    this.options.onEvent(method, params)
  }

  private resolveReply(message: ReplyMessage, frame: string): void {
    const pending = takePendingRequest(this.options.store, message.id)
    if (!pending) {
      return
    }
    const outcome = decodeReplyOutcome(message)
    switch (outcome.kind) {
      case 'protocol-error': {
        pending.reject(new RemoteError(outcome.message, { code: outcome.code }))
        return
      }
      case 'error-object': {
        pending.reject(new RemoteError(outcome.description))
        return
      }
      case 'exception': {
        pending.reject(new RemoteError(outcome.message))
        return
      }
      case 'value': {
        pending.resolve(outcome.value, frame)
        return
      }
      case 'raw': {
        pending.resolve(outcome.result, frame)
        return
      }
    }
  }
}

function describeRemoteObject(value: unknown): string {
  if (!isRecord(value)) {
    return String(value)
  }
  if ('value' in value) {
    return typeof value.value === 'string' ? value.value : JSON.stringify(value.value)
  }
  if (typeof value.description === 'string') {
    return value.description
  }
  return typeof value.type === 'string' ? value.type : 'unknown'
}

export function formatConsoleCall(params: Record<string, unknown>): string {
  const type = typeof params.type === 'string' ? params.type : 'log'
  const args = Array.isArray(params.args) ? params.args.map(describeRemoteObject) : []
  return `console.${type}: ${args.join(' ')}`
}

export function formatException(params: Record<string, unknown>): string {
  const details: Record<string, unknown> = isRecord(params.exceptionDetails) ? params.exceptionDetails : {}
  if (isRecord(details.exception) && typeof details.exception.description === 'string') {
    return `Uncaught ${details.exception.description}`
  }
  return typeof details.text === 'string' ? details.text : 'Uncaught exception'
}
