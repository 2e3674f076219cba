/**
 * Decoding of inbound DevTools frames.
 *
 * Frames from the browser are either replies (`id` plus `result` or `error`) or
 * events (`method` plus `params`). Session traffic arrives wrapped: a top-level
 * `Target.receivedMessageFromTarget` event carries the session message as a JSON
 * string that needs a second decode.
 */
import type { BindingPayload, CDPError } from './cdp-types.js'
import { isRecord } from './utils.js'

export type ReplyMessage = {
  kind: 'reply'
  id: number
  result?: unknown
  error?: CDPError
}

export type EventMessage = {
  kind: 'event'
  method: string
  params: Record<string, unknown>
}

/** Anything that is not valid JSON or has neither a numeric id nor a method. */
export type NoiseMessage = {
  kind: 'noise'
  raw: string
}

export type InboundMessage = ReplyMessage | EventMessage | NoiseMessage

/**
 * Outcome of a session reply, in decode priority order:
 * protocol error, error object result, thrown exception, typed value, raw result.
 */
export type ReplyOutcome =
  | { kind: 'protocol-error'; message: string; code?: number }
  | { kind: 'error-object'; description: string }
  | { kind: 'exception'; message: string }
  | { kind: 'value'; value: unknown }
  | { kind: 'raw'; result: unknown }

function decodeError(value: unknown): CDPError | undefined {
  if (!isRecord(value)) {
    return undefined
  }
  const message = typeof value.message === 'string' ? value.message : JSON.stringify(value)
  const error: CDPError = { message }
  if (typeof value.code === 'number') {
    error.code = value.code
  }
  if (typeof value.data === 'string') {
    error.data = value.data
  }
  return error
}

export function decodeMessage(text: string): InboundMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return { kind: 'noise', raw: text }
  }
  if (!isRecord(parsed)) {
    return { kind: 'noise', raw: text }
  }

  if (typeof parsed.id === 'number') {
    const reply: ReplyMessage = { kind: 'reply', id: parsed.id, result: parsed.result }
    const error = decodeError(parsed.error)
    if (error) {
      reply.error = error
    }
    return reply
  }

  if (typeof parsed.method === 'string') {
    return {
      kind: 'event',
      method: parsed.method,
      params: isRecord(parsed.params) ? parsed.params : {},
    }
  }

  return { kind: 'noise', raw: text }
}

export function decodeReplyOutcome(reply: ReplyMessage): ReplyOutcome {
  if (reply.error) {
    return { kind: 'protocol-error', message: reply.error.message, code: reply.error.code }
  }

  const result = reply.result
  if (!isRecord(result)) {
    return { kind: 'raw', result }
  }

  const remoteObject = isRecord(result.result) ? result.result : undefined
  if (remoteObject?.type === 'object' && remoteObject.subtype === 'error') {
    return {
      kind: 'error-object',
      description: typeof remoteObject.description === 'string' ? remoteObject.description : 'Error',
    }
  }

  if (isRecord(result.exceptionDetails)) {
    return { kind: 'exception', message: describeException(result.exceptionDetails) }
  }

  if (remoteObject && typeof remoteObject.type === 'string') {
    if (typeof remoteObject.unserializableValue === 'string') {
      return { kind: 'value', value: decodeUnserializableValue(remoteObject.unserializableValue) }
    }
    return { kind: 'value', value: remoteObject.value }
  }

  return { kind: 'raw', result }
}

/** Values JSON cannot carry: `NaN`, `Infinity`, `-Infinity`, `-0` and bigints such as `10n`. */
export function decodeUnserializableValue(text: string): unknown {
  switch (text) {
    case 'NaN':
      return NaN
    case 'Infinity':
      return Infinity
    case '-Infinity':
      return -Infinity
    case '-0':
      return -0
  }
  if (/^-?\d+n$/.test(text)) {
    return BigInt(text.slice(0, -1))
  }
  return text
}

function describeException(details: Record<string, unknown>): string {
  const exception = isRecord(details.exception) ? details.exception : undefined
  if (exception && 'value' in exception) {
    return JSON.stringify(exception.value)
  }
  if (exception && typeof exception.description === 'string') {
    return exception.description
  }
  return typeof details.text === 'string' ? details.text : 'Uncaught exception'
}

export type TargetMessageParams = {
  sessionId: string
  message: string
}

export function decodeTargetMessage(params: Record<string, unknown>): TargetMessageParams | null {
  if (typeof params.sessionId !== 'string' || typeof params.message !== 'string') {
    return null
  }
  return { sessionId: params.sessionId, message: params.message }
}

export type BindingCall = {
  name: string
  executionContextId: number
  payload: BindingPayload
}

/**
 * Decodes `Runtime.bindingCalled`. Returns null for calls that did not go
 * through the injected shim (their payload is not `{name, seq, args}`).
 */
export function decodeBindingCall(params: Record<string, unknown>): BindingCall | null {
  if (
    typeof params.name !== 'string' ||
    typeof params.payload !== 'string' ||
    typeof params.executionContextId !== 'number'
  ) {
    return null
  }
  let payload: unknown
  try {
    payload = JSON.parse(params.payload)
  } catch {
    return null
  }
  if (
    !isRecord(payload) ||
    typeof payload.name !== 'string' ||
    typeof payload.seq !== 'number' ||
    !Array.isArray(payload.args)
  ) {
    return null
  }
  return {
    name: params.name,
    executionContextId: params.executionContextId,
    payload: { name: payload.name, seq: payload.seq, args: payload.args },
  }
}

export type CommandFrame = {
  id: number
  method: string
  params?: unknown
}

export function createCommand(id: number, method: string, params?: unknown): CommandFrame {
  return params === undefined ? { id, method } : { id, method, params }
}
