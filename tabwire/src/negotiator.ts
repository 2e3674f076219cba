/**
 * Target discovery and session attach. Runs before the dispatcher starts, so it
 * reads the transport directly and skips every frame it is not waiting for.
 */
import type { Logger } from './create-logger.js'
import { TargetError } from './errors.js'
import { createCommand, decodeMessage } from './protocol.js'
import type { Transport } from './transport.js'
import { isRecord } from './utils.js'

export const DISCOVER_TARGETS_ID = 0
export const ATTACH_TO_TARGET_ID = 1

export type NegotiationTransport = Pick<Transport, 'send' | 'receive'>

/** Enables target discovery and returns the id of the first page target announced. */
export async function discoverPageTarget(
  transport: NegotiationTransport,
  { logger }: { logger?: Logger } = {},
): Promise<string> {
  await transport.send(createCommand(DISCOVER_TARGETS_ID, 'Target.setDiscoverTargets', { discover: true }))

  while (true) {
    const message = decodeMessage(await transport.receive())
    if (message.kind === 'reply') {
      if (message.id === DISCOVER_TARGETS_ID && message.error) {
        throw new TargetError(`Target error: ${message.error.message}`)
      }
      continue
    }
    if (message.kind !== 'event' || message.method !== 'Target.targetCreated') {
      continue
    }
    const targetInfo = message.params.targetInfo
    if (!isRecord(targetInfo) || typeof targetInfo.targetId !== 'string') {
      continue
    }
    if (targetInfo.type !== 'page') {
      logger?.log(`Ignoring ${String(targetInfo.type)} target ${targetInfo.targetId}`)
      continue
    }
    return targetInfo.targetId
  }
}

/** Attaches a session to the target and returns its session id. */
export async function attachToTarget(transport: NegotiationTransport, targetId: string): Promise<string> {
  await transport.send(createCommand(ATTACH_TO_TARGET_ID, 'Target.attachToTarget', { targetId }))

  while (true) {
    const message = decodeMessage(await transport.receive())
    if (message.kind !== 'reply' || message.id !== ATTACH_TO_TARGET_ID) {
      continue
    }
    if (message.error) {
      throw new TargetError(`Target error: ${message.error.message}`)
    }
    const result = message.result
    if (!isRecord(result) || typeof result.sessionId !== 'string') {
      throw new TargetError(`Target error: attach to ${targetId} returned no session id`)
    }
    return result.sessionId
  }
}
