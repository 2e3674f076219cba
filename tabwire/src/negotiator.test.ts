import { describe, test, expect } from 'vitest'
import { TargetError, TransportClosedError } from './errors.js'
import { attachToTarget, discoverPageTarget, type NegotiationTransport } from './negotiator.js'
import { createMemoryLogger } from './test-utils.js'

function scriptedTransport(frames: unknown[]) {
  const queue = frames.map((frame) => (typeof frame === 'string' ? frame : JSON.stringify(frame)))
  const sent: unknown[] = []
  const transport: NegotiationTransport = {
    send: async (message) => {
      sent.push(message)
    },
    receive: () => {
      const frame = queue.shift()
      return frame === undefined ? Promise.reject(new TransportClosedError('gone')) : Promise.resolve(frame)
    },
  }
  return { transport, sent }
}

function targetCreated(targetId: string, type: string) {
  return { method: 'Target.targetCreated', params: { targetInfo: { targetId, type, url: 'about:blank' } } }
}

describe('discoverPageTarget', () => {
  test('skips noise and non-page targets until a page appears', async () => {
    const { transport, sent } = scriptedTransport([
      { id: 0, result: {} },
      'not json',
      targetCreated('worker-1', 'service_worker'),
      targetCreated('page-1', 'page'),
      targetCreated('page-2', 'page'),
    ])
    const logger = createMemoryLogger()

    await expect(discoverPageTarget(transport, { logger })).resolves.toBe('page-1')
    expect(sent).toEqual([{ id: 0, method: 'Target.setDiscoverTargets', params: { discover: true } }])
    expect(logger.lines).toEqual(['Ignoring service_worker target worker-1'])
  })

  test('an error reply fails with TargetError', async () => {
    const { transport } = scriptedTransport([{ id: 0, error: { code: -32000, message: 'Not allowed' } }])
    await expect(discoverPageTarget(transport)).rejects.toThrow(new TargetError('Target error: Not allowed'))
  })

  test('a closed channel before any page propagates', async () => {
    const { transport } = scriptedTransport([{ id: 0, result: {} }])
    await expect(discoverPageTarget(transport)).rejects.toBeInstanceOf(TransportClosedError)
  })
})

describe('attachToTarget', () => {
  test('returns the session id from the attach reply', async () => {
    const { transport, sent } = scriptedTransport([
      {
        method: 'Target.attachedToTarget',
        params: { sessionId: 'session-9', targetInfo: { targetId: 'page-1', type: 'page' } },
      },
      { id: 0, result: {} },
      { id: 1, result: { sessionId: 'session-9' } },
    ])

    await expect(attachToTarget(transport, 'page-1')).resolves.toBe('session-9')
    expect(sent).toEqual([{ id: 1, method: 'Target.attachToTarget', params: { targetId: 'page-1' } }])
  })

  test('an error reply fails with TargetError', async () => {
    const { transport } = scriptedTransport([{ id: 1, error: { code: -32602, message: 'No target with given id' } }])
    await expect(attachToTarget(transport, 'page-1')).rejects.toThrow(
      new TargetError('Target error: No target with given id'),
    )
  })

  test('a reply without a session id fails with TargetError', async () => {
    const { transport } = scriptedTransport([{ id: 1, result: {} }])
    await expect(attachToTarget(transport, 'page-1')).rejects.toThrow(
      'Target error: attach to page-1 returned no session id',
    )
  })
})
