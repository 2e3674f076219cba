/**
 * Unit tests for connection state transitions.
 */
import { describe, test, expect } from 'vitest'
import * as connectionState from './connection-state.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function pending(method = 'Runtime.evaluate'): connectionState.PendingRequest {
  return { method, resolve: () => {}, reject: () => {} }
}

// ---------------------------------------------------------------------------
// createConnectionStore
// ---------------------------------------------------------------------------

describe('createConnectionStore', () => {
  test('starts after the negotiation ids with empty tables', () => {
    const state = connectionState.createConnectionStore().getState()
    expect(state.messageId).toBe(2)
    expect(state.pendingRequests.size).toBe(0)
    expect(state.bindings.size).toBe(0)
    expect(state.activeInvocations).toBe(0)
    expect(state.closed).toBe(false)
    expect(state.sessionId).toBeNull()
    expect(state.windowId).toBeNull()
  })

  test('stores are independent', () => {
    const a = connectionState.createConnectionStore()
    const b = connectionState.createConnectionStore()
    connectionState.nextMessageId(a)
    expect(b.getState().messageId).toBe(2)
  })
})

// ---------------------------------------------------------------------------
// Request ids and the pending table
// ---------------------------------------------------------------------------

describe('nextMessageId', () => {
  test('hands out ascending ids starting at 3', () => {
    const store = connectionState.createConnectionStore()
    expect([1, 2, 3].map(() => connectionState.nextMessageId(store))).toEqual([3, 4, 5])
  })
})

describe('pending requests', () => {
  test('addPendingRequest returns a new map and leaves the input untouched', () => {
    const before = connectionState.createConnectionStore().getState()
    const after = connectionState.addPendingRequest(before, { requestId: 3, pendingRequest: pending() })
    expect(after.pendingRequests.has(3)).toBe(true)
    expect(before.pendingRequests.has(3)).toBe(false)
  })

  test('removePendingRequest is a no-op for unknown ids', () => {
    const state = connectionState.createConnectionStore().getState()
    expect(connectionState.removePendingRequest(state, { requestId: 99 })).toBe(state)
  })

  test('takePendingRequest removes the entry exactly once', () => {
    const store = connectionState.createConnectionStore()
    const entry = pending('Page.enable')
    store.setState((s) => connectionState.addPendingRequest(s, { requestId: 3, pendingRequest: entry }))

    expect(connectionState.takePendingRequest(store, 3)).toBe(entry)
    expect(connectionState.takePendingRequest(store, 3)).toBeNull()
    expect(store.getState().pendingRequests.size).toBe(0)
  })

  test('takeAllPendingRequests drains the table', () => {
    const store = connectionState.createConnectionStore()
    store.setState((s) => connectionState.addPendingRequest(s, { requestId: 3, pendingRequest: pending('a') }))
    store.setState((s) => connectionState.addPendingRequest(s, { requestId: 4, pendingRequest: pending('b') }))

    const taken = connectionState.takeAllPendingRequests(store)
    expect(taken.map((entry) => entry.method)).toEqual(['a', 'b'])
    expect(store.getState().pendingRequests.size).toBe(0)
    expect(connectionState.takeAllPendingRequests(store)).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// Bindings, invocations, session
// ---------------------------------------------------------------------------

describe('bindings', () => {
  test('re-registering a name replaces the handler', () => {
    const first: connectionState.BindingHandler = () => 1
    const second: connectionState.BindingHandler = () => 2
    let state = connectionState.createConnectionStore().getState()
    state = connectionState.addBinding(state, { name: 'add', handler: first })
    state = connectionState.addBinding(state, { name: 'add', handler: second })
    expect(state.bindings.size).toBe(1)
    expect(state.bindings.get('add')).toBe(second)
  })
})

describe('invocations', () => {
  test('counts begin and end, never below zero', () => {
    let state = connectionState.createConnectionStore().getState()
    state = connectionState.beginInvocation(state)
    state = connectionState.beginInvocation(state)
    expect(state.activeInvocations).toBe(2)
    state = connectionState.endInvocation(connectionState.endInvocation(connectionState.endInvocation(state)))
    expect(state.activeInvocations).toBe(0)
  })
})

describe('session and lifecycle', () => {
  test('setSession and setWindowId record identifiers', () => {
    let state = connectionState.createConnectionStore().getState()
    state = connectionState.setSession(state, { targetId: 'target-1', sessionId: 'session-1' })
    state = connectionState.setWindowId(state, { windowId: 7 })
    expect(state).toMatchObject({ targetId: 'target-1', sessionId: 'session-1', windowId: 7 })
  })

  test('markClosed is idempotent', () => {
    const closed = connectionState.markClosed(connectionState.createConnectionStore().getState())
    expect(closed.closed).toBe(true)
    expect(connectionState.markClosed(closed)).toBe(closed)
  })
})
