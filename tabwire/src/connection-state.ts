/**
 * Per-connection state: one zustand vanilla store holding the request-id counter,
 * session identifiers, the pending request table and the binding registry.
 *
 * Every mutation goes through a pure transition below and a single setState()
 * call, so a table update is never interleaved with another one. Transitions are
 * never held across an await.
 */
import { createStore, type StoreApi } from 'zustand/vanilla'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PendingRequest = {
  method: string
  /** `value` is the decoded reply, `frame` the session message it came from. */
  resolve: (value: unknown, frame: string) => void
  reject: (error: Error) => void
}

/**
 * Host side of a binding. Receives the arguments the page passed, decoded from
 * JSON, in call order. The returned value (or resolved promise value) must be
 * JSON-serializable; a thrown error rejects the page-side promise with its message.
 */
export type BindingHandler = (args: unknown[], context: BindingContext) => unknown

export type BindingContext = {
  name: string
  /** Aborted when the connection is torn down while the invocation is running. */
  signal: AbortSignal
}

export type ConnectionState = {
  /** Last id handed out. Ids 0 and 1 belong to target negotiation. */
  messageId: number
  targetId: string | null
  sessionId: string | null
  windowId: number | null
  pendingRequests: Map<number, PendingRequest>
  bindings: Map<string, BindingHandler>
  /** Number of binding invocations that have not delivered their result yet. */
  activeInvocations: number
  closed: boolean
}

// ---------------------------------------------------------------------------
// Store factory
// ---------------------------------------------------------------------------

export const FIRST_SESSION_MESSAGE_ID = 2

export function createConnectionStore(): StoreApi<ConnectionState> {
  return createStore<ConnectionState>(() => ({
    messageId: FIRST_SESSION_MESSAGE_ID,
    targetId: null,
    sessionId: null,
    windowId: null,
    pendingRequests: new Map(),
    bindings: new Map(),
    activeInvocations: 0,
    closed: false,
  }))
}

// ---------------------------------------------------------------------------
// Pure state transition functions
// ---------------------------------------------------------------------------

export function incrementMessageId(state: ConnectionState): ConnectionState {
  return { ...state, messageId: state.messageId + 1 }
}

export function setSession(
  state: ConnectionState,
  { targetId, sessionId }: { targetId: string; sessionId: string },
): ConnectionState {
  return { ...state, targetId, sessionId }
}

export function setWindowId(state: ConnectionState, { windowId }: { windowId: number }): ConnectionState {
  return { ...state, windowId }
}

export function addPendingRequest(
  state: ConnectionState,
  { requestId, pendingRequest }: { requestId: number; pendingRequest: PendingRequest },
): ConnectionState {
  const pendingRequests = new Map(state.pendingRequests)
  pendingRequests.set(requestId, pendingRequest)
  return { ...state, pendingRequests }
}

export function removePendingRequest(state: ConnectionState, { requestId }: { requestId: number }): ConnectionState {
  if (!state.pendingRequests.has(requestId)) {
    return state
  }
  const pendingRequests = new Map(state.pendingRequests)
  pendingRequests.delete(requestId)
  return { ...state, pendingRequests }
}

export function clearPendingRequests(state: ConnectionState): ConnectionState {
  if (state.pendingRequests.size === 0) {
    return state
  }
  return { ...state, pendingRequests: new Map() }
}

/** Re-registering a name replaces the handler; the page shim stays the same. */
export function addBinding(
  state: ConnectionState,
  { name, handler }: { name: string; handler: BindingHandler },
): ConnectionState {
  const bindings = new Map(state.bindings)
  bindings.set(name, handler)
  return { ...state, bindings }
}

export function beginInvocation(state: ConnectionState): ConnectionState {
  return { ...state, activeInvocations: state.activeInvocations + 1 }
}

export function endInvocation(state: ConnectionState): ConnectionState {
  return { ...state, activeInvocations: Math.max(0, state.activeInvocations - 1) }
}

export function markClosed(state: ConnectionState): ConnectionState {
  if (state.closed) {
    return state
  }
  return { ...state, closed: true }
}

// ---------------------------------------------------------------------------
// Store helpers
// ---------------------------------------------------------------------------

/** Allocates the next request id. */
export function nextMessageId(store: StoreApi<ConnectionState>): number {
  store.setState(incrementMessageId)
  return store.getState().messageId
}

/** Removes and returns the pending entry for an id, exactly once. */
export function takePendingRequest(store: StoreApi<ConnectionState>, requestId: number): PendingRequest | null {
  let pendingRequest: PendingRequest | null = null
  store.setState((s) => {
    const entry = s.pendingRequests.get(requestId)
    if (!entry) {
      return s
    }
    pendingRequest = entry
    return removePendingRequest(s, { requestId })
  })
  return pendingRequest
}

/** Removes and returns every pending entry. */
export function takeAllPendingRequests(store: StoreApi<ConnectionState>): PendingRequest[] {
  let pending: PendingRequest[] = []
  store.setState((s) => {
    pending = Array.from(s.pendingRequests.values())
    return clearPendingRequests(s)
  })
  return pending
}
