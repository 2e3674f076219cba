import { EventEmitter } from 'node:events'
import type { StoreApi } from 'zustand/vanilla'
import { bindingSettleScript, bindingShimScript, runBindingHandler } from './binding.js'
import { createCdpLoggerFromEnv, type CdpLogger } from './cdp-log.js'
import type {
  Bounds,
  CDPCommandName,
  CDPCommandParams,
  CDPCommandResult,
  CDPEventListener,
  CDPEventName,
} from './cdp-types.js'
import { readConfig } from './config.js'
import {
  addBinding,
  addPendingRequest,
  beginInvocation,
  createConnectionStore,
  endInvocation,
  markClosed,
  nextMessageId,
  setSession,
  setWindowId,
  takeAllPendingRequests,
  takePendingRequest,
  type BindingHandler,
  type ConnectionState,
} from './connection-state.js'
import { createLoggerFromConfig, type Logger } from './create-logger.js'
import { Dispatcher } from './dispatcher.js'
import { RequestTimeoutError, TabwireError, TransportClosedError } from './errors.js'
import {
  hasExited,
  launchBrowserProcess,
  waitForDevToolsUrl,
  type BrowserProcess,
  type SpawnProcess,
} from './handshake.js'
import { attachToTarget, discoverPageTarget } from './negotiator.js'
import { createCommand, type BindingCall } from './protocol.js'
import { openTransport, type Transport } from './transport.js'

export type LaunchOptions = {
  executable: string
  /** Full argument vector for the browser, including the remote debugging flag. */
  args: string[]
  logger?: Logger
  /** Protocol traffic log. Defaults to TABWIRE_CDP_LOG. */
  cdpLogger?: CdpLogger
  handshakeTimeout?: number
  /** Default timeout for every request. No timeout when unset. */
  requestTimeout?: number
  spawnProcess?: SpawnProcess
}

export type SendOptions = {
  timeout?: number
}

export type PngOptions = {
  /** Region to capture. Defaults to the SVG root element bounds, or an A4 page. */
  clip?: { x: number; y: number; width: number; height: number }
  /** ARGB, e.g. 0xffffffff for opaque white. */
  background?: number
  scale?: number
}

/** Page area used for captures when the document gives none: A4 at 96 dpi. */
const A4_CLIP = { x: 0, y: 0, width: 816, height: 1056 }

const DEFAULT_CLIP_SCRIPT = `document.rootElement ? [document.rootElement.x.baseVal.value, document.rootElement.y.baseVal.value, document.rootElement.width.baseVal.value, document.rootElement.height.baseVal.value] : [${A4_CLIP.x}, ${A4_CLIP.y}, ${A4_CLIP.width}, ${A4_CLIP.height}]`

const DISABLE_CONTEXT_MENU_SCRIPT = `window.addEventListener('contextmenu', (event) => event.preventDefault(), true);`

const DISABLE_SHORTCUTS_SCRIPT = `(() => {
  const blockedWithModifier = new Set(['f', 'g', 'h', 'j', 'n', 'o', 'p', 'r', 's', 't', 'u', 'w', '+', '-', '=', '0']);
  const blockedAlone = new Set(['F3', 'F5', 'F6', 'F7', 'F12', 'BrowserBack', 'BrowserForward', 'BrowserRefresh']);
  window.addEventListener('keydown', (event) => {
    const key = event.key.length === 1 ? event.key.toLowerCase() : event.key;
    const modified = event.ctrlKey || event.metaKey;
    if ((modified && blockedWithModifier.has(key)) || blockedAlone.has(key) || (event.altKey && (key === 'ArrowLeft' || key === 'ArrowRight'))) {
      event.preventDefault();
    }
  }, true);
})()`

function readClip(value: unknown): { x: number; y: number; width: number; height: number } {
  if (!Array.isArray(value) || value.length !== 4) {
    return A4_CLIP
  }
  const [x, y, width, height] = value.map((n) => (typeof n === 'number' ? Math.round(n) : 0))
  return { x, y, width, height }
}

/**
 * One browser process, one page target, one session. Commands are correlated by
 * id through the pending table; a single dispatcher reads the transport and
 * settles them. Torn down by close(), kill(), transport loss or the page target
 * being destroyed; whichever comes first rejects every pending request with
 * TransportClosedError.
 */
export class Connection {
  readonly process: BrowserProcess
  /** Resolves when the browser process has exited. */
  readonly exited: Promise<void>

  private transport: Transport
  private store: StoreApi<ConnectionState>
  private logger?: Logger
  private cdpLogger?: CdpLogger
  private requestTimeout?: number
  private events = new EventEmitter()
  private abortController = new AbortController()
  private invocations = new Set<Promise<void>>()
  private dispatching: Promise<void> = Promise.resolve()

  private constructor({
    process,
    transport,
    logger,
    cdpLogger,
    requestTimeout,
  }: {
    process: BrowserProcess
    transport: Transport
    logger?: Logger
    cdpLogger?: CdpLogger
    requestTimeout?: number
  }) {
    this.process = process
    this.transport = transport
    this.logger = logger
    this.cdpLogger = cdpLogger
    this.requestTimeout = requestTimeout
    this.store = createConnectionStore()
    this.exited = new Promise((resolve) => {
      if (hasExited(process)) {
        resolve()
        return
      }
      process.once('exit', () => resolve())
    })
  }

  /**
   * Starts the browser, attaches to its page and enables the protocol domains the
   * client relies on. Any failure kills the process before the error surfaces.
   */
  static async launch(options: LaunchOptions): Promise<Connection> {
    const config = readConfig()
    const logger = options.logger ?? createLoggerFromConfig(config)
    const cdpLogger = options.cdpLogger ?? createCdpLoggerFromEnv()
    const handshakeTimeout = options.handshakeTimeout ?? config.handshakeTimeout
    const requestTimeout = options.requestTimeout ?? config.requestTimeout

    const proc = launchBrowserProcess(options.executable, options.args, options.spawnProcess)
    proc.on('error', (error) => {
      logger.error('Browser process error:', error)
    })

    let transport: Transport | undefined
    try {
      const url = await waitForDevToolsUrl(proc, { executable: options.executable, timeout: handshakeTimeout })
      logger.log(`DevTools listening on ${url}`)
      transport = await openTransport(url, { cdpLogger })
      const targetId = await discoverPageTarget(transport, { logger })
      const sessionId = await attachToTarget(transport, targetId)

      const connection = new Connection({ process: proc, transport, logger, cdpLogger, requestTimeout })
      connection.store.setState((s) => setSession(s, { targetId, sessionId }))
      connection.startDispatcher()
      try {
        await connection.enableDomains()
      } catch (error) {
        await connection.close()
        throw error
      }
      return connection
    } catch (error) {
      transport?.close()
      if (!hasExited(proc)) {
        proc.kill('SIGKILL')
      }
      throw error
    }
  }

  get targetId(): string | null {
    return this.store.getState().targetId
  }

  get sessionId(): string | null {
    return this.store.getState().sessionId
  }

  get closed(): boolean {
    return this.store.getState().closed
  }

  /** Binding invocations that have started and not yet delivered their result. */
  get activeInvocations(): number {
    return this.store.getState().activeInvocations
  }

  /** Requests waiting for a reply. */
  get pendingRequests(): number {
    return this.store.getState().pendingRequests.size
  }

  /**
   * Sends a command on the page session and resolves with the decoded reply: the
   * evaluated value for results carrying a remote object, the raw result object
   * otherwise.
   */
  send<T extends CDPCommandName>(method: T, params?: CDPCommandParams<T>, options: SendOptions = {}): Promise<unknown> {
    return this.request(method, params, options, (value) => value)
  }

  /**
   * Like send(), but resolves with the result object the protocol declares for
   * `method`, remote objects left undecoded. Errors reject the same way.
   */
  command<T extends CDPCommandName>(
    method: T,
    params?: CDPCommandParams<T>,
    options: SendOptions = {},
  ): Promise<CDPCommandResult<T>> {
    return this.request(method, params, options, (_value, frame) => {
      const reply: { result: CDPCommandResult<T> } = JSON.parse(frame)
      return reply.result
    })
  }

  private request<T extends CDPCommandName, R>(
    method: T,
    params: CDPCommandParams<T> | undefined,
    options: SendOptions,
    settle: (value: unknown, frame: string) => R,
  ): Promise<R> {
    const { closed, sessionId } = this.store.getState()
    if (closed || !sessionId) {
      return Promise.reject(new TransportClosedError())
    }
    const timeout = options.timeout ?? this.requestTimeout
    const id = nextMessageId(this.store)
    const message = JSON.stringify(createCommand(id, method, params))

    return new Promise((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined
      if (timeout !== undefined) {
        timeoutId = setTimeout(() => {
          if (takePendingRequest(this.store, id)) {
            reject(new RequestTimeoutError(method, timeout))
          }
        }, timeout)
      }

      const pendingRequest = {
        method,
        resolve: (value: unknown, frame: string) => {
          clearTimeout(timeoutId)
          resolve(settle(value, frame))
        },
        reject: (error: Error) => {
          clearTimeout(timeoutId)
          reject(error)
        },
      }
      this.store.setState((s) => addPendingRequest(s, { requestId: id, pendingRequest }))

      this.transport
        .send({ id, method: 'Target.sendMessageToTarget', params: { sessionId, message } })
        .catch((error: unknown) => {
          const pending = takePendingRequest(this.store, id)
          pending?.reject(error instanceof Error ? error : new TransportClosedError(undefined, { cause: error }))
        })
    })
  }

  on<T extends CDPEventName>(method: T, listener: CDPEventListener<T>): this {
    this.events.on(method, listener)
    return this
  }

  off<T extends CDPEventName>(method: T, listener: CDPEventListener<T>): this {
    this.events.off(method, listener)
    return this
  }

  evaluate(expression: string, options?: SendOptions): Promise<unknown> {
    return this.send('Runtime.evaluate', { expression, awaitPromise: true, returnByValue: true }, options)
  }

  async load(url: string): Promise<void> {
    await this.send('Page.navigate', { url })
  }

  async reload({ disableCache = false }: { disableCache?: boolean } = {}): Promise<void> {
    if (!disableCache) {
      await this.send('Page.reload')
      return
    }
    await this.send('Network.setCacheDisabled', { cacheDisabled: true })
    try {
      await this.send('Page.reload')
    } catch (error) {
      await this.send('Network.setCacheDisabled', { cacheDisabled: false }).catch((restoreError: unknown) => {
        this.logger?.error('Failed to re-enable the cache after a failed reload:', restoreError)
      })
      throw error
    }
    await this.send('Network.setCacheDisabled', { cacheDisabled: false })
  }

  back(): Promise<void> {
    return this.navigateHistory(-1)
  }

  forward(): Promise<void> {
    return this.navigateHistory(1)
  }

  private async navigateHistory(delta: number): Promise<void> {
    const { currentIndex, entries } = await this.command('Page.getNavigationHistory')
    const index = currentIndex + delta
    if (index < 0 || index >= entries.length) {
      throw new TabwireError(
        `Invalid history offset ${delta}: entry ${index} is outside a history of ${entries.length}`,
      )
    }
    await this.send('Page.navigateToHistoryEntry', { entryId: entries[index].id })
  }

  /** Runs `script` in every new document and once in the current one. */
  async addScriptToEvaluateOnNewDocument(script: string): Promise<void> {
    await this.send('Page.addScriptToEvaluateOnNewDocument', { source: script })
    await this.evaluate(script)
  }

  disableContextMenu(): Promise<void> {
    return this.addScriptToEvaluateOnNewDocument(DISABLE_CONTEXT_MENU_SCRIPT)
  }

  /** Blocks browser shortcuts such as Ctrl-N, Ctrl-R and F5 in the page. */
  disableDefaultShortcuts(): Promise<void> {
    return this.addScriptToEvaluateOnNewDocument(DISABLE_SHORTCUTS_SCRIPT)
  }

  /**
   * Exposes `handler` to the page as `window[name]`, an async function. Calling
   * bind() again with the same name replaces the handler. The browser keeps the
   * first binding for a name, so the primitive and shim are only installed once.
   */
  async bind(name: string, handler: BindingHandler): Promise<void> {
    const bound = this.store.getState().bindings.has(name)
    this.store.setState((s) => addBinding(s, { name, handler }))
    if (bound) {
      return
    }
    await this.send('Runtime.addBinding', { name })
    await this.addScriptToEvaluateOnNewDocument(bindingShimScript(name))
  }

  async setBounds(bounds: Bounds): Promise<void> {
    const windowState = bounds.windowState ?? 'normal'
    const windowId = await this.resolveWindowId()
    await this.send('Browser.setWindowBounds', {
      windowId,
      bounds: windowState === 'normal' ? { ...bounds, windowState } : { windowState },
    })
  }

  async bounds(): Promise<Bounds> {
    const windowId = await this.resolveWindowId()
    const { bounds } = await this.command('Browser.getWindowBounds', { windowId })
    return bounds
  }

  /** Prints the page to PDF with a paper size given in CSS pixels. */
  async pdf({ width, height }: { width: number; height: number }): Promise<Buffer> {
    const { data } = await this.command('Page.printToPDF', { paperWidth: width / 96, paperHeight: height / 96 })
    return Buffer.from(data, 'base64')
  }

  async png({ clip, background = 0xffffffff, scale = 1 }: PngOptions = {}): Promise<Buffer> {
    const region = clip ?? readClip(await this.evaluate(DEFAULT_CLIP_SCRIPT))
    await this.send('Emulation.setDefaultBackgroundColorOverride', {
      color: {
        r: (background >>> 16) & 0xff,
        g: (background >>> 8) & 0xff,
        b: background & 0xff,
        a: ((background >>> 24) & 0xff) / 255,
      },
    })
    const { data } = await this.command('Page.captureScreenshot', { clip: { ...region, scale } })
    return Buffer.from(data, 'base64')
  }

  /** Closes the socket and kills the browser without waiting. Safe to call twice. */
  kill(): void {
    this.teardown(new TransportClosedError())
    if (!hasExited(this.process)) {
      this.process.kill('SIGKILL')
    }
  }

  /** kill(), then waits for the browser to exit and for running binding calls to finish. */
  async close(): Promise<void> {
    this.kill()
    await Promise.allSettled(Array.from(this.invocations))
    await this.dispatching
    await this.exited
    await this.cdpLogger?.flush()
  }

  private async enableDomains(): Promise<void> {
    await this.send('Page.enable')
    await this.send('Target.setAutoAttach', { autoAttach: true, waitForDebuggerOnStart: false })
    await this.send('Network.enable')
    await this.send('Runtime.enable')
    await this.send('Security.enable')
    await this.send('Performance.enable')
    await this.send('Log.enable')
  }

  private startDispatcher(): void {
    const dispatcher = new Dispatcher({
      transport: this.transport,
      store: this.store,
      logger: this.logger,
      onEvent: (method, params) => this.emitEvent(method, params),
      onBindingCall: (call) => this.startInvocation(call),
      onTargetDestroyed: () => {
        this.logger?.log('Page target destroyed, shutting down')
        this.kill()
      },
      onTransportClosed: (error) => this.teardown(error),
    })
    this.dispatching = dispatcher.run()
  }

  private emitEvent(method: string, params: Record<string, unknown>): void {
    try {
      this.events.emit(method, params)
    } catch (error) {
      this.logger?.error(`Listener for ${method} threw:`, error)
    }
  }

  private async resolveWindowId(): Promise<number> {
    const { windowId, targetId } = this.store.getState()
    if (windowId !== null) {
      return windowId
    }
    if (!targetId) {
      throw new TransportClosedError()
    }
    const result = await this.command('Browser.getWindowForTarget', { targetId })
    this.store.setState((s) => setWindowId(s, { windowId: result.windowId }))
    return result.windowId
  }

  /** Starts a binding invocation on its own task. The dispatcher never waits for it. */
  private startInvocation(call: BindingCall): void {
    const { bindings, closed } = this.store.getState()
    const handler = bindings.get(call.name)
    if (!handler || closed) {
      return
    }
    this.store.setState(beginInvocation)
    const invocation: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.invoke(call, handler))
      .catch((error: unknown) => {
        if (!(error instanceof TransportClosedError)) {
          this.logger?.error(`Binding ${call.name} could not deliver its result:`, error)
        }
      })
      .finally(() => {
        this.store.setState(endInvocation)
        this.invocations.delete(invocation)
      })
    this.invocations.add(invocation)
  }

  private async invoke(call: BindingCall, handler: BindingHandler): Promise<void> {
    const outcome = await runBindingHandler(handler, call.payload.args, {
      name: call.name,
      signal: this.abortController.signal,
    })
    if (this.closed) {
      return
    }
    await this.send('Runtime.evaluate', {
      expression: bindingSettleScript({ name: call.name, seq: call.payload.seq, outcome }),
      contextId: call.executionContextId,
    })
  }

  private teardown(error: TransportClosedError): void {
    if (this.store.getState().closed) {
      return
    }
    this.store.setState(markClosed)
    this.abortController.abort()
    this.transport.close()
    for (const pending of takeAllPendingRequests(this.store)) {
      pending.reject(error)
    }
  }
}
