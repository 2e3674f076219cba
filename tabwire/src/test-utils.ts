/**
 * In-process stand-ins for a browser: a DevTools WebSocket endpoint served with
 * hono on 127.0.0.1 whose page is a node:vm context, and a process object that
 * announces that endpoint on stderr.
 */
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import vm from 'node:vm'
import { serve, type ServerType } from '@hono/node-server'
import { createNodeWebSocket } from '@hono/node-ws'
import { Hono } from 'hono'
import type { WSContext } from 'hono/ws'
import type { Logger } from './create-logger.js'
import type { BrowserProcess, SpawnProcess } from './handshake.js'
import { isRecord } from './utils.js'

export const PAGE_TARGET_ID = 'page-target-1'
export const SESSION_ID = 'session-1'
export const WINDOW_ID = 7
export const EXECUTION_CONTEXT_ID = 1
export const BLANK_URL = 'about:blank'

type Frame = Record<string, unknown>

export type SessionCommand = {
  id: number
  method: string
  params: Record<string, unknown>
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  )
}

function isErrorObject(value: unknown): value is object {
  return Object.prototype.toString.call(value) === '[object Error]'
}

function describeError(value: object): string {
  return `${String(Reflect.get(value, 'name'))}: ${String(Reflect.get(value, 'message'))}`
}

/** Remote object for a page value, as Runtime.evaluate with returnByValue reports it. */
export function toRemoteObject(value: unknown): Frame {
  if (value === undefined) {
    return { type: 'undefined' }
  }
  if (value === null) {
    return { type: 'object', subtype: 'null', value: null }
  }
  if (isErrorObject(value)) {
    return {
      type: 'object',
      subtype: 'error',
      className: String(Reflect.get(value, 'name')),
      description: describeError(value),
    }
  }
  if (typeof value === 'function') {
    return { type: 'function', description: String(value) }
  }
  if (typeof value === 'object') {
    const remote: Frame = { type: 'object', value: JSON.parse(JSON.stringify(value)) }
    if (Array.isArray(value)) {
      remote.subtype = 'array'
    }
    return remote
  }
  if (typeof value === 'bigint') {
    return { type: 'bigint', unserializableValue: `${value}n`, description: `${value}n` }
  }
  if (typeof value === 'number' && (!Number.isFinite(value) || Object.is(value, -0))) {
    const text = Object.is(value, -0) ? '-0' : String(value)
    return { type: 'number', unserializableValue: text, description: text }
  }
  return { type: typeof value, value }
}

/** A page backed by a vm context. `window` is the context global. */
export class FakePage {
  readonly context: vm.Context
  readonly scriptsOnNewDocument: string[] = []
  readonly bindings: string[] = []
  /** Event types passed to window.addEventListener. */
  readonly eventListeners: string[] = []
  private emitEvent: (method: string, params: Frame) => void

  constructor(emitEvent: (method: string, params: Frame) => void) {
    this.emitEvent = emitEvent
    this.context = vm.createContext({
      document: {},
      addEventListener: (type: unknown) => {
        this.eventListeners.push(String(type))
      },
      console: {
        log: (...args: unknown[]) => this.emitConsole('log', args),
        error: (...args: unknown[]) => this.emitConsole('error', args),
      },
    })
    vm.runInContext('var window = globalThis;', this.context)
  }

  async evaluate(expression: string, { awaitPromise = false }: { awaitPromise?: boolean } = {}): Promise<Frame> {
    let script: vm.Script
    try {
      script = new vm.Script(expression)
    } catch (error) {
      return this.exceptionResult(error)
    }
    try {
      let value: unknown = script.runInContext(this.context)
      if (awaitPromise && isThenable(value)) {
        value = await value
      }
      return { result: toRemoteObject(value) }
    } catch (thrown) {
      return this.exceptionResult(thrown)
    }
  }

  /** Like the browser, a name that is already bound keeps its first primitive. */
  addBinding(name: string): void {
    if (this.bindings.includes(name)) {
      return
    }
    this.bindings.push(name)
    this.context[name] = (payload: unknown) => {
      this.emitEvent('Runtime.bindingCalled', {
        name,
        payload: String(payload),
        executionContextId: EXECUTION_CONTEXT_ID,
      })
    }
  }

  private exceptionResult(thrown: unknown): Frame {
    const exception = toRemoteObject(thrown)
    return {
      result: exception,
      exceptionDetails: {
        exceptionId: 1,
        text: 'Uncaught',
        lineNumber: 0,
        columnNumber: 0,
        exception,
      },
    }
  }

  private emitConsole(type: string, args: unknown[]): void {
    this.emitEvent('Runtime.consoleAPICalled', {
      type,
      args: args.map(toRemoteObject),
      executionContextId: EXECUTION_CONTEXT_ID,
      timestamp: 0,
    })
  }
}

type HistoryEntry = { id: number; url: string; title: string }

type Bounds = {
  left?: number
  top?: number
  width?: number
  height?: number
  windowState?: string
}

export type FakeBrowserOptions = {
  /** Error message for the Target.setDiscoverTargets reply. */
  discoverError?: string
  /** Error message for the Target.attachToTarget reply. */
  attachError?: string
  /** Skip the page target announcement; only a service worker shows up. */
  withoutPage?: boolean
}

/** A fake DevTools endpoint with a single page target. */
export class FakeBrowser {
  readonly page: FakePage
  /** Session commands in arrival order. */
  readonly commands: SessionCommand[] = []
  /** Every top-level frame received, in arrival order. */
  readonly frames: Frame[] = []
  /**
   * Session methods answered with a protocol error. A function picks the
   * message from the params, or returns undefined to let the call through.
   */
  readonly failures = new Map<string, string | ((params: Record<string, unknown>) => string | undefined)>()
  /** Session methods never answered. */
  readonly hanging = new Set<string>()
  /** When set, every sendMessageToTarget wrapper is rejected with this message. */
  wrapperError: string | undefined
  history: HistoryEntry[] = [{ id: 1, url: BLANK_URL, title: '' }]
  currentIndex = 0
  bounds: Bounds = { left: 10, top: 20, width: 800, height: 600, windowState: 'normal' }
  port = 0

  private options: FakeBrowserOptions
  private server: ServerType | undefined
  private socket: WSContext | undefined
  private nextEntryId = 2

  constructor(options: FakeBrowserOptions = {}) {
    this.options = options
    this.page = new FakePage((method, params) => this.emitSessionEvent(method, params))
  }

  get url(): string {
    return `ws://127.0.0.1:${this.port}/devtools/browser/fake`
  }

  get connected(): boolean {
    return this.socket !== undefined
  }

  /** Session commands received for one method. */
  commandsFor(method: string): SessionCommand[] {
    return this.commands.filter((command) => command.method === method)
  }

  async start(): Promise<void> {
    const app = new Hono()
    const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app })

    app.get(
      '/devtools/browser/:id',
      upgradeWebSocket(() => ({
        onOpen: (_event, ws) => {
          this.socket = ws
        },
        onMessage: (event, ws) => {
          void this.onFrame(event.data.toString(), ws)
        },
        onClose: () => {
          this.socket = undefined
        },
      })),
    )

    this.port = await new Promise<number>((resolve) => {
      this.server = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (info) => resolve(info.port))
      injectWebSocket(this.server)
    })
  }

  /** Sends a top-level frame to the connected client. */
  emit(frame: Frame): void {
    this.socket?.send(JSON.stringify(frame))
  }

  emitSessionEvent(method: string, params: Frame): void {
    this.emitSessionMessage({ method, params })
  }

  destroyTarget(targetId = PAGE_TARGET_ID): void {
    this.emit({ method: 'Target.targetDestroyed', params: { targetId } })
  }

  /** Closes the socket from the browser side, as a crash would. */
  dropConnection(): void {
    this.socket?.close(1011, 'Browser crashed')
  }

  close(): void {
    this.socket?.close(1000, 'Server stopped')
    this.socket = undefined
    this.server?.close()
  }

  private emitSessionMessage(message: Frame, sessionId = SESSION_ID): void {
    this.emit({
      method: 'Target.receivedMessageFromTarget',
      params: { sessionId, targetId: PAGE_TARGET_ID, message: JSON.stringify(message) },
    })
  }

  private async onFrame(text: string, ws: WSContext): Promise<void> {
    const frame: unknown = JSON.parse(text)
    if (!isRecord(frame) || typeof frame.id !== 'number' || typeof frame.method !== 'string') {
      return
    }
    this.frames.push(frame)
    const id = frame.id
    const params: Record<string, unknown> = isRecord(frame.params) ? frame.params : {}
    const reply = (body: Frame) => ws.send(JSON.stringify({ id, ...body }))

    switch (frame.method) {
      case 'Target.setDiscoverTargets': {
        if (this.options.discoverError) {
          reply({ error: { code: -32000, message: this.options.discoverError } })
          return
        }
        reply({ result: {} })
        this.emit({
          method: 'Target.targetCreated',
          params: { targetInfo: { targetId: 'worker-1', type: 'service_worker', title: '', url: '', attached: false } },
        })
        if (!this.options.withoutPage) {
          this.emit({
            method: 'Target.targetCreated',
            params: { targetInfo: { targetId: PAGE_TARGET_ID, type: 'page', title: '', url: BLANK_URL, attached: false } },
          })
        }
        return
      }
      case 'Target.attachToTarget': {
        if (this.options.attachError) {
          reply({ error: { code: -32602, message: this.options.attachError } })
          return
        }
        this.emit({ method: 'Target.attachedToTarget', params: { sessionId: SESSION_ID, waitingForDebugger: false } })
        reply({ result: { sessionId: SESSION_ID } })
        return
      }
      case 'Target.sendMessageToTarget': {
        if (this.wrapperError) {
          reply({ error: { code: -32602, message: this.wrapperError } })
          return
        }
        reply({ result: {} })
        if (params.sessionId !== SESSION_ID || typeof params.message !== 'string') {
          return
        }
        await this.onSessionMessage(params.message)
        return
      }
      default: {
        reply({ result: {} })
      }
    }
  }

  private async onSessionMessage(text: string): Promise<void> {
    const message: unknown = JSON.parse(text)
    if (!isRecord(message) || typeof message.id !== 'number' || typeof message.method !== 'string') {
      return
    }
    const command: SessionCommand = {
      id: message.id,
      method: message.method,
      params: isRecord(message.params) ? message.params : {},
    }
    this.commands.push(command)

    if (this.hanging.has(command.method)) {
      return
    }
    const rule = this.failures.get(command.method)
    const failure = typeof rule === 'function' ? rule(command.params) : rule
    if (failure !== undefined) {
      this.emitSessionMessage({ id: command.id, error: { code: -32000, message: failure } })
      return
    }
    const result = await this.runSessionCommand(command)
    this.emitSessionMessage({ id: command.id, result })
  }

  private async runSessionCommand({ method, params }: SessionCommand): Promise<Frame> {
    switch (method) {
      case 'Runtime.evaluate': {
        const expression = typeof params.expression === 'string' ? params.expression : ''
        return this.page.evaluate(expression, { awaitPromise: params.awaitPromise === true })
      }
      case 'Runtime.addBinding': {
        this.page.addBinding(String(params.name))
        return {}
      }
      case 'Page.addScriptToEvaluateOnNewDocument': {
        this.page.scriptsOnNewDocument.push(String(params.source))
        return { identifier: String(this.page.scriptsOnNewDocument.length) }
      }
      case 'Page.navigate': {
        const entry = { id: this.nextEntryId++, url: String(params.url), title: '' }
        this.history = [...this.history.slice(0, this.currentIndex + 1), entry]
        this.currentIndex = this.history.length - 1
        return { frameId: 'frame-1', loaderId: `loader-${entry.id}` }
      }
      case 'Page.getNavigationHistory': {
        return { currentIndex: this.currentIndex, entries: this.history }
      }
      case 'Page.navigateToHistoryEntry': {
        const index = this.history.findIndex((entry) => entry.id === params.entryId)
        if (index >= 0) {
          this.currentIndex = index
        }
        return {}
      }
      case 'Browser.getWindowForTarget': {
        return { windowId: WINDOW_ID, bounds: this.bounds }
      }
      case 'Browser.getWindowBounds': {
        return { bounds: this.bounds }
      }
      case 'Browser.setWindowBounds': {
        const bounds = isRecord(params.bounds) ? params.bounds : {}
        this.bounds = { ...this.bounds, ...bounds }
        return {}
      }
      case 'Page.printToPDF': {
        const data = Buffer.from(`%PDF ${String(params.paperWidth)}x${String(params.paperHeight)}`).toString('base64')
        return { data }
      }
      case 'Page.captureScreenshot': {
        return { data: Buffer.from(JSON.stringify(params.clip)).toString('base64') }
      }
      default: {
        return {}
      }
    }
  }
}

export async function startFakeBrowser(options: FakeBrowserOptions = {}): Promise<FakeBrowser> {
  const browser = new FakeBrowser(options)
  await browser.start()
  return browser
}

/** Process stand-in: prints the given stderr lines, exits when killed. */
export class FakeBrowserProcess extends EventEmitter implements BrowserProcess {
  readonly pid = 4242
  readonly stderr = new PassThrough()
  exitCode: number | null = null
  signalCode: NodeJS.Signals | null = null
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = []

  constructor({ stderrLines = [] }: { stderrLines?: string[] } = {}) {
    super()
    setImmediate(() => {
      for (const line of stderrLines) {
        this.stderr.write(`${line}\n`)
      }
    })
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal)
    if (this.exitCode !== null || this.signalCode !== null) {
      return false
    }
    setImmediate(() => this.exit(null, typeof signal === 'string' ? signal : 'SIGTERM'))
    return true
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitCode !== null || this.signalCode !== null) {
      return
    }
    this.exitCode = code
    this.signalCode = signal
    this.stderr.end()
    this.emit('exit', code, signal)
  }
}

export type FakeSpawn = SpawnProcess & {
  calls: Array<{ executable: string; args: string[] }>
  processes: FakeBrowserProcess[]
}

/** A SpawnProcess that starts FakeBrowserProcess instances announcing `browser`. */
export function createFakeSpawn(browser: FakeBrowser, { stderrLines }: { stderrLines?: string[] } = {}): FakeSpawn {
  const calls: FakeSpawn['calls'] = []
  const processes: FakeBrowserProcess[] = []
  const spawn = (executable: string, args: string[]): FakeBrowserProcess => {
    calls.push({ executable, args })
    const proc = new FakeBrowserProcess({
      stderrLines: stderrLines ?? ['[0101/000000.000000:WARNING] starting', `DevTools listening on ${browser.url}`],
    })
    processes.push(proc)
    return proc
  }
  return Object.assign(spawn, { calls, processes })
}

export type MemoryLogger = Logger & {
  lines: string[]
  errors: string[]
}

export function createMemoryLogger(): MemoryLogger {
  const lines: string[] = []
  const errors: string[] = []
  return {
    lines,
    errors,
    log: (...args) => {
      lines.push(args.map(String).join(' '))
    },
    error: (...args) => {
      errors.push(args.map(String).join(' '))
    },
  }
}
