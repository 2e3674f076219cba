import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { bindFunction, type ArgumentGuard } from './bind-function.js'
import type { Bounds } from './cdp-types.js'
import { readConfig } from './config.js'
import { Connection, type LaunchOptions } from './connection.js'
import { TabwireError } from './errors.js'

export const DEFAULT_BROWSER_ARGS: readonly string[] = [
  '--disable-background-networking',
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-breakpad',
  '--disable-client-side-phishing-detection',
  '--disable-default-apps',
  '--disable-dev-shm-usage',
  '--disable-infobars',
  '--disable-extensions',
  '--disable-features=site-per-process',
  '--disable-hang-monitor',
  '--disable-ipc-flooding-protection',
  '--disable-popup-blocking',
  '--disable-prompt-on-repost',
  '--disable-renderer-backgrounding',
  '--disable-sync',
  '--disable-translate',
  '--disable-windows10-custom-titlebar',
  '--metrics-recording-only',
  '--no-first-run',
  '--no-default-browser-check',
  '--safebrowsing-disable-auto-update',
  '--disable-automation',
  '--password-store=basic',
  '--use-mock-keychain',
]

export const BLANK_PAGE_URL = 'data:text/html,<html></html>'

export type AppOptions = Pick<
  LaunchOptions,
  'logger' | 'cdpLogger' | 'handshakeTimeout' | 'requestTimeout' | 'spawnProcess'
> & {
  /** Defaults to TABWIRE_BROWSER_PATH. */
  executable?: string
  /** Page shown in the app window. A blank page when unset. */
  url?: string
  /** Browser profile directory. A temporary one, removed on close(), when unset. */
  userDataDir?: string
  width?: number
  height?: number
  /** Extra flags, appended after the defaults. */
  args?: string[]
}

export function buildBrowserArgs({
  url,
  userDataDir,
  width,
  height,
  args = [],
}: {
  url: string
  userDataDir: string
  width: number
  height: number
  args?: string[]
}): string[] {
  return [
    ...DEFAULT_BROWSER_ARGS,
    `--app=${url}`,
    `--user-data-dir=${userDataDir}`,
    `--window-size=${width},${height}`,
    ...args,
    '--remote-debugging-port=0',
  ]
}

/** A browser running a single page as an application window. */
export class App {
  readonly connection: Connection
  /** Profile directory in use. */
  readonly dir: string
  /** Resolves once the browser has exited, whoever closed it. */
  readonly done: Promise<void>
  private tempDir: string | undefined

  constructor({ connection, dir, tempDir }: { connection: Connection; dir: string; tempDir?: string }) {
    this.connection = connection
    this.dir = dir
    this.tempDir = tempDir
    this.done = connection.exited
  }

  load(url: string): Promise<void> {
    return this.connection.load(url)
  }

  evaluate(expression: string): Promise<unknown> {
    return this.connection.evaluate(expression)
  }

  bounds(): Promise<Bounds> {
    return this.connection.bounds()
  }

  setBounds(bounds: Bounds): Promise<void> {
    return this.connection.setBounds(bounds)
  }

  /** Exposes `fn` to the page as `window[name]`. See bindFunction() for argument checks. */
  bind<A extends unknown[], R>(name: string, fn: (...args: A) => R | Promise<R>, guard: ArgumentGuard<A>): Promise<void> {
    return this.connection.bind(name, bindFunction(fn, guard))
  }

  /** Stops the browser, then removes the temporary profile if one was created. */
  async close(): Promise<void> {
    await this.connection.close()
    if (this.tempDir) {
      await fs.promises.rm(this.tempDir, { recursive: true, force: true })
      this.tempDir = undefined
    }
  }
}

export async function createApp(options: AppOptions = {}): Promise<App> {
  const executable = options.executable ?? readConfig().browserPath
  if (!executable) {
    throw new TabwireError('No browser executable: pass `executable` or set TABWIRE_BROWSER_PATH')
  }

  const tempDir = options.userDataDir ? undefined : await fs.promises.mkdtemp(path.join(os.tmpdir(), 'tabwire-'))
  const dir = options.userDataDir ?? tempDir
  if (!dir) {
    throw new TabwireError('No browser profile directory')
  }

  const args = buildBrowserArgs({
    url: options.url || BLANK_PAGE_URL,
    userDataDir: dir,
    width: options.width ?? 1024,
    height: options.height ?? 768,
    args: options.args,
  })

  try {
    const connection = await Connection.launch({
      executable,
      args,
      logger: options.logger,
      cdpLogger: options.cdpLogger,
      handshakeTimeout: options.handshakeTimeout,
      requestTimeout: options.requestTimeout,
      spawnProcess: options.spawnProcess,
    })
    return new App({ connection, dir, tempDir })
  } catch (error) {
    if (tempDir) {
      await fs.promises.rm(tempDir, { recursive: true, force: true })
    }
    throw error
  }
}
