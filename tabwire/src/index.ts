export { App, BLANK_PAGE_URL, DEFAULT_BROWSER_ARGS, buildBrowserArgs, createApp, type AppOptions } from './app.js'
export { bindFunction, type ArgumentGuard } from './bind-function.js'
export type {
  Bounds,
  CDPCommandName,
  CDPCommandParams,
  CDPCommandResult,
  CDPEventListener,
  CDPEventName,
  CDPEventParams,
  Protocol,
  WindowState,
} from './cdp-types.js'
export { createCdpLogger, createCdpLoggerFromEnv, type CdpLogEntry, type CdpLogger } from './cdp-log.js'
export { readConfig, type TabwireConfig } from './config.js'
export type { BindingContext, BindingHandler } from './connection-state.js'
export { Connection, type LaunchOptions, type PngOptions, type SendOptions } from './connection.js'
export { createConsoleLogger, createFileLogger, createLoggerFromConfig, type Logger } from './create-logger.js'
export {
  ArgumentMismatchError,
  ArgumentTypeError,
  ConnectError,
  HandshakeError,
  LaunchError,
  RemoteError,
  RequestTimeoutError,
  TabwireError,
  TargetError,
  TransportClosedError,
} from './errors.js'
export { spawnBrowserProcess, type BrowserProcess, type SpawnProcess } from './handshake.js'
