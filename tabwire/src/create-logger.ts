import fs from 'node:fs'
import util from 'node:util'
import pc from 'picocolors'
import type { TabwireConfig } from './config.js'
import { ensureParentDir } from './utils.js'

export type Logger = {
  log(...args: unknown[]): void
  error(...args: unknown[]): void
}

function formatArgs(args: unknown[], colors: boolean): string {
  return args
    .map((arg) => (typeof arg === 'string' ? arg : util.inspect(arg, { depth: null, colors })))
    .join(' ')
}

/** Truncates `logFilePath` and appends one uncolored line per call. */
export function createFileLogger({ logFilePath }: { logFilePath: string }): Logger {
  ensureParentDir(logFilePath)
  fs.writeFileSync(logFilePath, '')

  const log = (...args: unknown[]) => {
    fs.appendFileSync(logFilePath, formatArgs(args, false) + '\n')
  }

  return {
    log,
    error: log,
  }
}

/** Writes to stderr, so stdout stays free for the host program. */
export function createConsoleLogger({ prefix = 'tabwire' }: { prefix?: string } = {}): Logger {
  return {
    log(...args) {
      process.stderr.write(`${pc.dim(`[${prefix}]`)} ${formatArgs(args, pc.isColorSupported)}\n`)
    },
    error(...args) {
      process.stderr.write(`${pc.red(`[${prefix}]`)} ${formatArgs(args, pc.isColorSupported)}\n`)
    },
  }
}

/** File logger when TABWIRE_LOG is set, stderr otherwise. */
export function createLoggerFromConfig(config: Pick<TabwireConfig, 'logFilePath'>): Logger {
  if (config.logFilePath) {
    return createFileLogger({ logFilePath: config.logFilePath })
  }
  return createConsoleLogger()
}
