import fs from 'node:fs'
import { readConfig } from './config.js'
import { ensureParentDir } from './utils.js'

export type CdpLogEntry = {
  timestamp: string
  direction: 'to-browser' | 'from-browser'
  message: unknown
}

export type CdpLogger = {
  log(entry: CdpLogEntry): void
  /** Resolves once every entry logged so far is on disk. */
  flush(): Promise<void>
  logFilePath: string
}

function truncateString(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value
  }
  const truncatedCount = value.length - maxLength
  return `${value.slice(0, maxLength)}…[truncated ${truncatedCount} chars]`
}

function createTruncatingReplacer({ maxStringLength }: { maxStringLength: number }) {
  const seen = new WeakSet<object>()
  return (_key: string, value: unknown) => {
    if (typeof value === 'string') {
      return truncateString(value, maxStringLength)
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]'
      }
      seen.add(value)
    }
    return value
  }
}

export function createCdpLogger({
  logFilePath,
  maxStringLength,
}: { logFilePath: string; maxStringLength?: number }): CdpLogger {
  ensureParentDir(logFilePath)
  fs.writeFileSync(logFilePath, '')

  let queue: Promise<void> = Promise.resolve()
  const maxLength = maxStringLength ?? readConfig().cdpLogMaxStringLength

  const log = (entry: CdpLogEntry): void => {
    const replacer = createTruncatingReplacer({ maxStringLength: maxLength })
    const line = JSON.stringify(entry, replacer)
    queue = queue.then(() => fs.promises.appendFile(logFilePath, `${line}\n`))
  }

  return {
    log,
    flush: () => queue,
    logFilePath,
  }
}

/** Traffic logger from TABWIRE_CDP_LOG, or `undefined` when it is not set. */
export function createCdpLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): CdpLogger | undefined {
  const config = readConfig(env)
  if (!config.cdpLogFilePath) {
    return undefined
  }
  return createCdpLogger({
    logFilePath: config.cdpLogFilePath,
    maxStringLength: config.cdpLogMaxStringLength,
  })
}
