// Runtime configuration, read from TABWIRE_* environment variables.

import os from 'node:os'
import path from 'node:path'
import { TabwireError } from './errors.js'

export type TabwireConfig = {
  /** Browser executable used when none is passed explicitly. Discovery is left to the caller. */
  browserPath: string | undefined
  dataDir: string
  /** Diagnostic log file, or `undefined` to log to stderr. */
  logFilePath: string | undefined
  handshakeTimeout: number
  /** Default per-request timeout in ms. `undefined` waits until a reply or teardown. */
  requestTimeout: number | undefined
  /** JSONL file for protocol traffic, or `undefined` when traffic logging is off. */
  cdpLogFilePath: string | undefined
  cdpLogMaxStringLength: number
}

const DEFAULT_HANDSHAKE_TIMEOUT = 30000
const DEFAULT_CDP_LOG_MAX_STRING_LENGTH = 2000

function readPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') {
    return undefined
  }
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new TabwireError(`${name} must be a positive integer, got "${raw}"`)
  }
  return value
}

/** `1` or `true` selects the default file under the data dir, any other value is a path. */
function readLogPath(raw: string | undefined, defaultPath: string): string | undefined {
  if (raw === '1' || raw === 'true') {
    return defaultPath
  }
  return raw ? path.resolve(raw) : undefined
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): TabwireConfig {
  const dataDir = env.TABWIRE_DATA_DIR || path.join(os.homedir(), '.tabwire')

  return {
    browserPath: env.TABWIRE_BROWSER_PATH || undefined,
    dataDir,
    logFilePath: readLogPath(env.TABWIRE_LOG, path.join(dataDir, 'tabwire.log')),
    handshakeTimeout: readPositiveInt(env, 'TABWIRE_HANDSHAKE_TIMEOUT_MS') ?? DEFAULT_HANDSHAKE_TIMEOUT,
    requestTimeout: readPositiveInt(env, 'TABWIRE_REQUEST_TIMEOUT_MS'),
    cdpLogFilePath: readLogPath(env.TABWIRE_CDP_LOG, path.join(dataDir, 'cdp.jsonl')),
    cdpLogMaxStringLength:
      readPositiveInt(env, 'TABWIRE_CDP_LOG_MAX_STRING_LENGTH') ?? DEFAULT_CDP_LOG_MAX_STRING_LENGTH,
  }
}
