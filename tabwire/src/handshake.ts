import { spawn } from 'node:child_process'
import type { EventEmitter } from 'node:events'
import readline from 'node:readline'
import type { Readable } from 'node:stream'
import { HandshakeError, LaunchError } from './errors.js'

/** The part of a spawned child process the client relies on. ChildProcess satisfies it. */
export interface BrowserProcess extends EventEmitter {
  readonly pid?: number
  readonly stderr: Readable | null
  readonly exitCode: number | null
  readonly signalCode: NodeJS.Signals | null
  kill(signal?: NodeJS.Signals | number): boolean
}

export type SpawnProcess = (executable: string, args: string[]) => BrowserProcess

export const spawnBrowserProcess: SpawnProcess = (executable, args) => {
  return spawn(executable, args, { stdio: ['ignore', 'ignore', 'pipe'] })
}

const DEVTOOLS_LISTENING_PATTERN = /^DevTools listening on (ws:\/\/.*?)\r?$/

export function matchDevToolsUrl(line: string): string | null {
  const match = DEVTOOLS_LISTENING_PATTERN.exec(line)
  return match ? match[1] : null
}

export function hasExited(proc: BrowserProcess): boolean {
  return proc.exitCode !== null || proc.signalCode !== null
}

export function launchBrowserProcess(
  executable: string,
  args: string[],
  spawnProcess: SpawnProcess = spawnBrowserProcess,
): BrowserProcess {
  try {
    return spawnProcess(executable, args)
  } catch (error) {
    throw new LaunchError(executable, { cause: error })
  }
}

/**
 * Reads the process stderr line by line until the browser announces its DevTools
 * endpoint. After the match the rest of stderr keeps flowing and is discarded, so
 * the browser never blocks on a full pipe.
 */
export function waitForDevToolsUrl(
  proc: BrowserProcess,
  { executable, timeout }: { executable: string; timeout: number },
): Promise<string> {
  return new Promise((resolve, reject) => {
    const stderr = proc.stderr
    if (!stderr) {
      reject(new HandshakeError('Browser process has no stderr pipe'))
      return
    }

    const rl = readline.createInterface({ input: stderr, crlfDelay: Infinity })
    let settled = false

    const finish = (settle: () => void) => {
      if (settled) {
        return
      }
      settled = true
      clearTimeout(timer)
      rl.off('line', onLine)
      rl.off('close', onClose)
      proc.off('error', onError)
      rl.close()
      settle()
    }

    const onLine = (line: string) => {
      const url = matchDevToolsUrl(line)
      if (!url) {
        return
      }
      finish(() => {
        stderr.resume()
        resolve(url)
      })
    }

    const onClose = () => {
      finish(() => reject(new HandshakeError('Browser stderr closed before the DevTools address was printed')))
    }

    const onError = (error: Error) => {
      finish(() => reject(new LaunchError(executable, { cause: error })))
    }

    const timer = setTimeout(() => {
      finish(() => reject(new HandshakeError(`Browser did not print a DevTools address within ${timeout}ms`)))
    }, timeout)

    rl.on('line', onLine)
    rl.on('close', onClose)
    proc.once('error', onError)
  })
}
