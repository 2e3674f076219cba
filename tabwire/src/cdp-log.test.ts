import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, describe, test, expect } from 'vitest'
import { createCdpLogger, createCdpLoggerFromEnv } from './cdp-log.js'

const tempDirs: string[] = []

function tempFile(name: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tabwire-cdp-log-'))
  tempDirs.push(dir)
  return path.join(dir, 'nested', name)
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
})

describe('createCdpLogger', () => {
  test('writes one JSON line per entry with long strings truncated', async () => {
    const logFilePath = tempFile('cdp.jsonl')
    const logger = createCdpLogger({ logFilePath, maxStringLength: 5 })

    logger.log({ timestamp: 't1', direction: 'to-browser', message: { id: 3, method: 'Page.enable' } })
    logger.log({ timestamp: 't2', direction: 'from-browser', message: { id: 3, result: { data: 'abcdefgh' } } })
    await logger.flush()

    const lines = fs.readFileSync(logFilePath, 'utf8').trim().split('\n')
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { timestamp: 't1', direction: 'to-br…[truncated 5 chars]', message: { id: 3, method: 'Page.…[truncated 6 chars]' } },
      { timestamp: 't2', direction: 'from-…[truncated 7 chars]', message: { id: 3, result: { data: 'abcde…[truncated 3 chars]' } } },
    ])
  })

  test('replaces circular references', async () => {
    const logFilePath = tempFile('cdp.jsonl')
    const logger = createCdpLogger({ logFilePath, maxStringLength: 100 })
    const message: { self?: unknown } = {}
    message.self = message

    logger.log({ timestamp: 't', direction: 'to-browser', message })
    await logger.flush()

    expect(JSON.parse(fs.readFileSync(logFilePath, 'utf8'))).toEqual({
      timestamp: 't',
      direction: 'to-browser',
      message: { self: '[Circular]' },
    })
  })
})

describe('createCdpLoggerFromEnv', () => {
  test('is off unless TABWIRE_CDP_LOG is set', () => {
    expect(createCdpLoggerFromEnv({})).toBeUndefined()
  })

  test('uses the configured path', () => {
    const logFilePath = tempFile('traffic.jsonl')
    const logger = createCdpLoggerFromEnv({ TABWIRE_CDP_LOG: logFilePath })
    expect(logger?.logFilePath).toBe(logFilePath)
    expect(fs.existsSync(logFilePath)).toBe(true)
  })
})
