import os from 'node:os'
import path from 'node:path'
import { describe, test, expect } from 'vitest'
import { readConfig } from './config.js'

describe('readConfig', () => {
  test('defaults', () => {
    expect(readConfig({})).toEqual({
      browserPath: undefined,
      dataDir: path.join(os.homedir(), '.tabwire'),
      logFilePath: undefined,
      handshakeTimeout: 30000,
      requestTimeout: undefined,
      cdpLogFilePath: undefined,
      cdpLogMaxStringLength: 2000,
    })
  })

  test('reads every variable', () => {
    const config = readConfig({
      TABWIRE_BROWSER_PATH: '/opt/chromium/chrome',
      TABWIRE_DATA_DIR: '/tmp/tabwire-data',
      TABWIRE_LOG: 'true',
      TABWIRE_HANDSHAKE_TIMEOUT_MS: '5000',
      TABWIRE_REQUEST_TIMEOUT_MS: '250',
      TABWIRE_CDP_LOG: '1',
      TABWIRE_CDP_LOG_MAX_STRING_LENGTH: '80',
    })
    expect(config).toEqual({
      browserPath: '/opt/chromium/chrome',
      dataDir: '/tmp/tabwire-data',
      logFilePath: path.join('/tmp/tabwire-data', 'tabwire.log'),
      handshakeTimeout: 5000,
      requestTimeout: 250,
      cdpLogFilePath: path.join('/tmp/tabwire-data', 'cdp.jsonl'),
      cdpLogMaxStringLength: 80,
    })
  })

  test('log values other than 1 or true are file paths', () => {
    expect(readConfig({ TABWIRE_CDP_LOG: '/tmp/traffic.jsonl' }).cdpLogFilePath).toBe('/tmp/traffic.jsonl')
    expect(readConfig({ TABWIRE_LOG: '/tmp/tabwire-run.log' }).logFilePath).toBe('/tmp/tabwire-run.log')
  })

  test('rejects invalid numbers', () => {
    expect(() => readConfig({ TABWIRE_REQUEST_TIMEOUT_MS: 'soon' })).toThrow(
      'TABWIRE_REQUEST_TIMEOUT_MS must be a positive integer, got "soon"',
    )
    expect(() => readConfig({ TABWIRE_HANDSHAKE_TIMEOUT_MS: '0' })).toThrow('TABWIRE_HANDSHAKE_TIMEOUT_MS')
  })
})
