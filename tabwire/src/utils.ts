import fs from 'node:fs'
import path from 'node:path'

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function ensureParentDir(filePath: string): void {
  const dir = path.dirname(filePath)
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true })
  }
}

/** JSON text for a value, `null` for values JSON has no encoding for (undefined, functions). */
export function toJsonLiteral(value: unknown): string {
  const json = JSON.stringify(value)
  return json === undefined ? 'null' : json
}
