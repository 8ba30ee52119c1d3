import { createWriteStream, mkdirSync } from 'node:fs'
import path from 'node:path'
import { env } from './env.js'
import { currentContext } from './middleware/requestContext.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

let stream: ReturnType<typeof createWriteStream> | null = null

export function formatValue(v: unknown) {
  if (v === null || v === undefined) return ''
  if (typeof v === 'string') return v.includes(' ') ? JSON.stringify(v) : v
  if (typeof v === 'number' || typeof v === 'boolean') return String(v)
  if (v instanceof Date) return v.toISOString()
  try {
    return JSON.stringify(v)
  } catch {
    return String(v)
  }
}

export function formatMeta(meta: Record<string, unknown> | undefined) {
  if (!meta) return ''
  const parts: string[] = []
  for (const [k, v] of Object.entries(meta)) {
    const fv = formatValue(v)
    if (!fv) continue
    parts.push(`${k}=${fv}`)
  }
  return parts.length ? ` ${parts.join(' ')}` : ''
}

function getStream() {
  if (stream) return stream

  const logFile = env.LOG_FILE
  mkdirSync(path.dirname(logFile), { recursive: true })

  stream = createWriteStream(logFile, { flags: 'a' })
  stream.on('error', (err) => {
    process.stderr.write(`logger stream error: ${String(err)}\n`)
  })

  return stream
}

/**
 * Structured line logger writing to LOG_FILE.
 *
 * Format:
 *   ISO_TIMESTAMP LEVEL event.name key=value key2=value2
 *
 * Lines below LOG_LEVEL are dropped. Inside a request the requestId is
 * filled in from the request context when the caller did not pass one.
 */
export function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[env.LOG_LEVEL]) return
  const { requestId, ...rest } = meta ?? {}
  const fields = { requestId: requestId ?? currentContext()?.requestId, ...rest }
  const ts = new Date().toISOString()
  const line = `${ts} ${level.toUpperCase()} ${message}${formatMeta(fields)}\n`
  getStream().write(line)
}
