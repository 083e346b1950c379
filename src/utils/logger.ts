import fs from 'node:fs'
import path from 'node:path'

const LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = typeof LEVELS[number]
export type LogMeta = Record<string, unknown> | undefined

let currentLevel: LogLevel = 'info'
let summaryStream: fs.WriteStream | null = null
let detailStream: fs.WriteStream | null = null

export interface LoggerOptions {
  level: LogLevel
  /** Compact lines, as on the console. */
  summaryPath?: string
  /** Same events with large metadata pretty-printed. */
  detailPath?: string
}

async function openStream(filePath: string | undefined): Promise<fs.WriteStream | null> {
  if (!filePath) return null
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  return fs.createWriteStream(filePath, { flags: 'a' })
}

export async function configureLogger(options: LoggerOptions): Promise<void> {
  closeLogger()
  currentLevel = options.level
  summaryStream = await openStream(options.summaryPath)
  detailStream = await openStream(options.detailPath)
}

export function closeLogger(): void {
  summaryStream?.end()
  detailStream?.end()
  summaryStream = null
  detailStream = null
}

/** Keeps the first `keep` characters of a secret and stars out the rest. */
export function maskSecret(value: string | undefined, keep = 4): string {
  if (!value) return '(empty)'
  return `${value.slice(0, keep)}${'*'.repeat(Math.max(0, value.length - keep))}`
}

// Error codes and upstream HTTP statuses are what an operator searches for.
function describeError(error: Error): Record<string, unknown> {
  const described: Record<string, unknown> = { name: error.name, message: error.message }
  if ('code' in error && typeof error.code === 'string') described.code = error.code
  if ('status' in error && typeof error.status === 'number') described.status = error.status
  described.stack = error.stack
  if (error.cause !== undefined) {
    described.cause = error.cause instanceof Error ? describeError(error.cause) : error.cause
  }
  return described
}

function stringify(value: unknown, pretty: boolean): string {
  const visited = new WeakSet<object>()
  return JSON.stringify(value, (_key: string, raw: unknown) => {
    let next = raw
    if (raw instanceof Error) next = describeError(raw)
    else if (raw instanceof Set) next = Array.from(raw)
    else if (typeof raw === 'bigint') next = raw.toString()
    if (typeof next === 'object' && next !== null) {
      if (visited.has(next)) return '[Circular]'
      visited.add(next)
    }
    return next
  }, pretty ? 2 : 0)
}

export function formatLine(level: LogLevel, message: string, meta: LogMeta, detail: boolean): string {
  const head = `[${new Date().toISOString()}] [${level}] ${message}`
  if (!meta) return head
  const compact = stringify(meta, false)
  if (!detail || (compact.length <= 200 && !compact.includes('\\n'))) {
    return `${head} | ${compact}`
  }
  const body = stringify(meta, true).replace(/^/gm, '  ')
  return `${head}\n${body}`
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(currentLevel)) return

  const line = formatLine(level, message, meta, false)
  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)

  summaryStream?.write(`${line}\n`)
  detailStream?.write(`${formatLine(level, message, meta, true)}\n`)
}

export const logger = {
  debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
  info: (message: string, meta?: LogMeta) => log('info', message, meta),
  warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
  error: (message: string, meta?: LogMeta) => log('error', message, meta),
}
