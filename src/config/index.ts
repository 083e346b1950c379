import path from 'node:path'
import dotenv from 'dotenv'
import { z } from 'zod'
import { isValidTimeZone, parseCutoff } from '../utils/time.js'
import type { ClockTime } from '../utils/time.js'

dotenv.config()

const DEFAULT_TIMEZONE = 'Asia/Taipei'
const FALLBACK_TIMEZONE = 'UTC'

const optionalString = z.preprocess((value) => {
  if (typeof value !== 'string') return value
  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const boolSchema = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === '') return undefined
    if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false
  }
  return value
}, z.boolean().default(defaultValue))

const integerSchema = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).default(defaultValue))

function lowercase(value: unknown): unknown {
  if (typeof value !== 'string') return value
  const normalized = value.trim().toLowerCase()
  return normalized === '' ? undefined : normalized
}

const envSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: integerSchema(5000, 1),
  DATA_PATH: z.string().default('.data'),
  STORAGE_BACKEND: z.preprocess(lowercase, z.enum(['auto', 'file', 'sheets']).default('auto')),
  STORAGE_TIMEOUT_MS: integerSchema(10000, 100),
  GOOGLE_SERVICE_ACCOUNT_JSON: optionalString,
  GOOGLE_SHEET_ID: optionalString,
  MESSAGING_TIMEOUT_MS: integerSchema(10000, 100),
  CHANNEL_ACCESS_TOKEN: optionalString,
  CHANNEL_SECRET: optionalString,
  API_KEY: optionalString,
  TZ: optionalString,
  LATE_CUTOFF: z.preprocess(
    value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().default('08:00'),
  ),
  ONLY_WEEKDAYS: boolSchema(true),
  REMINDER_CRON: optionalString,
  LOG_LEVEL: z.preprocess(lowercase, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  LOG_SUMMARY_PATH: optionalString,
  LOG_DETAIL_PATH: optionalString,
})

type ParsedEnv = z.infer<typeof envSchema>

export type StorageSelection = 'file' | 'sheets'

export interface AppConfig {
  host: string
  port: number
  dataPath: string
  storage: StorageSelection
  storageTimeoutMs: number
  googleServiceAccountJson?: string
  googleSheetId?: string
  messagingTimeoutMs: number
  lineChannelAccessToken: string
  lineChannelSecret: string
  apiKey?: string
  timeZone: string
  /** Set when the configured zone was unknown and UTC is used instead. */
  rejectedTimeZone?: string
  lateCutoff: ClockTime
  onlyWeekdays: boolean
  reminderCron?: string
  logLevel: ParsedEnv['LOG_LEVEL']
  logSummaryPath: string
  logDetailPath: string
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

function resolveStorage(parsed: ParsedEnv): StorageSelection {
  const hasSheets = Boolean(parsed.GOOGLE_SERVICE_ACCOUNT_JSON && parsed.GOOGLE_SHEET_ID)
  if (parsed.STORAGE_BACKEND === 'auto') return hasSheets ? 'sheets' : 'file'
  if (parsed.STORAGE_BACKEND === 'sheets' && !hasSheets) {
    throw new ConfigError('STORAGE_BACKEND=sheets requires GOOGLE_SERVICE_ACCOUNT_JSON and GOOGLE_SHEET_ID')
  }
  return parsed.STORAGE_BACKEND
}

function requireLineCredentials(parsed: ParsedEnv): { accessToken: string; secret: string } {
  if (!parsed.CHANNEL_ACCESS_TOKEN || !parsed.CHANNEL_SECRET) {
    throw new ConfigError('CHANNEL_ACCESS_TOKEN and CHANNEL_SECRET are required')
  }
  return { accessToken: parsed.CHANNEL_ACCESS_TOKEN, secret: parsed.CHANNEL_SECRET }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env)
  const line = requireLineCredentials(parsed)

  let lateCutoff: ClockTime
  try {
    lateCutoff = parseCutoff(parsed.LATE_CUTOFF)
  }
  catch {
    throw new ConfigError(`LATE_CUTOFF must be HH:MM, got "${parsed.LATE_CUTOFF}"`)
  }

  const requestedZone = parsed.TZ ?? DEFAULT_TIMEZONE
  const zoneValid = isValidTimeZone(requestedZone)

  const logsPath = path.join(parsed.DATA_PATH, 'logs')

  return {
    host: parsed.HOST,
    port: parsed.PORT,
    dataPath: parsed.DATA_PATH,
    storage: resolveStorage(parsed),
    storageTimeoutMs: parsed.STORAGE_TIMEOUT_MS,
    googleServiceAccountJson: parsed.GOOGLE_SERVICE_ACCOUNT_JSON,
    googleSheetId: parsed.GOOGLE_SHEET_ID,
    messagingTimeoutMs: parsed.MESSAGING_TIMEOUT_MS,
    lineChannelAccessToken: line.accessToken,
    lineChannelSecret: line.secret,
    apiKey: parsed.API_KEY,
    timeZone: zoneValid ? requestedZone : FALLBACK_TIMEZONE,
    rejectedTimeZone: zoneValid ? undefined : requestedZone,
    lateCutoff,
    onlyWeekdays: parsed.ONLY_WEEKDAYS,
    reminderCron: parsed.REMINDER_CRON,
    logLevel: parsed.LOG_LEVEL,
    logSummaryPath: parsed.LOG_SUMMARY_PATH ?? path.join(logsPath, 'summary.log'),
    logDetailPath: parsed.LOG_DETAIL_PATH ?? path.join(logsPath, 'detail.log'),
  }
}
