import { MalformedInputError } from '../core/errors.js'

export interface LocalDateTime {
  date: string
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
  /** Whole sub-second part in nanoseconds; keeps digits finer than `millisecond`. */
  nanosecond: number
  /** ISO weekday, 1 = Monday ... 7 = Sunday. */
  weekday: number
}

export interface ClockTime {
  hour: number
  minute: number
}

const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i
const CUTOFF_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/

const formatterCache = new Map<string, Intl.DateTimeFormat>()

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    })
    formatterCache.set(timeZone, formatter)
  }
  return formatter
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

export function formatDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`
}

function isoWeekday(year: number, month: number, day: number): number {
  const weekday = new Date(Date.UTC(year, month - 1, day)).getUTCDay()
  return weekday === 0 ? 7 : weekday
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone })
    return true
  }
  catch {
    return false
  }
}

/** Wall-clock fields of an instant in the given zone. */
export function toLocalDateTime(instant: Date, timeZone: string): LocalDateTime {
  const parts = formatterFor(timeZone).formatToParts(instant)
  const field = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find(item => item.type === type)
    return part ? Number(part.value) : 0
  }
  const year = field('year')
  const month = field('month')
  const day = field('day')
  return {
    date: formatDate(year, month, day),
    year,
    month,
    day,
    hour: field('hour'),
    minute: field('minute'),
    second: field('second'),
    millisecond: instant.getUTCMilliseconds(),
    nanosecond: instant.getUTCMilliseconds() * 1_000_000,
    weekday: isoWeekday(year, month, day),
  }
}

export function getLocalDate(timeZone: string, instant: Date = new Date()): string {
  return toLocalDateTime(instant, timeZone).date
}

export function formatLocalDateTime(local: LocalDateTime): string {
  return `${local.date} ${pad(local.hour)}:${pad(local.minute)}:${pad(local.second)}`
}

function offsetMinutes(designator: string): number {
  if (designator.toUpperCase() === 'Z') return 0
  const sign = designator.startsWith('-') ? -1 : 1
  const digits = designator.slice(1).replace(':', '')
  const hours = Number(digits.slice(0, 2))
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0
  if (hours > 23 || minutes > 59) {
    throw new MalformedInputError(`Invalid UTC offset: ${designator}`)
  }
  return sign * (hours * 60 + minutes)
}

/**
 * Resolves an ISO-8601 string to wall-clock time in `timeZone`.
 * Values without an offset are taken as already local to that zone.
 */
export function parseWhenToLocal(value: string, timeZone: string): LocalDateTime {
  const match = ISO_PATTERN.exec(value.trim())
  if (!match) {
    throw new MalformedInputError(`Unparsable timestamp: ${value}`)
  }

  const [, y, mo, d, h, mi, s, frac, designator] = match
  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hour = h ? Number(h) : 0
  const minute = mi ? Number(mi) : 0
  const second = s ? Number(s) : 0
  const nanosecond = frac ? Number(frac.padEnd(9, '0')) : 0
  const millisecond = Math.floor(nanosecond / 1_000_000)

  const calendarDay = new Date(Date.UTC(year, month - 1, day))
  if (
    month < 1 || month > 12
    || calendarDay.getUTCFullYear() !== year || calendarDay.getUTCMonth() !== month - 1 || calendarDay.getUTCDate() !== day
    || hour > 23 || minute > 59 || second > 59
  ) {
    throw new MalformedInputError(`Timestamp out of range: ${value}`)
  }

  if (!designator) {
    return {
      date: formatDate(year, month, day),
      year,
      month,
      day,
      hour,
      minute,
      second,
      millisecond,
      nanosecond,
      weekday: isoWeekday(year, month, day),
    }
  }

  const utcMillis = Date.UTC(year, month - 1, day, hour, minute, second, millisecond)
    - offsetMinutes(designator) * 60_000
  // Offsets are whole minutes, so the sub-second part carries over unchanged.
  return { ...toLocalDateTime(new Date(utcMillis), timeZone), millisecond, nanosecond }
}

export function parseCutoff(value: string): ClockTime {
  const match = CUTOFF_PATTERN.exec(value.trim())
  if (!match) {
    throw new MalformedInputError(`Cutoff must be HH:MM, got "${value}"`)
  }
  return { hour: Number(match[1]), minute: Number(match[2]) }
}

export function formatCutoff(cutoff: ClockTime): string {
  return `${pad(cutoff.hour)}:${pad(cutoff.minute)}`
}

/** True only when `local` is strictly later than the cutoff on its own date. */
export function isAfterCutoff(local: LocalDateTime, cutoff: ClockTime): boolean {
  const elapsedSeconds = (local.hour * 60 + local.minute) * 60 + local.second
  const limitSeconds = (cutoff.hour * 60 + cutoff.minute) * 60
  return elapsedSeconds > limitSeconds || (elapsedSeconds === limitSeconds && local.nanosecond > 0)
}

export function isWeekend(local: LocalDateTime): boolean {
  return local.weekday >= 6
}

export function nowIso(): string {
  return new Date().toISOString()
}
