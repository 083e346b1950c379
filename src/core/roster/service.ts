import type { DirectoryService } from '../directory/service.js'
import { asErrorMessage } from '../errors.js'
import type { MessagingClient } from '../messaging/types.js'
import { lookup } from '../storage/types.js'
import type { StorageBackend } from '../storage/types.js'
import { logger } from '../../utils/logger.js'
import { formatCutoff, isAfterCutoff, isWeekend, toLocalDateTime } from '../../utils/time.js'
import type { ClockTime } from '../../utils/time.js'

export type ReminderOutcome =
  | { status: 'skip_weekend'; date: string }
  | { status: 'not_after_cutoff'; date: string; cutoff: string }
  | { status: 'ok'; date: string; reminded: number; unchecked: string[] }

export function formatReminder(name: string, date: string): string {
  return `${name}, you have not checked in today (${date}).`
}

export class RosterScanner {
  private readonly storage: StorageBackend

  constructor(storage: StorageBackend) {
    this.storage = storage
  }

  /** Bound names with no check-in on `date`. */
  async uncheckedFor(date: string): Promise<string[]> {
    return this.storage.listUnchecked(date)
  }
}

export interface ReminderJobOptions {
  scanner: RosterScanner
  directory: DirectoryService
  messaging: MessagingClient
  timeZone: string
  cutoff: ClockTime
  onlyWeekdays: boolean
  now?: () => Date
}

export class ReminderJob {
  private readonly scanner: RosterScanner
  private readonly directory: DirectoryService
  private readonly messaging: MessagingClient
  private readonly timeZone: string
  private readonly cutoff: ClockTime
  private readonly onlyWeekdays: boolean
  private readonly now: () => Date

  constructor(options: ReminderJobOptions) {
    this.scanner = options.scanner
    this.directory = options.directory
    this.messaging = options.messaging
    this.timeZone = options.timeZone
    this.cutoff = options.cutoff
    this.onlyWeekdays = options.onlyWeekdays
    this.now = options.now ?? (() => new Date())
  }

  async run(): Promise<ReminderOutcome> {
    const local = toLocalDateTime(this.now(), this.timeZone)
    if (this.onlyWeekdays && isWeekend(local)) {
      logger.info('Reminder scan skipped on weekend', { date: local.date })
      return { status: 'skip_weekend', date: local.date }
    }
    if (!isAfterCutoff(local, this.cutoff)) {
      logger.info('Reminder scan skipped before cutoff', { date: local.date, cutoff: formatCutoff(this.cutoff) })
      return { status: 'not_after_cutoff', date: local.date, cutoff: formatCutoff(this.cutoff) }
    }

    const bindings = await this.directory.snapshot()
    const unchecked = await this.scanner.uncheckedFor(local.date)
    let reminded = 0

    for (const name of unchecked) {
      const accountId = lookup(bindings.nameToAccountId, name)
      if (!accountId) continue
      try {
        await this.messaging.push(accountId, formatReminder(name, local.date))
        reminded += 1
      }
      catch (error) {
        logger.warn('Reminder not delivered', { name, error: asErrorMessage(error) })
      }
    }

    logger.info('Reminder scan completed', { date: local.date, unchecked: unchecked.length, reminded })
    return { status: 'ok', date: local.date, reminded, unchecked }
  }
}
