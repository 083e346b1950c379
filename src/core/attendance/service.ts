import type { CheckInOutcome, CheckInRequest } from './types.js'
import type { DirectoryService } from '../directory/service.js'
import { normalizeName } from '../directory/service.js'
import { MalformedInputError, MessageDeliveryError, UnknownIdentityError, asErrorMessage } from '../errors.js'
import type { MessagingClient } from '../messaging/types.js'
import type { StorageBackend } from '../storage/types.js'
import { logger } from '../../utils/logger.js'
import {
  formatCutoff,
  formatLocalDateTime,
  getLocalDate,
  isAfterCutoff,
  parseWhenToLocal,
  toLocalDateTime,
} from '../../utils/time.js'
import type { ClockTime, LocalDateTime } from '../../utils/time.js'

export interface CheckInServiceOptions {
  storage: StorageBackend
  directory: DirectoryService
  messaging: MessagingClient
  timeZone: string
  cutoff: ClockTime
  now?: () => Date
}

export function formatConfirmation(name: string, local: LocalDateTime, late: boolean, cutoff: ClockTime): string {
  const base = `${name} checked in at ${formatLocalDateTime(local)}`
  return late ? `${base} (after ${formatCutoff(cutoff)})` : base
}

function toDeliveryError(error: unknown): MessageDeliveryError {
  if (error instanceof MessageDeliveryError) return error
  return new MessageDeliveryError(asErrorMessage(error), { cause: error })
}

/**
 * Per (name, date) the only transition is NOT_CHECKED_IN -> CHECKED_IN, and a
 * record is written only once the confirmation has been delivered.
 */
export class CheckInService {
  private readonly storage: StorageBackend
  private readonly directory: DirectoryService
  private readonly messaging: MessagingClient
  private readonly timeZone: string
  private readonly cutoff: ClockTime
  private readonly now: () => Date

  constructor(options: CheckInServiceOptions) {
    this.storage = options.storage
    this.directory = options.directory
    this.messaging = options.messaging
    this.timeZone = options.timeZone
    this.cutoff = options.cutoff
    this.now = options.now ?? (() => new Date())
  }

  async checkIn(request: CheckInRequest): Promise<CheckInOutcome> {
    const name = normalizeName(request.name)
    if (!name) {
      throw new MalformedInputError('name required')
    }
    const now = this.now()
    const asserted = request.when?.trim() || undefined
    const local = asserted
      ? parseWhenToLocal(asserted, this.timeZone)
      : toLocalDateTime(now, this.timeZone)

    const accountId = await this.directory.accountIdFor(name)
    if (!accountId) {
      logger.warn('Check-in for unbound name', { name })
      throw new UnknownIdentityError(name)
    }

    const date = getLocalDate(this.timeZone, now)
    if (await this.storage.isCheckedIn(name, date)) {
      logger.info('Duplicate check-in ignored', { name, date })
      return { status: 'duplicate', name, date }
    }

    const late = isAfterCutoff(local, this.cutoff)
    const message = formatConfirmation(name, local, late, this.cutoff)

    try {
      await this.messaging.push(accountId, message)
    }
    catch (error) {
      const deliveryError = toDeliveryError(error)
      logger.warn('Check-in confirmation not delivered; record not written', {
        name,
        date,
        status: deliveryError.status,
        body: deliveryError.body,
        error: deliveryError.message,
      })
      return { status: 'notify_failed', name, date, late, error: deliveryError }
    }

    await this.storage.recordCheckIn({
      date,
      name,
      when: asserted ?? now.toISOString(),
      accountId,
    })
    logger.info('Check-in recorded', { name, date, late, localTime: formatLocalDateTime(local) })
    return { status: 'ok', name, date, late, localTime: formatLocalDateTime(local), message }
  }
}
