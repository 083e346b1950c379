import cron from 'node-cron'
import type { ScheduledTask } from 'node-cron'
import { asErrorMessage } from '../errors.js'
import type { ReminderJob } from '../roster/service.js'
import { logger } from '../../utils/logger.js'

export interface SchedulerOptions {
  reminderCron?: string
  timezone: string
  reminders: ReminderJob
}

export class SchedulerService {
  private readonly reminderCron?: string
  private readonly timezone: string
  private readonly reminders: ReminderJob
  private readonly tasks: ScheduledTask[] = []
  private inFlight = false

  constructor(options: SchedulerOptions) {
    this.reminderCron = options.reminderCron
    this.timezone = options.timezone
    this.reminders = options.reminders
  }

  start(): void {
    if (!this.reminderCron) {
      logger.info('Reminder cron not configured; waiting for external trigger')
      return
    }
    if (!cron.validate(this.reminderCron)) {
      throw new Error(`Invalid REMINDER_CRON expression: ${this.reminderCron}`)
    }

    this.tasks.push(cron.schedule(this.reminderCron, () => {
      logger.info('Scheduled reminder scan triggered')
      this.runReminders().catch((error: unknown) => {
        logger.warn('Scheduled reminder scan failed', { error: asErrorMessage(error) })
      })
    }, { timezone: this.timezone }))

    logger.info('Scheduler started', { reminderCron: this.reminderCron, timezone: this.timezone })
  }

  stop(): void {
    for (const task of this.tasks.splice(0)) {
      task.stop()
    }
  }

  async runReminders(): Promise<void> {
    if (this.inFlight) {
      logger.warn('Reminder scan skipped; another scan is in progress')
      return
    }
    this.inFlight = true
    try {
      await this.reminders.run()
    }
    finally {
      this.inFlight = false
    }
  }
}
