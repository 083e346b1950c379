import type { Server } from 'node:http'
import { loadConfig } from '../config/index.js'
import { CheckInService } from '../core/attendance/service.js'
import { BindingHandler } from '../core/binding/handler.js'
import { DirectoryService } from '../core/directory/service.js'
import { ReminderJob, RosterScanner } from '../core/roster/service.js'
import { SchedulerService } from '../core/scheduler/service.js'
import { createStorageBackend } from '../core/storage/index.js'
import { createHttpApp } from '../integrations/http/server.js'
import { LineMessagingClient } from '../integrations/line/api.js'
import { configureLogger, logger, maskSecret } from '../utils/logger.js'
import { formatCutoff } from '../utils/time.js'

export class App {
  private server: Server | null = null
  private scheduler: SchedulerService | null = null

  async start(): Promise<void> {
    const config = loadConfig()
    await configureLogger({
      level: config.logLevel,
      summaryPath: config.logSummaryPath,
      detailPath: config.logDetailPath,
    })
    logger.info('App starting')
    logger.debug('App config', {
      host: config.host,
      port: config.port,
      dataPath: config.dataPath,
      storage: config.storage,
      channelSecret: maskSecret(config.lineChannelSecret),
      channelAccessToken: maskSecret(config.lineChannelAccessToken),
      apiKeyConfigured: Boolean(config.apiKey),
      timezone: config.timeZone,
      lateCutoff: formatCutoff(config.lateCutoff),
      onlyWeekdays: config.onlyWeekdays,
      reminderCron: config.reminderCron ?? null,
      logLevel: config.logLevel,
    })
    if (config.rejectedTimeZone) {
      logger.warn('Unknown time zone; falling back to UTC', { requested: config.rejectedTimeZone })
    }
    if (!config.apiKey) {
      logger.warn('API_KEY not set; protected routes will reject every request')
    }

    const storage = createStorageBackend(config)
    const messaging = new LineMessagingClient({
      channelAccessToken: config.lineChannelAccessToken,
      timeoutMs: config.messagingTimeoutMs,
    })
    const directory = new DirectoryService(storage)
    const checkIn = new CheckInService({
      storage,
      directory,
      messaging,
      timeZone: config.timeZone,
      cutoff: config.lateCutoff,
    })
    const reminders = new ReminderJob({
      scanner: new RosterScanner(storage),
      directory,
      messaging,
      timeZone: config.timeZone,
      cutoff: config.lateCutoff,
      onlyWeekdays: config.onlyWeekdays,
    })
    const bindingHandler = new BindingHandler({ directory, messaging })

    const httpApp = createHttpApp({
      apiKey: config.apiKey,
      timeZone: config.timeZone,
      lineChannelSecret: config.lineChannelSecret,
      storage,
      directory,
      messaging,
      checkIn,
      reminders,
      bindingHandler,
    })

    this.scheduler = new SchedulerService({
      reminderCron: config.reminderCron,
      timezone: config.timeZone,
      reminders,
    })
    this.scheduler.start()

    await new Promise<void>((resolve, reject) => {
      const server = httpApp.listen(config.port, config.host, () => resolve())
      server.once('error', reject)
      this.server = server
    })
    logger.info('App started', { url: `http://${config.host}:${config.port}`, storage: storage.kind, platform: messaging.platform })
  }

  async stop(): Promise<void> {
    this.scheduler?.stop()
    const server = this.server
    this.server = null
    if (!server) return
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()))
    })
    logger.info('App stopped')
  }
}
