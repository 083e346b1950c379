import express from 'express'
import type { NextFunction, Request, Response } from 'express'
import type { CheckInService } from '../../core/attendance/service.js'
import type { BindingHandler } from '../../core/binding/handler.js'
import type { DirectoryService } from '../../core/directory/service.js'
import { MalformedInputError, UnknownIdentityError, asErrorMessage } from '../../core/errors.js'
import type { MessagingClient } from '../../core/messaging/types.js'
import type { ReminderJob } from '../../core/roster/service.js'
import type { StorageBackend } from '../../core/storage/types.js'
import { logger } from '../../utils/logger.js'
import { extractTextMessages, verifySignature } from '../line/webhook.js'
import { requireApiKey } from './auth.js'
import { parseCheckInBody, toCheckInReply, toErrorReply } from './responses.js'

const SERVICE_NAME = 'roll-call-bot'

export interface HttpContext {
  apiKey?: string
  timeZone: string
  /** Enables POST /webhook for LINE deliveries. */
  lineChannelSecret?: string
  storage: StorageBackend
  directory: DirectoryService
  messaging: MessagingClient
  checkIn: CheckInService
  reminders: ReminderJob
  bindingHandler: BindingHandler
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next)
  }
}

function queryString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : ''
}

/**
 * Runs every text message of a verified LINE delivery through the binding
 * handler. Failures are logged; the delivery itself is always acknowledged.
 */
export async function processLineDelivery(
  rawBody: Buffer,
  signature: string | undefined,
  channelSecret: string,
  bindingHandler: BindingHandler,
): Promise<{ status: number; text: string }> {
  if (!verifySignature(channelSecret, rawBody, signature)) {
    logger.warn('LINE webhook signature rejected')
    return { status: 400, text: 'Invalid signature' }
  }

  let payload: unknown
  try {
    payload = JSON.parse(rawBody.toString('utf8'))
  }
  catch (error) {
    logger.warn('LINE webhook body is not JSON', { error: asErrorMessage(error) })
    return { status: 200, text: 'OK' }
  }

  for (const message of extractTextMessages(payload)) {
    try {
      await bindingHandler.respond(message)
    }
    catch (error) {
      logger.error('LINE event handling failed', { accountId: message.accountId, error })
    }
  }
  return { status: 200, text: 'OK' }
}

export function createHttpApp(context: HttpContext): express.Application {
  const app = express()
  const protectedRoute = requireApiKey(context.apiKey)

  app.get('/', (_req, res) => {
    res.json({ status: 'ok', service: SERVICE_NAME, tz: context.timeZone, storage: context.storage.kind, platform: context.messaging.platform })
  })

  app.get('/health', (_req, res) => {
    res.type('text/plain').send('OK')
  })

  if (context.lineChannelSecret) {
    const channelSecret = context.lineChannelSecret
    app.post('/webhook', express.raw({ type: '*/*', limit: '1mb' }), route(async (req, res) => {
      const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0)
      const result = await processLineDelivery(rawBody, req.header('x-line-signature'), channelSecret, context.bindingHandler)
      res.status(result.status).type('text/plain').send(result.text)
    }))
  }

  app.get('/users', protectedRoute, route(async (_req, res) => {
    res.json(await context.directory.snapshot())
  }))

  app.post('/checkin', protectedRoute, express.json({ strict: false, type: () => true }), route(async (req, res) => {
    const request = parseCheckInBody(req.body)
    const reply = toCheckInReply(await context.checkIn.checkIn(request))
    res.status(reply.status).json(reply.body)
  }))

  app.post('/cron/morning_scan', protectedRoute, route(async (_req, res) => {
    res.json(await context.reminders.run())
  }))

  app.get('/push', protectedRoute, route(async (req, res) => {
    const name = queryString(req.query.name)
    const text = queryString(req.query.text) || 'Test message'
    if (!name) throw new MalformedInputError('name query parameter required')
    const accountId = await context.directory.accountIdFor(name)
    if (!accountId) throw new UnknownIdentityError(name)
    await context.messaging.push(accountId, text)
    res.json({ status: 'ok', name, accountId, text })
  }))

  app.get('/debug/storage', protectedRoute, route(async (_req, res) => {
    res.json(await context.storage.describe())
  }))

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const reply = toErrorReply(error)
    if (reply.status >= 500) {
      logger.error('Request failed', { method: req.method, path: req.path, status: reply.status, error })
    }
    res.status(reply.status).json(reply.body)
  })

  return app
}
