import type { DirectoryService } from '../directory/service.js'
import { MalformedInputError, StorageUnavailableError, asErrorMessage } from '../errors.js'
import type { InboundTextMessage, MessagingClient } from '../messaging/types.js'
import { logger } from '../../utils/logger.js'

const STATUS_PATTERN = /^(?:查詢|status\b)/i
const BIND_PATTERN = /^(?:連結|bind)(?:\s+([\s\S]*))?$/i

export const replies = {
  formatError: '❌ Format: bind <your name>',
  notBound: 'Not bound yet. Send: bind <your name>',
  bound: (name: string) => `Currently bound to ${name} ✅`,
  bindAcknowledged: 'Binding saved! A confirmation was sent to your chat.',
  bindConfirmation: (name: string, accountId: string) => `Bound to ${name} ✅\nYour account id: ${accountId}`,
  helpBound: 'Commands:\n1) bind <your name> (change binding)\n2) status (show binding)',
  helpUnbound: 'Send "bind <your name>" to link your account.',
  unavailable: 'Service is temporarily unavailable. Please try again later.',
}

export type MessageIntent =
  | { kind: 'status' }
  | { kind: 'bind'; name: string }
  | { kind: 'other' }

export function classifyMessage(rawText: string): MessageIntent {
  const text = rawText.trim()
  if (STATUS_PATTERN.test(text)) return { kind: 'status' }
  const bind = BIND_PATTERN.exec(text)
  if (bind) return { kind: 'bind', name: (bind[1] ?? '').trim() }
  return { kind: 'other' }
}

export interface BindingHandlerOptions {
  directory: DirectoryService
  messaging: MessagingClient
}

export class BindingHandler {
  private readonly directory: DirectoryService
  private readonly messaging: MessagingClient

  constructor(options: BindingHandlerOptions) {
    this.directory = options.directory
    this.messaging = options.messaging
  }

  /** Computes the reply for one inbound text. Storage failures propagate. */
  async bindRequest(rawText: string, accountId: string): Promise<string> {
    const intent = classifyMessage(rawText)

    if (intent.kind === 'status') {
      const name = await this.directory.nameFor(accountId)
      return name ? replies.bound(name) : replies.notBound
    }

    if (intent.kind === 'bind') {
      if (!intent.name || !accountId.trim()) {
        return replies.formatError
      }
      let name: string
      try {
        name = await this.directory.bind(intent.name, accountId)
      }
      catch (error) {
        if (!(error instanceof MalformedInputError)) throw error
        logger.warn('Bind request rejected', { accountId, error: error.message })
        return replies.formatError
      }
      const confirmation = replies.bindConfirmation(name, accountId)
      try {
        await this.messaging.push(accountId, confirmation)
        logger.info('Binding confirmation pushed', { accountId, name })
        return replies.bindAcknowledged
      }
      catch (error) {
        logger.warn('Binding confirmation push failed; replying with it instead', {
          accountId,
          error: asErrorMessage(error),
        })
        return confirmation
      }
    }

    const name = await this.directory.nameFor(accountId)
    return name ? replies.helpBound : replies.helpUnbound
  }

  /**
   * Handles an inbound message end to end: computes the reply, sends it, and
   * pushes it instead when the reply token is rejected.
   */
  async respond(message: InboundTextMessage): Promise<string> {
    logger.info('Inbound message', { accountId: message.accountId, text: message.text })

    let replyText: string
    try {
      replyText = await this.bindRequest(message.text, message.accountId)
    }
    catch (error) {
      if (!(error instanceof StorageUnavailableError)) throw error
      logger.error('Inbound message could not be processed', { accountId: message.accountId, error })
      replyText = replies.unavailable
    }

    try {
      await this.messaging.reply(message.replyToken, replyText)
    }
    catch (error) {
      logger.warn('Reply failed; falling back to push', { accountId: message.accountId, error: asErrorMessage(error) })
      try {
        await this.messaging.push(message.accountId, `(fallback) ${replyText}`)
      }
      catch (pushError) {
        logger.error('Fallback push failed', { accountId: message.accountId, error: asErrorMessage(pushError) })
      }
    }
    return replyText
  }
}
