import { MessageDeliveryError, asErrorMessage } from '../../core/errors.js'
import type { MessagingClient } from '../../core/messaging/types.js'
import { logger, maskSecret } from '../../utils/logger.js'

const LINE_API_BASE_URL = 'https://api.line.me/v2/bot'
const MAX_TEXT_LENGTH = 5000

export interface LineMessagingClientOptions {
  channelAccessToken: string
  timeoutMs: number
  baseUrl?: string
}

function toTextMessages(text: string): Array<{ type: 'text'; text: string }> {
  const trimmed = text.length > MAX_TEXT_LENGTH ? `${text.slice(0, MAX_TEXT_LENGTH - 1)}…` : text
  return [{ type: 'text', text: trimmed }]
}

export class LineMessagingClient implements MessagingClient {
  readonly platform = 'line'
  private readonly token: string
  private readonly timeoutMs: number
  private readonly baseUrl: string

  constructor(options: LineMessagingClientOptions) {
    this.token = options.channelAccessToken
    this.timeoutMs = options.timeoutMs
    this.baseUrl = options.baseUrl ?? LINE_API_BASE_URL
    logger.debug('LINE messaging client initialized', { token: maskSecret(this.token) })
  }

  async reply(replyToken: string, text: string): Promise<void> {
    await this.request('message/reply', { replyToken, messages: toTextMessages(text) })
  }

  async push(accountId: string, text: string): Promise<void> {
    await this.request('message/push', { to: accountId, messages: toTextMessages(text) })
  }

  private async request(endpoint: string, body: unknown): Promise<void> {
    logger.debug('LINE API request', { endpoint })

    let response: Response
    try {
      response = await fetch(`${this.baseUrl}/${endpoint}`, {
        method: 'POST',
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: {
          'authorization': `Bearer ${this.token}`,
          'content-type': 'application/json',
        },
        body: JSON.stringify(body),
      })
    }
    catch (error) {
      logger.warn('LINE API request failed before response', { endpoint, error: asErrorMessage(error) })
      throw new MessageDeliveryError(`LINE ${endpoint} request failed`, { cause: error })
    }

    if (!response.ok) {
      const responseText = await response.text().catch(() => '')
      logger.warn('LINE API request returned HTTP error', {
        endpoint,
        status: response.status,
        body: responseText.slice(0, 300),
      })
      throw new MessageDeliveryError(`LINE ${endpoint} returned HTTP ${response.status}`, {
        status: response.status,
        body: responseText,
      })
    }
  }
}
