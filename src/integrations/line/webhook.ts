import { createHmac, timingSafeEqual } from 'node:crypto'
import { z } from 'zod'
import type { InboundTextMessage } from '../../core/messaging/types.js'

const webhookEventSchema = z.object({
  type: z.string(),
  replyToken: z.string().optional(),
  source: z.object({
    type: z.string(),
    userId: z.string().optional(),
  }).optional(),
  message: z.object({
    type: z.string(),
    text: z.string().optional(),
  }).optional(),
})

const webhookBodySchema = z.object({
  destination: z.string().optional(),
  events: z.array(webhookEventSchema).default([]),
})

export type LineWebhookEvent = z.infer<typeof webhookEventSchema>

export function computeSignature(channelSecret: string, rawBody: Buffer | string): string {
  return createHmac('sha256', channelSecret).update(rawBody).digest('base64')
}

export function verifySignature(channelSecret: string, rawBody: Buffer | string, signature: string | undefined): boolean {
  if (!signature) return false
  const expected = Buffer.from(computeSignature(channelSecret, rawBody))
  const received = Buffer.from(signature)
  return expected.length === received.length && timingSafeEqual(expected, received)
}

/** Text messages from users; other events, and texts without a user or reply token, are dropped. */
export function extractTextMessages(body: unknown): InboundTextMessage[] {
  const parsed = webhookBodySchema.safeParse(body)
  if (!parsed.success) return []

  const messages: InboundTextMessage[] = []
  for (const event of parsed.data.events) {
    const message = event.message
    if (event.type !== 'message' || !message || message.type !== 'text') continue
    const accountId = event.source?.userId
    if (!accountId || !event.replyToken) continue
    messages.push({
      accountId,
      replyToken: event.replyToken,
      text: message.text ?? '',
    })
  }
  return messages
}
