/**
 * Outbound side of the messaging platform. Both calls reject with
 * MessageDeliveryError when the platform does not accept the message.
 */
export interface MessagingClient {
  readonly platform: string
  /** Answers an inbound message identified by its platform-issued token. */
  reply(replyToken: string, text: string): Promise<void>
  /** Sends an unsolicited message to an account. */
  push(accountId: string, text: string): Promise<void>
}

export interface InboundTextMessage {
  accountId: string
  replyToken: string
  text: string
}
