import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { BindingHandler } from '../../../src/core/binding/handler.js'
import { DirectoryService } from '../../../src/core/directory/service.js'
import { FileStore } from '../../../src/core/storage/file-store.js'
import { processLineDelivery } from '../../../src/integrations/http/server.js'
import { computeSignature, extractTextMessages, verifySignature } from '../../../src/integrations/line/webhook.js'
import { RecordingMessaging, createTempDir } from '../../helpers/fakes.js'

const SECRET = 'test-secret'

function textEvent(text: string, userId: string | undefined, replyToken: string | undefined) {
  return {
    type: 'message',
    replyToken,
    source: { type: 'user', userId },
    message: { id: '1', type: 'text', text },
  }
}

describe('verifySignature', () => {
  const body = Buffer.from('{"events":[]}')

  it('accepts the channel signature of the exact body', () => {
    expect(verifySignature(SECRET, body, computeSignature(SECRET, body))).toBe(true)
  })

  it('rejects missing, foreign and truncated signatures', () => {
    expect(verifySignature(SECRET, body, undefined)).toBe(false)
    expect(verifySignature(SECRET, body, computeSignature('other-secret', body))).toBe(false)
    expect(verifySignature(SECRET, body, computeSignature(SECRET, body).slice(1))).toBe(false)
    expect(verifySignature(SECRET, Buffer.from('{"events":[ ]}'), computeSignature(SECRET, body))).toBe(false)
  })
})

describe('extractTextMessages', () => {
  it('keeps text messages that can be answered', () => {
    const messages = extractTextMessages({
      destination: 'Ubot',
      events: [
        textEvent('bind Alice', 'U1', 'R1'),
        { type: 'follow', replyToken: 'R2', source: { type: 'user', userId: 'U2' } },
        { type: 'message', replyToken: 'R3', source: { type: 'user', userId: 'U3' }, message: { type: 'sticker' } },
        textEvent('status', undefined, 'R4'),
        textEvent('status', 'U5', undefined),
        textEvent('status', 'U6', 'R6'),
      ],
    })

    expect(messages).toEqual([
      { accountId: 'U1', replyToken: 'R1', text: 'bind Alice' },
      { accountId: 'U6', replyToken: 'R6', text: 'status' },
    ])
  })

  it('ignores bodies of the wrong shape', () => {
    expect(extractTextMessages({ events: 'none' })).toEqual([])
    expect(extractTextMessages(null)).toEqual([])
  })
})

describe('processLineDelivery', () => {
  let cleanup: () => void
  let storage: FileStore
  let messaging: RecordingMessaging
  let handler: BindingHandler

  beforeEach(() => {
    const env = createTempDir()
    cleanup = env.cleanup
    storage = new FileStore({ dataPath: env.dir })
    messaging = new RecordingMessaging()
    handler = new BindingHandler({ directory: new DirectoryService(storage), messaging })
  })

  afterEach(() => {
    cleanup()
  })

  it('handles every message of a signed delivery', async () => {
    const body = Buffer.from(JSON.stringify({ events: [textEvent('bind Alice', 'U1', 'R1')] }))

    const result = await processLineDelivery(body, computeSignature(SECRET, body), SECRET, handler)

    expect(result).toEqual({ status: 200, text: 'OK' })
    expect((await storage.loadBindings()).nameToAccountId).toEqual({ Alice: 'U1' })
    expect(messaging.sent.map(message => message.kind)).toEqual(['push', 'reply'])
  })

  it('rejects a delivery with a bad signature', async () => {
    const body = Buffer.from(JSON.stringify({ events: [textEvent('bind Alice', 'U1', 'R1')] }))

    const result = await processLineDelivery(body, 'forged', SECRET, handler)

    expect(result).toEqual({ status: 400, text: 'Invalid signature' })
    expect(messaging.sent).toEqual([])
    expect(await storage.loadBindings()).toEqual({ nameToAccountId: {}, accountIdToName: {} })
  })

  it('acknowledges a signed body that is not JSON', async () => {
    const body = Buffer.from('not json')
    expect(await processLineDelivery(body, computeSignature(SECRET, body), SECRET, handler)).toEqual({ status: 200, text: 'OK' })
  })
})
