import { afterEach, describe, expect, it, vi } from 'vitest'
import { MessageDeliveryError } from '../../../src/core/errors.js'
import { LineMessagingClient } from '../../../src/integrations/line/api.js'

function stubFetch(respond: () => Promise<Response>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond())
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

describe('LineMessagingClient', () => {
  const client = new LineMessagingClient({
    channelAccessToken: 'test-token',
    timeoutMs: 1000,
    baseUrl: 'https://line.test/v2/bot',
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('pushes a text message to an account', async () => {
    const fetchMock = stubFetch(async () => new Response('{}', { status: 200 }))

    await client.push('U1', 'hello')

    expect(fetchMock).toHaveBeenCalledTimes(1)
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('https://line.test/v2/bot/message/push')
    expect(init?.method).toBe('POST')
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-token')
    expect(JSON.parse(String(init?.body))).toEqual({ to: 'U1', messages: [{ type: 'text', text: 'hello' }] })
  })

  it('replies with the reply token', async () => {
    const fetchMock = stubFetch(async () => new Response('{}', { status: 200 }))

    await client.reply('R1', 'hi')

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('https://line.test/v2/bot/message/reply')
    expect(JSON.parse(String(init?.body))).toEqual({ replyToken: 'R1', messages: [{ type: 'text', text: 'hi' }] })
  })

  it('raises a delivery error carrying the platform response', async () => {
    stubFetch(async () => new Response('{"message":"Invalid reply token"}', { status: 400 }))

    const failure = client.reply('R1', 'hi')
    await expect(failure).rejects.toBeInstanceOf(MessageDeliveryError)
    await expect(failure).rejects.toMatchObject({ status: 400, body: '{"message":"Invalid reply token"}' })
  })

  it('raises a delivery error when the request never completes', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed')
    })

    await expect(client.push('U1', 'hello')).rejects.toMatchObject({
      code: 'NOTIFICATION_DELIVERY_FAILED',
      message: 'LINE message/push request failed',
    })
  })
})
