import { afterEach, describe, expect, it, vi } from 'vitest'
import { StorageUnavailableError } from '../../../src/core/errors.js'
import { SheetsStore } from '../../../src/core/storage/sheets-store.js'
import { GoogleSheetsClient, SheetsRequestError, columnLetter } from '../../../src/integrations/sheets/client.js'
import type { AccessTokenSource } from '../../../src/integrations/sheets/client.js'

const SERVICE_ACCOUNT = { client_email: 'bot@example.test', private_key: 'test-key' }

function createClient(tokenSource: AccessTokenSource, timeoutMs = 1000): GoogleSheetsClient {
  return new GoogleSheetsClient({ spreadsheetId: 'sheet-id', serviceAccount: SERVICE_ACCOUNT, timeoutMs, tokenSource })
}

describe('GoogleSheetsClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('reads rows with a bearer token', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify({ values: [['name', 'user_id'], ['Alice', 42]] }), { status: 200 }))
    vi.stubGlobal('fetch', fetchMock)

    const rows = await createClient({ getAccessToken: async () => ({ token: 'test-token' }) }).readRows('users')

    expect(rows).toEqual([['name', 'user_id'], ['Alice', '42']])
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe(`https://sheets.googleapis.com/v4/spreadsheets/sheet-id/values/${encodeURIComponent('\'users\'')}?majorDimension=ROWS`)
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-token')
  })

  it('gives up on a token request that never answers', async () => {
    const fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)
    const stalled: AccessTokenSource = { getAccessToken: () => new Promise<{ token?: string | null }>(() => undefined) }

    const failure = createClient(stalled, 30).readRows('users')

    await expect(failure).rejects.toBeInstanceOf(SheetsRequestError)
    await expect(failure).rejects.toThrow('Google token request timed out after 30ms')
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('surfaces a stalled token request as storage unavailable', async () => {
    vi.stubGlobal('fetch', vi.fn())
    const stalled: AccessTokenSource = { getAccessToken: () => new Promise<{ token?: string | null }>(() => undefined) }
    const store = new SheetsStore({ api: createClient(stalled, 30), timeZone: 'Asia/Taipei' })

    await expect(store.isCheckedIn('Alice', '2024-03-04')).rejects.toBeInstanceOf(StorageUnavailableError)
  })

  it('reports HTTP errors with their status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('{"error":{"code":403}}', { status: 403 })))

    await expect(createClient({ getAccessToken: async () => ({ token: 'test-token' }) }).readRows('users'))
      .rejects.toMatchObject({ name: 'SheetsRequestError', status: 403 })
  })
})

describe('columnLetter', () => {
  it('names columns the way spreadsheets do', () => {
    expect(columnLetter(0)).toBe('A')
    expect(columnLetter(3)).toBe('D')
    expect(columnLetter(26)).toBe('AA')
  })
})
