import { JWT } from 'google-auth-library'
import { z } from 'zod'
import { logger } from '../../utils/logger.js'
import type { SheetsApi, SheetRow } from './types.js'

const SHEETS_BASE_URL = 'https://sheets.googleapis.com/v4/spreadsheets'
const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets']

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
})

const spreadsheetSchema = z.object({
  properties: z.object({ title: z.string() }).partial().optional(),
  sheets: z.array(z.object({
    properties: z.object({ title: z.string() }),
  })).default([]),
})

const valueRangeSchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).default([]),
})

export type ServiceAccount = z.infer<typeof serviceAccountSchema>

export function parseServiceAccount(raw: string): ServiceAccount {
  return serviceAccountSchema.parse(JSON.parse(raw))
}

export class SheetsRequestError extends Error {
  readonly status?: number
  readonly body?: string

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'SheetsRequestError'
    this.status = options.status
    this.body = options.body
  }
}

function quoteTab(title: string): string {
  return `'${title.replace(/'/g, '\'\'')}'`
}

export function columnLetter(index: number): string {
  let letters = ''
  let remaining = index + 1
  while (remaining > 0) {
    const offset = (remaining - 1) % 26
    letters = String.fromCharCode(65 + offset) + letters
    remaining = Math.floor((remaining - 1) / 26)
  }
  return letters
}

function rowRange(tab: string, rowNumber: number, width: number): string {
  return `${quoteTab(tab)}!A${rowNumber}:${columnLetter(width - 1)}${rowNumber}`
}

/** Issues bearer tokens; the service-account JWT client unless replaced. */
export interface AccessTokenSource {
  getAccessToken(): Promise<{ token?: string | null }>
}

export interface GoogleSheetsClientOptions {
  spreadsheetId: string
  serviceAccount: ServiceAccount
  timeoutMs: number
  tokenSource?: AccessTokenSource
}

function withDeadline<T>(work: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new SheetsRequestError(message)), timeoutMs)
  })
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer))
}

export class GoogleSheetsClient implements SheetsApi {
  private readonly spreadsheetId: string
  private readonly auth: AccessTokenSource
  private readonly timeoutMs: number

  constructor(options: GoogleSheetsClientOptions) {
    this.spreadsheetId = options.spreadsheetId
    this.timeoutMs = options.timeoutMs
    this.auth = options.tokenSource ?? new JWT({
      email: options.serviceAccount.client_email,
      key: options.serviceAccount.private_key,
      scopes: SHEETS_SCOPES,
    })
    logger.debug('Sheets client initialized', {
      serviceAccount: options.serviceAccount.client_email,
      spreadsheetId: options.spreadsheetId,
    })
  }

  async getTitle(): Promise<string | undefined> {
    const data = spreadsheetSchema.parse(await this.request('GET', '?fields=properties(title),sheets(properties(title))'))
    return data.properties?.title
  }

  async listTabs(): Promise<string[]> {
    const data = spreadsheetSchema.parse(await this.request('GET', '?fields=sheets(properties(title))'))
    return data.sheets.map(sheet => sheet.properties.title)
  }

  async addTab(title: string, headers: string[], rowCount: number): Promise<void> {
    await this.request('POST', ':batchUpdate', {
      requests: [{
        addSheet: {
          properties: {
            title,
            gridProperties: { rowCount, columnCount: headers.length },
          },
        },
      }],
    })
    await this.request('PUT', `/values/${encodeURIComponent(rowRange(title, 1, headers.length))}?valueInputOption=RAW`, {
      values: [headers],
    })
  }

  async readRows(tab: string): Promise<SheetRow[]> {
    const range = encodeURIComponent(quoteTab(tab))
    const data = valueRangeSchema.parse(await this.request('GET', `/values/${range}?majorDimension=ROWS`))
    return data.values.map(row => row.map(cell => String(cell)))
  }

  async updateRow(tab: string, rowNumber: number, values: string[]): Promise<void> {
    const range = encodeURIComponent(rowRange(tab, rowNumber, values.length))
    await this.request('PUT', `/values/${range}?valueInputOption=RAW`, { values: [values] })
  }

  async clearRow(tab: string, rowNumber: number, width: number): Promise<void> {
    const range = encodeURIComponent(rowRange(tab, rowNumber, width))
    await this.request('POST', `/values/${range}:clear`, {})
  }

  async appendRow(tab: string, values: string[]): Promise<void> {
    const range = encodeURIComponent(`${quoteTab(tab)}!A1`)
    await this.request('POST', `/values/${range}:append?valueInputOption=RAW&insertDataOption=INSERT_ROWS`, {
      majorDimension: 'ROWS',
      values: [values],
    })
  }

  private async request(method: 'GET' | 'POST' | 'PUT', suffix: string, body?: unknown): Promise<unknown> {
    const url = `${SHEETS_BASE_URL}/${encodeURIComponent(this.spreadsheetId)}${suffix}`
    const startedAt = Date.now()

    let token: string
    try {
      const access = await withDeadline(
        this.auth.getAccessToken(),
        this.timeoutMs,
        `Google token request timed out after ${this.timeoutMs}ms`,
      )
      if (!access.token) throw new Error('no access token returned')
      token = access.token
    }
    catch (error) {
      if (error instanceof SheetsRequestError) throw error
      throw new SheetsRequestError('Google service account authorization failed', { cause: error })
    }

    // The token exchange and the call share one budget.
    const signal = AbortSignal.timeout(Math.max(1, this.timeoutMs - (Date.now() - startedAt)))

    logger.debug('Sheets API request', { method, path: suffix.split('?')[0] })

    let response: Response
    try {
      response = await fetch(url, {
        method,
        signal,
        headers: {
          'authorization': `Bearer ${token}`,
          'content-type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      })
    }
    catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
      throw new SheetsRequestError(
        timedOut ? `Sheets API timed out after ${this.timeoutMs}ms` : 'Sheets API network request failed',
        { cause: error },
      )
    }

    const text = await response.text()
    if (!response.ok) {
      throw new SheetsRequestError(`Sheets API HTTP ${response.status}`, {
        status: response.status,
        body: text.slice(0, 500),
      })
    }
    if (text.length === 0) return {}

    try {
      return JSON.parse(text)
    }
    catch (error) {
      throw new SheetsRequestError('Sheets API returned a non-JSON payload', { status: response.status, cause: error })
    }
  }
}
