import { StorageUnavailableError, asErrorMessage } from '../errors.js'
import type { SheetsApi } from '../../integrations/sheets/types.js'
import { logger } from '../../utils/logger.js'
import { formatLocalDateTime, toLocalDateTime } from '../../utils/time.js'
import { lookup } from './types.js'
import type { BindingSnapshot, CheckInRecord, StorageBackend, StorageDiagnostics } from './types.js'

interface TabLayout {
  title: string
  headers: string[]
  rowCount: number
}

export const USERS_TAB: TabLayout = {
  title: 'users',
  headers: ['name', 'user_id', 'updated_at'],
  rowCount: 1000,
}

export const LEDGER_TAB: TabLayout = {
  title: 'checkin_log',
  headers: ['date', 'name', 'when', 'user_id'],
  rowCount: 20000,
}

interface SheetRecord {
  rowNumber: number
  fields: Record<string, string>
}

export interface SheetsStoreOptions {
  api: SheetsApi
  timeZone: string
  now?: () => Date
}

export class SheetsStore implements StorageBackend {
  readonly kind = 'sheets'
  private readonly api: SheetsApi
  private readonly timeZone: string
  private readonly now: () => Date
  private readonly readyTabs = new Set<string>()

  constructor(options: SheetsStoreOptions) {
    this.api = options.api
    this.timeZone = options.timeZone
    this.now = options.now ?? (() => new Date())
  }

  async upsertBinding(name: string, accountId: string): Promise<void> {
    await this.guard('upsertBinding', async () => {
      const records = await this.readRecords(USERS_TAB)
      const matches = records.filter(record =>
        record.fields.name.trim() === name || record.fields.user_id.trim() === accountId)
      const updatedAt = formatLocalDateTime(toLocalDateTime(this.now(), this.timeZone))
      const values = [name, accountId, updatedAt]

      const [target, ...stale] = matches
      if (!target) {
        await this.api.appendRow(USERS_TAB.title, values)
        return
      }

      await this.api.updateRow(USERS_TAB.title, target.rowNumber, values)
      for (const record of stale) {
        logger.info('Clearing superseded binding row', {
          row: record.rowNumber,
          name: record.fields.name,
          accountId: record.fields.user_id,
        })
        await this.api.clearRow(USERS_TAB.title, record.rowNumber, USERS_TAB.headers.length)
      }
    })
  }

  async loadBindings(): Promise<BindingSnapshot> {
    return this.guard('loadBindings', async () => this.snapshot(await this.readRecords(USERS_TAB)))
  }

  async recordCheckIn(record: CheckInRecord): Promise<void> {
    await this.guard('recordCheckIn', async () => {
      await this.ensureTab(LEDGER_TAB)
      await this.api.appendRow(LEDGER_TAB.title, [record.date, record.name, record.when, record.accountId])
    })
  }

  async isCheckedIn(name: string, date: string): Promise<boolean> {
    return this.guard('isCheckedIn', async () => {
      const records = await this.readRecords(LEDGER_TAB)
      return records.some(record => record.fields.date.trim() === date && record.fields.name.trim() === name)
    })
  }

  async listUnchecked(date: string): Promise<string[]> {
    return this.guard('listUnchecked', async () => {
      const bindings = this.snapshot(await this.readRecords(USERS_TAB))
      const ledger = await this.readRecords(LEDGER_TAB)
      const checked = new Set(
        ledger
          .filter(record => record.fields.date.trim() === date)
          .map(record => record.fields.name.trim()),
      )
      return Object.keys(bindings.nameToAccountId).filter(name => !checked.has(name))
    })
  }

  async describe(): Promise<StorageDiagnostics> {
    try {
      const title = await this.api.getTitle()
      const tabs = await this.api.listTabs()
      const users = await this.readRecords(USERS_TAB)
      const ledger = await this.readRecords(LEDGER_TAB)
      return {
        kind: this.kind,
        ok: true,
        title: title ?? null,
        tabs,
        usersRows: users.length,
        checkinLogRows: ledger.length,
      }
    }
    catch (error) {
      return { kind: this.kind, ok: false, error: asErrorMessage(error) }
    }
  }

  private snapshot(records: SheetRecord[]): BindingSnapshot {
    const nameToAccountId: Record<string, string> = {}
    const accountIdToName: Record<string, string> = {}
    for (const record of records) {
      const name = record.fields.name.trim()
      const accountId = record.fields.user_id.trim()
      if (!name || !accountId) continue

      // Later rows win; drop the other side of any pair they displace.
      const displacedName = lookup(accountIdToName, accountId)
      if (displacedName !== undefined) delete nameToAccountId[displacedName]
      const displacedAccount = lookup(nameToAccountId, name)
      if (displacedAccount !== undefined) delete accountIdToName[displacedAccount]

      nameToAccountId[name] = accountId
      accountIdToName[accountId] = name
    }
    return { nameToAccountId, accountIdToName }
  }

  private async ensureTab(layout: TabLayout): Promise<void> {
    if (this.readyTabs.has(layout.title)) return
    const tabs = await this.api.listTabs()
    if (!tabs.includes(layout.title)) {
      logger.info('Creating spreadsheet tab', { tab: layout.title, headers: layout.headers })
      await this.api.addTab(layout.title, layout.headers, layout.rowCount)
    }
    this.readyTabs.add(layout.title)
  }

  private async readRecords(layout: TabLayout): Promise<SheetRecord[]> {
    await this.ensureTab(layout)
    const rows = await this.api.readRows(layout.title)
    const [header, ...body] = rows
    if (!header) return []

    const columns = header.map(cell => cell.trim())
    const records: SheetRecord[] = []
    body.forEach((row, index) => {
      if (row.every(cell => cell.trim() === '')) return
      const fields: Record<string, string> = {}
      for (const column of layout.headers) {
        const position = columns.indexOf(column)
        fields[column] = position >= 0 ? row[position] ?? '' : ''
      }
      records.push({ rowNumber: index + 2, fields })
    })
    return records
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work()
    }
    catch (error) {
      if (error instanceof StorageUnavailableError) throw error
      logger.error('Spreadsheet operation failed', { operation, error })
      throw new StorageUnavailableError(operation, asErrorMessage(error), { cause: error })
    }
  }
}
