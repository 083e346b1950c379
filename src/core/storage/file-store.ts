import { randomUUID } from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { StorageUnavailableError, asErrorMessage } from '../errors.js'
import { logger } from '../../utils/logger.js'
import { nowIso } from '../../utils/time.js'
import { lookup } from './types.js'
import type { BindingSnapshot, CheckInRecord, StorageBackend, StorageDiagnostics } from './types.js'

const usersDocumentSchema = z.object({
  byAccountId: z.record(z.object({
    name: z.string(),
    updatedAt: z.string().optional(),
  })).default({}),
  byName: z.record(z.string()).default({}),
})

const ledgerDocumentSchema = z.record(z.array(z.string()))

const lockSchema = z.object({
  holder: z.string().min(1),
  expiresAt: z.string().min(1),
  acquiredAt: z.string().min(1),
})

type UsersDocument = z.infer<typeof usersDocumentSchema>
type LedgerDocument = z.infer<typeof ledgerDocumentSchema>

const LOCK_RETRY_MS = 25

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export interface FileStoreOptions {
  dataPath: string
  /** How long a writer waits for the lock before giving up. */
  lockTimeoutMs?: number
  /** Age after which a lock left behind by a crashed writer is taken over. */
  lockTtlMs?: number
}

export class FileStore implements StorageBackend {
  readonly kind = 'file'
  readonly dataPath: string
  readonly usersPath: string
  readonly ledgerPath: string
  private readonly lockPath: string
  private readonly lockTimeoutMs: number
  private readonly lockTtlMs: number

  constructor(options: FileStoreOptions) {
    this.dataPath = options.dataPath
    this.usersPath = path.join(options.dataPath, 'users.json')
    this.ledgerPath = path.join(options.dataPath, 'checkin_log.json')
    this.lockPath = path.join(options.dataPath, 'store.lock')
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5000
    this.lockTtlMs = options.lockTtlMs ?? 10_000
  }

  async upsertBinding(name: string, accountId: string): Promise<void> {
    await this.withLock('upsertBinding', async () => {
      const users = await this.readUsers('upsertBinding')

      const previousName = Object.hasOwn(users.byAccountId, accountId) ? users.byAccountId[accountId].name : undefined
      if (previousName !== undefined && previousName !== name && lookup(users.byName, previousName) === accountId) {
        delete users.byName[previousName]
      }

      const previousOwner = lookup(users.byName, name)
      if (previousOwner !== undefined && previousOwner !== accountId) {
        delete users.byAccountId[previousOwner]
      }

      users.byAccountId[accountId] = { name, updatedAt: nowIso() }
      users.byName[name] = accountId
      await this.writeDocument('upsertBinding', this.usersPath, users)
      logger.debug('Binding saved', { name, previousName: previousName ?? null, replacedAccount: previousOwner ?? null })
    })
  }

  async loadBindings(): Promise<BindingSnapshot> {
    const users = await this.readUsers('loadBindings')
    const nameToAccountId: Record<string, string> = {}
    const accountIdToName: Record<string, string> = {}
    for (const [name, accountId] of Object.entries(users.byName)) {
      nameToAccountId[name] = accountId
      accountIdToName[accountId] = name
    }
    return { nameToAccountId, accountIdToName }
  }

  async recordCheckIn(record: CheckInRecord): Promise<void> {
    await this.withLock('recordCheckIn', async () => {
      const ledger = await this.readLedger('recordCheckIn')
      const names = new Set(Object.hasOwn(ledger, record.date) ? ledger[record.date] : [])
      names.add(record.name)
      ledger[record.date] = Array.from(names).sort()
      await this.writeDocument('recordCheckIn', this.ledgerPath, ledger)
    })
  }

  async isCheckedIn(name: string, date: string): Promise<boolean> {
    const ledger = await this.readLedger('isCheckedIn')
    return Object.hasOwn(ledger, date) && ledger[date].includes(name)
  }

  async listUnchecked(date: string): Promise<string[]> {
    const [bindings, ledger] = await Promise.all([
      this.loadBindings(),
      this.readLedger('listUnchecked'),
    ])
    const checked = new Set(Object.hasOwn(ledger, date) ? ledger[date] : [])
    return Object.keys(bindings.nameToAccountId).filter(name => !checked.has(name))
  }

  async describe(): Promise<StorageDiagnostics> {
    try {
      const [users, ledger] = await Promise.all([
        this.readUsers('describe'),
        this.readLedger('describe'),
      ])
      return {
        kind: this.kind,
        ok: true,
        usersPath: this.usersPath,
        ledgerPath: this.ledgerPath,
        bindings: Object.keys(users.byName).length,
        days: Object.keys(ledger).length,
      }
    }
    catch (error) {
      return { kind: this.kind, ok: false, usersPath: this.usersPath, ledgerPath: this.ledgerPath, error: asErrorMessage(error) }
    }
  }

  private async readUsers(operation: string): Promise<UsersDocument> {
    return this.readDocument(operation, this.usersPath, usersDocumentSchema, () => ({ byAccountId: {}, byName: {} }))
  }

  private async readLedger(operation: string): Promise<LedgerDocument> {
    return this.readDocument(operation, this.ledgerPath, ledgerDocumentSchema, () => ({}))
  }

  private async readDocument<T>(
    operation: string,
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fallback: () => T,
  ): Promise<T> {
    let raw: string
    try {
      raw = await fs.readFile(filePath, 'utf8')
    }
    catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return fallback()
      logger.error('Store document read failed', { operation, path: filePath, error })
      throw new StorageUnavailableError(operation, `cannot read ${filePath}`, { cause: error })
    }

    try {
      return schema.parse(JSON.parse(raw))
    }
    catch (error) {
      logger.error('Store document is malformed', { operation, path: filePath, error })
      throw new StorageUnavailableError(operation, `malformed document ${filePath}`, { cause: error })
    }
  }

  // Written to a temp file and renamed so lock-free readers never see a partial document.
  private async writeDocument(operation: string, filePath: string, document: unknown): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`
    try {
      await fs.mkdir(this.dataPath, { recursive: true })
      await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8')
      await fs.rename(tempPath, filePath)
    }
    catch (error) {
      logger.error('Store document write failed', { operation, path: filePath, error })
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.debug('Temp document cleanup failed', { path: tempPath, error: cleanupError })
      })
      throw new StorageUnavailableError(operation, `cannot write ${filePath}`, { cause: error })
    }
  }

  private async withLock<T>(operation: string, work: () => Promise<T>): Promise<T> {
    const holder = randomUUID()
    const deadline = Date.now() + this.lockTimeoutMs
    while (!(await this.tryAcquire(operation, holder))) {
      if (Date.now() >= deadline) {
        throw new StorageUnavailableError(operation, `timed out waiting for ${this.lockPath}`)
      }
      await sleep(LOCK_RETRY_MS)
    }

    try {
      return await work()
    }
    finally {
      await this.release(holder)
    }
  }

  private async tryAcquire(operation: string, holder: string): Promise<boolean> {
    const now = Date.now()
    const lease = {
      holder,
      acquiredAt: new Date(now).toISOString(),
      expiresAt: new Date(now + this.lockTtlMs).toISOString(),
    }

    try {
      await fs.mkdir(this.dataPath, { recursive: true })
      const handle = await fs.open(this.lockPath, 'wx')
      try {
        await handle.writeFile(JSON.stringify(lease), 'utf8')
      }
      finally {
        await handle.close()
      }
      return true
    }
    catch (error) {
      if (!isNodeError(error) || error.code !== 'EEXIST') {
        throw new StorageUnavailableError(operation, `cannot create ${this.lockPath}`, { cause: error })
      }
    }

    try {
      const existing = lockSchema.parse(JSON.parse(await fs.readFile(this.lockPath, 'utf8')))
      const expiresAt = new Date(existing.expiresAt).getTime()
      if (Number.isFinite(expiresAt) && expiresAt > now) return false
      logger.warn('Store lock expired; taking over', { operation, previousHolder: existing.holder })
    }
    catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return false
      // Malformed while its creator is still writing; only an old one is abandoned.
      const stat = await fs.stat(this.lockPath).catch(() => null)
      if (!stat || now - stat.mtimeMs < this.lockTtlMs) return false
      logger.warn('Store lock unreadable; taking over', { operation, error })
    }

    try {
      await fs.rm(this.lockPath, { force: true })
    }
    catch (error) {
      throw new StorageUnavailableError(operation, `cannot remove stale ${this.lockPath}`, { cause: error })
    }
    return false
  }

  private async release(holder: string): Promise<void> {
    try {
      const existing = lockSchema.parse(JSON.parse(await fs.readFile(this.lockPath, 'utf8')))
      if (existing.holder !== holder) return
      await fs.rm(this.lockPath, { force: true })
    }
    catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return
      logger.warn('Store lock release failed', { path: this.lockPath, error })
    }
  }
}
