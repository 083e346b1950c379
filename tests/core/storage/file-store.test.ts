import fs from 'node:fs'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { StorageUnavailableError } from '../../../src/core/errors.js'
import { FileStore } from '../../../src/core/storage/file-store.js'
import { createTempDir } from '../../helpers/fakes.js'

const DATE = '2024-03-04'

describe('FileStore', () => {
  let dir: string
  let cleanup: () => void
  let store: FileStore

  beforeEach(() => {
    const env = createTempDir()
    dir = env.dir
    cleanup = env.cleanup
    store = new FileStore({ dataPath: dir, lockTimeoutMs: 200 })
  })

  afterEach(() => {
    cleanup()
  })

  it('starts empty when nothing has been written', async () => {
    expect(await store.loadBindings()).toEqual({ nameToAccountId: {}, accountIdToName: {} })
    expect(await store.listUnchecked(DATE)).toEqual([])
  })

  it('keeps both directions of a binding', async () => {
    await store.upsertBinding('Alice', 'U1')
    await store.upsertBinding('Bob', 'U2')

    expect(await store.loadBindings()).toEqual({
      nameToAccountId: { Alice: 'U1', Bob: 'U2' },
      accountIdToName: { U1: 'Alice', U2: 'Bob' },
    })
  })

  it('drops the old name when an account rebinds', async () => {
    await store.upsertBinding('Alice', 'U1')
    await store.upsertBinding('Alicia', 'U1')

    expect(await store.loadBindings()).toEqual({
      nameToAccountId: { Alicia: 'U1' },
      accountIdToName: { U1: 'Alicia' },
    })
  })

  it('moves a name to the account that claimed it last', async () => {
    await store.upsertBinding('Bob', 'U2')
    await store.upsertBinding('Bob', 'U3')

    expect(await store.loadBindings()).toEqual({
      nameToAccountId: { Bob: 'U3' },
      accountIdToName: { U3: 'Bob' },
    })
    const users = JSON.parse(fs.readFileSync(path.join(dir, 'users.json'), 'utf8'))
    expect(Object.keys(users.byAccountId)).toEqual(['U3'])
  })

  it('records each name once per date', async () => {
    await store.upsertBinding('Alice', 'U1')
    await store.recordCheckIn({ date: DATE, name: 'Alice', when: '2024-03-04T07:30:00', accountId: 'U1' })
    await store.recordCheckIn({ date: DATE, name: 'Alice', when: '2024-03-04T07:31:00', accountId: 'U1' })

    expect(await store.isCheckedIn('Alice', DATE)).toBe(true)
    expect(await store.isCheckedIn('Alice', '2024-03-05')).toBe(false)
    const ledger = JSON.parse(fs.readFileSync(path.join(dir, 'checkin_log.json'), 'utf8'))
    expect(ledger).toEqual({ [DATE]: ['Alice'] })
  })

  it('lists bound names without a check-in on the date', async () => {
    await store.upsertBinding('A', 'U1')
    await store.upsertBinding('B', 'U2')
    await store.upsertBinding('C', 'U3')
    await store.recordCheckIn({ date: DATE, name: 'A', when: '2024-03-04T07:00:00', accountId: 'U1' })

    expect(await store.listUnchecked(DATE)).toEqual(['B', 'C'])
    expect(await store.listUnchecked('2024-03-05')).toEqual(['A', 'B', 'C'])
  })

  it('does not confuse names with object built-ins', async () => {
    expect(await store.isCheckedIn('constructor', DATE)).toBe(false)
    await store.upsertBinding('constructor', 'U9')
    expect((await store.loadBindings()).nameToAccountId).toEqual({ constructor: 'U9' })
  })

  it('reports a malformed document as storage unavailable', async () => {
    fs.writeFileSync(path.join(dir, 'users.json'), '{not json')
    await expect(store.loadBindings()).rejects.toBeInstanceOf(StorageUnavailableError)
    await expect(store.upsertBinding('Alice', 'U1')).rejects.toBeInstanceOf(StorageUnavailableError)
  })

  it('gives up when another writer holds the lock', async () => {
    const lease = {
      holder: 'other-process',
      acquiredAt: new Date().toISOString(),
      expiresAt: new Date(Date.now() + 60_000).toISOString(),
    }
    fs.writeFileSync(path.join(dir, 'store.lock'), JSON.stringify(lease))

    await expect(store.upsertBinding('Alice', 'U1')).rejects.toBeInstanceOf(StorageUnavailableError)
    expect(fs.existsSync(path.join(dir, 'users.json'))).toBe(false)
  })

  it('takes over an expired lock', async () => {
    const lease = {
      holder: 'crashed-process',
      acquiredAt: new Date(Date.now() - 120_000).toISOString(),
      expiresAt: new Date(Date.now() - 60_000).toISOString(),
    }
    fs.writeFileSync(path.join(dir, 'store.lock'), JSON.stringify(lease))

    await store.upsertBinding('Alice', 'U1')
    expect((await store.loadBindings()).nameToAccountId).toEqual({ Alice: 'U1' })
    expect(fs.existsSync(path.join(dir, 'store.lock'))).toBe(false)
  })

  it('serializes concurrent writers', async () => {
    const patient = new FileStore({ dataPath: dir })
    await Promise.all([
      patient.recordCheckIn({ date: DATE, name: 'C', when: 'x', accountId: 'U3' }),
      patient.recordCheckIn({ date: DATE, name: 'A', when: 'x', accountId: 'U1' }),
      patient.recordCheckIn({ date: DATE, name: 'B', when: 'x', accountId: 'U2' }),
    ])
    const ledger = JSON.parse(fs.readFileSync(path.join(dir, 'checkin_log.json'), 'utf8'))
    expect(ledger).toEqual({ [DATE]: ['A', 'B', 'C'] })
  })

  it('describes its files', async () => {
    await store.upsertBinding('Alice', 'U1')
    expect(await store.describe()).toEqual({
      kind: 'file',
      ok: true,
      usersPath: path.join(dir, 'users.json'),
      ledgerPath: path.join(dir, 'checkin_log.json'),
      bindings: 1,
      days: 0,
    })
  })
})
