import { MalformedInputError } from '../errors.js'
import { lookup } from '../storage/types.js'
import type { BindingSnapshot, StorageBackend } from '../storage/types.js'

// Stored as object keys in both backends; this one would replace the prototype instead.
const RESERVED_KEYS = new Set(['__proto__'])

export function normalizeName(raw: string): string {
  return raw.trim()
}

export class DirectoryService {
  private readonly storage: StorageBackend

  constructor(storage: StorageBackend) {
    this.storage = storage
  }

  async bind(rawName: string, accountId: string): Promise<string> {
    const name = normalizeName(rawName)
    if (!name) {
      throw new MalformedInputError('Name must not be empty')
    }
    if (!accountId.trim()) {
      throw new MalformedInputError('Account id must not be empty')
    }
    if (RESERVED_KEYS.has(name) || RESERVED_KEYS.has(accountId)) {
      throw new MalformedInputError(`"${RESERVED_KEYS.has(name) ? name : accountId}" cannot be bound`)
    }
    await this.storage.upsertBinding(name, accountId)
    return name
  }

  async snapshot(): Promise<BindingSnapshot> {
    return this.storage.loadBindings()
  }

  async accountIdFor(name: string): Promise<string | undefined> {
    const bindings = await this.storage.loadBindings()
    return lookup(bindings.nameToAccountId, normalizeName(name))
  }

  async nameFor(accountId: string): Promise<string | undefined> {
    const bindings = await this.storage.loadBindings()
    return lookup(bindings.accountIdToName, accountId)
  }
}
