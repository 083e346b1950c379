export interface BindingSnapshot {
  nameToAccountId: Record<string, string>
  accountIdToName: Record<string, string>
}

export interface CheckInRecord {
  /** Local calendar date, YYYY-MM-DD. */
  date: string
  name: string
  /** Client-asserted instant as received; may lack an offset. */
  when: string
  accountId: string
}

export type StorageKind = 'file' | 'sheets'

export type StorageDiagnostics = {
  kind: StorageKind
  ok: boolean
  error?: string
} & Record<string, unknown>

/**
 * Persistence contract shared by every backend. Implementations read the
 * underlying store on every call and keep no copy of bindings or check-ins.
 * All failures surface as StorageUnavailableError.
 */
export interface StorageBackend {
  readonly kind: StorageKind
  upsertBinding(name: string, accountId: string): Promise<void>
  loadBindings(): Promise<BindingSnapshot>
  /** Appends a record. Duplicate appends may be kept; dedup happens in the check-in service. */
  recordCheckIn(record: CheckInRecord): Promise<void>
  isCheckedIn(name: string, date: string): Promise<boolean>
  listUnchecked(date: string): Promise<string[]>
  describe(): Promise<StorageDiagnostics>
}

/** Own-property lookup, so names such as "constructor" never hit Object.prototype. */
export function lookup(record: Record<string, string>, key: string): string | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined
}
