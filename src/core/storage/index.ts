import type { AppConfig } from '../../config/index.js'
import { ConfigError } from '../../config/index.js'
import { GoogleSheetsClient, parseServiceAccount } from '../../integrations/sheets/client.js'
import type { ServiceAccount } from '../../integrations/sheets/client.js'
import { logger } from '../../utils/logger.js'
import { asErrorMessage } from '../errors.js'
import { FileStore } from './file-store.js'
import { SheetsStore } from './sheets-store.js'
import type { StorageBackend } from './types.js'

export type { BindingSnapshot, CheckInRecord, StorageBackend, StorageDiagnostics, StorageKind } from './types.js'
export { FileStore } from './file-store.js'
export { SheetsStore } from './sheets-store.js'

/** Picks the one backend this process will use. */
export function createStorageBackend(config: AppConfig): StorageBackend {
  if (config.storage === 'sheets') {
    if (!config.googleServiceAccountJson || !config.googleSheetId) {
      throw new ConfigError('Spreadsheet storage selected without Google credentials')
    }
    let serviceAccount: ServiceAccount
    try {
      serviceAccount = parseServiceAccount(config.googleServiceAccountJson)
    }
    catch (error) {
      throw new ConfigError(`GOOGLE_SERVICE_ACCOUNT_JSON is not a valid service account key: ${asErrorMessage(error)}`)
    }
    logger.info('Storage backend selected', {
      kind: 'sheets',
      serviceAccount: serviceAccount.client_email,
      spreadsheetId: config.googleSheetId,
    })
    return new SheetsStore({
      api: new GoogleSheetsClient({
        spreadsheetId: config.googleSheetId,
        serviceAccount,
        timeoutMs: config.storageTimeoutMs,
      }),
      timeZone: config.timeZone,
    })
  }

  logger.info('Storage backend selected', { kind: 'file', dataPath: config.dataPath })
  return new FileStore({ dataPath: config.dataPath, lockTimeoutMs: config.storageTimeoutMs })
}
