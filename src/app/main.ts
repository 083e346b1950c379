import { App } from './App.js'
import { closeLogger, logger } from '../utils/logger.js'

const app = new App()

function shutdown(signal: NodeJS.Signals): void {
  logger.info('Shutdown requested', { signal })
  app.stop()
    .catch((error: unknown) => {
      logger.error('Shutdown failed', { error })
      process.exitCode = 1
    })
    .finally(() => closeLogger())
}

process.once('SIGINT', shutdown)
process.once('SIGTERM', shutdown)

app.start().catch((error) => {
  logger.error('Fatal error', { error })
  process.exitCode = 1
  app.stop()
    .catch((stopError: unknown) => logger.warn('Cleanup after failed start also failed', { error: stopError }))
    .finally(() => closeLogger())
})
