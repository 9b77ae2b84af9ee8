import * as dotenv from 'dotenv'
import { createLogger } from '@plaidcloud/remote'
import { loadConfig } from './config'
import { startWorker } from './worker'

dotenv.config()

async function run() {
  const config = loadConfig()
  const logger = createLogger('queue-worker', config.logLevel)

  const listener = await startWorker(config, logger)
  if (!listener) {
    process.exitCode = 1
    return
  }

  process.once('SIGINT', () => {
    logger.info('Interrupted, closing the queue connection')
    listener.stop().catch((err: unknown) => logger.error({ err }, 'Failed to close the queue connection'))
  })
}

run().catch((err: unknown) => {
  console.error(err)
  process.exitCode = 1
})
