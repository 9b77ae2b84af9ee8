import { QueueListener, ResourceExecutor, type ConnectionOptions, type Logger } from '@plaidcloud/remote'
import type { WorkerConfig } from './config'
import { registerAgentResources } from './resources'

/**
 * Start a queue listener for the worker's config.
 * Resolves null when the connection failed before it opened.
 */
export async function startWorker(
  config: WorkerConfig,
  logger: Logger,
  connection: Omit<ConnectionOptions, 'uri' | 'verifySsl' | 'logger'> = {},
): Promise<QueueListener | null> {
  const executor = registerAgentResources(new ResourceExecutor(), logger)

  const listener = new QueueListener({
    ...connection,
    auth: config.auth,
    uri: config.uri,
    verifySsl: config.verifySsl,
    executor,
    logger,
  })

  logger.info('Queue worker starting...')
  const conn = await listener.start()
  if (conn.state === 'closed') {
    logger.error({ url: conn.target.url }, 'Queue connection failed')
    return null
  }
  if (!conn.isOpen) {
    logger.warn({ state: conn.state }, 'Connection not open yet; the listener keeps waiting')
  }
  return listener
}
