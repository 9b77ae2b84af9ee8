import type { Logger, ResourceExecutor } from '@plaidcloud/remote'

/** Resource url of the worker's own control commands. */
export const AGENT_RESOURCE = 'agent'

/**
 * Register the worker's control resource:
 *   agent/ping     log a heartbeat
 *   agent/exit     stop listening
 *   agent/restart  reserved, acknowledged and logged only
 */
export function registerAgentResources(executor: ResourceExecutor, logger: Logger): ResourceExecutor {
  return executor
    .register(AGENT_RESOURCE, 'ping', (config) => {
      logger.info({ config }, 'Ping from PlaidCloud')
    })
    .register(AGENT_RESOURCE, 'exit', () => ({ exit: true }))
    .register(AGENT_RESOURCE, 'restart', () => ({ restart: true }))
}
