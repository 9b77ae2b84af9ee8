import pino, { type Logger } from 'pino'

export type { Logger }

const DEFAULT_LEVEL = 'info'

/**
 * Named pino logger for SDK components. The level comes from
 * `PLAIDCLOUD_LOG_LEVEL` unless given explicitly.
 */
export function createLogger(name: string, level?: string): Logger {
  return pino({
    name,
    level: level ?? process.env.PLAIDCLOUD_LOG_LEVEL ?? DEFAULT_LEVEL,
    serializers: { err: pino.stdSerializers.err },
  })
}
