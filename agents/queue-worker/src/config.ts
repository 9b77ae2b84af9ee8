import { z } from 'zod'
import { oauth2Auth, type AuthContext } from '@plaidcloud/remote'

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const EnvSchema = z.object({
  PLAIDCLOUD_TOKEN: z.string({ required_error: 'PLAIDCLOUD_TOKEN is required' }).min(1, 'PLAIDCLOUD_TOKEN is required'),
  PLAIDCLOUD_URI: z.string().min(1).optional(),
  PLAIDCLOUD_VERIFY_SSL: z.enum(['true', 'false']).optional(),
  PLAIDCLOUD_PROXY_HOST: z.string().min(1).optional(),
  PLAIDCLOUD_PROXY_USER: z.string().optional(),
  PLAIDCLOUD_PROXY_PASSWORD: z.string().optional(),
  PLAIDCLOUD_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export interface WorkerConfig {
  auth: AuthContext
  uri?: string
  verifySsl?: boolean
  logLevel: (typeof LOG_LEVELS)[number]
}

/** Read the worker configuration from the environment (after dotenv has run). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '))
  }
  const vars = parsed.data

  const auth: AuthContext = oauth2Auth(vars.PLAIDCLOUD_TOKEN)
  if (vars.PLAIDCLOUD_PROXY_HOST) {
    auth.proxy = {
      host: vars.PLAIDCLOUD_PROXY_HOST,
      user: vars.PLAIDCLOUD_PROXY_USER,
      password: vars.PLAIDCLOUD_PROXY_PASSWORD,
    }
  }

  return {
    auth,
    uri: vars.PLAIDCLOUD_URI,
    verifySsl: vars.PLAIDCLOUD_VERIFY_SSL === undefined ? undefined : vars.PLAIDCLOUD_VERIFY_SSL === 'true',
    logLevel: vars.PLAIDCLOUD_LOG_LEVEL,
  }
}
