import { describe, expect, it } from 'vitest'
import { ConfigError, loadConfig } from '../src/config'

describe('loadConfig', () => {
  it('builds oauth2 credentials and defaults', () => {
    const config = loadConfig({ PLAIDCLOUD_TOKEN: 'test-token' })

    expect(config).toEqual({
      auth: { package: { method: 'oauth2', key: 'test-token' } },
      uri: undefined,
      verifySsl: undefined,
      logLevel: 'info',
    })
  })

  it('reads the target, TLS and proxy settings', () => {
    const config = loadConfig({
      PLAIDCLOUD_TOKEN: 'test-token',
      PLAIDCLOUD_URI: 'https://staging.example.com',
      PLAIDCLOUD_VERIFY_SSL: 'false',
      PLAIDCLOUD_PROXY_HOST: 'proxy.internal:3128',
      PLAIDCLOUD_PROXY_USER: 'svc',
      PLAIDCLOUD_PROXY_PASSWORD: 'test-secret',
      PLAIDCLOUD_LOG_LEVEL: 'debug',
    })

    expect(config.uri).toBe('https://staging.example.com')
    expect(config.verifySsl).toBe(false)
    expect(config.logLevel).toBe('debug')
    expect(config.auth.proxy).toEqual({ host: 'proxy.internal:3128', user: 'svc', password: 'test-secret' })
  })

  it('requires a token', () => {
    expect(() => loadConfig({})).toThrow(ConfigError)
    expect(() => loadConfig({})).toThrow('PLAIDCLOUD_TOKEN: PLAIDCLOUD_TOKEN is required')
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PLAIDCLOUD_TOKEN: 't', PLAIDCLOUD_VERIFY_SSL: 'maybe' })).toThrow(/PLAIDCLOUD_VERIFY_SSL/)
    expect(() => loadConfig({ PLAIDCLOUD_TOKEN: 't', PLAIDCLOUD_LOG_LEVEL: 'loud' })).toThrow(/PLAIDCLOUD_LOG_LEVEL/)
  })
})
