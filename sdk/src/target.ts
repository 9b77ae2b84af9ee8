import { HttpsProxyAgent } from 'https-proxy-agent'
import type { ClientOptions } from 'ws'
import { authHeaders, type AuthContext, type ProxyConfig } from './auth'
import type { Logger } from './logger'

// ============================================================================
// Target resolution
// ============================================================================

export const PRODUCTION_HOST = 'plaidcloud.com'
export const SOCKET_PATH = '/socket'

export type SocketScheme = 'ws' | 'wss'

export interface ConnectionTarget {
  readonly scheme: SocketScheme
  readonly host: string
  readonly path: string
  readonly url: string
  /** Names the server-side feed the connection is routed to. */
  readonly callbackType: string
  readonly verifySsl: boolean
}

export interface TargetOptions {
  /** Bare host, host/path or full URI. Default: the production host. */
  uri?: string | null
  /**
   * Verify the server's TLS certificate. Default: true. Always on for the
   * production host given without a scheme.
   */
  verifySsl?: boolean
}

const SCHEME_ALIASES: Record<string, SocketScheme> = {
  ws: 'ws',
  wss: 'wss',
  http: 'ws',
  https: 'wss',
}

function splitScheme(uri: string): { scheme: SocketScheme | null; rest: string } {
  const match = /^([a-z][a-z0-9+.-]*):\/\//i.exec(uri)
  if (!match) return { scheme: null, rest: uri }
  const scheme = SCHEME_ALIASES[match[1].toLowerCase()]
  if (!scheme) return { scheme: null, rest: uri }
  return { scheme, rest: uri.slice(match[0].length) }
}

/**
 * Canonical socket endpoint for a host or URI.
 *
 *   normalizeUri(null)                 // 'wss://plaidcloud.com/socket'
 *   normalizeUri('example.com')        // 'wss://example.com/socket'
 *   normalizeUri('ws://localhost:8080')// 'ws://localhost:8080/socket'
 */
export function normalizeUri(uri?: string | null): string {
  const { scheme, rest } = splitScheme(uri ?? `${PRODUCTION_HOST}${SOCKET_PATH}`)
  const location = rest.endsWith(SOCKET_PATH) ? rest : `${rest.replace(/\/+$/, '')}${SOCKET_PATH}`
  return `${scheme ?? 'wss'}://${location}`
}

function isProductionHost(host: string): boolean {
  const hostname = host.replace(/:\d+$/, '').toLowerCase()
  return hostname === PRODUCTION_HOST || hostname.endsWith(`.${PRODUCTION_HOST}`)
}

export function resolveTarget(
  uri: string | null | undefined,
  callbackType: string,
  verifySsl?: boolean,
): ConnectionTarget {
  const explicitScheme = uri != null && splitScheme(uri).scheme !== null
  const url = normalizeUri(uri)
  const { scheme, rest } = splitScheme(url)
  const slash = rest.indexOf('/')
  const host = rest.slice(0, slash)
  const path = rest.slice(slash)

  const forceVerify = !explicitScheme && isProductionHost(host)

  return Object.freeze({
    scheme: scheme ?? 'wss',
    host,
    path,
    url,
    callbackType: String(callbackType),
    verifySsl: forceVerify ? true : verifySsl ?? true,
  })
}

// ============================================================================
// Proxy settings
// ============================================================================

export type ProxySettings = Partial<Record<'http' | 'https', string>>

/**
 * Scheme-keyed proxy URLs with basic-auth credentials in the authority.
 * Returns `{}` when no proxy is configured.
 */
export function buildProxySettings(proxy?: ProxyConfig): ProxySettings {
  if (!proxy) return {}

  const raw = /:\/\//.test(proxy.host) ? proxy.host : `http://${proxy.host}`
  const parsed = new URL(raw)
  const location = `${parsed.host}${parsed.pathname === '/' ? '' : parsed.pathname}`

  const credentials = proxy.user !== undefined
    ? `${encodeURIComponent(proxy.user)}:${encodeURIComponent(proxy.password ?? '')}@`
    : ''

  return {
    http: `http://${credentials}${location}`,
    https: `https://${credentials}${location}`,
  }
}

/**
 * Proxy url the tunnelling agent dials. The proxy is spoken to over plain
 * HTTP `CONNECT` for both target schemes; TLS to the proxy itself only when
 * its host says `https://`.
 */
export function proxyAgentUrl(proxy?: ProxyConfig): string | undefined {
  if (!proxy) return undefined
  const settings = buildProxySettings(proxy)
  return /^https:\/\//i.test(proxy.host) ? settings.https : settings.http
}

// ============================================================================
// ws client options
// ============================================================================

export interface SocketOptionsInput {
  auth: AuthContext
  target: ConnectionTarget
  handshakeTimeoutMs?: number
  logger?: Logger
}

/** Headers, TLS and proxy agent for the ws client of a target. */
export function buildSocketOptions(input: SocketOptionsInput): ClientOptions {
  const { auth, target, handshakeTimeoutMs, logger } = input

  const options: ClientOptions = {
    headers: {
      ...authHeaders(auth),
      'callback-type': target.callbackType,
    },
    rejectUnauthorized: target.verifySsl,
  }
  if (handshakeTimeoutMs !== undefined) options.handshakeTimeout = handshakeTimeoutMs

  if (!target.verifySsl && target.scheme === 'wss') {
    logger?.warn({ url: target.url }, 'TLS certificate verification is disabled for this connection')
  }

  const proxyUrl = proxyAgentUrl(auth.proxy)
  if (proxyUrl) options.agent = new HttpsProxyAgent(proxyUrl)

  return options
}
