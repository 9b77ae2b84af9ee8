import { z } from 'zod'
import { AuthError } from './errors'

// ============================================================================
// AuthContext
//
// The credential handle every connection needs. `package` identifies the
// caller and travels as PlaidCloud-* headers on the upgrade request; `proxy`
// is optional and, when absent, no proxy is attempted.
// ============================================================================

export const AUTH_METHODS = ['user', 'agent', 'transform', 'oauth2'] as const

export const ProxyConfigSchema = z.object({
  /** Proxy host, optionally with port, path or a scheme (which is ignored). */
  host: z.string().min(1, 'proxy host must not be empty'),
  user: z.string().optional(),
  password: z.string().optional(),
})

export const AuthPackageSchema = z.object({
  method: z.enum(AUTH_METHODS),
  key: z.string().min(1, 'package key must not be empty'),
  pass: z.string().optional(),
  mfa: z.string().optional(),
})

export const AuthContextSchema = z.object({
  package: AuthPackageSchema,
  proxy: ProxyConfigSchema.optional(),
})

export type AuthMethod = (typeof AUTH_METHODS)[number]
export type ProxyConfig = z.infer<typeof ProxyConfigSchema>
export type AuthPackage = z.infer<typeof AuthPackageSchema>
export type AuthContext = z.infer<typeof AuthContextSchema>

/**
 * Validate an auth context before any I/O happens.
 * Returns a fresh copy; the caller's object is never touched.
 */
export function resolveAuth(auth: unknown): AuthContext {
  if (auth === null || auth === undefined) {
    throw new AuthError('Auth parameter is required')
  }
  const parsed = AuthContextSchema.safeParse(auth)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new AuthError(`Auth parameter must be an AuthContext (${detail})`, { cause: parsed.error })
  }
  return parsed.data
}

/** Headers sent on the upgrade request for this auth package. */
export function authHeaders(auth: AuthContext): Record<string, string> {
  const { method, key, pass, mfa } = auth.package
  const headers: Record<string, string> = {
    'PlaidCloud-Auth-Method': method,
    'PlaidCloud-Key': key,
  }
  if (pass !== undefined) headers['PlaidCloud-Pass'] = pass
  if (mfa !== undefined) headers['PlaidCloud-MFA'] = mfa
  headers['PlaidCloud-Timestamp'] = String(Math.floor(Date.now() / 1000))
  return headers
}

// ── Factories ───────────────────────────────────────────────────────────────

/** Login credentials, with an optional multi-factor code. */
export function userAuth(userName: string, password: string, mfa?: string): AuthContext {
  return { package: { method: 'user', key: userName, pass: password, mfa } }
}

/** Agent key pair registered in PlaidCloud. */
export function agentAuth(
  publicKey: string,
  privateKey: string,
  method: AuthMethod = 'agent',
): AuthContext {
  return { package: { method, key: publicKey, pass: privateKey } }
}

/** Credentials of a running transform: its task id and session id. */
export function transformAuth(taskId: string, sessionId: string): AuthContext {
  return { package: { method: 'transform', key: taskId, pass: sessionId } }
}

export function oauth2Auth(token: string): AuthContext {
  return { package: { method: 'oauth2', key: token } }
}
