// ============================================================================
// Error taxonomy
// ============================================================================

/**
 * Base class for every error raised by the SDK.
 *
 * @example
 * ```typescript
 * try {
 *   await quickConnect(auth, 'handle', requestCb({ method: 'get' }))
 * } catch (err) {
 *   if (err instanceof AuthError) console.error('bad credentials object')
 *   else if (err instanceof ConnectionError) console.error('socket failed:', err.cause)
 * }
 * ```
 */
export class RemoteError extends Error {
  override readonly cause?: unknown

  constructor(message: string, options?: { cause?: unknown }) {
    super(message)
    this.name = new.target.name
    this.cause = options?.cause
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** The auth context is missing, null, or lacks its package identifier. */
export class AuthError extends RemoteError {}

/** Transport-level failure: refused connection, failed handshake, reset socket. */
export class ConnectionError extends RemoteError {}

/** A frame could not be decoded into the expected shape. */
export class ProtocolError extends RemoteError {
  /** The raw frame that failed to decode. */
  readonly frame?: string

  constructor(message: string, options?: { cause?: unknown; frame?: string }) {
    super(message, options)
    this.frame = options?.frame
  }
}

/**
 * The task executor failed while processing a task descriptor.
 * Carries the resource `url` and `method` of the task that failed.
 */
export class TaskExecutionError extends RemoteError {
  readonly url?: string
  readonly method?: string

  constructor(message: string, options?: { cause?: unknown; url?: string; method?: string }) {
    super(message, options)
    this.url = options?.url
    this.method = options?.method
  }
}

/** Wrap whatever was thrown into a ConnectionError, keeping it as cause. */
export function toConnectionError(err: unknown, context?: string): ConnectionError {
  if (err instanceof ConnectionError) return err
  const detail = err instanceof Error ? err.message : String(err)
  return new ConnectionError(context ? `${context}: ${detail}` : detail, { cause: err })
}
