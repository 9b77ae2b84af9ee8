import WebSocket from 'ws'
import { resolveAuth, type AuthContext } from './auth'
import { ConnectionError, toConnectionError } from './errors'
import { encodeJson, frameText } from './frames'
import { createLogger, type Logger } from './logger'
import { buildSocketOptions, resolveTarget, type ConnectionTarget, type TargetOptions } from './target'

// ============================================================================
// Public types
// ============================================================================

export type ConnectionState = 'connecting' | 'open' | 'closing' | 'closed' | 'error'

/**
 * Lifecycle callbacks of a persistent connection. They run one at a time,
 * in arrival order, never on the caller's stack. A callback may return a
 * promise; the next one waits for it.
 */
export interface ConnectionCallbacks {
  onOpen(conn: Connect): void | Promise<void>
  onMessage(conn: Connect, message: string): void | Promise<void>
  onError(conn: Connect, error: ConnectionError): void | Promise<void>
  onClose(conn: Connect, code: number, reason: string): void | Promise<void>
}

export interface ConnectionOptions extends TargetOptions {
  /** Interval between WebSocket pings while open. Default 10s; 0 disables. */
  pingIntervalMs?: number
  /** Poll interval of the bounded wait in `Connect.open`. Default 1s. */
  openPollIntervalMs?: number
  /** Poll attempts of the bounded wait in `Connect.open`. Default 5. */
  openPollAttempts?: number
  handshakeTimeoutMs?: number
  logger?: Logger
}

export interface ConnectOptions extends ConnectionOptions {
  auth: AuthContext
  callbackType: string
  callbacks: ConnectionCallbacks
}

const DEFAULT_PING_INTERVAL_MS = 10_000
const DEFAULT_OPEN_POLL_INTERVAL_MS = 1_000
const DEFAULT_OPEN_POLL_ATTEMPTS = 5

// ============================================================================
// Connect
// ============================================================================

/**
 * A long-lived socket that dispatches lifecycle callbacks.
 *
 * The socket is owned exclusively by this object. Socket events are funnelled
 * into a mailbox (a promise chain) that is the single consumer running the
 * callbacks, so no two callbacks of one connection ever overlap.
 *
 * ```typescript
 * const conn = await Connect.open({
 *   auth: oauth2Auth(token),
 *   callbackType: 'queue_listen',
 *   callbacks: { onOpen, onMessage, onError, onClose },
 * })
 * conn.send({ hello: 'world' })
 * await conn.close()
 * ```
 */
export class Connect {
  readonly target: ConnectionTarget
  private readonly ws: WebSocket | null
  private readonly callbacks: ConnectionCallbacks
  private readonly logger: Logger
  private _state: ConnectionState = 'connecting'
  private mailbox: Promise<void> = Promise.resolve()
  private heartbeat: NodeJS.Timeout | null = null
  private closeDispatched = false
  private readonly closed: Promise<void>
  private markClosed: () => void = () => { }

  /**
   * Start connecting. Throws AuthError for an invalid auth context; every
   * other failure is reported through `onError` and `onClose`.
   */
  constructor(private readonly options: ConnectOptions) {
    const auth = resolveAuth(options.auth)
    this.callbacks = options.callbacks
    this.logger = options.logger ?? createLogger('connect')
    this.target = resolveTarget(options.uri, options.callbackType, options.verifySsl)
    this.closed = new Promise<void>((resolve) => { this.markClosed = resolve })

    let ws: WebSocket | null = null
    try {
      ws = new WebSocket(
        this.target.url,
        buildSocketOptions({
          auth,
          target: this.target,
          handshakeTimeoutMs: options.handshakeTimeoutMs,
          logger: this.logger,
        }),
      )
    } catch (err) {
      this._handleError(toConnectionError(err, `Cannot connect to ${this.target.url}`))
      this._handleClose(1006, '')
    }
    this.ws = ws

    if (ws) {
      ws.on('open', () => this._handleOpen())
      ws.on('message', (data) => this._handleMessage(frameText(data)))
      ws.on('error', (err) => this._handleError(toConnectionError(err)))
      ws.on('close', (code, reason) => this._handleClose(code, reason.toString()))
    }
  }

  /**
   * Construct and wait, within the poll budget, for the socket to open.
   * Returns the connection whether or not it opened in time.
   */
  static async open(options: ConnectOptions): Promise<Connect> {
    const conn = new Connect(options)
    await conn.waitUntilOpen(options.openPollAttempts, options.openPollIntervalMs)
    return conn
  }

  get state(): ConnectionState {
    return this._state
  }

  get isOpen(): boolean {
    return this._state === 'open'
  }

  /**
   * Poll the state at a fixed interval for a fixed number of attempts.
   * Resolves true if the connection is open, false once the budget is spent
   * or the connection has closed.
   */
  async waitUntilOpen(
    attempts = this.options.openPollAttempts ?? DEFAULT_OPEN_POLL_ATTEMPTS,
    intervalMs = this.options.openPollIntervalMs ?? DEFAULT_OPEN_POLL_INTERVAL_MS,
  ): Promise<boolean> {
    for (let attempt = 0; attempt < attempts; attempt++) {
      if (this._state === 'open') return true
      if (this._state === 'closed') return false
      await new Promise(r => setTimeout(r, intervalMs))
    }
    return this._state === 'open'
  }

  /** JSON-encode and send a message. */
  send(message: unknown): void {
    this.sendRaw(encodeJson(message))
  }

  /** Send a text frame as-is (control strings such as "ping" and "ack"). */
  sendRaw(text: string): void {
    const ws = this.ws
    if (!ws || this._state !== 'open') {
      throw new ConnectionError(`Cannot send while the connection is ${this._state}`)
    }
    ws.send(text, (err) => {
      if (err) this.logger.warn({ err, url: this.target.url }, 'Send failed')
    })
  }

  /**
   * Close the socket. Idempotent; resolves once the socket is closed. Does
   * not wait for queued callbacks, so it is safe to await from a callback.
   */
  async close(): Promise<void> {
    if (this._state === 'closed') return
    if (this._state !== 'closing') {
      this._state = 'closing'
      this._stopHeartbeat()
      this.ws?.close()
    }
    await this.closed
  }

  /** Resolves once every callback queued so far has run. */
  async idle(): Promise<void> {
    let tail: Promise<void>
    do {
      tail = this.mailbox
      await tail
    } while (tail !== this.mailbox)
  }

  // ── Internal ──────────────────────────────────────────────────────────────

  private _enqueue(callback: keyof ConnectionCallbacks, run: () => void | Promise<void>): void {
    this.mailbox = this.mailbox.then(async () => {
      try {
        await run()
      } catch (err) {
        // Callback failures are isolated to the callback that raised them.
        this.logger.error({ err, callback, url: this.target.url }, 'Connection callback failed')
      }
    })
  }

  private _handleOpen(): void {
    if (this._state !== 'connecting') return
    this._state = 'open'
    this._startHeartbeat()
    this.logger.debug({ url: this.target.url }, 'Connection open')
    this._enqueue('onOpen', () => this.callbacks.onOpen(this))
  }

  private _handleMessage(message: string): void {
    this._enqueue('onMessage', () => this.callbacks.onMessage(this, message))
  }

  private _handleError(error: ConnectionError): void {
    if (this._state === 'closing' || this._state === 'closed') {
      this.logger.debug({ err: error }, 'Ignoring socket error during close')
      return
    }
    this._state = 'error'
    this._stopHeartbeat()
    this._enqueue('onError', () => this.callbacks.onError(this, error))
  }

  private _handleClose(code: number, reason: string): void {
    this._state = 'closed'
    this._stopHeartbeat()
    if (!this.closeDispatched) {
      this.closeDispatched = true
      this.logger.debug({ url: this.target.url, code, reason }, 'Connection closed')
      this._enqueue('onClose', () => this.callbacks.onClose(this, code, reason))
    }
    this.markClosed()
  }

  private _startHeartbeat(): void {
    const interval = this.options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS
    const ws = this.ws
    if (interval <= 0 || !ws) return
    this.heartbeat = setInterval(() => {
      if (ws.readyState === WebSocket.OPEN) ws.ping()
    }, interval)
  }

  private _stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat)
      this.heartbeat = null
    }
  }
}
