import WebSocket from 'ws'
import { resolveAuth, type AuthContext } from './auth'
import { ConnectionError, toConnectionError } from './errors'
import { decodeJson, encodeJson, frameText, type JsonValue } from './frames'
import { createLogger, type Logger } from './logger'
import { buildSocketOptions, resolveTarget, type TargetOptions } from './target'

// ============================================================================
// SessionSocket: ordered reads over a ws client
// ============================================================================

interface Waiter {
  resolve: (frame: string) => void
  reject: (err: Error) => void
}

/**
 * A connected socket for one-shot exchanges. Inbound frames are buffered
 * from the moment the socket is created, so `recv()` never misses a frame
 * that arrived before it was called.
 */
export class SessionSocket {
  private readonly inbox: string[] = []
  private readonly waiters: Waiter[] = []
  private failure: ConnectionError | null = null

  private constructor(private readonly ws: WebSocket) {
    ws.on('message', (data) => this._push(frameText(data)))
    ws.on('error', (err) => this._fail(toConnectionError(err, 'Socket error')))
    ws.on('close', (code) => this._fail(new ConnectionError(`Socket closed (code ${code})`)))
  }

  /** Open a socket and resolve once the upgrade has completed. */
  static connect(url: string, options?: WebSocket.ClientOptions): Promise<SessionSocket> {
    return new Promise((resolve, reject) => {
      let ws: WebSocket
      try {
        ws = new WebSocket(url, options)
      } catch (err) {
        reject(toConnectionError(err, `Cannot connect to ${url}`))
        return
      }
      const socket = new SessionSocket(ws)
      ws.once('open', () => resolve(socket))
      ws.once('error', (err) => reject(toConnectionError(err, `Cannot connect to ${url}`)))
    })
  }

  /** Next inbound frame. Rejects with ConnectionError once the socket is gone. */
  recv(): Promise<string> {
    const frame = this.inbox.shift()
    if (frame !== undefined) return Promise.resolve(frame)
    if (this.failure) return Promise.reject(this.failure)
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject })
    })
  }

  send(text: string): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(this.failure ?? new ConnectionError('Socket is not open'))
    }
    return new Promise((resolve, reject) => {
      this.ws.send(text, (err) => {
        if (err) reject(toConnectionError(err, 'Send failed'))
        else resolve()
      })
    })
  }

  /** Close the socket; resolves once the close handshake has finished. */
  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return Promise.resolve()
    return new Promise((resolve) => {
      this.ws.once('close', () => resolve())
      this.ws.close()
    })
  }

  private _push(frame: string): void {
    const waiter = this.waiters.shift()
    if (waiter) waiter.resolve(frame)
    else this.inbox.push(frame)
  }

  private _fail(err: ConnectionError): void {
    if (this.failure) return
    this.failure = err
    for (const waiter of this.waiters.splice(0)) waiter.reject(err)
  }
}

// ============================================================================
// quickConnect
// ============================================================================

export type SessionRun<T> = (socket: SessionSocket) => T | Promise<T>

export interface QuickConnectOptions extends TargetOptions {
  /** Read and drop the server's opening message before `run`. Default: true. */
  discardHandshake?: boolean
  handshakeTimeoutMs?: number
  logger?: Logger
}

/**
 * Connect, run one exchange, close.
 *
 * The socket is closed on every exit path, including when `run` throws.
 * Throws AuthError before any I/O when `auth` is not a valid AuthContext.
 */
export async function quickConnect<T>(
  auth: AuthContext,
  callbackType: string,
  run: SessionRun<T>,
  options: QuickConnectOptions = {},
): Promise<T> {
  const context = resolveAuth(auth)
  const logger = options.logger ?? createLogger('quick-connect')
  const target = resolveTarget(options.uri, callbackType, options.verifySsl)

  logger.debug({ url: target.url, callbackType: target.callbackType }, 'Opening socket')
  const socket = await SessionSocket.connect(
    target.url,
    buildSocketOptions({ auth: context, target, handshakeTimeoutMs: options.handshakeTimeoutMs, logger }),
  )

  try {
    if (options.discardHandshake ?? true) {
      await socket.recv()
    }
    return await run(socket)
  } finally {
    logger.debug({ url: target.url }, 'Closing socket')
    await socket.close()
  }
}

// ============================================================================
// Request helpers
// ============================================================================

/** Send a message as JSON without waiting for a reply. */
export function sendAsJson(socket: SessionSocket, message: unknown): Promise<void> {
  return socket.send(encodeJson(message))
}

/**
 * Send `message` as JSON and return the next inbound frame, decoded unless
 * `asJson` is false.
 */
export function request(socket: SessionSocket, message: unknown): Promise<JsonValue>
export function request(socket: SessionSocket, message: unknown, asJson: true): Promise<JsonValue>
export function request(socket: SessionSocket, message: unknown, asJson: false): Promise<string>
export function request(socket: SessionSocket, message: unknown, asJson: boolean): Promise<JsonValue | string>
export async function request(socket: SessionSocket, message: unknown, asJson = true): Promise<JsonValue | string> {
  await sendAsJson(socket, message)
  const frame = await socket.recv()
  return asJson ? decodeJson(frame) : frame
}

/**
 * Run `request` for every entry, one after another over the same socket.
 * The result has the same keys as the input.
 */
export function requests<K>(socket: SessionSocket, messages: Map<K, unknown>, asJson?: boolean): Promise<Map<K, JsonValue | string>>
export function requests(socket: SessionSocket, messages: Record<string, unknown>, asJson?: boolean): Promise<Record<string, JsonValue | string>>
export async function requests<K>(
  socket: SessionSocket,
  messages: Map<K, unknown> | Record<string, unknown>,
  asJson = true,
): Promise<Map<K, JsonValue | string> | Record<string, JsonValue | string>> {
  if (messages instanceof Map) {
    const replies = new Map<K, JsonValue | string>()
    for (const [key, message] of messages) {
      replies.set(key, await request(socket, message, asJson))
    }
    return replies
  }

  const replies: Record<string, JsonValue | string> = {}
  for (const [key, message] of Object.entries(messages)) {
    replies[key] = await request(socket, message, asJson)
  }
  return replies
}

/** A `run` callback for quickConnect that performs a single request. */
export function requestCb(message: unknown, asJson = true): SessionRun<JsonValue | string> {
  return (socket) => request(socket, message, asJson)
}

/** A `run` callback for quickConnect that performs `requests` over a map. */
export function requestsCb<K>(messages: Map<K, unknown>, asJson?: boolean): SessionRun<Map<K, JsonValue | string>>
export function requestsCb(messages: Record<string, unknown>, asJson?: boolean): SessionRun<Record<string, JsonValue | string>>
export function requestsCb<K>(
  messages: Map<K, unknown> | Record<string, unknown>,
  asJson = true,
): SessionRun<Map<K, JsonValue | string> | Record<string, JsonValue | string>> {
  if (messages instanceof Map) {
    const map = messages
    return (socket) => requests(socket, map, asJson)
  }
  const record = messages
  return (socket) => requests(socket, record, asJson)
}
