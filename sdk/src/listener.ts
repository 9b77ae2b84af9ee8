import type { AuthContext } from './auth'
import { Connect, type ConnectionCallbacks, type ConnectionOptions } from './connect'
import { ConnectionError, TaskExecutionError } from './errors'
import {
  decodeTaskDescriptor,
  type TaskDescriptor,
  type TaskExecutor,
  type TaskResult,
} from './executor'
import { createLogger, type Logger } from './logger'

export interface ListenerOptions extends ConnectionOptions {
  auth: AuthContext
}

// ============================================================================
// AbstractListener
// ============================================================================

/**
 * Default implementation of the connection callbacks. Subclasses supply
 * `onOpen` and usually `onMessage`; errors close the socket and are re-thrown
 * to the connection, which logs them; close marks the listener stopped.
 */
export abstract class AbstractListener implements ConnectionCallbacks {
  protected connection: Connect | null = null
  protected running = false
  protected readonly logger: Logger

  constructor(protected readonly options: ListenerOptions) {
    this.logger = options.logger ?? createLogger(this.constructor.name)
  }

  get isRunning(): boolean {
    return this.running
  }

  /** Open this listener's connection, waiting up to the poll budget. */
  protected async openWebSocket(
    callbackType: string,
    onOpen?: (conn: Connect) => void | Promise<void>,
  ): Promise<Connect> {
    const callbacks: ConnectionCallbacks = {
      onOpen: onOpen ?? ((conn) => this.onOpen(conn)),
      onMessage: (conn, message) => this.onMessage(conn, message),
      onError: (conn, error) => this.onError(conn, error),
      onClose: (conn, code, reason) => this.onClose(conn, code, reason),
    }
    this.running = true
    this.connection = await Connect.open({ ...this.options, logger: this.logger, callbackType, callbacks })
    return this.connection
  }

  abstract onOpen(conn: Connect): void | Promise<void>

  onMessage(_conn: Connect, _message: string): void | Promise<void> { }

  async onError(conn: Connect, error: ConnectionError): Promise<void> {
    await conn.close()
    throw error
  }

  onClose(_conn: Connect, _code: number, _reason: string): void {
    this.running = false
  }

  send(message: unknown): void {
    this.requireConnection().send(message)
  }

  async close(): Promise<void> {
    await this.connection?.close()
  }

  protected requireConnection(): Connect {
    if (!this.connection) throw new ConnectionError('Listener has not been started')
    return this.connection
  }
}

// ============================================================================
// QueueListener
// ============================================================================

export interface QueueListenerOptions extends ListenerOptions {
  executor: TaskExecutor
}

/**
 * Treats every inbound frame as a task descriptor and runs it through the
 * executor. Each frame is answered with "ack", whether or not the task
 * succeeded; failures are only logged.
 */
export class QueueListener extends AbstractListener {
  static readonly CALLBACK_TYPE = 'queue_listen'

  private readonly executor: TaskExecutor

  constructor(options: QueueListenerOptions) {
    super(options)
    this.executor = options.executor
  }

  /** Connect to the queue feed. Resolves after the bounded open wait. */
  async start(): Promise<Connect> {
    const conn = await this.openWebSocket(QueueListener.CALLBACK_TYPE)
    this.logger.info({ url: conn.target.url, open: conn.isOpen }, 'Queue listener started')
    return conn
  }

  /** Alias of close(). */
  stop(): Promise<void> {
    return this.close()
  }

  onOpen(conn: Connect): void {
    conn.sendRaw('ping')
  }

  async onMessage(conn: Connect, message: string): Promise<void> {
    this.logger.debug({ message }, 'Received task message')

    let result: TaskResult | undefined
    try {
      result = await this._executeTask(message)
    } catch (err) {
      this.logger.error({ err }, 'Task failed')
    }

    conn.sendRaw('ack')

    if (result?.restart) {
      this.logger.warn('Restart requested but reload is not supported; still listening')
    }
    if (result?.exit) {
      this.logger.info('Queue listener is shutting down on request')
      await conn.close()
    }
  }

  onClose(conn: Connect, code: number, reason: string): void {
    this.logger.debug({ code, reason }, 'Closing connection')
    super.onClose(conn, code, reason)
  }

  private async _executeTask(message: string): Promise<TaskResult | undefined> {
    const task: TaskDescriptor = decodeTaskDescriptor(message)
    try {
      const outcome = await this.executor.execute(task)
      return outcome ? outcome : undefined
    } catch (err) {
      if (err instanceof TaskExecutionError) throw err
      const detail = err instanceof Error ? err.message : String(err)
      throw new TaskExecutionError(`${task.method} ${task.url} failed: ${detail}`, {
        cause: err,
        url: task.url,
        method: task.method,
      })
    }
  }
}
