import type { AuthContext } from './auth'
import type { Connect } from './connect'
import { AbstractListener, type ListenerOptions } from './listener'
import { quickConnect, sendAsJson, type QuickConnectOptions } from './session'

export const QUEUE_AGENT_CALLBACK_TYPE = 'queue_agent'

export interface QueueMessageParams {
  cloud: string | number
  agentId: string
  /** PlaidCloud resource the agent should call. */
  resource: string
  /** HTTP-style method: get, post, put, delete, head. */
  method: string
  data?: unknown
  action?: unknown
}

function queueMessage(params: QueueMessageParams) {
  return {
    method: 'post',
    resource: 'message',
    params: {
      cloud: params.cloud,
      agent_id: params.agentId,
      resource: params.resource,
      method: params.method,
      data: params.data ?? null,
      action: params.action ?? null,
    },
  }
}

/** Add one message to an agent queue over a one-shot session. */
export async function quickAdd(
  auth: AuthContext,
  params: QueueMessageParams,
  options?: QuickConnectOptions,
): Promise<void> {
  await quickConnect(
    auth,
    QUEUE_AGENT_CALLBACK_TYPE,
    (socket) => sendAsJson(socket, queueMessage(params)),
    options,
  )
}

export interface QueueAgentOptions extends ListenerOptions {
  /** Runs once the socket opens; typically starts adding messages. */
  onOpen?: (agent: QueueAgent, conn: Connect) => void | Promise<void>
}

/** A persistent connection for pushing messages onto agent queues. */
export class QueueAgent extends AbstractListener {
  private readonly openHandler?: QueueAgentOptions['onOpen']

  constructor(options: QueueAgentOptions) {
    super(options)
    this.openHandler = options.onOpen
  }

  start(): Promise<Connect> {
    return this.openWebSocket(QUEUE_AGENT_CALLBACK_TYPE)
  }

  async onOpen(conn: Connect): Promise<void> {
    await this.openHandler?.(this, conn)
  }

  add(params: QueueMessageParams): void {
    this.send(queueMessage(params))
  }
}
