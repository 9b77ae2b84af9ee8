import type { AuthContext } from './auth'
import type { JsonValue } from './frames'
import { quickConnect, request, requestCb, requestsCb, type QuickConnectOptions } from './session'

export const HANDLE_CALLBACK_TYPE = 'handle'
export const CONNECTION_CALLBACK_TYPE = 'connection'

export interface HandleRequest {
  cloud: string | number
  method: string
  resource: string
  data?: unknown
  action?: unknown
}

/** One request against a PlaidCloud handle. Returns the raw reply frame. */
export function quickRequest(
  auth: AuthContext,
  req: HandleRequest,
  options?: QuickConnectOptions,
): Promise<string> {
  const message = {
    method: req.method,
    resource: req.resource,
    cloud: req.cloud,
    data: req.data ?? null,
    action: req.action ?? null,
  }
  return quickConnect(auth, HANDLE_CALLBACK_TYPE, (socket) => request(socket, message, false), options)
}

function connectionQuery(cloud: string | number, connection: string) {
  return { method: 'get', resource: 'connection', cloud, connection }
}

/** Connection parameters stored in PlaidCloud for a connection id. */
export function getConnectionParams(
  auth: AuthContext,
  cloud: string | number,
  connection: string,
  options?: QuickConnectOptions,
): Promise<JsonValue | string> {
  return quickConnect(auth, CONNECTION_CALLBACK_TYPE, requestCb(connectionQuery(cloud, connection)), options)
}

/**
 * Connection parameters for a keyed set of connection ids; the result is
 * keyed the same way.
 */
export function getConnectionParamsMap(
  auth: AuthContext,
  cloud: string | number,
  connections: Record<string, string>,
  options?: QuickConnectOptions,
): Promise<Record<string, JsonValue | string>> {
  const queries: Record<string, unknown> = {}
  for (const [key, connection] of Object.entries(connections)) {
    queries[key] = connectionQuery(cloud, connection)
  }
  return quickConnect(auth, CONNECTION_CALLBACK_TYPE, requestsCb(queries), options)
}
