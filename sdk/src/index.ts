export {
  AUTH_METHODS,
  AuthContextSchema,
  AuthPackageSchema,
  ProxyConfigSchema,
  agentAuth,
  authHeaders,
  oauth2Auth,
  resolveAuth,
  transformAuth,
  userAuth,
} from './auth'
export type { AuthContext, AuthMethod, AuthPackage, ProxyConfig } from './auth'

export {
  PRODUCTION_HOST,
  SOCKET_PATH,
  buildProxySettings,
  proxyAgentUrl,
  buildSocketOptions,
  normalizeUri,
  resolveTarget,
} from './target'
export type { ConnectionTarget, ProxySettings, SocketScheme, TargetOptions } from './target'

export {
  AuthError,
  ConnectionError,
  ProtocolError,
  RemoteError,
  TaskExecutionError,
} from './errors'

export { createLogger } from './logger'
export type { Logger } from './logger'

export type { JsonValue } from './frames'

export {
  SessionSocket,
  quickConnect,
  request,
  requestCb,
  requests,
  requestsCb,
  sendAsJson,
} from './session'
export type { QuickConnectOptions, SessionRun } from './session'

export { Connect } from './connect'
export type {
  ConnectOptions,
  ConnectionCallbacks,
  ConnectionOptions,
  ConnectionState,
} from './connect'

export { ResourceExecutor, TaskDescriptorSchema, decodeTaskDescriptor } from './executor'
export type { ResourceHandler, TaskDescriptor, TaskExecutor, TaskResult } from './executor'

export { AbstractListener, QueueListener } from './listener'
export type { ListenerOptions, QueueListenerOptions } from './listener'

export { QUEUE_AGENT_CALLBACK_TYPE, QueueAgent, quickAdd } from './queue-agent'
export type { QueueAgentOptions, QueueMessageParams } from './queue-agent'

export {
  CONNECTION_CALLBACK_TYPE,
  HANDLE_CALLBACK_TYPE,
  getConnectionParams,
  getConnectionParamsMap,
  quickRequest,
} from './handle'
export type { HandleRequest } from './handle'
