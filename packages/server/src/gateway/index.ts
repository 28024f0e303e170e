// packages/server/src/gateway/index.ts

// server
export { createGatewayServer, type GatewayServer } from './server.js';
export { createGatewayContext, COMMAND_PREFIX, type GatewayContext, type GatewayDeps } from './context.js';
export { LogChatPlatform } from './platform.js';

// wire protocol
export * from './protocol/index.js';

// core
export {
  ServerSession,
  type SessionOptions,
  type SessionDeps,
  type SessionEvents,
  type SendResult,
  type RequestOptions,
} from './session/session.js';
export { nextState, type SessionTrigger } from './session/state.js';
export { CloseCodes, wrapWebSocket, type Transport } from './session/transport.js';
export { createWsDialer, type Dialer, type DialTarget, type WsDialerOptions } from './session/dialer.js';
export type { PendingOutcome, PendingError } from './session/pending.js';
export {
  SessionRegistry,
  sessionDefaults,
  type AttachResult,
  type LookupResult,
  type ReconnectResult,
  type RegistryEvents,
  type SessionDefaults,
} from './registry.js';
export { Forwarder, routesFrom, type ChatPlatform, type AutoForwardOutcome, type RelayChatInput } from './forwarder.js';
export { BindingCoordinator, type BindingEvents, type BindingOptions, type IssueOptions } from './binding.js';
export { StatusQueryFacade, type StatusFacadeEvents, type QueryOptions } from './status/facade.js';
export { HttpStatusClient, type HttpEndpoint } from './status/http-client.js';
export { wireInbound } from './inbound.js';

// errors
export { AuthenticationFailedError, TransportError } from './errors.js';
export { RpcErrors, RpcMethodError, createError, rpcFailure, type RpcErrorCode } from './rpc/errors.js';

// control plane
export { RpcMethodRegistry, hasRequiredAuth, type DispatchContext } from './rpc/index.js';
export type { AuthLevel, AuthInfo, AuthResult, Permission, RpcMethodHandler, RpcContext } from './rpc/types.js';
export { authenticate, AuthRateLimiter, extractServerCredentials, verifyServerToken } from './auth/index.js';
