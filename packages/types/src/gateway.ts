import type { Result, Timestamp } from './common.js';

// ─── Session ───

/** Connection lifecycle of a single game-server session */
export type SessionState = 'CONNECTING' | 'AUTHENTICATING' | 'CONNECTED' | 'RECONNECTING' | 'CLOSED';

/** listen: the game server dials in. dial: the gateway dials the game server. */
export type TransportMode = 'listen' | 'dial';

/**
 * How `send` treats a session that is not CONNECTED.
 * - queue: buffer in any state except CLOSED
 * - prompt: buffer only while RECONNECTING/AUTHENTICATING
 * - immediate: never buffer
 */
export type DeliveryPolicy = 'queue' | 'prompt' | 'immediate';

export interface ServerSummary {
  serverId: string;
  mode: TransportMode;
  state: SessionState;
  lastSeenAt?: Timestamp;
  connectedAt?: Timestamp;
  queued: number;
  dropped: number;
  pendingRequests: number;
  attempts: number;
}

// ─── Results ───

export type LookupError = 'SERVER_NOT_FOUND';
export type RouteError = 'SERVER_NOT_FOUND' | 'SERVER_NOT_CONNECTED';
export type QueryError = 'SERVER_NOT_FOUND' | 'SERVER_NOT_CONNECTED' | 'TIMEOUT';

export type RouteResult =
  | { ok: true; delivery: 'sent' | 'queued' }
  | { ok: false; error: RouteError };

export type QueryResult<T> = Result<T, QueryError>;

// ─── Snapshots ───

export interface StatusData {
  online: boolean;
  version?: string;
  onlinePlayers: number;
  maxPlayers: number;
  /** 1m, 5m, 15m averages */
  tps?: [number, number, number];
  memory?: { usedMb: number; maxMb: number };
  players?: string[];
}

export interface PlayerInfo {
  name: string;
  uuid?: string;
  health?: number;
  maxHealth?: number;
  level?: number;
  gameMode?: string;
  world?: string;
  ping?: number;
}

export interface PlayerListData {
  online: number;
  max: number;
  list: PlayerInfo[];
}

export type SnapshotSource = 'live' | 'http';

interface SnapshotStamp {
  readonly serverId: string;
  readonly source: SnapshotSource;
  readonly capturedAt: Timestamp;
}

/** Point-in-time status read, frozen after construction */
export type StatusSnapshot = Readonly<StatusData> & SnapshotStamp;

/** Point-in-time player list, frozen after construction */
export type PlayerList = Readonly<PlayerListData> & SnapshotStamp;

// ─── Control-plane RPC ───

export type RpcMethod =
  | 'system.health'
  | 'system.info'
  | 'system.ping'
  | 'servers.list'
  | 'server.status'
  | 'server.players'
  | 'server.say'
  | 'server.command'
  | 'server.reconnect'
  | 'server.detach'
  | 'binding.confirm'
  | 'binding.cancel'
  | 'binding.list'
  | 'command.execute';

/** JSON-RPC 2.0 request */
export interface RpcRequest<T = unknown> {
  jsonrpc: '2.0';
  id: string | number;
  method: RpcMethod;
  params?: T;
}

/** JSON-RPC 2.0 response */
export interface RpcResponse<T = unknown> {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: T;
  error?: RpcError;
}

export interface RpcError {
  code: number;
  message: string;
  data?: unknown;
}

export const RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  UNAUTHORIZED: -32001,
  RATE_LIMITED: -32002,
  FORBIDDEN: -32003,
  SERVER_NOT_FOUND: -32010,
  SERVER_NOT_CONNECTED: -32011,
  TIMEOUT: -32012,
  BINDING_FAILED: -32020,
} as const;
