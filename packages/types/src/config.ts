import type { LogLevel } from './common.js';
import type { TransportMode } from './gateway.js';
import type { ForwardEventKind, ForwardRoute } from './forward.js';

/** Root configuration as written in blockbridge.json5. Every field is optional. */
export interface BlockBridgeConfig {
  gateway?: GatewayConfig;
  servers?: Record<string, ServerEntryConfig>;
  whitelist?: WhitelistConfig;
  session?: SessionConfig;
  binding?: BindingConfig;
  status?: StatusConfig;
  control?: ControlConfig;
  commands?: CommandsConfig;
  logging?: LoggingConfig;
}

export type DuplicatePolicy = 'supersede' | 'reject';

export interface GatewayConfig {
  host?: string;
  port?: number;
  /** WebSocket path game servers connect to */
  path?: string;
  maxConnections?: number;
  maxPayloadBytes?: number;
  handshakeTimeoutMs?: number;
  duplicatePolicy?: DuplicatePolicy;
  cors?: { origins?: string[]; maxAge?: number };
}

export interface ServerEntryConfig {
  token: string;
  mode?: TransportMode;
  /** ws:// or wss:// endpoint, required when mode is 'dial' */
  url?: string;
  http?: { baseUrl: string; token?: string };
  forward?: ForwardConfig;
}

export interface ForwardConfig {
  /** `platform:messageType:sessionId` triples, as a list or a newline-separated block */
  targets?: string[] | string;
  events?: ForwardEventKind[];
  /** Chat → game: relay platform messages starting with `prefix` */
  autoForward?: {
    prefix: string;
    /** Origin sessions allowed to relay, same format as `targets`; empty allows any */
    sessions?: string[] | string;
  };
}

/** Legacy pairwise list of server ids and tokens */
export interface WhitelistConfig {
  serverIds?: string[];
  tokens?: string[];
}

export interface ReconnectConfig {
  minDelayMs?: number;
  maxDelayMs?: number;
  /** 0 = unlimited */
  maxAttempts?: number;
  jitter?: boolean;
  /** How long a listen-mode session waits for the game server to come back. 0 = forever. */
  giveUpAfterMs?: number;
  removeOnGiveUp?: boolean;
}

export interface SessionConfig {
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  queueCapacity?: number;
  requestTimeoutMs?: number;
  reconnect?: ReconnectConfig;
}

export interface BindingConfig {
  ttlMs?: number;
  codeLength?: number;
  sweepIntervalMs?: number;
  retentionMs?: number;
  ackGraceMs?: number;
}

export interface StatusConfig {
  queryTimeoutMs?: number;
  pollIntervalMs?: number;
}

export interface ControlConfig {
  apiKeys?: string[];
  rateLimit?: { maxAttempts?: number; windowMs?: number };
}

export interface CommandsConfig {
  adminRoles?: string[];
  defaultServer?: string;
}

export interface LoggingConfig {
  level?: LogLevel;
  json?: boolean;
  file?: { enabled?: boolean; path?: string; maxSizeMb?: number; maxFiles?: number };
  redactSensitive?: boolean;
}

export interface ConfigValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}


// ─── Resolved configuration ───

/** Configuration after defaults and env overrides: every setting present */
export interface ResolvedConfig {
  gateway: {
    host: string;
    port: number;
    path: string;
    maxConnections: number;
    maxPayloadBytes: number;
    handshakeTimeoutMs: number;
    duplicatePolicy: DuplicatePolicy;
    cors: { origins: string[]; maxAge: number };
  };
  servers: Record<string, ServerEntryConfig>;
  whitelist: { serverIds: string[]; tokens: string[] };
  session: {
    heartbeatIntervalMs: number;
    heartbeatTimeoutMs: number;
    queueCapacity: number;
    requestTimeoutMs: number;
    reconnect: Required<ReconnectConfig>;
  };
  binding: Required<BindingConfig>;
  status: Required<StatusConfig>;
  control: { apiKeys: string[]; rateLimit: { maxAttempts: number; windowMs: number } };
  commands: { adminRoles: string[]; defaultServer?: string };
  logging: {
    level: LogLevel;
    json: boolean;
    redactSensitive: boolean;
    file: { enabled: boolean; path?: string; maxSizeMb: number; maxFiles: number };
  };
}

/** One game server the gateway knows about */
export interface ResolvedServer {
  readonly serverId: string;
  readonly token: string;
  readonly mode: TransportMode;
  readonly url?: string;
  readonly http?: { readonly baseUrl: string; readonly token: string };
  readonly forward: ForwardRoute;
}
