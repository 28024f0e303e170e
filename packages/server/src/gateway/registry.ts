// packages/server/src/gateway/registry.ts
import type {
  DuplicatePolicy,
  LookupError,
  Message,
  ResolvedConfig,
  ResolvedServer,
  RouteError,
  ServerSummary,
  SessionState,
} from '@blockbridge/types';
import {
  createTypedEmitter,
  getEventBus,
  type BlockBridgeLogger,
  type TypedEmitter,
} from '@blockbridge/infra';
import type { AuthRateLimiter } from './auth/rate-limit.js';
import { verifyServerToken } from './auth/server-token.js';
import type { Dialer } from './session/dialer.js';
import { ServerSession, type SessionOptions } from './session/session.js';
import { CloseCodes, type Transport } from './session/transport.js';

/** Session settings shared by every server */
export type SessionDefaults = Omit<SessionOptions, 'serverId' | 'mode' | 'token' | 'url'>;

export interface RegistryOptions {
  readonly session: SessionDefaults;
  readonly duplicatePolicy: DuplicatePolicy;
  /** Drop a session from the table once it gives up reconnecting */
  readonly removeOnGiveUp: boolean;
}

export interface RegistryDeps {
  readonly logger: BlockBridgeLogger;
  readonly dialer?: Dialer;
  readonly rateLimiter?: AuthRateLimiter;
}

export interface RegistryEvents {
  'server:online': (serverId: string) => void;
  'server:offline': (serverId: string, reason: string) => void;
  'server:auth_failed': (serverId: string, reason: string, remoteAddress?: string) => void;
  'server:message': (message: Message) => void;
  'server:state': (serverId: string, from: SessionState, to: SessionState) => void;
}

export type AttachError = 'AUTHENTICATION_FAILED' | 'DUPLICATE_SERVER_ID' | 'RATE_LIMITED';

export type AttachResult =
  | { ok: true; session: ServerSession }
  | { ok: false; error: AttachError };

export type LookupResult = { ok: true; session: ServerSession } | { ok: false; error: LookupError };

export type ReconnectResult = { ok: true; state: SessionState } | { ok: false; error: RouteError };

/** Compared against when the server id is unknown, so both failures cost the same */
const UNKNOWN_SERVER_TOKEN = '\u0000unknown-server';

export function sessionDefaults(config: ResolvedConfig): SessionDefaults {
  const { session, gateway } = config;
  return {
    heartbeatIntervalMs: session.heartbeatIntervalMs,
    heartbeatTimeoutMs: session.heartbeatTimeoutMs,
    queueCapacity: session.queueCapacity,
    requestTimeoutMs: session.requestTimeoutMs,
    handshakeTimeoutMs: gateway.handshakeTimeoutMs,
    reconnect: {
      minDelayMs: session.reconnect.minDelayMs,
      maxDelayMs: session.reconnect.maxDelayMs,
      maxAttempts: session.reconnect.maxAttempts,
      jitter: session.reconnect.jitter,
      giveUpAfterMs: session.reconnect.giveUpAfterMs,
    },
  };
}

/**
 * Table of `serverId → ServerSession`, owned by one gateway instance.
 *
 * - authenticates listen-mode transports before a session sees them
 * - applies the duplicate policy (supersede closes the old transport with 4000 first)
 * - starts dial-mode sessions
 * - re-emits session events keyed by server id
 */
export class SessionRegistry {
  readonly events: TypedEmitter<RegistryEvents> = createTypedEmitter<RegistryEvents>();

  private readonly sessions = new Map<string, ServerSession>();
  private servers: Map<string, ResolvedServer>;
  private readonly logger: BlockBridgeLogger;

  constructor(
    servers: Map<string, ResolvedServer>,
    private readonly opts: RegistryOptions,
    private readonly deps: RegistryDeps,
  ) {
    this.servers = new Map(servers);
    this.logger = deps.logger;
  }

  /** Authenticate a listen-mode transport and hand it to its session */
  attach(
    serverId: string,
    transport: Transport,
    token: string | undefined,
    remoteAddress: string = transport.remoteAddress,
  ): AttachResult {
    const { rateLimiter } = this.deps;
    if (rateLimiter?.isBlocked(remoteAddress)) {
      this.logger.warn(`Rejected ${remoteAddress}: too many failed attempts`);
      transport.close(CloseCodes.RATE_LIMITED, 'Too many failed attempts');
      return { ok: false, error: 'RATE_LIMITED' };
    }

    const server = this.servers.get(serverId);
    const tokenMatches = verifyServerToken(token ?? '', server?.token ?? UNKNOWN_SERVER_TOKEN);
    if (!server || !tokenMatches || server.mode !== 'listen') {
      const reason = !server
        ? 'unknown server id'
        : !tokenMatches
          ? 'token mismatch'
          : 'server is configured for dial mode';
      rateLimiter?.recordFailure(remoteAddress);
      transport.close(CloseCodes.AUTH_FAILED, 'Authentication failed');
      this.logger.warn(`Authentication failed for ${serverId} from ${remoteAddress}: ${reason}`);
      getEventBus().emit('gateway:auth:failure', remoteAddress, reason);
      this.events.emit('server:auth_failed', serverId, reason, remoteAddress);
      return { ok: false, error: 'AUTHENTICATION_FAILED' };
    }
    rateLimiter?.recordSuccess(remoteAddress);

    const existing = this.sessions.get(serverId);
    if (existing?.state === 'CONNECTED' && this.opts.duplicatePolicy === 'reject') {
      this.logger.warn(`Rejected duplicate connection for ${serverId} from ${remoteAddress}`);
      transport.close(CloseCodes.DUPLICATE_SERVER_ID, 'Server id already connected');
      return { ok: false, error: 'DUPLICATE_SERVER_ID' };
    }

    const session = existing ?? this.create(server);
    getEventBus().emit('gateway:ws:connect', serverId, transport.id);
    session.attachTransport(transport);
    return { ok: true, session };
  }

  /** Start every dial-mode server that has no session yet */
  start(): void {
    for (const server of this.servers.values()) {
      if (server.mode === 'dial' && !this.sessions.has(server.serverId)) {
        this.create(server).start();
      }
    }
  }

  /** Restart the attempt sequence immediately, bypassing backoff */
  reconnect(serverId: string): ReconnectResult {
    const session = this.sessions.get(serverId);
    if (session) {
      return { ok: true, state: session.reconnect() };
    }
    const server = this.servers.get(serverId);
    if (!server) {
      return { ok: false, error: 'SERVER_NOT_FOUND' };
    }
    if (server.mode === 'listen') {
      // nothing to dial; the game server has to connect
      return { ok: false, error: 'SERVER_NOT_CONNECTED' };
    }
    const created = this.create(server);
    created.start();
    return { ok: true, state: created.state };
  }

  /** Graceful detach: CLOSED without retry, then removed from the table */
  detach(serverId: string, code: number = CloseCodes.NORMAL, reason = 'Detached'): LookupResult {
    const session = this.sessions.get(serverId);
    if (!session) {
      return { ok: false, error: 'SERVER_NOT_FOUND' };
    }
    session.detach(code, reason);
    this.remove(session);
    return { ok: true, session };
  }

  lookup(serverId: string): LookupResult {
    const session = this.sessions.get(serverId);
    return session ? { ok: true, session } : { ok: false, error: 'SERVER_NOT_FOUND' };
  }

  list(): ServerSummary[] {
    return [...this.sessions.values()].map((session) => session.summary());
  }

  getServer(serverId: string): ResolvedServer | undefined {
    return this.servers.get(serverId);
  }

  knownServers(): string[] {
    return [...this.servers.keys()];
  }

  /**
   * Swap the server table after a configuration reload.
   * Sessions of removed servers are detached; new dial servers wait for `start()`.
   */
  updateServers(servers: Map<string, ResolvedServer>): void {
    this.servers = new Map(servers);
    for (const serverId of [...this.sessions.keys()]) {
      if (!servers.has(serverId)) {
        this.logger.info(`Server ${serverId} removed from configuration`);
        this.detach(serverId, CloseCodes.NORMAL, 'Server removed');
      }
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  get connectedCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.isConnected) {
        count++;
      }
    }
    return count;
  }

  dispose(): void {
    for (const serverId of [...this.sessions.keys()]) {
      this.detach(serverId, CloseCodes.GOING_AWAY, 'Gateway shutting down');
    }
    this.events.removeAllListeners();
  }

  private create(server: ResolvedServer): ServerSession {
    const session = new ServerSession(
      {
        ...this.opts.session,
        serverId: server.serverId,
        mode: server.mode,
        token: server.token,
        url: server.url,
      },
      {
        logger: this.logger.child(`session:${server.serverId}`),
        dialer: this.deps.dialer,
      },
    );
    const { serverId } = server;

    session.events.on('state', (from, to) => this.events.emit('server:state', serverId, from, to));
    session.events.on('online', () => this.events.emit('server:online', serverId));
    session.events.on('offline', (reason) => this.events.emit('server:offline', serverId, reason));
    session.events.on('message', (message) => this.events.emit('server:message', message));
    session.events.on('auth_failed', (reason) => this.events.emit('server:auth_failed', serverId, reason));
    session.events.on('gave_up', (reason) => {
      if (this.opts.removeOnGiveUp) {
        this.logger.info(`Removing ${serverId} after giving up: ${reason}`);
        this.remove(session);
      }
    });

    this.sessions.set(serverId, session);
    return session;
  }

  private remove(session: ServerSession): void {
    if (this.sessions.get(session.serverId) === session) {
      this.sessions.delete(session.serverId);
    }
    session.events.removeAllListeners();
  }
}
