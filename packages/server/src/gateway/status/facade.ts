// packages/server/src/gateway/status/facade.ts
import { createTypedEmitter, type BlockBridgeLogger, type TypedEmitter } from '@blockbridge/infra';
import type {
  Message,
  PlayerList,
  PlayerListData,
  QueryResult,
  StatusData,
  StatusQuery,
  StatusResponseMessage,
  StatusSnapshot,
} from '@blockbridge/types';
import { createMessage } from '../protocol/message.js';
import type { SessionRegistry } from '../registry.js';
import type { ServerSession } from '../session/session.js';
import type { HttpEndpoint, HttpStatusClient } from './http-client.js';
import { playerList, statusSnapshot } from './snapshot.js';

export interface StatusFacadeOptions {
  readonly queryTimeoutMs: number;
  /** 0 disables the poller */
  readonly pollIntervalMs: number;
}

export interface StatusFacadeDeps {
  readonly registry: SessionRegistry;
  readonly logger: BlockBridgeLogger;
  readonly http?: HttpStatusClient;
}

export interface StatusFacadeEvents {
  'status:updated': (snapshot: StatusSnapshot) => void;
  'players:updated': (list: PlayerList) => void;
}

export interface QueryOptions {
  readonly signal?: AbortSignal;
}

type StatusReply = StatusResponseMessage & { payload: { kind: 'status'; status: StatusData } };
type PlayersReply = StatusResponseMessage & { payload: { kind: 'players'; players: PlayerListData } };

const isStatusReply = (m: Message): m is StatusReply =>
  m.type === 'STATUS_RESPONSE' && m.payload.kind === 'status';
const isPlayersReply = (m: Message): m is PlayersReply =>
  m.type === 'STATUS_RESPONSE' && m.payload.kind === 'players';

type Route =
  | { kind: 'live'; session: ServerSession }
  | { kind: 'http'; endpoint: HttpEndpoint; http: HttpStatusClient }
  | { kind: 'unavailable'; error: 'SERVER_NOT_FOUND' | 'SERVER_NOT_CONNECTED' };

interface CacheEntry {
  status?: StatusSnapshot;
  players?: PlayerList;
}

/**
 * One read path for status and player lists.
 *
 * A CONNECTED session answers over the socket (fresh correlation id per call, so
 * concurrent queries never see each other's replies); otherwise the server's HTTP
 * endpoint is used when configured.
 */
export class StatusQueryFacade {
  readonly events: TypedEmitter<StatusFacadeEvents> = createTypedEmitter<StatusFacadeEvents>();

  private readonly cache = new Map<string, CacheEntry>();
  private pollTimer: ReturnType<typeof setInterval> | undefined;

  constructor(
    private readonly opts: StatusFacadeOptions,
    private readonly deps: StatusFacadeDeps,
  ) {}

  async queryStatus(serverId: string, options: QueryOptions = {}): Promise<QueryResult<StatusSnapshot>> {
    const route = this.route(serverId);
    switch (route.kind) {
      case 'unavailable':
        return { ok: false, error: route.error };
      case 'http': {
        const result = await route.http.fetchStatus(route.endpoint, options.signal);
        return result.ok ? { ok: true, value: this.storeStatus(serverId, 'http', result.value) } : result;
      }
      case 'live': {
        const outcome = await route.session.request(this.statusRequest(serverId, 'status'), isStatusReply, {
          timeoutMs: this.opts.queryTimeoutMs,
          signal: options.signal,
        });
        if (!outcome.ok) {
          return { ok: false, error: outcome.error };
        }
        return { ok: true, value: this.storeStatus(serverId, 'live', outcome.value.payload.status) };
      }
    }
  }

  async queryPlayers(serverId: string, options: QueryOptions = {}): Promise<QueryResult<PlayerList>> {
    const route = this.route(serverId);
    switch (route.kind) {
      case 'unavailable':
        return { ok: false, error: route.error };
      case 'http': {
        const result = await route.http.fetchPlayers(route.endpoint, options.signal);
        return result.ok ? { ok: true, value: this.storePlayers(serverId, 'http', result.value) } : result;
      }
      case 'live': {
        const outcome = await route.session.request(this.statusRequest(serverId, 'players'), isPlayersReply, {
          timeoutMs: this.opts.queryTimeoutMs,
          signal: options.signal,
        });
        if (!outcome.ok) {
          return { ok: false, error: outcome.error };
        }
        return { ok: true, value: this.storePlayers(serverId, 'live', outcome.value.payload.players) };
      }
    }
  }

  /** Unsolicited STATUS_RESPONSE pushed by a game server */
  record(message: StatusResponseMessage): void {
    const { payload, serverId } = message;
    if (payload.kind === 'status') {
      this.storeStatus(serverId, 'live', payload.status);
    } else {
      this.storePlayers(serverId, 'live', payload.players);
    }
  }

  lastStatus(serverId: string): StatusSnapshot | undefined {
    return this.cache.get(serverId)?.status;
  }

  lastPlayers(serverId: string): PlayerList | undefined {
    return this.cache.get(serverId)?.players;
  }

  startPolling(): void {
    if (this.pollTimer || this.opts.pollIntervalMs <= 0) {
      return;
    }
    this.pollTimer = setInterval(() => {
      void this.pollOnce();
    }, this.opts.pollIntervalMs);
    this.pollTimer.unref();
  }

  /** Refresh the cached status of every known server */
  async pollOnce(): Promise<number> {
    const results = await Promise.all(
      this.deps.registry.knownServers().map((serverId) => this.queryStatus(serverId)),
    );
    const refreshed = results.filter((r) => r.ok).length;
    this.deps.logger.debug(`Status poll refreshed ${refreshed}/${results.length} server(s)`);
    return refreshed;
  }

  stop(): void {
    clearInterval(this.pollTimer);
    this.pollTimer = undefined;
  }

  dispose(): void {
    this.stop();
    this.cache.clear();
    this.events.removeAllListeners();
  }

  private route(serverId: string): Route {
    const server = this.deps.registry.getServer(serverId);
    if (!server) {
      return { kind: 'unavailable', error: 'SERVER_NOT_FOUND' };
    }
    const found = this.deps.registry.lookup(serverId);
    if (found.ok && found.session.isConnected) {
      return { kind: 'live', session: found.session };
    }
    if (server.http && this.deps.http) {
      return { kind: 'http', endpoint: server.http, http: this.deps.http };
    }
    return { kind: 'unavailable', error: 'SERVER_NOT_CONNECTED' };
  }

  private statusRequest(serverId: string, query: StatusQuery): Message {
    return createMessage({ type: 'STATUS_REQUEST', serverId, payload: { query } });
  }

  private storeStatus(serverId: string, source: 'live' | 'http', data: StatusData): StatusSnapshot {
    const snapshot = statusSnapshot(serverId, source, data);
    this.entry(serverId).status = snapshot;
    this.events.emit('status:updated', snapshot);
    return snapshot;
  }

  private storePlayers(serverId: string, source: 'live' | 'http', data: PlayerListData): PlayerList {
    const list = playerList(serverId, source, data);
    this.entry(serverId).players = list;
    this.events.emit('players:updated', list);
    return list;
  }

  private entry(serverId: string): CacheEntry {
    let entry = this.cache.get(serverId);
    if (!entry) {
      entry = {};
      this.cache.set(serverId, entry);
    }
    return entry;
  }
}
