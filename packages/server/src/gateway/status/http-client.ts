// packages/server/src/gateway/status/http-client.ts
import { fetchJson, HttpError, type BlockBridgeLogger } from '@blockbridge/infra';
import type { PlayerListData, QueryResult, StatusData } from '@blockbridge/types';
import { z } from 'zod/v4';

export interface HttpEndpoint {
  readonly baseUrl: string;
  readonly token: string;
}

export interface HttpStatusClientOptions {
  readonly timeoutMs: number;
  /** Substitute for the global fetch (tests) */
  readonly fetchImpl?: typeof fetch;
  readonly logger: BlockBridgeLogger;
}

/** `/api/status` body; field names follow the game-server plugin's REST API */
const RawStatusSchema = z
  .object({
    online: z.boolean().default(true),
    minecraft_version: z.string().optional(),
    version: z.string().optional(),
    online_players: z.number().default(0),
    max_players: z.number().default(0),
    tps: z.tuple([z.number(), z.number(), z.number()]).optional(),
    memory: z.object({ used_mb: z.number(), max_mb: z.number() }).optional(),
    players: z.array(z.string()).optional(),
  })
  .transform(
    (raw): StatusData => ({
      online: raw.online,
      version: raw.minecraft_version ?? raw.version,
      onlinePlayers: raw.online_players,
      maxPlayers: raw.max_players,
      tps: raw.tps,
      memory: raw.memory && { usedMb: raw.memory.used_mb, maxMb: raw.memory.max_mb },
      players: raw.players,
    }),
  );

const RawPlayerSchema = z.object({
  name: z.string(),
  uuid: z.string().optional(),
  health: z.number().optional(),
  max_health: z.number().optional(),
  level: z.number().optional(),
  gamemode: z.string().optional(),
  world: z.string().optional(),
  ping: z.number().optional(),
});

const RawPlayersSchema = z
  .object({
    online: z.number().default(0),
    max: z.number().default(0),
    list: z.array(RawPlayerSchema).default([]),
  })
  .transform(
    (raw): PlayerListData => ({
      online: raw.online,
      max: raw.max,
      list: raw.list.map((p) => ({
        name: p.name,
        uuid: p.uuid,
        health: p.health,
        maxHealth: p.max_health,
        level: p.level,
        gameMode: p.gamemode,
        world: p.world,
        ping: p.ping,
      })),
    }),
  );

/** Responses may wrap the payload in `{ data }` */
function unwrap(body: unknown): unknown {
  if (typeof body === 'object' && body !== null && !Array.isArray(body) && 'data' in body) {
    return body.data;
  }
  return body;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * Read-only fallback over the game server's REST API.
 * Never throws: failures become SERVER_NOT_CONNECTED or TIMEOUT with a message.
 */
export class HttpStatusClient {
  constructor(private readonly opts: HttpStatusClientOptions) {}

  fetchStatus(endpoint: HttpEndpoint, signal?: AbortSignal): Promise<QueryResult<StatusData>> {
    return this.get(endpoint, '/api/status', RawStatusSchema, signal);
  }

  fetchPlayers(endpoint: HttpEndpoint, signal?: AbortSignal): Promise<QueryResult<PlayerListData>> {
    return this.get(endpoint, '/api/players', RawPlayersSchema, signal);
  }

  private async get<T>(
    endpoint: HttpEndpoint,
    path: string,
    schema: z.ZodType<T>,
    signal?: AbortSignal,
  ): Promise<QueryResult<T>> {
    const url = `${endpoint.baseUrl}${path}`;
    let body: unknown;
    try {
      body = await fetchJson(url, {
        timeoutMs: this.opts.timeoutMs,
        fetchImpl: this.opts.fetchImpl,
        init: { headers: { Authorization: `Bearer ${endpoint.token}` }, signal },
      });
    } catch (err) {
      if (isTimeout(err)) {
        this.opts.logger.warn(`GET ${url} timed out after ${this.opts.timeoutMs}ms`);
        return { ok: false, error: 'TIMEOUT', message: `No HTTP response within ${this.opts.timeoutMs}ms` };
      }
      const message = err instanceof HttpError ? err.message : `Network error: ${err instanceof Error ? err.message : String(err)}`;
      this.opts.logger.warn(`GET ${url} failed: ${message}`);
      return { ok: false, error: 'SERVER_NOT_CONNECTED', message };
    }

    const parsed = schema.safeParse(unwrap(body));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const message = `Unexpected response from ${path}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`;
      this.opts.logger.warn(message);
      return { ok: false, error: 'SERVER_NOT_CONNECTED', message };
    }
    return { ok: true, value: parsed.data };
  }
}
