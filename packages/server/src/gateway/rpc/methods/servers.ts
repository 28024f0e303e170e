// packages/server/src/gateway/rpc/methods/servers.ts
import { formatForwardTarget } from '@blockbridge/config';
import type {
  CommandResultPayload,
  PlayerList,
  ServerSummary,
  SessionState,
  StatusSnapshot,
  TransportMode,
} from '@blockbridge/types';
import { z } from 'zod/v4';
import type { GatewayContext } from '../../context.js';
import { rpcFailure } from '../errors.js';
import type { RpcMethodHandler } from '../types.js';

export interface ServerRow {
  serverId: string;
  mode: TransportMode;
  /** Absent when no session exists yet */
  session?: ServerSummary;
  targets: string[];
  http: boolean;
}

const emptySchema = z.object({});
type EmptyParams = z.infer<typeof emptySchema>;

const serverIdSchema = z.object({ serverId: z.string().min(1) });

const saySchema = z.object({
  serverId: z.string().min(1),
  content: z.string().trim().min(1),
  sender: z.object({ platform: z.string().min(1), name: z.string().min(1) }).default({
    platform: 'control',
    name: 'Console',
  }),
  playerUuid: z.string().min(1).optional(),
});

const commandSchema = z.object({
  serverId: z.string().min(1),
  command: z.string().trim().min(1),
  timeoutMs: z.number().int().positive().max(120_000).optional(),
});

export function listServers(ctx: GatewayContext): ServerRow[] {
  const rows: ServerRow[] = [];
  for (const serverId of ctx.sessions.knownServers()) {
    const server = ctx.sessions.getServer(serverId);
    if (!server) {
      continue;
    }
    const found = ctx.sessions.lookup(serverId);
    rows.push({
      serverId,
      mode: server.mode,
      session: found.ok ? found.session.summary() : undefined,
      targets: ctx.forwarder.targetsFor(serverId).map(formatForwardTarget),
      http: server.http !== undefined,
    });
  }
  return rows;
}

export function registerServerMethods(ctx: GatewayContext): void {
  // -- servers.list --
  const list: RpcMethodHandler<EmptyParams, { servers: ServerRow[] }> = {
    method: 'servers.list',
    description: 'Configured servers with their session state',
    authLevel: 'api_key',
    permission: 'servers:read',
    schema: emptySchema,
    async execute() {
      return { servers: listServers(ctx) };
    },
  };

  // -- server.status --
  const status: RpcMethodHandler<z.infer<typeof serverIdSchema>, StatusSnapshot> = {
    method: 'server.status',
    description: 'Current status, live or over the HTTP fallback',
    authLevel: 'api_key',
    permission: 'servers:read',
    schema: serverIdSchema,
    async execute({ serverId }) {
      const result = await ctx.status.queryStatus(serverId);
      if (!result.ok) {
        throw rpcFailure(result.error, result.message);
      }
      return result.value;
    },
  };

  // -- server.players --
  const players: RpcMethodHandler<z.infer<typeof serverIdSchema>, PlayerList> = {
    method: 'server.players',
    description: 'Online players, live or over the HTTP fallback',
    authLevel: 'api_key',
    permission: 'servers:read',
    schema: serverIdSchema,
    async execute({ serverId }) {
      const result = await ctx.status.queryPlayers(serverId);
      if (!result.ok) {
        throw rpcFailure(result.error, result.message);
      }
      return result.value;
    },
  };

  // -- server.say --
  const say: RpcMethodHandler<z.infer<typeof saySchema>, { delivery: 'sent' | 'queued' }> = {
    method: 'server.say',
    description: 'Broadcast chat to a server, or whisper to one player',
    authLevel: 'api_key',
    permission: 'servers:control',
    schema: saySchema,
    async execute({ serverId, content, sender, playerUuid }) {
      const result = ctx.forwarder.relayChat(serverId, { content, sender, playerUuid });
      if (!result.ok) {
        throw rpcFailure(result.error);
      }
      return { delivery: result.delivery };
    },
  };

  // -- server.command --
  const command: RpcMethodHandler<z.infer<typeof commandSchema>, CommandResultPayload> = {
    method: 'server.command',
    description: 'Run a console command and wait for its result',
    authLevel: 'api_key',
    permission: 'command:execute',
    schema: commandSchema,
    async execute({ serverId, command: line, timeoutMs }) {
      ctx.logger.info(`Console command for ${serverId} over RPC: ${line}`);
      const result = await ctx.forwarder.runCommand(serverId, line, timeoutMs);
      if (!result.ok) {
        throw rpcFailure(result.error);
      }
      return result.value;
    },
  };

  // -- server.reconnect --
  const reconnect: RpcMethodHandler<z.infer<typeof serverIdSchema>, { state: SessionState }> = {
    method: 'server.reconnect',
    description: 'Restart the connection attempts immediately',
    authLevel: 'api_key',
    permission: 'servers:control',
    schema: serverIdSchema,
    async execute({ serverId }) {
      const result = ctx.sessions.reconnect(serverId);
      if (!result.ok) {
        throw rpcFailure(result.error);
      }
      return { state: result.state };
    },
  };

  // -- server.detach --
  const detach: RpcMethodHandler<z.infer<typeof serverIdSchema>, { state: SessionState }> = {
    method: 'server.detach',
    description: 'Close the session without retrying',
    authLevel: 'api_key',
    permission: 'servers:control',
    schema: serverIdSchema,
    async execute({ serverId }) {
      const result = ctx.sessions.detach(serverId);
      if (!result.ok) {
        throw rpcFailure(result.error);
      }
      return { state: result.session.state };
    },
  };

  ctx.rpc.register(list);
  ctx.rpc.register(status);
  ctx.rpc.register(players);
  ctx.rpc.register(say);
  ctx.rpc.register(command);
  ctx.rpc.register(reconnect);
  ctx.rpc.register(detach);
}
