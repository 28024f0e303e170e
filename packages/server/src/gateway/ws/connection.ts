// packages/server/src/gateway/ws/connection.ts
import type { IncomingMessage } from 'node:http';
import type { WebSocket } from 'ws';
import type { GatewayContext } from '../context.js';
import type { AttachResult } from '../registry.js';
import { extractServerCredentials, getRemoteAddress } from '../auth/index.js';
import { wrapWebSocket } from '../session/transport.js';

/**
 * Accept a game server that dialed in.
 *
 * The credentials ride on the upgrade request; the registry authenticates them and either
 * hands the socket to the server's session or closes it (4001, 4009, 4029).
 * From here on the session owns the socket: HELLO, heartbeat and close handling live there.
 */
export function handleWsConnection(ws: WebSocket, req: IncomingMessage, ctx: GatewayContext): AttachResult {
  const remoteAddress = getRemoteAddress(req);
  const { serverId, token } = extractServerCredentials(req);

  const result = ctx.sessions.attach(serverId ?? '', wrapWebSocket(ws, remoteAddress), token, remoteAddress);
  if (result.ok) {
    ctx.logger.info(`Game server ${result.session.serverId} connected from ${remoteAddress}`);
  }
  return result;
}
