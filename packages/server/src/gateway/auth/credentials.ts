// packages/server/src/gateway/auth/credentials.ts
import type { IncomingMessage } from 'node:http';

export interface ServerCredentials {
  readonly serverId?: string;
  readonly token?: string;
}

/**
 * Credentials a game server presents when it dials in.
 *
 * serverId: `?serverId=` or the X-Server-Id header.
 * token: `Authorization: Bearer` first, then `?token=`.
 */
export function extractServerCredentials(req: IncomingMessage): ServerCredentials {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const header = req.headers['x-server-id'];
  const serverId =
    url.searchParams.get('serverId') ?? (typeof header === 'string' ? header : header?.[0]) ?? undefined;

  const authorization = req.headers.authorization;
  const token = authorization?.startsWith('Bearer ')
    ? authorization.slice(7)
    : (url.searchParams.get('token') ?? undefined);

  return {
    serverId: serverId || undefined,
    token: token || undefined,
  };
}

export function getRemoteAddress(req: IncomingMessage): string {
  return req.socket.remoteAddress ?? 'unknown';
}
