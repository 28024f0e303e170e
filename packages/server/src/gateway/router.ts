// packages/server/src/gateway/router.ts
import { getRequestId, runWithContext } from '@blockbridge/infra';
import type { RpcResponse } from '@blockbridge/types';
import { randomUUID } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { GatewayContext } from './context.js';
import { authenticate, getRemoteAddress } from './auth/index.js';
import { handleCors } from './cors.js';
import { createError, RpcErrors } from './rpc/errors.js';
import { listServers } from './rpc/methods/servers.js';
import { GATEWAY_NAME, GATEWAY_VERSION, healthReport } from './rpc/methods/system.js';
import type { AuthInfo } from './rpc/types.js';

interface Route {
  readonly method: string;
  readonly path: string;
  handler(req: IncomingMessage, res: ServerResponse, ctx: GatewayContext): Promise<void>;
}

const routes: Route[] = [
  { method: 'POST', path: '/rpc', handler: handleRpcRequest },
  { method: 'GET', path: '/health', handler: handleHealthRequest },
  { method: 'GET', path: '/info', handler: handleInfoRequest },
  { method: 'GET', path: '/servers', handler: handleServersRequest },
];

export class PayloadTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

/** Route a control-plane HTTP request */
export async function handleHttpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: GatewayContext,
): Promise<void> {
  await runWithContext({ requestId: randomUUID(), startedAt: Date.now() }, async () => {
    if (handleCors(req, res, ctx.config.gateway.cors)) {
      return;
    }

    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    const route = routes.find((r) => r.method === req.method && r.path === pathname);
    if (!route) {
      sendJson(res, 404, { error: 'Not Found' });
      return;
    }

    try {
      await route.handler(req, res, ctx);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      ctx.logger.error(`${req.method} ${pathname} failed (${getRequestId() ?? '-'}): ${message}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal Server Error' });
      }
    }
  });
}

/** POST /rpc: JSON-RPC endpoint, single or batch */
async function handleRpcRequest(req: IncomingMessage, res: ServerResponse, ctx: GatewayContext): Promise<void> {
  const auth = authorizeRequest(req, ctx);
  if (!auth.ok) {
    const code = auth.status === 429 ? RpcErrors.RATE_LIMITED : RpcErrors.UNAUTHORIZED;
    sendJson(res, auth.status, createError(null, code, auth.error));
    return;
  }

  let body: string;
  try {
    body = await readBody(req, ctx.config.gateway.maxPayloadBytes);
  } catch (error) {
    if (error instanceof PayloadTooLargeError) {
      sendJson(res, 413, createError(null, RpcErrors.INVALID_REQUEST, error.message));
      return;
    }
    sendJson(res, 400, createError(null, RpcErrors.PARSE_ERROR, 'Failed to read request body'));
    return;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    sendJson(res, 400, createError(null, RpcErrors.PARSE_ERROR, 'Invalid JSON'));
    return;
  }

  const response: RpcResponse | RpcResponse[] = await ctx.rpc.dispatch(parsed, {
    auth: auth.info,
    remoteAddress: getRemoteAddress(req),
  });
  sendJson(res, 200, response);
}

/** GET /health: public shortcut for system.health */
async function handleHealthRequest(
  _req: IncomingMessage,
  res: ServerResponse,
  ctx: GatewayContext,
): Promise<void> {
  sendJson(res, 200, healthReport(ctx));
}

/** GET /info */
async function handleInfoRequest(_req: IncomingMessage, res: ServerResponse, ctx: GatewayContext): Promise<void> {
  sendJson(res, 200, { name: GATEWAY_NAME, version: GATEWAY_VERSION, methods: ctx.rpc.list() });
}

/** GET /servers: needs an API key */
async function handleServersRequest(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: GatewayContext,
): Promise<void> {
  const auth = authorizeRequest(req, ctx);
  if (!auth.ok) {
    sendJson(res, auth.status, { error: auth.error });
    return;
  }
  if (!auth.info.permissions.includes('servers:read')) {
    sendJson(res, 401, { error: 'Authentication required' });
    return;
  }
  sendJson(res, 200, { servers: listServers(ctx) });
}

type Authorization =
  | { readonly ok: true; readonly info: AuthInfo }
  | { readonly ok: false; readonly status: 401 | 429; readonly error: string };

/** API-key check with per-address failure limiting */
function authorizeRequest(req: IncomingMessage, ctx: GatewayContext): Authorization {
  const address = getRemoteAddress(req);
  if (ctx.authLimiter.isBlocked(address)) {
    return { ok: false, status: 429, error: 'Too many failed attempts' };
  }

  const result = authenticate(req, ctx.config.control.apiKeys);
  if (!result.ok) {
    ctx.authLimiter.recordFailure(address);
    return { ok: false, status: 401, error: result.error };
  }
  if (result.info.level === 'api_key') {
    ctx.authLimiter.recordSuccess(address);
  }
  return { ok: true, info: result.info };
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/** Read the request body, rejecting once it passes `limit` bytes */
export function readBody(req: IncomingMessage, limit = Infinity): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let failed = false;
    req.on('data', (chunk: Buffer) => {
      if (failed) {
        return;
      }
      size += chunk.length;
      if (size > limit) {
        failed = true;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!failed) {
        resolve(Buffer.concat(chunks).toString('utf8'));
      }
    });
    req.on('error', reject);
  });
}
