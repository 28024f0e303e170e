// packages/server/src/gateway/auth/index.ts
import type { IncomingMessage } from 'node:http';
import { getEventBus } from '@blockbridge/infra';
import type { AuthResult } from '../rpc/types.js';
import { validateApiKey } from './api-key.js';
import { getRemoteAddress } from './credentials.js';

/**
 * Control-plane authentication.
 *
 * Priority: `Authorization: Bearer <key>` > X-API-Key > none.
 * Both carry a configured API key; `none` can only reach public methods.
 */
export function authenticate(req: IncomingMessage, apiKeys: readonly string[]): AuthResult {
  const authorization = req.headers.authorization;
  const header = req.headers['x-api-key'];
  const apiKey = typeof header === 'string' ? header : header?.[0];

  let presented: string | undefined;
  if (authorization?.startsWith('Bearer ')) {
    presented = authorization.slice(7);
  } else if (apiKey) {
    presented = apiKey;
  }

  if (presented === undefined) {
    return { ok: true, info: { level: 'none', permissions: [] } };
  }

  const result = validateApiKey(presented, apiKeys);
  if (!result.ok) {
    getEventBus().emit('gateway:auth:failure', getRemoteAddress(req), result.error);
  }
  return result;
}

export { validateApiKey } from './api-key.js';
export { verifyServerToken } from './server-token.js';
export { extractServerCredentials, getRemoteAddress, type ServerCredentials } from './credentials.js';
export { AuthRateLimiter, type RateLimiterOptions } from './rate-limit.js';
