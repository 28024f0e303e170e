// packages/server/src/gateway/cors.ts
import type { ResolvedConfig } from '@blockbridge/types';
import type { IncomingMessage, ServerResponse } from 'node:http';

type CorsConfig = ResolvedConfig['gateway']['cors'];

/**
 * Set CORS headers for an allowed origin.
 * Returns true when the request was a preflight and has been answered (204).
 */
export function handleCors(req: IncomingMessage, res: ServerResponse, config: CorsConfig): boolean {
  const origin = req.headers.origin;
  const allowed =
    origin !== undefined && (config.origins.includes('*') || config.origins.includes(origin));

  if (allowed) {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Vary', 'Origin');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-API-Key');
    if (config.maxAge > 0) {
      res.setHeader('Access-Control-Max-Age', String(config.maxAge));
    }
  }

  if (req.method === 'OPTIONS') {
    res.writeHead(allowed ? 204 : 403);
    res.end();
    return true;
  }
  return false;
}
