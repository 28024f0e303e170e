// packages/server/src/gateway/session/dialer.ts
import { redactUrl } from '@blockbridge/infra';
import type { IncomingMessage } from 'node:http';
import { WebSocket } from 'ws';
import { AuthenticationFailedError, TransportError } from '../errors.js';
import { wrapWebSocket, type Transport } from './transport.js';

export interface DialTarget {
  readonly serverId: string;
  readonly url: string;
  readonly token: string;
}

/** Opens an outbound transport; rejects with AuthenticationFailedError or TransportError */
export type Dialer = (target: DialTarget, signal: AbortSignal) => Promise<Transport>;

export interface WsDialerOptions {
  readonly handshakeTimeoutMs: number;
  readonly maxPayloadBytes: number;
}

/** Dialer backed by a `ws` client socket */
export function createWsDialer(opts: WsDialerOptions): Dialer {
  return (target, signal) =>
    new Promise<Transport>((resolve, reject) => {
      const url = new URL(target.url);
      url.searchParams.set('serverId', target.serverId);

      const ws = new WebSocket(url, {
        headers: { Authorization: `Bearer ${target.token}`, 'X-Server-Id': target.serverId },
        handshakeTimeout: opts.handshakeTimeoutMs,
        maxPayload: opts.maxPayloadBytes,
      });

      const onAbort = (): void => {
        ws.terminate();
        reject(new TransportError(`Dial aborted: ${redactUrl(url.toString())}`));
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      ws.once('open', () => {
        signal.removeEventListener('abort', onAbort);
        resolve(wrapWebSocket(ws, url.host));
      });

      ws.once('unexpected-response', (_req, res: IncomingMessage) => {
        signal.removeEventListener('abort', onAbort);
        ws.terminate();
        const status = res.statusCode ?? 0;
        if (status === 401 || status === 403) {
          reject(new AuthenticationFailedError(target.serverId, `Upgrade rejected with HTTP ${status}`));
        } else {
          reject(new TransportError(`Upgrade rejected with HTTP ${status}`, { details: { status } }));
        }
      });

      ws.once('error', (err: Error) => {
        signal.removeEventListener('abort', onAbort);
        reject(
          new TransportError(`Dial failed: ${redactUrl(url.toString())}: ${err.message}`, { cause: err }),
        );
      });
    });
}
