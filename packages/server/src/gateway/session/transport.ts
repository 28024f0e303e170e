// packages/server/src/gateway/session/transport.ts
import { randomUUID } from 'node:crypto';
import type { RawData, WebSocket } from 'ws';

/**
 * One text-frame connection to a game server.
 *
 * Sessions only see this interface; tests drive it with an in-process fake.
 */
export interface Transport {
  readonly id: string;
  readonly remoteAddress: string;
  readonly isOpen: boolean;
  send(frame: string): void;
  close(code: number, reason: string): void;
  /** Drop the connection without a closing handshake */
  terminate(): void;
  onMessage(listener: (frame: string) => void): void;
  onClose(listener: (code: number, reason: string) => void): void;
  /** Socket-level errors; a close always follows */
  onError(listener: (err: Error) => void): void;
}

/** Gateway close codes */
export const CloseCodes = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  TRY_AGAIN_LATER: 1013,
  SERVICE_RESTART: 1012,
  SUPERSEDED: 4000,
  AUTH_FAILED: 4001,
  HEARTBEAT_TIMEOUT: 4002,
  HANDSHAKE_TIMEOUT: 4008,
  DUPLICATE_SERVER_ID: 4009,
  RATE_LIMITED: 4029,
} as const;

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

/** Adapt a `ws` socket (accepted or dialed) to Transport */
export function wrapWebSocket(ws: WebSocket, remoteAddress: string): Transport {
  return {
    id: randomUUID(),
    remoteAddress,
    get isOpen() {
      return ws.readyState === ws.OPEN;
    },
    send(frame) {
      ws.send(frame);
    },
    close(code, reason) {
      if (ws.readyState === ws.CLOSED || ws.readyState === ws.CLOSING) {
        return;
      }
      ws.close(code, reason);
    },
    terminate() {
      ws.terminate();
    },
    onMessage(listener) {
      ws.on('message', (data: RawData, isBinary: boolean) => {
        if (!isBinary) {
          listener(rawDataToString(data));
        }
      });
    },
    onClose(listener) {
      ws.on('close', (code: number, reason: Buffer) => listener(code, reason.toString('utf8')));
    },
    onError(listener) {
      ws.on('error', listener);
    },
  };
}
