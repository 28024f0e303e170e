// packages/server/src/gateway/errors.ts
import { BlockBridgeError } from '@blockbridge/infra';

/** Wrong or unknown server credentials; never retried */
export class AuthenticationFailedError extends BlockBridgeError {
  readonly serverId: string;

  constructor(serverId: string, reason = 'Authentication failed') {
    super(`${reason} for server ${serverId}`, 'AUTHENTICATION_FAILED', {
      statusCode: 401,
      details: { serverId },
    });
    this.name = 'AuthenticationFailedError';
    this.serverId = serverId;
  }
}

/** Transport could not be opened or was lost; retried with backoff */
export class TransportError extends BlockBridgeError {
  constructor(message: string, opts?: { cause?: Error; details?: Record<string, unknown> }) {
    super(message, 'TRANSPORT_LOST', { statusCode: 503, ...opts });
    this.name = 'TransportError';
  }
}
