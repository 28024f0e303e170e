// packages/infra/src/errors.ts

/** Base error for every custom error in BlockBridge */
export class BlockBridgeError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly isOperational: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    opts: {
      statusCode?: number;
      isOperational?: boolean;
      cause?: Error;
      details?: Record<string, unknown>;
    } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = 'BlockBridgeError';
    this.code = code;
    this.statusCode = opts.statusCode ?? 500;
    this.isOperational = opts.isOperational ?? true;
    this.details = opts.details;
  }
}

/** Gateway listen address already bound */
export class PortInUseError extends BlockBridgeError {
  constructor(port: number, host?: string) {
    super(`Port ${port} is already in use${host ? ` on ${host}` : ''}`, 'PORT_IN_USE', {
      statusCode: 503,
      details: { port, host },
    });
    this.name = 'PortInUseError';
  }
}

/** Non-2xx HTTP response */
export class HttpError extends BlockBridgeError {
  readonly status: number;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status}: ${statusText}`, 'HTTP_ERROR', {
      statusCode: 502,
      details: { status, url },
    });
    this.name = 'HttpError';
    this.status = status;
  }
}

// ──────────────────────────────────────────────
// Domain errors live next to their domain:
//   ConfigError               → packages/config/src/errors.ts
//   AuthenticationFailedError → packages/server/src/gateway/errors.ts
//   TransportError            → packages/server/src/gateway/errors.ts
// ──────────────────────────────────────────────

export function isBlockBridgeError(err: unknown): err is BlockBridgeError {
  return err instanceof BlockBridgeError;
}

/** `code` of a Node system error, if any */
export function getErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Structured view of an error for logging */
export function extractErrorInfo(err: unknown): {
  code: string;
  message: string;
  isOperational?: boolean;
  stack?: string;
  cause?: string;
} {
  if (err instanceof BlockBridgeError) {
    return {
      code: err.code,
      message: err.message,
      isOperational: err.isOperational,
      stack: err.stack,
      cause: err.cause instanceof Error ? err.cause.message : undefined,
    };
  }
  if (err instanceof Error) {
    return { code: getErrorCode(err) ?? 'UNKNOWN', message: err.message, stack: err.stack };
  }
  return { code: 'UNKNOWN', message: String(err) };
}
