// packages/infra/src/unhandled-rejections.ts
import { extractErrorInfo, getErrorCode, isBlockBridgeError } from './errors.js';
import { getEventBus } from './events.js';

export type ErrorLevel = 'abort' | 'fatal' | 'config' | 'transient' | 'unknown';

export interface UnhandledRejectionOptions {
  /** Default process.exit */
  exit?: (code: number) => void;
}

/**
 * Install the process-wide policy:
 *   abort, transient → warn and keep running
 *   fatal, config, unknown → log and exit(1)
 */
export function setupUnhandledRejectionHandler(
  logger: { warn: (msg: string) => void; error: (msg: string) => void },
  opts: UnhandledRejectionOptions = {},
): () => void {
  const exit = opts.exit ?? ((code: number) => process.exit(code));

  const handler = (reason: unknown): void => {
    const level = classifyError(reason);
    getEventBus().emit('system:unhandledRejection', level, reason);

    const { code, message } = extractErrorInfo(reason);
    if (level === 'abort' || level === 'transient') {
      logger.warn(`Unhandled rejection (${level}) [${code}]: ${message}`);
      return;
    }
    logger.error(`Fatal unhandled rejection (${level}) [${code}]: ${message}`);
    exit(1);
  };

  process.on('unhandledRejection', handler);
  return () => {
    process.off('unhandledRejection', handler);
  };
}

export function classifyError(err: unknown): ErrorLevel {
  if (!(err instanceof Error)) {
    return 'unknown';
  }
  if (err.name === 'AbortError' || err.name === 'TimeoutError') {
    return 'abort';
  }
  if (isBlockBridgeError(err)) {
    if (CONFIG_CODES.has(err.code)) {
      return 'config';
    }
    return err.isOperational ? 'transient' : 'unknown';
  }
  if (err instanceof RangeError && err.message.includes('call stack')) {
    return 'fatal';
  }
  if (err.message.includes('out of memory') || getErrorCode(err) === 'ERR_WORKER_OUT_OF_MEMORY') {
    return 'fatal';
  }
  // fetch() reports network failures as TypeError('fetch failed') with the system error as cause
  const code = getErrorCode(err) ?? getErrorCode(err.cause);
  if (code && TRANSIENT_CODES.has(code)) {
    return 'transient';
  }
  return 'unknown';
}

const CONFIG_CODES = new Set(['CONFIG_ERROR', 'INVALID_ENV', 'PORT_IN_USE']);

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);
