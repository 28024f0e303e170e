// @blockbridge/infra: barrel export

// errors
export {
  BlockBridgeError,
  PortInUseError,
  HttpError,
  isBlockBridgeError,
  getErrorCode,
  extractErrorInfo,
} from './errors.js';

// backoff
export { computeBackoff, nextRetryDelay, type BackoffOptions, type RetryPolicy } from './backoff.js';

// utilities
export { formatDuration } from './format-duration.js';

// request context
export { runWithContext, getContext, getRequestId, type RequestContext } from './context.js';

// environment
export { assertSupportedRuntime, isSupportedRuntime, parseNodeVersion } from './runtime-guard.js';
export { loadDotenv, readEnv, readEnvInt, isTruthyEnvValue, ENV_PREFIX, type Env } from './env.js';
export { resolveStatePaths, type StatePaths } from './paths.js';

// logging
export {
  createLogger,
  redactUrl,
  DEFAULT_REDACT_KEYS,
  type LoggerConfig,
  type BlockBridgeLogger,
} from './logger.js';
export { attachFileTransport, type FileTransportConfig } from './logger-transports.js';

// events
export {
  createTypedEmitter,
  getEventBus,
  resetEventBus,
  type EventMap,
  type TypedEmitter,
  type BlockBridgeEventMap,
} from './events.js';

// network
export { fetchWithTimeout, fetchJson, type FetchOptions } from './fetch.js';

// process
export { assertPortAvailable, isValidPort } from './ports.js';
export {
  setupUnhandledRejectionHandler,
  classifyError,
  type ErrorLevel,
  type UnhandledRejectionOptions,
} from './unhandled-rejections.js';
