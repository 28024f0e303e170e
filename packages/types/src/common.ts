/** Brand type: gives a primitive a nominal identity */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/**
 * Caller-visible outcome of a gateway operation. Failures carry a code from a
 * closed set and never throw.
 */
export type Result<T, E extends string> =
  | { ok: true; value: T }
  | { ok: false; error: E; message?: string };

/** Milliseconds since the Unix epoch */
export type Timestamp = Brand<number, 'Timestamp'>;

/**
 * Async cleanup function. Named `CleanupFn` rather than `AsyncDisposable`
 * to stay clear of TC39 `Symbol.asyncDispose`.
 */
export type CleanupFn = () => Promise<void>;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Brand factory */
export function createTimestamp(ms: number): Timestamp {
  return ms as Timestamp;
}
