// packages/infra/src/fetch.ts
import { HttpError } from './errors.js';

export interface FetchOptions {
  /** default 30000 */
  timeoutMs?: number;
  /** default false ('error' redirect mode) */
  allowRedirect?: boolean;
  init?: RequestInit;
  /** Substitute for the global fetch (tests) */
  fetchImpl?: typeof fetch;
}

/**
 * fetch with a timeout.
 *
 * 1. AbortSignal.timeout() merged with the caller's signal
 * 2. redirect: 'error' unless allowed
 */
export async function fetchWithTimeout(url: string, opts: FetchOptions = {}): Promise<Response> {
  const { timeoutMs = 30000, allowRedirect = false, init = {}, fetchImpl = fetch } = opts;

  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  const combinedSignal = init.signal
    ? AbortSignal.any([init.signal, timeoutSignal])
    : timeoutSignal;

  return fetchImpl(url, {
    ...init,
    signal: combinedSignal,
    redirect: allowRedirect ? 'follow' : 'error',
  });
}

/** GET JSON; non-2xx throws HttpError */
export async function fetchJson(url: string, opts: FetchOptions = {}): Promise<unknown> {
  const response = await fetchWithTimeout(url, {
    ...opts,
    init: {
      ...opts.init,
      headers: {
        Accept: 'application/json',
        ...opts.init?.headers,
      },
    },
  });

  if (!response.ok) {
    throw new HttpError(response.status, response.statusText, url);
  }

  return response.json();
}
