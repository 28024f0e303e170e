import { describe, it, expect, vi } from 'vitest';
import { HttpError } from '../src/errors.js';
import { fetchJson, fetchWithTimeout } from '../src/fetch.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('fetchWithTimeout', () => {
  it('uses redirect: error by default', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('ok'));
    await fetchWithTimeout('http://127.0.0.1:8080/api/status', { fetchImpl });
    expect(fetchImpl).toHaveBeenCalledWith(
      'http://127.0.0.1:8080/api/status',
      expect.objectContaining({ redirect: 'error' }),
    );
  });

  it('follows redirects when allowed', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('ok'));
    await fetchWithTimeout('http://127.0.0.1:8080', { fetchImpl, allowRedirect: true });
    expect(fetchImpl).toHaveBeenCalledWith(
      'http://127.0.0.1:8080',
      expect.objectContaining({ redirect: 'follow' }),
    );
  });

  it('attaches an abort signal', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('ok'));
    await fetchWithTimeout('http://127.0.0.1:8080', { fetchImpl, timeoutMs: 5000 });
    expect(fetchImpl.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });
});

describe('fetchJson', () => {
  it('parses JSON and sends Accept plus caller headers', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse({ online: true }));
    const body = await fetchJson('http://127.0.0.1:8080/api/status', {
      fetchImpl,
      init: { headers: { Authorization: 'Bearer test-secret' } },
    });

    expect(body).toEqual({ online: true });
    expect(fetchImpl.mock.calls[0]?.[1]?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-secret',
    });
  });

  it('throws HttpError on non-2xx', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse({ error: 'nope' }, 401));
    await expect(fetchJson('http://127.0.0.1:8080/api/status', { fetchImpl })).rejects.toBeInstanceOf(
      HttpError,
    );
  });
});
