// packages/server/src/gateway/session/state.test.ts
import { describe, it, expect } from 'vitest';
import { nextState } from './state.js';

describe('nextState', () => {
  it('walks the happy path', () => {
    expect(nextState('CONNECTING', 'transport_opened')).toBe('AUTHENTICATING');
    expect(nextState('AUTHENTICATING', 'auth_succeeded')).toBe('CONNECTED');
  });

  it('moves CONNECTED to RECONNECTING on loss or heartbeat timeout', () => {
    expect(nextState('CONNECTED', 'transport_lost')).toBe('RECONNECTING');
    expect(nextState('CONNECTED', 'heartbeat_timeout')).toBe('RECONNECTING');
  });

  it('re-enters AUTHENTICATING from RECONNECTING', () => {
    expect(nextState('RECONNECTING', 'transport_opened')).toBe('AUTHENTICATING');
  });

  it('closes on auth failure without retry', () => {
    expect(nextState('AUTHENTICATING', 'auth_failed')).toBe('CLOSED');
  });

  it('closes when retries run out', () => {
    expect(nextState('CONNECTING', 'retries_exhausted')).toBe('CLOSED');
    expect(nextState('RECONNECTING', 'retries_exhausted')).toBe('CLOSED');
  });

  it('supersede goes through AUTHENTICATING', () => {
    expect(nextState('CONNECTED', 'transport_replaced')).toBe('AUTHENTICATING');
  });

  it('lets reconnect leave CLOSED', () => {
    expect(nextState('CLOSED', 'reconnect_requested')).toBe('RECONNECTING');
  });

  it('detach closes from every live state', () => {
    for (const state of ['CONNECTING', 'AUTHENTICATING', 'CONNECTED', 'RECONNECTING'] as const) {
      expect(nextState(state, 'detach')).toBe('CLOSED');
    }
  });

  it('returns undefined for illegal triggers', () => {
    expect(nextState('CLOSED', 'auth_succeeded')).toBeUndefined();
    expect(nextState('CONNECTED', 'transport_opened')).toBeUndefined();
    expect(nextState('CLOSED', 'transport_lost')).toBeUndefined();
  });
});
