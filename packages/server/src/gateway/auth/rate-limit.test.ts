// packages/server/src/gateway/auth/rate-limit.test.ts
import { getEventBus, resetEventBus } from '@blockbridge/infra';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AuthRateLimiter } from './rate-limit.js';

describe('AuthRateLimiter', () => {
  beforeEach(() => {
    resetEventBus();
  });

  it('allows unknown addresses', () => {
    const limiter = new AuthRateLimiter();
    expect(limiter.isBlocked('10.0.0.1')).toBe(false);
  });

  it('blocks an address after maxFailures within the window', () => {
    const limiter = new AuthRateLimiter({ maxFailures: 3, windowMs: 60_000, blockDurationMs: 60_000 });

    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');
    expect(limiter.isBlocked('10.0.0.1')).toBe(false);

    limiter.recordFailure('10.0.0.1');
    expect(limiter.isBlocked('10.0.0.1')).toBe(true);
  });

  it('emits gateway:auth:rate_limit when blocking', () => {
    const listener = vi.fn();
    getEventBus().on('gateway:auth:rate_limit', listener);
    const limiter = new AuthRateLimiter({ maxFailures: 2 });

    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');

    expect(listener).toHaveBeenCalledWith('10.0.0.1', 2);
  });

  it('does not block other addresses', () => {
    const limiter = new AuthRateLimiter({ maxFailures: 2 });
    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');
    expect(limiter.isBlocked('10.0.0.1')).toBe(true);
    expect(limiter.isBlocked('10.0.0.2')).toBe(false);
  });

  it('unblocks after blockDurationMs', () => {
    vi.useFakeTimers();
    const limiter = new AuthRateLimiter({ maxFailures: 2, windowMs: 60_000, blockDurationMs: 10_000 });

    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');
    expect(limiter.isBlocked('10.0.0.1')).toBe(true);

    vi.advanceTimersByTime(10_001);
    expect(limiter.isBlocked('10.0.0.1')).toBe(false);
    expect(limiter.size).toBe(0);
  });

  it('restarts the count when the window lapses', () => {
    vi.useFakeTimers();
    const limiter = new AuthRateLimiter({ maxFailures: 3, windowMs: 5_000, blockDurationMs: 60_000 });

    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');
    vi.advanceTimersByTime(5_001);
    limiter.recordFailure('10.0.0.1');

    expect(limiter.isBlocked('10.0.0.1')).toBe(false);
  });

  it('recordSuccess forgets previous failures', () => {
    const limiter = new AuthRateLimiter({ maxFailures: 2 });
    limiter.recordFailure('10.0.0.1');
    limiter.recordSuccess('10.0.0.1');
    limiter.recordFailure('10.0.0.1');
    expect(limiter.isBlocked('10.0.0.1')).toBe(false);
  });

  it('counts from the first failure of the window', () => {
    vi.useFakeTimers();
    const limiter = new AuthRateLimiter({ maxFailures: 3, windowMs: 5_000 });

    limiter.recordFailure('10.0.0.1');
    vi.advanceTimersByTime(3_000);
    limiter.recordFailure('10.0.0.1');
    vi.advanceTimersByTime(3_000);
    limiter.recordFailure('10.0.0.1');

    expect(limiter.isBlocked('10.0.0.1')).toBe(false);
  });

  it('emits once per block', () => {
    const listener = vi.fn();
    getEventBus().on('gateway:auth:rate_limit', listener);
    const limiter = new AuthRateLimiter({ maxFailures: 2 });

    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('clear() removes all entries', () => {
    const limiter = new AuthRateLimiter();
    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.2');
    expect(limiter.size).toBe(2);
    limiter.clear();
    expect(limiter.size).toBe(0);
  });
});
