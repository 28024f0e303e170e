// packages/server/src/gateway/auth/rate-limit.ts
import { getEventBus } from '@blockbridge/infra';

interface FailureWindow {
  count: number;
  /** First failure of the current window */
  startedAt: number;
  /** 0 while not blocked */
  blockedUntil: number;
}

export interface RateLimiterOptions {
  readonly maxFailures?: number;
  readonly windowMs?: number;
  readonly blockDurationMs?: number;
}

/** Stale windows are pruned once this many addresses are tracked */
const PRUNE_THRESHOLD = 1024;

/**
 * Failed-authentication limiter keyed by remote address, shared by game-server
 * and API-key auth.
 *
 * `maxFailures` failures within `windowMs` of the first one block the address
 * for `blockDurationMs`. A success or an expired block forgets the address.
 */
export class AuthRateLimiter {
  private readonly windows = new Map<string, FailureWindow>();
  private readonly maxFailures: number;
  private readonly windowMs: number;
  private readonly blockDurationMs: number;

  constructor(opts: RateLimiterOptions = {}) {
    this.maxFailures = opts.maxFailures ?? 5;
    this.windowMs = opts.windowMs ?? 60_000;
    this.blockDurationMs = opts.blockDurationMs ?? this.windowMs;
  }

  isBlocked(address: string): boolean {
    const window = this.windows.get(address);
    if (!window || window.blockedUntil === 0) {
      return false;
    }
    if (Date.now() < window.blockedUntil) {
      return true;
    }
    this.windows.delete(address);
    return false;
  }

  recordFailure(address: string): void {
    const now = Date.now();
    let window = this.windows.get(address);
    if (!window || this.isStale(window, now)) {
      window = { count: 0, startedAt: now, blockedUntil: 0 };
      this.windows.set(address, window);
      if (this.windows.size > PRUNE_THRESHOLD) {
        this.prune(now);
      }
    }

    window.count++;
    if (window.count >= this.maxFailures && window.blockedUntil === 0) {
      window.blockedUntil = now + this.blockDurationMs;
      getEventBus().emit('gateway:auth:rate_limit', address, window.count);
    }
  }

  recordSuccess(address: string): void {
    this.windows.delete(address);
  }

  /** Tracked addresses */
  get size(): number {
    return this.windows.size;
  }

  clear(): void {
    this.windows.clear();
  }

  private isStale(window: FailureWindow, now: number): boolean {
    if (window.blockedUntil > 0) {
      return now >= window.blockedUntil;
    }
    return now - window.startedAt > this.windowMs;
  }

  private prune(now: number): void {
    for (const [address, window] of this.windows) {
      if (this.isStale(window, now)) {
        this.windows.delete(address);
      }
    }
  }
}
