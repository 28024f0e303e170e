// packages/server/src/gateway/session/heartbeat.test.ts
import { describe, it, expect, vi } from 'vitest';
import { HeartbeatMonitor } from './heartbeat.js';

describe('HeartbeatMonitor', () => {
  it('pings on every interval', () => {
    vi.useFakeTimers();
    const sendPing = vi.fn();
    const monitor = new HeartbeatMonitor({ intervalMs: 1_000, timeoutMs: 5_000, sendPing, onTimeout: vi.fn() });
    monitor.start();
    vi.advanceTimersByTime(1_000);
    monitor.acknowledge();
    vi.advanceTimersByTime(1_000);
    expect(sendPing).toHaveBeenCalledTimes(2);
    expect(sendPing).toHaveBeenNthCalledWith(1, 'hb-1');
    expect(sendPing).toHaveBeenNthCalledWith(2, 'hb-2');
    monitor.stop();
  });

  it('times out when no PONG arrives', () => {
    vi.useFakeTimers();
    const onTimeout = vi.fn();
    const monitor = new HeartbeatMonitor({ intervalMs: 1_000, timeoutMs: 500, sendPing: vi.fn(), onTimeout });
    monitor.start();
    vi.advanceTimersByTime(1_499);
    expect(onTimeout).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onTimeout).toHaveBeenCalledTimes(1);
    expect(monitor.running).toBe(false);
  });

  it('acknowledge() cancels the pending deadline', () => {
    vi.useFakeTimers();
    const onTimeout = vi.fn();
    const monitor = new HeartbeatMonitor({ intervalMs: 1_000, timeoutMs: 500, sendPing: vi.fn(), onTimeout });
    monitor.start();
    vi.advanceTimersByTime(1_200);
    monitor.acknowledge();
    vi.advanceTimersByTime(400);
    expect(onTimeout).not.toHaveBeenCalled();
    monitor.stop();
  });

  it('is disabled by a non-positive interval', () => {
    vi.useFakeTimers();
    const sendPing = vi.fn();
    const monitor = new HeartbeatMonitor({ intervalMs: 0, timeoutMs: 500, sendPing, onTimeout: vi.fn() });
    monitor.start();
    vi.advanceTimersByTime(10_000);
    expect(sendPing).not.toHaveBeenCalled();
    expect(monitor.running).toBe(false);
  });
});
