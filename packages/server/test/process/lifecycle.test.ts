// packages/server/test/process/lifecycle.test.ts
import { describe, it, expect, vi, afterEach } from 'vitest';
import { ProcessLifecycle } from '../../src/process/lifecycle.js';
import { createTestLogger } from '../helpers.js';

describe('ProcessLifecycle', () => {
  let lifecycle: ProcessLifecycle | undefined;

  afterEach(() => {
    lifecycle?.dispose();
    lifecycle = undefined;
  });

  it('runs cleanups in reverse registration order', async () => {
    const order: string[] = [];
    lifecycle = new ProcessLifecycle({ logger: createTestLogger() });
    lifecycle.register(async () => void order.push('http'));
    lifecycle.register(async () => void order.push('sessions'));

    await lifecycle.shutdown();

    expect(order).toEqual(['sessions', 'http']);
  });

  it('keeps going after a failing cleanup', async () => {
    const logger = createTestLogger();
    const last = vi.fn(async () => {});
    lifecycle = new ProcessLifecycle({ logger });
    lifecycle.register(last);
    lifecycle.register(async () => {
      throw new Error('socket already closed');
    });

    await lifecycle.shutdown();

    expect(last).toHaveBeenCalledOnce();
    expect(logger.error).toHaveBeenCalledWith('Cleanup error: socket already closed');
  });

  it('forgets an unregistered cleanup', async () => {
    const cleanup = vi.fn(async () => {});
    lifecycle = new ProcessLifecycle({ logger: createTestLogger() });
    lifecycle.register(cleanup);

    expect(lifecycle.unregister(cleanup)).toBe(true);
    expect(lifecycle.unregister(cleanup)).toBe(false);
    await lifecycle.shutdown();
    expect(cleanup).not.toHaveBeenCalled();
  });

  it('cleans up and exits 0 on a signal', async () => {
    const exit = vi.fn();
    const cleanup = vi.fn(async () => {});
    lifecycle = new ProcessLifecycle({
      logger: createTestLogger(),
      shutdown: { signals: ['SIGUSR2'], exit, timeoutMs: 1_000 },
    });
    lifecycle.register(cleanup);
    lifecycle.init();

    process.emit('SIGUSR2');

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
    expect(cleanup).toHaveBeenCalledOnce();
  });

  it('exits 1 on a second signal', async () => {
    const exit = vi.fn();
    lifecycle = new ProcessLifecycle({
      logger: createTestLogger(),
      shutdown: { signals: ['SIGUSR2'], exit, timeoutMs: 1_000 },
    });
    lifecycle.register(() => new Promise<void>((resolve) => setTimeout(resolve, 50)));
    lifecycle.init();

    process.emit('SIGUSR2');
    process.emit('SIGUSR2');

    expect(exit).toHaveBeenCalledWith(1);
    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
  });
});
