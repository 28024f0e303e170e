// packages/server/src/process/signal-handler.ts
import { formatDuration, type BlockBridgeLogger } from '@blockbridge/infra';
import type { CleanupFn } from '@blockbridge/types';

export interface GracefulShutdownOptions {
  /** Forced exit after this long; default 30 s */
  readonly timeoutMs?: number;
  readonly signals?: readonly NodeJS.Signals[];
  readonly exit?: (code: number) => void;
}

/**
 * Graceful shutdown on SIGINT/SIGTERM.
 *
 * 1. run the cleanup functions one by one (a failing one is logged and skipped)
 * 2. exit 0, or exit 1 when the timeout fires first
 * 3. a second signal exits at once
 *
 * @returns detaches the signal listeners
 */
export function setupGracefulShutdown(
  logger: BlockBridgeLogger,
  getCleanupFns: () => CleanupFn[],
  opts: GracefulShutdownOptions = {},
): () => void {
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const signals = opts.signals ?? ['SIGINT', 'SIGTERM'];
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const handler = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn(`Forced exit on second ${signal}`);
      exit(1);
      return;
    }

    shuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    const timeout = setTimeout(() => {
      logger.error(`Shutdown timeout (${formatDuration(timeoutMs)}), forcing exit`);
      exit(1);
    }, timeoutMs);

    await runCleanups(getCleanupFns(), logger);
    clearTimeout(timeout);
    logger.info('Graceful shutdown complete');
    await logger.flush();
    exit(0);
  };

  const listeners = signals.map((signal) => {
    const listener = (): void => void handler(signal);
    process.on(signal, listener);
    return { signal, listener };
  });

  return () => {
    for (const { signal, listener } of listeners) {
      process.off(signal, listener);
    }
  };
}

/** Run cleanups in order; errors are logged, never rethrown */
export async function runCleanups(cleanups: readonly CleanupFn[], logger: BlockBridgeLogger): Promise<void> {
  for (const cleanup of cleanups) {
    try {
      await cleanup();
    } catch (err) {
      logger.error(`Cleanup error: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
