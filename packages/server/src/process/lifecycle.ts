// packages/server/src/process/lifecycle.ts
import type { BlockBridgeLogger } from '@blockbridge/infra';
import type { CleanupFn } from '@blockbridge/types';
import { runCleanups, setupGracefulShutdown, type GracefulShutdownOptions } from './signal-handler.js';

export interface ProcessLifecycleDeps {
  logger: BlockBridgeLogger;
  shutdown?: GracefulShutdownOptions;
}

/**
 * Process lifecycle manager
 *
 * - register/unregister cleanup functions
 * - wire them to the signal handler
 * - run them in reverse registration order (LIFO)
 */
export class ProcessLifecycle {
  private readonly cleanupFns: CleanupFn[] = [];
  private readonly logger: BlockBridgeLogger;
  private detachSignals: (() => void) | undefined;

  constructor(private readonly deps: ProcessLifecycleDeps) {
    this.logger = deps.logger;
  }

  /** Runs in LIFO order */
  register(fn: CleanupFn): void {
    this.cleanupFns.push(fn);
  }

  unregister(fn: CleanupFn): boolean {
    const index = this.cleanupFns.indexOf(fn);
    if (index < 0) {
      return false;
    }
    this.cleanupFns.splice(index, 1);
    return true;
  }

  /** Install signal handlers (once) */
  init(): void {
    if (this.detachSignals) {
      return;
    }
    // the getter reads the list at signal time, so later registrations count
    this.detachSignals = setupGracefulShutdown(this.logger, () => this.ordered(), this.deps.shutdown);
    this.logger.info('Process lifecycle initialized');
  }

  /** Manual shutdown without exiting (tests, embedding) */
  async shutdown(): Promise<void> {
    this.logger.info('Manual shutdown initiated');
    await runCleanups(this.ordered(), this.logger);
  }

  dispose(): void {
    this.detachSignals?.();
    this.detachSignals = undefined;
  }

  private ordered(): CleanupFn[] {
    return [...this.cleanupFns].reverse();
  }
}
