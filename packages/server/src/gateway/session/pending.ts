// packages/server/src/gateway/session/pending.ts
import type { Message } from '@blockbridge/types';

export type PendingError = 'TIMEOUT' | 'SERVER_NOT_CONNECTED';

export type PendingOutcome<R> = { ok: true; value: R } | { ok: false; error: PendingError };

interface PendingEntry {
  /** Returns false when the message is not an acceptable response */
  offer(message: Message): boolean;
  fail(error: PendingError): void;
}

/**
 * Waiters for correlated responses, keyed by correlation id.
 *
 * Each waiter resolves exactly once: with its response, on timeout, on abort,
 * or when the session drops. Settled entries are removed immediately.
 */
export class PendingRequests {
  private readonly entries = new Map<string, PendingEntry>();

  register<R extends Message>(
    correlationId: string,
    accept: (message: Message) => message is R,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<PendingOutcome<R>> {
    if (this.entries.has(correlationId)) {
      throw new Error(`Duplicate correlation id: ${correlationId}`);
    }

    return new Promise<PendingOutcome<R>>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (outcome: PendingOutcome<R>): void => {
        if (this.entries.get(correlationId) !== entry) {
          return;
        }
        this.entries.delete(correlationId);
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      const onAbort = (): void => finish({ ok: false, error: 'TIMEOUT' });

      const entry: PendingEntry = {
        offer: (message) => {
          if (!accept(message)) {
            return false;
          }
          finish({ ok: true, value: message });
          return true;
        },
        fail: (error) => finish({ ok: false, error }),
      };

      this.entries.set(correlationId, entry);

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      timer = setTimeout(() => finish({ ok: false, error: 'TIMEOUT' }), timeoutMs);
    });
  }

  /**
   * Hand a response to its waiter.
   * Returns false for unknown ids and for a message the waiter does not accept.
   */
  settle(message: Message): boolean {
    if (message.correlationId === undefined) {
      return false;
    }
    const entry = this.entries.get(message.correlationId);
    return entry ? entry.offer(message) : false;
  }

  failAll(error: PendingError): void {
    for (const entry of [...this.entries.values()]) {
      entry.fail(error);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
