// packages/infra/src/context.ts
import { AsyncLocalStorage } from 'node:async_hooks';

/** Per-request context */
export interface RequestContext {
  requestId: string;
  /** Game server the request concerns, when there is one */
  serverId?: string;
  startedAt: number;
}

const als = new AsyncLocalStorage<RequestContext>();

export function runWithContext<T>(ctx: RequestContext, fn: () => T): T {
  return als.run(ctx, fn);
}

/** Current context, or undefined outside `runWithContext` */
export function getContext(): RequestContext | undefined {
  return als.getStore();
}

export function getRequestId(): string | undefined {
  return als.getStore()?.requestId;
}
