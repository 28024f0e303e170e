// packages/infra/src/events.ts
import { EventEmitter } from 'node:events';

/**
 * Event map: event name → listener signature
 *
 * ```typescript
 * interface MyEvents {
 *   'server:online': (serverId: string) => void;
 * }
 * const emitter = createTypedEmitter<MyEvents>();
 * ```
 */
export type EventMap = Record<string, (...args: never[]) => void>;

/** Type-safe EventEmitter facade */
export interface TypedEmitter<T extends { [K in keyof T]: (...args: never[]) => void }> {
  on<K extends keyof T & string>(event: K, listener: T[K]): this;
  off<K extends keyof T & string>(event: K, listener: T[K]): this;
  once<K extends keyof T & string>(event: K, listener: T[K]): this;
  emit<K extends keyof T & string>(event: K, ...args: Parameters<T[K]>): boolean;
  removeAllListeners<K extends keyof T & string>(event?: K): this;
  listenerCount<K extends keyof T & string>(event: K): number;
}

export function createTypedEmitter<
  T extends { [K in keyof T]: (...args: never[]) => void },
>(): TypedEmitter<T> {
  return new EventEmitter() as unknown as TypedEmitter<T>;
}

/** Process-wide telemetry events */
export interface BlockBridgeEventMap {
  'system:ready': () => void;
  'system:shutdown': (reason: string) => void;
  'system:unhandledRejection': (level: string, reason: unknown) => void;
  'config:change': (changedPaths: string[]) => void;

  // ── gateway ──
  'gateway:start': (port: number) => void;
  'gateway:stop': () => void;
  'gateway:ws:connect': (serverId: string, transportId: string) => void;
  'gateway:ws:disconnect': (serverId: string, code: number) => void;
  'gateway:auth:failure': (remoteAddress: string, reason: string) => void;
  'gateway:auth:rate_limit': (remoteAddress: string, failures: number) => void;
  'gateway:rpc:request': (method: string, requestId: string) => void;
  'gateway:rpc:error': (method: string, code: number) => void;

  // ── sessions ──
  'session:state': (serverId: string, from: string, to: string) => void;
  'session:queue:drop': (serverId: string, droppedTotal: number) => void;
  'session:message:malformed': (serverId: string, reason: string) => void;
}

let globalBus: TypedEmitter<BlockBridgeEventMap> | undefined;

export function getEventBus(): TypedEmitter<BlockBridgeEventMap> {
  if (!globalBus) {
    globalBus = createTypedEmitter<BlockBridgeEventMap>();
  }
  return globalBus;
}

/** Reset the bus between tests */
export function resetEventBus(): void {
  globalBus?.removeAllListeners();
  globalBus = undefined;
}
