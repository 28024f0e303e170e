// packages/server/src/gateway/rpc/methods/system.ts
import { z } from 'zod/v4';
import type { GatewayContext } from '../../context.js';
import type { RpcMethodHandler } from '../types.js';

const emptySchema = z.object({});
type EmptyParams = z.infer<typeof emptySchema>;

export const GATEWAY_NAME = 'blockbridge-gateway';
export const GATEWAY_VERSION = '0.1.0';

export interface HealthReport {
  status: 'ok' | 'degraded';
  uptime: number;
  servers: { total: number; connected: number };
}

/** `degraded` while any configured server lacks a CONNECTED session */
export function healthReport(ctx: GatewayContext): HealthReport {
  const total = ctx.sessions.knownServers().length;
  const connected = ctx.sessions.connectedCount;
  return {
    status: connected === total ? 'ok' : 'degraded',
    uptime: (Date.now() - ctx.startedAt) / 1000,
    servers: { total, connected },
  };
}

export function registerSystemMethods(ctx: GatewayContext): void {
  // -- system.health --
  const health: RpcMethodHandler<EmptyParams, HealthReport> = {
    method: 'system.health',
    description: 'Gateway health and connected server count',
    authLevel: 'none',
    schema: emptySchema,
    async execute() {
      return healthReport(ctx);
    },
  };

  // -- system.info --
  const info: RpcMethodHandler<EmptyParams, { name: string; version: string; methods: string[] }> = {
    method: 'system.info',
    description: 'Gateway name, version and RPC methods',
    authLevel: 'none',
    schema: emptySchema,
    async execute() {
      return { name: GATEWAY_NAME, version: GATEWAY_VERSION, methods: ctx.rpc.list() };
    },
  };

  // -- system.ping --
  const ping: RpcMethodHandler<EmptyParams, { pong: true; timestamp: number }> = {
    method: 'system.ping',
    description: 'Connectivity check',
    authLevel: 'none',
    schema: emptySchema,
    async execute() {
      return { pong: true, timestamp: Date.now() };
    },
  };

  ctx.rpc.register(health);
  ctx.rpc.register(info);
  ctx.rpc.register(ping);
}
