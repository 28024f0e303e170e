// packages/server/src/gateway/rpc/methods/binding.ts
import type { BindingRequest, BoundAck } from '@blockbridge/types';
import { z } from 'zod/v4';
import type { GatewayContext } from '../../context.js';
import { rpcFailure } from '../errors.js';
import type { RpcMethodHandler } from '../types.js';

const confirmSchema = z.object({
  code: z.string().trim().min(1),
  platform: z.string().min(1),
  accountId: z.string().min(1),
  serverId: z.string().min(1).optional(),
});

const cancelSchema = z.object({
  serverId: z.string().min(1),
  code: z.string().trim().min(1),
});

const listSchema = z.object({ serverId: z.string().min(1).optional() });

export function registerBindingMethods(ctx: GatewayContext): void {
  // -- binding.confirm --
  const confirm: RpcMethodHandler<z.infer<typeof confirmSchema>, BoundAck> = {
    method: 'binding.confirm',
    description: 'Confirm a binding code for a chat-platform account',
    authLevel: 'api_key',
    permission: 'binding:manage',
    schema: confirmSchema,
    async execute({ code, platform, accountId, serverId }) {
      const result = ctx.binding.confirm(code, platform, accountId, serverId);
      if (!result.ok) {
        throw rpcFailure(result.error, `Binding confirmation failed: ${result.error}`);
      }
      return result.ack;
    },
  };

  // -- binding.cancel --
  const cancel: RpcMethodHandler<z.infer<typeof cancelSchema>, BindingRequest> = {
    method: 'binding.cancel',
    description: 'Cancel a pending binding code',
    authLevel: 'api_key',
    permission: 'binding:manage',
    schema: cancelSchema,
    async execute({ serverId, code }) {
      const result = ctx.binding.cancel(serverId, code);
      if (!result.ok) {
        throw rpcFailure(result.error, `Binding cancellation failed: ${result.error}`);
      }
      return result.request;
    },
  };

  // -- binding.list --
  const list: RpcMethodHandler<z.infer<typeof listSchema>, { requests: BindingRequest[] }> = {
    method: 'binding.list',
    description: 'Binding requests still tracked, optionally for one server',
    authLevel: 'api_key',
    permission: 'binding:manage',
    schema: listSchema,
    async execute({ serverId }) {
      return { requests: ctx.binding.list(serverId) };
    },
  };

  ctx.rpc.register(confirm);
  ctx.rpc.register(cancel);
  ctx.rpc.register(list);
}
