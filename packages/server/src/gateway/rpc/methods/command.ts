// packages/server/src/gateway/rpc/methods/command.ts
import { z } from 'zod/v4';
import { dispatchCommand } from '../../../commands/built-in.js';
import type { CommandResult } from '../../../commands/registry.js';
import type { GatewayContext } from '../../context.js';
import type { RpcMethodHandler } from '../types.js';

const executeSchema = z.object({
  /** Command line without the chat prefix, e.g. "status --server Survival" */
  line: z.string(),
  platform: z.string().min(1),
  accountId: z.string().min(1),
  senderName: z.string().min(1).optional(),
  roles: z.array(z.string()).default([]),
});

/** Entry point for chat-platform adapters: one parsed chat command in, reply text out */
export function registerCommandMethods(ctx: GatewayContext): void {
  const execute: RpcMethodHandler<z.infer<typeof executeSchema>, CommandResult> = {
    method: 'command.execute',
    description: 'Run a chat command on behalf of a platform user',
    authLevel: 'api_key',
    permission: 'command:execute',
    schema: executeSchema,
    async execute({ line, platform, accountId, senderName, roles }) {
      return dispatchCommand(
        ctx.commands,
        line,
        { platform, accountId, senderName: senderName ?? accountId, roles },
        ctx.logger,
      );
    },
  };

  ctx.rpc.register(execute);
}
