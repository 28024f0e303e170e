// packages/server/src/gateway/rpc/index.ts
import { getEventBus, type BlockBridgeLogger } from '@blockbridge/infra';
import type { RpcResponse } from '@blockbridge/types';
import { z } from 'zod/v4';
import { RpcErrors, RpcMethodError, createError } from './errors.js';
import type { AuthInfo, AuthLevel, RpcContext, RpcMethodHandler } from './types.js';

export const MAX_BATCH_SIZE = 10;

const requestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

const idSchema = z.object({ id: z.union([z.string(), z.number()]) });

export type DispatchContext = Omit<RpcContext, 'requestId'>;

/**
 * JSON-RPC 2.0 method table.
 * One per gateway instance so parallel gateways (tests included) never share methods.
 */
export class RpcMethodRegistry {
  private readonly methods = new Map<string, RpcMethodHandler>();

  constructor(private readonly logger: BlockBridgeLogger) {}

  register<P, R>(handler: RpcMethodHandler<P, R>): void {
    if (this.methods.has(handler.method)) {
      throw new Error(`RPC method already registered: ${handler.method}`);
    }
    this.methods.set(handler.method, handler);
  }

  has(method: string): boolean {
    return this.methods.has(method);
  }

  /** Registered method names (system.info, GET /info) */
  list(): string[] {
    return [...this.methods.keys()];
  }

  /** Dispatch a parsed request body: one request or a batch */
  async dispatch(body: unknown, ctx: DispatchContext): Promise<RpcResponse | RpcResponse[]> {
    if (!Array.isArray(body)) {
      return this.handleSingle(body, ctx);
    }
    if (body.length === 0) {
      return createError(null, RpcErrors.INVALID_REQUEST, 'Empty batch');
    }
    if (body.length > MAX_BATCH_SIZE) {
      return createError(
        null,
        RpcErrors.INVALID_REQUEST,
        `Batch size ${body.length} exceeds limit ${MAX_BATCH_SIZE}`,
      );
    }
    return Promise.all(body.map((item: unknown) => this.handleSingle(item, ctx)));
  }

  private async handleSingle(raw: unknown, ctx: DispatchContext): Promise<RpcResponse> {
    // 1. envelope
    const envelope = requestSchema.safeParse(raw);
    if (!envelope.success) {
      const id = idSchema.safeParse(raw);
      return createError(id.success ? id.data.id : null, RpcErrors.INVALID_REQUEST, 'Invalid JSON-RPC request');
    }
    const request = envelope.data;

    // 2. method lookup
    const handler = this.methods.get(request.method);
    if (!handler) {
      return createError(request.id, RpcErrors.METHOD_NOT_FOUND, `Unknown method: ${request.method}`);
    }

    getEventBus().emit('gateway:rpc:request', request.method, String(request.id));

    // 3. auth level, then permission
    if (!hasRequiredAuth(ctx.auth, handler.authLevel)) {
      getEventBus().emit('gateway:rpc:error', request.method, RpcErrors.UNAUTHORIZED);
      return createError(request.id, RpcErrors.UNAUTHORIZED, 'Authentication required');
    }
    if (handler.permission && !ctx.auth.permissions.includes(handler.permission)) {
      getEventBus().emit('gateway:rpc:error', request.method, RpcErrors.FORBIDDEN);
      return createError(request.id, RpcErrors.FORBIDDEN, `Missing permission: ${handler.permission}`);
    }

    // 4. params
    const params = handler.schema.safeParse(request.params ?? {});
    if (!params.success) {
      getEventBus().emit('gateway:rpc:error', request.method, RpcErrors.INVALID_PARAMS);
      const detail = params.error.issues
        .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return createError(request.id, RpcErrors.INVALID_PARAMS, `Invalid params: ${detail}`);
    }

    // 5. execute
    try {
      const result = await handler.execute(params.data, { ...ctx, requestId: request.id });
      return { jsonrpc: '2.0', id: request.id, result };
    } catch (error) {
      if (error instanceof RpcMethodError) {
        getEventBus().emit('gateway:rpc:error', request.method, error.rpcCode);
        return createError(request.id, error.rpcCode, error.message, error.data);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`RPC ${request.method} failed: ${message}`);
      getEventBus().emit('gateway:rpc:error', request.method, RpcErrors.INTERNAL_ERROR);
      return createError(request.id, RpcErrors.INTERNAL_ERROR, message);
    }
  }
}

/** Whether `auth` meets the handler's required level */
export function hasRequiredAuth(auth: AuthInfo, required: AuthLevel): boolean {
  const levels: AuthLevel[] = ['none', 'api_key'];
  return levels.indexOf(auth.level) >= levels.indexOf(required);
}
