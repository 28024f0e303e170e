// packages/server/src/gateway/rpc/types.ts
import type { z } from 'zod/v4';

export type { RpcRequest, RpcResponse, RpcError, RpcMethod } from '@blockbridge/types';
export { RPC_ERROR_CODES } from '@blockbridge/types';

// === Auth ===

/** none: public methods only. api_key: a configured control-plane key. */
export type AuthLevel = 'none' | 'api_key';

export type Permission = 'servers:read' | 'servers:control' | 'binding:manage' | 'command:execute';

export interface AuthInfo {
  readonly level: AuthLevel;
  /** First 8 hex chars of the key digest; never the key itself */
  readonly clientId?: string;
  readonly permissions: readonly Permission[];
}

export type AuthResult =
  | { readonly ok: true; readonly info: AuthInfo }
  | { readonly ok: false; readonly error: string; readonly code: number };

// === JSON-RPC ===

export interface RpcMethodHandler<TParams = unknown, TResult = unknown> {
  readonly method: string;
  readonly description: string;
  readonly authLevel: AuthLevel;
  /** Checked after authLevel; absent = any authenticated caller */
  readonly permission?: Permission;
  readonly schema: z.ZodType<TParams>;
  execute(params: TParams, ctx: RpcContext): Promise<TResult>;
}

export interface RpcContext {
  readonly requestId: string | number;
  readonly auth: AuthInfo;
  readonly remoteAddress: string;
}
