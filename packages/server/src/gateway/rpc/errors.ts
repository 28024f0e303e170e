// packages/server/src/gateway/rpc/errors.ts
import { BlockBridgeError } from '@blockbridge/infra';
import type { RpcResponse } from '@blockbridge/types';
import { RPC_ERROR_CODES } from '@blockbridge/types';

/**
 * JSON-RPC error codes
 *
 * Standard range -32700..-32600, auth -32001..-32003,
 * gateway outcomes -32010..-32020 (see RPC_ERROR_CODES).
 */
export const RpcErrors = RPC_ERROR_CODES;

export type RpcErrorCode = (typeof RpcErrors)[keyof typeof RpcErrors];

export function createError(
  id: string | number | null,
  code: RpcErrorCode,
  message: string,
  data?: unknown,
): RpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: { code, message, ...(data !== undefined && { data }) },
  };
}

/** Map a core result error onto its RPC code */
export function errorCodeFor(error: string): RpcErrorCode {
  switch (error) {
    case 'SERVER_NOT_FOUND':
      return RpcErrors.SERVER_NOT_FOUND;
    case 'SERVER_NOT_CONNECTED':
      return RpcErrors.SERVER_NOT_CONNECTED;
    case 'TIMEOUT':
      return RpcErrors.TIMEOUT;
    case 'CODE_NOT_FOUND':
    case 'CODE_EXPIRED':
    case 'ALREADY_CONFIRMED':
    case 'CODE_AMBIGUOUS':
      return RpcErrors.BINDING_FAILED;
    default:
      return RpcErrors.INTERNAL_ERROR;
  }
}

/** Thrown by method handlers; the dispatcher turns it into an error response */
export class RpcMethodError extends BlockBridgeError {
  readonly rpcCode: RpcErrorCode;
  readonly data?: unknown;

  constructor(rpcCode: RpcErrorCode, message: string, data?: unknown) {
    super(message, 'RPC_METHOD_ERROR', { statusCode: 400 });
    this.name = 'RpcMethodError';
    this.rpcCode = rpcCode;
    this.data = data;
  }
}

/** RpcMethodError for a core result error, with the error name as `data.error` */
export function rpcFailure(error: string, message: string = error): RpcMethodError {
  return new RpcMethodError(errorCodeFor(error), message, { error });
}
