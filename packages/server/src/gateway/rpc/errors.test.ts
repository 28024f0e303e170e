// packages/server/src/gateway/rpc/errors.test.ts
import { describe, it, expect } from 'vitest';
import { RpcErrors, RpcMethodError, createError, errorCodeFor, rpcFailure } from './errors.js';

describe('RpcErrors', () => {
  it('keeps gateway outcome codes in the -32010 ~ -32099 range', () => {
    const gatewayOnly = [
      RpcErrors.SERVER_NOT_FOUND,
      RpcErrors.SERVER_NOT_CONNECTED,
      RpcErrors.TIMEOUT,
      RpcErrors.BINDING_FAILED,
    ];
    for (const code of gatewayOnly) {
      expect(code).toBeLessThanOrEqual(-32010);
      expect(code).toBeGreaterThanOrEqual(-32099);
    }
  });

  it('has no duplicate codes', () => {
    const codes = Object.values(RpcErrors);
    expect(new Set(codes).size).toBe(codes.length);
  });
});

describe('createError', () => {
  it('creates JSON-RPC 2.0 error response with id', () => {
    const result = createError(1, RpcErrors.PARSE_ERROR, 'bad json');
    expect(result).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: { code: -32700, message: 'bad json' },
    });
  });

  it('uses null id when id is null', () => {
    const result = createError(null, RpcErrors.INTERNAL_ERROR, 'fail');
    expect(result.id).toBeNull();
  });

  it('includes optional data field', () => {
    const result = createError(1, RpcErrors.INVALID_PARAMS, 'bad', { field: 'x' });
    expect(result.error?.data).toEqual({ field: 'x' });
  });

  it('omits data field when undefined', () => {
    const result = createError(1, RpcErrors.INTERNAL_ERROR, 'fail');
    expect(result.error).not.toHaveProperty('data');
  });
});

describe('errorCodeFor', () => {
  it('maps routing outcomes', () => {
    expect(errorCodeFor('SERVER_NOT_FOUND')).toBe(-32010);
    expect(errorCodeFor('SERVER_NOT_CONNECTED')).toBe(-32011);
    expect(errorCodeFor('TIMEOUT')).toBe(-32012);
  });

  it('folds binding outcomes into one code', () => {
    expect(errorCodeFor('CODE_EXPIRED')).toBe(-32020);
    expect(errorCodeFor('ALREADY_CONFIRMED')).toBe(-32020);
  });

  it('falls back to internal error', () => {
    expect(errorCodeFor('SOMETHING_ELSE')).toBe(-32603);
  });
});

describe('rpcFailure', () => {
  it('carries the core error name as data', () => {
    const err = rpcFailure('CODE_EXPIRED', 'Binding code 482913 has expired');
    expect(err).toBeInstanceOf(RpcMethodError);
    expect(err.rpcCode).toBe(-32020);
    expect(err.message).toBe('Binding code 482913 has expired');
    expect(err.data).toEqual({ error: 'CODE_EXPIRED' });
  });

  it('defaults the message to the error name', () => {
    expect(rpcFailure('SERVER_NOT_FOUND').message).toBe('SERVER_NOT_FOUND');
  });
});
