// packages/server/src/gateway/rpc/index.test.ts
import { getEventBus, resetEventBus } from '@blockbridge/infra';
import type { RpcResponse } from '@blockbridge/types';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod/v4';
import { createTestLogger } from '../../../test/helpers.js';
import { RpcErrors, rpcFailure } from './errors.js';
import { RpcMethodRegistry, hasRequiredAuth, type DispatchContext } from './index.js';
import type { RpcMethodHandler } from './types.js';

const PUBLIC: DispatchContext = {
  auth: { level: 'none', permissions: [] },
  remoteAddress: '127.0.0.1',
};

const READER: DispatchContext = {
  auth: { level: 'api_key', clientId: 'abcd1234', permissions: ['servers:read'] },
  remoteAddress: '127.0.0.1',
};

const echoSchema = z.object({ text: z.string() });

const echo: RpcMethodHandler<z.infer<typeof echoSchema>, { text: string }> = {
  method: 'test.echo',
  description: 'Echo',
  authLevel: 'none',
  schema: echoSchema,
  async execute({ text }) {
    return { text };
  },
};

function setup() {
  const logger = createTestLogger();
  const rpc = new RpcMethodRegistry(logger);
  rpc.register(echo);
  return { rpc, logger };
}

async function single(rpc: RpcMethodRegistry, body: unknown, ctx: DispatchContext = PUBLIC): Promise<RpcResponse> {
  const response = await rpc.dispatch(body, ctx);
  if (Array.isArray(response)) {
    throw new Error('expected a single response');
  }
  return response;
}

describe('RpcMethodRegistry', () => {
  beforeEach(() => {
    resetEventBus();
  });

  describe('register', () => {
    it('lists registered methods', () => {
      const { rpc } = setup();
      expect(rpc.has('test.echo')).toBe(true);
      expect(rpc.list()).toEqual(['test.echo']);
    });

    it('throws on duplicate registration', () => {
      const { rpc } = setup();
      expect(() => rpc.register(echo)).toThrow('RPC method already registered: test.echo');
    });

    it('keeps tables separate per instance', () => {
      setup();
      const other = new RpcMethodRegistry(createTestLogger());
      expect(other.has('test.echo')).toBe(false);
    });
  });

  describe('dispatch: single request', () => {
    it('returns the handler result', async () => {
      const { rpc } = setup();
      const response = await single(rpc, { jsonrpc: '2.0', id: 1, method: 'test.echo', params: { text: 'hi' } });
      expect(response).toEqual({ jsonrpc: '2.0', id: 1, result: { text: 'hi' } });
    });

    it('passes the request id to the handler', async () => {
      const { rpc } = setup();
      rpc.register({
        method: 'test.id',
        description: 'Request id',
        authLevel: 'none',
        schema: z.object({}),
        async execute(_params, ctx) {
          return ctx.requestId;
        },
      });

      const response = await single(rpc, { jsonrpc: '2.0', id: 'req-9', method: 'test.id' });
      expect(response.result).toBe('req-9');
    });

    it('keeps the id on an invalid envelope', async () => {
      const { rpc } = setup();
      const response = await single(rpc, { jsonrpc: '1.0', id: 7, method: 'test.echo' });
      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 7,
        error: { code: RpcErrors.INVALID_REQUEST, message: 'Invalid JSON-RPC request' },
      });
    });

    it('answers a non-object body with a null id', async () => {
      const { rpc } = setup();
      const response = await single(rpc, 'hello');
      expect(response.id).toBeNull();
      expect(response.error?.code).toBe(RpcErrors.INVALID_REQUEST);
    });

    it('returns METHOD_NOT_FOUND for an unknown method', async () => {
      const { rpc } = setup();
      const response = await single(rpc, { jsonrpc: '2.0', id: 2, method: 'nope' });
      expect(response.error).toEqual({ code: RpcErrors.METHOD_NOT_FOUND, message: 'Unknown method: nope' });
    });

    it('returns UNAUTHORIZED when the caller has no key', async () => {
      const { rpc } = setup();
      rpc.register({ ...echo, method: 'test.keyed', authLevel: 'api_key' });

      const response = await single(rpc, { jsonrpc: '2.0', id: 3, method: 'test.keyed', params: { text: 'x' } });
      expect(response.error).toEqual({ code: RpcErrors.UNAUTHORIZED, message: 'Authentication required' });
    });

    it('returns FORBIDDEN when the permission is missing', async () => {
      const { rpc } = setup();
      rpc.register({ ...echo, method: 'test.control', authLevel: 'api_key', permission: 'servers:control' });

      const response = await single(
        rpc,
        { jsonrpc: '2.0', id: 4, method: 'test.control', params: { text: 'x' } },
        READER,
      );
      expect(response.error).toEqual({
        code: RpcErrors.FORBIDDEN,
        message: 'Missing permission: servers:control',
      });
    });

    it('runs a permitted method for a keyed caller', async () => {
      const { rpc } = setup();
      rpc.register({ ...echo, method: 'test.read', authLevel: 'api_key', permission: 'servers:read' });

      const response = await single(
        rpc,
        { jsonrpc: '2.0', id: 5, method: 'test.read', params: { text: 'ok' } },
        READER,
      );
      expect(response.result).toEqual({ text: 'ok' });
    });

    it('names the failing field in INVALID_PARAMS', async () => {
      const { rpc } = setup();
      const response = await single(rpc, { jsonrpc: '2.0', id: 6, method: 'test.echo', params: { text: 5 } });
      expect(response.error?.code).toBe(RpcErrors.INVALID_PARAMS);
      expect(response.error?.message.startsWith('Invalid params: text: ')).toBe(true);
    });

    it('reports a non-object params value at the root', async () => {
      const { rpc } = setup();
      const response = await single(rpc, { jsonrpc: '2.0', id: 6, method: 'test.echo', params: 'text' });
      expect(response.error?.message.startsWith('Invalid params: (root): ')).toBe(true);
    });

    it('maps an RpcMethodError to its code and data', async () => {
      const { rpc } = setup();
      rpc.register({
        method: 'test.offline',
        description: 'Always offline',
        authLevel: 'none',
        schema: z.object({}),
        async execute() {
          throw rpcFailure('SERVER_NOT_CONNECTED', 'Survival is offline');
        },
      });

      const response = await single(rpc, { jsonrpc: '2.0', id: 8, method: 'test.offline' });
      expect(response.error).toEqual({
        code: RpcErrors.SERVER_NOT_CONNECTED,
        message: 'Survival is offline',
        data: { error: 'SERVER_NOT_CONNECTED' },
      });
    });

    it('turns any other throw into INTERNAL_ERROR and logs it', async () => {
      const { rpc, logger } = setup();
      rpc.register({
        method: 'test.boom',
        description: 'Throws',
        authLevel: 'none',
        schema: z.object({}),
        async execute() {
          throw new Error('boom');
        },
      });

      const response = await single(rpc, { jsonrpc: '2.0', id: 9, method: 'test.boom' });
      expect(response.error).toEqual({ code: RpcErrors.INTERNAL_ERROR, message: 'boom' });
      expect(logger.error).toHaveBeenCalledWith('RPC test.boom failed: boom');
    });

    it('emits request and error events', async () => {
      const { rpc } = setup();
      const onRequest = vi.fn();
      const onError = vi.fn();
      getEventBus().on('gateway:rpc:request', onRequest);
      getEventBus().on('gateway:rpc:error', onError);
      rpc.register({ ...echo, method: 'test.keyed', authLevel: 'api_key' });

      await single(rpc, { jsonrpc: '2.0', id: 10, method: 'test.keyed', params: { text: 'x' } });

      expect(onRequest).toHaveBeenCalledWith('test.keyed', '10');
      expect(onError).toHaveBeenCalledWith('test.keyed', RpcErrors.UNAUTHORIZED);
    });
  });

  describe('dispatch: batch', () => {
    it('answers every request in order', async () => {
      const { rpc } = setup();
      const response = await rpc.dispatch(
        [
          { jsonrpc: '2.0', id: 1, method: 'test.echo', params: { text: 'a' } },
          { jsonrpc: '2.0', id: 2, method: 'missing' },
        ],
        PUBLIC,
      );

      expect(Array.isArray(response)).toBe(true);
      if (Array.isArray(response)) {
        expect(response).toHaveLength(2);
        expect(response[0]).toEqual({ jsonrpc: '2.0', id: 1, result: { text: 'a' } });
        expect(response[1]?.error?.code).toBe(RpcErrors.METHOD_NOT_FOUND);
      }
    });

    it('rejects an empty batch', async () => {
      const { rpc } = setup();
      const response = await single(rpc, []);
      expect(response).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: RpcErrors.INVALID_REQUEST, message: 'Empty batch' },
      });
    });

    it('rejects a batch over the limit', async () => {
      const { rpc } = setup();
      const batch = Array.from({ length: 11 }, (_, i) => ({ jsonrpc: '2.0', id: i, method: 'test.echo' }));
      const response = await single(rpc, batch);
      expect(response.error?.message).toBe('Batch size 11 exceeds limit 10');
    });
  });

  describe('hasRequiredAuth', () => {
    it('lets anyone reach public methods', () => {
      expect(hasRequiredAuth(PUBLIC.auth, 'none')).toBe(true);
      expect(hasRequiredAuth(READER.auth, 'none')).toBe(true);
    });

    it('requires a key for api_key methods', () => {
      expect(hasRequiredAuth(PUBLIC.auth, 'api_key')).toBe(false);
      expect(hasRequiredAuth(READER.auth, 'api_key')).toBe(true);
    });
  });
});
