// packages/config/test/zod-schema.test.ts
import { describe, it, expect } from 'vitest';
import { BlockBridgeConfigSchema } from '../src/zod-schema.js';

describe('BlockBridgeConfigSchema', () => {
  it('accepts an empty object', () => {
    expect(BlockBridgeConfigSchema.safeParse({}).success).toBe(true);
  });

  it('accepts a full config', () => {
    const config = {
      gateway: { host: '127.0.0.1', port: 8765, path: '/mc', duplicatePolicy: 'reject' },
      servers: {
        Survival: {
          token: 'test-secret',
          http: { baseUrl: 'http://127.0.0.1:8080' },
          forward: { targets: ['qq:group:1001'], events: ['chat'] },
        },
        Creative: { token: 'test-secret-2', mode: 'dial', url: 'ws://127.0.0.1:9000/bridge' },
      },
      whitelist: { serverIds: ['Lobby'], tokens: ['test-secret-3'] },
      session: { heartbeatIntervalMs: 15_000, reconnect: { maxAttempts: 3 } },
      binding: { ttlMs: 60_000, codeLength: 8 },
      status: { pollIntervalMs: 0 },
      control: { apiKeys: ['test-key'], rateLimit: { maxAttempts: 3 } },
      commands: { adminRoles: ['owner'], defaultServer: 'Survival' },
      logging: { level: 'debug', json: true, file: { enabled: true } },
    };
    expect(BlockBridgeConfigSchema.safeParse(config).success).toBe(true);
  });

  it('rejects unknown top-level keys', () => {
    expect(BlockBridgeConfigSchema.safeParse({ gatway: {} }).success).toBe(false);
  });

  it('rejects an out-of-range port', () => {
    expect(BlockBridgeConfigSchema.safeParse({ gateway: { port: 70000 } }).success).toBe(false);
  });

  it('requires url for dial mode', () => {
    const result = BlockBridgeConfigSchema.safeParse({
      servers: { Creative: { token: 'test-secret', mode: 'dial' } },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['servers', 'Creative', 'url']);
      expect(result.error.issues[0]?.message).toBe('url is required when mode is "dial"');
    }
  });

  it('rejects non-websocket urls', () => {
    const result = BlockBridgeConfigSchema.safeParse({
      servers: { Creative: { token: 'test-secret', mode: 'dial', url: 'http://example.test' } },
    });
    expect(result.success).toBe(false);
  });

  it('needs a non-blank auto-forward prefix', () => {
    const withPrefix = (prefix: string) =>
      BlockBridgeConfigSchema.safeParse({
        servers: { Survival: { token: 'test-secret', forward: { autoForward: { prefix, sessions: ['qq:group:1'] } } } },
      }).success;
    expect(withPrefix('#mc')).toBe(true);
    expect(withPrefix('   ')).toBe(false);
  });

  it('accepts forward targets as a newline block', () => {
    const result = BlockBridgeConfigSchema.safeParse({
      servers: { Survival: { token: 'test-secret', forward: { targets: 'qq:group:1\nqq:group:2' } } },
    });
    expect(result.success).toBe(true);
  });

  it('rejects an unknown forward event', () => {
    const result = BlockBridgeConfigSchema.safeParse({
      servers: { Survival: { token: 'test-secret', forward: { events: ['death'] } } },
    });
    expect(result.success).toBe(false);
  });
});
