import type {
  BlockBridgeConfig,
  ConfigValidationIssue,
  ResolvedConfig,
  ServerEntryConfig,
} from '@blockbridge/types';
import { describe, it, expect, expectTypeOf } from 'vitest';

describe('BlockBridgeConfig', () => {
  it('accepts an empty object (every field optional)', () => {
    const config: BlockBridgeConfig = {};
    expectTypeOf(config).toMatchTypeOf<BlockBridgeConfig>();
  });

  it('takes servers keyed by id', () => {
    const config: BlockBridgeConfig = {
      gateway: { port: 8765, path: '/mc' },
      servers: {
        Survival: { token: 'test-secret', forward: { targets: 'kook:group:1001' } },
        Creative: { token: 'test-secret', mode: 'dial', url: 'ws://127.0.0.1:25580/gateway' },
      },
    };
    expectTypeOf(config).toMatchTypeOf<BlockBridgeConfig>();
  });

  it('requires a token per server', () => {
    expectTypeOf<ServerEntryConfig['token']>().toEqualTypeOf<string>();
  });
});

describe('ResolvedConfig', () => {
  it('has every setting present', () => {
    expectTypeOf<ResolvedConfig['gateway']['port']>().toEqualTypeOf<number>();
    expectTypeOf<ResolvedConfig['session']['reconnect']['removeOnGiveUp']>().toEqualTypeOf<boolean>();
    expectTypeOf<ResolvedConfig['gateway']['duplicatePolicy']>().toEqualTypeOf<'supersede' | 'reject'>();
  });
});

describe('ConfigValidationIssue', () => {
  it('is an error or a warning', () => {
    const issue: ConfigValidationIssue = {
      path: 'gateway.port',
      message: 'Invalid port',
      severity: 'error',
    };
    expect(['error', 'warning']).toContain(issue.severity);
  });
});
