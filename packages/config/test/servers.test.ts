// packages/config/test/servers.test.ts
import { describe, it, expect, vi } from 'vitest';
import { applyDefaults } from '../src/defaults.js';
import { formatForwardTarget, parseForwardTargets, resolveServers } from '../src/servers.js';

describe('parseForwardTargets', () => {
  it('parses a list', () => {
    const { targets, invalid } = parseForwardTargets(['qq:group:1001', 'discord:channel:42']);
    expect(targets).toEqual([
      { platform: 'qq', messageType: 'group', sessionId: '1001' },
      { platform: 'discord', messageType: 'channel', sessionId: '42' },
    ]);
    expect(invalid).toEqual([]);
  });

  it('parses a newline block and skips comments and blanks', () => {
    const { targets } = parseForwardTargets('# main group\nqq:group:1001\n\n  qq:private:7  \n');
    expect(targets.map(formatForwardTarget)).toEqual(['qq:group:1001', 'qq:private:7']);
  });

  it('keeps extra colons in the session id', () => {
    const { targets } = parseForwardTargets(['matrix:room:!abc:example.test']);
    expect(targets[0]?.sessionId).toBe('!abc:example.test');
  });

  it('drops duplicates', () => {
    const { targets } = parseForwardTargets(['qq:group:1', 'qq:group:1']);
    expect(targets).toHaveLength(1);
  });

  it('reports malformed lines', () => {
    const { targets, invalid } = parseForwardTargets(['qq:group', 'qq::1', 'qq:group:1']);
    expect(invalid).toEqual(['qq:group', 'qq::1']);
    expect(targets).toHaveLength(1);
  });

  it('accepts undefined', () => {
    expect(parseForwardTargets(undefined)).toEqual({ targets: [], invalid: [] });
  });
});

describe('resolveServers', () => {
  it('pairs whitelist ids with tokens', () => {
    const config = applyDefaults({ whitelist: { serverIds: ['Lobby', 'Skyblock'], tokens: ['t1', 't2'] } });
    const servers = resolveServers(config);
    expect([...servers.keys()]).toEqual(['Lobby', 'Skyblock']);
    expect(servers.get('Skyblock')?.token).toBe('t2');
    expect(servers.get('Lobby')?.mode).toBe('listen');
    expect([...(servers.get('Lobby')?.forward.events ?? [])]).toEqual([
      'chat',
      'player_event',
      'server_status',
    ]);
  });

  it('warns on mismatched whitelist lengths', () => {
    const warn = vi.fn();
    const config = applyDefaults({ whitelist: { serverIds: ['Lobby', 'Skyblock'], tokens: ['t1'] } });
    const servers = resolveServers(config, { warn });
    expect(servers.size).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('lets servers entries win over the whitelist', () => {
    const config = applyDefaults({
      whitelist: { serverIds: ['Survival'], tokens: ['old'] },
      servers: {
        Survival: {
          token: 'test-secret',
          http: { baseUrl: 'http://127.0.0.1:8080/' },
          forward: { targets: ['qq:group:1'], events: ['chat'] },
        },
      },
    });
    const survival = resolveServers(config).get('Survival');
    expect(survival?.token).toBe('test-secret');
    expect(survival?.http).toEqual({ baseUrl: 'http://127.0.0.1:8080', token: 'test-secret' });
    expect([...(survival?.forward.events ?? [])]).toEqual(['chat']);
    expect(survival?.forward.targets).toHaveLength(1);
  });

  it('logs malformed forward targets', () => {
    const warn = vi.fn();
    resolveServers(
      applyDefaults({ servers: { Survival: { token: 't', forward: { targets: ['bad'] } } } }),
      { warn },
    );
    expect(warn).toHaveBeenCalledWith('Ignoring malformed forward target for Survival: "bad"');
  });

  it('resolves the auto-forward rule and its session list', () => {
    const warn = vi.fn();
    const servers = resolveServers(
      applyDefaults({
        servers: {
          Survival: { token: 't', forward: { autoForward: { prefix: '#mc', sessions: 'kook:group:1001\nbad' } } },
          Creative: { token: 't' },
        },
      }),
      { warn },
    );

    expect(servers.get('Survival')?.forward.autoForward).toEqual({
      prefix: '#mc',
      sessions: [{ platform: 'kook', messageType: 'group', sessionId: '1001' }],
    });
    expect(servers.get('Creative')?.forward.autoForward).toBeUndefined();
    expect(warn).toHaveBeenCalledWith('Ignoring malformed auto-forward session for Survival: "bad"');
  });
});
