// packages/server/test/helpers.ts
import { applyDefaults } from '@blockbridge/config';
import type { BlockBridgeLogger } from '@blockbridge/infra';
import type {
  BindingNotification,
  BlockBridgeConfig,
  ForwardEvent,
  ForwardEventKind,
  ForwardTarget,
  Message,
  ResolvedConfig,
  ResolvedServer,
} from '@blockbridge/types';
import { vi } from 'vitest';
import { decode, encode } from '../src/gateway/protocol/codec.js';
import { createGatewayContext, type GatewayContext } from '../src/gateway/context.js';
import type { ChatPlatform } from '../src/gateway/forwarder.js';
import type { SessionDefaults } from '../src/gateway/registry.js';
import type { DispatchContext } from '../src/gateway/rpc/index.js';
import type { Transport } from '../src/gateway/session/transport.js';

/** Logger whose methods are spies; child() returns the same logger */
export function createTestLogger(): BlockBridgeLogger {
  const logger: BlockBridgeLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
    flush: async () => {},
  };
  return logger;
}

/** Heartbeat off, no jitter, unlimited retries */
export const TEST_SESSION_DEFAULTS: SessionDefaults = {
  heartbeatIntervalMs: 0,
  heartbeatTimeoutMs: 500,
  queueCapacity: 10,
  requestTimeoutMs: 1_000,
  handshakeTimeoutMs: 2_000,
  reconnect: {
    minDelayMs: 1_000,
    maxDelayMs: 8_000,
    maxAttempts: 0,
    jitter: false,
    giveUpAfterMs: 0,
  },
};

/**
 * Full configuration for gateway-level tests: loopback on port 0, heartbeat off,
 * one control key ("test-key-1") and the settings in `overrides` laid over the defaults.
 */
export function makeConfig(overrides: BlockBridgeConfig = {}): ResolvedConfig {
  return applyDefaults({
    ...overrides,
    gateway: { host: '127.0.0.1', port: 0, ...overrides.gateway },
    session: {
      heartbeatIntervalMs: 0,
      requestTimeoutMs: 1_000,
      ...overrides.session,
      reconnect: { jitter: false, giveUpAfterMs: 0, ...overrides.session?.reconnect },
    },
    status: { queryTimeoutMs: 1_000, pollIntervalMs: 0, ...overrides.status },
    control: { apiKeys: ['test-key-1'], ...overrides.control },
  });
}

export function makeServer(
  serverId: string,
  overrides: Partial<Omit<ResolvedServer, 'forward'>> & {
    targets?: ForwardTarget[];
    events?: ForwardEventKind[];
  } = {},
): ResolvedServer {
  const { targets = [], events = ['chat', 'player_event', 'server_status'], ...rest } = overrides;
  return {
    serverId,
    token: 'test-secret',
    mode: 'listen',
    forward: { targets, events: new Set(events) },
    ...rest,
  };
}

export function serverMap(...servers: ResolvedServer[]): Map<string, ResolvedServer> {
  return new Map(servers.map((server) => [server.serverId, server]));
}

/** ChatPlatform that records every call; `failFor` makes one target reject */
export class RecordingPlatform implements ChatPlatform {
  readonly deliveries: Array<{ target: ForwardTarget; event: ForwardEvent }> = [];
  readonly notifications: BindingNotification[] = [];
  failFor: string | undefined;

  async deliver(target: ForwardTarget, event: ForwardEvent): Promise<void> {
    if (target.sessionId === this.failFor) {
      throw new Error(`platform unavailable for ${target.sessionId}`);
    }
    this.deliveries.push({ target, event });
  }

  async notifyBinding(notification: BindingNotification): Promise<void> {
    this.notifications.push(notification);
  }
}

let transportSeq = 0;

/** In-process Transport; close events fire synchronously */
export class FakeTransport implements Transport {
  readonly id = `fake-${++transportSeq}`;
  readonly remoteAddress: string;
  isOpen = true;
  readonly sent: string[] = [];
  closedWith: { code: number; reason: string } | undefined;

  private readonly messageListeners: Array<(frame: string) => void> = [];
  private readonly closeListeners: Array<(code: number, reason: string) => void> = [];
  private readonly errorListeners: Array<(err: Error) => void> = [];

  constructor(remoteAddress = '127.0.0.1') {
    this.remoteAddress = remoteAddress;
  }

  send(frame: string): void {
    if (!this.isOpen) {
      throw new Error('Transport is closed');
    }
    this.sent.push(frame);
  }

  close(code: number, reason: string): void {
    if (!this.isOpen) {
      return;
    }
    this.isOpen = false;
    this.closedWith = { code, reason };
    for (const listener of this.closeListeners) {
      listener(code, reason);
    }
  }

  terminate(): void {
    this.close(1006, '');
  }

  onMessage(listener: (frame: string) => void): void {
    this.messageListeners.push(listener);
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.closeListeners.push(listener);
  }

  onError(listener: (err: Error) => void): void {
    this.errorListeners.push(listener);
  }

  // ─── test controls ───

  /** Deliver a frame as if the game server sent it */
  receive(message: Message | string): void {
    const frame = typeof message === 'string' ? message : encode(message);
    for (const listener of this.messageListeners) {
      listener(frame);
    }
  }

  /** Simulate the remote side closing */
  peerClose(code = 1006, reason = ''): void {
    this.close(code, reason);
  }

  fail(err: Error): void {
    for (const listener of this.errorListeners) {
      listener(err);
    }
  }

  /** Decoded frames written so far */
  messages(): Message[] {
    const out: Message[] = [];
    for (const frame of this.sent) {
      const decoded = decode(frame);
      if (decoded.ok) {
        out.push(decoded.message);
      }
    }
    return out;
  }

  /** Decoded frames of one type */
  messagesOf<T extends Message['type']>(type: T): Extract<Message, { type: T }>[] {
    return this.messages().filter((m): m is Extract<Message, { type: T }> => m.type === type);
  }

  lastMessage(): Message | undefined {
    return this.messages().at(-1);
  }
}

/** Caller holding a control key with every permission */
export const CONTROL_CALLER: DispatchContext = {
  auth: {
    level: 'api_key',
    clientId: 'test0001',
    permissions: ['servers:read', 'servers:control', 'binding:manage', 'command:execute'],
  },
  remoteAddress: '127.0.0.1',
};

export const PUBLIC_CALLER: DispatchContext = {
  auth: { level: 'none', permissions: [] },
  remoteAddress: '127.0.0.1',
};

/**
 * Gateway context over `makeConfig`, with one listen server "Survival" unless
 * `overrides.servers` says otherwise. `connect` attaches a FakeTransport with the right token.
 */
export function makeGateway(overrides: BlockBridgeConfig = {}) {
  const config = makeConfig({ servers: { Survival: { token: 'test-secret' } }, ...overrides });
  const platform = new RecordingPlatform();
  const logger = createTestLogger();
  const ctx: GatewayContext = createGatewayContext(config, { platform, logger });

  const connect = (serverId = 'Survival'): FakeTransport => {
    const transport = new FakeTransport();
    ctx.sessions.attach(serverId, transport, 'test-secret');
    return transport;
  };

  /** Dispatch one JSON-RPC request and return its single response */
  const call = async (method: string, params?: unknown, caller: DispatchContext = CONTROL_CALLER) => {
    const response = await ctx.rpc.dispatch({ jsonrpc: '2.0', id: 1, method, params }, caller);
    if (Array.isArray(response)) {
      throw new Error('expected a single response');
    }
    return response;
  };

  return { ctx, config, platform, logger, connect, call };
}
