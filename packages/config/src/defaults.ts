// packages/config/src/defaults.ts
import type { BlockBridgeConfig, ResolvedConfig } from '@blockbridge/types';

/**
 * Immutable defaults.
 *
 * Not expressed as zod .default(): applying them is its own pipeline step.
 */
const DEFAULTS: Readonly<ResolvedConfig> = Object.freeze<ResolvedConfig>({
  gateway: {
    host: '0.0.0.0',
    port: 8765,
    path: '/mc',
    maxConnections: 64,
    maxPayloadBytes: 1024 * 1024,
    handshakeTimeoutMs: 10_000,
    duplicatePolicy: 'supersede',
    cors: { origins: [], maxAge: 600 },
  },
  servers: {},
  whitelist: { serverIds: [], tokens: [] },
  session: {
    heartbeatIntervalMs: 30_000,
    heartbeatTimeoutMs: 10_000,
    queueCapacity: 100,
    requestTimeoutMs: 10_000,
    reconnect: {
      minDelayMs: 1_000,
      maxDelayMs: 30_000,
      maxAttempts: 0,
      jitter: true,
      giveUpAfterMs: 600_000, // 10 min
      removeOnGiveUp: false,
    },
  },
  binding: {
    ttlMs: 300_000, // 5 min
    codeLength: 6,
    sweepIntervalMs: 30_000,
    retentionMs: 60_000,
    ackGraceMs: 120_000,
  },
  status: {
    queryTimeoutMs: 10_000,
    pollIntervalMs: 300_000,
  },
  control: {
    apiKeys: [],
    rateLimit: { maxAttempts: 5, windowMs: 60_000 },
  },
  commands: {
    adminRoles: ['admin'],
  },
  logging: {
    level: 'info',
    json: false,
    redactSensitive: true,
    file: { enabled: false, maxSizeMb: 10, maxFiles: 5 },
  },
});

/** Lay user settings over the defaults, section by section (user wins, arrays replace) */
export function applyDefaults(user: BlockBridgeConfig): ResolvedConfig {
  const d = DEFAULTS;
  return {
    gateway: {
      ...d.gateway,
      ...user.gateway,
      cors: { ...d.gateway.cors, ...user.gateway?.cors },
    },
    servers: { ...user.servers },
    whitelist: { ...d.whitelist, ...user.whitelist },
    session: {
      ...d.session,
      ...user.session,
      reconnect: { ...d.session.reconnect, ...user.session?.reconnect },
    },
    binding: { ...d.binding, ...user.binding },
    status: { ...d.status, ...user.status },
    control: {
      apiKeys: user.control?.apiKeys ?? d.control.apiKeys,
      rateLimit: { ...d.control.rateLimit, ...user.control?.rateLimit },
    },
    commands: { ...d.commands, ...user.commands },
    logging: {
      ...d.logging,
      ...user.logging,
      file: { ...d.logging.file, ...user.logging?.file },
    },
  };
}

/** Read-only view of the defaults */
export function getDefaults(): Readonly<ResolvedConfig> {
  return DEFAULTS;
}
