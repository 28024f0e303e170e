// packages/config/src/zod-schema.ts
import { LOG_LEVELS, type BlockBridgeConfig } from '@blockbridge/types';
import { z } from 'zod/v4';

const LogLevelSchema = z.enum(LOG_LEVELS);

const ForwardEventSchema = z.enum(['chat', 'player_event', 'server_status']);

const GatewaySchema = z.strictObject({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  path: z.string().startsWith('/'),
  maxConnections: z.number().int().min(1),
  maxPayloadBytes: z.number().int().min(1024),
  handshakeTimeoutMs: z.number().int().min(100),
  duplicatePolicy: z.enum(['supersede', 'reject']),
  cors: z
    .strictObject({
      origins: z.array(z.string()).optional(),
      maxAge: z.number().int().min(0).optional(),
    })
    .optional(),
});

/** A single server entry; dial mode needs a ws:// or wss:// url */
const ServerEntrySchema = z
  .strictObject({
    token: z.string().min(1),
    mode: z.enum(['listen', 'dial']).optional(),
    url: z
      .string()
      .regex(/^wss?:\/\//, 'must be a ws:// or wss:// url')
      .optional(),
    http: z
      .strictObject({
        baseUrl: z.url(),
        token: z.string().min(1).optional(),
      })
      .optional(),
    forward: z
      .strictObject({
        targets: z.union([z.array(z.string()), z.string()]).optional(),
        events: z.array(ForwardEventSchema).optional(),
        autoForward: z
          .strictObject({
            prefix: z.string().trim().min(1),
            sessions: z.union([z.array(z.string()), z.string()]).optional(),
          })
          .optional(),
      })
      .optional(),
  })
  .refine((entry) => entry.mode !== 'dial' || entry.url !== undefined, {
    message: 'url is required when mode is "dial"',
    path: ['url'],
  });

const ReconnectSchema = z.strictObject({
  minDelayMs: z.number().int().min(0),
  maxDelayMs: z.number().int().min(0),
  maxAttempts: z.number().int().min(0),
  jitter: z.boolean(),
  giveUpAfterMs: z.number().int().min(0),
  removeOnGiveUp: z.boolean(),
});

const SessionSchema = z.strictObject({
  heartbeatIntervalMs: z.number().int().min(0),
  heartbeatTimeoutMs: z.number().int().min(1),
  queueCapacity: z.number().int().min(1),
  requestTimeoutMs: z.number().int().min(1),
  reconnect: ReconnectSchema.partial().optional(),
});

const BindingSchema = z.strictObject({
  ttlMs: z.number().int().min(1000),
  codeLength: z.number().int().min(4).max(12),
  sweepIntervalMs: z.number().int().min(100),
  retentionMs: z.number().int().min(0),
  ackGraceMs: z.number().int().min(0),
});

const StatusSchema = z.strictObject({
  queryTimeoutMs: z.number().int().min(1),
  pollIntervalMs: z.number().int().min(0),
});

const ControlSchema = z.strictObject({
  apiKeys: z.array(z.string().min(1)).optional(),
  rateLimit: z
    .strictObject({
      maxAttempts: z.number().int().min(1).optional(),
      windowMs: z.number().int().min(1).optional(),
    })
    .optional(),
});

const LoggingSchema = z.strictObject({
  level: LogLevelSchema,
  json: z.boolean(),
  redactSensitive: z.boolean(),
  file: z
    .strictObject({
      enabled: z.boolean().optional(),
      path: z.string().optional(),
      maxSizeMb: z.number().int().min(1).optional(),
      maxFiles: z.number().int().min(1).optional(),
    })
    .optional(),
});

/**
 * Root schema
 *
 * - z.strictObject(): unknown keys are reported (typo guard)
 * - every top-level section is optional, so `{}` is valid
 * - no .default(); defaults.ts applies them as a separate step
 */
export const BlockBridgeConfigSchema: z.ZodType<BlockBridgeConfig> = z.strictObject({
  gateway: GatewaySchema.partial().optional(),
  servers: z.record(z.string().min(1), ServerEntrySchema).optional(),
  whitelist: z
    .strictObject({
      serverIds: z.array(z.string().min(1)).optional(),
      tokens: z.array(z.string().min(1)).optional(),
    })
    .optional(),
  session: SessionSchema.partial().optional(),
  binding: BindingSchema.partial().optional(),
  status: StatusSchema.partial().optional(),
  control: ControlSchema.optional(),
  commands: z
    .strictObject({
      adminRoles: z.array(z.string()).optional(),
      defaultServer: z.string().min(1).optional(),
    })
    .optional(),
  logging: LoggingSchema.partial().optional(),
});
