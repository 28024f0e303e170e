// packages/server/src/gateway/protocol/schema.ts
import type { Message, PlayerListData, StatusData } from '@blockbridge/types';
import { z } from 'zod/v4';

/**
 * Wire schemas, one per message type.
 *
 * Plain z.object(): unknown optional fields sent by newer peers are stripped, not fatal.
 */

const nonEmpty = z.string().min(1);

const PlayerRefSchema = z.object({
  name: nonEmpty,
  uuid: z.string().optional(),
});

export const StatusDataSchema = z.object({
  online: z.boolean(),
  version: z.string().optional(),
  onlinePlayers: z.number().int().min(0),
  maxPlayers: z.number().int().min(0),
  tps: z.tuple([z.number(), z.number(), z.number()]).optional(),
  memory: z.object({ usedMb: z.number(), maxMb: z.number() }).optional(),
  players: z.array(z.string()).optional(),
}) satisfies z.ZodType<StatusData>;

export const PlayerInfoSchema = z.object({
  name: nonEmpty,
  uuid: z.string().optional(),
  health: z.number().optional(),
  maxHealth: z.number().optional(),
  level: z.number().optional(),
  gameMode: z.string().optional(),
  world: z.string().optional(),
  ping: z.number().optional(),
});

export const PlayerListDataSchema = z.object({
  online: z.number().int().min(0),
  max: z.number().int().min(0),
  list: z.array(PlayerInfoSchema),
}) satisfies z.ZodType<PlayerListData>;

const HeartbeatSchema = z.object({ sentAt: z.number().optional() });

function envelope<T extends string, P extends z.ZodType>(type: T, payload: P) {
  return z.object({
    type: z.literal(type),
    serverId: nonEmpty,
    payload,
    correlationId: nonEmpty.optional(),
    timestamp: z.number().optional(),
  });
}

export const MessageSchema: z.ZodType<Message> = z.discriminatedUnion('type', [
  envelope(
    'CHAT',
    z.object({
      content: z.string(),
      player: PlayerRefSchema.optional(),
      sender: z.object({ platform: nonEmpty, name: z.string() }).optional(),
      target: z
        .discriminatedUnion('type', [
          z.object({ type: z.literal('BROADCAST') }),
          z.object({ type: z.literal('PLAYER'), playerUuid: nonEmpty }),
        ])
        .optional(),
    }),
  ),
  envelope('COMMAND', z.object({ command: nonEmpty })),
  envelope('COMMAND_RESULT', z.object({ success: z.boolean(), output: z.string().optional() })),
  envelope('STATUS_REQUEST', z.object({ query: z.enum(['status', 'players']) })),
  envelope(
    'STATUS_RESPONSE',
    z.discriminatedUnion('kind', [
      z.object({ kind: z.literal('status'), status: StatusDataSchema }),
      z.object({ kind: z.literal('players'), players: PlayerListDataSchema }),
    ]),
  ),
  envelope(
    'PLAYER_EVENT',
    z.object({
      kind: z.enum(['join', 'leave']),
      player: z.object({ name: nonEmpty, uuid: nonEmpty }),
    }),
  ),
  envelope(
    'BIND_CODE_ISSUED',
    z.object({
      playerUuid: nonEmpty,
      playerName: z.string().optional(),
      code: nonEmpty.optional(),
      expiresAt: z.number().optional(),
      force: z.boolean().optional(),
    }),
  ),
  envelope(
    'BIND_CONFIRM',
    z.object({ code: nonEmpty, playerUuid: nonEmpty, platform: nonEmpty, accountId: nonEmpty }),
  ),
  envelope(
    'BIND_RESULT',
    z.object({ code: nonEmpty, success: z.boolean(), message: z.string().optional() }),
  ),
  envelope('ERROR', z.object({ code: nonEmpty, message: z.string() })),
  envelope('PING', HeartbeatSchema),
  envelope('PONG', HeartbeatSchema),
  envelope('CONNECTION_ACK', z.object({ serverId: nonEmpty })),
]);
