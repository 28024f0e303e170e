import type { PlayerListData, StatusData } from './gateway.js';

/** Closed set of wire message types */
export const MESSAGE_TYPES = [
  'CHAT',
  'COMMAND',
  'COMMAND_RESULT',
  'STATUS_REQUEST',
  'STATUS_RESPONSE',
  'PLAYER_EVENT',
  'BIND_CODE_ISSUED',
  'BIND_CONFIRM',
  'BIND_RESULT',
  'ERROR',
  'PING',
  'PONG',
  'CONNECTION_ACK',
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

// ─── Payloads ───

export interface PlayerRef {
  name: string;
  uuid?: string;
}

/** Chat-platform user a CHAT originated from */
export interface ChatSender {
  platform: string;
  name: string;
}

export type ChatTarget = { type: 'BROADCAST' } | { type: 'PLAYER'; playerUuid: string };

export interface ChatPayload {
  content: string;
  player?: PlayerRef;
  sender?: ChatSender;
  target?: ChatTarget;
}

export interface CommandPayload {
  command: string;
}

export interface CommandResultPayload {
  success: boolean;
  output?: string;
}

export type StatusQuery = 'status' | 'players';

export interface StatusRequestPayload {
  query: StatusQuery;
}

export type StatusResponsePayload =
  | { kind: 'status'; status: StatusData }
  | { kind: 'players'; players: PlayerListData };

export type PlayerEventKind = 'join' | 'leave';

export interface PlayerEventPayload {
  kind: PlayerEventKind;
  player: { name: string; uuid: string };
}

export interface BindCodeIssuedPayload {
  playerUuid: string;
  playerName?: string;
  /** Code proposed by the game server; the gateway generates one when absent */
  code?: string;
  expiresAt?: number;
  force?: boolean;
}

export interface BindConfirmPayload {
  code: string;
  playerUuid: string;
  platform: string;
  accountId: string;
}

export interface BindResultPayload {
  code: string;
  success: boolean;
  message?: string;
}

export interface ErrorPayload {
  code: string;
  message: string;
}

export interface HeartbeatPayload {
  sentAt?: number;
}

export interface ConnectionAckPayload {
  serverId: string;
}

// ─── Envelope ───

interface Envelope<T extends MessageType, P> {
  type: T;
  serverId: string;
  payload: P;
  /** Links a request to its response; absent on fire-and-forget events */
  correlationId?: string;
  timestamp?: number;
}

export type ChatMessage = Envelope<'CHAT', ChatPayload>;
export type CommandMessage = Envelope<'COMMAND', CommandPayload>;
export type CommandResultMessage = Envelope<'COMMAND_RESULT', CommandResultPayload>;
export type StatusRequestMessage = Envelope<'STATUS_REQUEST', StatusRequestPayload>;
export type StatusResponseMessage = Envelope<'STATUS_RESPONSE', StatusResponsePayload>;
export type PlayerEventMessage = Envelope<'PLAYER_EVENT', PlayerEventPayload>;
export type BindCodeIssuedMessage = Envelope<'BIND_CODE_ISSUED', BindCodeIssuedPayload>;
export type BindConfirmMessage = Envelope<'BIND_CONFIRM', BindConfirmPayload>;
export type BindResultMessage = Envelope<'BIND_RESULT', BindResultPayload>;
export type ErrorMessage = Envelope<'ERROR', ErrorPayload>;
export type PingMessage = Envelope<'PING', HeartbeatPayload>;
export type PongMessage = Envelope<'PONG', HeartbeatPayload>;
export type ConnectionAckMessage = Envelope<'CONNECTION_ACK', ConnectionAckPayload>;

/** Every message that can travel over a session */
export type Message =
  | ChatMessage
  | CommandMessage
  | CommandResultMessage
  | StatusRequestMessage
  | StatusResponseMessage
  | PlayerEventMessage
  | BindCodeIssuedMessage
  | BindConfirmMessage
  | BindResultMessage
  | ErrorMessage
  | PingMessage
  | PongMessage
  | ConnectionAckMessage;

export type MessageOf<T extends MessageType> = Extract<Message, { type: T }>;

/** Reason a frame could not be decoded */
export type DecodeFailure = 'invalid_json' | 'not_an_object' | 'unknown_type' | 'invalid_message';

export interface DecodeError {
  code: 'MALFORMED_MESSAGE';
  reason: DecodeFailure;
  message: string;
  /** Present when the frame carried a recognizable `type` field */
  type?: string;
}

export type DecodeResult = { ok: true; message: Message } | { ok: false; error: DecodeError };
