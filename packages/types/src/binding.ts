import type { Timestamp } from './common.js';

export type BindingStatus = 'PENDING' | 'CONFIRMED' | 'EXPIRED' | 'CANCELLED';

/** Short-lived code linking a game-server player to a chat-platform account */
export interface BindingRequest {
  readonly code: string;
  readonly serverId: string;
  readonly playerUuid: string;
  readonly playerName?: string;
  readonly issuedAt: Timestamp;
  readonly expiresAt: Timestamp;
  readonly force: boolean;
  readonly status: BindingStatus;
}

export interface BoundAck {
  readonly code: string;
  readonly serverId: string;
  readonly playerUuid: string;
  readonly playerName?: string;
  readonly platform: string;
  readonly accountId: string;
  readonly confirmedAt: Timestamp;
  /** Whether BIND_CONFIRM reached the session already or waits for it to come online */
  readonly delivery: 'sent' | 'queued' | 'deferred';
}

export type ConfirmError = 'CODE_NOT_FOUND' | 'CODE_EXPIRED' | 'ALREADY_CONFIRMED' | 'CODE_AMBIGUOUS';

export type ConfirmResult = { ok: true; ack: BoundAck } | { ok: false; error: ConfirmError };

export type IssueResult =
  | { ok: true; request: BindingRequest; generated: boolean }
  | { ok: false; error: 'CODE_CONFLICT' };

/** Private notification handed to the chat platform when a code is issued */
export interface BindingNotification {
  readonly serverId: string;
  readonly code: string;
  readonly playerUuid: string;
  readonly playerName?: string;
  readonly issuedAt: Timestamp;
  readonly expiresAt: Timestamp;
  readonly force: boolean;
}
