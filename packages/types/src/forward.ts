import type { PlayerEventKind, PlayerRef } from './protocol.js';

/** Inbound event categories that can be forwarded */
export type ForwardEventKind = 'chat' | 'player_event' | 'server_status';

/** `platform:messageType:sessionId` destination on the chat platform */
export interface ForwardTarget {
  readonly platform: string;
  readonly messageType: string;
  readonly sessionId: string;
}

export interface AutoForwardRule {
  readonly prefix: string;
  /** Empty: any session may relay */
  readonly sessions: readonly ForwardTarget[];
}

export interface ForwardRoute {
  readonly targets: readonly ForwardTarget[];
  readonly events: ReadonlySet<ForwardEventKind>;
  /** Absent: chat-platform messages are never relayed automatically */
  readonly autoForward?: AutoForwardRule;
}

/** Platform-agnostic event handed to the chat platform */
export type ForwardEvent =
  | { kind: 'chat'; serverId: string; content: string; player?: PlayerRef }
  | { kind: 'player_event'; serverId: string; event: PlayerEventKind; player: { name: string; uuid: string } }
  | { kind: 'server_status'; serverId: string; online: boolean; reason?: string };
