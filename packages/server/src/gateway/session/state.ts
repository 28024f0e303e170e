// packages/server/src/gateway/session/state.ts
import type { SessionState } from '@blockbridge/types';

/** Inputs that move a session between states */
export type SessionTrigger =
  | 'transport_opened'
  | 'transport_replaced'
  | 'auth_succeeded'
  | 'auth_failed'
  | 'transport_lost'
  | 'heartbeat_timeout'
  | 'attempt_failed'
  | 'retries_exhausted'
  | 'reconnect_requested'
  | 'detach';

type TransitionTable = Readonly<
  Record<SessionState, Partial<Readonly<Record<SessionTrigger, SessionState>>>>
>;

const TRANSITIONS: TransitionTable = {
  CONNECTING: {
    transport_opened: 'AUTHENTICATING',
    attempt_failed: 'CONNECTING',
    retries_exhausted: 'CLOSED',
    auth_failed: 'CLOSED',
    reconnect_requested: 'CONNECTING',
    detach: 'CLOSED',
  },
  AUTHENTICATING: {
    auth_succeeded: 'CONNECTED',
    auth_failed: 'CLOSED',
    transport_lost: 'RECONNECTING',
    attempt_failed: 'RECONNECTING',
    transport_replaced: 'AUTHENTICATING',
    reconnect_requested: 'RECONNECTING',
    detach: 'CLOSED',
  },
  CONNECTED: {
    transport_lost: 'RECONNECTING',
    heartbeat_timeout: 'RECONNECTING',
    transport_replaced: 'AUTHENTICATING',
    reconnect_requested: 'RECONNECTING',
    detach: 'CLOSED',
  },
  RECONNECTING: {
    transport_opened: 'AUTHENTICATING',
    transport_replaced: 'AUTHENTICATING',
    attempt_failed: 'RECONNECTING',
    retries_exhausted: 'CLOSED',
    auth_failed: 'CLOSED',
    reconnect_requested: 'RECONNECTING',
    detach: 'CLOSED',
  },
  CLOSED: {
    transport_opened: 'AUTHENTICATING',
    transport_replaced: 'AUTHENTICATING',
    reconnect_requested: 'RECONNECTING',
  },
};

/** Pure transition function; undefined means the trigger is not legal in `state` */
export function nextState(state: SessionState, trigger: SessionTrigger): SessionState | undefined {
  return TRANSITIONS[state][trigger];
}
