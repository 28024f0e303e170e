// packages/server/src/gateway/session/session.ts
import type {
  DeliveryPolicy,
  Message,
  ServerSummary,
  SessionState,
  Timestamp,
  TransportMode,
} from '@blockbridge/types';
import { createTimestamp } from '@blockbridge/types';
import {
  nextRetryDelay,
  formatDuration,
  createTypedEmitter,
  getEventBus,
  redactUrl,
  type BlockBridgeLogger,
  type TypedEmitter,
} from '@blockbridge/infra';
import { AuthenticationFailedError } from '../errors.js';
import { decode, encode } from '../protocol/codec.js';
import { createMessage, newCorrelationId } from '../protocol/message.js';
import type { Dialer } from './dialer.js';
import { HeartbeatMonitor } from './heartbeat.js';
import { PendingRequests, type PendingOutcome } from './pending.js';
import { OutboundQueue } from './queue.js';
import { nextState, type SessionTrigger } from './state.js';
import { CloseCodes, type Transport } from './transport.js';

export interface SessionOptions {
  readonly serverId: string;
  readonly mode: TransportMode;
  readonly token: string;
  /** Required in dial mode */
  readonly url?: string;
  readonly heartbeatIntervalMs: number;
  readonly heartbeatTimeoutMs: number;
  readonly queueCapacity: number;
  readonly requestTimeoutMs: number;
  readonly handshakeTimeoutMs: number;
  readonly reconnect: {
    readonly minDelayMs: number;
    readonly maxDelayMs: number;
    /** 0 = unlimited */
    readonly maxAttempts: number;
    readonly jitter: boolean;
    /** listen mode: how long RECONNECTING waits for the server to return; 0 = forever */
    readonly giveUpAfterMs: number;
  };
}

export interface SessionDeps {
  readonly logger: BlockBridgeLogger;
  readonly dialer?: Dialer;
}

export interface SessionEvents {
  state: (from: SessionState, to: SessionState, trigger: SessionTrigger) => void;
  online: () => void;
  offline: (reason: string) => void;
  message: (message: Message) => void;
  auth_failed: (reason: string) => void;
  /** Automatic recovery stopped; the session is CLOSED */
  gave_up: (reason: string) => void;
}

export type SendResult =
  | { ok: true; delivery: 'sent' | 'queued' }
  | { ok: false; error: 'SERVER_NOT_CONNECTED' };

export interface RequestOptions {
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  /** Default 'immediate' */
  readonly policy?: DeliveryPolicy;
}

/**
 * One logical connection to a game server.
 *
 * Owns the transport, the outbound FIFO, correlated waiters and the heartbeat.
 * All state changes go through `nextState()`; illegal triggers are logged and ignored.
 */
export class ServerSession {
  readonly serverId: string;
  readonly mode: TransportMode;
  readonly events: TypedEmitter<SessionEvents> = createTypedEmitter<SessionEvents>();

  private currentState: SessionState = 'CONNECTING';
  private transport: Transport | undefined;
  private online = false;
  private attempts = 0;
  private lastSeenAt: Timestamp | undefined;
  private connectedAt: Timestamp | undefined;

  private readonly queue: OutboundQueue<Message>;
  private readonly pending = new PendingRequests();
  private readonly heartbeat: HeartbeatMonitor;
  private readonly logger: BlockBridgeLogger;
  private readonly dialer: Dialer | undefined;

  private retryTimer: ReturnType<typeof setTimeout> | undefined;
  private giveUpTimer: ReturnType<typeof setTimeout> | undefined;
  private ackTimer: ReturnType<typeof setTimeout> | undefined;
  private dialAbort: AbortController | undefined;

  constructor(
    private readonly opts: SessionOptions,
    deps: SessionDeps,
  ) {
    this.serverId = opts.serverId;
    this.mode = opts.mode;
    this.logger = deps.logger;
    this.dialer = deps.dialer;
    this.queue = new OutboundQueue(opts.queueCapacity);
    this.heartbeat = new HeartbeatMonitor({
      intervalMs: opts.heartbeatIntervalMs,
      timeoutMs: opts.heartbeatTimeoutMs,
      sendPing: (correlationId) =>
        this.write(
          createMessage({
            type: 'PING',
            serverId: this.serverId,
            correlationId,
            payload: { sentAt: Date.now() },
          }),
        ),
      onTimeout: () => this.onHeartbeatTimeout(),
    });

    if (opts.mode === 'dial' && (!opts.url || !deps.dialer)) {
      throw new Error(`Dial-mode session ${opts.serverId} needs a url and a dialer`);
    }
  }

  get state(): SessionState {
    return this.currentState;
  }

  get isConnected(): boolean {
    return this.currentState === 'CONNECTED';
  }

  // ─── Transport lifecycle ───

  /** Dial mode: begin the connect sequence */
  start(): void {
    if (this.mode !== 'dial') {
      throw new Error(`Session ${this.serverId} is in listen mode and cannot dial`);
    }
    if (this.dialAbort || this.transport) {
      return;
    }
    void this.attempt();
  }

  /**
   * Adopt a transport: an accepted socket in listen mode (already authenticated by the
   * registry) or a freshly dialed one. A previous transport is closed with 4000 first.
   */
  attachTransport(transport: Transport): void {
    const previous = this.transport;
    const replacing = previous !== undefined;
    if (previous) {
      this.transport = undefined;
      previous.close(CloseCodes.SUPERSEDED, 'Superseded by a new connection');
      this.heartbeat.stop();
      this.pending.failAll('SERVER_NOT_CONNECTED');
      this.logger.info(`Superseded transport ${previous.id} with ${transport.id}`);
    }
    this.clearTimer('giveUpTimer');
    this.clearTimer('retryTimer');

    this.transport = transport;
    transport.onMessage((frame) => this.handleFrame(transport, frame));
    transport.onClose((code, reason) => this.handleClose(transport, code, reason));
    transport.onError((err) => {
      if (this.transport === transport) {
        this.logger.warn(`Transport error: ${err.message}`);
      }
    });

    this.transition(replacing ? 'transport_replaced' : 'transport_opened');

    if (this.mode === 'listen') {
      this.write(
        createMessage({
          type: 'CONNECTION_ACK',
          serverId: this.serverId,
          payload: { serverId: this.serverId },
        }),
      );
      this.transition('auth_succeeded');
      return;
    }

    this.ackTimer = setTimeout(() => {
      this.ackTimer = undefined;
      if (this.transport !== transport) {
        return;
      }
      this.logger.warn(`No CONNECTION_ACK within ${this.opts.handshakeTimeoutMs}ms`);
      this.dropTransport(CloseCodes.HANDSHAKE_TIMEOUT, 'Handshake timeout');
      this.handleLoss('attempt_failed', 'handshake timeout');
    }, this.opts.handshakeTimeoutMs);
  }

  /**
   * Leave CLOSED/RECONNECTING and start over immediately, bypassing any backoff wait.
   * In listen mode a live transport is closed with 1012 so the game server reconnects.
   */
  reconnect(): SessionState {
    this.clearTimer('retryTimer');
    this.clearTimer('giveUpTimer');
    this.attempts = 0;

    if (this.transport) {
      this.dropTransport(CloseCodes.SERVICE_RESTART, 'Reconnect requested');
      this.heartbeat.stop();
      this.pending.failAll('SERVER_NOT_CONNECTED');
    }
    this.dialAbort?.abort();
    this.dialAbort = undefined;
    this.clearTimer('ackTimer');

    this.transition('reconnect_requested', 'reconnect requested');

    if (this.mode === 'dial') {
      void this.attempt();
    } else {
      this.armGiveUp();
    }
    return this.currentState;
  }

  /** Explicit detach: CLOSED, no retry */
  detach(code: number = CloseCodes.NORMAL, reason = 'Detached'): void {
    this.clearTimer('retryTimer');
    this.clearTimer('giveUpTimer');
    this.clearTimer('ackTimer');
    this.dialAbort?.abort();
    this.dialAbort = undefined;
    this.heartbeat.stop();
    this.dropTransport(code, reason);
    this.pending.failAll('SERVER_NOT_CONNECTED');
    this.transition('detach', reason.toLowerCase());
    const discarded = this.queue.clear();
    if (discarded.length > 0) {
      this.logger.warn(`Discarded ${discarded.length} queued message(s) on detach`);
    }
  }

  // ─── Outbound ───

  /**
   * Send under a delivery policy.
   * - queue: buffer in any state except CLOSED
   * - prompt: buffer only while AUTHENTICATING or RECONNECTING
   * - immediate: only when CONNECTED
   */
  send(message: Message, policy: DeliveryPolicy = 'queue'): SendResult {
    if (this.currentState === 'CONNECTED' && this.transport?.isOpen) {
      if (this.queue.size > 0) {
        this.enqueue(message);
        this.flush();
      } else {
        this.write(message);
      }
      return { ok: true, delivery: 'sent' };
    }

    if (!this.canQueue(policy)) {
      return { ok: false, error: 'SERVER_NOT_CONNECTED' };
    }
    this.enqueue(message);
    return { ok: true, delivery: 'queued' };
  }

  /**
   * Send with a fresh correlation id and wait for the matching response.
   * A request that fails while still queued is withdrawn, so it never reaches the server late.
   */
  async request<R extends Message>(
    message: Message,
    accept: (response: Message) => response is R,
    options: RequestOptions = {},
  ): Promise<PendingOutcome<R>> {
    const correlationId = newCorrelationId();
    const sent = this.send({ ...message, correlationId }, options.policy ?? 'immediate');
    if (!sent.ok) {
      return { ok: false, error: 'SERVER_NOT_CONNECTED' };
    }
    const outcome = await this.pending.register(
      correlationId,
      accept,
      options.timeoutMs ?? this.opts.requestTimeoutMs,
      options.signal,
    );
    if (!outcome.ok && this.queue.remove((queued) => queued.correlationId === correlationId) > 0) {
      this.logger.debug(`Withdrew unanswered ${message.type} ${correlationId} (${outcome.error})`);
    }
    return outcome;
  }

  summary(): ServerSummary {
    return {
      serverId: this.serverId,
      mode: this.mode,
      state: this.currentState,
      lastSeenAt: this.lastSeenAt,
      connectedAt: this.connectedAt,
      queued: this.queue.size,
      dropped: this.queue.droppedTotal,
      pendingRequests: this.pending.size,
      attempts: this.attempts,
    };
  }

  private canQueue(policy: DeliveryPolicy): boolean {
    switch (policy) {
      case 'queue':
        return this.currentState !== 'CLOSED';
      case 'prompt':
        return this.currentState === 'RECONNECTING' || this.currentState === 'AUTHENTICATING';
      case 'immediate':
        return false;
    }
  }

  private enqueue(message: Message): void {
    const evicted = this.queue.push(message);
    if (evicted) {
      this.logger.warn(
        `Outbound queue full (${this.opts.queueCapacity}), dropped oldest ${evicted.type} (${this.queue.droppedTotal} dropped so far)`,
      );
      getEventBus().emit('session:queue:drop', this.serverId, this.queue.droppedTotal);
    }
  }

  private flush(): void {
    while (this.currentState === 'CONNECTED' && this.transport?.isOpen && this.queue.size > 0) {
      const next = this.queue.shift();
      if (next) {
        this.write(next);
      }
    }
  }

  private write(message: Message): void {
    if (!this.transport?.isOpen) {
      return;
    }
    this.transport.send(encode(message));
  }

  // ─── Inbound ───

  private handleFrame(transport: Transport, frame: string): void {
    if (transport !== this.transport) {
      return;
    }
    this.lastSeenAt = createTimestamp(Date.now());

    const decoded = decode(frame);
    if (!decoded.ok) {
      this.logger.warn(`Dropped malformed message: ${decoded.error.message}`);
      getEventBus().emit('session:message:malformed', this.serverId, decoded.error.reason);
      return;
    }

    const message = decoded.message;
    if (message.serverId !== this.serverId) {
      this.logger.warn(`Dropped ${message.type} addressed to server "${message.serverId}"`);
      getEventBus().emit('session:message:malformed', this.serverId, 'server_id_mismatch');
      return;
    }

    switch (message.type) {
      case 'PING':
        this.write(
          createMessage({
            type: 'PONG',
            serverId: this.serverId,
            correlationId: message.correlationId,
            payload: { sentAt: message.payload.sentAt },
          }),
        );
        return;
      case 'PONG':
        this.heartbeat.acknowledge();
        return;
      case 'CONNECTION_ACK':
        if (this.mode === 'dial' && this.currentState === 'AUTHENTICATING') {
          this.clearTimer('ackTimer');
          this.attempts = 0;
          this.transition('auth_succeeded');
        }
        return;
      default:
        break;
    }

    if (message.correlationId !== undefined && this.pending.settle(message)) {
      return;
    }
    if (
      message.correlationId !== undefined &&
      (message.type === 'STATUS_RESPONSE' || message.type === 'COMMAND_RESULT')
    ) {
      this.logger.debug(`Discarded unmatched ${message.type} (correlation ${message.correlationId})`);
      return;
    }

    this.events.emit('message', message);
  }

  private handleClose(transport: Transport, code: number, reason: string): void {
    if (transport !== this.transport) {
      return;
    }
    this.transport = undefined;
    getEventBus().emit('gateway:ws:disconnect', this.serverId, code);

    if (this.mode === 'dial' && this.currentState === 'AUTHENTICATING' && code === CloseCodes.AUTH_FAILED) {
      this.failAuthentication(reason || 'Authentication failed');
      return;
    }
    this.handleLoss('transport_lost', `closed with ${code}${reason ? ` (${reason})` : ''}`);
  }

  private onHeartbeatTimeout(): void {
    this.logger.warn(`No PONG within ${this.opts.heartbeatTimeoutMs}ms`);
    this.dropTransport(CloseCodes.HEARTBEAT_TIMEOUT, 'Heartbeat timeout');
    this.handleLoss('heartbeat_timeout', 'heartbeat timeout');
  }

  /** Common path for every unexpected loss of the transport */
  private handleLoss(trigger: SessionTrigger, reason: string): void {
    this.heartbeat.stop();
    this.clearTimer('ackTimer');
    this.pending.failAll('SERVER_NOT_CONNECTED');

    if (this.currentState === 'CLOSED') {
      return;
    }

    const effective: SessionTrigger =
      this.mode === 'dial' && this.currentState === 'AUTHENTICATING' ? 'attempt_failed' : trigger;
    this.transition(effective, reason);

    if (this.mode === 'dial') {
      this.scheduleRetry();
    } else {
      this.armGiveUp();
    }
  }

  private failAuthentication(reason: string): void {
    this.heartbeat.stop();
    this.clearTimer('ackTimer');
    this.dropTransport(CloseCodes.AUTH_FAILED, 'Authentication failed');
    this.pending.failAll('SERVER_NOT_CONNECTED');
    this.logger.error(`Authentication failed: ${reason}`);
    this.transition('auth_failed', 'authentication failed');
    this.events.emit('auth_failed', reason);
  }

  /** Detach the current transport first so its close event is ignored as stale */
  private dropTransport(code: number, reason: string): void {
    const transport = this.transport;
    this.transport = undefined;
    transport?.close(code, reason);
  }

  // ─── Dial mode ───

  private async attempt(): Promise<void> {
    const { url } = this.opts;
    if (!this.dialer || !url) {
      return;
    }

    const controller = new AbortController();
    this.dialAbort = controller;
    this.attempts++;
    this.logger.debug(`Dialing ${redactUrl(url)} (attempt ${this.attempts})`);

    let transport: Transport;
    try {
      transport = await this.dialer(
        { serverId: this.serverId, url, token: this.opts.token },
        controller.signal,
      );
    } catch (err) {
      if (controller.signal.aborted) {
        return;
      }
      this.dialAbort = undefined;
      if (err instanceof AuthenticationFailedError) {
        this.failAuthentication(err.message);
        return;
      }
      this.logger.warn(`Dial attempt ${this.attempts} failed: ${err instanceof Error ? err.message : String(err)}`);
      this.transition('attempt_failed', 'dial failed');
      this.scheduleRetry();
      return;
    }

    if (controller.signal.aborted || this.currentState === 'CLOSED') {
      transport.close(CloseCodes.NORMAL, 'Dial no longer wanted');
      return;
    }
    this.dialAbort = undefined;
    getEventBus().emit('gateway:ws:connect', this.serverId, transport.id);
    this.attachTransport(transport);
  }

  private scheduleRetry(): void {
    const { maxAttempts, minDelayMs, maxDelayMs, jitter } = this.opts.reconnect;
    const delay = nextRetryDelay(this.attempts, {
      minDelay: minDelayMs,
      maxDelay: maxDelayMs,
      jitter,
      maxAttempts,
    });
    if (delay === undefined) {
      const reason = `gave up after ${this.attempts} attempt(s)`;
      this.logger.error(`Reconnect ${reason}`);
      this.transition('retries_exhausted', reason);
      this.events.emit('gave_up', reason);
      return;
    }

    this.logger.info(`Reconnecting in ${formatDuration(delay)}`);
    this.clearTimer('retryTimer');
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      void this.attempt();
    }, delay);
  }

  // ─── Listen mode ───

  private armGiveUp(): void {
    this.clearTimer('giveUpTimer');
    const { giveUpAfterMs } = this.opts.reconnect;
    if (giveUpAfterMs <= 0 || this.currentState !== 'RECONNECTING') {
      return;
    }
    this.giveUpTimer = setTimeout(() => {
      this.giveUpTimer = undefined;
      const reason = `not reconnected within ${giveUpAfterMs}ms`;
      this.logger.warn(`Giving up: ${reason}`);
      this.transition('retries_exhausted', reason);
      this.events.emit('gave_up', reason);
    }, giveUpAfterMs);
  }

  // ─── State ───

  private transition(trigger: SessionTrigger, reason: string = trigger): boolean {
    const from = this.currentState;
    const to = nextState(from, trigger);
    if (to === undefined) {
      this.logger.debug(`Ignored trigger ${trigger} in state ${from}`);
      return false;
    }

    this.currentState = to;
    if (from !== to) {
      this.logger.info(`${from} → ${to} (${trigger})`);
      getEventBus().emit('session:state', this.serverId, from, to);
    }
    this.events.emit('state', from, to, trigger);

    if (to === 'CONNECTED') {
      this.heartbeat.start();
      this.flush();
      if (!this.online) {
        this.online = true;
        this.connectedAt = createTimestamp(Date.now());
        this.events.emit('online');
      }
    } else if (from === 'CONNECTED') {
      this.heartbeat.stop();
    }

    if ((to === 'RECONNECTING' || to === 'CLOSED') && this.online) {
      this.online = false;
      this.events.emit('offline', reason);
    }
    return true;
  }

  private clearTimer(name: 'retryTimer' | 'giveUpTimer' | 'ackTimer'): void {
    clearTimeout(this[name]);
    this[name] = undefined;
  }
}
