// packages/server/src/gateway/binding.ts
import { randomInt } from 'node:crypto';
import type {
  BindCodeIssuedMessage,
  BindResultMessage,
  BindingNotification,
  BindingRequest,
  BindingStatus,
  BoundAck,
  ConfirmResult,
  IssueResult,
} from '@blockbridge/types';
import { createTimestamp } from '@blockbridge/types';
import { createTypedEmitter, type BlockBridgeLogger, type TypedEmitter } from '@blockbridge/infra';
import type { ChatPlatform } from './forwarder.js';
import { createMessage } from './protocol/message.js';
import type { SessionRegistry } from './registry.js';

export interface BindingOptions {
  readonly ttlMs: number;
  readonly codeLength: number;
  readonly sweepIntervalMs: number;
  /** How long EXPIRED tombstones keep answering CODE_EXPIRED */
  readonly retentionMs: number;
  /** How long a CONFIRMED entry waits for BIND_RESULT */
  readonly ackGraceMs: number;
}

export interface BindingDeps {
  readonly registry: SessionRegistry;
  readonly platform: ChatPlatform;
  readonly logger: BlockBridgeLogger;
}

export interface IssueOptions {
  readonly playerName?: string;
  /** Code proposed by the game server */
  readonly code?: string;
  readonly expiresAt?: number;
  readonly force?: boolean;
}

export type CancelResult =
  | { ok: true; request: BindingRequest }
  | { ok: false; error: 'CODE_NOT_FOUND' | 'CODE_EXPIRED' | 'ALREADY_CONFIRMED' };

export interface BindingEvents {
  'binding:issued': (request: BindingRequest) => void;
  'binding:confirmed': (ack: BoundAck) => void;
  'binding:expired': (request: BindingRequest) => void;
  'binding:cancelled': (request: BindingRequest) => void;
  'binding:result': (serverId: string, code: string, success: boolean, message?: string) => void;
}

interface Entry {
  request: BindingRequest;
  ack?: BoundAck;
  /** BIND_CONFIRM handed to a session (sent or queued) */
  delivered: boolean;
  evictAt?: number;
}

const MAX_CODE_ATTEMPTS = 20;

const entryKey = (serverId: string, code: string): string => `${serverId}\u0000${code}`;

/**
 * Correlates a code issued on a game server with a confirmation made on the chat platform.
 *
 * Every status change is a compare-and-set on the stored record, so of any number of
 * confirmations for one code exactly one observes PENDING → CONFIRMED.
 */
export class BindingCoordinator {
  readonly events: TypedEmitter<BindingEvents> = createTypedEmitter<BindingEvents>();

  private readonly entries = new Map<string, Entry>();
  private readonly logger: BlockBridgeLogger;
  private sweepTimer: ReturnType<typeof setInterval> | undefined;

  constructor(
    private readonly opts: BindingOptions,
    private readonly deps: BindingDeps,
  ) {
    this.logger = deps.logger;
  }

  start(): void {
    if (this.sweepTimer || this.opts.sweepIntervalMs <= 0) {
      return;
    }
    this.sweepTimer = setInterval(() => this.sweep(), this.opts.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  dispose(): void {
    clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
    this.entries.clear();
    this.events.removeAllListeners();
  }

  /**
   * Store a PENDING request. A proposed code is adopted unless that server still holds it
   * PENDING or CONFIRMED; otherwise a fresh numeric code is generated.
   * Repeated issues for one player stay independent; there is no per-player cap.
   */
  issue(serverId: string, playerUuid: string, options: IssueOptions = {}, now: number = Date.now()): IssueResult {
    let code = options.code;
    const generated = code === undefined;

    if (code !== undefined) {
      this.expireIfDue(entryKey(serverId, code), now);
      // only an EXPIRED tombstone may be replaced; a CONFIRMED entry still owes its BIND_CONFIRM
      const existing = this.entries.get(entryKey(serverId, code));
      if (existing && existing.request.status !== 'EXPIRED') {
        return { ok: false, error: 'CODE_CONFLICT' };
      }
    } else {
      code = this.generateCode(serverId);
      if (code === undefined) {
        return { ok: false, error: 'CODE_CONFLICT' };
      }
    }

    const ttlExpiry = now + this.opts.ttlMs;
    const request: BindingRequest = {
      code,
      serverId,
      playerUuid,
      playerName: options.playerName,
      issuedAt: createTimestamp(now),
      expiresAt: createTimestamp(
        options.expiresAt !== undefined ? Math.min(options.expiresAt, ttlExpiry) : ttlExpiry,
      ),
      force: options.force ?? false,
      status: 'PENDING',
    };
    this.entries.set(entryKey(serverId, code), { request, delivered: false });
    this.logger.info(`Issued binding code for ${playerUuid} on ${serverId}`);
    this.events.emit('binding:issued', request);
    return { ok: true, request, generated };
  }

  /**
   * Inbound BIND_CODE_ISSUED: store the request, answer the game server and notify the
   * player privately on the chat platform.
   */
  handleIssued(message: BindCodeIssuedMessage): IssueResult {
    const { serverId, payload, correlationId } = message;
    const result = this.issue(serverId, payload.playerUuid, {
      playerName: payload.playerName,
      code: payload.code,
      expiresAt: payload.expiresAt,
      force: payload.force,
    });
    const session = this.deps.registry.lookup(serverId);

    if (!result.ok) {
      this.logger.warn(`Rejected proposed binding code from ${serverId}: already in use`);
      if (session.ok) {
        session.session.send(
          createMessage({
            type: 'ERROR',
            serverId,
            correlationId,
            payload: { code: 'CODE_CONFLICT', message: `Code ${payload.code ?? ''} is already in use` },
          }),
        );
      }
      return result;
    }

    const { request } = result;
    if (result.generated && session.ok) {
      session.session.send(
        createMessage({
          type: 'BIND_CODE_ISSUED',
          serverId,
          correlationId,
          payload: {
            playerUuid: request.playerUuid,
            playerName: request.playerName,
            code: request.code,
            expiresAt: request.expiresAt,
            force: request.force,
          },
        }),
      );
    }

    void this.notify({
      serverId,
      code: request.code,
      playerUuid: request.playerUuid,
      playerName: request.playerName,
      issuedAt: request.issuedAt,
      expiresAt: request.expiresAt,
      force: request.force,
    });
    return result;
  }

  /**
   * PENDING and unexpired → CONFIRMED, then BIND_CONFIRM to the server's session.
   * Without `serverId`, a code held by several servers is CODE_AMBIGUOUS.
   */
  confirm(
    code: string,
    platform: string,
    accountId: string,
    serverId?: string,
    now: number = Date.now(),
  ): ConfirmResult {
    const picked = this.pick(code, serverId);
    if (!picked.ok) {
      return picked;
    }
    const key = entryKey(picked.entry.request.serverId, code);
    this.expireIfDue(key, now);

    const entry = this.entries.get(key);
    if (!entry) {
      return { ok: false, error: 'CODE_NOT_FOUND' };
    }
    const rejected = statusError(entry.request.status);
    if (rejected) {
      return { ok: false, error: rejected };
    }
    if (!this.compareAndSet(key, 'PENDING', 'CONFIRMED')) {
      return { ok: false, error: 'ALREADY_CONFIRMED' };
    }

    const { request } = entry;
    const delivery = this.sendConfirm(entry, platform, accountId);
    const ack: BoundAck = {
      code,
      serverId: request.serverId,
      playerUuid: request.playerUuid,
      playerName: request.playerName,
      platform,
      accountId,
      confirmedAt: createTimestamp(now),
      delivery,
    };
    entry.ack = ack;
    entry.evictAt = now + this.opts.ackGraceMs;
    this.logger.info(`Confirmed binding for ${request.playerUuid} on ${request.serverId} (${delivery})`);
    this.events.emit('binding:confirmed', ack);
    return { ok: true, ack };
  }

  cancel(serverId: string, code: string, now: number = Date.now()): CancelResult {
    const key = entryKey(serverId, code);
    this.expireIfDue(key, now);
    const entry = this.entries.get(key);
    if (!entry) {
      return { ok: false, error: 'CODE_NOT_FOUND' };
    }
    const rejected = statusError(entry.request.status);
    if (rejected) {
      return { ok: false, error: rejected };
    }
    if (!this.compareAndSet(key, 'PENDING', 'CANCELLED')) {
      return { ok: false, error: 'CODE_NOT_FOUND' };
    }
    this.entries.delete(key);
    this.events.emit('binding:cancelled', entry.request);
    return { ok: true, request: entry.request };
  }

  /** Inbound BIND_RESULT: the game server applied (or refused) the confirmation */
  acknowledge(message: BindResultMessage): boolean {
    const { serverId, payload } = message;
    const key = entryKey(serverId, payload.code);
    const entry = this.entries.get(key);
    if (entry?.request.status !== 'CONFIRMED') {
      this.logger.debug(`BIND_RESULT for unknown code from ${serverId}`);
      return false;
    }
    this.entries.delete(key);
    if (!payload.success) {
      this.logger.warn(`${serverId} refused binding: ${payload.message ?? 'no reason given'}`);
    }
    this.events.emit('binding:result', serverId, payload.code, payload.success, payload.message);
    return true;
  }

  /** Re-send confirmations that found no session; called when the server comes online */
  redeliver(serverId: string): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.request.serverId !== serverId || entry.request.status !== 'CONFIRMED' || entry.delivered) {
        continue;
      }
      if (entry.ack && this.sendConfirm(entry, entry.ack.platform, entry.ack.accountId) !== 'deferred') {
        count++;
      }
    }
    if (count > 0) {
      this.logger.info(`Redelivered ${count} binding confirmation(s) to ${serverId}`);
    }
    return count;
  }

  /** Expire overdue PENDING requests and evict finished entries */
  sweep(now: number = Date.now()): { expired: number; evicted: number } {
    let expired = 0;
    let evicted = 0;
    for (const [key, entry] of this.entries) {
      if (this.expireIfDue(key, now)) {
        expired++;
        continue;
      }
      if (entry.evictAt !== undefined && now >= entry.evictAt) {
        if (entry.request.status === 'CONFIRMED') {
          this.logger.warn(`No BIND_RESULT from ${entry.request.serverId} within ${this.opts.ackGraceMs}ms`);
        }
        this.entries.delete(key);
        evicted++;
      }
    }
    return { expired, evicted };
  }

  list(serverId?: string): BindingRequest[] {
    const out: BindingRequest[] = [];
    for (const entry of this.entries.values()) {
      if (serverId === undefined || entry.request.serverId === serverId) {
        out.push(entry.request);
      }
    }
    return out;
  }

  get size(): number {
    return this.entries.size;
  }

  // ─── internals ───

  private compareAndSet(key: string, expected: BindingStatus, next: BindingStatus): boolean {
    const entry = this.entries.get(key);
    if (entry?.request.status !== expected) {
      return false;
    }
    entry.request = { ...entry.request, status: next };
    return true;
  }

  private expireIfDue(key: string, now: number): boolean {
    const entry = this.entries.get(key);
    if (entry?.request.status !== 'PENDING' || now < entry.request.expiresAt) {
      return false;
    }
    if (!this.compareAndSet(key, 'PENDING', 'EXPIRED')) {
      return false;
    }
    entry.evictAt = now + this.opts.retentionMs;
    this.logger.debug(`Binding code for ${entry.request.playerUuid} on ${entry.request.serverId} expired`);
    this.events.emit('binding:expired', entry.request);
    return true;
  }

  private pick(
    code: string,
    serverId: string | undefined,
  ): { ok: true; entry: Entry } | { ok: false; error: 'CODE_NOT_FOUND' | 'CODE_AMBIGUOUS' } {
    if (serverId !== undefined) {
      const entry = this.entries.get(entryKey(serverId, code));
      return entry ? { ok: true, entry } : { ok: false, error: 'CODE_NOT_FOUND' };
    }

    const matches = [...this.entries.values()].filter((e) => e.request.code === code);
    const [only] = matches;
    if (matches.length === 1 && only) {
      return { ok: true, entry: only };
    }
    if (matches.length === 0) {
      return { ok: false, error: 'CODE_NOT_FOUND' };
    }
    const pending = matches.filter((e) => e.request.status === 'PENDING');
    const [single] = pending;
    if (pending.length === 1 && single) {
      return { ok: true, entry: single };
    }
    return { ok: false, error: 'CODE_AMBIGUOUS' };
  }

  private generateCode(serverId: string): string | undefined {
    const { codeLength } = this.opts;
    for (let i = 0; i < MAX_CODE_ATTEMPTS; i++) {
      const code = String(randomInt(0, 10 ** codeLength)).padStart(codeLength, '0');
      if (!this.entries.has(entryKey(serverId, code))) {
        return code;
      }
    }
    this.logger.error(`Could not find a free ${codeLength}-digit code for ${serverId}`);
    return undefined;
  }

  private sendConfirm(entry: Entry, platform: string, accountId: string): BoundAck['delivery'] {
    const { request } = entry;
    const session = this.deps.registry.lookup(request.serverId);
    if (!session.ok) {
      return 'deferred';
    }
    const sent = session.session.send(
      createMessage({
        type: 'BIND_CONFIRM',
        serverId: request.serverId,
        payload: { code: request.code, playerUuid: request.playerUuid, platform, accountId },
      }),
      'queue',
    );
    if (!sent.ok) {
      return 'deferred';
    }
    entry.delivered = true;
    return sent.delivery;
  }

  private async notify(notification: BindingNotification): Promise<void> {
    try {
      await this.deps.platform.notifyBinding(notification);
    } catch (err) {
      this.logger.warn(
        `Binding notification for ${notification.playerUuid} failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}

function statusError(status: BindingStatus): 'CODE_EXPIRED' | 'ALREADY_CONFIRMED' | 'CODE_NOT_FOUND' | undefined {
  switch (status) {
    case 'PENDING':
      return undefined;
    case 'CONFIRMED':
      return 'ALREADY_CONFIRMED';
    case 'EXPIRED':
      return 'CODE_EXPIRED';
    case 'CANCELLED':
      return 'CODE_NOT_FOUND';
  }
}
