// packages/server/src/gateway/session/heartbeat.ts

export interface HeartbeatOptions {
  /** <= 0 disables the heartbeat */
  readonly intervalMs: number;
  readonly timeoutMs: number;
  sendPing(correlationId: string): void;
  onTimeout(): void;
}

/**
 * PING every interval; a PONG must arrive within timeoutMs of the PING.
 * Any PONG counts, so a late answer to an older PING still proves liveness.
 */
export class HeartbeatMonitor {
  private interval: ReturnType<typeof setInterval> | undefined;
  private deadline: ReturnType<typeof setTimeout> | undefined;
  private seq = 0;

  constructor(private readonly opts: HeartbeatOptions) {}

  start(): void {
    this.stop();
    if (this.opts.intervalMs <= 0) {
      return;
    }
    this.interval = setInterval(() => this.beat(), this.opts.intervalMs);
  }

  /** Called on every PONG */
  acknowledge(): void {
    clearTimeout(this.deadline);
    this.deadline = undefined;
  }

  stop(): void {
    clearInterval(this.interval);
    clearTimeout(this.deadline);
    this.interval = undefined;
    this.deadline = undefined;
  }

  get running(): boolean {
    return this.interval !== undefined;
  }

  private beat(): void {
    this.seq++;
    this.opts.sendPing(`hb-${this.seq}`);
    if (this.deadline === undefined) {
      this.deadline = setTimeout(() => {
        this.stop();
        this.opts.onTimeout();
      }, this.opts.timeoutMs);
    }
  }
}
