// packages/server/src/gateway/forwarder.ts
import { formatForwardTarget } from '@blockbridge/config';
import type { BlockBridgeLogger } from '@blockbridge/infra';
import type {
  BindingNotification,
  ChatSender,
  CommandResultMessage,
  CommandResultPayload,
  DeliveryPolicy,
  ForwardEvent,
  ForwardRoute,
  ForwardTarget,
  Message,
  QueryResult,
  ResolvedServer,
  RouteResult,
} from '@blockbridge/types';
import { createMessage } from './protocol/message.js';
import type { SessionRegistry } from './registry.js';

/**
 * The chat-platform side of the gateway.
 * Embedding hosts implement this; rendering and delivery details are theirs.
 */
export interface ChatPlatform {
  deliver(target: ForwardTarget, event: ForwardEvent): Promise<void>;
  /** Private, per-player notification; never sent to a public channel */
  notifyBinding(notification: BindingNotification): Promise<void>;
}

export interface RelayChatInput {
  readonly content: string;
  readonly sender: ChatSender;
  /** Whisper to one player instead of broadcasting */
  readonly playerUuid?: string;
}

export interface AutoForwardOutcome {
  readonly serverId: string;
  /** Text as relayed, prefix removed */
  readonly content: string;
  readonly result: RouteResult;
}

export interface ForwarderDeps {
  readonly registry: SessionRegistry;
  readonly platform: ChatPlatform;
  readonly logger: BlockBridgeLogger;
}

const isCommandResult = (m: Message): m is CommandResultMessage => m.type === 'COMMAND_RESULT';

export function routesFrom(servers: Iterable<ResolvedServer>): Map<string, ForwardRoute> {
  const routes = new Map<string, ForwardRoute>();
  for (const server of servers) {
    routes.set(server.serverId, server.forward);
  }
  return routes;
}

/**
 * Game → chat: fan inbound events out to the server's configured targets.
 * Chat → game: resolve a server id to its session and send under a delivery policy.
 */
export class Forwarder {
  private routes: Map<string, ForwardRoute>;
  private readonly registry: SessionRegistry;
  private readonly platform: ChatPlatform;
  private readonly logger: BlockBridgeLogger;

  constructor(routes: Map<string, ForwardRoute>, deps: ForwarderDeps) {
    this.routes = new Map(routes);
    this.registry = deps.registry;
    this.platform = deps.platform;
    this.logger = deps.logger;
  }

  /** Returns the number of targets that accepted the event */
  async forwardInbound(message: Message): Promise<number> {
    const event = toForwardEvent(message);
    if (!event) {
      return 0;
    }
    return this.deliver(message.serverId, event);
  }

  async forwardStatus(serverId: string, online: boolean, reason?: string): Promise<number> {
    return this.deliver(serverId, { kind: 'server_status', serverId, online, reason });
  }

  routeOutbound(serverId: string, message: Message, policy: DeliveryPolicy = 'queue'): RouteResult {
    const found = this.registry.lookup(serverId);
    if (!found.ok) {
      return found;
    }
    return found.session.send(message, policy);
  }

  /** Chat-platform text into the game; `prompt` by default so `say` never waits on a CLOSED session */
  relayChat(serverId: string, input: RelayChatInput, policy: DeliveryPolicy = 'prompt'): RouteResult {
    const message = createMessage({
      type: 'CHAT',
      serverId,
      payload: {
        content: input.content,
        sender: input.sender,
        target: input.playerUuid
          ? { type: 'PLAYER', playerUuid: input.playerUuid }
          : { type: 'BROADCAST' },
      },
    });
    return this.routeOutbound(serverId, message, policy);
  }

  /**
   * Chat-platform message typed in `origin`: relayed to every server whose auto-forward
   * prefix it starts with and whose session list admits `origin`. Only a CONNECTED session
   * takes it. An empty result means no rule applied and the host should handle the message.
   */
  relayFromPlatform(origin: ForwardTarget, text: string, sender: ChatSender): AutoForwardOutcome[] {
    const trimmed = text.trim();
    const originKey = formatForwardTarget(origin);
    const outcomes: AutoForwardOutcome[] = [];

    for (const [serverId, route] of this.routes) {
      const rule = route.autoForward;
      if (!rule || !trimmed.startsWith(rule.prefix)) {
        continue;
      }
      if (rule.sessions.length > 0 && !rule.sessions.some((s) => formatForwardTarget(s) === originKey)) {
        continue;
      }
      const content = trimmed.slice(rule.prefix.length).trim();
      if (!content) {
        continue;
      }

      const result = this.relayChat(serverId, { content, sender }, 'immediate');
      if (result.ok) {
        this.logger.debug(`Auto-forwarded message from ${originKey} to ${serverId}`);
      } else {
        this.logger.warn(`Auto-forward from ${originKey} to ${serverId} failed: ${result.error}`);
      }
      outcomes.push({ serverId, content, result });
    }
    return outcomes;
  }

  /**
   * Console command with a correlated COMMAND_RESULT.
   * `prompt` policy: waits out a reconnect, fails at once on a CLOSED session.
   */
  async runCommand(
    serverId: string,
    command: string,
    timeoutMs?: number,
  ): Promise<QueryResult<CommandResultPayload>> {
    const found = this.registry.lookup(serverId);
    if (!found.ok) {
      return found;
    }
    const outcome = await found.session.request(
      createMessage({ type: 'COMMAND', serverId, payload: { command } }),
      isCommandResult,
      { policy: 'prompt', timeoutMs },
    );
    return outcome.ok ? { ok: true, value: outcome.value.payload } : outcome;
  }

  targetsFor(serverId: string): readonly ForwardTarget[] {
    return this.routes.get(serverId)?.targets ?? [];
  }

  setRoutes(serverId: string, route: ForwardRoute): void {
    this.routes.set(serverId, route);
  }

  replaceRoutes(routes: Map<string, ForwardRoute>): void {
    this.routes = new Map(routes);
  }

  private async deliver(serverId: string, event: ForwardEvent): Promise<number> {
    const route = this.routes.get(serverId);
    if (!route || route.targets.length === 0 || !route.events.has(event.kind)) {
      return 0;
    }

    const results = await Promise.allSettled(
      route.targets.map((target) => this.platform.deliver(target, event)),
    );

    let delivered = 0;
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        delivered++;
        return;
      }
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      this.logger.warn(
        `Delivery of ${event.kind} from ${serverId} to ${formatForwardTarget(route.targets[i])} failed: ${reason}`,
      );
    });
    return delivered;
  }
}

function toForwardEvent(message: Message): ForwardEvent | undefined {
  switch (message.type) {
    case 'CHAT': {
      const content = message.payload.content.trim();
      if (!content) {
        return undefined;
      }
      return { kind: 'chat', serverId: message.serverId, content, player: message.payload.player };
    }
    case 'PLAYER_EVENT':
      return {
        kind: 'player_event',
        serverId: message.serverId,
        event: message.payload.kind,
        player: message.payload.player,
      };
    default:
      return undefined;
  }
}
