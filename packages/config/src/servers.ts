// packages/config/src/servers.ts
import type { BlockBridgeLogger } from '@blockbridge/infra';
import type {
  ForwardConfig,
  ForwardEventKind,
  ForwardRoute,
  ForwardTarget,
  ResolvedConfig,
  ResolvedServer,
} from '@blockbridge/types';

const ALL_FORWARD_EVENTS: readonly ForwardEventKind[] = ['chat', 'player_event', 'server_status'];

export interface ParsedTargets {
  targets: ForwardTarget[];
  /** Lines that were not `platform:messageType:sessionId` */
  invalid: string[];
}

/**
 * Parse forward targets.
 *
 * Accepts a list or a newline-separated block. Blank lines and `#` comments are skipped,
 * duplicates collapse. The session id keeps any further colons (`qq:group:123:456`).
 */
export function parseForwardTargets(input: readonly string[] | string | undefined): ParsedTargets {
  const lines = typeof input === 'string' ? input.split(/\r?\n/) : (input ?? []);
  const seen = new Set<string>();
  const targets: ForwardTarget[] = [];
  const invalid: string[] = [];

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const first = line.indexOf(':');
    const second = first < 0 ? -1 : line.indexOf(':', first + 1);
    const platform = line.slice(0, first).trim();
    const messageType = line.slice(first + 1, second).trim();
    const sessionId = line.slice(second + 1).trim();
    if (first < 0 || second < 0 || !platform || !messageType || !sessionId) {
      invalid.push(line);
      continue;
    }

    const key = `${platform}:${messageType}:${sessionId}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    targets.push({ platform, messageType, sessionId });
  }

  return { targets, invalid };
}

export function formatForwardTarget(target: ForwardTarget): string {
  return `${target.platform}:${target.messageType}:${target.sessionId}`;
}

/** Build the forward route of one server; invalid lines are reported through the logger */
export function resolveForwardRoute(
  serverId: string,
  forward: ForwardConfig | undefined,
  logger?: Pick<BlockBridgeLogger, 'warn'>,
): ForwardRoute {
  const { targets, invalid } = parseForwardTargets(forward?.targets);
  for (const line of invalid) {
    logger?.warn(`Ignoring malformed forward target for ${serverId}: "${line}"`);
  }
  const route: ForwardRoute = {
    targets,
    events: new Set(forward?.events ?? ALL_FORWARD_EVENTS),
  };
  if (!forward?.autoForward) {
    return route;
  }

  const sessions = parseForwardTargets(forward.autoForward.sessions);
  for (const line of sessions.invalid) {
    logger?.warn(`Ignoring malformed auto-forward session for ${serverId}: "${line}"`);
  }
  return { ...route, autoForward: { prefix: forward.autoForward.prefix, sessions: sessions.targets } };
}

/**
 * Server table from `servers` plus the legacy `whitelist`.
 *
 * Whitelist ids and tokens are paired by position; extra entries on the longer side are
 * dropped with a warning. An id present in both places takes the `servers` entry.
 */
export function resolveServers(
  config: Pick<ResolvedConfig, 'servers' | 'whitelist'>,
  logger?: Pick<BlockBridgeLogger, 'warn'>,
): Map<string, ResolvedServer> {
  const resolved = new Map<string, ResolvedServer>();
  const { serverIds, tokens } = config.whitelist;

  if (serverIds.length !== tokens.length) {
    logger?.warn(
      `whitelist.serverIds (${serverIds.length}) and whitelist.tokens (${tokens.length}) differ in length; unmatched entries are ignored`,
    );
  }

  const pairs = Math.min(serverIds.length, tokens.length);
  for (let i = 0; i < pairs; i++) {
    const serverId = serverIds[i];
    const token = tokens[i];
    if (serverId === undefined || token === undefined) {
      continue;
    }
    resolved.set(serverId, {
      serverId,
      token,
      mode: 'listen',
      forward: resolveForwardRoute(serverId, undefined, logger),
    });
  }

  for (const [serverId, entry] of Object.entries(config.servers)) {
    resolved.set(serverId, {
      serverId,
      token: entry.token,
      mode: entry.mode ?? 'listen',
      url: entry.url,
      http: entry.http
        ? { baseUrl: entry.http.baseUrl.replace(/\/+$/, ''), token: entry.http.token ?? entry.token }
        : undefined,
      forward: resolveForwardRoute(serverId, entry.forward, logger),
    });
  }

  return resolved;
}
