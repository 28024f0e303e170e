// packages/server/src/commands/formatter.ts
import type {
  BindingNotification,
  ForwardEvent,
  PlayerInfo,
  PlayerList,
  QueryError,
  ServerSummary,
  StatusSnapshot,
} from '@blockbridge/types';
import type { CommandDefinition } from './registry.js';

export interface InfoRow {
  readonly serverId: string;
  readonly summary?: ServerSummary;
  readonly targets: number;
}

export function formatStatus(status: StatusSnapshot): string {
  const lines = [`Minecraft server status (${status.serverId})`, `Online: ${status.online ? 'yes' : 'no'}`];
  if (!status.online) {
    return lines.join('\n');
  }

  lines.push(`Version: ${status.version ?? 'unknown'}`, `Players: ${status.onlinePlayers}/${status.maxPlayers}`);
  if (status.tps) {
    lines.push(`TPS: ${status.tps.map((t) => t.toFixed(1)).join(' / ')}`);
  }
  if (status.memory) {
    const { usedMb, maxMb } = status.memory;
    const percent = maxMb > 0 ? (usedMb / maxMb) * 100 : 0;
    lines.push(`Memory: ${usedMb}MB / ${maxMb}MB (${percent.toFixed(1)}%)`);
  }
  if (status.players && status.players.length > 0) {
    lines.push(`Online players: ${status.players.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatPlayer(p: PlayerInfo): string {
  const health = `HP ${(p.health ?? 0).toFixed(0)}/${(p.maxHealth ?? 20).toFixed(0)}`;
  return `• ${p.name} | ${health} | Lv.${p.level ?? 0} | ${p.gameMode ?? 'UNKNOWN'} | ${p.world ?? 'unknown'} | ${p.ping ?? 0}ms`;
}

export function formatPlayers(players: PlayerList): string {
  const lines = [`Players on ${players.serverId}`, `Online: ${players.online}/${players.max}`];
  if (players.list.length === 0) {
    lines.push('No players online');
  } else {
    lines.push(...players.list.map(formatPlayer));
  }
  return lines.join('\n');
}

export function formatInfo(rows: readonly InfoRow[]): string {
  if (rows.length === 0) {
    return 'No servers configured';
  }
  const lines = ['Gateway connections'];
  for (const row of rows) {
    if (!row.summary) {
      lines.push(`• ${row.serverId}: no session | targets ${row.targets}`);
      continue;
    }
    const { state, mode, queued, dropped } = row.summary;
    lines.push(`• ${row.serverId}: ${state} (${mode}) | queued ${queued} | dropped ${dropped} | targets ${row.targets}`);
  }
  return lines.join('\n');
}

export function formatHelp(commands: readonly CommandDefinition[], prefix: string): string {
  const lines = ['Minecraft gateway commands', ''];
  for (const cmd of commands) {
    const admin = cmd.requiredRoles && cmd.requiredRoles.length > 0 ? ' (admin)' : '';
    lines.push(`  ${prefix}${cmd.usage} - ${cmd.description}${admin}`);
  }
  lines.push('', 'Add --server <id> to pick a server when several are connected.');
  return lines.join('\n');
}

export function describeQueryError(serverId: string, error: QueryError, message?: string): string {
  switch (error) {
    case 'SERVER_NOT_FOUND':
      return `Unknown server: ${serverId}`;
    case 'SERVER_NOT_CONNECTED':
      return message ? `${serverId} is not connected (${message})` : `${serverId} is not connected`;
    case 'TIMEOUT':
      return message ? `${serverId} did not answer in time (${message})` : `${serverId} did not answer in time`;
  }
}

/** One line per forwarded event, as a plain-text platform would post it */
export function formatForwardEvent(event: ForwardEvent): string {
  switch (event.kind) {
    case 'chat':
      return event.player
        ? `[${event.serverId}] <${event.player.name}> ${event.content}`
        : `[${event.serverId}] ${event.content}`;
    case 'player_event':
      return `[${event.serverId}] ${event.player.name} ${event.event === 'join' ? 'joined' : 'left'} the game`;
    case 'server_status': {
      const reason = event.reason ? ` (${event.reason})` : '';
      return `[${event.serverId}] Server is ${event.online ? 'online' : 'offline'}${reason}`;
    }
  }
}

/** Private notice carrying a binding code */
export function formatBindingNotice(notice: BindingNotification): string {
  const minutes = Math.max(1, Math.round((notice.expiresAt - notice.issuedAt) / 60_000));
  return [
    `Binding request from ${notice.playerName ?? notice.playerUuid} on ${notice.serverId}`,
    `Reply with: bind ${notice.code}`,
    `The code expires in ${minutes} min.`,
  ].join('\n');
}
