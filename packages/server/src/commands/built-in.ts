// packages/server/src/commands/built-in.ts
import type { BlockBridgeLogger } from '@blockbridge/infra';
import type { ConfirmError, QueryError } from '@blockbridge/types';
import type { BindingCoordinator } from '../gateway/binding.js';
import type { Forwarder } from '../gateway/forwarder.js';
import type { SessionRegistry } from '../gateway/registry.js';
import type { StatusQueryFacade } from '../gateway/status/facade.js';
import { describeQueryError, formatHelp, formatInfo, formatPlayers, formatStatus } from './formatter.js';
import type { CommandContext, CommandRegistry, CommandResult } from './registry.js';

export interface CommandDeps {
  readonly sessions: SessionRegistry;
  readonly forwarder: Forwarder;
  readonly status: StatusQueryFacade;
  readonly binding: BindingCoordinator;
  readonly logger: BlockBridgeLogger;
}

export interface CommandOptions {
  readonly adminRoles: readonly string[];
  readonly defaultServer?: string;
  /** How long `cmd` waits for COMMAND_RESULT */
  readonly commandTimeoutMs: number;
  /** Prepended to usage lines in help output, e.g. "/mc " */
  readonly prefix: string;
}

export type ServerFlag =
  | { ok: true; serverId?: string; args: readonly string[] }
  | { ok: false; content: string };

export type ServerSelection = { ok: true; serverId: string; args: readonly string[] } | { ok: false; content: string };

const reply = (content: string, ephemeral = true): CommandResult => ({ content, ephemeral });

/** Pull `--server <id>` out of the argument list */
export function parseServerFlag(args: readonly string[]): ServerFlag {
  const index = args.indexOf('--server');
  if (index === -1) {
    return { ok: true, args };
  }
  const serverId = args[index + 1];
  if (!serverId || serverId.startsWith('--')) {
    return { ok: false, content: 'Usage: --server <id>' };
  }
  return { ok: true, serverId, args: [...args.slice(0, index), ...args.slice(index + 2)] };
}

/** Explicit --server, else the configured default, else the only server */
export function selectServer(
  args: readonly string[],
  known: readonly string[],
  defaultServer?: string,
): ServerSelection {
  const flag = parseServerFlag(args);
  if (!flag.ok) {
    return flag;
  }
  const serverId = flag.serverId ?? defaultServer ?? (known.length === 1 ? known[0] : undefined);
  if (serverId) {
    return { ok: true, serverId, args: flag.args };
  }
  if (known.length === 0) {
    return { ok: false, content: 'No servers configured' };
  }
  return {
    ok: false,
    content: `Several servers are configured (${known.join(', ')}). Pick one with --server <id>`,
  };
}

function confirmErrorText(code: string, error: ConfirmError): string {
  switch (error) {
    case 'CODE_NOT_FOUND':
      return `Binding code ${code} not found`;
    case 'CODE_EXPIRED':
      return `Binding code ${code} has expired. Request a new one in game.`;
    case 'ALREADY_CONFIRMED':
      return `Binding code ${code} has already been used`;
    case 'CODE_AMBIGUOUS':
      return `Binding code ${code} is pending on several servers. Add --server <id>.`;
  }
}

export function registerBuiltInCommands(
  commands: CommandRegistry,
  deps: CommandDeps,
  opts: CommandOptions,
): void {
  const select = (args: readonly string[]): ServerSelection =>
    selectServer(args, deps.sessions.knownServers(), opts.defaultServer);

  // a configured server without a session is offline, not unknown
  const routeError = (serverId: string, error: QueryError): QueryError =>
    error === 'SERVER_NOT_FOUND' && deps.sessions.getServer(serverId) ? 'SERVER_NOT_CONNECTED' : error;

  // status
  commands.register(
    {
      name: 'status',
      aliases: ['st'],
      description: 'Show server status',
      usage: 'status',
      category: 'server',
    },
    async (args) => {
      const selected = select(args);
      if (!selected.ok) {
        return reply(selected.content);
      }
      const result = await deps.status.queryStatus(selected.serverId);
      if (!result.ok) {
        return reply(`Failed to get status: ${describeQueryError(selected.serverId, result.error, result.message)}`);
      }
      return reply(formatStatus(result.value), false);
    },
  );

  // players
  commands.register(
    {
      name: 'players',
      aliases: ['list', 'online'],
      description: 'List online players',
      usage: 'players',
      category: 'server',
    },
    async (args) => {
      const selected = select(args);
      if (!selected.ok) {
        return reply(selected.content);
      }
      const result = await deps.status.queryPlayers(selected.serverId);
      if (!result.ok) {
        return reply(`Failed to get players: ${describeQueryError(selected.serverId, result.error, result.message)}`);
      }
      return reply(formatPlayers(result.value), false);
    },
  );

  // say
  commands.register(
    {
      name: 'say',
      aliases: [],
      description: 'Send a chat message to the server',
      usage: 'say <message>',
      category: 'server',
    },
    async (args, ctx) => {
      const selected = select(args);
      if (!selected.ok) {
        return reply(selected.content);
      }
      const content = selected.args.join(' ').trim();
      if (!content) {
        return reply('Usage: say <message>');
      }
      const result = deps.forwarder.relayChat(selected.serverId, {
        content,
        sender: { platform: ctx.platform, name: ctx.senderName },
      });
      if (!result.ok) {
        const error = routeError(selected.serverId, result.error);
        return reply(`Failed to send: ${describeQueryError(selected.serverId, error)}`);
      }
      return reply(
        result.delivery === 'sent' ? 'Message sent' : `Message queued until ${selected.serverId} reconnects`,
        false,
      );
    },
  );

  // cmd
  commands.register(
    {
      name: 'cmd',
      aliases: ['command'],
      description: 'Run a console command on the server',
      usage: 'cmd <command>',
      category: 'admin',
      requiredRoles: opts.adminRoles,
    },
    async (args) => {
      const selected = select(args);
      if (!selected.ok) {
        return reply(selected.content);
      }
      const command = selected.args.join(' ').trim();
      if (!command) {
        return reply('Usage: cmd <command>\nExample: cmd weather clear');
      }
      const { serverId } = selected;
      deps.logger.info(`Running console command on ${serverId}: ${command}`);
      const result = await deps.forwarder.runCommand(serverId, command, opts.commandTimeoutMs);
      if (!result.ok) {
        return reply(`Failed to run command: ${describeQueryError(serverId, routeError(serverId, result.error))}`);
      }

      const { success, output } = result.value;
      const head = success ? `Command executed: ${command}` : `Command failed: ${command}`;
      return reply(output ? `${head}\n${output}` : head, false);
    },
  );

  // info
  commands.register(
    {
      name: 'info',
      aliases: ['connections'],
      description: 'Show gateway connection state',
      usage: 'info',
      category: 'general',
    },
    async () => {
      const rows = deps.sessions.knownServers().map((serverId) => {
        const found = deps.sessions.lookup(serverId);
        return {
          serverId,
          summary: found.ok ? found.session.summary() : undefined,
          targets: deps.forwarder.targetsFor(serverId).length,
        };
      });
      return reply(formatInfo(rows));
    },
  );

  // reconnect
  commands.register(
    {
      name: 'reconnect',
      aliases: [],
      description: 'Restart the connection attempts for a server',
      usage: 'reconnect',
      category: 'server',
    },
    async (args) => {
      const selected = select(args);
      if (!selected.ok) {
        return reply(selected.content);
      }
      const result = deps.sessions.reconnect(selected.serverId);
      if (!result.ok) {
        return reply(`Failed to reconnect: ${describeQueryError(selected.serverId, result.error)}`);
      }
      return reply(`Reconnect requested for ${selected.serverId} (${result.state})`);
    },
  );

  // bind
  commands.register(
    {
      name: 'bind',
      aliases: [],
      description: 'Link your account to the player that received the code in game',
      usage: 'bind <code>',
      category: 'general',
    },
    async (args, ctx) => {
      const flag = parseServerFlag(args);
      if (!flag.ok) {
        return reply(flag.content);
      }
      const code = flag.args[0];
      if (!code) {
        return reply('Usage: bind <code>');
      }
      const result = deps.binding.confirm(code, ctx.platform, ctx.accountId, flag.serverId);
      if (!result.ok) {
        return reply(confirmErrorText(code, result.error));
      }
      const { ack } = result;
      const who = ack.playerName ?? ack.playerUuid;
      const suffix = ack.delivery === 'deferred' ? `; ${ack.serverId} will be told when it reconnects` : '';
      return reply(`Bound ${who} on ${ack.serverId} to your account${suffix}`);
    },
  );

  // help
  commands.register(
    {
      name: 'help',
      aliases: ['h', '?'],
      description: 'Show this help',
      usage: 'help [command]',
      category: 'general',
    },
    async (args) => {
      const name = args[0];
      if (name) {
        const cmd = commands.get(name.toLowerCase());
        if (!cmd) {
          return reply(`Unknown command: ${name}`);
        }
        return reply(`${opts.prefix}${cmd.definition.usage}\n${cmd.definition.description}`);
      }
      return reply(formatHelp(commands.list(), opts.prefix));
    },
  );
}

/** Parse a raw command line (prefix already stripped by the platform) and run it */
export async function dispatchCommand(
  commands: CommandRegistry,
  line: string,
  ctx: CommandContext,
  logger: BlockBridgeLogger,
): Promise<CommandResult> {
  const parsed = commands.parse(line, '');
  if (!parsed) {
    return reply('Empty command. Try "help".');
  }
  logger.debug(`Command ${parsed.name} from ${ctx.platform}:${ctx.accountId}`);
  return commands.execute(parsed, ctx);
}
