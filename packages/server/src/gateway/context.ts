// packages/server/src/gateway/context.ts
import { resolveServers } from '@blockbridge/config';
import type { BlockBridgeLogger } from '@blockbridge/infra';
import type { ResolvedConfig } from '@blockbridge/types';
import { registerBuiltInCommands } from '../commands/built-in.js';
import { InMemoryCommandRegistry, type CommandRegistry } from '../commands/registry.js';
import { AuthRateLimiter } from './auth/rate-limit.js';
import { BindingCoordinator } from './binding.js';
import { Forwarder, routesFrom, type ChatPlatform } from './forwarder.js';
import { wireInbound } from './inbound.js';
import { SessionRegistry, sessionDefaults } from './registry.js';
import { RpcMethodRegistry } from './rpc/index.js';
import { registerBindingMethods } from './rpc/methods/binding.js';
import { registerCommandMethods } from './rpc/methods/command.js';
import { registerServerMethods } from './rpc/methods/servers.js';
import { registerSystemMethods } from './rpc/methods/system.js';
import { createWsDialer, type Dialer } from './session/dialer.js';
import { StatusQueryFacade } from './status/facade.js';
import { HttpStatusClient } from './status/http-client.js';

export interface GatewayDeps {
  readonly platform: ChatPlatform;
  readonly logger: BlockBridgeLogger;
  /** Defaults to a `ws` client dialer */
  readonly dialer?: Dialer;
  /** Substitute for the global fetch used by the HTTP status fallback */
  readonly fetchImpl?: typeof fetch;
}

/**
 * Everything one gateway instance owns, in one place.
 * No module-level tables: two contexts in one process never see each other's sessions.
 */
export interface GatewayContext {
  readonly config: ResolvedConfig;
  readonly logger: BlockBridgeLogger;
  readonly sessions: SessionRegistry;
  readonly forwarder: Forwarder;
  readonly binding: BindingCoordinator;
  readonly status: StatusQueryFacade;
  readonly commands: CommandRegistry;
  readonly rpc: RpcMethodRegistry;
  /** Failed game-server and API-key authentications, per remote address */
  readonly authLimiter: AuthRateLimiter;
  readonly startedAt: number;
  /** Detach inbound routing and release timers */
  dispose(): void;
}

export const COMMAND_PREFIX = '/mc ';

export function createGatewayContext(config: ResolvedConfig, deps: GatewayDeps): GatewayContext {
  const logger = deps.logger;
  const servers = resolveServers(config, logger);

  const authLimiter = new AuthRateLimiter({
    maxFailures: config.control.rateLimit.maxAttempts,
    windowMs: config.control.rateLimit.windowMs,
  });

  const sessions = new SessionRegistry(
    servers,
    {
      session: sessionDefaults(config),
      duplicatePolicy: config.gateway.duplicatePolicy,
      removeOnGiveUp: config.session.reconnect.removeOnGiveUp,
    },
    {
      logger: logger.child('gateway'),
      rateLimiter: authLimiter,
      dialer:
        deps.dialer ??
        createWsDialer({
          handshakeTimeoutMs: config.gateway.handshakeTimeoutMs,
          maxPayloadBytes: config.gateway.maxPayloadBytes,
        }),
    },
  );

  const forwarder = new Forwarder(routesFrom(servers.values()), {
    registry: sessions,
    platform: deps.platform,
    logger: logger.child('forwarder'),
  });

  const binding = new BindingCoordinator(config.binding, {
    registry: sessions,
    platform: deps.platform,
    logger: logger.child('binding'),
  });

  const statusLogger = logger.child('status');
  const status = new StatusQueryFacade(config.status, {
    registry: sessions,
    logger: statusLogger,
    http: new HttpStatusClient({
      timeoutMs: config.status.queryTimeoutMs,
      fetchImpl: deps.fetchImpl,
      logger: statusLogger,
    }),
  });

  const commands = new InMemoryCommandRegistry();
  registerBuiltInCommands(
    commands,
    { sessions, forwarder, status, binding, logger: logger.child('commands') },
    {
      adminRoles: config.commands.adminRoles,
      defaultServer: config.commands.defaultServer,
      commandTimeoutMs: config.session.requestTimeoutMs,
      prefix: COMMAND_PREFIX,
    },
  );

  const unwire = wireInbound({ registry: sessions, forwarder, binding, status, logger });

  const rpc = new RpcMethodRegistry(logger.child('rpc'));
  const ctx: GatewayContext = {
    config,
    logger,
    sessions,
    forwarder,
    binding,
    status,
    commands,
    rpc,
    authLimiter,
    startedAt: Date.now(),
    dispose() {
      unwire();
      status.dispose();
      binding.dispose();
      sessions.dispose();
      authLimiter.clear();
    },
  };

  registerSystemMethods(ctx);
  registerServerMethods(ctx);
  registerBindingMethods(ctx);
  registerCommandMethods(ctx);
  return ctx;
}
