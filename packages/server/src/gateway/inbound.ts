// packages/server/src/gateway/inbound.ts
import type { BlockBridgeLogger } from '@blockbridge/infra';
import type { Message } from '@blockbridge/types';
import type { BindingCoordinator } from './binding.js';
import type { Forwarder } from './forwarder.js';
import type { SessionRegistry } from './registry.js';
import type { StatusQueryFacade } from './status/facade.js';

export interface InboundDeps {
  readonly registry: SessionRegistry;
  readonly forwarder: Forwarder;
  readonly binding: BindingCoordinator;
  readonly status: StatusQueryFacade;
  readonly logger: BlockBridgeLogger;
}

/**
 * Route what the sessions emit to the component that owns it.
 * Returns a function that removes the listeners.
 */
export function wireInbound(deps: InboundDeps): () => void {
  const { registry, forwarder, binding, status, logger } = deps;

  const onMessage = (message: Message): void => {
    switch (message.type) {
      case 'CHAT':
      case 'PLAYER_EVENT':
        void forwarder.forwardInbound(message);
        return;
      case 'BIND_CODE_ISSUED':
        binding.handleIssued(message);
        return;
      case 'BIND_RESULT':
        binding.acknowledge(message);
        return;
      case 'STATUS_RESPONSE':
        status.record(message);
        return;
      case 'ERROR':
        logger.warn(`${message.serverId} reported ${message.payload.code}: ${message.payload.message}`);
        return;
      default:
        logger.debug(`Ignored ${message.type} from ${message.serverId}`);
    }
  };

  const onOnline = (serverId: string): void => {
    void forwarder.forwardStatus(serverId, true);
    binding.redeliver(serverId);
  };

  const onOffline = (serverId: string, reason: string): void => {
    void forwarder.forwardStatus(serverId, false, reason);
  };

  registry.events.on('server:message', onMessage);
  registry.events.on('server:online', onOnline);
  registry.events.on('server:offline', onOffline);

  return () => {
    registry.events.off('server:message', onMessage);
    registry.events.off('server:online', onOnline);
    registry.events.off('server:offline', onOffline);
  };
}
