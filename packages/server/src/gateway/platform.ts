// packages/server/src/gateway/platform.ts
import { formatForwardTarget } from '@blockbridge/config';
import type { BlockBridgeLogger } from '@blockbridge/infra';
import type { BindingNotification, ForwardEvent, ForwardTarget } from '@blockbridge/types';
import { formatBindingNotice, formatForwardEvent } from '../commands/formatter.js';
import type { ChatPlatform } from './forwarder.js';

/**
 * ChatPlatform that writes every delivery to the log.
 * Stands in when the gateway runs without a chat-platform adapter.
 */
export class LogChatPlatform implements ChatPlatform {
  constructor(private readonly logger: BlockBridgeLogger) {}

  async deliver(target: ForwardTarget, event: ForwardEvent): Promise<void> {
    this.logger.info(`${formatForwardTarget(target)} ${formatForwardEvent(event)}`);
  }

  async notifyBinding(notification: BindingNotification): Promise<void> {
    // the code is a credential for the account; keep it out of info logs
    this.logger.info(
      `Binding request from ${notification.playerName ?? notification.playerUuid} on ${notification.serverId}`,
    );
    this.logger.debug(formatBindingNotice(notification));
  }
}
