// packages/server/src/gateway/protocol/message.ts
import type { Message } from '@blockbridge/types';
import { randomUUID } from 'node:crypto';

export function newCorrelationId(): string {
  return randomUUID();
}

/** Stamp an outgoing message with the current time */
export function createMessage<M extends Message>(message: M): M {
  return { ...message, timestamp: message.timestamp ?? Date.now() };
}
