// packages/server/src/gateway/protocol/index.ts
export { encode, decode, isMessageType } from './codec.js';
export { MessageSchema, StatusDataSchema, PlayerListDataSchema, PlayerInfoSchema } from './schema.js';
export { createMessage, newCorrelationId } from './message.js';
