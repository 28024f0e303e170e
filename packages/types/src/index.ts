// @blockbridge/types: barrel export
export type * from './common.js';
export type * from './config.js';
export type * from './protocol.js';
export type * from './gateway.js';
export type * from './binding.js';
export type * from './forward.js';

// runtime values
export { MESSAGE_TYPES } from './protocol.js';
export { RPC_ERROR_CODES } from './gateway.js';

// brand factories
export { createTimestamp, isLogLevel, LOG_LEVELS } from './common.js';
