// @blockbridge/server: barrel export

export * from './gateway/index.js';
export * from './commands/index.js';
export { ProcessLifecycle, setupGracefulShutdown, type GracefulShutdownOptions } from './process/index.js';
