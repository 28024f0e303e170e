// packages/server/src/process: barrel export

export { setupGracefulShutdown, runCleanups, type GracefulShutdownOptions } from './signal-handler.js';
export { ProcessLifecycle, type ProcessLifecycleDeps } from './lifecycle.js';
