// @blockbridge/config: barrel export

export type { ConfigDeps } from './types.js';
export type { ValidationResult } from './validation.js';
export type { ConfigIO } from './io.js';
export type { ParsedTargets } from './servers.js';

export { ConfigError, MissingEnvVarError, ConfigValidationError } from './errors.js';

export { BlockBridgeConfigSchema } from './zod-schema.js';

export { validateConfig, validateConfigStrict, formatPath } from './validation.js';

// Individual pipeline steps
export { resolveConfigPath } from './paths.js';
export { resolveEnvVars, isPlainObject } from './env-substitution.js';
export { applyDefaults, getDefaults } from './defaults.js';
export { applyEnvOverrides } from './env-overrides.js';

export {
  parseForwardTargets,
  formatForwardTarget,
  resolveForwardRoute,
  resolveServers,
} from './servers.js';

export { createConfigIO, loadConfig, clearConfigCache } from './io.js';
