// packages/config/src/env-overrides.ts
import { isValidPort, readEnv, type Env } from '@blockbridge/infra';
import { isLogLevel, type ResolvedConfig } from '@blockbridge/types';
import { ConfigError } from './errors.js';

/**
 * BLOCKBRIDGE_PORT, BLOCKBRIDGE_HOST and BLOCKBRIDGE_LOG_LEVEL win over the file.
 * Applied after defaults so they also override default values.
 */
export function applyEnvOverrides(config: ResolvedConfig, env: Env): ResolvedConfig {
  const port = readEnv(env, 'PORT');
  const host = readEnv(env, 'HOST');
  const level = readEnv(env, 'LOG_LEVEL');

  if (!port && !host && !level) {
    return config;
  }

  const gateway = { ...config.gateway };
  if (port) {
    const parsed = Number(port);
    if (!isValidPort(parsed)) {
      throw new ConfigError(`BLOCKBRIDGE_PORT is not a valid port: ${port}`);
    }
    gateway.port = parsed;
  }
  if (host) {
    gateway.host = host;
  }

  const logging = { ...config.logging };
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigError(`BLOCKBRIDGE_LOG_LEVEL is not a log level: ${level}`);
    }
    logging.level = level;
  }

  return { ...config, gateway, logging };
}
