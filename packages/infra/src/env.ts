// packages/infra/src/env.ts
import * as fs from 'node:fs';
import { BlockBridgeError } from './errors.js';

export const ENV_PREFIX = 'BLOCKBRIDGE_';

export type Env = Readonly<Record<string, string | undefined>>;

/** Load a .env file with process.loadEnvFile() when it exists */
export function loadDotenv(envPath = '.env'): boolean {
  if (!fs.existsSync(envPath)) {
    return false;
  }
  process.loadEnvFile(envPath);
  return true;
}

/** BLOCKBRIDGE_<name>, trimmed; blank counts as unset */
export function readEnv(env: Env, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`]?.trim();
  return value ? value : undefined;
}

/** Non-negative integer BLOCKBRIDGE_<name>, or undefined when unset */
export function readEnvInt(env: Env, name: string): number | undefined {
  const raw = readEnv(env, name);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new BlockBridgeError(`${ENV_PREFIX}${name} is not a non-negative integer: ${raw}`, 'INVALID_ENV', {
      details: { variable: `${ENV_PREFIX}${name}`, value: raw },
    });
  }
  return parsed;
}

/** '1', 'true', 'yes' (any case) */
export function isTruthyEnvValue(value: string | undefined): boolean {
  return value != null && ['1', 'true', 'yes'].includes(value.toLowerCase());
}
