// packages/config/src/io.ts
import type { ResolvedConfig } from '@blockbridge/types';
import { getErrorCode, readEnvInt } from '@blockbridge/infra';
import * as JSON5 from 'json5';
import * as fs from 'node:fs';
import * as os from 'node:os';
import type { ConfigDeps } from './types.js';
import { applyDefaults } from './defaults.js';
import { applyEnvOverrides } from './env-overrides.js';
import { resolveEnvVars } from './env-substitution.js';
import { ConfigError } from './errors.js';
import { resolveConfigPath } from './paths.js';
import { validateConfigStrict } from './validation.js';

const DEFAULT_CACHE_TTL_MS = 200;

export interface ConfigIO {
  /** Run the load pipeline, or return the cached result */
  loadConfig(): ResolvedConfig;
  invalidateCache(): void;
  readonly configPath: string;
}

/**
 * Pipeline:
 *   1. read the JSON5 file (missing file = empty config)
 *   2. `${VAR}` substitution
 *   3. zod validation (throws ConfigValidationError)
 *   4. defaults
 *   5. BLOCKBRIDGE_* overrides
 */
export function createConfigIO(deps: ConfigDeps = {}): ConfigIO {
  const fsModule = deps.fs ?? fs;
  const json5Module = deps.json5 ?? JSON5;
  const env = deps.env ?? process.env;
  const homedir = deps.homedir ?? os.homedir;
  const configPath = deps.configPath ?? resolveConfigPath(env, homedir);
  const logger = deps.logger;
  const ttlMs = deps.cacheTtlMs ?? readEnvInt(env, 'CONFIG_CACHE_MS') ?? DEFAULT_CACHE_TTL_MS;

  let cached: ResolvedConfig | null = null;
  let expireAt = 0;

  function readRaw(): unknown {
    let content: string;
    try {
      content = fsModule.readFileSync(configPath, 'utf-8');
    } catch (err) {
      if (getErrorCode(err) === 'ENOENT') {
        logger?.debug(`Config file not found: ${configPath}, using defaults`);
        return {};
      }
      throw new ConfigError(`Failed to read config: ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    try {
      return json5Module.parse(content);
    } catch (err) {
      throw new ConfigError(`Failed to parse config: ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  function loadConfig(): ResolvedConfig {
    if (cached && Date.now() < expireAt) {
      return cached;
    }

    const substituted = resolveEnvVars(readRaw(), env);
    const validated = validateConfigStrict(substituted);
    const final = applyEnvOverrides(applyDefaults(validated), env);

    cached = final;
    expireAt = Date.now() + ttlMs;
    return final;
  }

  return {
    loadConfig,
    invalidateCache: () => {
      cached = null;
      expireAt = 0;
    },
    get configPath() {
      return configPath;
    },
  };
}

// ─── Module-level wrapper ───

let defaultIO: ConfigIO | null = null;
let defaultDeps: ConfigDeps | undefined;

/**
 * Load through a shared ConfigIO.
 * Passing different deps rebuilds it; calls without deps reuse the last one.
 */
export function loadConfig(deps?: ConfigDeps): ResolvedConfig {
  if (!defaultIO || (deps && deps !== defaultDeps)) {
    defaultDeps = deps;
    defaultIO = createConfigIO(deps);
  }
  return defaultIO.loadConfig();
}

export function clearConfigCache(): void {
  defaultIO?.invalidateCache();
  defaultIO = null;
  defaultDeps = undefined;
}
