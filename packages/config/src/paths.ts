// packages/config/src/paths.ts
import { resolveStatePaths, type Env } from '@blockbridge/infra';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Config file location
 *
 * 1. BLOCKBRIDGE_CONFIG_PATH
 * 2. <state dir>/config/blockbridge.json5, when it exists
 * 3. ./blockbridge.json5
 */
export function resolveConfigPath(env: Env = process.env, homedir: () => string = os.homedir): string {
  const envPath = env.BLOCKBRIDGE_CONFIG_PATH;
  if (envPath) {
    return path.resolve(envPath);
  }

  const { configFile } = resolveStatePaths(env, homedir);
  if (fs.existsSync(configFile)) {
    return configFile;
  }

  return path.resolve('blockbridge.json5');
}
